import type { Ellipsoid, GeoPoint, GeodesicDirectResult, GeodesicInverseResult } from '../types';
import { NumericFailureError } from '../errors';
import { toRadians, toDegrees, normalizeBearing } from './angles';
import { semiMinorAxis } from './ellipsoid';

/** Change in sigma/lambda (radians) below which iteration stops, ~0.006 mm */
const CONVERGENCE_THRESHOLD = 1e-12;
const MAX_DIRECT_ITERATIONS = 100;
const MAX_INVERSE_ITERATIONS = 1000;

interface ReducedLatitude {
  tanU: number;
  sinU: number;
  cosU: number;
}

/**
 * Latitude on the auxiliary sphere: tan U = (1 - f) tan φ.
 */
function reducedLatitude(latitudeRadians: number, flattening: number): ReducedLatitude {
  const tanU = (1 - flattening) * Math.tan(latitudeRadians);
  const cosU = 1 / Math.sqrt(1 + tanU * tanU);
  return { tanU, sinU: tanU * cosU, cosU };
}

/**
 * Vincenty's A and B series coefficients for u² = cos²α (a² - b²) / b².
 */
function seriesCoefficients(uSq: number): { A: number; B: number } {
  const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
  return { A, B };
}

function deltaSigma(B: number, sinSigma: number, cosSigma: number, cos2SigmaM: number): number {
  const cos2SigmaMSq = cos2SigmaM * cos2SigmaM;
  return (
    B *
    sinSigma *
    (cos2SigmaM +
      (B / 4) *
        (cosSigma * (-1 + 2 * cos2SigmaMSq) -
          (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * cos2SigmaMSq)))
  );
}

/**
 * Solve the direct geodesic problem with Vincenty's iterative formula.
 *
 * Travels `distanceMeters` from `start` along the geodesic leaving at
 * `bearingDegrees` (clockwise from true north, any value; reduced modulo 360).
 * The resulting longitude is not wrapped into [-180, 180].
 *
 * @throws NumericFailureError if sigma does not converge
 */
export function vincentyDirect(
  ellipsoid: Ellipsoid,
  start: GeoPoint,
  distanceMeters: number,
  bearingDegrees: number
): GeodesicDirectResult {
  const a = ellipsoid.semiMajorAxis;
  const f = ellipsoid.flattening;
  const b = semiMinorAxis(ellipsoid);

  const lat1 = toRadians(start.latitude);
  const lon1 = toRadians(start.longitude);
  const alpha1 = toRadians(normalizeBearing(bearingDegrees));
  const sinAlpha1 = Math.sin(alpha1);
  const cosAlpha1 = Math.cos(alpha1);

  const { tanU: tanU1, sinU: sinU1, cosU: cosU1 } = reducedLatitude(lat1, f);

  // Angular distance on the auxiliary sphere from the equator to the start point
  const sigma1 = Math.atan2(tanU1, cosAlpha1);
  // Azimuth of the geodesic at the equator
  const sinAlpha = cosU1 * sinAlpha1;
  const cosSqAlpha = 1 - sinAlpha * sinAlpha;
  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const { A, B } = seriesCoefficients(uSq);

  const firstSigma = distanceMeters / (b * A);
  let sigma = firstSigma;
  let previousSigma = sigma;
  let sinSigma = 0;
  let cosSigma = 0;
  let cos2SigmaM = 0;
  let iterations = 0;

  do {
    cos2SigmaM = Math.cos(2 * sigma1 + sigma);
    sinSigma = Math.sin(sigma);
    cosSigma = Math.cos(sigma);
    previousSigma = sigma;
    sigma = firstSigma + deltaSigma(B, sinSigma, cosSigma, cos2SigmaM);

    iterations++;
    if (iterations >= MAX_DIRECT_ITERATIONS) {
      throw new NumericFailureError('direct', iterations);
    }
  } while (Math.abs(sigma - previousSigma) > CONVERGENCE_THRESHOLD);

  const x = sinU1 * sinSigma - cosU1 * cosSigma * cosAlpha1;
  const lat2 = Math.atan2(
    sinU1 * cosSigma + cosU1 * sinSigma * cosAlpha1,
    (1 - f) * Math.sqrt(sinAlpha * sinAlpha + x * x)
  );

  // Longitude difference on the auxiliary sphere, then corrected to the ellipsoid
  const lambda = Math.atan2(
    sinSigma * sinAlpha1,
    cosU1 * cosSigma - sinU1 * sinSigma * cosAlpha1
  );
  const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
  const L =
    lambda -
    (1 - C) *
      f *
      sinAlpha *
      (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

  const alpha2 = Math.atan2(sinAlpha, -x);

  return {
    point: {
      latitude: toDegrees(lat2),
      longitude: toDegrees(lon1 + L),
    },
    finalBearing: normalizeBearing(toDegrees(alpha2)),
    iterations,
  };
}

/**
 * Solve the inverse geodesic problem with Vincenty's iterative formula.
 *
 * @throws NumericFailureError for nearly antipodal points, where lambda fails to converge
 */
export function vincentyInverse(
  ellipsoid: Ellipsoid,
  from: GeoPoint,
  to: GeoPoint
): GeodesicInverseResult {
  const a = ellipsoid.semiMajorAxis;
  const f = ellipsoid.flattening;
  const b = semiMinorAxis(ellipsoid);

  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);
  const L = toRadians(to.longitude - from.longitude);

  const { sinU: sinU1, cosU: cosU1 } = reducedLatitude(lat1, f);
  const { sinU: sinU2, cosU: cosU2 } = reducedLatitude(lat2, f);

  const antipodal = Math.abs(L) > Math.PI / 2 || Math.abs(lat2 - lat1) > Math.PI / 2;

  let lambda = L;
  let previousLambda = lambda;
  let sinLambda = 0;
  let cosLambda = 0;
  let sigma = 0;
  let sinSigma = 0;
  let cosSigma = 0;
  let cosSqAlpha = 1;
  let cos2SigmaM = 0;
  let iterations = 0;

  do {
    sinLambda = Math.sin(lambda);
    cosLambda = Math.cos(lambda);
    const sinSqSigma =
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2;

    // Coincident points
    if (sinSqSigma < 1e-24) {
      break;
    }

    sinSigma = Math.sqrt(sinSqSigma);
    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    sigma = Math.atan2(sinSigma, cosSigma);

    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // On an equatorial line cos²α = 0
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;

    const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
    previousLambda = lambda;
    lambda =
      L +
      (1 - C) *
        f *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

    iterations++;
    const drift = antipodal ? Math.abs(lambda) - Math.PI : Math.abs(lambda);
    if (drift > Math.PI || iterations >= MAX_INVERSE_ITERATIONS) {
      throw new NumericFailureError('inverse', iterations);
    }
  } while (Math.abs(lambda - previousLambda) > CONVERGENCE_THRESHOLD);

  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const { A, B } = seriesCoefficients(uSq);
  const distanceMeters = b * A * (sigma - deltaSigma(B, sinSigma, cosSigma, cos2SigmaM));

  const alpha1 = Math.atan2(cosU2 * sinLambda, cosU1 * sinU2 - sinU1 * cosU2 * cosLambda);
  const alpha2 = Math.atan2(cosU1 * sinLambda, -sinU1 * cosU2 + cosU1 * sinU2 * cosLambda);

  return {
    distanceMeters,
    initialBearing: normalizeBearing(toDegrees(alpha1)),
    finalBearing: normalizeBearing(toDegrees(alpha2)),
    iterations,
  };
}
