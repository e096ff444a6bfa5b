import type { Ellipsoid, GeoPoint, GeodesicDirectResult, GeodesicInverseResult } from '../types';
import { InvalidInputError } from '../errors';
import { WGS84, normalizeBearing, vincentyDirect, vincentyInverse } from '../geo';

/**
 * Solves direct and inverse geodesic problems on a reference ellipsoid.
 *
 * Stateless apart from the ellipsoid it was constructed with; one instance can
 * be shared freely.
 */
export class GeodesicEngine {
  readonly ellipsoid: Ellipsoid;

  constructor(ellipsoid: Ellipsoid = WGS84) {
    this.ellipsoid = ellipsoid;
  }

  /**
   * Point reached by travelling `distanceMeters` from `center` at `bearingDegrees`.
   *
   * @param center - Start point
   * @param distanceMeters - Distance along the geodesic, >= 0
   * @param bearingDegrees - True bearing, taken modulo 360
   * @throws InvalidInputError if the distance is negative or an argument is not finite
   * @throws NumericFailureError if the solver does not converge
   */
  solveDirect(center: GeoPoint, distanceMeters: number, bearingDegrees: number): GeoPoint {
    return this.solveDirectDetailed(center, distanceMeters, bearingDegrees).point;
  }

  /**
   * Like solveDirect, also returning the final bearing and the iteration count.
   */
  solveDirectDetailed(
    center: GeoPoint,
    distanceMeters: number,
    bearingDegrees: number
  ): GeodesicDirectResult {
    assertFinitePoint('center', center);
    if (!Number.isFinite(distanceMeters) || distanceMeters < 0) {
      throw InvalidInputError.forField('distanceMeters', 'must be a finite number >= 0');
    }
    if (!Number.isFinite(bearingDegrees)) {
      throw InvalidInputError.forField('bearingDegrees', 'must be a finite number');
    }

    if (distanceMeters === 0) {
      return {
        point: { latitude: center.latitude, longitude: center.longitude },
        finalBearing: normalizeBearing(bearingDegrees),
        iterations: 0,
      };
    }

    return vincentyDirect(this.ellipsoid, center, distanceMeters, bearingDegrees);
  }

  /**
   * Geodesic distance and bearings between two points.
   *
   * @throws NumericFailureError for nearly antipodal points
   */
  solveInverse(from: GeoPoint, to: GeoPoint): GeodesicInverseResult {
    assertFinitePoint('from', from);
    assertFinitePoint('to', to);
    return vincentyInverse(this.ellipsoid, from, to);
  }

  /**
   * Geodesic distance between two points, in meters.
   */
  distance(from: GeoPoint, to: GeoPoint): number {
    return this.solveInverse(from, to).distanceMeters;
  }
}

function assertFinitePoint(path: string, point: GeoPoint): void {
  if (!Number.isFinite(point.latitude)) {
    throw InvalidInputError.forField(`${path}.latitude`, 'must be a finite number');
  }
  if (!Number.isFinite(point.longitude)) {
    throw InvalidInputError.forField(`${path}.longitude`, 'must be a finite number');
  }
}
