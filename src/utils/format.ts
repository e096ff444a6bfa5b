import type { GeoPoint } from '../types';
import { COORDINATE_PRECISION } from '../types';

/**
 * Round a coordinate to a fixed number of decimal places.
 *
 * Rounds the decimal expansion of the stored double (`toFixed`), not the
 * value scaled by a power of ten.
 */
export function roundCoordinate(value: number, decimals = COORDINATE_PRECISION): number {
  return Number(value.toFixed(decimals));
}

/**
 * Round both coordinates of a point.
 */
export function roundPoint(point: GeoPoint, decimals = COORDINATE_PRECISION): GeoPoint {
  return {
    latitude: roundCoordinate(point.latitude, decimals),
    longitude: roundCoordinate(point.longitude, decimals),
  };
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Shortest decimal form that reads back as the same number, e.g. 78.9 -> "78.9".
 *
 * Never uses exponent notation: 5e-7 prints as "0.0000005", since GPX
 * coordinates are xsd:decimal.
 */
export function formatCoordinate(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }

  const [, sign, lead, fraction = '', exponentText] = match;
  const digits = lead + fraction;
  const exponent = Number(exponentText);

  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }
  return `${sign}${digits.padEnd(exponent + 1, '0')}`;
}

/**
 * Center label used in file names and track descriptions: "lat_lon" with three decimals.
 */
export function formatCenterLabel(center: GeoPoint): string {
  return `${center.latitude.toFixed(3)}_${center.longitude.toFixed(3)}`;
}

/**
 * Descriptive output base name, e.g. "900m_RQZ_Circle_w_Centre_78.943_11.855".
 */
export function buildOutputName(
  radiusMeters: number,
  center: GeoPoint,
  zoneLabel = 'RQZ_Circle'
): string {
  return `${radiusMeters}m_${zoneLabel}_w_Centre_${formatCenterLabel(center)}`;
}
