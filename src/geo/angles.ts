import type { DmsAngle, DmsCoordinate, GeoPoint } from '../types';

/**
 * Convert degrees to radians.
 */
export function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Convert radians to degrees.
 */
export function toDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}

/**
 * Reduce a bearing to the range [0, 360). 360 maps to 0 and negative bearings wrap.
 */
export function normalizeBearing(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

/**
 * Convert a degrees/minutes/seconds angle to decimal degrees.
 *
 * A negative `degrees` (including -0) makes the whole angle negative.
 */
export function dmsToDecimal(angle: DmsAngle): number {
  const negative = angle.degrees < 0 || Object.is(angle.degrees, -0);
  const magnitude = Math.abs(angle.degrees) + angle.minutes / 60 + angle.seconds / 3600;
  return negative ? -magnitude : magnitude;
}

/**
 * Convert a DMS latitude/longitude pair to a decimal-degree point.
 */
export function dmsPairToPoint(coordinate: DmsCoordinate): GeoPoint {
  return {
    latitude: dmsToDecimal(coordinate.latitude),
    longitude: dmsToDecimal(coordinate.longitude),
  };
}
