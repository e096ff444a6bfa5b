import type { GeoPoint } from './geo';

/**
 * Default number of segments in a generated ring (one point per 4 degrees).
 */
export const DEFAULT_NUM_POINTS = 90;

/**
 * Decimal places every ring coordinate is rounded to (about 0.11 m at the equator).
 */
export const COORDINATE_PRECISION = 6;

/**
 * Fully resolved input to circle generation.
 */
export interface CircleSpec {
  center: GeoPoint;
  /** Circle radius in meters, > 0 */
  radiusMeters: number;
  /** Number of bearing steps, >= 1; the ring holds numPoints + 1 points */
  numPoints: number;
}

/**
 * Circle generation input as accepted from callers.
 */
export type CircleSpecInput = Omit<CircleSpec, 'numPoints'> & { numPoints?: number };

/**
 * Ordered, explicitly closed ring of points. Index 0 and the last index coincide.
 */
export type CirclePointRing = readonly GeoPoint[];

/**
 * Inverse-distance check of a ring against its center.
 */
export interface RingVerification {
  /** Distance from the center to each ring point, in ring order */
  distances: number[];
  /** Largest |distance - radius| over the ring, in meters */
  maxDeviationMeters: number;
}
