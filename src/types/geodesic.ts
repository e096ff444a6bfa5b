import type { GeoPoint } from './geo';

/**
 * Result of the direct geodesic problem.
 */
export interface GeodesicDirectResult {
  point: GeoPoint;
  /** Forward azimuth at the destination, degrees clockwise from north */
  finalBearing: number;
  /** Iterations the solver needed to converge */
  iterations: number;
}

/**
 * Result of the inverse geodesic problem.
 */
export interface GeodesicInverseResult {
  /** Ellipsoidal distance in meters */
  distanceMeters: number;
  /** Azimuth at the start point, degrees clockwise from north (0-360) */
  initialBearing: number;
  /** Azimuth at the end point, degrees clockwise from north (0-360) */
  finalBearing: number;
  iterations: number;
}
