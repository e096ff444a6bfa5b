/**
 * Represents a geographic point with latitude and longitude coordinates,
 * in decimal degrees on the WGS-84 datum.
 */
export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Represents a geographic bounding box defined by southwest and northeast corners.
 */
export interface GeoBoundingBox {
  southwest: GeoPoint;
  northeast: GeoPoint;
}

/**
 * An angle written as degrees, minutes and seconds.
 *
 * The sign of `degrees` carries the hemisphere (south and west are negative).
 */
export interface DmsAngle {
  degrees: number;
  minutes: number;
  seconds: number;
}

/**
 * A latitude/longitude pair written in degrees, minutes and seconds.
 */
export interface DmsCoordinate {
  latitude: DmsAngle;
  longitude: DmsAngle;
}

/**
 * Reference ellipsoid used by the geodesic solver.
 */
export interface Ellipsoid {
  /** Display name, e.g. "WGS-84" */
  name: string;
  /** Equatorial radius in meters */
  semiMajorAxis: number;
  /** Flattening (a - b) / a */
  flattening: number;
}
