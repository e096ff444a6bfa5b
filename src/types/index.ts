// Geo types
export type { GeoPoint, GeoBoundingBox, DmsAngle, DmsCoordinate, Ellipsoid } from './geo';

// Geodesic solver types
export type { GeodesicDirectResult, GeodesicInverseResult } from './geodesic';

// Circle types
export type { CircleSpec, CircleSpecInput, CirclePointRing, RingVerification } from './circle';
export { DEFAULT_NUM_POINTS, COORDINATE_PRECISION } from './circle';

// Export types
export type { ExportContext, ExporterMetadata, ExportResult, TrackMetadata } from './export';

// Config types
export type { ZoneBuilderConfig, ZoneRequest, ZoneBuildResult } from './config';
export { DEFAULT_CONFIG, DEFAULT_TRACK_METADATA } from './config';
