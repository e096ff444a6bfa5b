// Main builder
export { ExclusionZoneBuilder } from './core';

// Core components
export { GeodesicEngine, generateCircle, circleBearings, verifyRing, ExporterRegistry } from './core';

// Types
export type {
  // Geo types
  GeoPoint,
  GeoBoundingBox,
  DmsAngle,
  DmsCoordinate,
  Ellipsoid,
  // Geodesic types
  GeodesicDirectResult,
  GeodesicInverseResult,
  // Circle types
  CircleSpec,
  CircleSpecInput,
  CirclePointRing,
  RingVerification,
  // Export types
  ExportContext,
  ExporterMetadata,
  ExportResult,
  TrackMetadata,
  // Config types
  ZoneBuilderConfig,
  ZoneRequest,
  ZoneBuildResult,
} from './types';

// Type constants
export {
  DEFAULT_NUM_POINTS,
  COORDINATE_PRECISION,
  DEFAULT_CONFIG,
  DEFAULT_TRACK_METADATA,
} from './types';

// Schemas
export {
  GeoPointSchema,
  DmsAngleSchema,
  DmsCoordinateSchema,
  CircleSpecSchema,
  ExportContextSchema,
  TrackMetadataSchema,
  ZoneRequestSchema,
} from './schemas';

// Errors
export {
  InvalidInputError,
  NumericFailureError,
  IOFailureError,
  ExporterError,
  DuplicateExporterError,
  ExporterNotFoundError,
} from './errors';
export type { ValidationIssue, GeodesicProblem } from './errors';

// Geo utilities
export {
  WGS84,
  semiMinorAxis,
  toRadians,
  toDegrees,
  normalizeBearing,
  dmsToDecimal,
  dmsPairToPoint,
  vincentyDirect,
  vincentyInverse,
  getBoundingBox,
} from './geo';

// Formatting and file helpers
export {
  roundCoordinate,
  roundPoint,
  formatCoordinate,
  formatCenterLabel,
  buildOutputName,
  writeFileAtomic,
} from './utils';

// Exporters
export { BaseExporter, TextExporter, GpxExporter, writeText, writeTrack } from './exporters';
export type {
  BaseExporterConfig,
  RingExporter,
  TextExporterConfig,
  GpxExporterConfig,
  WriteTrackOptions,
} from './exporters';
