import type { Ellipsoid, GeoPoint } from './geo';
import type { CirclePointRing, RingVerification } from './circle';
import type { ExportResult, TrackMetadata } from './export';
import { DEFAULT_NUM_POINTS } from './circle';

/**
 * Configuration options for the ExclusionZoneBuilder.
 */
export interface ZoneBuilderConfig {
  /** Reference ellipsoid (default: WGS-84) */
  ellipsoid?: Ellipsoid;
  /** Default number of bearing steps (default: 90) */
  numPoints?: number;
  /** Directory output files are written to (default: current directory) */
  outputDir?: string;
  /** Label used in generated file names (default: "RQZ_Circle") */
  zoneLabel?: string;
  /** GPX document metadata */
  track?: Partial<TrackMetadata>;
  /** Recompute every point's distance from the center after sampling (default: false) */
  verify?: boolean;
}

/**
 * A single zone to build.
 */
export interface ZoneRequest {
  center: GeoPoint;
  radiusMeters: number;
  numPoints?: number;
  /** Output base name; derived from radius and center when omitted */
  name?: string;
}

/**
 * Outcome of building a zone.
 */
export interface ZoneBuildResult {
  name: string;
  ring: CirclePointRing;
  outputs: ExportResult[];
  verification?: RingVerification;
}

/**
 * Default track metadata.
 */
export const DEFAULT_TRACK_METADATA: TrackMetadata = {
  author: 'Zone planning',
  email: 'zones@example.org',
  trackName: 'Delineation of mobile-no-go zone',
  creator: 'geodesic-ring',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Required<
  Pick<ZoneBuilderConfig, 'numPoints' | 'outputDir' | 'zoneLabel' | 'verify'>
> = {
  numPoints: DEFAULT_NUM_POINTS,
  outputDir: '.',
  zoneLabel: 'RQZ_Circle',
  verify: false,
};
