/**
 * Descriptive parameters handed to every exporter alongside the ring.
 */
export interface ExportContext {
  /** Base file name, without extension */
  name: string;
  radiusMeters: number;
  /** Center formatted for display, e.g. "78.943_11.855" */
  centerLabel: string;
  /** Number of bearing steps the ring was sampled with */
  numPoints: number;
}

/**
 * Metadata for an exporter.
 */
export interface ExporterMetadata {
  /** Unique identifier */
  id: string;
  /** Human-readable name */
  name: string;
  /** File extension written, without the dot */
  extension: string;
}

/**
 * Outcome of writing one artifact.
 */
export interface ExportResult {
  exporterId: string;
  /** Path of the written file */
  path: string;
  pointCount: number;
  bytesWritten: number;
}

/**
 * Document-level descriptors embedded in a GPX track.
 */
export interface TrackMetadata {
  /** Author name */
  author: string;
  /** Contact address, split into id/domain in the document */
  email: string;
  /** Overrides the generated zone description */
  description?: string;
  /** Name of the single track */
  trackName: string;
  /** Value of the gpx creator attribute */
  creator: string;
}
