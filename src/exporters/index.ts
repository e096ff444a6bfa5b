// Base exporter
export { BaseExporter } from './base-exporter';
export type { BaseExporterConfig, RingExporter } from './base-exporter';

// Coordinate list
export { TextExporter, writeText } from './text.exporter';
export type { TextExporterConfig } from './text.exporter';

// GPX track
export {
  GpxExporter,
  writeTrack,
  GPX_NAMESPACE,
  GPX_VERSION,
  GPX_SCHEMA_LOCATION,
} from './gpx.exporter';
export type { GpxExporterConfig, WriteTrackOptions } from './gpx.exporter';
