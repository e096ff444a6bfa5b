// Circle schemas
export {
  GeoPointSchema,
  DmsAngleSchema,
  DmsCoordinateSchema,
  CircleSpecSchema,
} from './circle.schema';

// Export schemas
export { ExportContextSchema, TrackMetadataSchema, ZoneRequestSchema } from './export.schema';
