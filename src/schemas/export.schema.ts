import { z } from 'zod';
import { GeoPointSchema } from './circle.schema';

/**
 * Schema for the descriptive parameters passed to exporters.
 */
export const ExportContextSchema = z.object({
  name: z.string().min(1),
  radiusMeters: z.number().positive(),
  centerLabel: z.string().min(1),
  numPoints: z.number().int().min(1),
});

/**
 * Schema for GPX document metadata.
 */
export const TrackMetadataSchema = z.object({
  author: z.string().min(1),
  email: z.string().email(),
  description: z.string().min(1).optional(),
  trackName: z.string().min(1),
  creator: z.string().min(1),
});

/**
 * Schema for a zone build request.
 */
export const ZoneRequestSchema = z.object({
  center: GeoPointSchema,
  radiusMeters: z.number().positive().finite(),
  numPoints: z.number().int().min(1).optional(),
  name: z.string().min(1).optional(),
});
