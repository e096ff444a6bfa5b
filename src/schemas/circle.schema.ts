import { z } from 'zod';
import { DEFAULT_NUM_POINTS } from '../types';
import { dmsToDecimal } from '../geo/angles';

/**
 * Schema for geographic point coordinates.
 */
export const GeoPointSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

/**
 * Schema for a degrees/minutes/seconds angle.
 */
export const DmsAngleSchema = z.object({
  degrees: z.number().int().min(-180).max(180),
  minutes: z.number().min(0).lt(60),
  seconds: z.number().min(0).lt(60),
});

/**
 * Schema for a DMS latitude/longitude pair.
 */
export const DmsCoordinateSchema = z
  .object({
    latitude: DmsAngleSchema,
    longitude: DmsAngleSchema,
  })
  .refine((c) => Math.abs(dmsToDecimal(c.latitude)) <= 90, {
    message: 'Latitude must be within 90 degrees of the equator',
    path: ['latitude'],
  })
  .refine((c) => Math.abs(dmsToDecimal(c.longitude)) <= 180, {
    message: 'Longitude must be within 180 degrees of the prime meridian',
    path: ['longitude'],
  });

/**
 * Schema for circle generation input.
 */
export const CircleSpecSchema = z.object({
  center: GeoPointSchema,
  radiusMeters: z.number().positive().finite(),
  numPoints: z.number().int().min(1).default(DEFAULT_NUM_POINTS),
});
