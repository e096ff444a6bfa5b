import type { GeoBoundingBox, GeoPoint } from '../types';
import { InvalidInputError } from '../errors';

/**
 * Smallest latitude/longitude box containing every point.
 *
 * Longitudes are compared as given; a set of points straddling the
 * antimeridian yields a box spanning the long way round.
 */
export function getBoundingBox(points: readonly GeoPoint[]): GeoBoundingBox {
  if (points.length === 0) {
    throw InvalidInputError.forField('points', 'at least one point is required');
  }

  let minLat = Infinity;
  let minLon = Infinity;
  let maxLat = -Infinity;
  let maxLon = -Infinity;

  for (const { latitude, longitude } of points) {
    minLat = Math.min(minLat, latitude);
    maxLat = Math.max(maxLat, latitude);
    minLon = Math.min(minLon, longitude);
    maxLon = Math.max(maxLon, longitude);
  }

  return {
    southwest: { latitude: minLat, longitude: minLon },
    northeast: { latitude: maxLat, longitude: maxLon },
  };
}
