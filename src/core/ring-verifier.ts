import type { CirclePointRing, GeoPoint, RingVerification } from '../types';
import { GeodesicEngine } from './geodesic-engine';

/**
 * Measure every ring point's distance from the center with the inverse solution.
 *
 * Run on the rounded ring, so deviations of a few centimeters are expected.
 */
export function verifyRing(
  center: GeoPoint,
  radiusMeters: number,
  ring: CirclePointRing,
  engine: GeodesicEngine = new GeodesicEngine()
): RingVerification {
  const distances = ring.map((point) => engine.distance(center, point));
  const maxDeviationMeters = distances.reduce(
    (max, distance) => Math.max(max, Math.abs(distance - radiusMeters)),
    0
  );

  return { distances, maxDeviationMeters };
}
