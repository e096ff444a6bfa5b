import type { CirclePointRing, CircleSpecInput } from '../types';
import { CircleSpecSchema } from '../schemas';
import { InvalidInputError } from '../errors';
import { roundPoint } from '../utils';
import { GeodesicEngine } from './geodesic-engine';

/**
 * Bearings sampled for a ring of `numPoints` steps: 0, 360/n, ..., 360.
 *
 * @throws InvalidInputError if numPoints is not an integer >= 1
 */
export function circleBearings(numPoints: number): number[] {
  if (!Number.isInteger(numPoints) || numPoints < 1) {
    throw InvalidInputError.forField('numPoints', 'must be an integer >= 1');
  }

  return Array.from({ length: numPoints + 1 }, (_, i) => (i * 360) / numPoints);
}

/**
 * Generate a closed ring of points at `radiusMeters` from `center`.
 *
 * The ring has numPoints + 1 entries; the last one repeats the first (bearing
 * 360). Every coordinate is rounded to 6 decimal places.
 *
 * @param spec - Center, radius and number of bearing steps (default 90)
 * @param engine - Geodesic solver (default: WGS-84)
 * @throws InvalidInputError if the spec is malformed
 * @throws NumericFailureError propagated from the engine
 */
export function generateCircle(
  spec: CircleSpecInput,
  engine: GeodesicEngine = new GeodesicEngine()
): CirclePointRing {
  const parseResult = CircleSpecSchema.safeParse(spec);
  if (!parseResult.success) {
    throw InvalidInputError.fromZodError(parseResult.error);
  }

  const { center, radiusMeters, numPoints } = parseResult.data;

  return circleBearings(numPoints).map((bearing) =>
    roundPoint(engine.solveDirect(center, radiusMeters, bearing))
  );
}
