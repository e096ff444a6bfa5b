import type { Ellipsoid } from '../types';

/**
 * World Geodetic System 1984 reference ellipsoid.
 */
export const WGS84: Ellipsoid = {
  name: 'WGS-84',
  semiMajorAxis: 6_378_137,
  flattening: 1 / 298.257223563,
};

/**
 * Polar radius b = a(1 - f), in meters.
 */
export function semiMinorAxis(ellipsoid: Ellipsoid): number {
  return ellipsoid.semiMajorAxis * (1 - ellipsoid.flattening);
}
