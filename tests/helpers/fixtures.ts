import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CirclePointRing, Ellipsoid, GeoPoint } from '../../src';
import { dmsPairToPoint } from '../../src';

/** 78°56'34.68"N 11°51'19.78"E */
export const OBSERVATORY: GeoPoint = dmsPairToPoint({
  latitude: { degrees: 78, minutes: 56, seconds: 34.68 },
  longitude: { degrees: 11, minutes: 51, seconds: 19.78 },
});

export const THREE_POINT_RING: CirclePointRing = [
  { latitude: 78.9, longitude: 11.9 },
  { latitude: 78.91, longitude: 11.91 },
  { latitude: 78.9, longitude: 11.9 },
];

export const SPHERE: Ellipsoid = {
  name: 'sphere',
  semiMajorAxis: 6_371_000,
  flattening: 0,
};

/**
 * Smallest difference between two bearings, in degrees.
 */
export function bearingDifference(a: number, b: number): number {
  return Math.abs(((a - b + 540) % 360) - 180);
}

/**
 * Fresh temporary directory; returns the path and a cleanup function.
 */
export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), 'geodesic-ring-'));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
