import { existsSync, mkdirSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExclusionZoneBuilder } from '../../src/core';
import { BaseExporter } from '../../src/exporters';
import type { CirclePointRing, ExportResult } from '../../src/types';
import { DuplicateExporterError, InvalidInputError, IOFailureError } from '../../src/errors';
import { OBSERVATORY, SPHERE, createTempDir } from '../helpers/fixtures';

const DEFAULT_NAME = '900m_RQZ_Circle_w_Centre_78.943_11.855';

class JsonExporter extends BaseExporter {
  readonly metadata = { id: 'json', name: 'JSON points', extension: 'json' };

  render(ring: CirclePointRing): string {
    return JSON.stringify(ring);
  }
}

class DirectoryExporter extends BaseExporter {
  readonly metadata = { id: 'directory', name: 'Directory marker', extension: 'dir' };

  render(): string {
    return '';
  }

  write(_content: string, pointCount: number, name: string): ExportResult {
    return { exporterId: this.metadata.id, path: this.outputPath(name), pointCount, bytesWritten: 0 };
  }
}

class FullDiskExporter extends BaseExporter {
  readonly metadata = { id: 'full-disk', name: 'Full disk', extension: 'full' };

  render(): string {
    return '';
  }

  write(_content: string, _pointCount: number, name: string): ExportResult {
    throw new IOFailureError('disk full', this.outputPath(name), { errno: 'ENOSPC' });
  }
}

describe('ExclusionZoneBuilder', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it('should write both files under a descriptive name', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir });
    const result = builder.build({ center: OBSERVATORY, radiusMeters: 900 });

    expect(result.name).toBe(DEFAULT_NAME);
    expect(result.ring).toHaveLength(91);
    expect(result.outputs.map((o) => o.path)).toEqual([
      join(dir, `${DEFAULT_NAME}.txt`),
      join(dir, `${DEFAULT_NAME}.gpx`),
    ]);
    expect(readdirSync(dir).sort()).toEqual([`${DEFAULT_NAME}.gpx`, `${DEFAULT_NAME}.txt`]);

    const lines = readFileSync(join(dir, `${DEFAULT_NAME}.txt`), 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(91);
    expect(lines[0]).toBe('78.951027, 11.855494');
    expect(lines[90]).toBe(lines[0]);
  });

  it('should quote the radius and center label in the track description', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir });
    builder.build({ center: OBSERVATORY, radiusMeters: 900 });

    const xml = readFileSync(join(dir, `${DEFAULT_NAME}.gpx`), 'utf-8');
    expect(xml).toContain('perfect circle with radius 900 [m]');
    expect(xml).toContain('central coordinate: 78.943_11.855 [lat]_[long]');
    expect(xml.match(/<trkpt /g)).toHaveLength(91);
  });

  it('should name a contact in the default document', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir });
    builder.build({ center: OBSERVATORY, radiusMeters: 900 });

    const xml = readFileSync(join(dir, `${DEFAULT_NAME}.gpx`), 'utf-8');
    expect(xml).toContain('<email id="zones" domain="example.org"/>');
    expect(xml).toContain('Contact Zone planning at zones@example.org for more information.');
  });

  it('should honour a request name and point count', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir });
    const result = builder.build({
      center: OBSERVATORY,
      radiusMeters: 500,
      numPoints: 8,
      name: 'zone',
    });

    expect(result.ring).toHaveLength(9);
    expect(readdirSync(dir).sort()).toEqual(['zone.gpx', 'zone.txt']);
  });

  it('should use the configured zone label and default point count', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir, zoneLabel: 'Zone', numPoints: 12 });
    const result = builder.build({ center: { latitude: 10, longitude: 20 }, radiusMeters: 250 });

    expect(result.name).toBe('250m_Zone_w_Centre_10.000_20.000');
    expect(result.ring).toHaveLength(13);
  });

  it('should verify distances only when configured', () => {
    const plain = new ExclusionZoneBuilder({ outputDir: dir });
    expect(plain.build({ center: OBSERVATORY, radiusMeters: 900, name: 'a' }).verification).toBe(
      undefined
    );

    const checked = new ExclusionZoneBuilder({ outputDir: dir, verify: true });
    const { verification } = checked.build({ center: OBSERVATORY, radiusMeters: 900, name: 'b' });

    expect(verification?.distances).toHaveLength(91);
    expect(verification?.maxDeviationMeters).toBeLessThan(0.06);
  });

  it('should solve on the configured ellipsoid', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir, ellipsoid: SPHERE });
    expect(builder.engine.ellipsoid).toBe(SPHERE);

    builder.build({ center: OBSERVATORY, radiusMeters: 900, name: 'sphere' });
    expect(readFileSync(join(dir, 'sphere.gpx'), 'utf-8')).toContain('the sphere ellipsoidal model');
  });

  it('should reject malformed requests before writing anything', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir });

    expect(() => builder.build({ center: OBSERVATORY, radiusMeters: -1 })).toThrow(InvalidInputError);
    expect(() => builder.build({ center: OBSERVATORY, radiusMeters: 900, numPoints: 0 })).toThrow(
      InvalidInputError
    );
    expect(readdirSync(dir)).toEqual([]);
  });

  it('should remove already written files when a later write fails', () => {
    mkdirSync(join(dir, 'zone.gpx'));
    const builder = new ExclusionZoneBuilder({ outputDir: dir });

    expect(() => builder.build({ center: OBSERVATORY, radiusMeters: 900, name: 'zone' })).toThrow(
      IOFailureError
    );
    expect(existsSync(join(dir, 'zone.txt'))).toBe(false);
    expect(existsSync(join(dir, 'zone.gpx.partial'))).toBe(false);
    expect(readdirSync(dir)).toEqual(['zone.gpx']);
  });

  it('should rethrow the write error when a written file cannot be removed', () => {
    const builder = new ExclusionZoneBuilder({ outputDir: dir });
    builder.unregisterExporter('text');
    builder.unregisterExporter('gpx');
    builder.registerExporter(new DirectoryExporter({ outputDir: dir }));
    builder.registerExporter(new FullDiskExporter({ outputDir: dir }));
    mkdirSync(join(dir, 'zone.dir'));

    let thrown: unknown;
    try {
      builder.build({ center: OBSERVATORY, radiusMeters: 900, name: 'zone' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(IOFailureError);
    if (!(thrown instanceof IOFailureError)) return;
    expect(thrown.message).toBe('disk full');
    expect(thrown.errno).toBe('ENOSPC');
    expect(thrown.leftoverPaths).toEqual([join(dir, 'zone.dir')]);
  });

  describe('exporters', () => {
    it('should start with the text and GPX exporters', () => {
      expect(new ExclusionZoneBuilder().getExporterIds()).toEqual(['text', 'gpx']);
    });

    it('should run additional exporters', () => {
      const builder = new ExclusionZoneBuilder({ outputDir: dir });
      builder.registerExporter(new JsonExporter({ outputDir: dir }));
      builder.build({ center: OBSERVATORY, radiusMeters: 900, numPoints: 4, name: 'zone' });

      const points: unknown = JSON.parse(readFileSync(join(dir, 'zone.json'), 'utf-8'));
      expect(Array.isArray(points) && points.length).toBe(5);
    });

    it('should skip unregistered exporters', () => {
      const builder = new ExclusionZoneBuilder({ outputDir: dir });
      builder.unregisterExporter('gpx');
      builder.build({ center: OBSERVATORY, radiusMeters: 900, name: 'zone' });

      expect(readdirSync(dir)).toEqual(['zone.txt']);
    });

    it('should refuse a second exporter for the same extension', () => {
      const builder = new ExclusionZoneBuilder({ outputDir: dir });
      expect(() => builder.registerExporter(new JsonExporter())).not.toThrow();
      expect(() => builder.registerExporter(new JsonExporter())).toThrow(DuplicateExporterError);
    });
  });
});
