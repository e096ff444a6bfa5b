import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { XMLParser } from 'fast-xml-parser';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GPX_NAMESPACE, GPX_SCHEMA_LOCATION, GpxExporter, writeTrack } from '../../src/exporters';
import { InvalidInputError, IOFailureError } from '../../src/errors';
import type { ExportContext } from '../../src/types';
import { THREE_POINT_RING, createTempDir } from '../helpers/fixtures';

interface ParsedPoint {
  '@_lat': string;
  '@_lon': string;
}

interface ParsedGpx {
  '?xml': { '@_version': string; '@_encoding': string };
  gpx: {
    '@_xmlns': string;
    '@_version': string;
    '@_creator': string;
    '@_xsi:schemaLocation': string;
    metadata: {
      name: string;
      desc: string;
      author: { name: string; email: { '@_id': string; '@_domain': string } };
      bounds: { '@_minlat': string; '@_minlon': string; '@_maxlat': string; '@_maxlon': string };
    };
    trk: {
      name: string;
      desc: string;
      trkseg: { trkpt: ParsedPoint[] };
    };
  };
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  isArray: (name) => name === 'trkpt',
});

function parse(xml: string): ParsedGpx {
  return parser.parse(xml);
}

const CONTEXT: ExportContext = {
  name: 'test',
  radiusMeters: 900,
  centerLabel: '78.943_11.855',
  numPoints: 90,
};

describe('GpxExporter', () => {
  describe('render', () => {
    it('should start with an XML declaration', () => {
      const xml = new GpxExporter().render(THREE_POINT_RING, CONTEXT);
      expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    });

    it('should declare the GPX 1.1 namespace and version on the root', () => {
      const { gpx } = parse(new GpxExporter().render(THREE_POINT_RING, CONTEXT));

      expect(gpx['@_xmlns']).toBe(GPX_NAMESPACE);
      expect(gpx['@_version']).toBe('1.1');
      expect(gpx['@_creator']).toBe('geodesic-ring');
      expect(gpx['@_xsi:schemaLocation']).toBe(GPX_SCHEMA_LOCATION);
    });

    it('should keep every point in ring order at full precision', () => {
      const { gpx } = parse(new GpxExporter().render(THREE_POINT_RING, CONTEXT));
      const points = gpx.trk.trkseg.trkpt;

      expect(points).toEqual([
        { '@_lat': '78.9', '@_lon': '11.9' },
        { '@_lat': '78.91', '@_lon': '11.91' },
        { '@_lat': '78.9', '@_lon': '11.9' },
      ]);
    });

    it('should emit track points with both attributes on one element', () => {
      const xml = new GpxExporter().render(THREE_POINT_RING, CONTEXT);
      expect(xml).toContain('<trkpt lat="78.91" lon="11.91"/>');
    });

    it('should describe the document and the track', () => {
      const { gpx } = parse(new GpxExporter().render(THREE_POINT_RING, CONTEXT));

      expect(gpx.metadata.name).toBe('test');
      expect(gpx.metadata.desc).toBe(
        'Within the radio quiet zone is a core mobile-no-go zone surrounding the observation point. ' +
          'The track to follow delineates this region with a resolution of one point per 4 degrees from true bearing.'
      );
      expect(gpx.trk.name).toBe('Delineation of mobile-no-go zone');
      expect(gpx.trk.desc).toBe(
        "This track was computed as a perfect circle with radius 900 [m], using Vincenty's formula " +
          'and the WGS-84 ellipsoidal model, around a central coordinate: 78.943_11.855 [lat]_[long]. ' +
          'Contact Zone planning at zones@example.org for more information.'
      );
    });

    it('should include the bounds of the ring', () => {
      const { gpx } = parse(new GpxExporter().render(THREE_POINT_RING, CONTEXT));
      expect(gpx.metadata.bounds).toEqual({
        '@_minlat': '78.9',
        '@_minlon': '11.9',
        '@_maxlat': '78.91',
        '@_maxlon': '11.91',
      });
    });

    it('should split the contact address into id and domain', () => {
      const exporter = new GpxExporter({
        track: { author: 'Test Author', email: 'zones@example.org' },
      });
      const { gpx } = parse(exporter.render(THREE_POINT_RING, CONTEXT));

      expect(gpx.metadata.author).toEqual({
        name: 'Test Author',
        email: { '@_id': 'zones', '@_domain': 'example.org' },
      });
      expect(gpx.trk.desc.endsWith(' Contact Test Author at zones@example.org for more information.')).toBe(
        true
      );
    });

    it('should name the default contact when none is configured', () => {
      const { gpx } = parse(new GpxExporter().render(THREE_POINT_RING, CONTEXT));
      expect(gpx.metadata.author).toEqual({
        name: 'Zone planning',
        email: { '@_id': 'zones', '@_domain': 'example.org' },
      });
    });

    it('should write tiny coordinates without exponent notation', () => {
      const ring = [
        { latitude: 5e-7, longitude: -1e-7 },
        { latitude: 5e-7, longitude: -1e-7 },
      ];
      const xml = new GpxExporter().render(ring, CONTEXT);

      expect(xml).toContain('<trkpt lat="0.0000005" lon="-0.0000001"/>');
      expect(parse(xml).gpx.metadata.bounds['@_minlat']).toBe('0.0000005');
    });

    it('should use a configured description', () => {
      const exporter = new GpxExporter({ track: { description: 'Custom zone' } });
      const { gpx } = parse(exporter.render(THREE_POINT_RING, CONTEXT));
      expect(gpx.metadata.desc).toBe('Custom zone');
    });

    it('should name the configured ellipsoid', () => {
      const exporter = new GpxExporter({ ellipsoidName: 'GRS-80' });
      expect(exporter.describeTrack(CONTEXT)).toContain('the GRS-80 ellipsoidal model');
    });

    it('should escape markup in free text', () => {
      const exporter = new GpxExporter({ track: { description: 'Zone <A> & B' } });
      const xml = exporter.render(THREE_POINT_RING, CONTEXT);
      expect(xml).toContain('<desc>Zone &lt;A&gt; &amp; B</desc>');
    });

    it('should reject an invalid contact address', () => {
      expect(() => new GpxExporter({ track: { email: 'not-an-address' } })).toThrow(InvalidInputError);
    });

    it('should reject a malformed context', () => {
      expect(() =>
        new GpxExporter().render(THREE_POINT_RING, { ...CONTEXT, radiusMeters: -1 })
      ).toThrow(InvalidInputError);
    });
  });

  describe('writeTrack', () => {
    let dir: string;
    let cleanup: () => void;

    beforeEach(() => {
      ({ dir, cleanup } = createTempDir());
    });

    afterEach(() => {
      cleanup();
    });

    it('should write <name>.gpx holding the rendered document', () => {
      const result = writeTrack(THREE_POINT_RING, 'test', 900, '78.900_11.900', {
        outputDir: dir,
        numPoints: 90,
      });
      const content = readFileSync(join(dir, 'test.gpx'), 'utf-8');

      expect(result.path).toBe(join(dir, 'test.gpx'));
      expect(result.pointCount).toBe(3);
      expect(readdirSync(dir)).toEqual(['test.gpx']);
      expect(content).toBe(
        new GpxExporter().render(THREE_POINT_RING, {
          name: 'test',
          radiusMeters: 900,
          centerLabel: '78.900_11.900',
          numPoints: 90,
        })
      );
    });

    it('should keep exactly three track points in order', () => {
      writeTrack(THREE_POINT_RING, 'test', 900, '78.900_11.900', { outputDir: dir });
      const { gpx } = parse(readFileSync(join(dir, 'test.gpx'), 'utf-8'));

      expect(gpx.trk.trkseg.trkpt.map((p) => [p['@_lat'], p['@_lon']])).toEqual([
        ['78.9', '11.9'],
        ['78.91', '11.91'],
        ['78.9', '11.9'],
      ]);
    });

    it('should derive the resolution from the ring length by default', () => {
      writeTrack(THREE_POINT_RING, 'test', 900, '78.900_11.900', { outputDir: dir });
      const { gpx } = parse(readFileSync(join(dir, 'test.gpx'), 'utf-8'));
      expect(gpx.metadata.desc).toContain('one point per 180 degrees');
    });

    it('should raise IOFailureError when the directory is missing', () => {
      expect(() =>
        writeTrack(THREE_POINT_RING, 'test', 900, '78.900_11.900', {
          outputDir: join(dir, 'missing'),
        })
      ).toThrow(IOFailureError);
    });
  });
});
