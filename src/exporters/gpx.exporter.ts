import { XMLBuilder } from 'fast-xml-parser';
import type { CirclePointRing, ExportContext, ExportResult, TrackMetadata } from '../types';
import { DEFAULT_TRACK_METADATA } from '../types';
import { TrackMetadataSchema } from '../schemas';
import { InvalidInputError } from '../errors';
import { WGS84, getBoundingBox } from '../geo';
import { formatCoordinate } from '../utils';
import { BaseExporter } from './base-exporter';
import type { BaseExporterConfig } from './base-exporter';

export const GPX_NAMESPACE = 'http://www.topografix.com/GPX/1/1';
export const GPX_VERSION = '1.1';
export const GPX_SCHEMA_LOCATION = `${GPX_NAMESPACE} ${GPX_NAMESPACE}/gpx.xsd`;
const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

/**
 * Configuration for the GPX exporter.
 */
export interface GpxExporterConfig extends BaseExporterConfig {
  /** Document metadata; unset fields fall back to DEFAULT_TRACK_METADATA */
  track?: Partial<TrackMetadata>;
  /** Ellipsoid named in the track description (default: "WGS-84") */
  ellipsoidName?: string;
}

/**
 * Writes a ring as a GPX 1.1 document with one track and one track segment.
 *
 * Element order follows the GPX 1.1 schema: metadata (name, desc, author,
 * bounds) before trk (name, desc, trkseg).
 */
export class GpxExporter extends BaseExporter {
  readonly metadata = {
    id: 'gpx',
    name: 'GPX 1.1 track',
    extension: 'gpx',
  };

  private readonly track: TrackMetadata;
  private readonly ellipsoidName: string;
  private readonly builder: XMLBuilder;

  constructor(config?: GpxExporterConfig) {
    super(config);

    const parseResult = TrackMetadataSchema.safeParse({
      author: config?.track?.author ?? DEFAULT_TRACK_METADATA.author,
      email: config?.track?.email ?? DEFAULT_TRACK_METADATA.email,
      description: config?.track?.description ?? DEFAULT_TRACK_METADATA.description,
      trackName: config?.track?.trackName ?? DEFAULT_TRACK_METADATA.trackName,
      creator: config?.track?.creator ?? DEFAULT_TRACK_METADATA.creator,
    });
    if (!parseResult.success) {
      throw InvalidInputError.fromZodError(parseResult.error);
    }

    this.track = parseResult.data;
    this.ellipsoidName = config?.ellipsoidName ?? WGS84.name;
    this.builder = new XMLBuilder({
      ignoreAttributes: false,
      attributeNamePrefix: '@_',
      format: true,
      indentBy: '  ',
      suppressEmptyNode: true,
    });
  }

  render(ring: CirclePointRing, context: ExportContext): string {
    this.assertRing(ring);
    const ctx = this.validateContext(context);
    const bounds = getBoundingBox(ring);

    const document = {
      '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
      gpx: {
        '@_xmlns': GPX_NAMESPACE,
        '@_version': GPX_VERSION,
        '@_creator': this.track.creator,
        '@_xmlns:xsi': XSI_NAMESPACE,
        '@_xsi:schemaLocation': GPX_SCHEMA_LOCATION,
        metadata: {
          name: ctx.name,
          desc: this.track.description ?? this.describeZone(ctx),
          author: this.buildAuthor(),
          bounds: {
            '@_minlat': formatCoordinate(bounds.southwest.latitude),
            '@_minlon': formatCoordinate(bounds.southwest.longitude),
            '@_maxlat': formatCoordinate(bounds.northeast.latitude),
            '@_maxlon': formatCoordinate(bounds.northeast.longitude),
          },
        },
        trk: {
          name: this.track.trackName,
          desc: this.describeTrack(ctx),
          trkseg: {
            trkpt: ring.map((p) => ({
              '@_lat': formatCoordinate(p.latitude),
              '@_lon': formatCoordinate(p.longitude),
            })),
          },
        },
      },
    };

    return this.builder.build(document);
  }

  /**
   * Document description: what the zone is and the angular resolution.
   */
  describeZone(context: ExportContext): string {
    const step = Number((360 / context.numPoints).toFixed(3));
    return (
      'Within the radio quiet zone is a core mobile-no-go zone surrounding the observation point. ' +
      `The track to follow delineates this region with a resolution of one point per ${step} degrees from true bearing.`
    );
  }

  /**
   * Track description: how the circle was computed.
   */
  describeTrack(context: ExportContext): string {
    return (
      `This track was computed as a perfect circle with radius ${context.radiusMeters} [m], ` +
      `using Vincenty's formula and the ${this.ellipsoidName} ellipsoidal model, ` +
      `around a central coordinate: ${context.centerLabel} [lat]_[long]. ` +
      `Contact ${this.track.author} at ${this.track.email} for more information.`
    );
  }

  private buildAuthor(): { name: string; email: { '@_id': string; '@_domain': string } } {
    const { author, email } = this.track;
    const at = email.lastIndexOf('@');
    return {
      name: author,
      email: { '@_id': email.slice(0, at), '@_domain': email.slice(at + 1) },
    };
  }
}

/**
 * Options for writeTrack.
 */
export interface WriteTrackOptions extends GpxExporterConfig {
  /** Bearing steps the ring was sampled with (default: ring length - 1) */
  numPoints?: number;
}

/**
 * Write `<name>.gpx` holding the ring as a single GPX track.
 *
 * @param ring - Ordered ring points
 * @param name - Base file name and document name
 * @param radiusMeters - Radius quoted in the track description
 * @param centerLabel - Center quoted in the track description
 */
export function writeTrack(
  ring: CirclePointRing,
  name: string,
  radiusMeters: number,
  centerLabel: string,
  options?: WriteTrackOptions
): ExportResult {
  const exporter = new GpxExporter(options);
  return exporter.export(ring, {
    name,
    radiusMeters,
    centerLabel,
    numPoints: options?.numPoints ?? Math.max(1, ring.length - 1),
  });
}
