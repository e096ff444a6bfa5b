import type { ExportContext, ExportResult, ZoneBuilderConfig, ZoneBuildResult, ZoneRequest } from '../types';
import { DEFAULT_CONFIG } from '../types';
import type { RingExporter } from '../exporters/base-exporter';
import { TextExporter } from '../exporters/text.exporter';
import { GpxExporter } from '../exporters/gpx.exporter';
import { ZoneRequestSchema } from '../schemas';
import { InvalidInputError, IOFailureError } from '../errors';
import { WGS84 } from '../geo';
import { buildOutputName, formatCenterLabel, removeFile } from '../utils';
import { GeodesicEngine } from './geodesic-engine';
import { generateCircle } from './circle-sampler';
import { verifyRing } from './ring-verifier';
import { ExporterRegistry } from './exporter-registry';

/**
 * Builds exclusion zones: samples the ring, optionally verifies it, and hands
 * it to every registered exporter.
 *
 * Starts with the text and GPX exporters registered.
 */
export class ExclusionZoneBuilder {
  readonly engine: GeodesicEngine;
  private registry: ExporterRegistry;
  private config: Required<Pick<ZoneBuilderConfig, 'numPoints' | 'outputDir' | 'zoneLabel' | 'verify'>>;

  constructor(config?: ZoneBuilderConfig) {
    const ellipsoid = config?.ellipsoid ?? WGS84;

    this.engine = new GeodesicEngine(ellipsoid);
    this.config = {
      numPoints: config?.numPoints ?? DEFAULT_CONFIG.numPoints,
      outputDir: config?.outputDir ?? DEFAULT_CONFIG.outputDir,
      zoneLabel: config?.zoneLabel ?? DEFAULT_CONFIG.zoneLabel,
      verify: config?.verify ?? DEFAULT_CONFIG.verify,
    };

    this.registry = new ExporterRegistry();
    this.registry.register(new TextExporter({ outputDir: this.config.outputDir }));
    this.registry.register(
      new GpxExporter({
        outputDir: this.config.outputDir,
        track: config?.track,
        ellipsoidName: ellipsoid.name,
      })
    );
  }

  /**
   * Add an exporter to run after the ones already registered.
   */
  registerExporter(exporter: RingExporter): void {
    this.registry.register(exporter);
  }

  /**
   * Remove an exporter by ID.
   */
  unregisterExporter(exporterId: string): void {
    this.registry.unregister(exporterId);
  }

  /**
   * IDs of the exporters that will run, in order.
   */
  getExporterIds(): string[] {
    return this.registry.getMetadata().map((m) => m.id);
  }

  /**
   * Build one zone and write its files.
   *
   * Every document is rendered before the first file is written. If a write
   * fails, files already written by this call are removed and the write error
   * is rethrown unchanged. Files that cannot be removed are listed in its
   * `leftoverPaths` when it is an IOFailureError.
   *
   * @throws InvalidInputError if the request is malformed
   * @throws NumericFailureError if the geodesic solver fails
   * @throws IOFailureError if a file cannot be written
   */
  build(request: ZoneRequest): ZoneBuildResult {
    const parseResult = ZoneRequestSchema.safeParse(request);
    if (!parseResult.success) {
      throw InvalidInputError.fromZodError(parseResult.error);
    }

    const { center, radiusMeters } = parseResult.data;
    const numPoints = parseResult.data.numPoints ?? this.config.numPoints;

    const ring = generateCircle({ center, radiusMeters, numPoints }, this.engine);
    const verification = this.config.verify
      ? verifyRing(center, radiusMeters, ring, this.engine)
      : undefined;

    const name =
      parseResult.data.name ?? buildOutputName(radiusMeters, center, this.config.zoneLabel);
    const context: ExportContext = {
      name,
      radiusMeters,
      centerLabel: formatCenterLabel(center),
      numPoints,
    };

    const rendered = this.registry
      .getAll()
      .map((exporter) => ({ exporter, content: exporter.render(ring, context) }));

    const outputs: ExportResult[] = [];
    try {
      for (const { exporter, content } of rendered) {
        outputs.push(exporter.write(content, ring.length, name));
      }
    } catch (error) {
      const leftovers = this.removeOutputs(outputs);
      if (error instanceof IOFailureError) {
        error.leftoverPaths.push(...leftovers);
      }
      throw error;
    }

    return { name, ring, outputs, verification };
  }

  /**
   * Remove files written by a failed build. Returns the paths that could not be removed.
   */
  private removeOutputs(outputs: ExportResult[]): string[] {
    const leftovers: string[] = [];
    for (const output of outputs) {
      try {
        removeFile(output.path);
      } catch {
        leftovers.push(output.path);
      }
    }
    return leftovers;
  }
}
