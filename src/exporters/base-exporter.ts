import { join } from 'node:path';
import type { CirclePointRing, ExportContext, ExporterMetadata, ExportResult } from '../types';
import { ExportContextSchema } from '../schemas';
import { InvalidInputError } from '../errors';
import { writeFileAtomic } from '../utils';

/**
 * A serializer turning a point ring into one output file.
 */
export interface RingExporter {
  readonly metadata: ExporterMetadata;

  /**
   * Render the ring to the file's text content. Pure; writes nothing.
   */
  render(ring: CirclePointRing, context: ExportContext): string;

  /**
   * Write already rendered content to `<outputDir>/<name>.<extension>`.
   */
  write(content: string, pointCount: number, name: string): ExportResult;

  /**
   * Render and write in one step.
   */
  export(ring: CirclePointRing, context: ExportContext): ExportResult;

  /**
   * Path the exporter writes for a given base name.
   */
  outputPath(name: string): string;
}

/**
 * Configuration for base exporter.
 */
export interface BaseExporterConfig {
  /** Directory files are written to (default: current directory) */
  outputDir?: string;
}

/**
 * Abstract base class for ring exporters.
 *
 * Provides common functionality for:
 * - Output path construction
 * - Atomic UTF-8 writes
 * - Ring and context validation
 */
export abstract class BaseExporter implements RingExporter {
  abstract readonly metadata: ExporterMetadata;

  protected config: Required<BaseExporterConfig>;

  constructor(config?: BaseExporterConfig) {
    this.config = {
      outputDir: config?.outputDir ?? '.',
    };
  }

  /**
   * Render the ring. Must be implemented by subclasses.
   */
  abstract render(ring: CirclePointRing, context: ExportContext): string;

  outputPath(name: string): string {
    if (name.length === 0) {
      throw InvalidInputError.forField('name', 'must not be empty');
    }
    return join(this.config.outputDir, `${name}.${this.metadata.extension}`);
  }

  write(content: string, pointCount: number, name: string): ExportResult {
    const path = this.outputPath(name);
    const bytesWritten = writeFileAtomic(path, content);

    return {
      exporterId: this.metadata.id,
      path,
      pointCount,
      bytesWritten,
    };
  }

  export(ring: CirclePointRing, context: ExportContext): ExportResult {
    const content = this.render(ring, context);
    return this.write(content, ring.length, context.name);
  }

  /**
   * Validate the descriptive parameters.
   */
  protected validateContext(context: ExportContext): ExportContext {
    const parseResult = ExportContextSchema.safeParse(context);
    if (!parseResult.success) {
      throw InvalidInputError.fromZodError(parseResult.error);
    }
    return parseResult.data;
  }

  /**
   * Reject an empty ring.
   */
  protected assertRing(ring: CirclePointRing): void {
    if (ring.length === 0) {
      throw InvalidInputError.forField('ring', 'at least one point is required');
    }
  }
}
