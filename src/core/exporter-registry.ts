import type { ExporterMetadata } from '../types';
import type { RingExporter } from '../exporters/base-exporter';
import { DuplicateExporterError, ExporterNotFoundError } from '../errors';

/**
 * Ordered set of exporters run for every zone.
 *
 * IDs and file extensions are unique, so no two exporters write the same file.
 */
export class ExporterRegistry {
  private exporters = new Map<string, RingExporter>();

  /**
   * Register an exporter. Exporters run in registration order.
   *
   * @throws DuplicateExporterError if the ID or the file extension is taken
   */
  register(exporter: RingExporter): void {
    const { id, extension } = exporter.metadata;

    if (this.exporters.has(id)) {
      throw new DuplicateExporterError(id);
    }

    for (const existing of this.exporters.values()) {
      if (existing.metadata.extension === extension) {
        throw new DuplicateExporterError(id, `file extension ".${extension}"`);
      }
    }

    this.exporters.set(id, exporter);
  }

  /**
   * Unregister an exporter by ID.
   *
   * @throws ExporterNotFoundError if the exporter is not registered
   */
  unregister(exporterId: string): void {
    if (!this.exporters.delete(exporterId)) {
      throw new ExporterNotFoundError(exporterId);
    }
  }

  /**
   * Get an exporter by ID.
   */
  get(exporterId: string): RingExporter | undefined {
    return this.exporters.get(exporterId);
  }

  /**
   * Get all registered exporters, in registration order.
   */
  getAll(): RingExporter[] {
    return [...this.exporters.values()];
  }

  getMetadata(): ExporterMetadata[] {
    return this.getAll().map((e) => e.metadata);
  }

  has(exporterId: string): boolean {
    return this.exporters.has(exporterId);
  }

  size(): number {
    return this.exporters.size;
  }
}
