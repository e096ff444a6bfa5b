import type { CirclePointRing, ExportResult } from '../types';
import { formatCoordinate } from '../utils';
import { BaseExporter } from './base-exporter';
import type { BaseExporterConfig } from './base-exporter';

/**
 * Configuration for the text exporter.
 */
export type TextExporterConfig = BaseExporterConfig;

/**
 * Writes a ring as plain text, one "lat, lon" line per point, no header.
 */
export class TextExporter extends BaseExporter {
  readonly metadata = {
    id: 'text',
    name: 'Coordinate list',
    extension: 'txt',
  };

  constructor(config?: TextExporterConfig) {
    super(config);
  }

  render(ring: CirclePointRing): string {
    this.assertRing(ring);
    return ring
      .map((p) => `${formatCoordinate(p.latitude)}, ${formatCoordinate(p.longitude)}\n`)
      .join('');
  }
}

/**
 * Write `<name>.txt` with one "lat, lon" line per ring point.
 *
 * @example
 * writeText(ring, '900m_RQZ_Circle', { outputDir: 'out' });
 */
export function writeText(
  ring: CirclePointRing,
  name: string,
  options?: TextExporterConfig
): ExportResult {
  const exporter = new TextExporter(options);
  return exporter.write(exporter.render(ring), ring.length, name);
}
