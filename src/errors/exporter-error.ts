/**
 * Base error class for exporter registry errors.
 */
export class ExporterError extends Error {
  readonly exporterId: string;
  readonly code: string;

  constructor(message: string, exporterId: string, code = 'EXPORTER_ERROR') {
    super(message);
    this.name = 'ExporterError';
    this.exporterId = exporterId;
    this.code = code;
    Object.setPrototypeOf(this, ExporterError.prototype);
  }
}

/**
 * Error thrown when an exporter with the same ID or file extension is already registered.
 */
export class DuplicateExporterError extends ExporterError {
  constructor(exporterId: string, detail = 'ID') {
    super(
      `Exporter "${exporterId}" conflicts with a registered exporter (duplicate ${detail})`,
      exporterId,
      'DUPLICATE_EXPORTER_ERROR'
    );
    this.name = 'DuplicateExporterError';
    Object.setPrototypeOf(this, DuplicateExporterError.prototype);
  }
}

/**
 * Error thrown when a referenced exporter is not found.
 */
export class ExporterNotFoundError extends ExporterError {
  constructor(exporterId: string) {
    super(`Exporter with ID "${exporterId}" not found`, exporterId, 'EXPORTER_NOT_FOUND_ERROR');
    this.name = 'ExporterNotFoundError';
    Object.setPrototypeOf(this, ExporterNotFoundError.prototype);
  }
}
