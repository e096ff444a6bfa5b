export { InvalidInputError } from './invalid-input-error';
export type { ValidationIssue } from './invalid-input-error';

export { NumericFailureError } from './numeric-failure-error';
export type { GeodesicProblem } from './numeric-failure-error';

export { IOFailureError } from './io-failure-error';

export { ExporterError, DuplicateExporterError, ExporterNotFoundError } from './exporter-error';
