/**
 * Domain errors raised by the control surface and export.
 * Each carries the HTTP status `app.onError` answers with.
 */

export type ErrorStatus = 400 | 404 | 409 | 500;

export abstract class DigestbenchError extends Error {
  abstract readonly status: ErrorStatus;
}

export class RunConflictError extends DigestbenchError {
  readonly status = 409;

  constructor(public readonly runId: string) {
    super(`Run ${runId} is already in progress`);
    this.name = 'RunConflictError';
  }
}

export class InvalidDatasetError extends DigestbenchError {
  readonly status = 400;

  constructor(public readonly dataset: string) {
    super(`Unknown dataset: ${dataset}`);
    this.name = 'InvalidDatasetError';
  }
}

export class InvalidConfigurationError extends DigestbenchError {
  readonly status = 400;

  constructor(public readonly configuration: string) {
    super(`Invalid configuration: ${configuration}`);
    this.name = 'InvalidConfigurationError';
  }
}

export class NoResultsError extends DigestbenchError {
  readonly status = 404;

  constructor(public readonly runId: string) {
    super(`No results to export for run ${runId}`);
    this.name = 'NoResultsError';
  }
}

export class ExportError extends DigestbenchError {
  readonly status = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExportError';
  }
}
