/**
 * Error kinds raised by the screening core.
 * Instrument-scoped errors are caught by the pipeline and land in the audit;
 * ConfigurationError aborts before any instrument is processed.
 */

export type ScreenerErrorCode = 'invalid_series' | 'insufficient_history' | 'configuration_error';

export class ScreenerError extends Error {
  constructor(
    readonly code: ScreenerErrorCode,
    detail: string
  ) {
    super(`${code}: ${detail}`);
    this.name = new.target.name;
  }
}

export class InvalidSeriesError extends ScreenerError {
  constructor(
    readonly instrumentId: string,
    detail: string
  ) {
    super('invalid_series', `${instrumentId} ${detail}`);
  }
}

export class InsufficientHistoryError extends ScreenerError {
  constructor(
    readonly instrumentId: string,
    readonly available: number,
    readonly required: number
  ) {
    super('insufficient_history', `${instrumentId} has ${available} bars, needs ${required}`);
  }
}

export class ConfigurationError extends ScreenerError {
  constructor(readonly issues: string[]) {
    super('configuration_error', issues.join('; '));
  }
}
