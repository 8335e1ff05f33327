export type PairsErrorKind = 'config' | 'data' | 'fetch';

export class PairsError extends Error {
  readonly kind: PairsErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    kind: PairsErrorKind,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'PairsError';
    this.kind = kind;
    this.details = options?.details;
  }
}

/** Invalid parameters; raised before any processing. */
export class ConfigError extends PairsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('config', message, { details });
    this.name = 'ConfigError';
  }
}

/** Input series unusable (too short, no overlap, bad range). */
export class DataError extends PairsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('data', message, { details });
    this.name = 'DataError';
  }
}

export class FetchError extends PairsError {
  readonly ticker: string;

  constructor(ticker: string, message: string, cause?: unknown) {
    super('fetch', message, { details: { ticker }, cause });
    this.name = 'FetchError';
    this.ticker = ticker;
  }
}
