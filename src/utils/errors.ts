/** Candles or ticker could not be obtained for a symbol; the symbol is skipped for the tick. */
export class DataUnavailableError extends Error {
  constructor(
    public readonly symbol: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DataUnavailableError';
  }
}

export class ExecutionError extends Error {
  constructor(
    public readonly symbol: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ExecutionError';
  }
}

/** Unreadable or invalid persisted state. Fatal at startup. */
export class StateStoreError extends Error {
  constructor(
    public readonly file: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'StateStoreError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
