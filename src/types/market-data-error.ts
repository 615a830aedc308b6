/**
 * Error types raised by data providers, the data processor and config loading
 */

export type ProviderErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'TIMEOUT'
  | 'UPSTREAM_FAILURE'
  | 'MALFORMED_PAYLOAD';

export type ProcessorErrorCode = 'EMPTY_SERIES';

/**
 * Error thrown when a data provider cannot produce a series or quote
 */
export class ProviderError extends Error {
  constructor(
    public readonly code: ProviderErrorCode,
    message: string,
    public readonly sourceId?: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Error thrown when a series cannot be normalized or measured
 */
export class ProcessorError extends Error {
  constructor(
    public readonly code: ProcessorErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ProcessorError';
  }
}

/**
 * Error thrown when the environment does not describe a usable configuration
 */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function isMarketDataError(error: unknown): error is ProviderError | ProcessorError {
  return error instanceof ProviderError || error instanceof ProcessorError;
}
