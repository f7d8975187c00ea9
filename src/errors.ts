import type { ErrorCategory } from './types/index.js';

/**
 * Base class for every failure the analysis client can hit. `retryable` decides
 * whether the per-request retry loop tries again; `category` is what reports show.
 */
export abstract class ScanError extends Error {
  abstract readonly retryable: boolean;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NetworkError extends ScanError {
  readonly retryable = true;
  readonly category: ErrorCategory;

  constructor(message: string, readonly timedOut: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.category = timedOut ? 'network_timeout' : 'network_error';
  }
}

export class RateLimitedError extends ScanError {
  readonly retryable = true;
  readonly category = 'rate_limit' as const;

  constructor(readonly retryAfterMs: number | undefined) {
    super('Rate limit exceeded (HTTP 429)');
  }
}

export class ServerError extends ScanError {
  readonly retryable = true;
  readonly category = 'api_error' as const;

  constructor(readonly status: number) {
    super(`Analysis service error (HTTP ${status})`);
  }
}

export class ClientError extends ScanError {
  readonly retryable = false;
  readonly category: ErrorCategory;

  constructor(readonly status: number, detail?: string) {
    super(status === 404 ? 'Extension not found on the analysis service' : `HTTP error ${status}: ${detail ?? 'Unknown error'}`);
    this.category = status === 404 ? 'not_found' : 'api_error';
  }
}

export class ResponseTooLargeError extends ScanError {
  readonly retryable = false;
  readonly category = 'api_error' as const;

  constructor(readonly limitBytes: number) {
    super(`Response exceeds maximum size (${limitBytes} bytes)`);
  }
}

export class InvalidResponseError extends ScanError {
  readonly retryable = false;
  readonly category = 'api_error' as const;
}

export class AnalysisFailedError extends ScanError {
  readonly retryable = false;
  readonly category = 'api_error' as const;

  constructor(detail?: string) {
    super(detail ? `Analysis failed: ${detail}` : 'Analysis failed');
  }
}

export class AnalysisTimeoutError extends ScanError {
  readonly retryable = false;
  readonly category = 'network_timeout' as const;

  constructor(readonly waitedMs: number) {
    super(`Analysis timeout after ${(waitedMs / 1000).toFixed(1)}s`);
  }
}

export class RetryExhaustedError extends ScanError {
  readonly retryable = false;
  readonly category: ErrorCategory;

  constructor(readonly lastError: ScanError, readonly attempts: number) {
    super(`${lastError.message} (gave up after ${attempts} attempts)`, { cause: lastError });
    this.category = lastError.category;
  }
}

/** The cache store cannot be opened or written at all. */
export class CacheStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheStoreError';
  }
}

export class CacheMigrationError extends Error {
  constructor(
    message: string,
    readonly fromVersion: number,
    readonly toVersion: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CacheMigrationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function categorizeError(error: unknown): ErrorCategory {
  if (error instanceof ScanError) {
    return error.category;
  }

  const message = describeError(error).toLowerCase();
  if (message.includes('rate limit') || message.includes('429')) {
    return 'rate_limit';
  }
  if (message.includes('timeout') || message.includes('timed out')) {
    return 'network_timeout';
  }
  if (message.includes('network') || message.includes('connection')) {
    return 'network_error';
  }
  return 'api_error';
}

export function describeCategory(category: ErrorCategory): string {
  const labels: Record<ErrorCategory, string> = {
    rate_limit: 'Rate limit',
    network_timeout: 'Network timeout',
    network_error: 'Network error',
    not_found: 'Not found',
    invalid_metadata: 'Invalid metadata',
    api_error: 'API error',
  };
  return labels[category];
}
