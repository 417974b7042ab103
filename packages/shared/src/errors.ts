/**
 * Error codes used throughout docvault.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ContentError'
  | 'EmbeddingError'
  | 'MalformedRecordError'
  | 'DimensionMismatchError'
  | 'StoreError'
  | 'ProviderError'
  | 'RateLimitError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all docvault errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('StoreError', 'Failed to write record', {
 *   cause: originalError,
 *   details: { filename: 'guide.md' }
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration or call parameters are invalid
 * (chunk size, overlap, k, config files).
 * User-correctable - rejected before any work begins.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI or API usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a document's input is empty, unreadable or unsupported.
 * Fails ingestion of that document only.
 */
export class ContentError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ContentError', message, options);
  }
}

/**
 * Error thrown when an embedder fails or returns inconsistent vectors.
 */
export class EmbeddingError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('EmbeddingError', message, options);
  }
}

/**
 * Error thrown when a persisted record fails structural validation.
 * Skipped with a warning at query time.
 */
export class MalformedRecordError extends AppError {
  /** Where the record came from (file path, table row key, ...) */
  public readonly origin: string;

  constructor(origin: string, message: string, options: AppErrorOptions = {}) {
    super('MalformedRecordError', `Malformed record at ${origin}: ${message}`, options);
    this.origin = origin;
  }
}

/**
 * Error raised when a stored embedding's dimension differs from the query's.
 */
export class DimensionMismatchError extends AppError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number, options: AppErrorOptions = {}) {
    super(
      'DimensionMismatchError',
      `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
      options,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Error thrown when the backing store cannot be read or written.
 */
export class StoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreError', message, options);
  }
}

/**
 * Error thrown when a remote embedding provider fails.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * Error thrown when rate limited by an API.
 * Includes optional retry-after information.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Extracts a human-readable reason from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
