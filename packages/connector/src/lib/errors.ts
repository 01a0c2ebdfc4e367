/**
 * Shared error classes
 *
 * Only TransientNetworkError (and its RateLimitError subclass) is recovered
 * locally, by the retry policy. Everything else surfaces to the CLI, which
 * logs it and exits non-zero.
 */

// =============================================================================
// Base Error Classes
// =============================================================================

/**
 * Token acquisition or refresh failed.
 */
export class AuthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
  }
}

/**
 * Timeout, connection failure or 5xx response.
 */
export class TransientNetworkError extends Error {
  readonly statusCode: number | null;

  constructor(message: string, statusCode: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientNetworkError";
    this.statusCode = statusCode;
  }
}

/**
 * Throttled by the provider (HTTP 429, EWS ErrorServerBusy).
 */
export class RateLimitError extends TransientNetworkError {
  /** Seconds the provider asked us to wait, when it said so */
  readonly retryAfterSeconds: number | null;

  constructor(retryAfterSeconds: number | null, message?: string) {
    super(
      message ??
        (retryAfterSeconds === null
          ? "Rate limit exceeded."
          : `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`),
      429
    );
    this.name = "RateLimitError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Non-retryable error response from a provider API.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly body: string;

  constructor(statusCode: number, body: string, message?: string) {
    super(message ?? `HTTP ${statusCode}: ${body}`);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.body = body;
  }
}

/**
 * Malformed or inconsistent data (duplicate key, unexpected schema, unknown calendar).
 */
export class DataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataError";
  }
}

/**
 * The target changed concurrently; the write was refused rather than overwritten.
 */
export class WriteConflictError extends Error {
  readonly resourceId: string;

  constructor(resourceId: string, message?: string) {
    super(message ?? `Resource ${resourceId} was modified concurrently`);
    this.name = "WriteConflictError";
    this.resourceId = resourceId;
  }
}

/**
 * Config file missing, unreadable or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * An external command exited non-zero or could not be started.
 */
export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;

  constructor(command: string, exitCode: number | null, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Command failed with exit code ${exitCode}: ${command}`, options);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isTransientError(error: unknown): error is TransientNetworkError {
  return error instanceof TransientNetworkError;
}

export function isRateLimitError(error: unknown): error is RateLimitError {
  return error instanceof RateLimitError;
}

/**
 * Render any thrown value as a single log line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
