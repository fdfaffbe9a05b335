/**
 * Sync error taxonomy
 *
 * Every error raised by the engine extends SyncError. `retryable` tells the
 * retry combinator whether another attempt can help.
 *
 * Run-fatal: ConfigError, AuthError, StorageError (only when every sink failed).
 * Retried: RateLimitedError, TransientNetworkError.
 * Degrade: NotFoundError (detail / gear lookups become "no enrichment").
 */

export class SyncError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SyncError";
    this.retryable = retryable;
  }
}

export class ConfigError extends SyncError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`, false);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class AuthError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, false, options);
    this.name = "AuthError";
  }
}

export class RateLimitedError extends SyncError {
  /** Seconds suggested by the provider, null when no hint was sent */
  readonly retryAfterSeconds: number | null;

  constructor(retryAfterSeconds: number | null, message?: string) {
    super(
      message ??
        (retryAfterSeconds === null
          ? "Rate limit exceeded"
          : `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`),
      true
    );
    this.name = "RateLimitedError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class TransientNetworkError extends SyncError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, true, options);
    this.name = "TransientNetworkError";
    this.status = status;
  }
}

/** 401 from a resource endpoint; handled by one token refresh before becoming an AuthError */
export class UnauthorizedError extends SyncError {
  constructor(url: string) {
    super(`Unauthorized: ${url}`, false);
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends SyncError {
  constructor(resource: string) {
    super(`Not found: ${resource}`, false);
    this.name = "NotFoundError";
  }
}

/** Any other non-success status; not retried */
export class HttpError extends SyncError {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`HTTP ${status}: ${body}`, false);
    this.name = "HttpError";
    this.status = status;
  }
}

export class StorageError extends SyncError {
  readonly sink: string;

  constructor(sink: string, message: string, options?: { cause?: unknown }) {
    super(`[${sink}] ${message}`, false, options);
    this.name = "StorageError";
    this.sink = sink;
  }
}

/**
 * Result of a sub-operation that may degrade instead of failing the run.
 */
export type Outcome<T> =
  | { kind: "ok"; value: T }
  | { kind: "absent" }
  | { kind: "degraded"; error: SyncError };

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
