export class AppError extends Error {
  readonly statusCode: number;
  readonly isOperational = true;

  constructor(message: string, statusCode: number = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * Network failure, timeout, 5xx or upstream 429. Retried at the call site;
 * fatal to a single watchlist entry once retries are exhausted.
 */
export class TransportError extends AppError {
  readonly retryable = true;
  readonly rateLimited: boolean;
  readonly retryAfterMs: number | undefined;

  constructor(
    message: string,
    options: ErrorOptions & { rateLimited?: boolean; retryAfterMs?: number } = {}
  ) {
    super(message, 502, options);
    this.rateLimited = options.rateLimited ?? false;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Permanent upstream failure: a 4xx other than 404/429, or a malformed body. */
export class UpstreamResponseError extends AppError {
  readonly retryable = false;

  constructor(message: string, options?: ErrorOptions) {
    super(message, 502, options);
  }
}

/** The persistent cache could not be read or written. Aborts the whole batch. */
export class CacheIOError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 503, options);
  }
}

export class WatchlistSourceError extends AppError {
  constructor(message: string, statusCode: number = 502, options?: ErrorOptions) {
    super(message, statusCode, options);
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
