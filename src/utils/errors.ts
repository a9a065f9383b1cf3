export type HarvesterErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'TRANSIENT_NETWORK'
  | 'HTTP_STATUS'
  | 'EXHAUSTED_RETRIES'
  | 'CACHE_WRITE'
  | 'CACHE_ENTRY_EXISTS'
  | 'BATCH_CONFIG';

export class HarvesterError extends Error {
  readonly code: HarvesterErrorCode;

  constructor(code: HarvesterErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad identifier, date or query argument. Never retried. */
export class ValidationError extends HarvesterError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

/** The remote item has no payload. A normal terminal outcome, not a failure. */
export class NotFoundError extends HarvesterError {
  constructor(readonly url: string) {
    super('NOT_FOUND', `No payload at ${url}`);
  }
}

export class RateLimitError extends HarvesterError {
  constructor(readonly url: string) {
    super('RATE_LIMITED', `Rate limited (HTTP 429) at ${url}`);
  }
}

export class TransientNetworkError extends HarvesterError {
  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('TRANSIENT_NETWORK', message, { cause: options?.cause });
    this.status = options?.status;
  }

  readonly status?: number;
}

/** A non-retryable HTTP status outside 200/404/429/5xx, e.g. 403 on a restricted item. */
export class HttpStatusError extends HarvesterError {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super('HTTP_STATUS', `HTTP ${status} at ${url}`);
  }
}

export class ExhaustedRetriesError extends HarvesterError {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super('EXHAUSTED_RETRIES', `Gave up after ${attempts} attempts: ${describeError(lastError)}`, {
      cause: lastError,
    });
  }
}

export class CacheWriteError extends HarvesterError {
  constructor(identifier: string, cause: unknown) {
    super('CACHE_WRITE', `Failed to write cache entry for ${identifier}: ${describeError(cause)}`, {
      cause,
    });
  }
}

/** Another writer completed the entry first. The existing entry is intact. */
export class CacheEntryExistsError extends HarvesterError {
  constructor(readonly identifier: string) {
    super('CACHE_ENTRY_EXISTS', `Cache entry for ${identifier} already exists`);
  }
}

export class BatchConfigError extends HarvesterError {
  constructor(message: string) {
    super('BATCH_CONFIG', message);
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof RateLimitError || error instanceof TransientNetworkError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
