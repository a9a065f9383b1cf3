import fetch, { Response } from 'node-fetch';
import { logger } from '../../utils/logger';
import {
  CacheEntryExistsError,
  CacheWriteError,
  HttpStatusError,
  NotFoundError,
  RateLimitError,
  TransientNetworkError,
  ValidationError,
  describeError,
} from '../../utils/errors';
import { RetryPolicy, withRetry } from '../../utils/retry';
import { ItemCache } from './FileItemCache';
import { RateLimiter } from './RateLimiter';
import { FetchOutcome, FetchResult } from './types';

export const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{2,}$/;

/** Items and collections share one naming scheme. */
export function validateIdentifier(identifier: string, kind = 'Identifier'): void {
  if (identifier.length < 3) {
    throw new ValidationError(`${kind} "${identifier}" must be at least 3 characters`);
  }
  if (!IDENTIFIER_PATTERN.test(identifier)) {
    throw new ValidationError(
      `${kind} "${identifier}" must begin with a letter or digit and contain only letters, digits, hyphens and underscores`
    );
  }
}

export interface ItemFetcherOptions {
  baseUrl: string;
  payloadSuffix: string;
  userAgent: string;
  requestTimeoutMs: number;
  retry: RetryPolicy;
}

/**
 * Fetches the OCR text payload of a single item, cache first.
 * `fetch` always resolves; every error becomes a `failed` result.
 */
export class ItemFetcher {
  constructor(
    private readonly cache: ItemCache,
    private readonly rateLimiter: RateLimiter,
    private readonly options: ItemFetcherOptions
  ) {}

  payloadUrl(identifier: string): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    const fileName = `${identifier}${this.options.payloadSuffix}`;
    return `${base}/download/${encodeURIComponent(identifier)}/${encodeURIComponent(fileName)}`;
  }

  async fetch(identifier: string): Promise<FetchResult> {
    const startTime = Date.now();
    let attempts = 0;

    const result = (outcome: FetchOutcome, extra: Partial<FetchResult> = {}): FetchResult => ({
      identifier,
      outcome,
      attempts,
      durationMs: Date.now() - startTime,
      ...extra,
    });

    try {
      validateIdentifier(identifier);
    } catch (error) {
      logger.warn(`Skipping invalid identifier: ${describeError(error)}`);
      return result('failed', { error: toError(error) });
    }

    try {
      if (await this.cache.exists(identifier)) {
        logger.debug(`Using cached version of ${identifier}`);
        return result('cached', { path: this.cache.entryPath(identifier) });
      }
    } catch (error) {
      logger.error(`Cache lookup failed for ${identifier}: ${describeError(error)}`);
      return result('failed', { error: toError(error) });
    }

    const url = this.payloadUrl(identifier);
    let payload: Buffer;

    try {
      payload = await withRetry(
        async attempt => {
          attempts = attempt;
          await this.rateLimiter.wait();
          return this.download(url);
        },
        this.options.retry,
        {
          onRetry: (error, attempt, delayMs) =>
            logger.warn(
              `Attempt ${attempt} for ${identifier} failed: ${describeError(error)}. Retrying in ${delayMs}ms...`
            ),
        }
      );
    } catch (error) {
      if (error instanceof NotFoundError) {
        logger.debug(`No OCR available for ${identifier}`);
        return result('not_found');
      }
      logger.error(`Failed to fetch ${identifier}: ${describeError(error)}`);
      return result('failed', { error: toError(error) });
    }

    try {
      await this.cache.write(identifier, payload);
    } catch (error) {
      if (error instanceof CacheEntryExistsError) {
        logger.debug(`${identifier} was cached by another fetch while downloading`);
        return result('cached', { path: this.cache.entryPath(identifier) });
      }
      const writeError = new CacheWriteError(identifier, error);
      logger.error(writeError.message);
      await this.discardPartial(identifier);
      return result('failed', { error: writeError });
    }

    logger.debug(`Fetched and cached ${identifier} (${payload.length} bytes)`);
    return result('downloaded', { path: this.cache.entryPath(identifier) });
  }

  /** One HTTP attempt, classified into a payload or a typed error. */
  private async download(url: string): Promise<Buffer> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.requestTimeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          signal: controller.signal,
          headers: { 'User-Agent': this.options.userAgent },
        });
      } catch (error) {
        throw networkError(url, error, timedOut, this.options.requestTimeoutMs);
      }

      if (response.status === 404) {
        throw new NotFoundError(url);
      }
      if (response.status === 429) {
        throw new RateLimitError(url);
      }
      if (response.status >= 500) {
        throw new TransientNetworkError(`HTTP ${response.status} at ${url}`, {
          status: response.status,
        });
      }
      if (response.status !== 200) {
        throw new HttpStatusError(response.status, url);
      }

      try {
        return Buffer.from(await response.arrayBuffer());
      } catch (error) {
        throw networkError(url, error, timedOut, this.options.requestTimeoutMs);
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  private async discardPartial(identifier: string): Promise<void> {
    try {
      await this.cache.delete(identifier);
    } catch (error) {
      logger.warn(`Could not remove partial entry for ${identifier}: ${describeError(error)}`);
    }
  }
}

function networkError(
  url: string,
  cause: unknown,
  timedOut: boolean,
  timeoutMs: number
): TransientNetworkError {
  const message = timedOut
    ? `Request to ${url} timed out after ${timeoutMs}ms`
    : `Network error at ${url}: ${describeError(cause)}`;
  return new TransientNetworkError(message, { cause });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
