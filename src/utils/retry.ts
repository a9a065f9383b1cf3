import { RetryConfig } from '../types';
import { ExhaustedRetriesError, describeError, isRetryableError } from './errors';
import { logger } from './logger';

export type RetryPolicy = RetryConfig;

export interface RetryOptions {
  /** Defaults to the harvester's own taxonomy (429, 5xx, network, timeout). */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each backoff sleep with the 1-based attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  label?: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Delay before retry number `retryIndex` (0 for the first retry). */
export function backoffDelay(policy: RetryPolicy, retryIndex: number): number {
  return policy.baseDelayMs * Math.pow(policy.backoffFactor, retryIndex);
}

/**
 * Runs `operation` until it resolves, throws a non-retryable error, or has
 * failed `maxRetries + 1` times. Non-retryable errors are rethrown as-is;
 * exhaustion throws ExhaustedRetriesError carrying the last error.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const maxAttempts = policy.maxRetries + 1;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < maxAttempts) {
        const delay = backoffDelay(policy, attempt - 1);
        if (options.onRetry) {
          options.onRetry(error, attempt, delay);
        } else {
          logger.debug(
            `${options.label ?? 'Request'} attempt ${attempt}/${maxAttempts} failed: ${describeError(error)}. Retrying in ${delay}ms`
          );
        }
        await sleep(delay);
      }
    }
  }

  throw new ExhaustedRetriesError(maxAttempts, lastError);
}
