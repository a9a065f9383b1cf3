import { RateLimitConfig } from '../../types';
import { ValidationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { sleep } from '../../utils/retry';

/**
 * Sliding-window limiter shared by every fetch and search in the process.
 *
 * Callers are served strictly one at a time in call order: each `wait()` is
 * chained onto the previous one, so the prune/check/append sequence never
 * interleaves between workers.
 */
export class RateLimiter {
  private readonly requestsPerPeriod: number;
  private readonly periodMs: number;
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(config: RateLimitConfig) {
    if (!Number.isInteger(config.requestsPerPeriod) || config.requestsPerPeriod < 1) {
      throw new ValidationError('requestsPerPeriod must be a positive integer');
    }
    if (!(config.periodSeconds > 0)) {
      throw new ValidationError('periodSeconds must be greater than 0');
    }
    this.requestsPerPeriod = config.requestsPerPeriod;
    this.periodMs = config.periodSeconds * 1000;
  }

  /**
   * Resolves once one request may be issued without exceeding the budget.
   * The resolved value is the timestamp recorded for that request.
   */
  wait(): Promise<number> {
    const turn = this.tail.then(() => this.acquireSlot());
    this.tail = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  getWindowSize(): number {
    this.prune(Date.now());
    return this.timestamps.length;
  }

  private async acquireSlot(): Promise<number> {
    let now = Date.now();
    this.prune(now);

    while (this.timestamps.length >= this.requestsPerPeriod) {
      const delay = this.timestamps[0] + this.periodMs - now;
      logger.debug(`Rate limit reached, waiting ${delay}ms`);
      await sleep(delay);
      now = Date.now();
      this.prune(now);
    }

    this.timestamps.push(now);
    return now;
  }

  private prune(now: number): void {
    const cutoff = now - this.periodMs;
    let expired = 0;
    while (expired < this.timestamps.length && this.timestamps[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps.splice(0, expired);
    }
  }
}
