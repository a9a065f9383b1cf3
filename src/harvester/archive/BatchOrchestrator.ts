import { EventEmitter } from 'events';
import pLimit from 'p-limit';
import { logger } from '../../utils/logger';
import { BatchConfigError, describeError } from '../../utils/errors';
import { CatalogSearcher } from './CatalogSearcher';
import { ItemFetcher } from './ItemFetcher';
import {
  BatchSnapshot,
  BatchStats,
  CatalogQuery,
  FetchResult,
  ItemCompletedEvent,
  RunBatchOptions,
} from './types';

export interface BatchOrchestratorOptions {
  /** Reject an empty identifier list instead of returning empty stats. */
  requireNonEmpty?: boolean;
}

export interface BatchOrchestrator {
  on(event: 'batchStarted', listener: (info: { total: number; workers: number }) => void): this;
  on(event: 'itemCompleted', listener: (event: ItemCompletedEvent) => void): this;
  on(event: 'batchCompleted', listener: (stats: BatchStats) => void): this;
  emit(event: 'batchStarted', info: { total: number; workers: number }): boolean;
  emit(event: 'itemCompleted', payload: ItemCompletedEvent): boolean;
  emit(event: 'batchCompleted', stats: BatchStats): boolean;
}

function emptyStats(total: number): BatchStats {
  return {
    total,
    successful: 0,
    cached: 0,
    notFound: 0,
    failed: 0,
    failedIdentifiers: [],
    cancelled: false,
    durationMs: 0,
  };
}

/**
 * Runs ItemFetcher over an identifier list with a bounded worker pool.
 * Results arrive in completion order; per-item failures never stop the batch.
 */
export class BatchOrchestrator extends EventEmitter {
  private stats: BatchStats = emptyStats(0);
  private limit: ReturnType<typeof pLimit> | null = null;
  private abortController: AbortController | null = null;
  private running = false;

  constructor(
    private readonly fetcher: ItemFetcher,
    private readonly searcher: CatalogSearcher,
    private readonly options: BatchOrchestratorOptions = {}
  ) {
    super();
  }

  async runBatch(
    identifiers: string[],
    maxWorkers: number,
    options: RunBatchOptions = {}
  ): Promise<BatchStats> {
    if (!Number.isInteger(maxWorkers) || maxWorkers <= 0) {
      throw new BatchConfigError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
    if (this.running) {
      throw new BatchConfigError('A batch is already running on this orchestrator');
    }

    const unique = Array.from(new Set(identifiers));
    if (unique.length < identifiers.length) {
      logger.warn(`Ignoring ${identifiers.length - unique.length} duplicate identifiers`);
    }
    if (unique.length === 0 && this.options.requireNonEmpty) {
      throw new BatchConfigError('Identifier list is empty');
    }

    const startTime = Date.now();
    const workers = Math.min(maxWorkers, unique.length);
    const controller = new AbortController();
    const onExternalAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    this.running = true;
    this.stats = emptyStats(unique.length);
    this.abortController = controller;
    this.limit = workers > 0 ? pLimit(workers) : null;

    logger.info(`Starting batch download of ${unique.length} issues with ${workers} workers`);
    this.notify('batchStarted', () => this.emit('batchStarted', { total: unique.length, workers }));

    try {
      const limit = this.limit;
      if (limit) {
        await Promise.all(
          unique.map(identifier =>
            limit(async () => {
              if (controller.signal.aborted) {
                return;
              }
              const result = await this.fetcher.fetch(identifier);
              this.recordOutcome(result);
            })
          )
        );
      }
    } finally {
      options.signal?.removeEventListener('abort', onExternalAbort);
      this.running = false;
      this.limit = null;
      this.abortController = null;
    }

    const processed =
      this.stats.successful + this.stats.cached + this.stats.notFound + this.stats.failed;
    this.stats.cancelled = controller.signal.aborted && processed < this.stats.total;
    this.stats.durationMs = Date.now() - startTime;
    const finalStats = this.copyStats();

    logger.info(
      `Batch ${finalStats.cancelled ? 'cancelled' : 'completed'} in ${(finalStats.durationMs / 1000).toFixed(1)}s`
    );
    logger.info(
      `Results: ${finalStats.successful} downloaded, ${finalStats.cached} cached, ` +
        `${finalStats.notFound} no OCR, ${finalStats.failed} failed`
    );
    this.notify('batchCompleted', () => this.emit('batchCompleted', finalStats));
    return finalStats;
  }

  async runSearch(
    query: CatalogQuery,
    maxWorkers: number,
    options: RunBatchOptions = {}
  ): Promise<BatchStats> {
    const identifiers = await this.searcher.search(query);
    return this.runBatch(identifiers, maxWorkers, options);
  }

  /** Finish in-flight fetches, start no new ones. */
  cancel(): void {
    if (this.abortController && !this.abortController.signal.aborted) {
      logger.warn('Cancelling batch: waiting for in-flight downloads to finish');
      this.abortController.abort();
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getSnapshot(): BatchSnapshot {
    return {
      ...this.copyStats(),
      inFlight: this.limit?.activeCount ?? 0,
      pending: this.limit?.pendingCount ?? 0,
    };
  }

  // Single point where outcomes are folded into the counters.
  private recordOutcome(result: FetchResult): void {
    switch (result.outcome) {
      case 'downloaded':
        this.stats.successful++;
        logger.debug(`Successfully downloaded ${result.identifier}`);
        break;
      case 'cached':
        this.stats.cached++;
        break;
      case 'not_found':
        this.stats.notFound++;
        break;
      case 'failed':
        this.stats.failed++;
        this.stats.failedIdentifiers.push(result.identifier);
        break;
    }

    this.notify('itemCompleted', () =>
      this.emit('itemCompleted', {
        identifier: result.identifier,
        outcome: result.outcome,
        attempts: result.attempts,
        durationMs: result.durationMs,
        error: result.error?.message,
      })
    );
  }

  // Listener errors are logged and never reach the pool or the caller.
  private notify(event: string, emitEvent: () => void): void {
    try {
      emitEvent();
    } catch (error) {
      logger.warn(`${event} listener failed: ${describeError(error)}`);
    }
  }

  private copyStats(): BatchStats {
    return { ...this.stats, failedIdentifiers: [...this.stats.failedIdentifiers] };
  }
}
