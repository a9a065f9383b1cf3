import fetch, { Response } from 'node-fetch';
import { BatchOrchestrator } from '../harvester/archive/BatchOrchestrator';
import { CatalogSearcher } from '../harvester/archive/CatalogSearcher';
import { ItemFetcher } from '../harvester/archive/ItemFetcher';
import { RateLimiter } from '../harvester/archive/RateLimiter';
import { ItemCompletedEvent } from '../harvester/archive/types';
import { BatchConfigError } from '../utils/errors';
import { sleep } from '../utils/retry';
import {
  FetchRouter,
  MemoryItemCache,
  TEST_BASE_URL,
  fastRetry,
  generousRateLimit,
  searchBody,
} from './helpers';

jest.mock('node-fetch', () => ({
  __esModule: true,
  ...jest.requireActual('node-fetch'),
  default: jest.fn(),
}));

const mockFetch = jest.mocked(fetch);

describe('BatchOrchestrator', () => {
  let cache: MemoryItemCache;
  let router: FetchRouter;
  let fetcher: ItemFetcher;
  let searcher: CatalogSearcher;
  let orchestrator: BatchOrchestrator;

  const build = (retry = fastRetry, requireNonEmpty = false) => {
    const rateLimiter = new RateLimiter(generousRateLimit);
    const http = { userAgent: 'test-agent', requestTimeoutMs: 5000, retry };
    fetcher = new ItemFetcher(cache, rateLimiter, {
      ...http,
      baseUrl: TEST_BASE_URL,
      payloadSuffix: '_djvu.txt',
    });
    searcher = new CatalogSearcher(rateLimiter, {
      ...http,
      baseUrl: TEST_BASE_URL,
      mediaType: 'texts',
      payloadSuffix: '_djvu.txt',
    });
    orchestrator = new BatchOrchestrator(fetcher, searcher, { requireNonEmpty });
  };

  /** Answers every payload request with 200 after a short delay, tracking concurrency. */
  const slowServer = (delayMs: number) => {
    const state = { active: 0, maxActive: 0, calls: 0 };
    mockFetch.mockImplementation(async () => {
      state.calls++;
      state.active++;
      state.maxActive = Math.max(state.maxActive, state.active);
      await sleep(delayMs);
      state.active--;
      return new Response('OCR text', { status: 200 });
    });
    return state;
  };

  beforeEach(() => {
    cache = new MemoryItemCache();
    router = new FetchRouter();
    mockFetch.mockImplementation(router.handler);
    build();
  });

  describe('runBatch', () => {
    it('should classify a mixed batch and resume it from the cache', async () => {
      const urlA = fetcher.payloadUrl('issue-a');
      const urlB = fetcher.payloadUrl('issue-b');
      const urlC = fetcher.payloadUrl('issue-c');
      router.route(urlA, 200).route(urlB, 404).route(urlC, 503, 503, 200);

      const first = await orchestrator.runBatch(['issue-a', 'issue-b', 'issue-c'], 2);

      expect(first).toMatchObject({
        total: 3,
        successful: 2,
        cached: 0,
        notFound: 1,
        failed: 0,
        failedIdentifiers: [],
        cancelled: false,
      });
      expect([...cache.entries.keys()].sort()).toEqual(['issue-a', 'issue-c']);

      const second = await orchestrator.runBatch(['issue-a', 'issue-b', 'issue-c'], 2);

      expect(second).toMatchObject({ total: 3, successful: 0, cached: 2, notFound: 1, failed: 0 });
      expect(router.callsTo(urlA)).toBe(1);
      expect(router.callsTo(urlC)).toBe(3);
      expect(router.callsTo(urlB)).toBe(2);
    });

    it('should account for every identifier whatever the pool size', async () => {
      const identifiers = Array.from({ length: 25 }, (_, i) => `issue-${String(i).padStart(2, '0')}`);
      identifiers.forEach((identifier, i) => {
        router.route(fetcher.payloadUrl(identifier), [200, 404, 403, 503][i % 4]);
      });
      build({ maxRetries: 0, baseDelayMs: 1, backoffFactor: 2 });

      for (const workers of [1, 4, 50]) {
        cache.entries.clear();
        const stats = await orchestrator.runBatch(identifiers, workers);

        expect(stats.successful + stats.cached + stats.notFound + stats.failed).toBe(25);
        expect(stats).toMatchObject({ successful: 7, cached: 0, notFound: 6, failed: 12 });
        expect(stats.failedIdentifiers).toHaveLength(12);
      }
    });

    it('should keep at most maxWorkers fetches in flight', async () => {
      const server = slowServer(10);
      const identifiers = Array.from({ length: 12 }, (_, i) => `issue-${i + 100}`);

      const stats = await orchestrator.runBatch(identifiers, 3);

      expect(stats.successful).toBe(12);
      expect(server.maxActive).toBeLessThanOrEqual(3);
      expect(server.maxActive).toBeGreaterThan(1);
    });

    it('should start no more workers than identifiers', async () => {
      router.route(fetcher.payloadUrl('issue-a'), 200).route(fetcher.payloadUrl('issue-b'), 200);
      const started = jest.fn();
      orchestrator.on('batchStarted', started);

      await orchestrator.runBatch(['issue-a', 'issue-b'], 8);

      expect(started).toHaveBeenCalledWith({ total: 2, workers: 2 });
    });

    it('should de-duplicate identifiers', async () => {
      const url = fetcher.payloadUrl('issue-a');
      router.route(url, 200);

      const stats = await orchestrator.runBatch(['issue-a', 'issue-a', 'issue-a'], 2);

      expect(stats.total).toBe(1);
      expect(stats.successful).toBe(1);
      expect(router.callsTo(url)).toBe(1);
    });

    it('should keep going past failed items', async () => {
      build({ maxRetries: 1, baseDelayMs: 1, backoffFactor: 2 });
      router
        .route(fetcher.payloadUrl('issue-a'), 200)
        .route(fetcher.payloadUrl('issue-bad'), 500)
        .route(fetcher.payloadUrl('issue-c'), 200);

      const stats = await orchestrator.runBatch(['issue-a', 'issue-bad', 'issue-c'], 1);

      expect(stats).toMatchObject({ successful: 2, failed: 1, failedIdentifiers: ['issue-bad'] });
    });

    it('should count an invalid identifier as failed', async () => {
      router.route(fetcher.payloadUrl('issue-a'), 200);

      const stats = await orchestrator.runBatch(['issue-a', 'x'], 2);

      expect(stats).toMatchObject({ total: 2, successful: 1, failed: 1, failedIdentifiers: ['x'] });
    });

    it('should return zero stats for an empty list', async () => {
      const stats = await orchestrator.runBatch([], 4);

      expect(stats).toMatchObject({
        total: 0,
        successful: 0,
        cached: 0,
        notFound: 0,
        failed: 0,
        cancelled: false,
      });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should reject an empty list when configured to', async () => {
      build(fastRetry, true);

      await expect(orchestrator.runBatch([], 4)).rejects.toThrow('Identifier list is empty');
    });

    it('should reject a non-positive worker count', async () => {
      await expect(orchestrator.runBatch(['issue-a'], 0)).rejects.toBeInstanceOf(BatchConfigError);
      await expect(orchestrator.runBatch(['issue-a'], 1.5)).rejects.toThrow(
        'maxWorkers must be a positive integer, got 1.5'
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should refuse a second batch while one is running', async () => {
      slowServer(20);
      const running = orchestrator.runBatch(['issue-a'], 1);

      expect(orchestrator.isRunning()).toBe(true);
      await expect(orchestrator.runBatch(['issue-b'], 1)).rejects.toThrow(
        'A batch is already running on this orchestrator'
      );
      await running;
      expect(orchestrator.isRunning()).toBe(false);
    });
  });

  describe('events', () => {
    it('should emit one itemCompleted per identifier and a final batchCompleted', async () => {
      router
        .route(fetcher.payloadUrl('issue-a'), 200)
        .route(fetcher.payloadUrl('issue-b'), 404)
        .route(fetcher.payloadUrl('issue-c'), 503, 503, 200);
      const events: ItemCompletedEvent[] = [];
      const completed = jest.fn();
      orchestrator.on('itemCompleted', event => events.push(event));
      orchestrator.on('batchCompleted', completed);

      const stats = await orchestrator.runBatch(['issue-a', 'issue-b', 'issue-c'], 3);

      const byId = new Map(events.map(event => [event.identifier, event]));
      expect(events).toHaveLength(3);
      expect(byId.get('issue-a')).toMatchObject({ outcome: 'downloaded', attempts: 1 });
      expect(byId.get('issue-b')).toMatchObject({ outcome: 'not_found', attempts: 1 });
      expect(byId.get('issue-c')).toMatchObject({ outcome: 'downloaded', attempts: 3 });
      expect(completed).toHaveBeenCalledTimes(1);
      expect(completed).toHaveBeenCalledWith(stats);
    });

    it('should finish every item when a listener throws', async () => {
      const server = slowServer(10);
      const identifiers = ['issue-a', 'issue-b', 'issue-c', 'issue-d'];
      orchestrator.once('itemCompleted', () => {
        throw new Error('progress bar broke');
      });
      const completed = jest.fn();
      orchestrator.on('batchCompleted', completed);

      const stats = await orchestrator.runBatch(identifiers, 2);

      expect(stats).toMatchObject({ total: 4, successful: 4, failed: 0, cancelled: false });
      expect(orchestrator.isRunning()).toBe(false);
      expect(server.active).toBe(0);
      expect(server.calls).toBe(4);
      expect([...cache.entries.keys()].sort()).toEqual(identifiers);
      expect(completed).toHaveBeenCalledTimes(1);
    });

    it('should carry the error message of a failed item', async () => {
      router.route(fetcher.payloadUrl('issue-403'), 403);
      const events: ItemCompletedEvent[] = [];
      orchestrator.on('itemCompleted', event => events.push(event));

      await orchestrator.runBatch(['issue-403'], 1);

      expect(events[0].outcome).toBe('failed');
      expect(events[0].error).toBe(`HTTP 403 at ${fetcher.payloadUrl('issue-403')}`);
    });
  });

  describe('cancellation', () => {
    it('should finish in-flight fetches and start no new ones', async () => {
      const server = slowServer(20);
      const identifiers = Array.from({ length: 10 }, (_, i) => `issue-${i + 200}`);
      orchestrator.once('itemCompleted', () => orchestrator.cancel());

      const stats = await orchestrator.runBatch(identifiers, 2);
      const processed = stats.successful + stats.cached + stats.notFound + stats.failed;

      expect(stats.cancelled).toBe(true);
      expect(processed).toBeGreaterThanOrEqual(1);
      expect(processed).toBeLessThan(10);
      expect(server.calls).toBe(processed);
      expect(server.active).toBe(0);
      expect(cache.entries.size).toBe(processed);
    });

    it('should not start anything when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const stats = await orchestrator.runBatch(['issue-a', 'issue-b'], 2, {
        signal: controller.signal,
      });

      expect(stats.cancelled).toBe(true);
      expect(stats.successful + stats.failed).toBe(0);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should not mark a batch cancelled when every item completed', async () => {
      router.route(fetcher.payloadUrl('issue-a'), 200);
      orchestrator.on('itemCompleted', () => orchestrator.cancel());

      const stats = await orchestrator.runBatch(['issue-a'], 1);

      expect(stats.cancelled).toBe(false);
      expect(stats.successful).toBe(1);
    });
  });

  describe('getSnapshot', () => {
    it('should expose live counters while the batch runs', async () => {
      slowServer(5);
      const snapshots: number[] = [];
      const inFlight: number[] = [];
      orchestrator.on('itemCompleted', () => {
        const snapshot = orchestrator.getSnapshot();
        snapshots.push(snapshot.successful);
        inFlight.push(snapshot.inFlight);
      });

      await orchestrator.runBatch(['issue-a', 'issue-b', 'issue-c', 'issue-d'], 2);

      expect(snapshots).toEqual([1, 2, 3, 4]);
      expect(Math.max(...inFlight)).toBeLessThanOrEqual(2);
      expect(orchestrator.getSnapshot()).toMatchObject({ successful: 4, inFlight: 0, pending: 0 });
    });
  });

  describe('runSearch', () => {
    it('should search the catalog and download the hits', async () => {
      const query = { collection: 'pub_test-gazette', limit: 10 };
      router
        .route(
          searcher.buildUrl(query),
          searchBody([
            { identifier: 'issue-b', date: '1920-01-02' },
            { identifier: 'issue-a', date: '1920-01-01' },
          ])
        )
        .route(fetcher.payloadUrl('issue-a'), 200)
        .route(fetcher.payloadUrl('issue-b'), 404);

      const stats = await orchestrator.runSearch(query, 4);

      expect(stats).toMatchObject({ total: 2, successful: 1, notFound: 1, failed: 0 });
    });
  });
});
