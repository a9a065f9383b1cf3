import { HarvesterConfig } from '../../types';
import { BatchOrchestrator } from './BatchOrchestrator';
import { CatalogSearcher } from './CatalogSearcher';
import { CollectionDownloader } from './CollectionDownloader';
import { FileItemCache } from './FileItemCache';
import { ItemFetcher } from './ItemFetcher';
import { RateLimiter } from './RateLimiter';

export interface Harvester {
  config: HarvesterConfig;
  cache: FileItemCache;
  rateLimiter: RateLimiter;
  fetcher: ItemFetcher;
  searcher: CatalogSearcher;
  orchestrator: BatchOrchestrator;
  collection(name: string): CollectionDownloader;
}

/**
 * Wires one RateLimiter and one cache handle into every component, so all
 * searches and fetches of the process share a single request budget.
 */
export function createHarvester(config: HarvesterConfig): Harvester {
  const cache = new FileItemCache(config.cacheDir, config.cache.extension);
  const rateLimiter = new RateLimiter(config.rateLimit);

  const fetcher = new ItemFetcher(cache, rateLimiter, {
    baseUrl: config.archive.baseUrl,
    payloadSuffix: config.archive.payloadSuffix,
    userAgent: config.archive.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    retry: config.retry,
  });

  const searcher = new CatalogSearcher(rateLimiter, {
    baseUrl: config.archive.baseUrl,
    mediaType: config.archive.mediaType,
    payloadSuffix: config.archive.payloadSuffix,
    userAgent: config.archive.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    retry: config.retry,
  });

  const orchestrator = new BatchOrchestrator(fetcher, searcher);

  return {
    config,
    cache,
    rateLimiter,
    fetcher,
    searcher,
    orchestrator,
    collection: (name: string) =>
      new CollectionDownloader(name, searcher, orchestrator, {
        maxWorkers: config.maxWorkers,
        searchLimit: config.searchLimit,
        reportDir: config.reportDir,
      }),
  };
}

export { BatchOrchestrator } from './BatchOrchestrator';
export type { BatchOrchestratorOptions } from './BatchOrchestrator';
export { CatalogSearcher, compareSearchDocs } from './CatalogSearcher';
export type { CatalogSearcherOptions } from './CatalogSearcher';
export { CollectionDownloader } from './CollectionDownloader';
export type { CollectionDownloaderOptions } from './CollectionDownloader';
export { FileItemCache } from './FileItemCache';
export type { ItemCache, ClearCacheOptions } from './FileItemCache';
export { ItemFetcher, IDENTIFIER_PATTERN, validateIdentifier } from './ItemFetcher';
export { loadIssuesFile, saveIssuesFile } from './issuesFile';
export type { IssuesFile } from './issuesFile';
export type { ItemFetcherOptions } from './ItemFetcher';
export { RateLimiter } from './RateLimiter';
export * from './types';
