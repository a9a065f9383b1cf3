import { DateRange } from '../../types';

export type FetchOutcome = 'downloaded' | 'cached' | 'not_found' | 'failed';

export interface FetchResult {
  identifier: string;
  outcome: FetchOutcome;
  /** HTTP requests issued for this identifier (0 when cached or invalid). */
  attempts: number;
  durationMs: number;
  error?: Error;
  /** Cache location, for `downloaded` and `cached` outcomes. */
  path?: string;
}

/** Emitted once per identifier when it reaches a terminal outcome. */
export interface ItemCompletedEvent {
  identifier: string;
  outcome: FetchOutcome;
  attempts: number;
  durationMs: number;
  error?: string;
}

export interface CatalogQuery {
  collection: string;
  dateRange?: DateRange;
  limit: number;
}

/** One record of the advancedsearch.php JSON response. */
export interface SearchDoc {
  identifier: string;
  date?: string;
}

export interface BatchStats {
  total: number;
  successful: number;
  cached: number;
  notFound: number;
  failed: number;
  failedIdentifiers: string[];
  cancelled: boolean;
  durationMs: number;
}

export interface BatchSnapshot extends BatchStats {
  inFlight: number;
  pending: number;
}

export interface RunBatchOptions {
  signal?: AbortSignal;
}

export interface SegmentStats {
  label: string;
  dateRange?: DateRange;
  found: number;
  successful: number;
  cached: number;
  notFound: number;
  failed: number;
  durationMs: number;
  cancelled: boolean;
  error?: string;
}

export interface CollectionReport {
  collection: string;
  startedAt: string;
  finishedAt: string;
  segments: SegmentStats[];
  totals: {
    found: number;
    successful: number;
    cached: number;
    notFound: number;
    failed: number;
  };
  cancelled: boolean;
  durationMs: number;
}
