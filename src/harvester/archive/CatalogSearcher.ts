import fetch, { Response } from 'node-fetch';
import { logger } from '../../utils/logger';
import {
  HttpStatusError,
  RateLimitError,
  TransientNetworkError,
  ValidationError,
  describeError,
} from '../../utils/errors';
import { RetryPolicy, withRetry } from '../../utils/retry';
import { validateDateRange } from '../../utils/dates';
import { RateLimiter } from './RateLimiter';
import { validateIdentifier } from './ItemFetcher';
import { CatalogQuery, SearchDoc } from './types';

export interface CatalogSearcherOptions {
  baseUrl: string;
  mediaType: string;
  /** Suffix of the OCR file the availability check looks for. */
  payloadSuffix: string;
  userAgent: string;
  requestTimeoutMs: number;
  retry: RetryPolicy;
}

interface SearchResponse {
  response: {
    docs: unknown[];
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSearchResponse(value: unknown): value is SearchResponse {
  return isRecord(value) && isRecord(value.response) && Array.isArray(value.response.docs);
}

// `/metadata/<id>/files` answers `{}` for unknown items.
function fileNames(value: unknown): string[] {
  if (!isRecord(value) || !Array.isArray(value.result)) {
    return [];
  }
  const names: string[] = [];
  for (const file of value.result) {
    if (isRecord(file) && typeof file.name === 'string') {
      names.push(file.name);
    }
  }
  return names;
}

function toSearchDoc(value: unknown): SearchDoc | null {
  if (!isRecord(value) || typeof value.identifier !== 'string' || value.identifier === '') {
    return null;
  }
  return {
    identifier: value.identifier,
    date: typeof value.date === 'string' ? value.date : undefined,
  };
}

/**
 * Ascending by date; undated records last; identifier breaks ties so repeated
 * searches over an unchanged catalog return the same order.
 */
export function compareSearchDocs(a: SearchDoc, b: SearchDoc): number {
  if (a.date !== b.date) {
    if (a.date === undefined) return 1;
    if (b.date === undefined) return -1;
    return a.date < b.date ? -1 : 1;
  }
  if (a.identifier === b.identifier) return 0;
  return a.identifier < b.identifier ? -1 : 1;
}

export class CatalogSearcher {
  constructor(
    private readonly rateLimiter: RateLimiter,
    private readonly options: CatalogSearcherOptions
  ) {}

  buildQuery(query: Pick<CatalogQuery, 'collection' | 'dateRange'>): string {
    const components = [`collection:(${query.collection})`, `mediatype:(${this.options.mediaType})`];
    if (query.dateRange) {
      components.push(`date:[${query.dateRange.from} TO ${query.dateRange.to}]`);
    }
    return components.join(' AND ');
  }

  buildUrl(query: CatalogQuery): string {
    const params = new URLSearchParams();
    params.append('q', this.buildQuery(query));
    params.append('fl[]', 'identifier');
    params.append('fl[]', 'date');
    params.append('rows', String(query.limit));
    params.append('page', '1');
    params.append('output', 'json');
    params.append('sort[]', 'date asc');

    const base = this.options.baseUrl.replace(/\/+$/, '');
    return `${base}/advancedsearch.php?${params.toString()}`;
  }

  async search(query: CatalogQuery): Promise<string[]> {
    this.validateQuery(query);
    const url = this.buildUrl(query);
    logger.debug(`Searching archive.org: ${url}`);

    const docs = await withRetry(
      async () => {
        await this.rateLimiter.wait();
        return this.request(url);
      },
      this.options.retry,
      {
        onRetry: (error, attempt, delayMs) =>
          logger.warn(
            `Search attempt ${attempt} for ${query.collection} failed: ${describeError(error)}. Retrying in ${delayMs}ms...`
          ),
      }
    );

    const seen = new Set<string>();
    const identifiers = docs
      .sort(compareSearchDocs)
      .filter(doc => {
        if (seen.has(doc.identifier)) return false;
        seen.add(doc.identifier);
        return true;
      })
      .slice(0, query.limit)
      .map(doc => doc.identifier);

    logger.info(`Found ${identifiers.length} issues for collection ${query.collection}`);
    return identifiers;
  }

  metadataUrl(identifier: string): string {
    const base = this.options.baseUrl.replace(/\/+$/, '');
    return `${base}/metadata/${encodeURIComponent(identifier)}/files`;
  }

  /**
   * Whether the item's file listing contains its OCR text file. An item whose
   * listing cannot be read counts as unavailable.
   */
  async checkAvailability(identifier: string): Promise<boolean> {
    validateIdentifier(identifier);
    const url = this.metadataUrl(identifier);

    let names: string[];
    try {
      names = await withRetry(
        async () => {
          await this.rateLimiter.wait();
          return fileNames(await this.getJson(url, 'File listing'));
        },
        this.options.retry,
        { label: `File listing for ${identifier}` }
      );
    } catch (error) {
      logger.warn(`Failed to get file listing for ${identifier}: ${describeError(error)}`);
      return false;
    }

    const available = names.includes(`${identifier}${this.options.payloadSuffix}`);
    logger.debug(`${identifier}: ${available ? 'OCR text available' : 'no OCR text'}`);
    return available;
  }

  /** `search`, keeping only the hits whose OCR text file exists. */
  async findAvailable(query: CatalogQuery): Promise<string[]> {
    const identifiers = await this.search(query);
    if (identifiers.length === 0) {
      return [];
    }

    logger.info(`Checking OCR availability for ${identifiers.length} issues...`);
    const available: string[] = [];
    for (const identifier of identifiers) {
      if (await this.checkAvailability(identifier)) {
        available.push(identifier);
      }
    }

    logger.info(`${available.length} of ${identifiers.length} issues have OCR text`);
    return available;
  }

  private validateQuery(query: CatalogQuery): void {
    if (query.collection.trim() === '') {
      throw new ValidationError('Collection must not be empty');
    }
    validateIdentifier(query.collection, 'Collection');
    if (!Number.isInteger(query.limit) || query.limit < 1) {
      throw new ValidationError(`Search limit must be a positive integer, got ${query.limit}`);
    }
    if (query.dateRange) {
      validateDateRange(query.dateRange);
    }
  }

  private async request(url: string): Promise<SearchDoc[]> {
    const body = await this.getJson(url, 'Search');
    if (!isSearchResponse(body)) {
      throw new TransientNetworkError('Malformed search response: missing response.docs');
    }

    const docs: SearchDoc[] = [];
    for (const raw of body.response.docs) {
      const doc = toSearchDoc(raw);
      if (doc) {
        docs.push(doc);
      }
    }
    return docs;
  }

  /** One GET, classified: 429 and 5xx retry, other statuses do not. */
  private async getJson(url: string, label: string): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.requestTimeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          signal: controller.signal,
          headers: {
            'User-Agent': this.options.userAgent,
            Accept: 'application/json',
          },
        });
      } catch (error) {
        throw new TransientNetworkError(`${label} request failed: ${describeError(error)}`, {
          cause: error,
        });
      }

      if (response.status === 429) {
        throw new RateLimitError(url);
      }
      if (response.status >= 500) {
        throw new TransientNetworkError(`${label} failed: HTTP ${response.status}`, {
          status: response.status,
        });
      }
      if (response.status !== 200) {
        throw new HttpStatusError(response.status, url);
      }

      try {
        return await response.json();
      } catch (error) {
        throw new TransientNetworkError(
          `Malformed ${label.toLowerCase()} response: ${describeError(error)}`,
          { cause: error }
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}
