import { RequestInfo, Response } from 'node-fetch';
import { ItemCache } from '../harvester/archive/FileItemCache';
import { RateLimitConfig } from '../types';
import { RetryPolicy } from '../utils/retry';
import { CacheEntryExistsError } from '../utils/errors';

export const TEST_BASE_URL = 'https://archive.test';

export const fastRetry: RetryPolicy = { maxRetries: 3, baseDelayMs: 1, backoffFactor: 2 };

export const generousRateLimit: RateLimitConfig = { requestsPerPeriod: 10000, periodSeconds: 1 };

/**
 * In-process cache stand-in. A write with `failWrites` set leaves half of the
 * payload behind before throwing, like a torn write would.
 */
export class MemoryItemCache implements ItemCache {
  readonly entries = new Map<string, Buffer>();
  readonly deleted: string[] = [];
  failWrites = false;

  async exists(identifier: string): Promise<boolean> {
    return this.entries.has(identifier);
  }

  async read(identifier: string): Promise<Buffer | null> {
    return this.entries.get(identifier) ?? null;
  }

  async write(identifier: string, data: Buffer): Promise<void> {
    if (this.entries.has(identifier)) {
      throw new CacheEntryExistsError(identifier);
    }
    if (this.failWrites) {
      this.entries.set(identifier, data.subarray(0, Math.floor(data.length / 2)));
      throw new Error('disk full');
    }
    this.entries.set(identifier, data);
  }

  async delete(identifier: string): Promise<void> {
    this.deleted.push(identifier);
    this.entries.delete(identifier);
  }

  entryPath(identifier: string): string {
    return `memory://${identifier}`;
  }
}

export type Reply = number | { status: number; body: string } | Error;

function urlOf(input: RequestInfo): string {
  if (typeof input === 'string') {
    return input;
  }
  return 'href' in input ? input.href : input.url;
}

function toResponse(reply: number | { status: number; body: string }): Response {
  if (typeof reply === 'number') {
    return new Response(reply === 200 ? 'OCR text' : `HTTP ${reply}`, { status: reply });
  }
  return new Response(reply.body, { status: reply.status });
}

/**
 * Serves scripted replies per URL. Each request takes the next reply for its
 * URL; the last one repeats once the script runs out. Unknown URLs reject.
 */
export class FetchRouter {
  private readonly scripts = new Map<string, Reply[]>();
  private readonly counts = new Map<string, number>();

  route(url: string, ...replies: Reply[]): this {
    this.scripts.set(url, replies);
    return this;
  }

  callsTo(url: string): number {
    return this.counts.get(url) ?? 0;
  }

  readonly handler = async (input: RequestInfo): Promise<Response> => {
    const url = urlOf(input);
    const script = this.scripts.get(url);
    if (!script || script.length === 0) {
      throw new Error(`Unexpected request to ${url}`);
    }

    const count = this.counts.get(url) ?? 0;
    this.counts.set(url, count + 1);
    const reply = script[Math.min(count, script.length - 1)];
    if (reply instanceof Error) {
      throw reply;
    }
    return toResponse(reply);
  };
}

export function searchBody(docs: unknown[]): { status: number; body: string } {
  return { status: 200, body: JSON.stringify({ response: { numFound: docs.length, docs } }) };
}
