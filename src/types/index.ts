export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface DateRange {
  from: string;
  to: string;
}

export interface RateLimitConfig {
  requestsPerPeriod: number;
  periodSeconds: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
}

export interface HarvesterConfig {
  cacheDir: string;
  reportDir: string;
  archive: {
    baseUrl: string;
    payloadSuffix: string;
    userAgent: string;
    mediaType: string;
  };
  cache: {
    extension: string;
  };
  rateLimit: RateLimitConfig;
  retry: RetryConfig;
  requestTimeoutMs: number;
  maxWorkers: number;
  searchLimit: number;
  logLevel: LogLevelName;
}

export type PartialHarvesterConfig = Partial<
  Omit<HarvesterConfig, 'archive' | 'cache' | 'rateLimit' | 'retry'>
> & {
  archive?: Partial<HarvesterConfig['archive']>;
  cache?: Partial<HarvesterConfig['cache']>;
  rateLimit?: Partial<RateLimitConfig>;
  retry?: Partial<RetryConfig>;
};
