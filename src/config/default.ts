import { HarvesterConfig } from '../types';

export const defaultConfig: HarvesterConfig = {
  cacheDir: './cache',
  reportDir: './reports',
  archive: {
    baseUrl: 'https://archive.org',
    payloadSuffix: '_djvu.txt',
    userAgent: 'ArchiveTextHarvester/1.0',
    mediaType: 'texts',
  },
  cache: {
    extension: '.txt',
  },
  rateLimit: {
    requestsPerPeriod: 1500,
    periodSeconds: 60,
  },
  retry: {
    maxRetries: 3,
    baseDelayMs: 1000,
    backoffFactor: 2,
  },
  requestTimeoutMs: 30 * 1000,
  maxWorkers: 32,
  searchLimit: 500,
  logLevel: 'info',
};

// Environment variables read by ConfigManager.applyEnvOverrides
export const ENV_KEYS = {
  CACHE_DIR: 'HARVESTER_CACHE_DIR',
  MAX_WORKERS: 'HARVESTER_MAX_WORKERS',
  RATE_LIMIT: 'HARVESTER_RATE_LIMIT',
  RATE_PERIOD: 'HARVESTER_RATE_PERIOD',
  MAX_RETRIES: 'HARVESTER_MAX_RETRIES',
  TIMEOUT_MS: 'HARVESTER_TIMEOUT_MS',
  LOG_LEVEL: 'HARVESTER_LOG_LEVEL',
  BASE_URL: 'HARVESTER_BASE_URL',
};
