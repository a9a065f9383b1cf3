import { ConfigManager } from './config/configManager';
import { defaultConfig } from './config/default';
import { logger, Logger, LogLevel } from './utils/logger';

export { ConfigManager, defaultConfig, logger, Logger, LogLevel };

export * from './harvester/archive';
export * from './utils/errors';
export { withRetry, backoffDelay, sleep } from './utils/retry';
export type { RetryPolicy, RetryOptions } from './utils/retry';
export * from './types';
