import path from 'path';
import { HarvesterConfig, PartialHarvesterConfig } from '../types';
import { defaultConfig, ENV_KEYS } from './default';
import { FileUtils } from '../utils/fileUtils';
import { logger, isLogLevelName } from '../utils/logger';

export class ConfigManager {
  private config: HarvesterConfig;
  private configPath: string;

  constructor(configPath?: string) {
    this.config = mergeConfigs(defaultConfig, {});
    this.configPath = configPath || path.join(process.cwd(), 'config.json');
  }

  async loadConfig(): Promise<HarvesterConfig> {
    const existingConfig = await FileUtils.readJSON<PartialHarvesterConfig>(this.configPath);

    if (existingConfig) {
      this.config = mergeConfigs(defaultConfig, existingConfig);
      logger.debug(`Loaded configuration from ${this.configPath}`);
    } else {
      logger.debug('No configuration file found, using default config');
    }

    return this.config;
  }

  async saveConfig(): Promise<void> {
    await FileUtils.writeJSON(this.configPath, this.config);
    logger.info(`Configuration saved to ${this.configPath}`);
  }

  getConfig(): HarvesterConfig {
    return this.config;
  }

  updateConfig(updates: PartialHarvesterConfig): void {
    this.config = mergeConfigs(this.config, updates);
  }

  /**
   * Applies HARVESTER_* variables on top of the loaded config. Unparseable
   * numbers are ignored with a warning.
   */
  applyEnvOverrides(env: NodeJS.ProcessEnv = process.env): HarvesterConfig {
    const updates: PartialHarvesterConfig = {};

    const cacheDir = env[ENV_KEYS.CACHE_DIR];
    if (cacheDir) updates.cacheDir = cacheDir;

    const baseUrl = env[ENV_KEYS.BASE_URL];
    if (baseUrl) updates.archive = { baseUrl };

    const maxWorkers = readNumber(env, ENV_KEYS.MAX_WORKERS);
    if (maxWorkers !== undefined) updates.maxWorkers = maxWorkers;

    const requestTimeoutMs = readNumber(env, ENV_KEYS.TIMEOUT_MS);
    if (requestTimeoutMs !== undefined) updates.requestTimeoutMs = requestTimeoutMs;

    const requestsPerPeriod = readNumber(env, ENV_KEYS.RATE_LIMIT);
    const periodSeconds = readNumber(env, ENV_KEYS.RATE_PERIOD);
    if (requestsPerPeriod !== undefined) {
      updates.rateLimit = { ...updates.rateLimit, requestsPerPeriod };
    }
    if (periodSeconds !== undefined) {
      updates.rateLimit = { ...updates.rateLimit, periodSeconds };
    }

    const maxRetries = readNumber(env, ENV_KEYS.MAX_RETRIES);
    if (maxRetries !== undefined) updates.retry = { maxRetries };

    const logLevel = env[ENV_KEYS.LOG_LEVEL]?.trim().toLowerCase();
    if (logLevel) {
      if (isLogLevelName(logLevel)) {
        updates.logLevel = logLevel;
      } else {
        logger.warn(`Ignoring ${ENV_KEYS.LOG_LEVEL}=${logLevel}: expected debug, info, warn or error`);
      }
    }

    this.updateConfig(updates);
    return this.config;
  }

  setCacheDir(dir: string): void {
    this.config.cacheDir = dir;
  }

  setMaxWorkers(maxWorkers: number): void {
    this.config.maxWorkers = maxWorkers;
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { config } = this;

    if (!config.cacheDir || config.cacheDir.trim() === '') {
      errors.push('Cache directory is required');
    }
    if (!config.archive.baseUrl) {
      errors.push('Archive base URL is required');
    }
    if (!Number.isInteger(config.maxWorkers) || config.maxWorkers < 1) {
      errors.push('maxWorkers must be a positive integer');
    }
    if (!Number.isInteger(config.searchLimit) || config.searchLimit < 1) {
      errors.push('searchLimit must be a positive integer');
    }
    if (!Number.isInteger(config.rateLimit.requestsPerPeriod) || config.rateLimit.requestsPerPeriod < 1) {
      errors.push('rateLimit.requestsPerPeriod must be a positive integer');
    }
    if (!(config.rateLimit.periodSeconds > 0)) {
      errors.push('rateLimit.periodSeconds must be greater than 0');
    }
    if (!Number.isInteger(config.retry.maxRetries) || config.retry.maxRetries < 0) {
      errors.push('retry.maxRetries must be a non-negative integer');
    }
    if (config.retry.baseDelayMs < 0) {
      errors.push('retry.baseDelayMs must not be negative');
    }
    if (config.retry.backoffFactor < 1) {
      errors.push('retry.backoffFactor must be at least 1');
    }
    if (!(config.requestTimeoutMs > 0)) {
      errors.push('requestTimeoutMs must be greater than 0');
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    logger.warn(`Ignoring ${key}=${raw}: not a number`);
    return undefined;
  }
  return value;
}

export function mergeConfigs(base: HarvesterConfig, updates: PartialHarvesterConfig): HarvesterConfig {
  const { archive, cache, rateLimit, retry, ...primitives } = updates;

  return {
    ...base,
    ...primitives,
    archive: { ...base.archive, ...archive },
    cache: { ...base.cache, ...cache },
    rateLimit: { ...base.rateLimit, ...rateLimit },
    retry: { ...base.retry, ...retry },
  };
}
