#!/usr/bin/env node
import dotenv from 'dotenv';
import { ConfigManager } from './config/configManager';
import {
  createHarvester,
  loadIssuesFile,
  saveIssuesFile,
  Harvester,
  BatchStats,
  CollectionReport,
  SegmentStats,
} from './harvester/archive';
import { HarvesterConfig } from './types';
import { logger, isLogLevelName } from './utils/logger';
import { HarvesterError, describeError } from './utils/errors';
import { ParsedArgs, UsageError, getInteger, getString, hasFlag, parseArgs } from './utils/args';

const USAGE = `Usage:
  archive-harvest search <collection> [--start-date YYYY-MM-DD --end-date YYYY-MM-DD] [--limit N] [--check-ocr] [--output issues.json]
  archive-harvest download <collection> [--start-year Y --end-year Y | --start-date D --end-date D | --all] [--limit N] [--max-workers N]
  archive-harvest fetch [identifier...] [--issues-file issues.json] [--max-workers N]
  archive-harvest clear-cache [--older-than-days N]

Global options:
  --config <path>      config file (default ./config.json)
  --cache-dir <dir>    override the cache directory
  --log-level <level>  debug | info | warn | error`;

async function loadConfig(args: ParsedArgs): Promise<HarvesterConfig> {
  const configManager = new ConfigManager(getString(args, 'config'));
  await configManager.loadConfig();
  configManager.applyEnvOverrides(process.env);

  const cacheDir = getString(args, 'cache-dir');
  if (cacheDir) configManager.setCacheDir(cacheDir);

  const maxWorkers = getInteger(args, 'max-workers');
  if (maxWorkers !== undefined) configManager.setMaxWorkers(maxWorkers);

  const logLevel = getString(args, 'log-level');
  if (logLevel !== undefined) {
    if (!isLogLevelName(logLevel)) {
      throw new UsageError(`Invalid --log-level: ${logLevel}`);
    }
    configManager.updateConfig({ logLevel });
  }

  const { valid, errors } = configManager.validateConfig();
  if (!valid) {
    throw new UsageError(`Invalid configuration:\n  ${errors.join('\n  ')}`);
  }
  return configManager.getConfig();
}

function requireCollection(args: ParsedArgs): string {
  const [collection] = args.positionals;
  if (!collection) {
    throw new UsageError(`${args.command} needs a collection identifier`);
  }
  return collection;
}

function showProgress(harvester: Harvester): void {
  let completed = 0;
  let total = 0;
  harvester.orchestrator.on('batchStarted', info => {
    completed = 0;
    total = info.total;
  });
  harvester.orchestrator.on('itemCompleted', event => {
    completed++;
    logger.progress('issues', completed, total);
    if (event.outcome === 'failed') {
      logger.debug(`${event.identifier} failed after ${event.attempts} attempts: ${event.error}`);
    }
  });
}

function printBatchStats(stats: BatchStats): void {
  logger.section(stats.cancelled ? 'Batch cancelled' : 'Batch complete');
  logger.stats({
    Total: stats.total,
    Downloaded: stats.successful,
    Cached: stats.cached,
    'No OCR': stats.notFound,
    Failed: stats.failed,
    Duration: `${(stats.durationMs / 1000).toFixed(1)}s`,
  });
  if (stats.failedIdentifiers.length > 0) {
    logger.warn(`Failed identifiers (re-run to retry): ${stats.failedIdentifiers.join(', ')}`);
  }
}

function printReport(report: CollectionReport): void {
  logger.section(`Collection ${report.collection}${report.cancelled ? ' (cancelled)' : ''}`);
  for (const segment of report.segments) {
    const note = segment.error ? ` [search failed: ${segment.error}]` : '';
    logger.item(
      `${segment.label}: ${segment.found} found, ${segment.successful} downloaded, ${segment.cached} cached, ${segment.notFound} no OCR, ${segment.failed} failed${note}`
    );
  }
  logger.stats({
    Found: report.totals.found,
    Downloaded: report.totals.successful,
    Cached: report.totals.cached,
    'No OCR': report.totals.notFound,
    Failed: report.totals.failed,
    Duration: `${(report.durationMs / 1000).toFixed(1)}s`,
  });
}

function dateRangeFrom(args: ParsedArgs): { from: string; to: string } | undefined {
  const from = getString(args, 'start-date');
  const to = getString(args, 'end-date');
  if (from === undefined && to === undefined) {
    return undefined;
  }
  if (from === undefined || to === undefined) {
    throw new UsageError('--start-date and --end-date must be given together');
  }
  return { from, to };
}

async function runSearch(harvester: Harvester, args: ParsedArgs): Promise<number> {
  const query = {
    collection: requireCollection(args),
    dateRange: dateRangeFrom(args),
    limit: getInteger(args, 'limit') ?? harvester.config.searchLimit,
  };
  const identifiers = hasFlag(args, 'check-ocr')
    ? await harvester.searcher.findAvailable(query)
    : await harvester.searcher.search(query);

  const output = getString(args, 'output');
  if (output) {
    await saveIssuesFile(output, identifiers);
    logger.success(`Wrote ${identifiers.length} identifiers to ${output}`);
    return 0;
  }
  for (const identifier of identifiers) {
    console.log(identifier);
  }
  return 0;
}

async function runDownload(harvester: Harvester, args: ParsedArgs): Promise<number> {
  const collection = requireCollection(args);
  const downloader = harvester.collection(collection);
  const limit = getInteger(args, 'limit');
  const startYear = getInteger(args, 'start-year');
  const endYear = getInteger(args, 'end-year');
  const dateRange = dateRangeFrom(args);

  process.once('SIGINT', () => downloader.cancel());
  showProgress(harvester);
  logger.header(`Downloading ${collection}`);

  let report: CollectionReport;
  if (startYear !== undefined || endYear !== undefined) {
    if (startYear === undefined || endYear === undefined) {
      throw new UsageError('--start-year and --end-year must be given together');
    }
    report = await downloader.downloadYearRange(startYear, endYear);
  } else {
    const startedAt = new Date();
    let segment: SegmentStats;
    if (dateRange) {
      segment = await downloader.downloadDateRange(dateRange.from, dateRange.to, limit);
    } else if (hasFlag(args, 'all')) {
      segment = await downloader.downloadAll(limit);
    } else {
      throw new UsageError('download needs --start-year/--end-year, --start-date/--end-date or --all');
    }
    report = downloader.toReport(startedAt, segment);
  }

  printReport(report);
  await downloader.saveReport(report);
  return report.totals.failed > 0 || report.segments.some(s => s.error !== undefined) ? 1 : 0;
}

async function runFetch(harvester: Harvester, args: ParsedArgs): Promise<number> {
  const identifiers = [...args.positionals];
  const issuesFile = getString(args, 'issues-file');
  if (issuesFile) {
    identifiers.push(...(await loadIssuesFile(issuesFile)));
  }
  if (identifiers.length === 0) {
    throw new UsageError('fetch needs at least one identifier or --issues-file');
  }
  process.once('SIGINT', () => harvester.orchestrator.cancel());
  showProgress(harvester);

  const stats = await harvester.orchestrator.runBatch(identifiers, harvester.config.maxWorkers);
  printBatchStats(stats);
  return stats.failed > 0 ? 1 : 0;
}

async function runClearCache(harvester: Harvester, args: ParsedArgs): Promise<number> {
  const olderThanDays = getInteger(args, 'older-than-days');
  const deleted = await harvester.cache.clear({ olderThanDays });
  logger.success(`Removed ${deleted} cache entries from ${harvester.cache.root}`);
  return 0;
}

async function main(): Promise<number> {
  dotenv.config();
  const args = parseArgs(process.argv.slice(2));
  if (args.command === 'help' || hasFlag(args, 'help')) {
    console.log(USAGE);
    return 0;
  }

  const config = await loadConfig(args);
  logger.setLogLevel(config.logLevel);
  const harvester = createHarvester(config);

  switch (args.command) {
    case 'search':
      return runSearch(harvester, args);
    case 'download':
      return runDownload(harvester, args);
    case 'fetch':
      return runFetch(harvester, args);
    case 'clear-cache':
      return runClearCache(harvester, args);
  }
}

process.on('unhandledRejection', error => {
  logger.error('Unhandled rejection:', error);
  process.exit(1);
});

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    if (error instanceof UsageError) {
      logger.error(error.message);
      console.log(USAGE);
    } else if (error instanceof HarvesterError) {
      logger.error(`${error.code}: ${error.message}`);
    } else {
      logger.error(`Harvest failed: ${describeError(error)}`);
    }
    process.exitCode = 1;
  });
