import path from 'path';
import { DateRange } from '../../types';
import { logger } from '../../utils/logger';
import { FileUtils } from '../../utils/fileUtils';
import { ValidationError, describeError } from '../../utils/errors';
import { fileTimestamp, validateDateRange, yearRange } from '../../utils/dates';
import { BatchOrchestrator } from './BatchOrchestrator';
import { CatalogSearcher } from './CatalogSearcher';
import { CollectionReport, SegmentStats } from './types';

export interface CollectionDownloaderOptions {
  maxWorkers: number;
  searchLimit: number;
  reportDir: string;
}

/**
 * Downloads a whole collection segment by segment (per year, per date range
 * or in one go), searching first and then running a batch over the hits.
 */
export class CollectionDownloader {
  private cancelled = false;

  constructor(
    private readonly collection: string,
    private readonly searcher: CatalogSearcher,
    private readonly orchestrator: BatchOrchestrator,
    private readonly options: CollectionDownloaderOptions
  ) {}

  async downloadYear(year: number): Promise<SegmentStats> {
    return this.downloadSegment(String(year), yearRange(year), this.options.searchLimit);
  }

  async downloadDateRange(from: string, to: string, limit?: number): Promise<SegmentStats> {
    const range: DateRange = { from, to };
    validateDateRange(range);
    return this.downloadSegment(`${from}..${to}`, range, limit ?? this.options.searchLimit);
  }

  async downloadAll(limit?: number): Promise<SegmentStats> {
    return this.downloadSegment('all', undefined, limit ?? this.options.searchLimit);
  }

  async downloadYearRange(startYear: number, endYear: number): Promise<CollectionReport> {
    if (startYear > endYear) {
      throw new ValidationError(`Start year ${startYear} is after end year ${endYear}`);
    }
    // Validates both bounds before any request goes out.
    yearRange(startYear);
    yearRange(endYear);

    const totalYears = endYear - startYear + 1;
    logger.section(`${this.collection}: ${startYear}-${endYear} (${totalYears} years)`);

    const startedAt = new Date();
    const segments: SegmentStats[] = [];

    for (let year = startYear; year <= endYear; year++) {
      if (this.cancelled) {
        logger.warn(`Stopping before ${year}: download cancelled`);
        break;
      }

      segments.push(await this.downloadYear(year));

      const completed = year - startYear + 1;
      const elapsedMs = Date.now() - startedAt.getTime();
      const remainingMin = ((elapsedMs / completed) * (endYear - year)) / 60000;
      logger.info(
        `Progress: ${completed}/${totalYears} years completed. Estimated ${remainingMin.toFixed(1)} minutes remaining.`
      );
    }

    return this.buildReport(startedAt, segments);
  }

  /** Wraps a single segment in a report, for the date-range and all modes. */
  toReport(startedAt: Date, segment: SegmentStats): CollectionReport {
    return this.buildReport(startedAt, [segment]);
  }

  async saveReport(report: CollectionReport): Promise<string> {
    const fileName = `${FileUtils.sanitizeFilename(report.collection)}-${fileTimestamp(new Date(report.finishedAt))}.json`;
    const reportPath = path.join(this.options.reportDir, fileName);
    await FileUtils.writeJSON(reportPath, report);
    logger.info(`Report saved to ${reportPath}`);
    return reportPath;
  }

  /** Stops after the current segment and cancels its batch cooperatively. */
  cancel(): void {
    this.cancelled = true;
    this.orchestrator.cancel();
  }

  private async downloadSegment(
    label: string,
    dateRange: DateRange | undefined,
    limit: number
  ): Promise<SegmentStats> {
    const segmentStart = Date.now();
    const segment: SegmentStats = {
      label,
      dateRange,
      found: 0,
      successful: 0,
      cached: 0,
      notFound: 0,
      failed: 0,
      durationMs: 0,
      cancelled: false,
    };

    logger.info(`Starting download for ${label}`);

    let identifiers: string[];
    try {
      identifiers = await this.searcher.search({ collection: this.collection, dateRange, limit });
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      segment.error = describeError(error);
      segment.durationMs = Date.now() - segmentStart;
      logger.error(`Search for ${label} failed: ${segment.error}`);
      return segment;
    }

    segment.found = identifiers.length;
    if (identifiers.length === 0) {
      logger.warn(`No issues found for ${label}`);
      segment.durationMs = Date.now() - segmentStart;
      return segment;
    }

    if (this.cancelled) {
      segment.cancelled = true;
      segment.durationMs = Date.now() - segmentStart;
      return segment;
    }

    logger.info(`Found ${identifiers.length} issues for ${label}, starting batch download`);
    const stats = await this.orchestrator.runBatch(identifiers, this.options.maxWorkers);

    segment.successful = stats.successful;
    segment.cached = stats.cached;
    segment.notFound = stats.notFound;
    segment.failed = stats.failed;
    segment.cancelled = stats.cancelled;
    segment.durationMs = Date.now() - segmentStart;

    logger.info(
      `Completed ${label} in ${(segment.durationMs / 1000).toFixed(1)}s: ` +
        `${segment.successful} downloaded, ${segment.cached} cached, ` +
        `${segment.notFound} no OCR, ${segment.failed} failed`
    );
    return segment;
  }

  private buildReport(startedAt: Date, segments: SegmentStats[]): CollectionReport {
    const finishedAt = new Date();
    const totals = { found: 0, successful: 0, cached: 0, notFound: 0, failed: 0 };
    for (const segment of segments) {
      totals.found += segment.found;
      totals.successful += segment.successful;
      totals.cached += segment.cached;
      totals.notFound += segment.notFound;
      totals.failed += segment.failed;
    }

    return {
      collection: this.collection,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      segments,
      totals,
      cancelled: this.cancelled || segments.some(segment => segment.cancelled),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  }
}
