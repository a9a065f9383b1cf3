import { DateRange } from '../types';
import { ValidationError } from './errors';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for a real calendar date written as YYYY-MM-DD. */
export function isValidDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

export function validateDateRange(range: DateRange): void {
  if (!isValidDate(range.from)) {
    throw new ValidationError(`Invalid start date "${range.from}", expected YYYY-MM-DD`);
  }
  if (!isValidDate(range.to)) {
    throw new ValidationError(`Invalid end date "${range.to}", expected YYYY-MM-DD`);
  }
  if (range.from > range.to) {
    throw new ValidationError(`Start date ${range.from} is after end date ${range.to}`);
  }
}

export function yearRange(year: number): DateRange {
  if (!Number.isInteger(year) || year < 1 || year > 9999) {
    throw new ValidationError(`Invalid year: ${year}`);
  }
  const y = String(year).padStart(4, '0');
  return { from: `${y}-01-01`, to: `${y}-12-31` };
}

/** Filesystem-safe timestamp, e.g. 2024-05-01T12-30-00. */
export function fileTimestamp(date: Date = new Date()): string {
  return date.toISOString().slice(0, 19).replace(/:/g, '-');
}
