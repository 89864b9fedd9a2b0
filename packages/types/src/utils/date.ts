import { ISO_DATE_PATTERN } from '../schemas/ledger.js';

const MS_PER_DAY = 86_400_000;

export function isValidISODate(dateStr: string): boolean {
  if (!ISO_DATE_PATTERN.test(dateStr)) return false;
  const [year, month, day] = dateStr.split('-').map((part) => parseInt(part, 10));
  if (year === undefined || month === undefined || day === undefined) return false;
  const utc = new Date(Date.UTC(year, month - 1, day));
  return utc.getUTCFullYear() === year && utc.getUTCMonth() === month - 1 && utc.getUTCDate() === day;
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}

/**
 * Whole days from `start` to `end` (both YYYY-MM-DD), computed in UTC so that
 * daylight-saving shifts never produce fractional days.
 */
export function daysBetween(start: string, end: string): number {
  return Math.round((isoToUtcMillis(end) - isoToUtcMillis(start)) / MS_PER_DAY);
}

export function toMonthKey(isoDate: string): string {
  return isoDate.slice(0, 7);
}

function isoToUtcMillis(isoDate: string): number {
  if (!isValidISODate(isoDate)) {
    throw new Error(`Invalid ISO date: ${isoDate}`);
  }
  const [year = 0, month = 1, day = 1] = isoDate.split('-').map((part) => parseInt(part, 10));
  return Date.UTC(year, month - 1, day);
}
