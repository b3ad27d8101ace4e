import type { DateRange } from '../models/structures';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** True for a real calendar date written as YYYY-MM-DD (rejects 2024-02-30). */
export function isCalendarDate(value: string): boolean {
  const match = DATE_RE.exec(value);
  if (!match) return false;

  const [, y, m, d] = match;
  const date = new Date(Date.UTC(2000, Number(m) - 1, Number(d)));
  // Date.UTC reads years 0-99 as 1900-1999
  date.setUTCFullYear(Number(y), Number(m) - 1, Number(d));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/** True for a 24-hour clock time written as HH:MM. */
export function isClockTime(value: string): boolean {
  return TIME_RE.test(value);
}

// Zero-padded ISO dates and times order lexicographically
export function compareDates(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareTimes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Inclusive interval intersection: the two ranges share at least one day.
 */
export function rangesOverlap(a: DateRange, b: DateRange): boolean {
  return compareDates(a.startDate, b.endDate) <= 0 && compareDates(a.endDate, b.startDate) >= 0;
}
