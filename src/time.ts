/**
 * Date helpers. All arithmetic is in UTC; Kanboard timestamps carry no zone.
 */

export const DAY_MS = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse an ISO-8601 timestamp or a bare YYYY-MM-DD date (UTC midnight).
 * Anything else, including an empty value, is treated as absent.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const text = DATE_ONLY.test(value) ? `${value}T00:00:00Z` : value;
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/** Format as YYYY-MM-DDTHH:MM:SSZ (second precision) */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Format as YYYY-MM-DD */
export function formatDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Fractional days from `from` to `to` (negative when `to` is earlier) */
export function daysBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / DAY_MS;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Calendar-month arithmetic; overflowing days roll into the next month */
export function addMonths(date: Date, months: number): Date {
  const next = new Date(date.getTime());
  next.setUTCMonth(next.getUTCMonth() + months);
  return next;
}

export function addYears(date: Date, years: number): Date {
  const next = new Date(date.getTime());
  next.setUTCFullYear(next.getUTCFullYear() + years);
  return next;
}

/** ISO-8601 week key, e.g. 2024-W07 */
export function isoWeekKey(date: Date): string {
  const d = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
  // Thursday of the same ISO week decides the week-year
  const weekday = d.getUTCDay() || 7;
  d.setUTCDate(d.getUTCDate() + 4 - weekday);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((d.getTime() - yearStart) / DAY_MS + 1) / 7);
  return `${d.getUTCFullYear()}-W${String(week).padStart(2, "0")}`;
}

/** Round to one decimal place */
export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}
