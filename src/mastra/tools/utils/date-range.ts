import type { DateRange } from '../../../types/collaborators.js';

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parse a `YYYY-MM-DD` string as a UTC midnight Date.
 * Returns null for anything malformed or out of range (e.g. `2026-02-30`).
 */
export function parseIsoDate(value: string): Date | null {
  if (!ISO_DATE_PATTERN.test(value)) return null;
  const [year, month, day] = value.split('-').map(Number);
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d;
}

export function toIsoDate(d: Date): string {
  return d.toISOString().split('T')[0];
}

export function addDays(isoDate: string, days: number): string {
  const d = parseIsoDate(isoDate);
  if (!d) throw new RangeError(`Invalid date: ${isoDate}`);
  return toIsoDate(new Date(d.getTime() + days * DAY_MS));
}

/**
 * Clip a range to `[today, today + horizonDays - 1]`.
 * Returns null when nothing of the range falls inside the horizon.
 */
export function trimToHorizon(range: DateRange, horizonDays: number, now: Date = new Date()): DateRange | null {
  const today = toIsoDate(now);
  const lastDay = addDays(today, horizonDays - 1);
  const start = range.start < today ? today : range.start;
  const end = range.end > lastDay ? lastDay : range.end;
  if (start > end) return null;
  return { start, end };
}
