/**
 * Calendar date parsing for raw sales rows. All dates are UTC calendar days.
 */

import type { RawValue } from './types';

export interface CalendarDay {
  /** YYYY-MM-DD */
  iso: string;
  timestamp: number;
  year: number;
  month: number;
  day: number;
}

const ISO_DATE = /^(\d{4})-(\d{1,2})(?:-(\d{1,2}))?(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const SLASH_DATE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/;

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}

function fromParts(year: number, month: number, day: number): CalendarDay | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const timestamp = Date.UTC(year, month - 1, day);
  const check = new Date(timestamp);
  // Rejects rollovers such as 2022-02-30 -> 2022-03-02
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return {
    iso: `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`,
    timestamp,
    year,
    month,
    day,
  };
}

function fromTimestamp(ms: number): CalendarDay | null {
  if (!Number.isFinite(ms)) return null;
  const d = new Date(ms);
  if (Number.isNaN(d.getTime())) return null;
  return fromParts(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
}

/**
 * Parse a raw cell into a calendar day, or null when it is not a date.
 *
 * Accepts Date instances, epoch-ms numbers, `YYYY-MM-DD`, `YYYY-MM` (first of
 * the month), `YYYY/MM/DD` and ISO date-times (the time part is discarded).
 */
export function parseCalendarDay(value: RawValue): CalendarDay | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return fromTimestamp(value.getTime());
  if (typeof value === 'number') return fromTimestamp(value);

  const text = value.trim();
  if (text.length === 0) return null;

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return fromParts(Number(iso[1]), Number(iso[2]), iso[3] === undefined ? 1 : Number(iso[3]));
  }

  const slash = SLASH_DATE.exec(text);
  if (slash) {
    return fromParts(Number(slash[1]), Number(slash[2]), Number(slash[3]));
  }

  return null;
}

export function quarterOf(month: number): number {
  return Math.floor((month - 1) / 3) + 1;
}
