import { z } from 'zod';
import { ValidationError } from './errors';
import type { DateWindow } from './types';

export const DEFAULT_HISTORY_YEARS = 5;

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
// Calendar date with an optional time of day and zone, as AWDB writes them
const ISO_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// Parse exactly YYYY-MM-DD as a UTC timestamp in milliseconds. Returns null
// for anything else, including rollovers such as 2023-02-30.
export function parseIsoDate(value: string): number | null {
  const match = value.match(ISO_DATE);
  if (!match) return null;
  const [, year, month, day] = match;
  const ms = Date.UTC(parseInt(year, 10), parseInt(month, 10) - 1, parseInt(day, 10));
  return formatIsoDate(new Date(ms)) === value ? ms : null;
}

// Calendar day of an observation timestamp; the time of day is dropped
export function parseObservationDate(value: string): { date: string; ms: number } | null {
  const match = value.trim().match(ISO_DATE_TIME);
  if (!match) return null;
  const ms = parseIsoDate(match[1]);
  return ms === null ? null : { date: match[1], ms };
}

// History window ending today (UTC). Years are counted as 365 days.
export function historyWindow(
  years: number = DEFAULT_HISTORY_YEARS,
  now: number = Date.now()
): DateWindow {
  if (!Number.isInteger(years) || years < 1) {
    throw new ValidationError('Invalid history window', [`years must be a positive integer, got ${years}`]);
  }
  const end = new Date(now);
  const begin = new Date(now - years * 365 * DAY_MS);
  return Object.freeze({ begin: formatIsoDate(begin), end: formatIsoDate(end) });
}

const DateWindowSchema = z
  .object({
    begin: z.string().refine((s) => parseIsoDate(s) !== null, 'expected YYYY-MM-DD'),
    end: z.string().refine((s) => parseIsoDate(s) !== null, 'expected YYYY-MM-DD'),
  })
  .refine(
    (w) => {
      const begin = parseIsoDate(w.begin);
      const end = parseIsoDate(w.end);
      return begin === null || end === null || begin <= end;
    },
    { message: 'begin must not be after end' }
  );

export function assertWindow(value: unknown): DateWindow {
  const parsed = DateWindowSchema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZod('Invalid date window', parsed.error);
  }
  return Object.freeze({ begin: parsed.data.begin, end: parsed.data.end });
}

export function isWithinWindow(timestampMs: number, window: DateWindow): boolean {
  const begin = parseIsoDate(window.begin);
  const end = parseIsoDate(window.end);
  if (begin === null || end === null) return false;
  return timestampMs >= begin && timestampMs <= end;
}
