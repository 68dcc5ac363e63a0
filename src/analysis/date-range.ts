import { DateRange } from '../shared/types';
import { InvalidDateRangeError } from './errors';

export const DAY_MS = 86_400_000;
export const MAX_CUSTOM_RANGE_DAYS = 90;

const VALID_PERIODS = ['today', 'week', 'month'] as const;
type Period = (typeof VALID_PERIODS)[number];

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:T.*)?$/;

export interface DateRangeQuery {
  period?: string;
  start_date?: string;
  end_date?: string;
}

function isPeriod(p: string | undefined): p is Period {
  return VALID_PERIODS.some((v) => v === p);
}

function startOfUtcDay(ms: number): number {
  return Math.floor(ms / DAY_MS) * DAY_MS;
}

function parseDay(value: string, field: 'start_date' | 'end_date'): number {
  const trimmed = value.trim();
  const ms = ISO_DATE.test(trimmed) ? Date.parse(trimmed) : NaN;
  if (Number.isNaN(ms))
    throw new InvalidDateRangeError(`Failed to parse ${field}: ${value}`);
  // The day is taken as written and must exist (2025-02-31 is rejected).
  const day = trimmed.slice(0, 10);
  const dayMs = Date.parse(day);
  if (Number.isNaN(dayMs) || new Date(dayMs).toISOString().slice(0, 10) !== day)
    throw new InvalidDateRangeError(`${field} is not a calendar date: ${value}`);
  return dayMs;
}

function presetRange(period: Period, now: Date): DateRange {
  const t = now.getTime();
  switch (period) {
    case 'today': {
      const start = startOfUtcDay(t);
      return {
        start: new Date(start),
        end: new Date(start + DAY_MS),
        period_label: 'today',
        is_custom: false,
      };
    }
    case 'month':
      return {
        start: new Date(t - 30 * DAY_MS),
        end: new Date(t),
        period_label: 'month',
        is_custom: false,
      };
    case 'week':
      return {
        start: new Date(t - 7 * DAY_MS),
        end: new Date(t),
        period_label: 'week',
        is_custom: false,
      };
  }
}

function customRange(start_date: string, end_date: string): DateRange {
  const s = parseDay(start_date, 'start_date');
  const e = parseDay(end_date, 'end_date');
  if (s >= e)
    throw new InvalidDateRangeError('start_date must be before end_date');
  const start = startOfUtcDay(s);
  const end = startOfUtcDay(e) + DAY_MS;
  if ((end - start) / DAY_MS > MAX_CUSTOM_RANGE_DAYS)
    throw new InvalidDateRangeError(
      `Date range cannot exceed ${MAX_CUSTOM_RANGE_DAYS} days`,
    );
  return {
    start: new Date(start),
    end: new Date(end),
    period_label: 'custom',
    is_custom: true,
  };
}

/**
 * Resolves a period preset or an explicit pair of ISO dates into a half-open
 * UTC window `[start, end)`. Explicit dates win only when both are present;
 * an unknown period falls back to `week`.
 *
 * @throws InvalidDateRangeError for unparsable, inverted or over-long custom ranges
 */
export function parseDateRange(
  q: DateRangeQuery,
  now: Date = new Date(),
): DateRange {
  if (q.start_date && q.end_date) return customRange(q.start_date, q.end_date);
  return presetRange(isPeriod(q.period) ? q.period : 'week', now);
}

/** The window of equal length that ends where `range` starts. */
export function previousPeriodRange(range: DateRange): DateRange {
  const duration = range.end.getTime() - range.start.getTime();
  return {
    start: new Date(range.start.getTime() - duration),
    end: new Date(range.start.getTime()),
    period_label: `previous_${range.period_label}`,
    is_custom: range.is_custom,
  };
}

export function daysInRange(range: DateRange): number {
  const days = (range.end.getTime() - range.start.getTime()) / DAY_MS;
  return Math.round(days * 100) / 100;
}
