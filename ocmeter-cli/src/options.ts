/**
 * Commander argument parsers. Each one narrows the raw string to the
 * type the report builders take, or rejects it with a usage error.
 */

import { InvalidArgumentError } from 'commander';
import type { ExportFormat, ReportKind, Timeframe, WeekStartDay } from 'ocmeter-shared';
import { isDateKey, parseMonthFilter, parseWeekStartDay, WEEKDAY_NAMES } from 'ocmeter-shared';

const TIMEFRAMES = ['daily', 'weekly', 'monthly', 'all'] as const satisfies readonly Timeframe[];
const EXPORT_FORMATS = ['csv', 'json'] as const satisfies readonly ExportFormat[];

export const EXPORT_REPORTS = ['session', 'sessions', 'daily', 'weekly', 'monthly', 'models', 'projects'] as const satisfies readonly ReportKind[];
export type ExportReport = typeof EXPORT_REPORTS[number];

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

/** Refresh interval in seconds, 1–60. */
export function parseInterval(value: string): number {
  const n = parsePositiveInt(value);
  if (n > 60) throw new InvalidArgumentError('Refresh interval cannot exceed 60 seconds.');
  return n;
}

export function parseYear(value: string): number {
  if (!/^\d{4}$/.test(value)) throw new InvalidArgumentError('Expected a four-digit year.');
  return Number(value);
}

/** `YYYY-MM`, returned unchanged once validated. */
export function parseMonth(value: string): string {
  if (!parseMonthFilter(value)) throw new InvalidArgumentError('Expected a month as YYYY-MM.');
  return value;
}

/** `YYYY-MM-DD`, returned unchanged once validated. */
export function parseDate(value: string): string {
  if (!isDateKey(value)) throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  return value;
}

export function parseTimeframe(value: string): Timeframe {
  const match = TIMEFRAMES.find(t => t === value);
  if (!match) throw new InvalidArgumentError(`Choose one of: ${TIMEFRAMES.join(', ')}.`);
  return match;
}

/**
 * Week start as 0–6 (Monday = 0) or a weekday name such as `sunday`
 * or `sun`.
 */
export function parseStartDay(value: string): WeekStartDay {
  const lower = value.trim().toLowerCase();
  const byName = WEEKDAY_NAMES.findIndex(name => {
    const candidate = name.toLowerCase();
    return candidate === lower || (lower.length >= 3 && candidate.startsWith(lower));
  });
  const day = parseWeekStartDay(/^\d$/.test(lower) ? Number(lower) : byName);
  if (day === undefined) {
    throw new InvalidArgumentError('Expected 0-6 (Monday = 0) or a weekday name.');
  }
  return day;
}

export function parseExportFormat(value: string): ExportFormat {
  const match = EXPORT_FORMATS.find(f => f === value.toLowerCase());
  if (!match) throw new InvalidArgumentError(`Choose one of: ${EXPORT_FORMATS.join(', ')}.`);
  return match;
}

export function parseExportReport(value: string): ExportReport {
  const match = EXPORT_REPORTS.find(r => r === value);
  if (!match) throw new InvalidArgumentError(`Choose one of: ${EXPORT_REPORTS.join(', ')}.`);
  return match;
}
