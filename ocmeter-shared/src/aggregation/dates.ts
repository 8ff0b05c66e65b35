/**
 * Calendar-day helpers. A day is carried as a `YYYY-MM-DD` key in the
 * process's local calendar; arithmetic on keys runs in UTC so daylight
 * saving transitions never shift a day.
 */

/** Monday = 0 … Sunday = 6 */
export type WeekStartDay = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] as const;

export interface DateRange {
  /** Inclusive */
  start: string;
  /** Inclusive */
  end: string;
}

export type Timeframe = 'daily' | 'weekly' | 'monthly' | 'all';

const DATE_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function formatKey(year: number, month: number, day: number): string {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** Local calendar date of an epoch-ms timestamp. */
export function toDateKey(epochMs: number): string {
  const d = new Date(epochMs);
  return formatKey(d.getFullYear(), d.getMonth() + 1, d.getDate());
}

export function isDateKey(value: string): boolean {
  const m = DATE_KEY_RE.exec(value);
  if (!m) return false;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

function keyToUtc(key: string): Date {
  const m = DATE_KEY_RE.exec(key);
  if (!m) throw new RangeError(`Invalid date key: ${key}`);
  return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
}

function utcToKey(d: Date): string {
  return formatKey(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate());
}

export function addDays(key: string, days: number): string {
  return utcToKey(new Date(keyToUtc(key).getTime() + days * MS_PER_DAY));
}

/** Weekday with Monday = 0. */
export function weekday(key: string): number {
  return (keyToUtc(key).getUTCDay() + 6) % 7;
}

/**
 * The week containing `key`, starting on `weekStartDay`.
 * Both ends inclusive, seven days apart.
 */
export function getCustomWeekRange(key: string, weekStartDay: WeekStartDay = 0): DateRange {
  const offset = (weekday(key) - weekStartDay + 7) % 7;
  const start = addDays(key, -offset);
  return { start, end: addDays(start, 6) };
}

/** ISO-8601 year and week number of a day. */
export function isoWeek(key: string): { year: number; week: number } {
  // The Thursday of this ISO week decides the year
  const thursday = keyToUtc(addDays(key, 3 - weekday(key)));
  const year = thursday.getUTCFullYear();
  const jan1 = Date.UTC(year, 0, 1);
  const week = Math.floor((thursday.getTime() - jan1) / MS_PER_DAY / 7) + 1;
  return { year, week };
}

export function yearMonthOf(key: string): { year: number; month: number } {
  const d = keyToUtc(key);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1 };
}

export function getMonthRange(year: number, month: number): DateRange {
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return { start: formatKey(year, month, 1), end: formatKey(year, month, lastDay) };
}

export function getYearRange(year: number): DateRange {
  return { start: formatKey(year, 1, 1), end: formatKey(year, 12, 31) };
}

/** Parses `YYYY-MM`; null when malformed or the month is out of range. */
export function parseMonthFilter(value: string): { year: number; month: number } | null {
  const m = /^(\d{4})-(\d{2})$/.exec(value.trim());
  if (!m) return null;
  const month = Number(m[2]);
  if (month < 1 || month > 12) return null;
  return { year: Number(m[1]), month };
}

/**
 * Date range a named timeframe covers, ending on `today`.
 * `all` is unbounded.
 */
export function timeframeRange(timeframe: Timeframe, today: string): DateRange | undefined {
  switch (timeframe) {
    case 'daily':
      return { start: today, end: today };
    case 'weekly':
      return { start: addDays(today, -6), end: today };
    case 'monthly':
      return { start: addDays(today, -29), end: today };
    case 'all':
      return undefined;
  }
}

/** `YYYY-Www` label of an ISO week. */
export function formatWeekLabel(year: number, week: number): string {
  return `${year}-W${pad(week)}`;
}

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export function monthName(month: number): string {
  return MONTH_NAMES[month - 1] ?? String(month);
}

const WEEK_START_DAYS: readonly WeekStartDay[] = [0, 1, 2, 3, 4, 5, 6];

/** Narrows a number to a week-start day; undefined outside 0–6. */
export function parseWeekStartDay(value: number): WeekStartDay | undefined {
  return WEEK_START_DAYS.find(day => day === value);
}
