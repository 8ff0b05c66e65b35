import { describe, it, expect } from 'vitest';
import {
  addDays,
  formatWeekLabel,
  getCustomWeekRange,
  getMonthRange,
  getYearRange,
  isDateKey,
  isoWeek,
  parseMonthFilter,
  parseWeekStartDay,
  timeframeRange,
  toDateKey,
  weekday,
} from './dates';

describe('toDateKey', () => {
  it('uses the local calendar day', () => {
    expect(toDateKey(new Date(2025, 0, 15, 23, 30).getTime())).toBe('2025-01-15');
    expect(toDateKey(new Date(2025, 0, 16, 0, 5).getTime())).toBe('2025-01-16');
  });
});

describe('day arithmetic', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });

  it('numbers weekdays from Monday', () => {
    expect(weekday('2025-01-13')).toBe(0);
    expect(weekday('2025-01-19')).toBe(6);
  });

  it('validates keys', () => {
    expect(isDateKey('2025-02-28')).toBe(true);
    expect(isDateKey('2025-02-30')).toBe(false);
    expect(isDateKey('2025-2-3')).toBe(false);
  });
});

describe('getCustomWeekRange', () => {
  it('puts a Wednesday in the week beginning the Monday before it', () => {
    expect(getCustomWeekRange('2025-01-15', 0)).toEqual({ start: '2025-01-13', end: '2025-01-19' });
  });

  it('puts a Sunday in the week ending on that Sunday', () => {
    expect(getCustomWeekRange('2025-01-19', 0)).toEqual({ start: '2025-01-13', end: '2025-01-19' });
  });

  it('keeps a Monday as its own week start', () => {
    expect(getCustomWeekRange('2025-01-13', 0).start).toBe('2025-01-13');
  });

  it('supports Sunday-start weeks', () => {
    expect(getCustomWeekRange('2025-01-15', 6)).toEqual({ start: '2025-01-12', end: '2025-01-18' });
  });
});

describe('isoWeek', () => {
  it('numbers a mid-January week', () => {
    expect(isoWeek('2025-01-13')).toEqual({ year: 2025, week: 3 });
  });

  it('assigns late December days to week 1 of the next year', () => {
    expect(isoWeek('2024-12-30')).toEqual({ year: 2025, week: 1 });
  });

  it('assigns early January days to week 53 of the previous year', () => {
    expect(isoWeek('2021-01-01')).toEqual({ year: 2020, week: 53 });
  });

  it('formats a week label', () => {
    expect(formatWeekLabel(2025, 3)).toBe('2025-W03');
  });
});

describe('ranges and filters', () => {
  it('computes month and year ranges', () => {
    expect(getMonthRange(2024, 2)).toEqual({ start: '2024-02-01', end: '2024-02-29' });
    expect(getYearRange(2025)).toEqual({ start: '2025-01-01', end: '2025-12-31' });
  });

  it('parses YYYY-MM filters', () => {
    expect(parseMonthFilter('2025-03')).toEqual({ year: 2025, month: 3 });
    expect(parseMonthFilter('2025-13')).toBeNull();
    expect(parseMonthFilter('March')).toBeNull();
  });

  it('maps timeframes to ranges ending today', () => {
    expect(timeframeRange('daily', '2025-01-15')).toEqual({ start: '2025-01-15', end: '2025-01-15' });
    expect(timeframeRange('weekly', '2025-01-15')).toEqual({ start: '2025-01-09', end: '2025-01-15' });
    expect(timeframeRange('monthly', '2025-01-15')).toEqual({ start: '2024-12-17', end: '2025-01-15' });
    expect(timeframeRange('all', '2025-01-15')).toBeUndefined();
  });

  it('narrows week start days', () => {
    expect(parseWeekStartDay(6)).toBe(6);
    expect(parseWeekStartDay(7)).toBeUndefined();
  });
});
