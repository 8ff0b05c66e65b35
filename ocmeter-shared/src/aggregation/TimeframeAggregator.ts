/**
 * @fileoverview Groups sessions into calendar buckets (day → week → month)
 * and into model- and project-keyed breakdowns.
 *
 * Daily buckets are keyed by the local calendar date of a session's start
 * time; sessions without any creation timestamp have no day and are left
 * out of every calendar bucket. Weekly buckets are keyed by the computed
 * (start, end) pair for the configured week-start day, and a week belongs
 * to the month of its start date, so it is never split.
 *
 * @module aggregation/TimeframeAggregator
 */

import Decimal from 'decimal.js';
import { calculateRecordCost } from '../pricing/pricingResolver';
import type { PricingTable } from '../pricing/types';
import type { SessionData } from '../session/SessionData';
import { recordDurationMs } from '../session/recordInfo';
import type { TokenUsage } from '../types/usage';
import { addTokenUsage, EMPTY_TOKEN_USAGE, sumTokenUsage } from '../types/usage';
import type { DateRange, Timeframe, WeekStartDay } from './dates';
import { getCustomWeekRange, isoWeek, toDateKey, yearMonthOf } from './dates';
import { DailyUsage, MonthlyUsage, WeeklyUsage } from './periods';

export interface ModelUsageStats {
  modelName: string;
  totalTokens: TokenUsage;
  /** Distinct sessions that used the model */
  totalSessions: number;
  /** Records attributed to the model */
  totalInteractions: number;
  totalCost: Decimal;
  totalDurationMs: number;
  /** Earliest start of a session that used the model (epoch ms) */
  firstUsed?: number;
  /** Latest end of a session that used the model (epoch ms) */
  lastUsed?: number;
  /** Output tokens per second of processing time; 0 without timing data */
  avgOutputRate: number;
}

export interface ProjectUsageStats {
  projectName: string;
  totalTokens: TokenUsage;
  totalSessions: number;
  totalInteractions: number;
  totalCost: Decimal;
  modelsUsed: string[];
  firstActivity?: number;
  lastActivity?: number;
}

export interface BreakdownReport<T> {
  timeframe: Timeframe;
  startDate?: string;
  endDate?: string;
  entries: T[];
  totalCost: Decimal;
  totalTokens: TokenUsage;
}

export type ModelBreakdownReport = BreakdownReport<ModelUsageStats>;
export type ProjectBreakdownReport = BreakdownReport<ProjectUsageStats>;

export interface BreakdownOptions {
  timeframe?: Timeframe;
  range?: Partial<DateRange>;
}

function earlier(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

function later(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

function byCostDesc(a: { totalCost: Decimal }, b: { totalCost: Decimal }): number {
  return b.totalCost.comparedTo(a.totalCost);
}

export function outputRate(outputTokens: number, durationMs: number): number {
  if (durationMs <= 0 || outputTokens === 0) return 0;
  return outputTokens / (durationMs / 1000);
}

/**
 * Keeps sessions whose start date falls within the inclusive range.
 * With neither bound set, every session is kept; otherwise sessions
 * without a start time are dropped.
 */
export function filterSessionsByDate(sessions: readonly SessionData[], range: Partial<DateRange> = {}): SessionData[] {
  const { start, end } = range;
  if (start === undefined && end === undefined) return [...sessions];

  return sessions.filter(session => {
    const startTime = session.startTime;
    if (startTime === undefined) return false;
    const day = toDateKey(startTime);
    if (start !== undefined && day < start) return false;
    if (end !== undefined && day > end) return false;
    return true;
  });
}

/** One bucket per local calendar date, ascending. */
export function createDailyBreakdown(sessions: readonly SessionData[]): DailyUsage[] {
  const byDay = new Map<string, SessionData[]>();
  for (const session of sessions) {
    const startTime = session.startTime;
    if (startTime === undefined) continue;
    const day = toDateKey(startTime);
    const bucket = byDay.get(day);
    if (bucket) bucket.push(session);
    else byDay.set(day, [session]);
  }

  return [...byDay.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([day, daySessions]) => new DailyUsage(day, daySessions));
}

/** Partitions days into weeks starting on `weekStartDay` (Monday = 0). */
export function createWeeklyBreakdown(days: readonly DailyUsage[], weekStartDay: WeekStartDay = 0): WeeklyUsage[] {
  const byWeek = new Map<string, { start: string; end: string; days: DailyUsage[] }>();
  for (const day of days) {
    const { start, end } = getCustomWeekRange(day.date, weekStartDay);
    const bucket = byWeek.get(start);
    if (bucket) bucket.days.push(day);
    else byWeek.set(start, { start, end, days: [day] });
  }

  return [...byWeek.values()]
    .sort((a, b) => a.start.localeCompare(b.start))
    .map(({ start, end, days: weekDays }) => {
      const { year, week } = isoWeek(start);
      const sortedDays = [...weekDays].sort((a, b) => a.date.localeCompare(b.date));
      return new WeeklyUsage(year, week, start, end, sortedDays);
    });
}

/** Assigns each week to the month of its start date. */
export function createMonthlyBreakdown(weeks: readonly WeeklyUsage[]): MonthlyUsage[] {
  const byMonth = new Map<string, { year: number; month: number; weeks: WeeklyUsage[] }>();
  for (const week of weeks) {
    const { year, month } = yearMonthOf(week.startDate);
    const key = `${year}-${String(month).padStart(2, '0')}`;
    const bucket = byMonth.get(key);
    if (bucket) bucket.weeks.push(week);
    else byMonth.set(key, { year, month, weeks: [week] });
  }

  return [...byMonth.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([, bucket]) => new MonthlyUsage(bucket.year, bucket.month, bucket.weeks));
}

interface ModelAccumulator {
  tokens: TokenUsage;
  sessions: Set<string>;
  interactions: number;
  cost: Decimal;
  durationMs: number;
  firstUsed?: number;
  lastUsed?: number;
}

/**
 * Per-model totals over the sessions in range. Tokens, interactions and
 * cost are attributed per record; first/last use comes from the session
 * bounds. Sorted by cost, highest first; equal costs keep first-seen order.
 */
export function createModelBreakdown(
  sessions: readonly SessionData[],
  pricing: PricingTable,
  options: BreakdownOptions = {},
): ModelBreakdownReport {
  const filtered = filterSessionsByDate(sessions, options.range);
  const byModel = new Map<string, ModelAccumulator>();

  for (const session of filtered) {
    const startTime = session.startTime;
    const endTime = session.endTime;
    for (const record of session.records) {
      let acc = byModel.get(record.modelId);
      if (!acc) {
        acc = { tokens: EMPTY_TOKEN_USAGE, sessions: new Set(), interactions: 0, cost: new Decimal(0), durationMs: 0 };
        byModel.set(record.modelId, acc);
      }
      acc.tokens = addTokenUsage(acc.tokens, record.tokens);
      acc.interactions += 1;
      acc.cost = acc.cost.plus(calculateRecordCost(record, pricing));
      acc.durationMs += recordDurationMs(record) ?? 0;
      acc.sessions.add(session.sessionId);
      acc.firstUsed = earlier(acc.firstUsed, startTime);
      acc.lastUsed = later(acc.lastUsed, endTime);
    }
  }

  const entries: ModelUsageStats[] = [...byModel.entries()].map(([modelName, acc]) => ({
    modelName,
    totalTokens: acc.tokens,
    totalSessions: acc.sessions.size,
    totalInteractions: acc.interactions,
    totalCost: acc.cost,
    totalDurationMs: acc.durationMs,
    firstUsed: acc.firstUsed,
    lastUsed: acc.lastUsed,
    avgOutputRate: outputRate(acc.tokens.output, acc.durationMs),
  }));
  entries.sort(byCostDesc);

  return toReport(entries, options);
}

/** Per-project totals, keyed by each session's dominant project. */
export function createProjectBreakdown(
  sessions: readonly SessionData[],
  pricing: PricingTable,
  options: BreakdownOptions = {},
): ProjectBreakdownReport {
  const filtered = filterSessionsByDate(sessions, options.range);
  const byProject = new Map<string, ProjectUsageStats>();

  for (const session of filtered) {
    const name = session.projectName;
    const current = byProject.get(name);
    const models = new Set(current?.modelsUsed ?? []);
    for (const model of session.modelsUsed) models.add(model);

    byProject.set(name, {
      projectName: name,
      totalTokens: addTokenUsage(current?.totalTokens ?? EMPTY_TOKEN_USAGE, session.totalTokens),
      totalSessions: (current?.totalSessions ?? 0) + 1,
      totalInteractions: (current?.totalInteractions ?? 0) + session.interactionCount,
      totalCost: (current?.totalCost ?? new Decimal(0)).plus(session.calculateTotalCost(pricing)),
      modelsUsed: [...models],
      firstActivity: earlier(current?.firstActivity, session.startTime),
      lastActivity: later(current?.lastActivity, session.endTime),
    });
  }

  const entries = [...byProject.values()].sort(byCostDesc);
  return toReport(entries, options);
}

function toReport<T extends { totalCost: Decimal; totalTokens: TokenUsage }>(
  entries: T[],
  options: BreakdownOptions,
): BreakdownReport<T> {
  return {
    timeframe: options.timeframe ?? 'all',
    startDate: options.range?.start,
    endDate: options.range?.end,
    entries,
    totalCost: entries.reduce((sum, e) => sum.plus(e.totalCost), new Decimal(0)),
    totalTokens: sumTokenUsage(entries.map(e => e.totalTokens)),
  };
}
