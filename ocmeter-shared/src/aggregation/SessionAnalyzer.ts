/**
 * @fileoverview Report builders over a loaded session set.
 *
 * The analyzer holds the pricing table and a clock; callers load sessions
 * through a SessionStore and hand them in. Every method is pure with
 * respect to its inputs.
 *
 * @module aggregation/SessionAnalyzer
 */

import type Decimal from 'decimal.js';
import { resolvePricing, sumDecimals } from '../pricing/pricingResolver';
import type { PricingTable } from '../pricing/types';
import type { ModelBreakdownEntry, SessionData } from '../session/SessionData';
import { UNKNOWN_MODEL } from '../parsers/modelName';
import type { TokenUsage } from '../types/usage';
import { sumTokenUsage } from '../types/usage';
import type { DateRange, Timeframe, WeekStartDay } from './dates';
import { getMonthRange, getYearRange, parseMonthFilter, timeframeRange, toDateKey } from './dates';
import type { DailyUsage, MonthlyUsage, WeeklyUsage } from './periods';
import type { ModelBreakdownReport, ProjectBreakdownReport } from './TimeframeAggregator';
import {
  createDailyBreakdown,
  createModelBreakdown,
  createMonthlyBreakdown,
  createProjectBreakdown,
  createWeeklyBreakdown,
  filterSessionsByDate,
  outputRate,
} from './TimeframeAggregator';

export interface SessionsSummary {
  totalSessions: number;
  totalInteractions: number;
  totalTokens: TokenUsage;
  totalCost: Decimal;
  /** Distinct models, alphabetical */
  modelsUsed: string[];
  /** Local dates of the earliest and latest session start */
  dateRange?: DateRange;
}

export interface SessionStatistics {
  sessionId: string;
  title: string;
  projectName: string;
  interactionCount: number;
  totalTokens: TokenUsage;
  totalCost: Decimal;
  modelsUsed: string[];
  startTime?: number;
  endTime?: number;
  durationMs?: number;
  totalProcessingTimeMs: number;
  avgOutputRate: number;
  modelBreakdown: Map<string, ModelBreakdownEntry>;
}

export interface SessionHealth {
  healthy: boolean;
  warnings: string[];
}

export interface DailyReportOptions {
  /** `YYYY-MM`; an unparseable value is ignored */
  month?: string;
}

export interface WeeklyReportOptions {
  year?: number;
  weekStartDay?: WeekStartDay;
}

export interface MonthlyReportOptions {
  year?: number;
}

export interface BreakdownReportOptions {
  timeframe?: Timeframe;
  /** Explicit bounds override the timeframe's range */
  start?: string;
  end?: string;
}

export interface SessionAnalyzerOptions {
  pricing: PricingTable;
  weekStartDay?: WeekStartDay;
  /** Clock used for timeframe ranges; defaults to Date.now */
  now?: () => number;
}

export class SessionAnalyzer {
  private readonly pricing: PricingTable;
  private readonly weekStartDay: WeekStartDay;
  private readonly now: () => number;

  constructor(options: SessionAnalyzerOptions) {
    this.pricing = options.pricing;
    this.weekStartDay = options.weekStartDay ?? 0;
    this.now = options.now ?? Date.now;
  }

  getSessionsSummary(sessions: readonly SessionData[]): SessionsSummary {
    const models = new Set<string>();
    let first: number | undefined;
    let last: number | undefined;

    for (const session of sessions) {
      for (const model of session.modelsUsed) models.add(model);
      const start = session.startTime;
      if (start !== undefined) {
        if (first === undefined || start < first) first = start;
        if (last === undefined || start > last) last = start;
      }
    }

    return {
      totalSessions: sessions.length,
      totalInteractions: sessions.reduce((sum, s) => sum + s.interactionCount, 0),
      totalTokens: sumTokenUsage(sessions.map(s => s.totalTokens)),
      totalCost: sumDecimals(sessions.map(s => s.calculateTotalCost(this.pricing))),
      modelsUsed: [...models].sort(),
      dateRange: first !== undefined && last !== undefined
        ? { start: toDateKey(first), end: toDateKey(last) }
        : undefined,
    };
  }

  getSessionStatistics(session: SessionData): SessionStatistics {
    const totalTokens = session.totalTokens;
    const processingMs = session.totalProcessingTimeMs;
    return {
      sessionId: session.sessionId,
      title: session.displayTitle,
      projectName: session.projectName,
      interactionCount: session.interactionCount,
      totalTokens,
      totalCost: session.calculateTotalCost(this.pricing),
      modelsUsed: session.modelsUsed,
      startTime: session.startTime,
      endTime: session.endTime,
      durationMs: session.durationMs,
      totalProcessingTimeMs: processingMs,
      avgOutputRate: outputRate(totalTokens.output, processingMs),
      modelBreakdown: session.getModelBreakdown(this.pricing),
    };
  }

  /** Flags data gaps that make a session's figures less trustworthy. */
  validateSessionHealth(session: SessionData): SessionHealth {
    const warnings: string[] = [];

    const untimed = session.records.filter(r => r.time?.created === undefined).length;
    if (untimed > 0) {
      warnings.push(`${untimed} interaction(s) without timing data`);
    }
    if (session.modelsUsed.includes(UNKNOWN_MODEL)) {
      warnings.push('Some interactions have no model identifier');
    }
    const silent = session.records.filter(r => r.tokens.output === 0).length;
    if (silent > 0) {
      warnings.push(`${silent} interaction(s) produced no output tokens`);
    }
    const unpriced = session.modelsUsed.filter(
      m => m !== UNKNOWN_MODEL && resolvePricing(m, this.pricing) === undefined,
    );
    if (unpriced.length > 0) {
      warnings.push(`No pricing for: ${unpriced.join(', ')}`);
    }

    return { healthy: warnings.length === 0, warnings };
  }

  dailyReport(sessions: readonly SessionData[], options: DailyReportOptions = {}): DailyUsage[] {
    const month = options.month ? parseMonthFilter(options.month) : null;
    const scoped = month
      ? filterSessionsByDate(sessions, getMonthRange(month.year, month.month))
      : sessions;
    return createDailyBreakdown(scoped);
  }

  weeklyReport(sessions: readonly SessionData[], options: WeeklyReportOptions = {}): WeeklyUsage[] {
    const scoped = options.year !== undefined
      ? filterSessionsByDate(sessions, getYearRange(options.year))
      : sessions;
    return createWeeklyBreakdown(createDailyBreakdown(scoped), options.weekStartDay ?? this.weekStartDay);
  }

  monthlyReport(sessions: readonly SessionData[], options: MonthlyReportOptions = {}): MonthlyUsage[] {
    const scoped = options.year !== undefined
      ? filterSessionsByDate(sessions, getYearRange(options.year))
      : sessions;
    return createMonthlyBreakdown(createWeeklyBreakdown(createDailyBreakdown(scoped), this.weekStartDay));
  }

  modelsReport(sessions: readonly SessionData[], options: BreakdownReportOptions = {}): ModelBreakdownReport {
    const timeframe = options.timeframe ?? 'all';
    return createModelBreakdown(sessions, this.pricing, { timeframe, range: this.resolveRange(options) });
  }

  projectsReport(sessions: readonly SessionData[], options: BreakdownReportOptions = {}): ProjectBreakdownReport {
    const timeframe = options.timeframe ?? 'all';
    return createProjectBreakdown(sessions, this.pricing, { timeframe, range: this.resolveRange(options) });
  }

  private resolveRange(options: BreakdownReportOptions): Partial<DateRange> | undefined {
    if (options.start !== undefined || options.end !== undefined) {
      return { start: options.start, end: options.end };
    }
    return timeframeRange(options.timeframe ?? 'all', toDateKey(this.now()));
  }
}
