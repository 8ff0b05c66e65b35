/**
 * Row-oriented projections of the aggregate reports, for tables and for
 * CSV/JSON export. Costs become plain numbers here and nowhere earlier.
 *
 * @module report/rows
 */

import type { ModelBreakdownReport, ProjectBreakdownReport } from '../aggregation/TimeframeAggregator';
import type { DailyUsage, MonthlyUsage, WeeklyUsage } from '../aggregation/periods';
import { calculateRecordCost } from '../pricing/pricingResolver';
import type { PricingTable } from '../pricing/types';
import type { SessionData } from '../session/SessionData';
import { recordDurationMs, recordFileName } from '../session/recordInfo';
import type { TokenUsage } from '../types/usage';
import { totalTokens } from '../types/usage';

export type CellValue = string | number | null;
export type Row = Record<string, CellValue>;

export type ReportKind = 'session' | 'sessions' | 'daily' | 'weekly' | 'monthly' | 'models' | 'projects';

export interface TokenColumns {
  input_tokens: number;
  output_tokens: number;
  cache_write_tokens: number;
  cache_read_tokens: number;
  total_tokens: number;
}

function tokenColumns(tokens: TokenUsage): TokenColumns {
  return {
    input_tokens: tokens.input,
    output_tokens: tokens.output,
    cache_write_tokens: tokens.cacheWrite,
    cache_read_tokens: tokens.cacheRead,
    total_tokens: totalTokens(tokens),
  };
}

/** ISO-8601 timestamp, or null. */
export function isoTimestamp(epochMs: number | undefined): string | null {
  return epochMs === undefined ? null : new Date(epochMs).toISOString();
}

/** One row per interaction record of a session. */
export function toSessionRows(session: SessionData, pricing: PricingTable): Row[] {
  return session.records.map((record) => ({
    session_id: session.sessionId,
    session_title: session.title ?? null,
    project_name: session.projectName,
    file_name: recordFileName(record),
    model_id: record.modelId,
    ...tokenColumns(record.tokens),
    cost: calculateRecordCost(record, pricing).toNumber(),
    duration_ms: recordDurationMs(record) ?? null,
  }));
}

/** One row per (session, model) pair. */
export function toSessionSummaryRows(sessions: readonly SessionData[], pricing: PricingTable): Row[] {
  const rows: Row[] = [];
  for (const session of sessions) {
    for (const [model, entry] of session.getModelBreakdown(pricing)) {
      rows.push({
        session_id: session.sessionId,
        session_title: session.title ?? null,
        project_name: session.projectName,
        start_time: isoTimestamp(session.startTime),
        duration_ms: session.durationMs ?? null,
        model,
        interactions: entry.files,
        ...tokenColumns(entry.tokens),
        cost: entry.cost.toNumber(),
      });
    }
  }
  return rows;
}

export function toDailyRows(days: readonly DailyUsage[], pricing: PricingTable): Row[] {
  return days.map((day) => ({
    date: day.date,
    sessions: day.totalSessions,
    interactions: day.totalInteractions,
    ...tokenColumns(day.totalTokens),
    cost: day.calculateTotalCost(pricing).toNumber(),
    models_used: day.modelsUsed.join(', '),
  }));
}

export function toWeeklyRows(weeks: readonly WeeklyUsage[], pricing: PricingTable): Row[] {
  return weeks.map((week) => ({
    year: week.year,
    week: week.week,
    start_date: week.startDate,
    end_date: week.endDate,
    sessions: week.totalSessions,
    interactions: week.totalInteractions,
    ...tokenColumns(week.totalTokens),
    cost: week.calculateTotalCost(pricing).toNumber(),
  }));
}

export function toMonthlyRows(months: readonly MonthlyUsage[], pricing: PricingTable): Row[] {
  return months.map((month) => ({
    year: month.year,
    month: month.month,
    sessions: month.totalSessions,
    interactions: month.totalInteractions,
    ...tokenColumns(month.totalTokens),
    cost: month.calculateTotalCost(pricing).toNumber(),
  }));
}

export function toModelRows(report: ModelBreakdownReport): Row[] {
  return report.entries.map((model) => ({
    model_name: model.modelName,
    sessions: model.totalSessions,
    interactions: model.totalInteractions,
    ...tokenColumns(model.totalTokens),
    cost: model.totalCost.toNumber(),
    avg_output_rate: model.avgOutputRate,
    first_used: isoTimestamp(model.firstUsed),
    last_used: isoTimestamp(model.lastUsed),
  }));
}

export function toProjectRows(report: ProjectBreakdownReport): Row[] {
  return report.entries.map((project) => ({
    project_name: project.projectName,
    sessions: project.totalSessions,
    interactions: project.totalInteractions,
    ...tokenColumns(project.totalTokens),
    cost: project.totalCost.toNumber(),
    models_used: project.modelsUsed.join(', '),
    first_activity: isoTimestamp(project.firstActivity),
    last_activity: isoTimestamp(project.lastActivity),
  }));
}
