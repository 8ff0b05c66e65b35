/**
 * Table layouts for each report. Builders return plain cell data; the
 * commands pick the style and write the result.
 */

import chalk from 'chalk';
import type Decimal from 'decimal.js';
import type {
  DailyUsage,
  ModelBreakdownEntry,
  ModelBreakdownReport,
  MonthlyUsage,
  PricingTable,
  ProjectBreakdownReport,
  SessionData,
  TokenUsage,
  WeeklyUsage,
} from 'ocmeter-shared';
import {
  addTokenUsage,
  calculateRecordCost,
  monthName,
  recordDurationMs,
  recordFileName,
  sumDecimals,
  sumTokenUsage,
  totalTokens,
} from 'ocmeter-shared';
import type { Column, TableData } from './formatters';
import { formatCost, formatDuration, formatTimestamp, fmtInt, TOKEN_HEADERS, tokenCells, truncate } from './formatters';

const TOKEN_COLUMNS: Column[] = TOKEN_HEADERS.map((header): Column => ({ header, align: 'right' }));

/** Period bucket as the tables see it. */
interface Period {
  readonly sessions: readonly SessionData[];
  readonly totalSessions: number;
  readonly totalInteractions: number;
  readonly totalTokens: TokenUsage;
  calculateTotalCost(pricing: PricingTable): Decimal;
}

/**
 * Per-model totals across sessions, most expensive first.
 */
export function mergeModelBreakdowns(
  sessions: readonly SessionData[],
  pricing: PricingTable,
): Array<[string, ModelBreakdownEntry]> {
  const merged = new Map<string, ModelBreakdownEntry>();
  for (const session of sessions) {
    for (const [model, entry] of session.getModelBreakdown(pricing)) {
      const existing = merged.get(model);
      merged.set(model, existing
        ? {
          files: existing.files + entry.files,
          tokens: addTokenUsage(existing.tokens, entry.tokens),
          cost: existing.cost.plus(entry.cost),
        }
        : entry);
    }
  }
  return [...merged.entries()].sort((a, b) => b[1].cost.comparedTo(a[1].cost));
}

function breakdownRows(sessions: readonly SessionData[], pricing: PricingTable, leadWidth: number): string[][] {
  return mergeModelBreakdowns(sessions, pricing).map(([model, entry]) => [
    `  ↳ ${model}`,
    ...Array<string>(leadWidth - 1).fill(''),
    '',
    fmtInt(entry.files),
    ...tokenCells(entry.tokens),
    formatCost(entry.cost),
  ].map(cell => chalk.dim(cell)));
}

function periodTable(
  lead: Column[],
  entries: Array<{ lead: string[]; period: Period }>,
  pricing: PricingTable,
  breakdown: boolean,
): TableData {
  const rows: string[][] = [];
  for (const { lead: leadCells, period } of entries) {
    rows.push([
      ...leadCells,
      fmtInt(period.totalSessions),
      fmtInt(period.totalInteractions),
      ...tokenCells(period.totalTokens),
      formatCost(period.calculateTotalCost(pricing)),
    ]);
    if (breakdown) rows.push(...breakdownRows(period.sessions, pricing, lead.length));
  }

  const periods = entries.map(e => e.period);
  return {
    columns: [
      ...lead,
      { header: 'Sessions', align: 'right' },
      { header: 'Interactions', align: 'right' },
      ...TOKEN_COLUMNS,
      { header: 'Cost', align: 'right' },
    ],
    rows,
    footer: [
      'Total',
      ...Array<string>(lead.length - 1).fill(''),
      fmtInt(periods.reduce((sum, p) => sum + p.totalSessions, 0)),
      fmtInt(periods.reduce((sum, p) => sum + p.totalInteractions, 0)),
      ...tokenCells(sumTokenUsage(periods.map(p => p.totalTokens))),
      formatCost(sumDecimals(periods.map(p => p.calculateTotalCost(pricing)))),
    ],
  };
}

export interface PeriodTableOptions {
  /** Add one dimmed row per model under each period */
  breakdown?: boolean;
}

export function dailyTable(days: readonly DailyUsage[], pricing: PricingTable, options: PeriodTableOptions = {}): TableData {
  return periodTable(
    [{ header: 'Date' }],
    days.map(day => ({ lead: [day.date], period: day })),
    pricing,
    options.breakdown ?? false,
  );
}

export function weeklyTable(weeks: readonly WeeklyUsage[], pricing: PricingTable, options: PeriodTableOptions = {}): TableData {
  return periodTable(
    [{ header: 'Week' }, { header: 'Start' }, { header: 'End' }],
    weeks.map(week => ({ lead: [week.label, week.startDate, week.endDate], period: week })),
    pricing,
    options.breakdown ?? false,
  );
}

export function monthlyTable(months: readonly MonthlyUsage[], pricing: PricingTable, options: PeriodTableOptions = {}): TableData {
  return periodTable(
    [{ header: 'Month' }],
    months.map(month => ({ lead: [`${monthName(month.month)} ${month.year}`], period: month })),
    pricing,
    options.breakdown ?? false,
  );
}

export function modelsTable(report: ModelBreakdownReport): TableData {
  return {
    columns: [
      { header: 'Model' },
      { header: 'Sessions', align: 'right' },
      { header: 'Interactions', align: 'right' },
      ...TOKEN_COLUMNS,
      { header: 'Cost', align: 'right' },
      { header: 'Out tok/s', align: 'right' },
    ],
    rows: report.entries.map(model => [
      model.modelName,
      fmtInt(model.totalSessions),
      fmtInt(model.totalInteractions),
      ...tokenCells(model.totalTokens),
      formatCost(model.totalCost),
      model.avgOutputRate.toFixed(1),
    ]),
    footer: [
      'Total',
      '',
      '',
      ...tokenCells(report.totalTokens),
      formatCost(report.totalCost),
      '',
    ],
  };
}

export function projectsTable(report: ProjectBreakdownReport): TableData {
  return {
    columns: [
      { header: 'Project' },
      { header: 'Sessions', align: 'right' },
      { header: 'Interactions', align: 'right' },
      { header: 'Tokens', align: 'right' },
      { header: 'Cost', align: 'right' },
      { header: 'Models' },
      { header: 'Last activity' },
    ],
    rows: report.entries.map(project => [
      project.projectName,
      fmtInt(project.totalSessions),
      fmtInt(project.totalInteractions),
      fmtInt(totalTokens(project.totalTokens)),
      formatCost(project.totalCost),
      project.modelsUsed.join(', '),
      formatTimestamp(project.lastActivity),
    ]),
    footer: [
      'Total',
      fmtInt(report.entries.reduce((sum, p) => sum + p.totalSessions, 0)),
      fmtInt(report.entries.reduce((sum, p) => sum + p.totalInteractions, 0)),
      fmtInt(totalTokens(report.totalTokens)),
      formatCost(report.totalCost),
      '',
      '',
    ],
  };
}

export function sessionsTable(sessions: readonly SessionData[], pricing: PricingTable): TableData {
  const costs = sessions.map(s => s.calculateTotalCost(pricing));
  return {
    columns: [
      { header: 'Session' },
      { header: 'Project' },
      { header: 'Started' },
      { header: 'Duration', align: 'right' },
      { header: 'Interactions', align: 'right' },
      { header: 'Tokens', align: 'right' },
      { header: 'Cost', align: 'right' },
      { header: 'Models' },
    ],
    rows: sessions.map((session, i) => [
      truncate(session.displayTitle, 40),
      session.projectName,
      formatTimestamp(session.startTime),
      formatDuration(session.durationMs),
      fmtInt(session.interactionCount),
      fmtInt(totalTokens(session.totalTokens)),
      formatCost(costs[i] ?? 0),
      session.modelsUsed.join(', '),
    ]),
    footer: [
      `${sessions.length} sessions`,
      '',
      '',
      '',
      fmtInt(sessions.reduce((sum, s) => sum + s.interactionCount, 0)),
      fmtInt(totalTokens(sumTokenUsage(sessions.map(s => s.totalTokens)))),
      formatCost(sumDecimals(costs)),
      '',
    ],
  };
}

/** Per-model split of a single session. */
export function sessionModelTable(session: SessionData, pricing: PricingTable): TableData {
  return {
    columns: [
      { header: 'Model' },
      { header: 'Interactions', align: 'right' },
      ...TOKEN_COLUMNS,
      { header: 'Cost', align: 'right' },
    ],
    rows: mergeModelBreakdowns([session], pricing).map(([model, entry]) => [
      model,
      fmtInt(entry.files),
      ...tokenCells(entry.tokens),
      formatCost(entry.cost),
    ]),
  };
}

/** One row per interaction. */
export function interactionsTable(session: SessionData, pricing: PricingTable): TableData {
  return {
    columns: [
      { header: 'File' },
      { header: 'Model' },
      { header: 'Created' },
      ...TOKEN_COLUMNS,
      { header: 'Cost', align: 'right' },
      { header: 'Duration', align: 'right' },
    ],
    rows: session.records.map(record => [
      recordFileName(record),
      record.modelId,
      formatTimestamp(record.time?.created),
      ...tokenCells(record.tokens),
      formatCost(calculateRecordCost(record, pricing)),
      formatDuration(recordDurationMs(record)),
    ]),
  };
}
