/**
 * `ocmeter export <report>`: Write a report to CSV or JSON.
 */

import * as path from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import type { AppContext, ExportFormat, Row, SessionData, Timeframe, WeekStartDay } from 'ocmeter-shared';
import {
  ExportError,
  SessionAnalyzer,
  SessionNotFoundError,
  toDailyRows,
  toModelRows,
  toMonthlyRows,
  toProjectRows,
  toSessionRows,
  toSessionSummaryRows,
  toWeeklyRows,
  writeExport,
} from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { loadSessionsOrExplain, openContext, runAction, writeJson } from '../context';
import type { ExportReport } from '../options';

type ExportOptions = GlobalOptions & {
  format?: ExportFormat;
  output?: string;
  session?: string;
  limit?: number;
  month?: string;
  year?: number;
  startDay?: WeekStartDay;
  timeframe?: Timeframe;
  start?: string;
  end?: string;
};

/** Builds the rows of a multi-session report. */
export function buildReportRows(
  report: Exclude<ExportReport, 'session'>,
  sessions: readonly SessionData[],
  ctx: Pick<AppContext, 'pricing' | 'config'>,
  opts: Omit<ExportOptions, keyof GlobalOptions | 'format' | 'output' | 'session'> = {},
): Row[] {
  const analyzer = new SessionAnalyzer({
    pricing: ctx.pricing,
    weekStartDay: opts.startDay ?? ctx.config.analytics.weekStartDay,
  });
  switch (report) {
    case 'sessions':
      return toSessionSummaryRows(sessions, ctx.pricing);
    case 'daily':
      return toDailyRows(analyzer.dailyReport(sessions, { month: opts.month }), ctx.pricing);
    case 'weekly':
      return toWeeklyRows(analyzer.weeklyReport(sessions, { year: opts.year }), ctx.pricing);
    case 'monthly':
      return toMonthlyRows(analyzer.monthlyReport(sessions, { year: opts.year }), ctx.pricing);
    case 'models':
      return toModelRows(analyzer.modelsReport(sessions, opts));
    case 'projects':
      return toProjectRows(analyzer.projectsReport(sessions, opts));
  }
}

/** Per-interaction rows, with the source payload when `includeRaw` is set. */
export function buildSessionRows(session: SessionData, ctx: Pick<AppContext, 'pricing'>, includeRaw: boolean): Row[] {
  const rows = toSessionRows(session, ctx.pricing);
  if (!includeRaw) return rows;
  return rows.map((row, i) => ({ ...row, raw_data: JSON.stringify(session.records[i]?.raw ?? null) }));
}

function filterMetadata(opts: ExportOptions): Record<string, unknown> {
  const filters: Record<string, unknown> = {};
  for (const key of ['month', 'year', 'startDay', 'timeframe', 'start', 'end', 'limit', 'session'] as const) {
    if (opts[key] !== undefined) filters[key] = opts[key];
  }
  return Object.keys(filters).length > 0 ? { filters } : {};
}

export async function exportAction(report: ExportReport, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<ExportOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const format = opts.format ?? ctx.config.export.defaultFormat;

    let rows: Row[];
    if (report === 'session') {
      if (!opts.session) throw new ExportError('The session report needs --session <path>', { report });
      const sessionPath = path.resolve(opts.session);
      const session = ctx.store.loadSession(sessionPath);
      if (!session) throw new SessionNotFoundError(sessionPath);
      rows = buildSessionRows(session, ctx, ctx.config.export.includeRawData);
    } else {
      const sessions = loadSessionsOrExplain(ctx, opts, report === 'sessions' ? opts.limit : undefined);
      if (!sessions) return;
      rows = buildReportRows(report, sessions, ctx, opts);
    }

    const target = writeExport({
      rows,
      format,
      report,
      exportDir: ctx.config.paths.exportDir,
      outputPath: opts.output,
      includeMetadata: ctx.config.export.includeMetadata,
      metadata: filterMetadata(opts),
    });
    ctx.logger.info('Export written', { report, format, target, rows: rows.length });

    if (opts.json) {
      writeJson({ report, format, path: target, rows: rows.length });
    } else {
      process.stdout.write(`Exported ${rows.length} ${report} row(s) to ${chalk.cyan(target)}\n`);
    }
  });
}
