/**
 * `ocmeter sessions`: Recent sessions with totals.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { SessionAnalyzer, toSessionSummaryRows } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { loadSessionsOrExplain, openContext, runAction, writeJson } from '../context';
import { formatCost, renderTable } from '../formatters';
import { sessionsTable } from '../tables';

type SessionsOptions = GlobalOptions & {
  limit?: number;
};

export async function sessionsAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<SessionsOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const limit = opts.limit ?? ctx.config.analytics.recentSessionsLimit;
    const sessions = loadSessionsOrExplain(ctx, opts, limit);
    if (!sessions) return;

    if (opts.json) {
      writeJson(toSessionSummaryRows(sessions, ctx.pricing));
      return;
    }

    const summary = new SessionAnalyzer({ pricing: ctx.pricing }).getSessionsSummary(sessions);
    process.stdout.write(chalk.bold(`Recent Sessions (${sessions.length})\n`));
    process.stdout.write(renderTable(sessionsTable(sessions, ctx.pricing), ctx.config.ui.tableStyle));
    if (summary.dateRange) {
      process.stdout.write(chalk.dim(`Period: ${summary.dateRange.start} to ${summary.dateRange.end}\n`));
    }
    process.stdout.write(chalk.dim(`Models: ${summary.modelsUsed.join(', ')}\n`));
    process.stdout.write(`Total cost: ${chalk.green(formatCost(summary.totalCost))}\n`);
  });
}
