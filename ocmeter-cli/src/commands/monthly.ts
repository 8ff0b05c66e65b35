/**
 * `ocmeter monthly`: Usage per month.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { SessionAnalyzer, toMonthlyRows } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { loadSessionsOrExplain, openContext, runAction, writeJson } from '../context';
import { renderTable } from '../formatters';
import { monthlyTable } from '../tables';

type MonthlyOptions = GlobalOptions & {
  year?: number;
  breakdown?: boolean;
};

export async function monthlyAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<MonthlyOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const sessions = loadSessionsOrExplain(ctx, opts);
    if (!sessions) return;

    const analyzer = new SessionAnalyzer({ pricing: ctx.pricing, weekStartDay: ctx.config.analytics.weekStartDay });
    const months = analyzer.monthlyReport(sessions, { year: opts.year });

    if (opts.json) {
      writeJson(toMonthlyRows(months, ctx.pricing));
      return;
    }
    if (months.length === 0) {
      process.stdout.write(chalk.dim(`No usage recorded${opts.year ? ` in ${opts.year}` : ''}.\n`));
      return;
    }

    process.stdout.write(chalk.bold(`Monthly Usage${opts.year ? ` (${opts.year})` : ''}\n`));
    process.stdout.write(renderTable(monthlyTable(months, ctx.pricing, { breakdown: opts.breakdown }), ctx.config.ui.tableStyle));
  });
}
