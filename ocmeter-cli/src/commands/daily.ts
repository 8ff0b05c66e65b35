/**
 * `ocmeter daily`: Usage per calendar day.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { SessionAnalyzer, toDailyRows } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { loadSessionsOrExplain, openContext, runAction, writeJson } from '../context';
import { renderTable } from '../formatters';
import { dailyTable } from '../tables';

type DailyOptions = GlobalOptions & {
  month?: string;
  breakdown?: boolean;
};

export async function dailyAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<DailyOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const sessions = loadSessionsOrExplain(ctx, opts);
    if (!sessions) return;

    const analyzer = new SessionAnalyzer({ pricing: ctx.pricing, weekStartDay: ctx.config.analytics.weekStartDay });
    const days = analyzer.dailyReport(sessions, { month: opts.month });

    if (opts.json) {
      writeJson(toDailyRows(days, ctx.pricing));
      return;
    }
    if (days.length === 0) {
      process.stdout.write(chalk.dim(`No usage recorded${opts.month ? ` in ${opts.month}` : ''}.\n`));
      return;
    }

    process.stdout.write(chalk.bold(`Daily Usage${opts.month ? ` (${opts.month})` : ''}\n`));
    process.stdout.write(renderTable(dailyTable(days, ctx.pricing, { breakdown: opts.breakdown }), ctx.config.ui.tableStyle));
  });
}
