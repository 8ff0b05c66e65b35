/**
 * `ocmeter weekly`: Usage per week, with a configurable first weekday.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import type { WeekStartDay } from 'ocmeter-shared';
import { SessionAnalyzer, toWeeklyRows, WEEKDAY_NAMES } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { loadSessionsOrExplain, openContext, runAction, writeJson } from '../context';
import { renderTable } from '../formatters';
import { weeklyTable } from '../tables';

type WeeklyOptions = GlobalOptions & {
  year?: number;
  startDay?: WeekStartDay;
  breakdown?: boolean;
};

export async function weeklyAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<WeeklyOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const sessions = loadSessionsOrExplain(ctx, opts);
    if (!sessions) return;

    const weekStartDay = opts.startDay ?? ctx.config.analytics.weekStartDay;
    const analyzer = new SessionAnalyzer({ pricing: ctx.pricing, weekStartDay });
    const weeks = analyzer.weeklyReport(sessions, { year: opts.year });

    if (opts.json) {
      writeJson(toWeeklyRows(weeks, ctx.pricing));
      return;
    }
    if (weeks.length === 0) {
      process.stdout.write(chalk.dim(`No usage recorded${opts.year ? ` in ${opts.year}` : ''}.\n`));
      return;
    }

    const title = `Weekly Usage${opts.year ? ` (${opts.year})` : ''}`;
    process.stdout.write(chalk.bold(title) + chalk.dim(`  weeks start on ${WEEKDAY_NAMES[weekStartDay]}\n`));
    process.stdout.write(renderTable(weeklyTable(weeks, ctx.pricing, { breakdown: opts.breakdown }), ctx.config.ui.tableStyle));
  });
}
