/**
 * `ocmeter models`: Usage and cost per model over a timeframe.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import type { Timeframe } from 'ocmeter-shared';
import { SessionAnalyzer, toModelRows } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { loadSessionsOrExplain, openContext, runAction, writeJson } from '../context';
import { describeRange, renderTable } from '../formatters';
import { modelsTable } from '../tables';

type ModelsOptions = GlobalOptions & {
  timeframe?: Timeframe;
  start?: string;
  end?: string;
};

export async function modelsAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<ModelsOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const sessions = loadSessionsOrExplain(ctx, opts);
    if (!sessions) return;

    const analyzer = new SessionAnalyzer({ pricing: ctx.pricing, weekStartDay: ctx.config.analytics.weekStartDay });
    const report = analyzer.modelsReport(sessions, { timeframe: opts.timeframe, start: opts.start, end: opts.end });

    if (opts.json) {
      writeJson(toModelRows(report));
      return;
    }

    process.stdout.write(chalk.bold('Model Usage') + chalk.dim(`  ${describeRange(report.startDate, report.endDate)}\n`));
    if (report.entries.length === 0) {
      process.stdout.write(chalk.dim('No model usage in this period.\n'));
      return;
    }
    process.stdout.write(renderTable(modelsTable(report), ctx.config.ui.tableStyle));
  });
}
