/**
 * `ocmeter projects`: Usage and cost per project directory over a timeframe.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import type { Timeframe } from 'ocmeter-shared';
import { SessionAnalyzer, toProjectRows } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { loadSessionsOrExplain, openContext, runAction, writeJson } from '../context';
import { describeRange, renderTable } from '../formatters';
import { projectsTable } from '../tables';

type ProjectsOptions = GlobalOptions & {
  timeframe?: Timeframe;
  start?: string;
  end?: string;
};

export async function projectsAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<ProjectsOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const sessions = loadSessionsOrExplain(ctx, opts);
    if (!sessions) return;

    const analyzer = new SessionAnalyzer({ pricing: ctx.pricing, weekStartDay: ctx.config.analytics.weekStartDay });
    const report = analyzer.projectsReport(sessions, { timeframe: opts.timeframe, start: opts.start, end: opts.end });

    if (opts.json) {
      writeJson(toProjectRows(report));
      return;
    }

    process.stdout.write(chalk.bold('Project Usage') + chalk.dim(`  ${describeRange(report.startDate, report.endDate)}\n`));
    if (report.entries.length === 0) {
      process.stdout.write(chalk.dim('No project activity in this period.\n'));
      return;
    }
    process.stdout.write(renderTable(projectsTable(report), ctx.config.ui.tableStyle));
  });
}
