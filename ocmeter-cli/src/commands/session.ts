/**
 * `ocmeter session <path>`: Usage, cost and health of one session directory.
 */

import * as path from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import { SessionAnalyzer, SessionNotFoundError, toSessionRows, toSessionSummaryRows, totalTokens } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { openContext, runAction, writeJson } from '../context';
import { fmtInt, formatCost, formatDuration, formatTimestamp, makeBar, renderTable, usageColor } from '../formatters';
import { interactionsTable, sessionModelTable } from '../tables';

type SessionOptions = GlobalOptions & {
  interactions?: boolean;
};

function field(label: string, value: string): string {
  return `  ${chalk.dim(label.padEnd(15))} ${value}\n`;
}

export async function sessionAction(sessionPath: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<SessionOptions>();

  await runAction(() => {
    const ctx = openContext(opts);
    const resolved = path.resolve(sessionPath);
    const session = ctx.store.loadSession(resolved);
    if (!session) throw new SessionNotFoundError(resolved);

    const analyzer = new SessionAnalyzer({ pricing: ctx.pricing });
    const stats = analyzer.getSessionStatistics(session);
    const health = analyzer.validateSessionHealth(session);

    if (opts.json) {
      writeJson({
        models: toSessionSummaryRows([session], ctx.pricing),
        interactions: toSessionRows(session, ctx.pricing),
        warnings: health.warnings,
      });
      return;
    }

    const style = ctx.config.ui.tableStyle;
    const out = process.stdout;
    out.write(chalk.bold(`Session: ${stats.title}\n`));
    out.write(chalk.dim('─'.repeat(50) + '\n'));
    out.write(field('ID:', stats.sessionId));
    out.write(field('Project:', stats.projectName));
    out.write(field('Started:', formatTimestamp(stats.startTime)));

    let duration = formatDuration(stats.durationMs);
    if (ctx.config.ui.progressBars && stats.durationMs !== undefined) {
      const pct = session.durationPercentage;
      duration += '  ' + chalk[usageColor(pct)](makeBar(pct, 20)) + chalk.dim(` ${pct.toFixed(0)}% of 5h`);
    }
    out.write(field('Duration:', duration));
    out.write(field('Interactions:', fmtInt(stats.interactionCount)));
    out.write(field('Tokens:', chalk.bold(fmtInt(totalTokens(stats.totalTokens)))));
    out.write(field('Cost:', chalk.green(formatCost(stats.totalCost))));
    out.write(field('Output rate:', `${stats.avgOutputRate.toFixed(1)} tok/s`));
    out.write('\n');

    out.write(chalk.bold('Models\n'));
    out.write(renderTable(sessionModelTable(session, ctx.pricing), style));

    if (opts.interactions) {
      out.write('\n' + chalk.bold('Interactions\n'));
      out.write(renderTable(interactionsTable(session, ctx.pricing), style));
    }

    if (health.warnings.length > 0) {
      out.write('\n' + chalk.yellow('Warnings\n'));
      for (const warning of health.warnings) out.write(chalk.yellow(`  - ${warning}\n`));
    }
  });
}
