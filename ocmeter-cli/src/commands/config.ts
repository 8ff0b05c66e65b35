/**
 * `ocmeter config show`: Print the effective configuration and where it came from.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { configSearchPaths } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { openContext, runAction, writeJson } from '../context';

export async function configShowAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<GlobalOptions>();

  await runAction(() => {
    const ctx = openContext(opts);

    if (opts.json) {
      writeJson({
        configPath: ctx.configPath ?? null,
        pricingPath: ctx.pricingPath ?? null,
        models: ctx.pricing.size,
        config: ctx.config,
      });
      return;
    }

    const out = process.stdout;
    out.write(chalk.bold('Configuration\n'));
    out.write(chalk.dim('─'.repeat(50) + '\n'));
    if (ctx.configPath) {
      out.write(`  ${chalk.dim('File:')}     ${ctx.configPath}\n`);
    } else {
      out.write(`  ${chalk.dim('File:')}     ${chalk.yellow('none found, using defaults')}\n`);
      for (const candidate of configSearchPaths()) {
        out.write(chalk.dim(`            searched ${candidate}\n`));
      }
    }
    out.write(`  ${chalk.dim('Pricing:')}  ${ctx.pricingPath ?? chalk.yellow('none')} ${chalk.dim(`(${ctx.pricing.size} models)`)}\n`);
    out.write('\n');

    for (const [section, values] of Object.entries(ctx.config)) {
      out.write(chalk.bold(`[${section}]\n`));
      for (const [key, value] of Object.entries(values)) {
        out.write(`  ${chalk.cyan(key.padEnd(22))} ${String(value)}\n`);
      }
    }
  });
}
