/**
 * Bare `ocmeter`: the period report named by `analytics.defaultTimeframe`.
 */

import type { Command } from 'commander';
import { loadAppConfig, unwrap } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { runAction } from '../context';
import { dailyAction } from './daily';
import { monthlyAction } from './monthly';
import { weeklyAction } from './weekly';

export async function defaultAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<GlobalOptions>();

  await runAction(async () => {
    const { config } = unwrap(loadAppConfig({ configPath: opts.config }));
    switch (config.analytics.defaultTimeframe) {
      case 'weekly':
        return weeklyAction(_opts, cmd);
      case 'monthly':
        return monthlyAction(_opts, cmd);
      case 'daily':
        return dailyAction(_opts, cmd);
    }
  });
}
