/**
 * `ocmeter live`: Follow the most recent session until interrupted.
 * Uses Ink (React for the terminal) for rendering.
 */

import React from 'react';
import type { Command } from 'commander';
import chalk from 'chalk';
import type { LiveSnapshot } from 'ocmeter-shared';
import { ConfigError, LiveTracker } from 'ocmeter-shared';
import type { GlobalOptions } from '../context';
import { openContext, runAction, writeJson } from '../context';
import { LiveDashboard } from '../dashboard/LiveDashboard';

type LiveOptions = GlobalOptions & {
  interval?: number;
};

export async function liveAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  const opts = cmd.optsWithGlobals<LiveOptions>();

  await runAction(async () => {
    const ctx = openContext(opts);
    const tracker = new LiveTracker({
      store: ctx.store,
      pricing: ctx.pricing,
      logger: ctx.logger.child({ component: 'liveTracker' }),
    });

    const setup = tracker.validateMonitoringSetup();
    if (!setup.valid) {
      throw new ConfigError(setup.issues.join('; '), { messagesDir: ctx.config.paths.messagesDir });
    }

    // One-shot poll for scripts
    if (opts.json) {
      writeJson(tracker.monitorSingleUpdate());
      return;
    }

    for (const warning of setup.warnings) {
      process.stderr.write(chalk.yellow(`Warning: ${warning}\n`));
    }

    const intervalSeconds = opts.interval ?? ctx.config.ui.liveRefreshInterval;
    const view = (snapshot: LiveSnapshot | null) =>
      React.createElement(LiveDashboard, {
        snapshot,
        intervalSeconds,
        messagesDir: ctx.config.paths.messagesDir,
        progressBars: ctx.config.ui.progressBars,
      });

    const { render } = await import('ink');
    const instance = render(view(null), { exitOnCtrlC: false });

    const controller = new AbortController();
    const stop = () => controller.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    try {
      await tracker.run({
        intervalMs: intervalSeconds * 1000,
        signal: controller.signal,
        onUpdate: (snapshot) => instance.rerender(view(snapshot)),
      });
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      instance.unmount();
    }
  });
}
