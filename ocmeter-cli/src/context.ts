/**
 * Plumbing shared by every command: global options, context loading and
 * the error boundary around each action.
 */

import chalk from 'chalk';
import type { AppContext, SessionData } from 'ocmeter-shared';
import { createAppContext, createLogger, errorMessage } from 'ocmeter-shared';

/** Options every command inherits from the program. */
export type GlobalOptions = {
  json?: boolean;
  config?: string;
  /** False under --no-color */
  color?: boolean;
};

/**
 * Loads config and pricing into a fresh context.
 * @throws ConfigError for an unreadable or invalid config or pricing file
 */
export function openContext(opts: GlobalOptions): AppContext {
  const logger = createLogger();
  const result = createAppContext({ configPath: opts.config, logger });
  if (!result.ok) {
    logger.error('Failed to load configuration', { error: result.error.message, ...result.error.context });
    throw result.error;
  }
  if (opts.color === false || !result.value.config.ui.colors) {
    chalk.level = 0;
  }
  return result.value;
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

/**
 * Loads sessions, or explains why there are none. Returns null after
 * printing the explanation.
 */
export function loadSessionsOrExplain(ctx: AppContext, opts: GlobalOptions, limit?: number): SessionData[] | null {
  const outcome = ctx.store.loadSessions(limit);
  if (outcome.status === 'ok') return outcome.sessions;

  if (opts.json) {
    writeJson([]);
    return null;
  }
  const dir = ctx.config.paths.messagesDir;
  if (outcome.reason === 'missing-root') {
    process.stdout.write(chalk.dim(`No OpenCode session directory found at ${dir}\n`));
    process.stdout.write(chalk.dim('Set paths.messagesDir in the config file if OpenCode stores sessions elsewhere.\n'));
  } else {
    process.stdout.write(chalk.dim(`No sessions with usage data found in ${dir}\n`));
  }
  return null;
}

/** Runs an action, reporting any failure on stderr with a non-zero exit code. */
export async function runAction(action: () => void | Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  }
}
