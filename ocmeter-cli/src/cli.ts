#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import type { ExportReport } from './options';
import {
  parseDate,
  parseExportFormat,
  parseExportReport,
  parseInterval,
  parseMonth,
  parsePositiveInt,
  parseStartDay,
  parseTimeframe,
  parseYear,
} from './options';

/** Version from the package manifest next to src/ and dist/. */
function readVersion(): string {
  try {
    const manifest: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));
    if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
      return manifest.version;
    }
  } catch {
    return '0.0.0';
  }
  return '0.0.0';
}

const program = new Command();

program
  .name('ocmeter')
  .description('Token usage, cost and live activity for OpenCode sessions')
  .version(readVersion())
  .option('--json', 'Output as JSON')
  .option('--config <path>', 'Use this config file instead of the default search')
  .option('--no-color', 'Disable colored output');

// Each action lazy-loads its module so startup only pays for the command run.

program
  .command('session')
  .description('Show usage, cost and health of one session directory')
  .argument('<path>', 'Session directory (ses_...)')
  .option('--interactions', 'List every interaction')
  .action(async (sessionPath: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { sessionAction } = await import('./commands/session');
    return sessionAction(sessionPath, _opts, cmd);
  });

program
  .command('sessions')
  .description('List recent sessions with totals')
  .option('--limit <n>', 'Number of sessions to load (default: analytics.recentSessionsLimit)', parsePositiveInt)
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { sessionsAction } = await import('./commands/sessions');
    return sessionsAction(_opts, cmd);
  });

program
  .command('daily')
  .description('Usage per day')
  .option('--month <YYYY-MM>', 'Only this month', parseMonth)
  .option('--breakdown', 'Show per-model rows under each day')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { dailyAction } = await import('./commands/daily');
    return dailyAction(_opts, cmd);
  });

program
  .command('weekly')
  .description('Usage per week')
  .option('--year <YYYY>', 'Only this year', parseYear)
  .option('--start-day <day>', 'First day of the week: 0-6 (Monday = 0) or a weekday name', parseStartDay)
  .option('--breakdown', 'Show per-model rows under each week')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { weeklyAction } = await import('./commands/weekly');
    return weeklyAction(_opts, cmd);
  });

program
  .command('monthly')
  .description('Usage per month')
  .option('--year <YYYY>', 'Only this year', parseYear)
  .option('--breakdown', 'Show per-model rows under each month')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { monthlyAction } = await import('./commands/monthly');
    return monthlyAction(_opts, cmd);
  });

program
  .command('models')
  .description('Usage and cost per model')
  .option('--timeframe <tf>', 'daily, weekly, monthly or all (default: all)', parseTimeframe)
  .option('--start <YYYY-MM-DD>', 'First day to include (overrides --timeframe)', parseDate)
  .option('--end <YYYY-MM-DD>', 'Last day to include (overrides --timeframe)', parseDate)
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { modelsAction } = await import('./commands/models');
    return modelsAction(_opts, cmd);
  });

program
  .command('projects')
  .description('Usage and cost per project')
  .option('--timeframe <tf>', 'daily, weekly, monthly or all (default: all)', parseTimeframe)
  .option('--start <YYYY-MM-DD>', 'First day to include (overrides --timeframe)', parseDate)
  .option('--end <YYYY-MM-DD>', 'Last day to include (overrides --timeframe)', parseDate)
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { projectsAction } = await import('./commands/projects');
    return projectsAction(_opts, cmd);
  });

program
  .command('live')
  .description('Follow the most recent session in a live dashboard (with --json: print one update)')
  .option('--interval <seconds>', 'Refresh interval, 1-60 (default: ui.liveRefreshInterval)', parseInterval)
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { liveAction } = await import('./commands/live');
    return liveAction(_opts, cmd);
  });

program
  .command('export')
  .description('Write a report to CSV or JSON')
  .argument('<report>', 'session, sessions, daily, weekly, monthly, models or projects', parseExportReport)
  .option('--format <format>', 'csv or json (default: export.defaultFormat)', parseExportFormat)
  .option('--output <path>', 'Output file (default: a timestamped file in paths.exportDir)')
  .option('--session <path>', 'Session directory for the session report')
  .option('--limit <n>', 'Number of sessions for the sessions report', parsePositiveInt)
  .option('--month <YYYY-MM>', 'Month filter for the daily report', parseMonth)
  .option('--year <YYYY>', 'Year filter for the weekly and monthly reports', parseYear)
  .option('--start-day <day>', 'First day of the week for the weekly report', parseStartDay)
  .option('--timeframe <tf>', 'Timeframe for the models and projects reports', parseTimeframe)
  .option('--start <YYYY-MM-DD>', 'First day for the models and projects reports', parseDate)
  .option('--end <YYYY-MM-DD>', 'Last day for the models and projects reports', parseDate)
  .action(async (report: ExportReport, _opts: Record<string, unknown>, cmd: Command) => {
    const { exportAction } = await import('./commands/export');
    return exportAction(report, _opts, cmd);
  });

const configCmd = program
  .command('config')
  .description('Inspect configuration');

configCmd
  .command('show')
  .description('Print the effective configuration and the files it came from')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { configShowAction } = await import('./commands/config');
    return configShowAction(_opts, cmd);
  });

// Bare `ocmeter` runs the report named by analytics.defaultTimeframe
program.action(async (_opts: Record<string, unknown>, cmd: Command) => {
  const { defaultAction } = await import('./commands/default');
  return defaultAction(_opts, cmd);
});

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
