/**
 * Shared formatting utilities for tables and the live dashboard.
 */

import chalk from 'chalk';
import type Decimal from 'decimal.js';
import type { ActivityStatus, TableStyle, TokenUsage } from 'ocmeter-shared';
import { totalTokens } from 'ocmeter-shared';

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/** Strip ANSI color sequences from text. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/** Return the printed width of text that may contain color sequences. */
export function visibleLength(text: string): number {
  return stripAnsi(text).length;
}

/** Format a number with K/M suffixes. */
export function fmtNum(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${(n / 1_000).toFixed(1)}K`;
  return n.toLocaleString('en-US');
}

/** Full integer with thousands separators. */
export function fmtInt(n: number): string {
  return n.toLocaleString('en-US');
}

/** Dollar amount with two decimals. */
export function formatCost(value: Decimal | number): string {
  return '$' + (typeof value === 'number' ? value.toFixed(2) : value.toFixed(2));
}

/** Format a duration in ms to a human-readable string. */
export function formatDuration(ms: number | undefined): string {
  if (ms === undefined) return '-';
  if (ms < 1000) return `${ms}ms`;
  const secs = ms / 1000;
  if (secs < 60) return `${secs.toFixed(1)}s`;
  const mins = Math.floor(secs / 60);
  if (mins < 60) return `${mins}m${Math.floor(secs % 60)}s`;
  return `${Math.floor(mins / 60)}h${mins % 60}m`;
}

/** Local `YYYY-MM-DD HH:MM`, or `-` without a timestamp. */
export function formatTimestamp(epochMs: number | undefined): string {
  if (epochMs === undefined) return '-';
  const d = new Date(epochMs);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/** "12s ago", "4m ago", "2h ago". */
export function formatAgo(seconds: number | undefined): string {
  if (seconds === undefined) return 'never';
  const s = Math.max(0, Math.floor(seconds));
  if (s < 60) return `${s}s ago`;
  if (s < 3600) return `${Math.floor(s / 60)}m ago`;
  return `${Math.floor(s / 3600)}h ago`;
}

/** Truncate text to maxLength, appending "..." if truncated. */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

/** Build a progress bar of given width. */
export function makeBar(percent: number, width: number): string {
  const clamped = Math.max(0, Math.min(100, percent));
  const filled = Math.round((clamped / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/** Color for a usage percentage: green below 50, yellow below 80, red above. */
export function usageColor(percent: number): 'green' | 'yellow' | 'red' {
  if (percent < 50) return 'green';
  if (percent < 80) return 'yellow';
  return 'red';
}

export function activityColor(status: ActivityStatus): 'green' | 'yellow' | 'gray' | 'red' {
  switch (status) {
    case 'active': return 'green';
    case 'recent': return 'yellow';
    case 'idle': return 'gray';
    case 'inactive': return 'red';
    default: return 'gray';
  }
}

/** Input, output, cache write, cache read and total cells. */
export function tokenCells(tokens: TokenUsage): string[] {
  return [
    fmtInt(tokens.input),
    fmtInt(tokens.output),
    fmtInt(tokens.cacheWrite),
    fmtInt(tokens.cacheRead),
    fmtInt(totalTokens(tokens)),
  ];
}

export const TOKEN_HEADERS = ['Input', 'Output', 'Cache W', 'Cache R', 'Total'] as const;

// ── Tables ──

export interface Column {
  header: string;
  align?: 'left' | 'right';
}

export interface TableData {
  columns: Column[];
  rows: string[][];
  /** Totals row, set off from the body */
  footer?: string[];
}

function pad(text: string, width: number, align: 'left' | 'right' = 'left'): string {
  const gap = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? gap + text : text + gap;
}

function columnWidths(table: TableData): number[] {
  const lines = [...table.rows, ...(table.footer ? [table.footer] : [])];
  return table.columns.map((column, i) =>
    Math.max(visibleLength(column.header), ...lines.map(line => visibleLength(line[i] ?? ''))),
  );
}

/**
 * Render a table as lines of text.
 *
 * `rich` draws box borders, `simple` underlines the header, `minimal`
 * separates columns by whitespace only.
 */
export function renderTable(table: TableData, style: TableStyle = 'rich'): string {
  const widths = columnWidths(table);
  const cells = (line: string[], bold = false) => table.columns.map((column, i) => {
    const text = line[i] ?? '';
    return pad(bold ? chalk.bold(text) : text, widths[i] ?? 0, column.align);
  });
  const header = table.columns.map(c => c.header);

  if (style === 'rich') {
    const rule = (left: string, mid: string, right: string) =>
      chalk.dim(left + widths.map(w => '─'.repeat(w + 2)).join(mid) + right);
    const line = (parts: string[]) =>
      chalk.dim('│') + ' ' + parts.join(' ' + chalk.dim('│') + ' ') + ' ' + chalk.dim('│');
    const out = [rule('┌', '┬', '┐'), line(cells(header, true)), rule('├', '┼', '┤')];
    for (const row of table.rows) out.push(line(cells(row)));
    if (table.footer) {
      out.push(rule('├', '┼', '┤'));
      out.push(line(cells(table.footer, true)));
    }
    out.push(rule('└', '┴', '┘'));
    return out.join('\n') + '\n';
  }

  const join = (parts: string[]) => parts.join('  ').trimEnd();
  const out = [join(cells(header, true))];
  if (style === 'simple') out.push(widths.map(w => '-'.repeat(w)).join('  '));
  for (const row of table.rows) out.push(join(cells(row)));
  if (table.footer) {
    if (style === 'simple') out.push(widths.map(w => '-'.repeat(w)).join('  '));
    out.push(join(cells(table.footer, true)));
  }
  return out.join('\n') + '\n';
}

/** Human description of a report's date bounds. */
export function describeRange(startDate?: string, endDate?: string): string {
  if (startDate && endDate) return startDate === endDate ? startDate : `${startDate} to ${endDate}`;
  if (startDate) return `since ${startDate}`;
  if (endDate) return `until ${endDate}`;
  return 'all time';
}
