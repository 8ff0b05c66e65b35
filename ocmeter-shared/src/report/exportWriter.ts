/**
 * Writes report rows to disk as CSV or JSON.
 *
 * @module report/exportWriter
 */

import * as fs from 'fs';
import * as path from 'path';
import { ExportError } from '../errors';
import type { CellValue, ReportKind, Row } from './rows';

export type ExportFormat = 'csv' | 'json';

export interface ExportOptions {
  rows: readonly Row[];
  format: ExportFormat;
  report: ReportKind;
  /** Directory for generated file names; ignored when `outputPath` is given */
  exportDir: string;
  outputPath?: string;
  /** Wrap JSON output in `{ metadata, data }` */
  includeMetadata?: boolean;
  /** Extra metadata fields, e.g. the active filter */
  metadata?: Record<string, unknown>;
  now?: Date;
}

function escapeCsvCell(value: CellValue): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Column names across all rows, in first-seen order. */
export function collectColumns(rows: readonly Row[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) columns.add(key);
  }
  return [...columns];
}

/** RFC 4180 CSV with a header line and CRLF line endings. */
export function toCsv(rows: readonly Row[]): string {
  const columns = collectColumns(rows);
  const lines = [columns.map(escapeCsvCell).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvCell(row[column] ?? null)).join(','));
  }
  return lines.join('\r\n') + '\r\n';
}

export function toJson(rows: readonly Row[], metadata?: Record<string, unknown>): string {
  const body = metadata ? { metadata, data: rows } : rows;
  return JSON.stringify(body, null, 2) + '\n';
}

function timestampSuffix(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
    + `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}

/** e.g. ocmeter_daily_20250114_093000.csv */
export function defaultExportFileName(report: ReportKind, format: ExportFormat, now: Date = new Date()): string {
  return `ocmeter_${report}_${timestampSuffix(now)}.${format}`;
}

/**
 * Serializes and writes the rows. Returns the absolute path written.
 * @throws ExportError when there is nothing to write or the write fails
 */
export function writeExport(options: ExportOptions): string {
  const { rows, format, report } = options;
  if (rows.length === 0) {
    throw new ExportError(`No ${report} data to export`, { report });
  }

  const now = options.now ?? new Date();
  const target = path.resolve(
    options.outputPath ?? path.join(options.exportDir, defaultExportFileName(report, format, now)),
  );

  const content = format === 'csv'
    ? toCsv(rows)
    : toJson(rows, options.includeMetadata
      ? { report, generatedAt: now.toISOString(), rowCount: rows.length, ...options.metadata }
      : undefined);

  try {
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf-8');
  } catch (error) {
    throw new ExportError(`Failed to write export file: ${target}`, { target }, error);
  }
  return target;
}
