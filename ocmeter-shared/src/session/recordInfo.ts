/**
 * Derived attributes of a single interaction record.
 */

import * as path from 'path';
import type { InteractionRecord } from '../types/usage';
import { durationMs } from '../types/usage';

export const UNKNOWN_PROJECT = 'Unknown';

export function recordFileName(record: InteractionRecord): string {
  return path.basename(record.filePath);
}

/** Last path segment of a project directory, or "Unknown". */
export function projectNameFromPath(projectPath: string | undefined): string {
  if (!projectPath) return UNKNOWN_PROJECT;
  return path.basename(projectPath) || UNKNOWN_PROJECT;
}

export function recordProjectName(record: InteractionRecord): string {
  return projectNameFromPath(record.projectPath);
}

export function recordDurationMs(record: InteractionRecord): number | undefined {
  return durationMs(record.time);
}
