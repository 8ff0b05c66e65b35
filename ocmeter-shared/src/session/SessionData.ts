/**
 * @fileoverview One continuous conversation with the assistant.
 *
 * Every aggregate is derived from the record list on access; nothing is
 * cached. Instances are only built by the loader when at least one record
 * with non-zero usage survives, so `records` is never empty in practice.
 *
 * @module session/SessionData
 */

import type Decimal from 'decimal.js';
import type { InteractionRecord, TokenUsage } from '../types/usage';
import { addTokenUsage, EMPTY_TOKEN_USAGE, sumTokenUsage, totalTokens } from '../types/usage';
import type { PricingTable } from '../pricing/types';
import { calculateRecordCost, sumDecimals } from '../pricing/pricingResolver';
import { projectNameFromPath, recordDurationMs, UNKNOWN_PROJECT } from './recordInfo';

/** Sessions are measured against a 5-hour window. */
export const MAX_SESSION_HOURS = 5;
export const MAX_TITLE_LENGTH = 50;

export interface ModelBreakdownEntry {
  files: number;
  tokens: TokenUsage;
  cost: Decimal;
}

export class SessionData {
  readonly sessionId: string;
  readonly sessionPath: string;
  readonly records: readonly InteractionRecord[];
  readonly title?: string;

  constructor(sessionId: string, sessionPath: string, records: readonly InteractionRecord[], title?: string) {
    this.sessionId = sessionId;
    this.sessionPath = sessionPath;
    this.records = Object.freeze([...records]);
    this.title = title;
  }

  /** Distinct models, in first-seen order. */
  get modelsUsed(): string[] {
    return [...new Set(this.records.map(r => r.modelId))];
  }

  get totalTokens(): TokenUsage {
    return sumTokenUsage(this.records.map(r => r.tokens));
  }

  /** Earliest record creation time (epoch ms). */
  get startTime(): number | undefined {
    let earliest: number | undefined;
    for (const record of this.records) {
      const created = record.time?.created;
      if (created !== undefined && (earliest === undefined || created < earliest)) earliest = created;
    }
    return earliest;
  }

  /** Latest record completion time (epoch ms). */
  get endTime(): number | undefined {
    let latest: number | undefined;
    for (const record of this.records) {
      const completed = record.time?.completed;
      if (completed !== undefined && (latest === undefined || completed > latest)) latest = completed;
    }
    return latest;
  }

  get durationMs(): number | undefined {
    const start = this.startTime;
    const end = this.endTime;
    if (start === undefined || end === undefined) return undefined;
    return end - start;
  }

  get durationHours(): number {
    const ms = this.durationMs;
    return ms ? ms / (1000 * 60 * 60) : 0;
  }

  /** Duration as a percentage of the 5-hour session window, capped at 100. */
  get durationPercentage(): number {
    return Math.min(100, (this.durationHours / MAX_SESSION_HOURS) * 100);
  }

  /** Sum of per-record active processing time. */
  get totalProcessingTimeMs(): number {
    let total = 0;
    for (const record of this.records) {
      total += recordDurationMs(record) ?? 0;
    }
    return total;
  }

  get interactionCount(): number {
    return this.records.length;
  }

  /**
   * Basename of the most frequent project path. Ties go to the path seen
   * first; "Unknown" when no record carries a path.
   */
  get projectName(): string {
    const counts = new Map<string, number>();
    for (const record of this.records) {
      if (record.projectPath) {
        counts.set(record.projectPath, (counts.get(record.projectPath) ?? 0) + 1);
      }
    }

    let best: string | undefined;
    let bestCount = 0;
    for (const [projectPath, count] of counts) {
      if (count > bestCount) {
        best = projectPath;
        bestCount = count;
      }
    }
    return best ? projectNameFromPath(best) : UNKNOWN_PROJECT;
  }

  /** Title truncated to 50 characters, falling back to the session ID. */
  get displayTitle(): string {
    if (!this.title) return this.sessionId;
    if (this.title.length > MAX_TITLE_LENGTH) {
      return this.title.substring(0, MAX_TITLE_LENGTH - 3) + '...';
    }
    return this.title;
  }

  calculateTotalCost(pricing: PricingTable): Decimal {
    return sumDecimals(this.records.map(r => calculateRecordCost(r, pricing)));
  }

  /** Per-model file count, tokens and cost, keyed in first-seen order. */
  getModelBreakdown(pricing: PricingTable): Map<string, ModelBreakdownEntry> {
    const breakdown = new Map<string, ModelBreakdownEntry>();
    for (const record of this.records) {
      const entry = breakdown.get(record.modelId);
      const cost = calculateRecordCost(record, pricing);
      if (entry) {
        breakdown.set(record.modelId, {
          files: entry.files + 1,
          tokens: addTokenUsage(entry.tokens, record.tokens),
          cost: entry.cost.plus(cost),
        });
      } else {
        breakdown.set(record.modelId, {
          files: 1,
          tokens: addTokenUsage(EMPTY_TOKEN_USAGE, record.tokens),
          cost,
        });
      }
    }
    return breakdown;
  }
}
