/**
 * Calendar buckets. Each bucket owns its children (sessions, days or
 * weeks) and derives every total by summing over them on access.
 *
 * @module aggregation/periods
 */

import type Decimal from 'decimal.js';
import { sumDecimals } from '../pricing/pricingResolver';
import type { PricingTable } from '../pricing/types';
import type { SessionData } from '../session/SessionData';
import type { TokenUsage } from '../types/usage';
import { sumTokenUsage } from '../types/usage';
import { formatWeekLabel } from './dates';

/** Distinct values across groups, in first-seen order. */
function mergeDistinct(groups: Iterable<readonly string[]>): string[] {
  const seen = new Set<string>();
  for (const group of groups) {
    for (const value of group) seen.add(value);
  }
  return [...seen];
}

export class DailyUsage {
  constructor(
    /** Local `YYYY-MM-DD` */
    readonly date: string,
    readonly sessions: readonly SessionData[],
  ) {}

  get totalTokens(): TokenUsage {
    return sumTokenUsage(this.sessions.map(s => s.totalTokens));
  }

  get totalSessions(): number {
    return this.sessions.length;
  }

  get totalInteractions(): number {
    return this.sessions.reduce((sum, s) => sum + s.interactionCount, 0);
  }

  get modelsUsed(): string[] {
    return mergeDistinct(this.sessions.map(s => s.modelsUsed));
  }

  calculateTotalCost(pricing: PricingTable): Decimal {
    return sumDecimals(this.sessions.map(s => s.calculateTotalCost(pricing)));
  }
}

export class WeeklyUsage {
  constructor(
    /** ISO year of `startDate` */
    readonly year: number,
    /** ISO week number of `startDate` */
    readonly week: number,
    readonly startDate: string,
    readonly endDate: string,
    readonly days: readonly DailyUsage[],
  ) {}

  get label(): string {
    return formatWeekLabel(this.year, this.week);
  }

  get sessions(): SessionData[] {
    return this.days.flatMap(d => d.sessions);
  }

  get totalTokens(): TokenUsage {
    return sumTokenUsage(this.days.map(d => d.totalTokens));
  }

  get totalSessions(): number {
    return this.days.reduce((sum, d) => sum + d.totalSessions, 0);
  }

  get totalInteractions(): number {
    return this.days.reduce((sum, d) => sum + d.totalInteractions, 0);
  }

  get modelsUsed(): string[] {
    return mergeDistinct(this.days.map(d => d.modelsUsed));
  }

  calculateTotalCost(pricing: PricingTable): Decimal {
    return sumDecimals(this.days.map(d => d.calculateTotalCost(pricing)));
  }
}

export class MonthlyUsage {
  constructor(
    readonly year: number,
    /** 1–12 */
    readonly month: number,
    readonly weeks: readonly WeeklyUsage[],
  ) {}

  get sessions(): SessionData[] {
    return this.weeks.flatMap(w => w.sessions);
  }

  get totalTokens(): TokenUsage {
    return sumTokenUsage(this.weeks.map(w => w.totalTokens));
  }

  get totalSessions(): number {
    return this.weeks.reduce((sum, w) => sum + w.totalSessions, 0);
  }

  get totalInteractions(): number {
    return this.weeks.reduce((sum, w) => sum + w.totalInteractions, 0);
  }

  get modelsUsed(): string[] {
    return mergeDistinct(this.weeks.map(w => w.modelsUsed));
  }

  calculateTotalCost(pricing: PricingTable): Decimal {
    return sumDecimals(this.weeks.map(w => w.calculateTotalCost(pricing)));
  }
}
