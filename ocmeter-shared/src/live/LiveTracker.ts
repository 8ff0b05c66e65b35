/**
 * @fileoverview Follows the most recently active session across polls.
 *
 * Each tick re-resolves the newest session directory. A different session
 * id means the user started a new conversation and tracking switches to it;
 * the same id is simply re-read, which picks up records written since the
 * last poll. A tick that throws keeps the previous snapshot and marks it
 * stale, so a transient I/O failure never ends the loop.
 *
 * @module live/LiveTracker
 */

import * as fs from 'fs';
import { setTimeout as sleep } from 'timers/promises';
import type Decimal from 'decimal.js';
import type { Logger } from '../logger';
import { createSilentLogger } from '../logger';
import { errorMessage } from '../errors';
import { calculateRecordCost, DEFAULT_CONTEXT_WINDOW, resolvePricing } from '../pricing/pricingResolver';
import type { PricingTable } from '../pricing/types';
import type { SessionStore } from '../providers/sessionStore';
import type { SessionData } from '../session/SessionData';
import { recordDurationMs, recordFileName } from '../session/recordInfo';
import type { InteractionRecord, TokenUsage } from '../types/usage';
import { totalTokens } from '../types/usage';

/** Trailing window for the short-term output rate. */
export const OUTPUT_RATE_WINDOW_MS = 5 * 60_000;

export type ActivityStatus = 'active' | 'recent' | 'idle' | 'inactive' | 'unknown';

export interface ContextUsage {
  contextSize: number;
  contextWindow: number;
  /** 0–100 */
  usagePercentage: number;
}

export interface LiveSnapshot {
  session: SessionData;
  /** Newest record by file modification time */
  recentRecord?: InteractionRecord;
  totalCost: Decimal;
  /** Output tokens per second over the trailing five minutes */
  outputRate: number;
  secondsSinceActivity?: number;
  activity: ActivityStatus;
  contextUsage?: ContextUsage;
  sessionQuota?: Decimal;
  /** Tracking moved to a different session on this tick */
  switched: boolean;
  /** The last poll failed; figures are from the previous successful one */
  stale: boolean;
  updatedAt: number;
}

export type SessionStatus =
  | { status: 'no-sessions'; message: string }
  | {
    status: 'found';
    sessionId: string;
    interactionCount: number;
    totalTokens: number;
    totalCost: Decimal;
    modelsUsed: string[];
    lastActivitySeconds?: number;
    activity: ActivityStatus;
    outputRate: number;
    recentFile?: { name: string; model: string; tokens: number };
  };

export interface SingleUpdate {
  timestamp: number;
  session: {
    id: string;
    interactionCount: number;
    totalTokens: TokenUsage;
    totalCost: Decimal;
    modelsUsed: string[];
  };
  recentInteraction?: {
    fileName: string;
    modelId: string;
    tokens: TokenUsage;
    cost: Decimal;
    modifiedAt: number;
  };
  outputRate: number;
  contextUsage?: ContextUsage;
}

export interface MonitoringValidation {
  valid: boolean;
  issues: string[];
  warnings: string[];
}

export interface LiveTrackerOptions {
  store: SessionStore;
  pricing: PricingTable;
  logger?: Logger;
  /** Clock in epoch ms; defaults to Date.now */
  now?: () => number;
}

export interface RunOptions {
  intervalMs: number;
  signal: AbortSignal;
  onUpdate: (snapshot: LiveSnapshot | null) => void;
}

/** Maps seconds since the last record to an activity class. */
export function classifyActivity(secondsSince: number | undefined): ActivityStatus {
  if (secondsSince === undefined) return 'unknown';
  if (secondsSince < 60) return 'active';
  if (secondsSince < 300) return 'recent';
  if (secondsSince < 1800) return 'idle';
  return 'inactive';
}

export function mostRecentRecord(session: SessionData): InteractionRecord | undefined {
  let latest: InteractionRecord | undefined;
  for (const record of session.records) {
    if (!latest || record.modifiedAt > latest.modifiedAt) latest = record;
  }
  return latest;
}

export class LiveTracker {
  private readonly store: SessionStore;
  private readonly pricing: PricingTable;
  private readonly logger: Logger;
  private readonly now: () => number;
  private snapshot: LiveSnapshot | null = null;

  constructor(options: LiveTrackerOptions) {
    this.store = options.store;
    this.pricing = options.pricing;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
  }

  /** The session being tracked, if any. */
  get current(): SessionData | null {
    return this.snapshot?.session ?? null;
  }

  /**
   * Polls once. Returns null only while no session has ever been found.
   */
  tick(): LiveSnapshot | null {
    const previous = this.snapshot;
    try {
      const latest = this.store.getMostRecentSession();
      if (!latest) {
        // Nothing loadable right now; keep showing what we had
        if (previous) {
          this.snapshot = { ...previous, switched: false };
        }
        return this.snapshot;
      }
      const switched = previous !== null && previous.session.sessionId !== latest.sessionId;
      if (switched) {
        this.logger.info('New session detected', { sessionId: latest.sessionId });
      }
      this.snapshot = this.buildSnapshot(latest, switched);
    } catch (error) {
      this.logger.warn('Live poll failed; keeping previous state', { error: errorMessage(error) });
      if (previous) {
        this.snapshot = { ...previous, switched: false, stale: true };
      }
    }
    return this.snapshot;
  }

  /**
   * Ticks every `intervalMs` until `signal` aborts. The first tick runs
   * immediately.
   */
  async run(options: RunOptions): Promise<void> {
    const { intervalMs, signal, onUpdate } = options;
    while (!signal.aborted) {
      onUpdate(this.tick());
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }

  /**
   * Output tokens per second of processing time, over records modified in
   * the trailing five minutes.
   */
  calculateOutputRate(session: SessionData, now: number = this.now()): number {
    const cutoff = now - OUTPUT_RATE_WINDOW_MS;
    let outputTokens = 0;
    let durationMs = 0;
    for (const record of session.records) {
      if (record.modifiedAt < cutoff) continue;
      outputTokens += record.tokens.output;
      durationMs += recordDurationMs(record) ?? 0;
    }
    if (outputTokens === 0 || durationMs <= 0) return 0;
    return outputTokens / (durationMs / 1000);
  }

  /** Share of the model's context window filled by one record's prompt side. */
  calculateContextUsage(record: InteractionRecord): ContextUsage {
    const pricing = resolvePricing(record.modelId, this.pricing);
    if (!pricing) {
      return { contextSize: 0, contextWindow: DEFAULT_CONTEXT_WINDOW, usagePercentage: 0 };
    }
    const contextSize = record.tokens.input + record.tokens.cacheRead + record.tokens.cacheWrite;
    const contextWindow = pricing.contextWindow;
    const usage = contextWindow > 0 ? (contextSize / contextWindow) * 100 : 0;
    return { contextSize, contextWindow, usagePercentage: Math.min(100, usage) };
  }

  getSessionStatus(): SessionStatus {
    const session = this.store.getMostRecentSession();
    if (!session) {
      return { status: 'no-sessions', message: 'No sessions found' };
    }
    const recent = mostRecentRecord(session);
    const lastActivitySeconds = recent ? this.secondsSince(recent) : undefined;
    return {
      status: 'found',
      sessionId: session.sessionId,
      interactionCount: session.interactionCount,
      totalTokens: totalTokens(session.totalTokens),
      totalCost: session.calculateTotalCost(this.pricing),
      modelsUsed: session.modelsUsed,
      lastActivitySeconds,
      activity: classifyActivity(lastActivitySeconds),
      outputRate: this.calculateOutputRate(session),
      recentFile: recent
        ? { name: recordFileName(recent), model: recent.modelId, tokens: totalTokens(recent.tokens) }
        : undefined,
    };
  }

  /** One-shot poll without tracking state. Null when there is no session. */
  monitorSingleUpdate(): SingleUpdate | null {
    const session = this.store.getMostRecentSession();
    if (!session) return null;
    const recent = mostRecentRecord(session);
    return {
      timestamp: this.now(),
      session: {
        id: session.sessionId,
        interactionCount: session.interactionCount,
        totalTokens: session.totalTokens,
        totalCost: session.calculateTotalCost(this.pricing),
        modelsUsed: session.modelsUsed,
      },
      recentInteraction: recent
        ? {
          fileName: recordFileName(recent),
          modelId: recent.modelId,
          tokens: recent.tokens,
          cost: calculateRecordCost(recent, this.pricing),
          modifiedAt: recent.modifiedAt,
        }
        : undefined,
      outputRate: this.calculateOutputRate(session),
      contextUsage: recent ? this.calculateContextUsage(recent) : undefined,
    };
  }

  /** Checks that the session root exists and holds usable data before monitoring. */
  validateMonitoringSetup(): MonitoringValidation {
    const issues: string[] = [];
    const warnings: string[] = [];
    const root = this.store.messagesDir;

    let stat: fs.Stats;
    try {
      stat = fs.statSync(root);
    } catch {
      issues.push(`Session directory does not exist: ${root}`);
      return { valid: false, issues, warnings };
    }
    if (!stat.isDirectory()) {
      issues.push(`Session path is not a directory: ${root}`);
      return { valid: false, issues, warnings };
    }

    const [latest] = this.store.findSessionDirectories();
    if (!latest) {
      warnings.push('No session directories found');
    } else if (!this.store.loadSession(latest)) {
      warnings.push('Most recent session directory contains no valid data');
    }

    if (this.pricing.size === 0) {
      warnings.push('No pricing data available - costs will show as $0.00');
    }

    return { valid: issues.length === 0, issues, warnings };
  }

  private secondsSince(record: InteractionRecord): number {
    return (this.now() - record.modifiedAt) / 1000;
  }

  private buildSnapshot(session: SessionData, switched: boolean): LiveSnapshot {
    const recent = mostRecentRecord(session);
    const now = this.now();
    const secondsSinceActivity = recent ? this.secondsSince(recent) : undefined;
    const pricing = recent ? resolvePricing(recent.modelId, this.pricing) : undefined;
    return {
      session,
      recentRecord: recent,
      totalCost: session.calculateTotalCost(this.pricing),
      outputRate: this.calculateOutputRate(session, now),
      secondsSinceActivity,
      activity: classifyActivity(secondsSinceActivity),
      contextUsage: recent ? this.calculateContextUsage(recent) : undefined,
      sessionQuota: pricing?.sessionQuota,
      switched,
      stale: false,
      updatedAt: now,
    };
  }
}
