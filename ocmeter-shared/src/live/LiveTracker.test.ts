import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Decimal from 'decimal.js';
import { SessionStore } from '../providers/sessionStore';
import { SessionData } from '../session/SessionData';
import { createTokenUsage } from '../types/usage';
import type { InteractionRecord, TokenUsage } from '../types/usage';
import type { PricingTable } from '../pricing/types';
import { LiveTracker, classifyActivity } from './LiveTracker';

const NOW = 1_750_000_000_000;

const table: PricingTable = new Map([
  ['gpt-5.1', {
    input: new Decimal('1'),
    output: new Decimal('10'),
    cacheWrite: new Decimal('0'),
    cacheRead: new Decimal('0'),
    contextWindow: 1_000,
    sessionQuota: new Decimal('5'),
  }],
]);

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'ocmeter-live-'));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function tracker(store = new SessionStore({ messagesDir: root })): LiveTracker {
  return new LiveTracker({ store, pricing: table, now: () => NOW });
}

function record(tokens: Partial<TokenUsage>, modifiedAt: number, durationMs?: number, modelId = 'gpt-5.1'): InteractionRecord {
  return {
    filePath: `/m/${modifiedAt}.json`,
    sessionId: 'ses_x',
    modelId,
    tokens: createTokenUsage(tokens),
    time: durationMs === undefined ? undefined : { created: modifiedAt - durationMs, completed: modifiedAt },
    modifiedAt,
    raw: {},
  };
}

/** Writes an interaction file with mtime in epoch ms. */
function writeInteraction(sessionId: string, name: string, output: number, mtimeMs: number): void {
  const dir = path.join(root, sessionId);
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify({ modelID: 'gpt-5-1', tokens: { input: 100, output } }));
  fs.utimesSync(file, mtimeMs / 1000, mtimeMs / 1000);
  fs.utimesSync(dir, mtimeMs / 1000, mtimeMs / 1000);
}

describe('classifyActivity', () => {
  it.each([
    [0, 'active'],
    [59.9, 'active'],
    [60, 'recent'],
    [299, 'recent'],
    [300, 'idle'],
    [1_799, 'idle'],
    [1_800, 'inactive'],
  ] as const)('classifies %s seconds as %s', (seconds, expected) => {
    expect(classifyActivity(seconds)).toBe(expected);
  });

  it('is unknown without activity', () => {
    expect(classifyActivity(undefined)).toBe('unknown');
  });
});

describe('LiveTracker.calculateOutputRate', () => {
  it('uses only records modified in the last five minutes', () => {
    const session = new SessionData('ses_x', '/m', [
      record({ output: 1_000 }, NOW - 10_000, 2_000),
      record({ output: 500 }, NOW - 4 * 60_000, 3_000),
      record({ output: 9_999 }, NOW - 6 * 60_000, 1_000),
    ]);
    expect(tracker().calculateOutputRate(session, NOW)).toBe(300);
  });

  it('is zero without qualifying duration', () => {
    const session = new SessionData('ses_x', '/m', [record({ output: 1_000 }, NOW - 1_000)]);
    expect(tracker().calculateOutputRate(session, NOW)).toBe(0);
  });
});

describe('LiveTracker.calculateContextUsage', () => {
  it('divides the prompt side by the context window', () => {
    const usage = tracker().calculateContextUsage(record({ input: 100, cacheRead: 150, cacheWrite: 50, output: 999 }, NOW));
    expect(usage).toEqual({ contextSize: 300, contextWindow: 1_000, usagePercentage: 30 });
  });

  it('caps at 100 percent', () => {
    expect(tracker().calculateContextUsage(record({ input: 5_000 }, NOW)).usagePercentage).toBe(100);
  });

  it('falls back to a 200k window and zero usage for an unpriced model', () => {
    const usage = tracker().calculateContextUsage(record({ input: 5_000 }, NOW, undefined, 'mystery'));
    expect(usage).toEqual({ contextSize: 0, contextWindow: 200_000, usagePercentage: 0 });
  });
});

describe('LiveTracker.tick', () => {
  it('returns null until a session exists', () => {
    expect(tracker().tick()).toBeNull();
  });

  it('reloads the same session and switches to a newer one', () => {
    const live = tracker();
    writeInteraction('ses_a', 'm1.json', 10, NOW - 120_000);

    const first = live.tick();
    expect(first?.session.sessionId).toBe('ses_a');
    expect(first?.switched).toBe(false);
    expect(first?.activity).toBe('recent');
    expect(first?.secondsSinceActivity).toBe(120);

    writeInteraction('ses_a', 'm2.json', 20, NOW - 30_000);
    const second = live.tick();
    expect(second?.session.interactionCount).toBe(2);
    expect(second?.activity).toBe('active');
    expect(second?.switched).toBe(false);

    writeInteraction('ses_b', 'm1.json', 5, NOW - 1_000);
    const third = live.tick();
    expect(third?.session.sessionId).toBe('ses_b');
    expect(third?.switched).toBe(true);
    expect(live.current?.sessionId).toBe('ses_b');
  });

  it('clears the switch flag when the newest session has nothing to load', () => {
    const live = tracker();
    writeInteraction('ses_a', 'm1.json', 10, NOW - 5_000);
    live.tick();
    writeInteraction('ses_b', 'm1.json', 10, NOW - 2_000);
    expect(live.tick()?.switched).toBe(true);

    const empty = path.join(root, 'ses_c');
    fs.mkdirSync(empty);
    fs.writeFileSync(path.join(empty, 'm1.json'), JSON.stringify({ modelID: 'gpt-5-1', tokens: { input: 0, output: 0 } }));
    fs.utimesSync(empty, (NOW - 1_000) / 1000, (NOW - 1_000) / 1000);

    const held = live.tick();
    expect(held?.session.sessionId).toBe('ses_b');
    expect(held?.switched).toBe(false);
    expect(held?.stale).toBe(false);
  });

  it('keeps the previous snapshot and marks it stale when a poll fails', () => {
    const store = new SessionStore({ messagesDir: root });
    const live = tracker(store);
    writeInteraction('ses_a', 'm1.json', 10, NOW - 1_000);
    const good = live.tick();

    vi.spyOn(store, 'getMostRecentSession').mockImplementation(() => {
      throw new Error('EIO: i/o error');
    });
    const stale = live.tick();

    expect(stale?.stale).toBe(true);
    expect(stale?.session).toBe(good?.session);
    expect(stale?.totalCost.equals(good?.totalCost ?? new Decimal(-1))).toBe(true);
  });

  it('carries cost, quota and context usage in the snapshot', () => {
    writeInteraction('ses_a', 'm1.json', 100_000, NOW - 1_000);
    const snapshot = tracker().tick();
    // 100 input @1 + 100k output @10, per million
    expect(snapshot?.totalCost.toString()).toBe('1.0001');
    expect(snapshot?.sessionQuota?.toString()).toBe('5');
    expect(snapshot?.contextUsage).toEqual({ contextSize: 100, contextWindow: 1_000, usagePercentage: 10 });
  });
});

describe('LiveTracker.run', () => {
  it('polls until the signal aborts', async () => {
    writeInteraction('ses_a', 'm1.json', 10, NOW - 1_000);
    const controller = new AbortController();
    const updates: Array<string | undefined> = [];

    await tracker().run({
      intervalMs: 1,
      signal: controller.signal,
      onUpdate: (snapshot) => {
        updates.push(snapshot?.session.sessionId);
        if (updates.length === 3) controller.abort();
      },
    });

    expect(updates).toEqual(['ses_a', 'ses_a', 'ses_a']);
  });

  it('does not tick when already aborted', async () => {
    const onUpdate = vi.fn();
    const controller = new AbortController();
    controller.abort();
    await tracker().run({ intervalMs: 1, signal: controller.signal, onUpdate });
    expect(onUpdate).not.toHaveBeenCalled();
  });
});

describe('LiveTracker status helpers', () => {
  it('reports no sessions', () => {
    expect(tracker().getSessionStatus()).toEqual({ status: 'no-sessions', message: 'No sessions found' });
    expect(tracker().monitorSingleUpdate()).toBeNull();
  });

  it('describes the most recent session', () => {
    writeInteraction('ses_a', 'm1.json', 10, NOW - 400_000);
    const status = tracker().getSessionStatus();
    expect(status.status).toBe('found');
    if (status.status === 'found') {
      expect(status.activity).toBe('idle');
      expect(status.recentFile).toEqual({ name: 'm1.json', model: 'gpt-5.1', tokens: 110 });
    }

    const update = tracker().monitorSingleUpdate();
    expect(update?.timestamp).toBe(NOW);
    expect(update?.recentInteraction?.fileName).toBe('m1.json');
  });

  it('flags a missing root as invalid', () => {
    const live = tracker(new SessionStore({ messagesDir: path.join(root, 'absent') }));
    expect(live.validateMonitoringSetup()).toEqual({
      valid: false,
      issues: [`Session directory does not exist: ${path.join(root, 'absent')}`],
      warnings: [],
    });
  });

  it('warns about an empty root and missing pricing', () => {
    const live = new LiveTracker({ store: new SessionStore({ messagesDir: root }), pricing: new Map() });
    expect(live.validateMonitoringSetup()).toEqual({
      valid: true,
      issues: [],
      warnings: ['No session directories found', 'No pricing data available - costs will show as $0.00'],
    });
  });
});
