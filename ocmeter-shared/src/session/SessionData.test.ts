import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { SessionData } from './SessionData';
import { createTokenUsage } from '../types/usage';
import type { InteractionRecord, TimeData, TokenUsage } from '../types/usage';
import type { PricingTable } from '../pricing/types';

let seq = 0;
function record(overrides: {
  modelId?: string;
  tokens?: Partial<TokenUsage>;
  time?: TimeData;
  projectPath?: string;
} = {}): InteractionRecord {
  seq += 1;
  return {
    filePath: `/store/ses_t/msg_${seq}.json`,
    sessionId: 'ses_t',
    modelId: overrides.modelId ?? 'gpt-5.1',
    tokens: createTokenUsage(overrides.tokens ?? { input: 100, output: 50 }),
    time: overrides.time,
    projectPath: overrides.projectPath,
    modifiedAt: seq,
    raw: {},
  };
}

const table: PricingTable = new Map([
  ['gpt-5.1', {
    input: new Decimal('1'),
    output: new Decimal('10'),
    cacheWrite: new Decimal('0'),
    cacheRead: new Decimal('0'),
    contextWindow: 400_000,
    sessionQuota: new Decimal('5'),
  }],
]);

describe('SessionData', () => {
  it('derives time bounds from created and completed timestamps', () => {
    const session = new SessionData('ses_t', '/store/ses_t', [
      record({ time: { created: 2_000, completed: 5_000 } }),
      record({ time: { created: 1_000, completed: 1_500 } }),
      record(),
    ]);
    expect(session.startTime).toBe(1_000);
    expect(session.endTime).toBe(5_000);
    expect(session.durationMs).toBe(4_000);
    expect(session.totalProcessingTimeMs).toBe(3_500);
  });

  it('has no duration without timing data', () => {
    const session = new SessionData('ses_t', '/store/ses_t', [record()]);
    expect(session.durationMs).toBeUndefined();
    expect(session.durationHours).toBe(0);
  });

  it('caps the duration percentage at 100', () => {
    const session = new SessionData('ses_t', '/store/ses_t', [
      record({ time: { created: 0, completed: 6 * 3_600_000 } }),
    ]);
    expect(session.durationPercentage).toBe(100);
  });

  it('sums tokens and lists models in first-seen order', () => {
    const session = new SessionData('ses_t', '/store/ses_t', [
      record({ modelId: 'b-model', tokens: { input: 1 } }),
      record({ modelId: 'a-model', tokens: { output: 2 } }),
      record({ modelId: 'b-model', tokens: { cacheRead: 3 } }),
    ]);
    expect(session.modelsUsed).toEqual(['b-model', 'a-model']);
    expect(session.totalTokens).toEqual({ input: 1, output: 2, cacheWrite: 0, cacheRead: 3 });
    expect(session.interactionCount).toBe(3);
  });

  it('picks the most frequent project path', () => {
    const session = new SessionData('ses_t', '/store/ses_t', [
      record({ projectPath: '/work/alpha' }),
      record({ projectPath: '/work/beta' }),
      record({ projectPath: '/work/beta' }),
    ]);
    expect(session.projectName).toBe('beta');
  });

  it('breaks project ties in favour of the path seen first', () => {
    const session = new SessionData('ses_t', '/store/ses_t', [
      record({ projectPath: '/work/gamma' }),
      record({ projectPath: '/work/delta' }),
      record({ projectPath: '/work/delta' }),
      record({ projectPath: '/work/gamma' }),
    ]);
    expect(session.projectName).toBe('gamma');
  });

  it('reports Unknown without any project path', () => {
    expect(new SessionData('ses_t', '/store/ses_t', [record()]).projectName).toBe('Unknown');
  });

  it('truncates long titles and falls back to the id', () => {
    const long = 'x'.repeat(60);
    expect(new SessionData('ses_t', '/s', [record()], long).displayTitle).toBe('x'.repeat(47) + '...');
    expect(new SessionData('ses_t', '/s', [record()], 'short').displayTitle).toBe('short');
    expect(new SessionData('ses_t', '/s', [record()]).displayTitle).toBe('ses_t');
  });

  it('prices records and breaks cost down per model', () => {
    const session = new SessionData('ses_t', '/store/ses_t', [
      record({ tokens: { input: 1_000_000 } }),
      record({ tokens: { output: 100_000 } }),
      record({ modelId: 'unpriced', tokens: { input: 5 } }),
    ]);
    expect(session.calculateTotalCost(table).toString()).toBe('2');

    const breakdown = session.getModelBreakdown(table);
    expect([...breakdown.keys()]).toEqual(['gpt-5.1', 'unpriced']);
    expect(breakdown.get('gpt-5.1')?.files).toBe(2);
    expect(breakdown.get('gpt-5.1')?.tokens).toEqual({ input: 1_000_000, output: 100_000, cacheWrite: 0, cacheRead: 0 });
    expect(breakdown.get('unpriced')?.cost.isZero()).toBe(true);
  });
});
