import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseInteractionFile, parseInteractionPayload } from './interactionParser';

const source = { filePath: '/tmp/ses_a/msg_1.json', sessionId: 'ses_a', modifiedAt: 1_000 };

describe('parseInteractionPayload', () => {
  it('maps every field of a complete record', () => {
    const record = parseInteractionPayload({
      modelID: 'claude-sonnet-4-20250514',
      tokens: { input: 10, output: 20, cache: { read: 3, write: 4 } },
      time: { created: 100, completed: 350 },
      path: { cwd: '/home/dev/alpha', root: '/home/dev' },
    }, source);

    expect(record).not.toBeNull();
    expect(record?.modelId).toBe('claude-sonnet-4');
    expect(record?.tokens).toEqual({ input: 10, output: 20, cacheWrite: 4, cacheRead: 3 });
    expect(record?.time).toEqual({ created: 100, completed: 350 });
    expect(record?.projectPath).toBe('/home/dev/alpha');
    expect(record?.modifiedAt).toBe(1_000);
    expect(record?.sessionId).toBe('ses_a');
  });

  it('defaults absent fields', () => {
    const record = parseInteractionPayload({}, source);
    expect(record?.modelId).toBe('unknown');
    expect(record?.tokens).toEqual({ input: 0, output: 0, cacheWrite: 0, cacheRead: 0 });
    expect(record?.time).toBeUndefined();
    expect(record?.projectPath).toBeUndefined();
  });

  it('treats an empty modelID as unknown', () => {
    expect(parseInteractionPayload({ modelID: '' }, source)?.modelId).toBe('unknown');
  });

  it('falls back to path.root when cwd is missing', () => {
    expect(parseInteractionPayload({ path: { root: '/repo' } }, source)?.projectPath).toBe('/repo');
  });

  it('keeps null timestamps as unknown', () => {
    const record = parseInteractionPayload({ time: { created: 5, completed: null } }, source);
    expect(record?.time).toEqual({ created: 5, completed: undefined });
  });

  it.each([
    ['an array payload', []],
    ['a string payload', 'nope'],
    ['a negative counter', { tokens: { input: -1 } }],
    ['a fractional counter', { tokens: { output: 1.5 } }],
    ['a non-object tokens field', { tokens: 12 }],
    ['a non-string modelID', { modelID: 42 }],
    ['a non-object time field', { time: 'yesterday' }],
  ])('rejects %s', (_label, payload) => {
    expect(parseInteractionPayload(payload, source)).toBeNull();
  });

  it('sums back to the raw counters exactly', () => {
    const record = parseInteractionPayload({
      tokens: { input: 123_456_789, output: 987_654, cache: { read: 11, write: 7 } },
    }, source);
    const t = record?.tokens;
    expect(t ? t.input + t.output + t.cacheWrite + t.cacheRead : -1).toBe(123_456_789 + 987_654 + 11 + 7);
  });
});

describe('parseInteractionFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ocmeter-parser-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads the record and its modification time', () => {
    const file = path.join(dir, 'msg_1.json');
    fs.writeFileSync(file, JSON.stringify({ modelID: 'gpt-5-1', tokens: { output: 9 } }));
    fs.utimesSync(file, 1_700_000_000, 1_700_000_000);

    const record = parseInteractionFile(file, 'ses_x');
    expect(record?.modelId).toBe('gpt-5.1');
    expect(record?.tokens.output).toBe(9);
    expect(record?.modifiedAt).toBe(1_700_000_000_000);
    expect(record?.filePath).toBe(file);
  });

  it('returns null for malformed JSON', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{"modelID": ');
    expect(parseInteractionFile(file, 'ses_x')).toBeNull();
  });

  it('returns null for invalid UTF-8', () => {
    const file = path.join(dir, 'binary.json');
    fs.writeFileSync(file, Buffer.from([0x7b, 0xff, 0xfe, 0x7d]));
    expect(parseInteractionFile(file, 'ses_x')).toBeNull();
  });

  it('returns null for a missing file', () => {
    expect(parseInteractionFile(path.join(dir, 'absent.json'), 'ses_x')).toBeNull();
  });
});
