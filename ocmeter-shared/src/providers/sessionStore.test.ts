import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SessionStore, findJsonFiles } from './sessionStore';

let root: string;
let messagesDir: string;
let storageDir: string;

/** Writes a JSON file and pins its mtime (seconds since epoch). */
function writeJson(file: string, data: unknown, mtime: number): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, typeof data === 'string' ? data : JSON.stringify(data));
  fs.utimesSync(file, mtime, mtime);
}

function interaction(output: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    modelID: 'claude-sonnet-4-20250514',
    tokens: { input: 10, output, cache: { read: 0, write: 0 } },
    time: { created: 1_000, completed: 2_000 },
    path: { cwd: '/work/alpha' },
    ...extra,
  };
}

function makeSession(id: string, files: Array<[string, unknown, number]>, dirMtime: number): string {
  const dir = path.join(messagesDir, id);
  fs.mkdirSync(dir, { recursive: true });
  for (const [name, data, mtime] of files) {
    writeJson(path.join(dir, name), data, mtime);
  }
  fs.utimesSync(dir, dirMtime, dirMtime);
  return dir;
}

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'ocmeter-store-'));
  messagesDir = path.join(root, 'message');
  storageDir = root;
  fs.mkdirSync(messagesDir);
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('SessionStore discovery', () => {
  it('lists ses_ directories newest first and ignores others', () => {
    makeSession('ses_old', [['a.json', interaction(1), 100]], 1_000);
    makeSession('ses_new', [['a.json', interaction(1), 100]], 3_000);
    makeSession('other', [['a.json', interaction(1), 100]], 5_000);
    fs.writeFileSync(path.join(messagesDir, 'ses_file'), 'not a dir');

    const store = new SessionStore({ messagesDir });
    expect(store.findSessionDirectories().map(d => path.basename(d))).toEqual(['ses_new', 'ses_old']);
  });

  it('follows symlinked session directories', () => {
    const outside = path.join(root, 'elsewhere', 'ses_linked');
    fs.mkdirSync(outside, { recursive: true });
    writeJson(path.join(outside, 'a.json'), interaction(3), 100);
    fs.utimesSync(outside, 2_000, 2_000);
    makeSession('ses_real', [['a.json', interaction(1), 100]], 1_000);
    fs.symlinkSync(outside, path.join(messagesDir, 'ses_linked'), 'dir');

    const store = new SessionStore({ messagesDir });
    expect(store.findSessionDirectories().map(d => path.basename(d))).toEqual(['ses_linked', 'ses_real']);
    expect(store.getMostRecentSession()?.totalTokens.output).toBe(3);
  });

  it('orders json files newest first', () => {
    const dir = makeSession('ses_a', [
      ['first.json', interaction(1), 100],
      ['third.json', interaction(1), 300],
      ['second.json', interaction(1), 200],
      ['notes.txt', 'ignored', 400],
    ], 1_000);
    expect(findJsonFiles(dir).map(f => path.basename(f))).toEqual(['third.json', 'second.json', 'first.json']);
  });

  it('returns an empty list for a missing root', () => {
    const store = new SessionStore({ messagesDir: path.join(root, 'absent') });
    expect(store.findSessionDirectories()).toEqual([]);
  });
});

describe('SessionStore.loadSession', () => {
  it('skips unreadable and zero-usage records', () => {
    const dir = makeSession('ses_a', [
      ['good.json', interaction(5), 100],
      ['broken.json', '{"tokens":', 200],
      ['empty.json', { modelID: 'gpt-5', tokens: { input: 0, output: 0 } }, 300],
    ], 1_000);

    const session = new SessionStore({ messagesDir }).loadSession(dir);
    expect(session?.interactionCount).toBe(1);
    expect(session?.records[0].modelId).toBe('claude-sonnet-4');
    expect(session?.projectName).toBe('alpha');
  });

  it('treats a session of only zero-token records as absent', () => {
    const dir = makeSession('ses_zero', [
      ['a.json', { tokens: { input: 0, output: 0 } }, 100],
      ['b.json', { tokens: {} }, 200],
    ], 1_000);
    expect(new SessionStore({ messagesDir }).loadSession(dir)).toBeNull();
  });

  it('attaches the title from the per-project title store', () => {
    const dir = makeSession('ses_titled', [['a.json', interaction(3), 100]], 1_000);
    writeJson(path.join(storageDir, 'session', 'proj_1', 'ses_titled.json'), { title: 'Fix the parser' }, 100);

    const session = new SessionStore({ messagesDir, storageDir }).loadSession(dir);
    expect(session?.title).toBe('Fix the parser');
  });
});

describe('SessionStore aggregate loading', () => {
  it('returns the newest session as most recent', () => {
    makeSession('ses_old', [['a.json', interaction(1), 100]], 1_000);
    makeSession('ses_new', [['a.json', interaction(2), 100]], 2_000);
    expect(new SessionStore({ messagesDir }).getMostRecentSession()?.sessionId).toBe('ses_new');
  });

  it('reads the newest file without filtering zero usage', () => {
    const dir = makeSession('ses_a', [
      ['older.json', interaction(4), 100],
      ['newer.json', { tokens: { input: 0 } }, 200],
    ], 1_000);
    const latest = new SessionStore({ messagesDir }).getMostRecentFile(dir);
    expect(path.basename(latest?.filePath ?? '')).toBe('newer.json');
  });

  it('applies the limit to scanned directories', () => {
    makeSession('ses_1', [['a.json', interaction(1), 100]], 3_000);
    makeSession('ses_2', [['a.json', { tokens: {} }, 100]], 2_000);
    makeSession('ses_3', [['a.json', interaction(1), 100]], 1_000);

    const store = new SessionStore({ messagesDir });
    expect(store.loadAllSessions(2).map(s => s.sessionId)).toEqual(['ses_1']);
    expect(store.loadAllSessions().map(s => s.sessionId)).toEqual(['ses_1', 'ses_3']);
  });

  it('reports no-data for a missing root', () => {
    const store = new SessionStore({ messagesDir: path.join(root, 'absent') });
    expect(store.loadSessions()).toEqual({ status: 'no-data', reason: 'missing-root' });
  });

  it('reports no-data when no session survives', () => {
    makeSession('ses_zero', [['a.json', { tokens: {} }, 100]], 1_000);
    expect(new SessionStore({ messagesDir }).loadSessions()).toEqual({ status: 'no-data', reason: 'no-sessions' });
  });

  it('reports ok with the loaded sessions', () => {
    makeSession('ses_a', [['a.json', interaction(1), 100]], 1_000);
    const outcome = new SessionStore({ messagesDir }).loadSessions();
    expect(outcome.status).toBe('ok');
    expect(outcome.status === 'ok' ? outcome.sessions.length : 0).toBe(1);
  });
});

describe('SessionStore structure checks', () => {
  it('validates a session directory by its newest files', () => {
    const store = new SessionStore({ messagesDir });
    const good = makeSession('ses_good', [['a.json', { modelID: 'x' }, 100]], 1_000);
    const bad = makeSession('ses_bad', [['a.json', { other: true }, 100]], 1_000);
    const misnamed = makeSession('chat_1', [['a.json', interaction(1), 100]], 1_000);

    expect(store.validateSessionStructure(good)).toBe(true);
    expect(store.validateSessionStructure(bad)).toBe(false);
    expect(store.validateSessionStructure(misnamed)).toBe(false);
  });

  it('collects file statistics', () => {
    const dir = makeSession('ses_stats', [
      ['first.json', interaction(1), 100],
      ['last.json', interaction(1), 200],
    ], 1_000);
    const stats = new SessionStore({ messagesDir }).getSessionStats(dir);
    const expectedSize = fs.statSync(path.join(dir, 'first.json')).size + fs.statSync(path.join(dir, 'last.json')).size;

    expect(stats).toEqual({
      sessionId: 'ses_stats',
      fileCount: 2,
      firstFile: 'first.json',
      lastFile: 'last.json',
      totalSizeBytes: expectedSize,
    });
  });
});
