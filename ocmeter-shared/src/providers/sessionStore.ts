/**
 * @fileoverview Session discovery and loading over OpenCode's file storage.
 *
 * Layout:
 * - Sessions:  {messagesDir}/ses_{id}/{messageID}.json  (one file per interaction)
 * - Titles:    {storageDir}/session/{projectID}/ses_{id}.json  ({ "title": ... })
 *
 * Everything here is synchronous and read-only. Directory and file lists
 * are ordered by modification time, newest first, so the first session
 * directory is "the most recent session".
 *
 * @module providers/sessionStore
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '../logger';
import { createSilentLogger } from '../logger';
import { parseInteractionFile } from '../parsers/interactionParser';
import { SessionData } from '../session/SessionData';
import type { InteractionRecord } from '../types/usage';
import { totalTokens } from '../types/usage';

export const SESSION_DIR_PREFIX = 'ses_';

export interface SessionStoreOptions {
  /** Directory holding the ses_* session folders */
  messagesDir: string;
  /** OpenCode storage root holding the session/ title store; titles are skipped when absent */
  storageDir?: string;
  logger?: Logger;
}

export type LoadOutcome =
  | { status: 'ok'; sessions: SessionData[] }
  | { status: 'no-data'; reason: 'missing-root' | 'no-sessions' };

export interface SessionFileStats {
  sessionId: string;
  fileCount: number;
  /** Oldest file name */
  firstFile: string | null;
  /** Newest file name */
  lastFile: string | null;
  totalSizeBytes: number;
}

interface Entry {
  fullPath: string;
  name: string;
  mtimeMs: number;
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/** Newest first; equal mtimes fall back to name order. */
function byMtimeDesc(a: Entry, b: Entry): number {
  return b.mtimeMs - a.mtimeMs || a.name.localeCompare(b.name);
}

/** Entries accepted by `accept`, judged on `stat` so symlinked sessions and files count. */
function listEntries(dir: string, accept: (name: string, stats: fs.Stats) => boolean): Entry[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch {
    return [];
  }

  const entries: Entry[] = [];
  for (const name of names) {
    const fullPath = path.join(dir, name);
    let stats: fs.Stats;
    try {
      stats = fs.statSync(fullPath);
    } catch {
      // Vanished between readdir and stat, or a dangling link
      continue;
    }
    if (accept(name, stats)) {
      entries.push({ fullPath, name, mtimeMs: stats.mtimeMs });
    }
  }
  return entries.sort(byMtimeDesc);
}

/** All *.json files in a directory, newest first. */
export function findJsonFiles(dir: string): string[] {
  return listEntries(dir, (name, stats) => stats.isFile() && name.endsWith('.json')).map(e => e.fullPath);
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readJsonObject(filePath: string): Record<string, unknown> | null {
  try {
    const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return isJsonObject(data) ? data : null;
  } catch {
    return null;
  }
}

export class SessionStore {
  readonly messagesDir: string;
  readonly storageDir?: string;
  private readonly logger: Logger;

  constructor(options: SessionStoreOptions) {
    this.messagesDir = options.messagesDir;
    this.storageDir = options.storageDir;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** ses_* directories under the messages root, newest first. */
  findSessionDirectories(): string[] {
    return listEntries(
      this.messagesDir,
      (name, stats) => stats.isDirectory() && name.startsWith(SESSION_DIR_PREFIX),
    ).map(e => e.fullPath);
  }

  /**
   * Loads every record of a session directory. Unparseable and zero-usage
   * records are dropped; returns null when nothing survives.
   */
  loadSession(sessionPath: string): SessionData | null {
    if (!isDirectory(sessionPath)) return null;

    const sessionId = path.basename(sessionPath);
    const records: InteractionRecord[] = [];
    for (const file of findJsonFiles(sessionPath)) {
      const record = parseInteractionFile(file, sessionId);
      if (!record) {
        this.logger.debug('Skipping unreadable interaction file', { file });
        continue;
      }
      if (totalTokens(record.tokens) === 0) continue;
      records.push(record);
    }

    if (records.length === 0) return null;
    return new SessionData(sessionId, sessionPath, records, this.findSessionTitle(sessionId));
  }

  getMostRecentSession(): SessionData | null {
    const [latest] = this.findSessionDirectories();
    return latest ? this.loadSession(latest) : null;
  }

  /** Newest interaction file of a session, parsed without the zero-usage filter. */
  getMostRecentFile(sessionPath: string): InteractionRecord | null {
    const [latest] = findJsonFiles(sessionPath);
    return latest ? parseInteractionFile(latest, path.basename(sessionPath)) : null;
  }

  loadAllSessions(limit?: number): SessionData[] {
    const sessions: SessionData[] = [];
    for (const session of this.iterateSessions(limit)) {
      sessions.push(session);
    }
    return sessions;
  }

  /** Yields sessions lazily, newest first. `limit` caps directories scanned, not sessions yielded. */
  *iterateSessions(limit?: number): Generator<SessionData> {
    let dirs = this.findSessionDirectories();
    if (limit !== undefined && limit > 0) dirs = dirs.slice(0, limit);
    for (const dir of dirs) {
      const session = this.loadSession(dir);
      if (session) yield session;
    }
  }

  /** Loads all sessions, reporting an explicit no-data outcome instead of an empty list. */
  loadSessions(limit?: number): LoadOutcome {
    if (!isDirectory(this.messagesDir)) {
      this.logger.info('Session root not found', { messagesDir: this.messagesDir });
      return { status: 'no-data', reason: 'missing-root' };
    }
    const sessions = this.loadAllSessions(limit);
    if (sessions.length === 0) return { status: 'no-data', reason: 'no-sessions' };
    return { status: 'ok', sessions };
  }

  /** Looks up a session title across every project folder of the title store. */
  findSessionTitle(sessionId: string): string | undefined {
    if (!this.storageDir) return undefined;
    const titleRoot = path.join(this.storageDir, 'session');

    let projects: fs.Dirent[];
    try {
      projects = fs.readdirSync(titleRoot, { withFileTypes: true });
    } catch {
      return undefined;
    }

    for (const project of projects.sort((a, b) => a.name.localeCompare(b.name))) {
      if (!project.isDirectory()) continue;
      const data = readJsonObject(path.join(titleRoot, project.name, `${sessionId}.json`));
      const title = data?.['title'];
      if (typeof title === 'string') return title;
    }
    return undefined;
  }

  /**
   * True when a directory looks like a session: ses_ prefix and at least
   * one of its three newest files carries tokens or modelID.
   */
  validateSessionStructure(sessionPath: string): boolean {
    if (!isDirectory(sessionPath)) return false;
    if (!path.basename(sessionPath).startsWith(SESSION_DIR_PREFIX)) return false;

    for (const file of findJsonFiles(sessionPath).slice(0, 3)) {
      const data = readJsonObject(file);
      if (data && ('tokens' in data || 'modelID' in data)) return true;
    }
    return false;
  }

  /** File-level statistics without parsing records. Null for non-sessions. */
  getSessionStats(sessionPath: string): SessionFileStats | null {
    if (!this.validateSessionStructure(sessionPath)) return null;

    const files = findJsonFiles(sessionPath);
    let totalSizeBytes = 0;
    for (const file of files) {
      try {
        totalSizeBytes += fs.statSync(file).size;
      } catch {
        // Vanished; not counted
      }
    }

    return {
      sessionId: path.basename(sessionPath),
      fileCount: files.length,
      firstFile: files.length > 0 ? path.basename(files[files.length - 1]) : null,
      lastFile: files.length > 0 ? path.basename(files[0]) : null,
      totalSizeBytes,
    };
  }
}
