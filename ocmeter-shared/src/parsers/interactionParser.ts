/**
 * Parser for OpenCode interaction records (one JSON file per message).
 *
 * Expected shape, every field optional:
 * ```json
 * {
 *   "modelID": "claude-sonnet-4-20250514",
 *   "tokens": { "input": 10, "output": 20, "cache": { "read": 0, "write": 0 } },
 *   "time": { "created": 1718000000000, "completed": 1718000004200 },
 *   "path": { "cwd": "/home/dev/project", "root": "/home/dev/project" }
 * }
 * ```
 *
 * Anything unreadable or structurally wrong yields `null`; callers skip it.
 *
 * @module parsers/interactionParser
 */

import * as fs from 'fs';
import type { InteractionRecord, TimeData, TokenUsage } from '../types/usage';
import { UNKNOWN_MODEL, extractModelName } from './modelName';

type JsonObject = Record<string, unknown>;

/** Thrown internally when a field has the wrong shape; never escapes this module. */
class InvalidRecord extends Error {}

function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function objectField(data: JsonObject, key: string): JsonObject | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (!isObject(value)) throw new InvalidRecord(key);
  return value;
}

/** Non-negative integer counter, 0 when absent. */
function counter(data: JsonObject | undefined, key: string): number {
  const value = data?.[key];
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InvalidRecord(key);
  }
  return value;
}

/** Optional epoch-ms timestamp; null and absent both mean "unknown". */
function timestamp(data: JsonObject, key: string): number | undefined {
  const value = data[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) throw new InvalidRecord(key);
  return value;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readModelId(data: JsonObject): string {
  const value = data['modelID'];
  if (value === undefined || value === null || value === '') return UNKNOWN_MODEL;
  if (typeof value !== 'string') throw new InvalidRecord('modelID');
  return extractModelName(value);
}

function readTokens(data: JsonObject): TokenUsage {
  const tokens = objectField(data, 'tokens');
  const cache = tokens ? objectField(tokens, 'cache') : undefined;
  return {
    input: counter(tokens, 'input'),
    output: counter(tokens, 'output'),
    cacheWrite: counter(cache, 'write'),
    cacheRead: counter(cache, 'read'),
  };
}

function readTime(data: JsonObject): TimeData | undefined {
  const time = objectField(data, 'time');
  if (!time) return undefined;
  return { created: timestamp(time, 'created'), completed: timestamp(time, 'completed') };
}

function readProjectPath(data: JsonObject): string | undefined {
  const location = objectField(data, 'path');
  if (!location) return undefined;
  return nonEmptyString(location['cwd']) ?? nonEmptyString(location['root']);
}

export interface RecordSource {
  filePath: string;
  sessionId: string;
  modifiedAt: number;
}

/**
 * Builds a record from an already-decoded payload.
 * Returns null when the payload is not an object or a field is malformed.
 */
export function parseInteractionPayload(data: unknown, source: RecordSource): InteractionRecord | null {
  if (!isObject(data)) return null;
  try {
    return {
      filePath: source.filePath,
      sessionId: source.sessionId,
      modelId: readModelId(data),
      tokens: readTokens(data),
      time: readTime(data),
      projectPath: readProjectPath(data),
      modifiedAt: source.modifiedAt,
      raw: data,
    };
  } catch (error) {
    if (error instanceof InvalidRecord) return null;
    throw error;
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Reads and parses one interaction file. Missing files, permission errors,
 * invalid UTF-8 and malformed JSON all return null.
 */
export function parseInteractionFile(filePath: string, sessionId: string): InteractionRecord | null {
  let content: string;
  let modifiedAt: number;
  try {
    const stat = fs.statSync(filePath);
    modifiedAt = stat.mtimeMs;
    content = utf8.decode(fs.readFileSync(filePath));
  } catch {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }
  return parseInteractionPayload(data, { filePath, sessionId, modifiedAt });
}
