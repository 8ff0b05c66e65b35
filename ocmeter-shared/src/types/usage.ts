/**
 * Canonical in-memory model of OpenCode interaction records.
 *
 * Records are immutable once parsed. Aggregates never mutate a shared
 * TokenUsage; they build new values with {@link addTokenUsage}.
 */

export interface TokenUsage {
  readonly input: number;
  readonly output: number;
  readonly cacheWrite: number;
  readonly cacheRead: number;
}

/** Epoch-millisecond timestamps, as written by OpenCode. No timezone conversion. */
export interface TimeData {
  readonly created?: number;
  readonly completed?: number;
}

/** One billed unit of assistant work (one JSON file on disk). */
export interface InteractionRecord {
  /** Absolute path of the backing file; also the record's identity */
  readonly filePath: string;
  readonly sessionId: string;
  /** Normalized model identifier, or "unknown" */
  readonly modelId: string;
  readonly tokens: TokenUsage;
  readonly time?: TimeData;
  /** Working directory of the assistant when the record was written */
  readonly projectPath?: string;
  /** Backing file modification time (epoch ms) */
  readonly modifiedAt: number;
  /** Source payload, kept verbatim and never read by aggregation */
  readonly raw: Readonly<Record<string, unknown>>;
}

export const EMPTY_TOKEN_USAGE: TokenUsage = Object.freeze({
  input: 0,
  output: 0,
  cacheWrite: 0,
  cacheRead: 0,
});

export function createTokenUsage(partial?: Partial<TokenUsage>): TokenUsage {
  return {
    input: partial?.input ?? 0,
    output: partial?.output ?? 0,
    cacheWrite: partial?.cacheWrite ?? 0,
    cacheRead: partial?.cacheRead ?? 0,
  };
}

export function totalTokens(tokens: TokenUsage): number {
  return tokens.input + tokens.output + tokens.cacheWrite + tokens.cacheRead;
}

export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    input: a.input + b.input,
    output: a.output + b.output,
    cacheWrite: a.cacheWrite + b.cacheWrite,
    cacheRead: a.cacheRead + b.cacheRead,
  };
}

/** Field-wise sum over a collection. */
export function sumTokenUsage(items: Iterable<TokenUsage>): TokenUsage {
  let total = EMPTY_TOKEN_USAGE;
  for (const item of items) {
    total = addTokenUsage(total, item);
  }
  return total;
}

/** Duration in ms when both timestamps are present; undefined otherwise (never 0 by default). */
export function durationMs(time: TimeData | undefined): number | undefined {
  if (time?.created === undefined || time.completed === undefined) return undefined;
  return time.completed - time.created;
}
