/**
 * Model identifier canonicalization for pricing lookup.
 *
 * OpenCode writes model IDs either namespaced ("qwen/qwen3-coder") or as
 * flat vendor strings ("claude-sonnet-4-20250514"). Flat IDs are
 * normalized; namespaced ones are only lower-cased.
 *
 * @module parsers/modelName
 */

export const UNKNOWN_MODEL = 'unknown';

/** Trailing -YYYYMMDD release date. */
const DATE_SUFFIX_RE = /-\d{8}$/;

/** Bare "-X-Y" version not already part of a dotted version. */
const SPLIT_VERSION_RE = /-(\d+)-(\d+)(?![.\d])/g;

/** Family rules, applied in order after the generic version rule. */
const FAMILY_RULES: ReadonlyArray<readonly [RegExp, string]> = [
  [/claude-(opus|sonnet|haiku)-(\d+)-(\d+)/g, 'claude-$1-$2.$3'],
  [/gpt-(\d+)-(\d+)/g, 'gpt-$1.$2'],
  [/kimi-k-(\d+)/g, 'kimi-k$1'],
];

/**
 * Normalizes a flat model ID: lower-case, strip date suffix, dot the
 * version, then apply family-specific rules. Idempotent.
 *
 * @example normalizeModelName('claude-opus-4-5-20251101') // 'claude-opus-4.5'
 */
export function normalizeModelName(modelId: string): string {
  let name = modelId.toLowerCase();
  name = name.replace(DATE_SUFFIX_RE, '');
  name = name.replace(SPLIT_VERSION_RE, '-$1.$2');
  for (const [pattern, replacement] of FAMILY_RULES) {
    name = name.replace(pattern, replacement);
  }
  return name;
}

/** Resolves a raw modelID field to the identifier stored on a record. */
export function extractModelName(modelId: string): string {
  if (modelId.includes('/')) {
    return modelId.toLowerCase();
  }
  return normalizeModelName(modelId);
}
