/**
 * Maps (possibly non-canonical) model identifiers to pricing entries and
 * computes costs in decimal arithmetic.
 *
 * Lookup order, first hit wins:
 * 1. exact key
 * 2. normalized identifier
 * 3. same-family fuzzy match: key and identifier are prefixes of each
 *    other and become equal once an "-extended" suffix is removed
 *
 * @module pricing/pricingResolver
 */

import Decimal from 'decimal.js';
import { normalizeModelName } from '../parsers/modelName';
import type { InteractionRecord, TokenUsage } from '../types/usage';
import type { ModelPricing, PricingTable } from './types';

export const DEFAULT_CONTEXT_WINDOW = 200_000;

const EXTENDED_SUFFIX = '-extended';
const MILLION = new Decimal(1_000_000);
const ZERO = new Decimal(0);

function isSameFamily(normalized: string, key: string): boolean {
  if (!normalized.startsWith(key) && !key.startsWith(normalized)) return false;
  return key.replaceAll(EXTENDED_SUFFIX, '') === normalized
    || normalized.replaceAll(EXTENDED_SUFFIX, '') === key;
}

export function resolvePricing(modelId: string, table: PricingTable): ModelPricing | undefined {
  const exact = table.get(modelId);
  if (exact) return exact;

  const normalized = normalizeModelName(modelId);
  const byNormalized = table.get(normalized);
  if (byNormalized) return byNormalized;

  for (const [key, pricing] of table) {
    if (isSameFamily(normalized, key)) return pricing;
  }
  return undefined;
}

/** Σ (tokens / 1M) × price over the four token categories. */
export function calculateCost(tokens: TokenUsage, pricing: ModelPricing): Decimal {
  return new Decimal(tokens.input).div(MILLION).mul(pricing.input)
    .plus(new Decimal(tokens.output).div(MILLION).mul(pricing.output))
    .plus(new Decimal(tokens.cacheWrite).div(MILLION).mul(pricing.cacheWrite))
    .plus(new Decimal(tokens.cacheRead).div(MILLION).mul(pricing.cacheRead));
}

/** Cost of one record; zero when the model has no pricing entry. */
export function calculateRecordCost(record: InteractionRecord, table: PricingTable): Decimal {
  const pricing = resolvePricing(record.modelId, table);
  return pricing ? calculateCost(record.tokens, pricing) : ZERO;
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

export function getContextWindow(modelId: string, table: PricingTable): number {
  return resolvePricing(modelId, table)?.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
}

export function getSessionQuota(modelId: string, table: PricingTable): Decimal | undefined {
  return resolvePricing(modelId, table)?.sessionQuota;
}
