import type Decimal from 'decimal.js';

/** Per-model reference pricing. Costs are USD per million tokens. */
export interface ModelPricing {
  readonly input: Decimal;
  readonly output: Decimal;
  readonly cacheWrite: Decimal;
  readonly cacheRead: Decimal;
  readonly contextWindow: number;
  readonly sessionQuota: Decimal;
}

/**
 * Model identifier → pricing. Iteration order is file order, which is the
 * order fuzzy matching scans keys in.
 */
export type PricingTable = ReadonlyMap<string, ModelPricing>;
