/**
 * Zod schemas for the ocmeter configuration file and the pricing table.
 * Every field has a default, so an empty object (or no file at all) is a
 * valid configuration.
 */
import Decimal from 'decimal.js';
import { z } from 'zod';
import { expandPath, getDefaultMessagesDir, getDefaultStorageDir } from '../paths';

type Env = Readonly<Record<string, string | undefined>>;

// ─── Application Config ─────────────────────────────────────────

/**
 * Builds the config schema. Path defaults depend on the environment
 * (XDG_DATA_HOME), and every path value has `~` and `$VAR` expanded.
 */
export function buildConfigSchema(env: Env = process.env) {
  const pathField = (fallback: string) =>
    z.string().min(1, 'Path cannot be empty').default(fallback).transform((p) => expandPath(p, env));

  const pathsSchema = z.object({
    messagesDir: pathField(getDefaultMessagesDir(env)),
    storageDir: pathField(getDefaultStorageDir(env)),
    exportDir: pathField('./exports'),
  });

  const uiSchema = z.object({
    tableStyle: z.enum(['rich', 'simple', 'minimal']).default('rich'),
    progressBars: z.boolean().default(true),
    colors: z.boolean().default(true),
    liveRefreshInterval: z.number().int().min(1).max(60, 'Refresh interval cannot exceed 60 seconds').default(5),
  });

  const exportSchema = z.object({
    defaultFormat: z.enum(['csv', 'json']).default('csv'),
    includeMetadata: z.boolean().default(true),
    includeRawData: z.boolean().default(false),
  });

  const modelsSchema = z.object({
    configFile: z.string().min(1).default('models.json'),
  });

  const analyticsSchema = z.object({
    defaultTimeframe: z.enum(['daily', 'weekly', 'monthly']).default('daily'),
    recentSessionsLimit: z.number().int().min(1).max(1000).default(50),
    /** Monday = 0 … Sunday = 6 */
    weekStartDay: z
      .union([
        z.literal(0), z.literal(1), z.literal(2), z.literal(3),
        z.literal(4), z.literal(5), z.literal(6),
      ])
      .default(0),
  });

  return z.object({
    paths: pathsSchema.default({}),
    ui: uiSchema.default({}),
    export: exportSchema.default({}),
    models: modelsSchema.default({}),
    analytics: analyticsSchema.default({}),
  });
}

export type AppConfig = z.output<ReturnType<typeof buildConfigSchema>>;
export type TableStyle = AppConfig['ui']['tableStyle'];

// ─── Pricing ────────────────────────────────────────────────────

/** Non-negative price as a JSON number or a decimal string, parsed exactly. */
const priceSchema = z
  .union([
    z.number().nonnegative('Price cannot be negative'),
    z.string().regex(/^\d+(\.\d+)?$/, 'Price must be a non-negative decimal'),
  ])
  .transform((value) => new Decimal(value));

export const modelPricingSchema = z.object({
  input: priceSchema,
  output: priceSchema,
  cacheWrite: priceSchema,
  cacheRead: priceSchema,
  contextWindow: z.number().int().positive('Context window must be a positive integer'),
  sessionQuota: priceSchema,
});

export const pricingFileSchema = z.record(z.string().min(1), modelPricingSchema);
