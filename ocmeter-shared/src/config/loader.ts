/**
 * Configuration loader: finds and validates the JSON config file, loads
 * the pricing table, and assembles the application context that every
 * command receives.
 *
 * There is no module-level state. Reloading builds a new context; the old
 * one stays valid for whoever still holds it.
 */
import * as fs from 'fs';
import * as path from 'path';

import { ConfigError } from '../errors';
import type { Logger } from '../logger';
import { createSilentLogger } from '../logger';
import { getConfigDir } from '../paths';
import type { ModelPricing, PricingTable } from '../pricing/types';
import { SessionStore } from '../providers/sessionStore';
import type { Result } from '../result';
import { err, ok } from '../result';
import type { AppConfig } from './schema';
import { buildConfigSchema, pricingFileSchema } from './schema';

type Env = Readonly<Record<string, string | undefined>>;

export const CONFIG_FILE_NAME = 'config.json';
export const LOCAL_CONFIG_FILE_NAME = 'ocmeter.json';

/** Pricing table shipped with the package. */
export const BUNDLED_PRICING_FILE = path.resolve(__dirname, '..', '..', 'data', 'models.json');

export interface LoadedConfig {
  config: AppConfig;
  /** File the config was read from; undefined when defaults were used */
  configPath?: string;
}

export interface AppContext extends LoadedConfig {
  pricing: PricingTable;
  /** Undefined when no pricing file was found (every cost is zero) */
  pricingPath?: string;
  store: SessionStore;
  logger: Logger;
}

export interface LoadConfigOptions {
  /** Explicit path; must exist when given */
  configPath?: string;
  /** Working directory searched for ocmeter.json */
  cwd?: string;
  env?: Env;
}

export interface CreateContextOptions extends LoadConfigOptions {
  logger?: Logger;
}

// ─── Discovery ──────────────────────────────────────────────────

/** Candidate config files, in priority order. */
export function configSearchPaths(cwd: string = process.cwd(), env: Env = process.env): string[] {
  return [
    path.join(getConfigDir(env), CONFIG_FILE_NAME),
    path.join(cwd, LOCAL_CONFIG_FILE_NAME),
  ];
}

function findConfigFile(cwd: string, env: Env): string | undefined {
  return configSearchPaths(cwd, env).find((candidate) => fs.existsSync(candidate));
}

function readJsonFile(filePath: string, what: string): Result<unknown, ConfigError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    const message = code === 'ENOENT'
      ? `${what} not found: ${filePath}`
      : `Failed to read ${what.toLowerCase()}: ${filePath}`;
    return err(new ConfigError(message, { filePath, errorCode: code }, error));
  }

  try {
    return ok(JSON.parse(content));
  } catch (error) {
    return err(new ConfigError(`Invalid JSON in ${what.toLowerCase()}: ${filePath}`, { filePath }, error));
  }
}

function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

// ─── Config ─────────────────────────────────────────────────────

/**
 * Loads the application config.
 *
 * 1. An explicit path wins and must exist
 * 2. Otherwise the first existing search path is read
 * 3. With no file at all, every default applies
 */
export function loadAppConfig(options: LoadConfigOptions = {}): Result<LoadedConfig, ConfigError> {
  const env = options.env ?? process.env;
  const schema = buildConfigSchema(env);
  const configPath = options.configPath
    ? path.resolve(options.configPath)
    : findConfigFile(options.cwd ?? process.cwd(), env);

  if (!configPath) {
    return ok({ config: schema.parse({}) });
  }

  const raw = readJsonFile(configPath, 'Configuration file');
  if (!raw.ok) return raw;

  const validation = schema.safeParse(raw.value);
  if (!validation.success) {
    return err(
      new ConfigError(`Invalid configuration file ${configPath}: ${formatIssues(validation.error.issues)}`, {
        filePath: configPath,
        issues: validation.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      }),
    );
  }

  return ok({ config: validation.data, configPath });
}

// ─── Pricing ────────────────────────────────────────────────────

/**
 * Locates the pricing file: the configured name relative to the config
 * file's directory (or as given, when absolute), else the bundled table.
 */
export function resolvePricingPath(loaded: LoadedConfig, env: Env = process.env): string | undefined {
  const configured = loaded.config.models.configFile;
  const candidate = path.isAbsolute(configured)
    ? configured
    : path.join(loaded.configPath ? path.dirname(loaded.configPath) : getConfigDir(env), configured);

  if (fs.existsSync(candidate)) return candidate;
  if (fs.existsSync(BUNDLED_PRICING_FILE)) return BUNDLED_PRICING_FILE;
  return undefined;
}

/** Reads and validates a pricing table. Key order is preserved. */
export function loadPricingTable(filePath: string): Result<PricingTable, ConfigError> {
  const raw = readJsonFile(filePath, 'Pricing file');
  if (!raw.ok) return raw;

  const validation = pricingFileSchema.safeParse(raw.value);
  if (!validation.success) {
    return err(
      new ConfigError(`Invalid pricing file ${filePath}: ${formatIssues(validation.error.issues)}`, {
        filePath,
      }),
    );
  }

  const table = new Map<string, ModelPricing>();
  for (const [model, pricing] of Object.entries(validation.data)) {
    table.set(model, pricing);
  }
  return ok(table);
}

// ─── Context ────────────────────────────────────────────────────

/** Loads config and pricing and wires the session store. */
export function createAppContext(options: CreateContextOptions = {}): Result<AppContext, ConfigError> {
  const logger = options.logger ?? createSilentLogger();

  const loaded = loadAppConfig(options);
  if (!loaded.ok) return loaded;

  const pricingPath = resolvePricingPath(loaded.value, options.env);
  let pricing: PricingTable = new Map();
  if (pricingPath) {
    const table = loadPricingTable(pricingPath);
    if (!table.ok) return table;
    pricing = table.value;
  } else {
    logger.warn('No pricing file found; costs will be zero');
  }

  const { config, configPath } = loaded.value;
  logger.debug('Configuration loaded', { configPath, pricingPath, models: pricing.size });

  return ok({
    config,
    configPath,
    pricing,
    pricingPath,
    store: new SessionStore({
      messagesDir: config.paths.messagesDir,
      storageDir: config.paths.storageDir,
      logger: logger.child({ component: 'sessionStore' }),
    }),
    logger,
  });
}

/**
 * Re-reads the same config source into a fresh context. The previous
 * context is left untouched.
 */
export function reloadAppContext(
  previous: AppContext,
  options: Omit<CreateContextOptions, 'configPath' | 'logger'> = {},
): Result<AppContext, ConfigError> {
  return createAppContext({ ...options, configPath: previous.configPath, logger: previous.logger });
}
