/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation.
 * Sources are merged in priority order (defaults < environment < overrides)
 * and the result is validated against AppConfigSchema.
 */

import pino from 'pino';
import { AppConfigSchema, type AppConfig, type PartialAppConfig } from './schema.js';
import { ConfigurationError } from '../errors/index.js';

const logger = pino({ name: 'config-loader', level: process.env.LOG_LEVEL || 'info' });

// ============================================================================
// Source Types
// ============================================================================

type RawSection = Record<string, unknown>;

/**
 * Unvalidated configuration as produced by a source
 */
export interface RawConfig {
  env?: unknown;
  store?: RawSection;
  aggregation?: RawSection;
  logging?: RawSection;
}

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  /** Unique name for the source */
  readonly name: string;
  /** Priority level (higher = overrides lower) */
  readonly priority: number;
  /** Load configuration from this source */
  load(): Promise<RawConfig>;
  /** Whether this source is available */
  isAvailable(): boolean;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  return value === undefined || value === '' ? undefined : value === 'true';
}

/**
 * Drop undefined leaves so lower-priority values survive the merge
 */
function compact(section: RawSection): RawSection | undefined {
  const entries = Object.entries(section).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * Environment variable configuration source
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    const env = this.env;

    return {
      env: env.NODE_ENV || undefined,
      store: compact({
        rootPath: env.CLUSTER_STORE_PATH || undefined,
        backend: env.CLUSTER_STORE_BACKEND || undefined,
      }),
      aggregation: compact({
        unmaskedThreshold: parseNumber(env.UNMASKED_THRESHOLD),
        progressBatchSize: parseNumber(env.PROGRESS_BATCH_SIZE),
      }),
      logging: compact({
        level: env.LOG_LEVEL || undefined,
        pretty: parseBoolean(env.LOG_PRETTY),
      }),
    };
  }
}

// ============================================================================
// Object Configuration Source
// ============================================================================

/**
 * In-code configuration, typically explicit overrides from the caller
 */
export class ObjectConfigSource implements ConfigSource {
  constructor(
    private readonly values: PartialAppConfig,
    public readonly name = 'overrides',
    public readonly priority = 100
  ) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    return this.values;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

export interface ConfigLoaderOptions {
  /** Sources to load (defaults to the environment only) */
  sources?: ConfigSource[];
}

/**
 * Loads, merges and validates configuration from multiple sources
 */
export class ConfigLoader {
  private readonly sources: ConfigSource[];

  constructor(options: ConfigLoaderOptions = {}) {
    this.sources = [...(options.sources ?? [new EnvironmentConfigSource()])].sort(
      (a, b) => a.priority - b.priority
    );
  }

  /**
   * Add a configuration source
   */
  addSource(source: ConfigSource): void {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Load all available sources and validate the merged result
   * @throws ConfigurationError when validation fails
   */
  async load(): Promise<AppConfig> {
    const merged: RawConfig = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }
      const partial = await source.load();
      mergeInto(merged, partial);
      logger.debug({ source: source.name }, 'Loaded config from source');
    }

    return validateConfig(merged);
  }
}

function mergeInto(target: RawConfig, source: RawConfig): void {
  if (source.env !== undefined) {
    target.env = source.env;
  }
  if (source.store) {
    target.store = { ...target.store, ...source.store };
  }
  if (source.aggregation) {
    target.aggregation = { ...target.aggregation, ...source.aggregation };
  }
  if (source.logging) {
    target.logging = { ...target.logging, ...source.logging };
  }
}

/**
 * Validate raw configuration against the schema
 * @throws ConfigurationError listing every failing path
 */
export function validateConfig(raw: RawConfig): AppConfig {
  const result = AppConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    logger.error({ issues }, 'Configuration validation failed');
    throw new ConfigurationError('Invalid configuration', issues);
  }

  return result.data;
}

/**
 * Configuration with every default applied
 */
export function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Load configuration from the environment, with optional overrides on top
 */
export async function loadConfig(overrides: PartialAppConfig = {}): Promise<AppConfig> {
  const loader = new ConfigLoader();
  loader.addSource(new ObjectConfigSource(overrides));
  return loader.load();
}
