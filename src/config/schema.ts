/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating the cluster curation configuration.
 * Provides type-safe configuration with compile-time type inference.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Store Configuration
// ============================================================================

/**
 * Persistent tier configuration
 */
export const StoreConfigSchema = z.object({
  /** Directory holding one sub-directory per dataset */
  rootPath: z.string().min(1).default('.cluster-store'),
  /** Persistent medium behind the cache */
  backend: z.enum(['disk', 'memory']).default('disk'),
});

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

// ============================================================================
// Aggregation Configuration
// ============================================================================

/**
 * Feature/mask aggregation configuration
 */
export const AggregationConfigSchema = z.object({
  /** Channels whose mean mask exceeds this are counted as unmasked */
  unmaskedThreshold: z.coerce.number().min(0).max(1).default(1e-3),
  /** Items between two progress notifications during distribution */
  progressBatchSize: z.coerce.number().int().min(1).default(100),
});

export type AggregationConfig = z.infer<typeof AggregationConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

export const LoggingConfigSchema = z.object({
  level: LogLevel.default('info'),
  pretty: z.boolean().default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Root Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  store: StoreConfigSchema.default({}),
  aggregation: AggregationConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Deep-partial configuration accepted from individual sources
 */
export interface PartialAppConfig {
  env?: Environment;
  store?: Partial<StoreConfig>;
  aggregation?: Partial<AggregationConfig>;
  logging?: Partial<LoggingConfig>;
}
