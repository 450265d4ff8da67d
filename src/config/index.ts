/**
 * Configuration Module
 * @module config
 */

export {
  AppConfigSchema,
  StoreConfigSchema,
  AggregationConfigSchema,
  LoggingConfigSchema,
  Environment,
  LogLevel,
  type AppConfig,
  type StoreConfig,
  type AggregationConfig,
  type LoggingConfig,
  type PartialAppConfig,
} from './schema.js';

export {
  ConfigLoader,
  EnvironmentConfigSource,
  ObjectConfigSource,
  validateConfig,
  defaultConfig,
  loadConfig,
  type ConfigSource,
  type ConfigLoaderOptions,
  type RawConfig,
} from './loader.js';
