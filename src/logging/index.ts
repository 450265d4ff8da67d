/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  withTiming,
  type LogContext,
  type LoggerConfig,
  type CoreLogger,
  type StructuredLogger,
  type DomainLogMethods,
  type MutationSummary,
} from './logger.js';
