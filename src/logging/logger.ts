/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the cluster curation core.
 * Includes domain-specific logging methods for session lifecycle,
 * partition mutations, history moves and cache passes.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  dataset?: string;
  module?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  service: string;
  version: string;
  environment: string;
}

/**
 * The subset of a Pino logger the core components write through.
 * Components accept this so callers can hand in any child logger.
 */
export type CoreLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Summary of a partition mutation, for logging
 */
export interface MutationSummary {
  readonly description: string;
  readonly history: 'undo' | 'redo' | null;
  readonly added: readonly number[];
  readonly deleted: readonly number[];
  readonly affectedItems: number;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  sessionOpened(dataset: string, nItems: number, nGroups: number): void;
  sessionClosed(dataset: string): void;
  mutationApplied(summary: MutationSummary): void;
  historyMoved(direction: 'undo' | 'redo', position: number, size: number): void;
  passCompleted(item: string, kind: 'generate' | 'update', groups: number, durationMs: number): void;
  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void;
}

/**
 * Pino logger extended with domain-specific methods
 */
export type StructuredLogger = Logger & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
    service: process.env.SERVICE_NAME || 'cluster-curator',
    version: process.env.SERVICE_VERSION || '1.0.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    sessionOpened(dataset, nItems, nGroups) {
      logger.info(
        { event: 'session_opened', dataset, nItems, nGroups },
        `Session opened for ${dataset}: ${nItems} items in ${nGroups} groups`
      );
    },

    sessionClosed(dataset) {
      logger.info({ event: 'session_closed', dataset }, `Session closed for ${dataset}`);
    },

    mutationApplied(summary) {
      logger.info(
        {
          event: 'mutation_applied',
          description: summary.description,
          history: summary.history,
          added: summary.added,
          deleted: summary.deleted,
          affectedItems: summary.affectedItems,
        },
        `${summary.history ?? 'apply'} ${summary.description}: +${summary.added.length} -${summary.deleted.length} groups`
      );
    },

    historyMoved(direction, position, size) {
      logger.debug(
        { event: 'history_moved', direction, position, size },
        `History ${direction} to ${position}/${size}`
      );
    },

    passCompleted(item, kind, groups, durationMs) {
      logger.info(
        { event: 'cache_pass_completed', item, kind, groups, durationMs },
        `Cache ${kind} for '${item}' covered ${groups} groups in ${durationMs}ms`
      );
    },

    performanceMetric(operation, duration, metadata) {
      logger.debug(
        { event: 'performance_metric', operation, durationMs: duration, ...metadata },
        `${operation} took ${duration}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: Partial<LoggerConfig> = {}
): StructuredLogger {
  const config = { ...defaultConfig(), ...overrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    destination = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Runs a synchronous function and reports its duration
 */
export function withTiming<T>(logger: StructuredLogger, operation: string, fn: () => T): T {
  const startTime = Date.now();
  try {
    const result = fn();
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
    throw error;
  }
}
