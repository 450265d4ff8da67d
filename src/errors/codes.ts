/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the cluster curation core.
 * Every error raised by the engine, the history manager and the tiered
 * cache carries one of these codes.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Partition and history error codes
 */
export const PartitionErrorCodes = {
  INVALID_ITEM: 'INVALID_ITEM',
  INVALID_GROUP: 'INVALID_GROUP',
  INSUFFICIENT_GROUPS: 'INSUFFICIENT_GROUPS',
  INVALID_DIFF: 'INVALID_DIFF',
  EMPTY_HISTORY: 'EMPTY_HISTORY',
} as const;

export type PartitionErrorCode = typeof PartitionErrorCodes[keyof typeof PartitionErrorCodes];

/**
 * Tiered cache and persistent store error codes
 */
export const StoreErrorCodes = {
  SHAPE_MISMATCH: 'SHAPE_MISMATCH',
  STORE_CORRUPTION: 'STORE_CORRUPTION',
  STORE_IO: 'STORE_IO',
  CACHE_ITEM: 'CACHE_ITEM',
} as const;

export type StoreErrorCode = typeof StoreErrorCodes[keyof typeof StoreErrorCodes];

/**
 * Application-level error codes
 */
export const AppErrorCodes = {
  CONFIGURATION: 'CONFIGURATION',
  SESSION_CLOSED: 'SESSION_CLOSED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type AppErrorCode = typeof AppErrorCodes[keyof typeof AppErrorCodes];

/**
 * Union of all error codes
 */
export type ErrorCode = PartitionErrorCode | StoreErrorCode | AppErrorCode;

// ============================================================================
// Severity
// ============================================================================

export type ErrorSeverity = 'warning' | 'error' | 'fatal';

const SEVERITY_BY_CODE: Record<ErrorCode, ErrorSeverity> = {
  [PartitionErrorCodes.INVALID_ITEM]: 'error',
  [PartitionErrorCodes.INVALID_GROUP]: 'error',
  [PartitionErrorCodes.INSUFFICIENT_GROUPS]: 'error',
  [PartitionErrorCodes.INVALID_DIFF]: 'error',
  [PartitionErrorCodes.EMPTY_HISTORY]: 'warning',
  [StoreErrorCodes.SHAPE_MISMATCH]: 'warning',
  [StoreErrorCodes.STORE_CORRUPTION]: 'warning',
  [StoreErrorCodes.STORE_IO]: 'fatal',
  [StoreErrorCodes.CACHE_ITEM]: 'error',
  [AppErrorCodes.CONFIGURATION]: 'fatal',
  [AppErrorCodes.SESSION_CLOSED]: 'error',
  [AppErrorCodes.INTERNAL_ERROR]: 'fatal',
};

/**
 * Get the severity classification for an error code
 */
export function getSeverityForCode(code: ErrorCode): ErrorSeverity {
  return SEVERITY_BY_CODE[code];
}

/**
 * Whether an operation failing with this code can simply be retried.
 * Store IO failures are recovered by re-running generate.
 */
export function isRetryableCode(code: ErrorCode): boolean {
  return code === StoreErrorCodes.STORE_IO;
}
