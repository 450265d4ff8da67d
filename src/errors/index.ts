/**
 * Errors Module
 * @module errors
 */

export {
  PartitionErrorCodes,
  StoreErrorCodes,
  AppErrorCodes,
  getSeverityForCode,
  isRetryableCode,
  type ErrorCode,
  type ErrorSeverity,
  type PartitionErrorCode,
  type StoreErrorCode,
  type AppErrorCode,
} from './codes.js';

export {
  BaseError,
  isBaseError,
  hasErrorCode,
  wrapError,
  getErrorMessage,
  type ErrorContext,
  type SerializedError,
} from './base.js';

export {
  InvalidItemError,
  InvalidGroupError,
  InsufficientGroupsError,
  InvalidDiffError,
  EmptyHistoryError,
  SessionClosedError,
  type HistoryDirection,
} from './domain.js';

export {
  ShapeMismatchError,
  StoreCorruptionWarning,
  StoreIOError,
  CacheItemError,
  ConfigurationError,
  type EntryLayout,
} from './infrastructure.js';
