/**
 * Infrastructure Error Classes
 * @module errors/infrastructure
 *
 * Errors raised by the tiered cache, the persistent stores and the
 * configuration loader.
 */

import { BaseError, type ErrorContext } from './base.js';
import { AppErrorCodes, StoreErrorCodes } from './codes.js';

// ============================================================================
// Store Errors
// ============================================================================

/**
 * Describes the stored layout of a persistent entry, as far as the
 * error messages need it.
 */
export interface EntryLayout {
  readonly shape: readonly number[];
  readonly dtype: string;
  readonly digest?: string;
}

function formatLayout(layout: EntryLayout): string {
  return `${layout.dtype}[${layout.shape.join('x')}]`;
}

/**
 * A persistent entry exists but its layout disagrees with what the
 * current partition expects. The cache regenerates such entries.
 */
export class ShapeMismatchError extends BaseError {
  public readonly group: number;
  public readonly field: string;
  public readonly expected: EntryLayout;
  public readonly actual: EntryLayout;

  constructor(
    group: number,
    field: string,
    expected: EntryLayout,
    actual: EntryLayout,
    context: ErrorContext = {}
  ) {
    super(
      `Stored '${field}' for group ${group} is ${formatLayout(actual)}, expected ${formatLayout(expected)}`,
      StoreErrorCodes.SHAPE_MISMATCH,
      {
        ...context,
        details: {
          ...context.details,
          group,
          field,
          expectedShape: expected.shape,
          actualShape: actual.shape,
          expectedDigest: expected.digest,
          actualDigest: actual.digest,
        },
      }
    );
    this.name = 'ShapeMismatchError';
    this.group = group;
    this.field = field;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Non-fatal: the first and last rows of an entry are all zero, which
 * usually means an earlier pass was interrupted mid-write.
 * Logged, never thrown.
 */
export class StoreCorruptionWarning extends BaseError {
  public readonly group: number;
  public readonly field: string;

  constructor(group: number, field: string, context: ErrorContext = {}) {
    super(
      `The cache entry '${field}' for group ${group} is probably corrupted: regenerating it`,
      StoreErrorCodes.STORE_CORRUPTION,
      { ...context, details: { ...context.details, group, field } }
    );
    this.name = 'StoreCorruptionWarning';
    this.group = group;
    this.field = field;
  }
}

/**
 * Failure of the persistent medium. Aborts the current pass.
 */
export class StoreIOError extends BaseError {
  public readonly path: string;

  constructor(message: string, path: string, context: ErrorContext = {}) {
    super(message, StoreErrorCodes.STORE_IO, {
      ...context,
      details: { ...context.details, path },
    });
    this.name = 'StoreIOError';
    this.path = path;
  }
}

/**
 * Misconfigured or inconsistent cache item
 */
export class CacheItemError extends BaseError {
  public readonly item: string;

  constructor(message: string, item: string, context: ErrorContext = {}) {
    super(message, StoreErrorCodes.CACHE_ITEM, {
      ...context,
      details: { ...context.details, item },
    });
    this.name = 'CacheItemError';
    this.item = item;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration failed validation
 */
export class ConfigurationError extends BaseError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], context: ErrorContext = {}) {
    super(message, AppErrorCodes.CONFIGURATION, {
      ...context,
      details: { ...context.details, issues },
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
