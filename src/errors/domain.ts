/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised by the partition engine, group metadata and history manager.
 * All of them are raised before any state is modified.
 */

import { BaseError, type ErrorContext } from './base.js';
import { AppErrorCodes, PartitionErrorCodes } from './codes.js';

const MAX_LISTED_IDS = 10;

function listIds(ids: readonly number[]): string {
  const shown = ids.slice(0, MAX_LISTED_IDS).join(', ');
  return ids.length > MAX_LISTED_IDS ? `${shown}, ... (${ids.length} total)` : shown;
}

// ============================================================================
// Partition Errors
// ============================================================================

/**
 * One or more item ids fall outside the population
 */
export class InvalidItemError extends BaseError {
  public readonly itemIds: readonly number[];
  public readonly nItems: number;

  constructor(itemIds: readonly number[], nItems: number, context: ErrorContext = {}) {
    super(
      `Item ids out of range [0, ${nItems}): ${listIds(itemIds)}`,
      PartitionErrorCodes.INVALID_ITEM,
      { ...context, details: { ...context.details, itemIds: itemIds.slice(0, MAX_LISTED_IDS), nItems } }
    );
    this.name = 'InvalidItemError';
    this.itemIds = itemIds;
    this.nItems = nItems;
  }
}

/**
 * One or more group ids are not present in the partition
 */
export class InvalidGroupError extends BaseError {
  public readonly groupIds: readonly number[];

  constructor(groupIds: readonly number[], context: ErrorContext = {}) {
    super(
      `Unknown group ids: ${listIds(groupIds)}`,
      PartitionErrorCodes.INVALID_GROUP,
      { ...context, details: { ...context.details, groupIds: groupIds.slice(0, MAX_LISTED_IDS) } }
    );
    this.name = 'InvalidGroupError';
    this.groupIds = groupIds;
  }
}

/**
 * Merge requested with fewer than two distinct groups
 */
export class InsufficientGroupsError extends BaseError {
  public readonly received: number;

  constructor(received: number, context: ErrorContext = {}) {
    super(
      `Merge needs at least 2 distinct groups, got ${received}`,
      PartitionErrorCodes.INSUFFICIENT_GROUPS,
      { ...context, details: { ...context.details, received } }
    );
    this.name = 'InsufficientGroupsError';
    this.received = received;
  }
}

/**
 * A diff record failed shape or invariant validation
 */
export class InvalidDiffError extends BaseError {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[], context: ErrorContext = {}) {
    super(
      `Invalid diff record: ${issues.join('; ')}`,
      PartitionErrorCodes.INVALID_DIFF,
      { ...context, details: { ...context.details, issues } },
      false
    );
    this.name = 'InvalidDiffError';
    this.issues = issues;
  }
}

// ============================================================================
// History Errors
// ============================================================================

export type HistoryDirection = 'undo' | 'redo';

/**
 * Undo or redo requested with nothing on that side of the cursor
 */
export class EmptyHistoryError extends BaseError {
  public readonly direction: HistoryDirection;

  constructor(direction: HistoryDirection, context: ErrorContext = {}) {
    super(
      `Nothing to ${direction}`,
      PartitionErrorCodes.EMPTY_HISTORY,
      { ...context, operation: direction }
    );
    this.name = 'EmptyHistoryError';
    this.direction = direction;
  }
}

// ============================================================================
// Session Errors
// ============================================================================

/**
 * Operation invoked on a session after close()
 */
export class SessionClosedError extends BaseError {
  constructor(operation: string, context: ErrorContext = {}) {
    super(
      `Cannot run '${operation}' on a closed session`,
      AppErrorCodes.SESSION_CLOSED,
      { ...context, operation }
    );
    this.name = 'SessionClosedError';
  }
}
