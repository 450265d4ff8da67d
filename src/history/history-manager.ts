/**
 * History Manager
 * @module history/history-manager
 *
 * Linear undo/redo stack of recorded actions. Each entry holds the records
 * produced by one user action (one per aspect that changed) and their
 * combined record. Undo walks an entry's records in reverse order through
 * the aspect that produced them; redo walks them forward.
 *
 * The manager knows nothing about partitions: it is generic over the record
 * type and takes the combine function at construction.
 */

import { EmptyHistoryError } from '../errors/index.js';
import type { CoreLogger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * An aspect whose recorded changes can be reverted and re-applied
 */
export interface UndoableAspect<R> {
  /** Name used in logs */
  readonly aspectName: string;
  /** Apply the inverse of a recorded change; returns the inverse record */
  revert(record: R): R;
  /** Re-apply a recorded change; returns the forward record */
  reapply(record: R): R;
}

/**
 * One aspect's contribution to an action
 */
export interface ActionResult<R> {
  readonly source: UndoableAspect<R>;
  readonly record: R;
}

/**
 * Folds several records of one action into one; null for none
 */
export type CombineFunction<R> = (records: readonly R[]) => R | null;

export interface HistoryEntry<R> {
  readonly results: readonly ActionResult<R>[];
  readonly combined: R;
}

export interface HistoryManagerOptions<R> {
  readonly combine: CombineFunction<R>;
  readonly logger?: CoreLogger;
}

// ============================================================================
// History Manager
// ============================================================================

export class HistoryManager<R> {
  private readonly entries: HistoryEntry<R>[] = [];
  /** Number of entries currently applied */
  private cursor = 0;
  private readonly combine: CombineFunction<R>;
  private readonly logger?: CoreLogger;

  constructor(options: HistoryManagerOptions<R>) {
    this.combine = options.combine;
    this.logger = options.logger;
  }

  get size(): number {
    return this.entries.length;
  }

  get position(): number {
    return this.cursor;
  }

  get canUndo(): boolean {
    return this.cursor > 0;
  }

  get canRedo(): boolean {
    return this.cursor < this.entries.length;
  }

  /**
   * Entries from the bottom of the stack up to the cursor
   */
  appliedEntries(): readonly HistoryEntry<R>[] {
    return this.entries.slice(0, this.cursor);
  }

  /**
   * Push the results of one action and discard the redo tail.
   * Returns the combined record, or null when nothing was recorded.
   */
  record(results: readonly ActionResult<R>[]): R | null {
    const combined = this.combine(results.map((result) => result.record));
    if (results.length === 0 || combined === null) {
      return null;
    }

    const discarded = this.entries.length - this.cursor;
    this.entries.splice(this.cursor, discarded, { results: [...results], combined });
    this.cursor = this.entries.length;

    this.logger?.debug(
      { position: this.cursor, size: this.entries.length, discarded },
      'History entry recorded'
    );
    return combined;
  }

  /**
   * @throws EmptyHistoryError when nothing is left to undo
   */
  undo(): R {
    if (!this.canUndo) {
      throw new EmptyHistoryError('undo');
    }

    const entry = this.entries[this.cursor - 1];
    const inverses: R[] = [];
    for (let i = entry.results.length - 1; i >= 0; i--) {
      const { source, record } = entry.results[i];
      inverses.push(source.revert(record));
    }
    this.cursor--;

    this.logger?.debug({ position: this.cursor, size: this.entries.length }, 'History undo');
    return this.combineOrFail(inverses, 'undo');
  }

  /**
   * @throws EmptyHistoryError when nothing is left to redo
   */
  redo(): R {
    if (!this.canRedo) {
      throw new EmptyHistoryError('redo');
    }

    const entry = this.entries[this.cursor];
    const forwards = entry.results.map(({ source, record }) => source.reapply(record));
    this.cursor++;

    this.logger?.debug({ position: this.cursor, size: this.entries.length }, 'History redo');
    return this.combineOrFail(forwards, 'redo');
  }

  clear(): void {
    this.entries.length = 0;
    this.cursor = 0;
  }

  private combineOrFail(records: readonly R[], direction: 'undo' | 'redo'): R {
    const combined = this.combine(records);
    if (combined === null) {
      throw new EmptyHistoryError(direction, {
        details: { reason: 'combine returned no record for a non-empty entry' },
      });
    }
    return combined;
  }
}
