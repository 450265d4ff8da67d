/**
 * Tiered Store Interfaces
 * @module store/interfaces
 *
 * Type definitions shared by the tiered cache, its persistent stores and
 * the cache items. A cache item declares named fields tagged `memory` or
 * `persistent`; persistent fields are flat arrays, one entry per
 * (group, field), described by a small header.
 */

import { z } from 'zod';
import type { GroupId, PartitionView } from '../types/partition.js';
import type { ProgressReporter } from '../progress/index.js';

// ============================================================================
// Element Types
// ============================================================================

export const StoredDTypeSchema = z.enum(['float32', 'int32']);

export type StoredDType = z.infer<typeof StoredDTypeSchema>;

/**
 * Array types a persistent entry can hold
 */
export type StoredArray = Float32Array | Int32Array;

/**
 * Header persisted beside every entry
 */
export const StoredArrayHeaderSchema = z
  .object({
    shape: z.array(z.number().int().nonnegative()).min(1),
    dtype: StoredDTypeSchema,
    /** Digest of the item membership the entry was written for */
    digest: z.string(),
  })
  .strict();

export type StoredArrayHeader = z.infer<typeof StoredArrayHeaderSchema>;

/**
 * Persistent entry read back in full
 */
export interface StoredEntry {
  readonly header: StoredArrayHeader;
  readonly data: StoredArray;
}

// ============================================================================
// Persistent Store
// ============================================================================

/**
 * Write handle on one persistent entry. Rows are addressed by index along
 * the first dimension.
 */
export interface PersistentHandle {
  readonly group: GroupId;
  readonly field: string;
  readonly header: StoredArrayHeader;
  /** Write `data` starting at row `row`; `data` holds whole rows */
  writeRows(row: number, data: StoredArray): void;
  close(): void;
}

/**
 * Storage medium behind the persistent tier of one dataset
 */
export interface PersistentStore {
  /** Human-readable location, for logs and errors */
  readonly location: string;
  /** Header of an entry, or null when the entry is missing or unreadable */
  readHeader(group: GroupId, field: string): StoredArrayHeader | null;
  /** Create (or replace) a zero-filled entry */
  create(group: GroupId, field: string, header: StoredArrayHeader): void;
  /** One row of an entry, or null when the entry is missing */
  readRow(group: GroupId, field: string, row: number): StoredArray | null;
  /** Whole entry, or null when it is missing */
  read(group: GroupId, field: string): StoredEntry | null;
  openForWrite(group: GroupId, field: string): PersistentHandle;
  /** Groups with at least one entry, ascending */
  listGroups(): GroupId[];
  /** Fields stored for a group, sorted */
  listFields(group: GroupId): string[];
  /** Remove every entry of a group */
  remove(group: GroupId): void;
}

// ============================================================================
// Memory Tier
// ============================================================================

/**
 * Values a memory-tier field can hold
 */
export type MemoryValue = number | Float32Array | Int32Array | readonly [number, number];

// ============================================================================
// Cache Items
// ============================================================================

export type FieldTier = 'memory' | 'persistent';

export interface FieldDescriptor {
  readonly name: string;
  readonly tier: FieldTier;
  /** Element type, persistent fields only */
  readonly dtype?: StoredDType;
}

/**
 * Gives lazy write access to persistent entries within one pass
 */
export interface HandleSource {
  acquire(group: GroupId, field: string): PersistentHandle;
}

/**
 * Everything a cache item needs to write the persistent tier of a pass
 */
export interface DistributionContext {
  readonly partition: PartitionView;
  /** Persistent fields to write, per group; groups absent here are skipped */
  readonly toStore: ReadonlyMap<GroupId, ReadonlySet<string>>;
  /** Candidate items in ascending order; items of skipped groups are ignored */
  readonly items: Int32Array;
  readonly handles: HandleSource;
  readonly progress: ProgressReporter;
}

/**
 * Everything a cache item needs to compute its memory tier
 */
export interface AggregationContext {
  readonly partition: PartitionView;
  /** Groups whose memory values must be (re)computed, ascending */
  readonly groups: readonly GroupId[];
  readonly store: PersistentStore;
  readonly progress: ProgressReporter;
}

/**
 * A pluggable producer of per-group cached data
 */
export interface CacheItem {
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  /** Header a persistent field must have for a group with these items */
  expectedHeader(field: string, items: Int32Array): StoredArrayHeader;
  /** Stream source rows into the persistent entries marked in the context */
  distribute(context: DistributionContext): void;
  /** Compute memory-tier values from the persisted entries */
  aggregate(context: AggregationContext): void;
  /** Memory-tier value of a group, or undefined when not computed */
  memoryValue(group: GroupId, field: string): MemoryValue | undefined;
  /** Forget memory-tier values of the given groups */
  dropMemory(groups: readonly GroupId[]): void;
}
