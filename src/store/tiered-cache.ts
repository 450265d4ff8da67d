/**
 * Tiered Group Cache
 * @module store/tiered-cache
 *
 * Group-keyed cache with a memory tier and a persistent tier. Cache items
 * declare their fields; the cache decides per pass which persistent entries
 * must be (re)written and which memory values recomputed, lets each item
 * stream its data through a scoped handle pool, then has it aggregate.
 *
 * `generate` is idempotent and resumable: entries whose header matches and
 * that do not look interrupted are left alone. `update` touches only the
 * groups named by a diff record, so every other entry keeps its bytes.
 */

import {
  CacheItemError,
  ShapeMismatchError,
  StoreCorruptionWarning,
  StoreIOError,
} from '../errors/index.js';
import type { CoreLogger } from '../logging/index.js';
import { affectedGroups, unionItems, type DiffRecord } from '../partition/index.js';
import { ProgressReporter, type ProgressCallback } from '../progress/index.js';
import type { GroupId, PartitionView } from '../types/partition.js';
import { isAllZero, sameShape } from './dtype.js';
import { withHandleScope } from './handle-pool.js';
import type {
  CacheItem,
  FieldDescriptor,
  MemoryValue,
  PersistentStore,
  StoredArray,
  StoredArrayHeader,
} from './interfaces.js';

// ============================================================================
// Types
// ============================================================================

export interface TieredGroupCacheOptions {
  readonly store: PersistentStore;
  readonly logger?: CoreLogger;
  readonly onProgress?: ProgressCallback;
}

export type PassKind = 'generate' | 'update';

/**
 * Outcome of one pass of one cache item
 */
export interface PassSummary {
  readonly item: string;
  readonly kind: PassKind;
  /** Persistent entries (re)created and written */
  readonly written: number;
  /** Persistent entries found valid and left untouched */
  readonly skipped: number;
  /** Groups whose memory values were recomputed */
  readonly aggregated: number;
  readonly durationMs: number;
}

/**
 * Outcome of probing one persistent entry
 */
export type ProbeResult = 'missing' | 'mismatch' | 'corrupted' | 'valid';

interface ProbeTarget {
  readonly group: GroupId;
  readonly force: boolean;
}

// ============================================================================
// Tiered Group Cache
// ============================================================================

export class TieredGroupCache {
  private readonly registered = new Map<string, CacheItem>();
  private readonly fieldOwners = new Map<string, string>();
  private readonly store: PersistentStore;
  private readonly logger?: CoreLogger;
  private readonly progress: ProgressReporter;

  constructor(options: TieredGroupCacheOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.progress = new ProgressReporter(options.onProgress);
  }

  get items(): readonly CacheItem[] {
    return [...this.registered.values()];
  }

  get persistentStore(): PersistentStore {
    return this.store;
  }

  /**
   * @throws CacheItemError on a duplicate item or field name, or a
   * persistent field without an element type
   */
  registerItem(item: CacheItem): void {
    if (this.registered.has(item.name)) {
      throw new CacheItemError(`Cache item '${item.name}' is already registered`, item.name);
    }
    for (const field of item.fields) {
      const owner = this.fieldOwners.get(field.name);
      if (owner !== undefined) {
        throw new CacheItemError(
          `Field '${field.name}' of '${item.name}' is already declared by '${owner}'`,
          item.name
        );
      }
      if (field.tier === 'persistent' && field.dtype === undefined) {
        throw new CacheItemError(`Persistent field '${field.name}' declares no dtype`, item.name);
      }
    }
    for (const field of item.fields) {
      this.fieldOwners.set(field.name, item.name);
    }
    this.registered.set(item.name, item);
  }

  // =========================================================================
  // Passes
  // =========================================================================

  /**
   * Full (re)population for every registered item
   */
  generate(partition: PartitionView): PassSummary[] {
    const targets = partition.groupIds.map((group) => ({ group, force: false }));
    return this.items.map((item) => this.runPass('generate', item, partition, targets, partition.groupIds));
  }

  /**
   * Regenerate only what `diff` touched. Added groups are recreated, deleted
   * groups lose their memory values and leave their persistent entries
   * orphaned, metadata-changed groups are probed again.
   */
  update(diff: DiffRecord, partition: PartitionView): PassSummary[] {
    const touched = affectedGroups(diff);
    if (touched.length === 0) {
      return [];
    }

    const added = new Set(diff.added);
    const targets: ProbeTarget[] = touched
      .filter((group) => partition.itemsOf(group).length > 0)
      .map((group) => ({ group, force: added.has(group) }));
    const memoryGroups = targets.map((target) => target.group);

    return this.items.map((item) => {
      item.dropMemory(diff.deleted);
      return this.runPass('update', item, partition, targets, memoryGroups);
    });
  }

  // =========================================================================
  // Entry Primitives
  // =========================================================================

  /**
   * Probe one persistent entry against its expected header and recreate it
   * zero-filled unless it is valid. Returns true when the entry must be
   * populated.
   */
  prepareEntry(group: GroupId, field: string, expected: StoredArrayHeader, force = false): boolean {
    const outcome = force ? 'missing' : this.probe(group, field, expected);
    if (outcome === 'valid') {
      return false;
    }
    this.store.create(group, field, expected);
    return true;
  }

  /**
   * Classify an existing entry. Mismatches and suspected corruption are
   * logged at warn level.
   */
  probe(group: GroupId, field: string, expected: StoredArrayHeader): ProbeResult {
    const header = this.store.readHeader(group, field);
    if (!header) {
      return 'missing';
    }

    if (
      !sameShape(header.shape, expected.shape) ||
      header.dtype !== expected.dtype ||
      header.digest !== expected.digest
    ) {
      const mismatch = new ShapeMismatchError(group, field, expected, header);
      this.logger?.warn({ err: mismatch, group, field }, mismatch.message);
      return 'mismatch';
    }

    const rows = header.shape[0] ?? 0;
    if (rows === 0) {
      return 'valid';
    }
    const first = this.store.readRow(group, field, 0);
    const last = this.store.readRow(group, field, rows - 1);
    if (first && last && isAllZero(first) && isAllZero(last)) {
      const warning = new StoreCorruptionWarning(group, field);
      this.logger?.warn({ err: warning, group, field }, warning.message);
      return 'corrupted';
    }
    return 'valid';
  }

  /**
   * Persistent array of an entry
   * @throws ShapeMismatchError when `expected` is given and not met
   * @throws StoreIOError when the entry does not exist
   */
  readEntry(group: GroupId, field: string, expected?: Pick<StoredArrayHeader, 'shape' | 'dtype'>): StoredArray {
    const entry = this.store.read(group, field);
    if (!entry) {
      const location = `${this.store.location}:${group}/${field}`;
      throw new StoreIOError(`No cache entry at ${location}`, location, { operation: 'read' });
    }
    if (
      expected &&
      (!sameShape(entry.header.shape, expected.shape) || entry.header.dtype !== expected.dtype)
    ) {
      throw new ShapeMismatchError(group, field, expected, entry.header, { operation: 'read' });
    }
    return entry.data;
  }

  /**
   * Value of a field in whichever tier its item declared it
   */
  load(itemName: string, group: GroupId, field: string): MemoryValue | StoredArray | undefined {
    const item = this.registered.get(itemName);
    if (!item) {
      throw new CacheItemError(`Unknown cache item '${itemName}'`, itemName);
    }
    const descriptor = item.fields.find((candidate) => candidate.name === field);
    if (!descriptor) {
      throw new CacheItemError(`Cache item '${itemName}' has no field '${field}'`, itemName);
    }
    if (descriptor.tier === 'memory') {
      return item.memoryValue(group, field);
    }
    return this.store.read(group, field)?.data;
  }

  // =========================================================================
  // Orphans
  // =========================================================================

  /**
   * Stored groups absent from `liveGroups`
   */
  findOrphans(liveGroups: Iterable<GroupId>): GroupId[] {
    const live = new Set(liveGroups);
    return this.store.listGroups().filter((group) => !live.has(group));
  }

  /**
   * Remove the entries of every orphaned group. Offline maintenance only;
   * passes never call it.
   */
  sweepOrphans(liveGroups: Iterable<GroupId>): GroupId[] {
    const orphans = this.findOrphans(liveGroups);
    for (const group of orphans) {
      this.store.remove(group);
    }
    if (orphans.length > 0) {
      this.logger?.info({ removed: orphans.length }, `Removed ${orphans.length} orphaned group(s)`);
    }
    return orphans;
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private persistentFields(item: CacheItem): FieldDescriptor[] {
    return item.fields.filter((field) => field.tier === 'persistent');
  }

  private runPass(
    kind: PassKind,
    item: CacheItem,
    partition: PartitionView,
    targets: readonly ProbeTarget[],
    memoryGroups: readonly GroupId[]
  ): PassSummary {
    const startTime = Date.now();
    const fields = this.persistentFields(item);
    const toStore = new Map<GroupId, Set<string>>();
    let skipped = 0;

    for (const { group, force } of targets) {
      const items = partition.itemsOf(group);
      for (const field of fields) {
        const expected = item.expectedHeader(field.name, items);
        if (this.prepareEntry(group, field.name, expected, force)) {
          const marked = toStore.get(group) ?? new Set<string>();
          marked.add(field.name);
          toStore.set(group, marked);
        } else {
          skipped++;
        }
      }
    }

    let written = 0;
    for (const marked of toStore.values()) {
      written += marked.size;
    }

    if (toStore.size > 0) {
      const candidates = unionItems([...toStore.keys()].map((group) => partition.itemsOf(group)));
      withHandleScope(
        this.store,
        (handles) =>
          item.distribute({ partition, toStore, items: candidates, handles, progress: this.progress }),
        this.logger
      );
    }

    item.aggregate({ partition, groups: memoryGroups, store: this.store, progress: this.progress });

    const summary: PassSummary = {
      item: item.name,
      kind,
      written,
      skipped,
      aggregated: memoryGroups.length,
      durationMs: Date.now() - startTime,
    };
    this.logger?.debug(
      { ...summary },
      `Cache ${kind} for '${item.name}' wrote ${written} and kept ${skipped} entries`
    );
    return summary;
  }
}
