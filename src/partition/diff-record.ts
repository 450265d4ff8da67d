/**
 * Diff Record
 * @module partition/diff-record
 *
 * Immutable, fixed-shape description of one mutation's effect on the
 * partition or on group metadata. Records are only built through
 * createDiffRecord, which rejects unknown keys and checks the lineage
 * invariants before freezing the value.
 */

import { z } from 'zod';
import { InvalidDiffError } from '../errors/index.js';
import type { GroupId, GroupItems } from '../types/partition.js';
import { unionItems } from './partition-utils.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Whether the record was produced by a fresh action, an undo or a redo
 */
export type DiffHistoryTag = 'undo' | 'redo' | null;

/**
 * Value carried by a group metadata field
 */
export type MetadataValue = string | number | boolean | null;

/**
 * Lineage edge: [old group, new group]
 */
export type Descendant = readonly [GroupId, GroupId];

export interface DiffRecord {
  /** 'assign' | 'merge' | 'split' | 'metadata_<field>' or a '+'-joined combination */
  readonly description: string;
  readonly history: DiffHistoryTag;
  /** Sorted, distinct */
  readonly added: readonly GroupId[];
  /** Sorted, distinct */
  readonly deleted: readonly GroupId[];
  readonly descendants: readonly Descendant[];
  /** Sorted ids of every item whose group changed */
  readonly affectedItems: Int32Array;
  /** Items of each deleted group before the change */
  readonly oldGroupItems: GroupItems;
  /** Items of each added group after the change */
  readonly newGroupItems: GroupItems;
  /** Sorted, distinct */
  readonly metadataChanged: readonly GroupId[];
  readonly metadataValue?: MetadataValue;
  /** Prior value of every group in metadataChanged, for metadata records */
  readonly previousMetadata?: ReadonlyMap<GroupId, MetadataValue>;
}

/**
 * Fields accepted by createDiffRecord; everything but the description is optional
 */
export interface DiffRecordInit {
  description: string;
  history?: DiffHistoryTag;
  added?: readonly GroupId[];
  deleted?: readonly GroupId[];
  descendants?: readonly Descendant[];
  affectedItems?: Int32Array;
  oldGroupItems?: GroupItems;
  newGroupItems?: GroupItems;
  metadataChanged?: readonly GroupId[];
  metadataValue?: MetadataValue;
  previousMetadata?: ReadonlyMap<GroupId, MetadataValue>;
}

// ============================================================================
// Schema
// ============================================================================

const GroupIdSchema = z.number().int().nonnegative();
const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const SliceSchema = z.map(GroupIdSchema, z.instanceof(Int32Array));

const DiffRecordSchema = z
  .object({
    description: z.string().min(1),
    history: z.enum(['undo', 'redo']).nullable().default(null),
    added: z.array(GroupIdSchema).default([]),
    deleted: z.array(GroupIdSchema).default([]),
    descendants: z.array(z.tuple([GroupIdSchema, GroupIdSchema])).default([]),
    affectedItems: z.instanceof(Int32Array).default(() => new Int32Array(0)),
    oldGroupItems: SliceSchema.default(() => new Map()),
    newGroupItems: SliceSchema.default(() => new Map()),
    metadataChanged: z.array(GroupIdSchema).default([]),
    metadataValue: MetadataValueSchema.optional(),
    previousMetadata: z.map(GroupIdSchema, MetadataValueSchema).optional(),
  })
  .strict();

function sortedDistinct(ids: readonly GroupId[]): GroupId[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build a validated, frozen diff record
 * @throws InvalidDiffError on unknown keys, malformed values or broken lineage
 */
export function createDiffRecord(init: DiffRecordInit): DiffRecord {
  const parsed = DiffRecordSchema.safeParse(init);
  if (!parsed.success) {
    throw new InvalidDiffError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const value = parsed.data;
  const added = sortedDistinct(value.added);
  const deleted = sortedDistinct(value.deleted);
  const addedSet = new Set(added);
  const deletedSet = new Set(deleted);
  const issues: string[] = [];

  const overlap = added.filter((group) => deletedSet.has(group));
  if (overlap.length > 0) {
    issues.push(`groups both added and deleted: ${overlap.join(', ')}`);
  }
  for (const [oldGroup, newGroup] of value.descendants) {
    if (!deletedSet.has(oldGroup)) {
      issues.push(`descendant source ${oldGroup} is not deleted`);
    }
    if (!addedSet.has(newGroup)) {
      issues.push(`descendant target ${newGroup} is not added`);
    }
  }
  for (const group of value.oldGroupItems.keys()) {
    if (!deletedSet.has(group)) {
      issues.push(`old slice for group ${group} which is not deleted`);
    }
  }
  for (const group of value.newGroupItems.keys()) {
    if (!addedSet.has(group)) {
      issues.push(`new slice for group ${group} which is not added`);
    }
  }
  if (issues.length > 0) {
    throw new InvalidDiffError(issues);
  }

  const record: DiffRecord = {
    description: value.description,
    history: value.history,
    added,
    deleted,
    descendants: value.descendants.map(([oldGroup, newGroup]) => [oldGroup, newGroup] as const),
    affectedItems: value.affectedItems,
    oldGroupItems: value.oldGroupItems,
    newGroupItems: value.newGroupItems,
    metadataChanged: sortedDistinct(value.metadataChanged),
    ...(value.metadataValue !== undefined ? { metadataValue: value.metadataValue } : {}),
    ...(value.previousMetadata !== undefined ? { previousMetadata: value.previousMetadata } : {}),
  };

  return Object.freeze(record);
}

/**
 * A record that changes nothing
 */
export function emptyDiff(description: string): DiffRecord {
  return createDiffRecord({ description });
}

export function isEmptyDiff(diff: DiffRecord): boolean {
  return diff.added.length === 0 && diff.deleted.length === 0 && diff.metadataChanged.length === 0;
}

/**
 * Every group whose cached data must be regenerated for this record
 */
export function affectedGroups(diff: DiffRecord): GroupId[] {
  return sortedDistinct([...diff.added, ...diff.deleted, ...diff.metadataChanged]);
}

/**
 * Same record with a different history tag
 */
export function withHistory(diff: DiffRecord, history: DiffHistoryTag): DiffRecord {
  return createDiffRecord({ ...diff, history });
}

/**
 * Partition-level inverse: swaps added/deleted and the two slices and
 * reverses every lineage edge.
 */
export function invertPartitionDiff(diff: DiffRecord, history: DiffHistoryTag = 'undo'): DiffRecord {
  return createDiffRecord({
    description: diff.description,
    history,
    added: diff.deleted,
    deleted: diff.added,
    descendants: diff.descendants.map(([oldGroup, newGroup]) => [newGroup, oldGroup] as const),
    affectedItems: diff.affectedItems,
    oldGroupItems: diff.newGroupItems,
    newGroupItems: diff.oldGroupItems,
  });
}

// ============================================================================
// Combination
// ============================================================================

/**
 * Combine the records produced by several aspects within one action.
 * Groups created and destroyed inside the same action cancel out.
 */
export function combineDiffRecords(records: readonly DiffRecord[]): DiffRecord | null {
  if (records.length === 0) {
    return null;
  }
  if (records.length === 1) {
    return records[0];
  }

  const addedAll = sortedDistinct(records.flatMap((r) => r.added));
  const deletedAll = sortedDistinct(records.flatMap((r) => r.deleted));
  const transient = new Set(addedAll.filter((group) => deletedAll.includes(group)));

  const added = addedAll.filter((group) => !transient.has(group));
  const deleted = deletedAll.filter((group) => !transient.has(group));
  const addedSet = new Set(added);
  const deletedSet = new Set(deleted);

  const oldGroupItems = new Map<GroupId, Int32Array>();
  const newGroupItems = new Map<GroupId, Int32Array>();
  for (const record of records) {
    for (const [group, items] of record.oldGroupItems) {
      if (deletedSet.has(group) && !oldGroupItems.has(group)) {
        oldGroupItems.set(group, items);
      }
    }
    for (const [group, items] of record.newGroupItems) {
      if (addedSet.has(group)) {
        newGroupItems.set(group, items);
      }
    }
  }

  // Lineage through transient groups is collapsed: (a, t) and (t, b) give (a, b)
  const edges = records.flatMap((r) => r.descendants);
  const survivorsOf = (group: GroupId, seen: Set<GroupId>): GroupId[] => {
    if (addedSet.has(group)) {
      return [group];
    }
    if (!transient.has(group) || seen.has(group)) {
      return [];
    }
    seen.add(group);
    return edges
      .filter(([oldGroup]) => oldGroup === group)
      .flatMap(([, newGroup]) => survivorsOf(newGroup, seen));
  };

  const descendants: Descendant[] = [];
  const seenPairs = new Set<string>();
  for (const [oldGroup, newGroup] of edges) {
    if (!deletedSet.has(oldGroup)) {
      continue;
    }
    for (const survivor of survivorsOf(newGroup, new Set())) {
      const key = `${oldGroup}:${survivor}`;
      if (!seenPairs.has(key)) {
        seenPairs.add(key);
        descendants.push([oldGroup, survivor]);
      }
    }
  }

  const metadataValues = records
    .map((r) => r.metadataValue)
    .filter((value): value is MetadataValue => value !== undefined);

  const histories = new Set(records.map((r) => r.history));

  return createDiffRecord({
    description: records.map((r) => r.description).join('+'),
    history: histories.size === 1 ? records[0].history : null,
    added,
    deleted,
    descendants,
    affectedItems: unionItems(records.map((r) => r.affectedItems)),
    oldGroupItems,
    newGroupItems,
    metadataChanged: records.flatMap((r) => r.metadataChanged),
    ...(metadataValues.length > 0 ? { metadataValue: metadataValues[metadataValues.length - 1] } : {}),
  });
}
