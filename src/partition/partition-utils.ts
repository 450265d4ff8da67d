/**
 * Partition Utilities
 * @module partition/partition-utils
 *
 * Array-level helpers behind the partition engine and the cache items:
 * unique labels, items-in-groups lookup, the group→items rebuild, and the
 * inverse conversions back to item order.
 */

import { InvalidItemError } from '../errors/index.js';
import type { GroupId, GroupItems, ItemId } from '../types/partition.js';

// ============================================================================
// Labels
// ============================================================================

/**
 * Sorted distinct values of a label array
 */
export function uniqueLabels(labels: ArrayLike<number>): GroupId[] {
  const seen = new Set<number>();
  for (let i = 0; i < labels.length; i++) {
    seen.add(labels[i]);
  }
  return [...seen].sort((a, b) => a - b);
}

/**
 * Ids of every item whose label is one of `groups`, ascending
 */
export function itemsInGroups(assignment: Int32Array, groups: readonly GroupId[]): Int32Array {
  if (assignment.length === 0 || groups.length === 0) {
    return new Int32Array(0);
  }
  const wanted = new Set(groups);
  const out: ItemId[] = [];
  for (let item = 0; item < assignment.length; item++) {
    if (wanted.has(assignment[item])) {
      out.push(item);
    }
  }
  return Int32Array.from(out);
}

// ============================================================================
// Group → Items Rebuild
// ============================================================================

/**
 * Build the group → items index for a set of items.
 *
 * Stable-sorts the positions by label, cuts at every label change and
 * slices each run into a sorted per-group array. Cost is proportional to
 * `items.length`, which lets the engine rebuild only the touched groups.
 */
export function groupItemsByLabel(items: Int32Array, labels: Int32Array): Map<GroupId, Int32Array> {
  if (items.length !== labels.length) {
    throw new RangeError(`items (${items.length}) and labels (${labels.length}) differ in length`);
  }

  const result = new Map<GroupId, Int32Array>();
  const n = items.length;
  if (n === 0) {
    return result;
  }

  const order = new Uint32Array(n);
  for (let i = 0; i < n; i++) {
    order[i] = i;
  }
  order.sort((a, b) => labels[a] - labels[b] || a - b);

  let start = 0;
  for (let i = 1; i <= n; i++) {
    if (i === n || labels[order[i]] !== labels[order[start]]) {
      const slice = new Int32Array(i - start);
      for (let k = start; k < i; k++) {
        slice[k - start] = items[order[k]];
      }
      slice.sort();
      result.set(labels[order[start]], slice);
      start = i;
    }
  }

  return result;
}

/**
 * Convert a complete group → items mapping back to an assignment array
 * indexed by item id.
 * @throws InvalidItemError when an item is out of range or listed twice
 */
export function flattenGroupItems(groupItems: GroupItems): Int32Array {
  let nItems = 0;
  for (const items of groupItems.values()) {
    nItems += items.length;
  }

  const assignment = new Int32Array(nItems).fill(-1);
  for (const [group, items] of groupItems) {
    for (const item of items) {
      if (item < 0 || item >= nItems || assignment[item] !== -1) {
        throw new InvalidItemError([item], nItems);
      }
      assignment[item] = group;
    }
  }
  return assignment;
}

/**
 * Sorted union of several sorted item arrays
 */
export function unionItems(arrays: readonly Int32Array[]): Int32Array {
  let total = 0;
  for (const arr of arrays) {
    total += arr.length;
  }
  const merged = new Int32Array(total);
  let offset = 0;
  for (const arr of arrays) {
    merged.set(arr, offset);
    offset += arr.length;
  }
  merged.sort();

  let write = 0;
  for (let i = 0; i < merged.length; i++) {
    if (i === 0 || merged[i] !== merged[i - 1]) {
      merged[write++] = merged[i];
    }
  }
  return merged.slice(0, write);
}

// ============================================================================
// Per-Group Arrays
// ============================================================================

/**
 * Concatenate per-group row arrays and reorder the rows by item id.
 *
 * Each entry of `arrays` holds `rowSize` values per item of its group, in
 * the group's ascending item order.
 */
export function concatenatePerGroupArrays(
  groupItems: GroupItems,
  arrays: ReadonlyMap<GroupId, Float32Array>,
  rowSize: number
): { items: Int32Array; data: Float32Array } {
  const groups = [...arrays.keys()].sort((a, b) => a - b);

  let total = 0;
  for (const group of groups) {
    const items = groupItems.get(group);
    const rows = arrays.get(group);
    if (!items || !rows) {
      throw new RangeError(`Group ${group} has no items in the partition`);
    }
    if (rows.length !== items.length * rowSize) {
      throw new RangeError(
        `Group ${group} holds ${rows.length / rowSize} rows for ${items.length} items`
      );
    }
    total += items.length;
  }

  const itemOrder = new Int32Array(total);
  const rowsInConcatOrder = new Float32Array(total * rowSize);
  let offset = 0;
  for (const group of groups) {
    const items = groupItems.get(group) ?? new Int32Array(0);
    const rows = arrays.get(group) ?? new Float32Array(0);
    itemOrder.set(items, offset);
    rowsInConcatOrder.set(rows, offset * rowSize);
    offset += items.length;
  }

  const order = new Uint32Array(total);
  for (let i = 0; i < total; i++) {
    order[i] = i;
  }
  order.sort((a, b) => itemOrder[a] - itemOrder[b]);

  const items = new Int32Array(total);
  const data = new Float32Array(total * rowSize);
  for (let i = 0; i < total; i++) {
    const from = order[i];
    items[i] = itemOrder[from];
    data.set(rowsInConcatOrder.subarray(from * rowSize, (from + 1) * rowSize), i * rowSize);
  }

  return { items, data };
}

/**
 * FNV-1a digest of an item array, used to tie a persisted entry to the
 * exact membership it was written for.
 */
export function digestItems(items: Int32Array): string {
  const FNV_OFFSET_BASIS = 2166136261;
  const FNV_PRIME = 16777619;

  let hash = FNV_OFFSET_BASIS;
  const bytes = new Uint8Array(items.buffer, items.byteOffset, items.byteLength);
  for (let i = 0; i < bytes.length; i++) {
    hash ^= bytes[i];
    hash = Math.imul(hash, FNV_PRIME);
  }

  return (hash >>> 0).toString(16).padStart(8, '0');
}
