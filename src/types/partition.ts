/**
 * Partition Type Definitions
 * @module types/partition
 *
 * Identifier aliases and read-only views shared by the partition engine,
 * the history manager and the tiered cache.
 */

/**
 * Index of an item in the fixed, externally owned population.
 * Always in [0, nItems).
 */
export type ItemId = number;

/**
 * Label of a group (cluster). Non-negative; newly minted ids are
 * strictly greater than every id on the live history line.
 */
export type GroupId = number;

/**
 * Mapping from group id to the sorted ids of its items
 */
export type GroupItems = ReadonlyMap<GroupId, Int32Array>;

/**
 * Read-only view of a partition, as consumed by cache items
 */
export interface PartitionView {
  /** Population size */
  readonly nItems: number;
  /** Sorted ids of every live group */
  readonly groupIds: readonly GroupId[];
  /** Live group → sorted items index */
  readonly groupItems: GroupItems;
  /** Group of one item */
  groupOf(item: ItemId): GroupId;
  /** Sorted items of one group (empty when the group is absent) */
  itemsOf(group: GroupId): Int32Array;
}
