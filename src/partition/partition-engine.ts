/**
 * Partition Engine
 * @module partition/partition-engine
 *
 * Owns the item → group assignment and the derived group → items index.
 * Every mutation (assign, merge, split) is validated before anything is
 * touched, replaces each group whose membership changes with freshly minted
 * ids, rebuilds only the touched groups and returns a DiffRecord.
 *
 * The engine is also the undoable aspect for partition changes: revert and
 * reapply restore or replay a recorded DiffRecord from its slices.
 */

import {
  InsufficientGroupsError,
  InvalidGroupError,
  InvalidItemError,
} from '../errors/index.js';
import type { UndoableAspect } from '../history/index.js';
import type { CoreLogger } from '../logging/index.js';
import type { GroupId, GroupItems, ItemId, PartitionView } from '../types/partition.js';
import {
  createDiffRecord,
  emptyDiff,
  invertPartitionDiff,
  withHistory,
  type Descendant,
  type DiffRecord,
} from './diff-record.js';
import { groupItemsByLabel, uniqueLabels } from './partition-utils.js';

// ============================================================================
// Types
// ============================================================================

export interface PartitionEngineOptions {
  readonly logger?: CoreLogger;
}

/**
 * Relabeling plan computed before anything is mutated
 */
interface RelabelPlan {
  readonly description: string;
  readonly deleted: readonly GroupId[];
  readonly added: readonly GroupId[];
  readonly descendants: readonly Descendant[];
  /** Sorted items of every deleted group */
  readonly affectedItems: Int32Array;
  /** New label of each affected item, parallel to affectedItems */
  readonly labels: Int32Array;
  readonly nextGroupId: GroupId;
}

const EMPTY_ITEMS = new Int32Array(0);

// ============================================================================
// Partition Engine
// ============================================================================

export class PartitionEngine implements PartitionView, UndoableAspect<DiffRecord> {
  public readonly aspectName = 'partition';

  private readonly assignmentArray: Int32Array;
  private readonly index: Map<GroupId, Int32Array>;
  private sortedGroupIds: GroupId[] | null = null;
  private nextId: GroupId;
  private readonly logger?: CoreLogger;

  /**
   * @param assignment - Initial group of every item; copied, never retained
   */
  constructor(assignment: ArrayLike<number>, options: PartitionEngineOptions = {}) {
    const labels = Int32Array.from(assignment);
    for (let item = 0; item < labels.length; item++) {
      if (labels[item] < 0 || !Number.isInteger(assignment[item])) {
        throw new InvalidGroupError([assignment[item]], {
          operation: 'initialize',
          details: { item },
        });
      }
    }

    const items = new Int32Array(labels.length);
    for (let item = 0; item < labels.length; item++) {
      items[item] = item;
    }

    this.assignmentArray = labels;
    this.index = groupItemsByLabel(items, labels);
    this.nextId = labels.length === 0 ? 0 : uniqueLabels(labels).reduce((max, g) => Math.max(max, g), 0) + 1;
    this.logger = options.logger;
  }

  // =========================================================================
  // Read API
  // =========================================================================

  get nItems(): number {
    return this.assignmentArray.length;
  }

  get groupIds(): readonly GroupId[] {
    if (!this.sortedGroupIds) {
      this.sortedGroupIds = [...this.index.keys()].sort((a, b) => a - b);
    }
    return this.sortedGroupIds;
  }

  get groupItems(): GroupItems {
    return this.index;
  }

  /**
   * Id the next minted group will receive
   */
  get nextGroupId(): GroupId {
    return this.nextId;
  }

  /**
   * Copy of the current assignment
   */
  get assignment(): Int32Array {
    return this.assignmentArray.slice();
  }

  hasGroup(group: GroupId): boolean {
    return this.index.has(group);
  }

  groupOf(item: ItemId): GroupId {
    this.validateItems([item], 'groupOf');
    return this.assignmentArray[item];
  }

  itemsOf(group: GroupId): Int32Array {
    return this.index.get(group) ?? EMPTY_ITEMS;
  }

  // =========================================================================
  // Mutations
  // =========================================================================

  /**
   * Move items into one group.
   *
   * With `targetGroup`, the target's items join the moved ones; without it a
   * fresh group is minted. Every group whose membership changes is replaced:
   * the destination gets one new id and every partially emptied source gets
   * a second new id for its remainder.
   * @throws InvalidItemError when an item id is out of range
   * @throws InvalidGroupError when `targetGroup` is given but not live
   */
  assign(itemIds: readonly ItemId[], targetGroup?: GroupId): DiffRecord {
    const selected = this.normalizeItems(itemIds, 'assign');
    if (targetGroup !== undefined && !this.index.has(targetGroup)) {
      throw new InvalidGroupError([targetGroup], { operation: 'assign' });
    }
    if (selected.length === 0) {
      return emptyDiff('assign');
    }

    const sources = uniqueLabels(selected.map((item) => this.assignmentArray[item]));
    if (
      targetGroup !== undefined &&
      sources.length === 1 &&
      sources[0] === targetGroup
    ) {
      return emptyDiff('assign');
    }

    let nextId = this.nextId;
    const destination = nextId++;
    const selectedSet = new Set(selected);
    const touched = targetGroup === undefined
      ? sources
      : uniqueLabels([...sources, targetGroup]);

    const labelOf = new Map<ItemId, GroupId>();
    const descendants: Descendant[] = [];
    const added: GroupId[] = [destination];

    for (const group of touched) {
      const members = this.itemsOf(group);
      descendants.push([group, destination]);

      if (group === targetGroup) {
        for (const item of members) {
          labelOf.set(item, destination);
        }
        continue;
      }

      let remainder: GroupId | null = null;
      for (const item of members) {
        if (selectedSet.has(item)) {
          labelOf.set(item, destination);
        } else {
          if (remainder === null) {
            remainder = nextId++;
            added.push(remainder);
            descendants.push([group, remainder]);
          }
          labelOf.set(item, remainder);
        }
      }
    }

    return this.commit(this.buildPlan('assign', touched, added, descendants, labelOf, nextId));
  }

  /**
   * Merge two or more groups into one freshly minted group
   */
  merge(groupIds: readonly GroupId[]): DiffRecord {
    const groups = uniqueLabels(groupIds);
    const missing = groups.filter((group) => !this.index.has(group));
    if (missing.length > 0) {
      throw new InvalidGroupError(missing, { operation: 'merge' });
    }
    if (groups.length < 2) {
      throw new InsufficientGroupsError(groups.length, { operation: 'merge' });
    }

    const merged = this.nextId;
    const labelOf = new Map<ItemId, GroupId>();
    for (const group of groups) {
      for (const item of this.itemsOf(group)) {
        labelOf.set(item, merged);
      }
    }

    return this.commit(
      this.buildPlan(
        'merge',
        groups,
        [merged],
        groups.map((group) => [group, merged] as const),
        labelOf,
        merged + 1
      )
    );
  }

  /**
   * Split an arbitrary subset of items out of their groups.
   *
   * A fully selected group is relabeled to one new id; a partially selected
   * group is divided into two new ids, the selected subset first and the
   * remainder second.
   */
  split(itemIds: readonly ItemId[]): DiffRecord {
    const selected = this.normalizeItems(itemIds, 'split');
    if (selected.length === 0) {
      return emptyDiff('split');
    }

    const selectedSet = new Set(selected);
    const touched = uniqueLabels(selected.map((item) => this.assignmentArray[item]));

    let nextId = this.nextId;
    const labelOf = new Map<ItemId, GroupId>();
    const descendants: Descendant[] = [];
    const added: GroupId[] = [];

    for (const group of touched) {
      const members = this.itemsOf(group);
      const inside = nextId++;
      added.push(inside);
      descendants.push([group, inside]);

      let outside: GroupId | null = null;
      for (const item of members) {
        if (selectedSet.has(item)) {
          labelOf.set(item, inside);
        } else {
          if (outside === null) {
            outside = nextId++;
            added.push(outside);
            descendants.push([group, outside]);
          }
          labelOf.set(item, outside);
        }
      }
    }

    return this.commit(this.buildPlan('split', touched, added, descendants, labelOf, nextId));
  }

  // =========================================================================
  // Undoable Aspect
  // =========================================================================

  /**
   * Restore the partition as it was before `record` was applied.
   * Rolls the id counter back to the first id the record minted.
   */
  revert(record: DiffRecord): DiffRecord {
    this.applySlices(record.added, record.oldGroupItems);
    if (record.added.length > 0) {
      this.nextId = Math.min(this.nextId, record.added[0]);
    }
    return invertPartitionDiff(record, 'undo');
  }

  /**
   * Replay `record` on the partition it was computed against
   */
  reapply(record: DiffRecord): DiffRecord {
    this.applySlices(record.deleted, record.newGroupItems);
    if (record.added.length > 0) {
      this.nextId = Math.max(this.nextId, record.added[record.added.length - 1] + 1);
    }
    return withHistory(record, 'redo');
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private validateItems(itemIds: ArrayLike<number>, operation: string): void {
    const invalid: number[] = [];
    for (let i = 0; i < itemIds.length; i++) {
      const item = itemIds[i];
      if (!Number.isInteger(item) || item < 0 || item >= this.nItems) {
        invalid.push(item);
      }
    }
    if (invalid.length > 0) {
      throw new InvalidItemError(invalid, this.nItems, { operation });
    }
  }

  private normalizeItems(itemIds: readonly ItemId[], operation: string): ItemId[] {
    this.validateItems(itemIds, operation);
    return uniqueLabels(itemIds);
  }

  private buildPlan(
    description: string,
    deleted: readonly GroupId[],
    added: readonly GroupId[],
    descendants: readonly Descendant[],
    labelOf: ReadonlyMap<ItemId, GroupId>,
    nextGroupId: GroupId
  ): RelabelPlan {
    const affectedItems = Int32Array.from(labelOf.keys()).sort();
    const labels = new Int32Array(affectedItems.length);
    for (let i = 0; i < affectedItems.length; i++) {
      labels[i] = labelOf.get(affectedItems[i]) ?? -1;
    }
    return { description, deleted, added, descendants, affectedItems, labels, nextGroupId };
  }

  private commit(plan: RelabelPlan): DiffRecord {
    const oldGroupItems = new Map<GroupId, Int32Array>();
    for (const group of plan.deleted) {
      oldGroupItems.set(group, this.itemsOf(group));
    }
    const newGroupItems = groupItemsByLabel(plan.affectedItems, plan.labels);

    const record = createDiffRecord({
      description: plan.description,
      added: plan.added,
      deleted: plan.deleted,
      descendants: plan.descendants,
      affectedItems: plan.affectedItems,
      oldGroupItems,
      newGroupItems,
    });

    this.applySlices(plan.deleted, newGroupItems);
    this.nextId = plan.nextGroupId;

    this.logger?.debug(
      {
        operation: plan.description,
        added: record.added,
        deleted: record.deleted,
        affectedItems: record.affectedItems.length,
      },
      `Partition ${plan.description} applied`
    );

    return record;
  }

  /**
   * Drop `removed` from the index and install `installed`, relabeling
   * their items. Untouched groups keep their arrays by reference.
   */
  private applySlices(removed: readonly GroupId[], installed: GroupItems): void {
    for (const group of removed) {
      this.index.delete(group);
    }
    for (const [group, items] of installed) {
      this.index.set(group, items);
      for (const item of items) {
        this.assignmentArray[item] = group;
      }
    }
    this.sortedGroupIds = null;
  }
}
