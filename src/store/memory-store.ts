/**
 * Memory Tier
 * @module store/memory-store
 *
 * Per-group values a cache item recomputes on every pass. Never persisted.
 */

import type { GroupId } from '../types/partition.js';

export class MemoryStore<V> {
  private readonly values = new Map<GroupId, V>();

  store(group: GroupId, value: V): void {
    this.values.set(group, value);
  }

  load(group: GroupId): V | undefined {
    return this.values.get(group);
  }

  erase(groups: Iterable<GroupId>): void {
    for (const group of groups) {
      this.values.delete(group);
    }
  }
}
