/**
 * In-Memory Store Unit Tests
 * @module store/__tests__/in-memory-store.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryStore } from '../in-memory-store.js';
import type { StoredArrayHeader } from '../interfaces.js';
import { StoreIOError } from '../../errors/index.js';

const header: StoredArrayHeader = { shape: [3, 2], dtype: 'float32', digest: 'abc' };

describe('InMemoryStore', () => {
  let store: InMemoryStore;

  beforeEach(() => {
    store = new InMemoryStore('memory:test');
  });

  it('should report missing entries as null', () => {
    expect(store.readHeader(0, 'masks')).toBeNull();
    expect(store.read(0, 'masks')).toBeNull();
    expect(store.readRow(0, 'masks', 0)).toBeNull();
  });

  it('should create zero-filled entries', () => {
    store.create(4, 'masks', header);

    expect(store.readHeader(4, 'masks')).toEqual(header);
    expect(Array.from(store.read(4, 'masks')?.data ?? [])).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it('should write rows through a handle', () => {
    store.create(4, 'masks', header);
    const handle = store.openForWrite(4, 'masks');

    handle.writeRows(1, Float32Array.from([0.5, 1.5, 2.5, 3.5]));
    handle.close();

    expect(Array.from(store.read(4, 'masks')?.data ?? [])).toEqual([0, 0, 0.5, 1.5, 2.5, 3.5]);
    expect(Array.from(store.readRow(4, 'masks', 2) ?? [])).toEqual([2.5, 3.5]);
  });

  it('should reject a write past the end of the entry', () => {
    store.create(4, 'masks', header);
    const handle = store.openForWrite(4, 'masks');

    expect(() => handle.writeRows(2, Float32Array.from([1, 2, 3, 4]))).toThrow(StoreIOError);
    handle.close();
  });

  it('should reject writes after close', () => {
    store.create(4, 'masks', header);
    const handle = store.openForWrite(4, 'masks');
    handle.close();

    expect(() => handle.writeRows(0, Float32Array.from([1, 2]))).toThrow(
      'Handle on memory:test:4/masks is closed'
    );
  });

  it('should refuse to open a missing entry', () => {
    expect(() => store.openForWrite(1, 'masks')).toThrow(StoreIOError);
    expect(store.openHandles).toBe(0);
  });

  it('should count open handles', () => {
    store.create(4, 'masks', header);
    const handle = store.openForWrite(4, 'masks');

    expect(store.openHandles).toBe(1);
    handle.close();
    handle.close();
    expect(store.openHandles).toBe(0);
  });

  it('should list and remove groups', () => {
    store.create(9, 'masks', header);
    store.create(2, 'masks', header);
    store.create(2, 'features', header);

    expect(store.listGroups()).toEqual([2, 9]);
    expect(store.listFields(2)).toEqual(['features', 'masks']);

    store.remove(2);

    expect(store.listGroups()).toEqual([9]);
    expect(store.listFields(2)).toEqual([]);
  });

  it('should return snapshots that do not alias the entry', () => {
    store.create(0, 'ids', { shape: [1, 1], dtype: 'int32', digest: 'd' });
    const snapshot = store.snapshot(0, 'ids');
    snapshot?.fill(255);

    expect(Array.from(store.read(0, 'ids')?.data ?? [])).toEqual([0]);
    expect(store.snapshot(5, 'ids')).toBeNull();
  });
});
