/**
 * Handle Pool Unit Tests
 * @module store/__tests__/handle-pool.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { HandlePool, withHandleScope } from '../handle-pool.js';
import { InMemoryStore } from '../in-memory-store.js';
import type { PersistentHandle, StoredArrayHeader } from '../interfaces.js';
import { StoreIOError } from '../../errors/index.js';
import { createLoggerSpy } from '../../../tests/helpers/fixtures.js';

const header: StoredArrayHeader = { shape: [2, 1], dtype: 'int32', digest: 'd' };

/**
 * Store whose 'bad' entries fail to close
 */
class FlakyStore extends InMemoryStore {
  openForWrite(group: number, field: string): PersistentHandle {
    const handle = super.openForWrite(group, field);
    if (field !== 'bad') {
      return handle;
    }
    return {
      ...handle,
      close: () => {
        handle.close();
        throw new Error('disk gone');
      },
    };
  }
}

describe('HandlePool', () => {
  let store: FlakyStore;

  beforeEach(() => {
    store = new FlakyStore();
    store.create(0, 'good', header);
    store.create(1, 'good', header);
    store.create(0, 'bad', header);
  });

  it('should open each entry once', () => {
    const pool = new HandlePool(store);

    const first = pool.acquire(0, 'good');
    const second = pool.acquire(0, 'good');
    pool.acquire(1, 'good');

    expect(second).toBe(first);
    expect(pool.stats).toEqual({ opened: 2, open: 2 });
    expect(store.openHandles).toBe(2);
  });

  it('should close every handle on release', () => {
    const pool = new HandlePool(store);
    pool.acquire(0, 'good');
    pool.acquire(1, 'good');

    pool.releaseAll();

    expect(pool.stats).toEqual({ opened: 2, open: 0 });
    expect(store.openHandles).toBe(0);
  });

  it('should attempt every handle before reporting close failures', () => {
    const pool = new HandlePool(store);
    pool.acquire(0, 'bad');
    pool.acquire(1, 'good');

    expect(() => pool.releaseAll()).toThrow('Failed to close 1 handle(s): 0:bad: disk gone');
    expect(store.openHandles).toBe(0);
  });
});

describe('withHandleScope', () => {
  let store: FlakyStore;

  beforeEach(() => {
    store = new FlakyStore();
    store.create(0, 'good', header);
    store.create(0, 'bad', header);
  });

  it('should return the body result and release handles', () => {
    const result = withHandleScope(store, (pool) => {
      pool.acquire(0, 'good').writeRows(0, Int32Array.from([5]));
      return 'done';
    });

    expect(result).toBe('done');
    expect(store.openHandles).toBe(0);
    expect(Array.from(store.read(0, 'good')?.data ?? [])).toEqual([5, 0]);
  });

  it('should release handles when the body throws', () => {
    expect(() =>
      withHandleScope(store, (pool) => {
        pool.acquire(0, 'good');
        throw new Error('interrupted');
      })
    ).toThrow('interrupted');
    expect(store.openHandles).toBe(0);
  });

  it('should keep the body error and log the close failure', () => {
    const logger = createLoggerSpy();

    expect(() =>
      withHandleScope(
        store,
        (pool) => {
          pool.acquire(0, 'bad');
          throw new Error('interrupted');
        },
        logger
      )
    ).toThrow('interrupted');
    expect(logger.error).toHaveBeenCalledWith(
      { err: expect.any(StoreIOError) },
      'Failed to release handles after an aborted pass'
    );
  });

  it('should throw a close failure when the body succeeded', () => {
    expect(() => withHandleScope(store, (pool) => pool.acquire(0, 'bad'))).toThrow(StoreIOError);
  });
});
