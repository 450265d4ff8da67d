/**
 * Handle Pool
 * @module store/handle-pool
 *
 * Pool of persistent write handles keyed by (group, field). Handles are
 * opened on first use within a scope and all closed when the scope ends,
 * whether it returns or throws.
 */

import { StoreIOError, getErrorMessage } from '../errors/index.js';
import type { CoreLogger } from '../logging/index.js';
import type { GroupId } from '../types/partition.js';
import type { HandleSource, PersistentHandle, PersistentStore } from './interfaces.js';

export interface HandlePoolStats {
  readonly opened: number;
  readonly open: number;
}

export class HandlePool implements HandleSource {
  private readonly handles = new Map<string, PersistentHandle>();
  private opened = 0;

  constructor(private readonly store: PersistentStore) {}

  get stats(): HandlePoolStats {
    return { opened: this.opened, open: this.handles.size };
  }

  /**
   * Handle on an entry, opened on first request
   */
  acquire(group: GroupId, field: string): PersistentHandle {
    const key = `${group}:${field}`;
    const existing = this.handles.get(key);
    if (existing) {
      return existing;
    }
    const handle = this.store.openForWrite(group, field);
    this.handles.set(key, handle);
    this.opened++;
    return handle;
  }

  /**
   * Close every open handle. Close failures are collected and reported
   * together after all handles have been attempted.
   */
  releaseAll(): void {
    const failures: string[] = [];
    for (const [key, handle] of this.handles) {
      try {
        handle.close();
      } catch (error) {
        failures.push(`${key}: ${getErrorMessage(error)}`);
      }
    }
    this.handles.clear();

    if (failures.length > 0) {
      throw new StoreIOError(
        `Failed to close ${failures.length} handle(s): ${failures.join('; ')}`,
        this.store.location,
        { operation: 'close', details: { failures } }
      );
    }
  }
}

/**
 * Run `fn` with a fresh handle pool and release every handle it opened.
 *
 * When `fn` throws, close failures are logged and the original error
 * propagates; otherwise a close failure is thrown.
 */
export function withHandleScope<T>(
  store: PersistentStore,
  fn: (pool: HandlePool) => T,
  logger?: CoreLogger
): T {
  const pool = new HandlePool(store);
  let failed = false;
  try {
    return fn(pool);
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    if (failed) {
      try {
        pool.releaseAll();
      } catch (releaseError) {
        logger?.error({ err: releaseError }, 'Failed to release handles after an aborted pass');
      }
    } else {
      pool.releaseAll();
    }
  }
}
