/**
 * In-Memory Persistent Store
 * @module store/in-memory-store
 *
 * Process-local implementation of the persistent store contract, keeping
 * the same byte layout as the disk store. Used by the `memory` backend and
 * by tests.
 */

import { StoreIOError } from '../errors/index.js';
import type { GroupId } from '../types/partition.js';
import { byteLengthOf, decode, encode, rowBytesOf } from './dtype.js';
import type {
  PersistentHandle,
  PersistentStore,
  StoredArray,
  StoredArrayHeader,
  StoredEntry,
} from './interfaces.js';

interface MemoryEntry {
  header: StoredArrayHeader;
  bytes: Uint8Array;
}

export class InMemoryStore implements PersistentStore {
  private readonly entries = new Map<GroupId, Map<string, MemoryEntry>>();
  /** Handles currently open, for leak checks in tests */
  private openCount = 0;

  constructor(public readonly location: string = 'memory') {}

  get openHandles(): number {
    return this.openCount;
  }

  readHeader(group: GroupId, field: string): StoredArrayHeader | null {
    return this.entries.get(group)?.get(field)?.header ?? null;
  }

  create(group: GroupId, field: string, header: StoredArrayHeader): void {
    let fields = this.entries.get(group);
    if (!fields) {
      fields = new Map();
      this.entries.set(group, fields);
    }
    fields.set(field, {
      header: { shape: [...header.shape], dtype: header.dtype, digest: header.digest },
      bytes: new Uint8Array(byteLengthOf(header)),
    });
  }

  readRow(group: GroupId, field: string, row: number): StoredArray | null {
    const entry = this.entries.get(group)?.get(field);
    if (!entry) {
      return null;
    }
    const rowBytes = rowBytesOf(entry.header);
    return decode(entry.bytes.subarray(row * rowBytes, (row + 1) * rowBytes), entry.header.dtype);
  }

  read(group: GroupId, field: string): StoredEntry | null {
    const entry = this.entries.get(group)?.get(field);
    if (!entry) {
      return null;
    }
    return { header: entry.header, data: decode(entry.bytes, entry.header.dtype) };
  }

  openForWrite(group: GroupId, field: string): PersistentHandle {
    const entry = this.entries.get(group)?.get(field);
    const path = `${this.location}:${group}/${field}`;
    if (!entry) {
      throw new StoreIOError(`No entry to write at ${path}`, path, { operation: 'open' });
    }

    const rowBytes = rowBytesOf(entry.header);
    let open = true;
    this.openCount++;

    return {
      group,
      field,
      header: entry.header,
      writeRows: (row: number, data: StoredArray): void => {
        if (!open) {
          throw new StoreIOError(`Handle on ${path} is closed`, path, { operation: 'write' });
        }
        const bytes = encode(data);
        const position = row * rowBytes;
        if (position + bytes.byteLength > entry.bytes.byteLength) {
          throw new StoreIOError(
            `Write of ${bytes.byteLength} bytes at row ${row} overruns ${path}`,
            path,
            { operation: 'write' }
          );
        }
        entry.bytes.set(bytes, position);
      },
      close: (): void => {
        if (open) {
          open = false;
          this.openCount--;
        }
      },
    };
  }

  listGroups(): GroupId[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  listFields(group: GroupId): string[] {
    return [...(this.entries.get(group)?.keys() ?? [])].sort();
  }

  remove(group: GroupId): void {
    this.entries.delete(group);
  }

  /**
   * Raw bytes of an entry, for byte-level comparisons
   */
  snapshot(group: GroupId, field: string): Uint8Array | null {
    const entry = this.entries.get(group)?.get(field);
    return entry ? entry.bytes.slice() : null;
  }
}
