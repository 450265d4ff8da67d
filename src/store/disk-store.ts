/**
 * Disk Store
 * @module store/disk-store
 *
 * Directory-per-dataset persistent store. Layout under the dataset root:
 *
 *   <group>/<field>.bin   raw little-endian elements
 *   <group>/<field>.json  header { shape, dtype, digest }
 *
 * All calls are synchronous; every fs failure surfaces as StoreIOError.
 */

import {
  closeSync,
  existsSync,
  mkdirSync,
  openSync,
  readFileSync,
  readSync,
  readdirSync,
  rmSync,
  statSync,
  writeFileSync,
  writeSync,
} from 'fs';
import { join } from 'path';
import { StoreIOError, getErrorMessage } from '../errors/index.js';
import type { GroupId } from '../types/partition.js';
import { byteLengthOf, decode, encode, rowBytesOf } from './dtype.js';
import {
  StoredArrayHeaderSchema,
  type PersistentHandle,
  type PersistentStore,
  type StoredArray,
  type StoredArrayHeader,
  type StoredEntry,
} from './interfaces.js';

const DATA_EXTENSION = '.bin';
const HEADER_EXTENSION = '.json';

function toStoreError(error: unknown, operation: string, path: string): StoreIOError {
  if (error instanceof StoreIOError) {
    return error;
  }
  return new StoreIOError(`Failed to ${operation} ${path}: ${getErrorMessage(error)}`, path, {
    operation,
    ...(error instanceof Error ? { cause: error } : {}),
  });
}

// ============================================================================
// Handle
// ============================================================================

class DiskHandle implements PersistentHandle {
  private fd: number | null;
  private readonly rowBytes: number;

  constructor(
    public readonly group: GroupId,
    public readonly field: string,
    public readonly header: StoredArrayHeader,
    private readonly path: string
  ) {
    this.rowBytes = rowBytesOf(header);
    try {
      this.fd = openSync(path, 'r+');
    } catch (error) {
      throw toStoreError(error, 'open', path);
    }
  }

  writeRows(row: number, data: StoredArray): void {
    if (this.fd === null) {
      throw new StoreIOError(`Handle on ${this.path} is closed`, this.path, { operation: 'write' });
    }
    const bytes = encode(data);
    const position = row * this.rowBytes;
    if (position + bytes.byteLength > byteLengthOf(this.header)) {
      throw new StoreIOError(
        `Write of ${bytes.byteLength} bytes at row ${row} overruns ${this.path}`,
        this.path,
        { operation: 'write' }
      );
    }
    try {
      writeSync(this.fd, bytes, 0, bytes.byteLength, position);
    } catch (error) {
      throw toStoreError(error, 'write', this.path);
    }
  }

  close(): void {
    if (this.fd === null) {
      return;
    }
    const fd = this.fd;
    this.fd = null;
    try {
      closeSync(fd);
    } catch (error) {
      throw toStoreError(error, 'close', this.path);
    }
  }
}

// ============================================================================
// Disk Store
// ============================================================================

export class DiskStore implements PersistentStore {
  constructor(private readonly root: string) {}

  get location(): string {
    return this.root;
  }

  readHeader(group: GroupId, field: string): StoredArrayHeader | null {
    const headerPath = this.headerPath(group, field);
    const dataPath = this.dataPath(group, field);
    if (!existsSync(headerPath) || !existsSync(dataPath)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(headerPath, 'utf8'));
    } catch (error) {
      if (error instanceof SyntaxError) {
        return null;
      }
      throw toStoreError(error, 'read', headerPath);
    }

    const parsed = StoredArrayHeaderSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }

    try {
      if (statSync(dataPath).size !== byteLengthOf(parsed.data)) {
        return null;
      }
    } catch (error) {
      throw toStoreError(error, 'stat', dataPath);
    }
    return parsed.data;
  }

  create(group: GroupId, field: string, header: StoredArrayHeader): void {
    const dir = this.groupDir(group);
    const dataPath = this.dataPath(group, field);
    try {
      mkdirSync(dir, { recursive: true });
      writeFileSync(dataPath, new Uint8Array(byteLengthOf(header)));
      writeFileSync(this.headerPath(group, field), JSON.stringify(header));
    } catch (error) {
      throw toStoreError(error, 'create', dataPath);
    }
  }

  readRow(group: GroupId, field: string, row: number): StoredArray | null {
    const header = this.readHeader(group, field);
    if (!header) {
      return null;
    }
    const rowBytes = rowBytesOf(header);
    const bytes = new Uint8Array(rowBytes);
    const dataPath = this.dataPath(group, field);
    let fd: number | null = null;
    try {
      fd = openSync(dataPath, 'r');
      readSync(fd, bytes, 0, rowBytes, row * rowBytes);
    } catch (error) {
      throw toStoreError(error, 'read', dataPath);
    } finally {
      if (fd !== null) {
        closeSync(fd);
      }
    }
    return decode(bytes, header.dtype);
  }

  read(group: GroupId, field: string): StoredEntry | null {
    const header = this.readHeader(group, field);
    if (!header) {
      return null;
    }
    const dataPath = this.dataPath(group, field);
    try {
      return { header, data: decode(readFileSync(dataPath), header.dtype) };
    } catch (error) {
      throw toStoreError(error, 'read', dataPath);
    }
  }

  openForWrite(group: GroupId, field: string): PersistentHandle {
    const header = this.readHeader(group, field);
    const dataPath = this.dataPath(group, field);
    if (!header) {
      throw new StoreIOError(`No entry to write at ${dataPath}`, dataPath, { operation: 'open' });
    }
    return new DiskHandle(group, field, header, dataPath);
  }

  listGroups(): GroupId[] {
    if (!existsSync(this.root)) {
      return [];
    }
    try {
      return readdirSync(this.root, { withFileTypes: true })
        .filter((entry) => entry.isDirectory() && /^\d+$/.test(entry.name))
        .map((entry) => Number(entry.name))
        .sort((a, b) => a - b);
    } catch (error) {
      throw toStoreError(error, 'list', this.root);
    }
  }

  listFields(group: GroupId): string[] {
    const dir = this.groupDir(group);
    if (!existsSync(dir)) {
      return [];
    }
    try {
      return readdirSync(dir)
        .filter((name) => name.endsWith(DATA_EXTENSION))
        .map((name) => name.slice(0, -DATA_EXTENSION.length))
        .sort();
    } catch (error) {
      throw toStoreError(error, 'list', dir);
    }
  }

  remove(group: GroupId): void {
    const dir = this.groupDir(group);
    try {
      rmSync(dir, { recursive: true, force: true });
    } catch (error) {
      throw toStoreError(error, 'remove', dir);
    }
  }

  private groupDir(group: GroupId): string {
    return join(this.root, String(group));
  }

  private dataPath(group: GroupId, field: string): string {
    return join(this.groupDir(group), `${field}${DATA_EXTENSION}`);
  }

  private headerPath(group: GroupId, field: string): string {
    return join(this.groupDir(group), `${field}${HEADER_EXTENSION}`);
  }
}
