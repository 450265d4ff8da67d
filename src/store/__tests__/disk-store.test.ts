/**
 * Disk Store Unit Tests
 * @module store/__tests__/disk-store.test
 *
 * Runs against a fresh temporary directory per test.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DiskStore } from '../disk-store.js';
import type { StoredArrayHeader } from '../interfaces.js';
import { StoreIOError } from '../../errors/index.js';

const header: StoredArrayHeader = { shape: [2, 3], dtype: 'int32', digest: '0badf00d' };

describe('DiskStore', () => {
  let root: string;
  let store: DiskStore;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'cluster-curator-'));
    store = new DiskStore(root);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should lay out one data file and one header per entry', () => {
    store.create(7, 'masks', header);

    expect(readFileSync(join(root, '7', 'masks.bin')).byteLength).toBe(24);
    expect(JSON.parse(readFileSync(join(root, '7', 'masks.json'), 'utf8'))).toEqual(header);
    expect(store.location).toBe(root);
  });

  it('should write rows little-endian and read them back', () => {
    store.create(7, 'masks', header);
    const handle = store.openForWrite(7, 'masks');
    handle.writeRows(1, Int32Array.from([1, -2, 258]));
    handle.close();

    const bytes = readFileSync(join(root, '7', 'masks.bin'));
    expect(Array.from(bytes.subarray(12, 16))).toEqual([1, 0, 0, 0]);
    expect(Array.from(bytes.subarray(20, 24))).toEqual([2, 1, 0, 0]);
    expect(Array.from(store.read(7, 'masks')?.data ?? [])).toEqual([0, 0, 0, 1, -2, 258]);
    expect(Array.from(store.readRow(7, 'masks', 1) ?? [])).toEqual([1, -2, 258]);
  });

  it('should survive reopening the directory', () => {
    store.create(3, 'features', { shape: [1, 2], dtype: 'float32', digest: 'x' });
    const handle = store.openForWrite(3, 'features');
    handle.writeRows(0, Float32Array.from([0.25, -4]));
    handle.close();

    const reopened = new DiskStore(root);

    expect(reopened.readHeader(3, 'features')).toEqual({ shape: [1, 2], dtype: 'float32', digest: 'x' });
    expect(Array.from(reopened.read(3, 'features')?.data ?? [])).toEqual([0.25, -4]);
  });

  it('should treat a missing data file as a missing entry', () => {
    mkdirSync(join(root, '1'));
    writeFileSync(join(root, '1', 'masks.json'), JSON.stringify(header));

    expect(store.readHeader(1, 'masks')).toBeNull();
  });

  it('should treat an unreadable header as a missing entry', () => {
    store.create(1, 'masks', header);
    writeFileSync(join(root, '1', 'masks.json'), '{"shape": [2,');

    expect(store.readHeader(1, 'masks')).toBeNull();
  });

  it('should treat an invalid header as a missing entry', () => {
    store.create(1, 'masks', header);
    writeFileSync(join(root, '1', 'masks.json'), JSON.stringify({ shape: [2, 3], dtype: 'float64', digest: 'x' }));

    expect(store.readHeader(1, 'masks')).toBeNull();
  });

  it('should treat a truncated data file as a missing entry', () => {
    store.create(1, 'masks', header);
    writeFileSync(join(root, '1', 'masks.bin'), new Uint8Array(8));

    expect(store.readHeader(1, 'masks')).toBeNull();
    expect(store.read(1, 'masks')).toBeNull();
  });

  it('should refuse to open a missing entry', () => {
    expect(() => store.openForWrite(2, 'masks')).toThrow(StoreIOError);
  });

  it('should reject a write past the end of the entry', () => {
    store.create(7, 'masks', header);
    const handle = store.openForWrite(7, 'masks');

    expect(() => handle.writeRows(2, Int32Array.from([1, 2, 3]))).toThrow(StoreIOError);
    handle.close();
    expect(() => handle.writeRows(0, Int32Array.from([1, 2, 3]))).toThrow(StoreIOError);
  });

  it('should list numeric group directories only', () => {
    store.create(10, 'masks', header);
    store.create(2, 'masks', header);
    store.create(2, 'features', header);
    mkdirSync(join(root, 'scratch'));

    expect(store.listGroups()).toEqual([2, 10]);
    expect(store.listFields(2)).toEqual(['features', 'masks']);
    expect(store.listFields(4)).toEqual([]);
  });

  it('should remove every entry of a group', () => {
    store.create(2, 'masks', header);
    store.create(2, 'features', header);

    store.remove(2);
    store.remove(2);

    expect(store.listGroups()).toEqual([]);
    expect(store.readHeader(2, 'masks')).toBeNull();
  });

  it('should report no groups when the root does not exist', () => {
    expect(new DiskStore(join(root, 'absent')).listGroups()).toEqual([]);
  });
});
