/**
 * Diff Record Unit Tests
 * @module partition/__tests__/diff-record.test
 */

import { describe, it, expect } from 'vitest';
import {
  affectedGroups,
  combineDiffRecords,
  createDiffRecord,
  emptyDiff,
  invertPartitionDiff,
  isEmptyDiff,
  withHistory,
} from '../diff-record.js';
import { InvalidDiffError } from '../../errors/index.js';

const items = (...ids: number[]): Int32Array => Int32Array.from(ids);

function mergeRecord() {
  return createDiffRecord({
    description: 'merge',
    added: [3],
    deleted: [2, 1],
    descendants: [
      [1, 3],
      [2, 3],
    ],
    affectedItems: items(0, 1, 2),
    oldGroupItems: new Map([
      [1, items(0, 2)],
      [2, items(1)],
    ]),
    newGroupItems: new Map([[3, items(0, 1, 2)]]),
  });
}

describe('createDiffRecord', () => {
  it('should fill defaults and sort group lists', () => {
    const record = mergeRecord();

    expect(record.history).toBeNull();
    expect(record.deleted).toEqual([1, 2]);
    expect(record.metadataChanged).toEqual([]);
    expect(record.metadataValue).toBeUndefined();
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('should reject unknown keys', () => {
    const init = { description: 'merge', spikes: [1, 2] };

    expect(() => createDiffRecord(init)).toThrow(InvalidDiffError);
  });

  it('should reject groups both added and deleted', () => {
    expect(() => createDiffRecord({ description: 'merge', added: [1], deleted: [1] })).toThrow(
      'groups both added and deleted: 1'
    );
  });

  it('should reject lineage edges outside added and deleted', () => {
    try {
      createDiffRecord({ description: 'split', added: [4], deleted: [1], descendants: [[2, 5]] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidDiffError);
      if (error instanceof InvalidDiffError) {
        expect(error.issues).toEqual([
          'descendant source 2 is not deleted',
          'descendant target 5 is not added',
        ]);
      }
    }
  });

  it('should reject slices for groups outside the record', () => {
    expect(() =>
      createDiffRecord({ description: 'merge', added: [3], newGroupItems: new Map([[4, items(0)]]) })
    ).toThrow('new slice for group 4 which is not added');
  });
});

describe('record helpers', () => {
  it('should recognise empty records', () => {
    expect(isEmptyDiff(emptyDiff('assign'))).toBe(true);
    expect(isEmptyDiff(mergeRecord())).toBe(false);
  });

  it('should list every group the cache must revisit', () => {
    const record = createDiffRecord({
      description: 'merge',
      added: [5],
      deleted: [1, 2],
      metadataChanged: [7, 5],
    });

    expect(affectedGroups(record)).toEqual([1, 2, 5, 7]);
  });

  it('should retag history without touching the rest', () => {
    const redo = withHistory(mergeRecord(), 'redo');

    expect(redo.history).toBe('redo');
    expect(redo.added).toEqual([3]);
    expect(redo.descendants).toEqual([
      [1, 3],
      [2, 3],
    ]);
  });

  it('should invert a partition record', () => {
    const inverse = invertPartitionDiff(mergeRecord());

    expect(inverse.history).toBe('undo');
    expect(inverse.added).toEqual([1, 2]);
    expect(inverse.deleted).toEqual([3]);
    expect(inverse.descendants).toEqual([
      [3, 1],
      [3, 2],
    ]);
    expect(Array.from(inverse.newGroupItems.get(1) ?? [])).toEqual([0, 2]);
    expect(Array.from(inverse.oldGroupItems.get(3) ?? [])).toEqual([0, 1, 2]);
  });
});

describe('combineDiffRecords', () => {
  it('should return null for no records and the record itself for one', () => {
    const record = mergeRecord();

    expect(combineDiffRecords([])).toBeNull();
    expect(combineDiffRecords([record])).toBe(record);
  });

  it('should combine a partition record with a metadata record', () => {
    const metadata = createDiffRecord({
      description: 'metadata_group',
      metadataChanged: [3],
      metadataValue: 'good',
    });

    const combined = combineDiffRecords([mergeRecord(), metadata]);

    expect(combined?.description).toBe('merge+metadata_group');
    expect(combined?.added).toEqual([3]);
    expect(combined?.deleted).toEqual([1, 2]);
    expect(combined?.metadataChanged).toEqual([3]);
    expect(combined?.metadataValue).toBe('good');
    expect(combined?.history).toBeNull();
  });

  it('should cancel groups created and destroyed within the same action', () => {
    const split = createDiffRecord({
      description: 'split',
      added: [4, 5],
      deleted: [3],
      descendants: [
        [3, 4],
        [3, 5],
      ],
      affectedItems: items(0, 1, 2),
      oldGroupItems: new Map([[3, items(0, 1, 2)]]),
      newGroupItems: new Map([
        [4, items(0)],
        [5, items(1, 2)],
      ]),
    });

    const combined = combineDiffRecords([mergeRecord(), split]);

    expect(combined?.added).toEqual([4, 5]);
    expect(combined?.deleted).toEqual([1, 2]);
    expect(combined?.descendants).toEqual([
      [1, 4],
      [1, 5],
      [2, 4],
      [2, 5],
    ]);
    expect([...(combined?.oldGroupItems.keys() ?? [])]).toEqual([1, 2]);
    expect([...(combined?.newGroupItems.keys() ?? [])]).toEqual([4, 5]);
    expect(Array.from(combined?.affectedItems ?? [])).toEqual([0, 1, 2]);
  });

  it('should keep a history tag shared by every record', () => {
    const a = withHistory(mergeRecord(), 'undo');
    const b = createDiffRecord({ description: 'metadata_group', history: 'undo', metadataChanged: [1] });
    const c = createDiffRecord({ description: 'metadata_group', metadataChanged: [1] });

    expect(combineDiffRecords([a, b])?.history).toBe('undo');
    expect(combineDiffRecords([a, c])?.history).toBeNull();
  });
});
