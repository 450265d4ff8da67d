/**
 * Partition Utilities Unit Tests
 * @module partition/__tests__/partition-utils.test
 */

import { describe, it, expect } from 'vitest';
import {
  concatenatePerGroupArrays,
  digestItems,
  flattenGroupItems,
  groupItemsByLabel,
  itemsInGroups,
  uniqueLabels,
  unionItems,
} from '../partition-utils.js';
import { InvalidItemError } from '../../errors/index.js';

const i32 = (...values: number[]): Int32Array => Int32Array.from(values);

describe('uniqueLabels', () => {
  it('should return sorted distinct labels', () => {
    expect(uniqueLabels([5, 2, 5, 0, 2])).toEqual([0, 2, 5]);
    expect(uniqueLabels(i32())).toEqual([]);
  });
});

describe('itemsInGroups', () => {
  it('should list items whose label is requested, ascending', () => {
    expect(Array.from(itemsInGroups(i32(2, 3, 2, 5, 3), [3, 5]))).toEqual([1, 3, 4]);
  });

  it('should return nothing for no groups', () => {
    expect(itemsInGroups(i32(1, 2), []).length).toBe(0);
  });
});

describe('groupItemsByLabel', () => {
  it('should cut items into sorted per-group arrays', () => {
    const result = groupItemsByLabel(i32(7, 3, 9, 1, 4), i32(2, 1, 2, 2, 1));

    expect([...result.keys()]).toEqual([1, 2]);
    expect(Array.from(result.get(1) ?? [])).toEqual([3, 4]);
    expect(Array.from(result.get(2) ?? [])).toEqual([1, 7, 9]);
  });

  it('should reject arrays of different length', () => {
    expect(() => groupItemsByLabel(i32(0, 1), i32(0))).toThrow(RangeError);
  });
});

describe('flattenGroupItems', () => {
  it('should rebuild the assignment', () => {
    const groups = new Map([
      [4, i32(0, 3)],
      [1, i32(1, 2)],
    ]);

    expect(Array.from(flattenGroupItems(groups))).toEqual([4, 1, 1, 4]);
  });

  it('should reject an item listed twice', () => {
    const groups = new Map([
      [0, i32(0, 1)],
      [1, i32(1)],
    ]);

    expect(() => flattenGroupItems(groups)).toThrow(InvalidItemError);
  });
});

describe('unionItems', () => {
  it('should merge and dedupe', () => {
    expect(Array.from(unionItems([i32(1, 4), i32(0, 4, 9), i32()]))).toEqual([0, 1, 4, 9]);
  });
});

describe('concatenatePerGroupArrays', () => {
  it('should restore item order from per-group rows', () => {
    const groupItems = new Map([
      [1, i32(0, 3)],
      [2, i32(1, 2)],
    ]);
    const rows = new Map([
      [1, Float32Array.from([0, 0.5, 3, 3.5])],
      [2, Float32Array.from([1, 1.5, 2, 2.5])],
    ]);

    const { items, data } = concatenatePerGroupArrays(groupItems, rows, 2);

    expect(Array.from(items)).toEqual([0, 1, 2, 3]);
    expect(Array.from(data)).toEqual([0, 0.5, 1, 1.5, 2, 2.5, 3, 3.5]);
  });

  it('should reject a row count that disagrees with the group size', () => {
    const groupItems = new Map([[1, i32(0, 1)]]);
    const rows = new Map([[1, Float32Array.from([1, 2, 3])]]);

    expect(() => concatenatePerGroupArrays(groupItems, rows, 2)).toThrow(RangeError);
  });
});

describe('digestItems', () => {
  it('should be stable and membership-sensitive', () => {
    expect(digestItems(i32(0, 1, 2))).toBe(digestItems(i32(0, 1, 2)));
    expect(digestItems(i32(0, 1, 2))).not.toBe(digestItems(i32(0, 1, 3)));
    expect(digestItems(i32())).toBe('811c9dc5');
  });
});
