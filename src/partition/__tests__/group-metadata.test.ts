/**
 * Group Metadata Unit Tests
 * @module partition/__tests__/group-metadata.test
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { GroupMetadata, metadataField } from '../group-metadata.js';
import { PartitionEngine } from '../partition-engine.js';
import { createDiffRecord } from '../diff-record.js';
import { InvalidDiffError, InvalidGroupError } from '../../errors/index.js';

describe('GroupMetadata', () => {
  let engine: PartitionEngine;
  let metadata: GroupMetadata;

  beforeEach(() => {
    engine = new PartitionEngine([0, 1, 2, 2]);
    metadata = new GroupMetadata({
      defaults: { group: null, score: 0 },
      hasGroup: (group) => engine.hasGroup(group),
    });
  });

  it('should fall back to the field default', () => {
    expect(metadata.get('group', 0)).toBeNull();
    expect(metadata.get('score', 0)).toBe(0);
    expect(metadata.get('unknown', 0)).toBeNull();
  });

  it('should set a value and describe the change', () => {
    const diff = metadata.set('group', [1, 0, 1], 'good');

    expect(diff.description).toBe('metadata_group');
    expect(diff.metadataChanged).toEqual([0, 1]);
    expect(diff.metadataValue).toBe('good');
    expect(diff.added).toEqual([]);
    expect(diff.previousMetadata?.get(0)).toBeNull();
    expect(metadata.get('group', 1)).toBe('good');
  });

  it('should reject groups that are not live', () => {
    expect(() => metadata.set('group', [0, 8], 'noise')).toThrow(InvalidGroupError);
    expect(metadata.get('group', 0)).toBeNull();
  });

  it('should revert to each previous value and reapply the new one', () => {
    metadata.set('group', [0], 'mua');
    const diff = metadata.set('group', [0, 1], 'good');

    const undone = metadata.revert(diff);

    expect(undone.history).toBe('undo');
    expect(undone.metadataValue).toBeUndefined();
    expect(metadata.get('group', 0)).toBe('mua');
    expect(metadata.get('group', 1)).toBeNull();

    const redone = metadata.reapply(diff);

    expect(redone.history).toBe('redo');
    expect(metadata.get('group', 0)).toBe('good');
    expect(metadata.get('group', 1)).toBe('good');
  });

  it('should carry the restored value when every group shares it', () => {
    const diff = metadata.set('group', [0, 1], 'noise');

    expect(metadata.revert(diff).metadataValue).toBeNull();
  });

  it('should reject records that are not metadata records', () => {
    const merge = createDiffRecord({ description: 'merge' });

    expect(() => metadata.revert(merge)).toThrow(InvalidDiffError);
  });

  describe('propagate', () => {
    it('should pass a value shared by every ancestor to the new group', () => {
      metadata.set('group', [0, 1], 'good');
      const diff = engine.merge([0, 1]);

      metadata.propagate(diff);

      expect(metadata.get('group', 3)).toBe('good');
    });

    it('should leave the new group at the default when ancestors disagree', () => {
      metadata.set('group', [0], 'good');
      metadata.set('group', [1], 'noise');
      const diff = engine.merge([0, 1]);

      metadata.propagate(diff);

      expect(metadata.get('group', 3)).toBeNull();
    });

    it('should reset a reused group id that ancestors do not agree on', () => {
      const tagged = metadata.set('group', [0, 1], 'good');
      const merge = engine.merge([0, 1]);
      metadata.propagate(merge);
      engine.revert(merge);
      metadata.revert(tagged);

      const again = engine.merge([0, 1]);
      metadata.propagate(again);

      expect(again.added).toEqual([3]);
      expect(metadata.get('group', 3)).toBeNull();
      expect(metadata.toJSON()).toEqual({ group: { '0': null, '1': null } });
    });

    it('should keep values of deleted groups', () => {
      metadata.set('score', [2], 5);
      const diff = engine.split([2]);

      metadata.propagate(diff);

      expect(diff.added).toEqual([3, 4]);
      expect(metadata.get('score', 3)).toBe(5);
      expect(metadata.get('score', 4)).toBe(5);
      expect(metadata.get('score', 2)).toBe(5);
    });
  });

  it('should serialize explicit values', () => {
    metadata.set('group', [2], 'mua');

    expect(metadata.toJSON()).toEqual({ group: { '2': 'mua' } });
  });
});

describe('metadataField', () => {
  it('should extract the field name', () => {
    expect(metadataField('metadata_group')).toBe('group');
    expect(metadataField('merge')).toBeNull();
  });
});
