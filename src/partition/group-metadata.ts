/**
 * Group Metadata
 * @module partition/group-metadata
 *
 * Per-group field values (e.g. a curation category) with per-field defaults.
 * Changes go through `set`, which returns a `metadata_<field>` record the
 * history manager can revert and re-apply.
 */

import { InvalidDiffError, InvalidGroupError } from '../errors/index.js';
import type { UndoableAspect } from '../history/index.js';
import type { CoreLogger } from '../logging/index.js';
import type { GroupId } from '../types/partition.js';
import {
  createDiffRecord,
  withHistory,
  type DiffRecord,
  type MetadataValue,
} from './diff-record.js';

const METADATA_PREFIX = 'metadata_';

export interface GroupMetadataOptions {
  /** Default value per field; fields without one default to null */
  readonly defaults?: Readonly<Record<string, MetadataValue>>;
  /** Tells whether a group is live; `set` rejects the others */
  readonly hasGroup: (group: GroupId) => boolean;
  readonly logger?: CoreLogger;
}

/**
 * Field name carried by a `metadata_<field>` description, or null
 */
export function metadataField(description: string): string | null {
  return description.startsWith(METADATA_PREFIX) ? description.slice(METADATA_PREFIX.length) : null;
}

export class GroupMetadata implements UndoableAspect<DiffRecord> {
  public readonly aspectName = 'metadata';

  private readonly values = new Map<string, Map<GroupId, MetadataValue>>();
  private readonly defaults: Readonly<Record<string, MetadataValue>>;
  private readonly hasGroup: (group: GroupId) => boolean;
  private readonly logger?: CoreLogger;

  constructor(options: GroupMetadataOptions) {
    this.defaults = options.defaults ?? {};
    this.hasGroup = options.hasGroup;
    this.logger = options.logger;
  }

  get fields(): string[] {
    return [...new Set([...Object.keys(this.defaults), ...this.values.keys()])].sort();
  }

  defaultValue(field: string): MetadataValue {
    return this.defaults[field] ?? null;
  }

  get(field: string, group: GroupId): MetadataValue {
    const stored = this.values.get(field)?.get(group);
    return stored === undefined ? this.defaultValue(field) : stored;
  }

  /**
   * Set `field` to `value` on every listed group
   * @throws InvalidGroupError when a group is not live
   */
  set(field: string, groupIds: readonly GroupId[], value: MetadataValue): DiffRecord {
    const groups = [...new Set(groupIds)].sort((a, b) => a - b);
    const missing = groups.filter((group) => !this.hasGroup(group));
    if (missing.length > 0) {
      throw new InvalidGroupError(missing, { operation: `${METADATA_PREFIX}${field}` });
    }

    const previousMetadata = new Map<GroupId, MetadataValue>();
    for (const group of groups) {
      previousMetadata.set(group, this.get(field, group));
    }

    this.write(field, groups, () => value);
    this.logger?.debug({ field, groups, value }, 'Group metadata set');

    return createDiffRecord({
      description: `${METADATA_PREFIX}${field}`,
      metadataChanged: groups,
      metadataValue: value,
      previousMetadata,
    });
  }

  /**
   * Let every added group inherit a value its ancestors all share. Any
   * other added group is reset to the field default, as an id freed by
   * undo may still hold a stale value. Values of deleted groups are kept
   * so undo finds them again.
   */
  propagate(diff: DiffRecord): void {
    if (diff.added.length === 0) {
      return;
    }

    const ancestors = new Map<GroupId, GroupId[]>();
    for (const [oldGroup, newGroup] of diff.descendants) {
      const list = ancestors.get(newGroup) ?? [];
      list.push(oldGroup);
      ancestors.set(newGroup, list);
    }

    for (const field of this.fields) {
      const fallback = this.defaultValue(field);
      for (const group of diff.added) {
        const parents = ancestors.get(group) ?? [];
        const inherited = new Set(parents.map((parent) => this.get(field, parent)));
        const [value] = inherited;
        if (inherited.size === 1 && value !== undefined && value !== fallback) {
          this.write(field, [group], () => value);
        } else {
          this.values.get(field)?.delete(group);
        }
      }
    }
  }

  revert(record: DiffRecord): DiffRecord {
    const field = this.fieldOf(record);
    const previous = record.previousMetadata ?? new Map<GroupId, MetadataValue>();
    const restoredOf = (group: GroupId): MetadataValue => {
      const value = previous.get(group);
      return value === undefined ? this.defaultValue(field) : value;
    };
    this.write(field, record.metadataChanged, restoredOf);

    // The undo record carries the restored value when every group shares one
    const restored = new Set(record.metadataChanged.map(restoredOf));
    const [restoredValue] = restored;

    return createDiffRecord({
      description: record.description,
      history: 'undo',
      metadataChanged: record.metadataChanged,
      ...(restored.size === 1 ? { metadataValue: restoredValue } : {}),
      ...(record.previousMetadata !== undefined ? { previousMetadata: record.previousMetadata } : {}),
    });
  }

  reapply(record: DiffRecord): DiffRecord {
    const field = this.fieldOf(record);
    const value = record.metadataValue ?? null;
    this.write(field, record.metadataChanged, () => value);
    return withHistory(record, 'redo');
  }

  /**
   * Explicit values of every field, keyed by group id
   */
  toJSON(): Record<string, Record<string, MetadataValue>> {
    const out: Record<string, Record<string, MetadataValue>> = {};
    for (const [field, groups] of this.values) {
      out[field] = Object.fromEntries([...groups].map(([group, value]) => [String(group), value]));
    }
    return out;
  }

  private fieldOf(record: DiffRecord): string {
    const field = metadataField(record.description);
    if (field === null) {
      throw new InvalidDiffError([`'${record.description}' is not a metadata record`]);
    }
    return field;
  }

  private write(
    field: string,
    groups: readonly GroupId[],
    valueOf: (group: GroupId) => MetadataValue
  ): void {
    let fieldValues = this.values.get(field);
    if (!fieldValues) {
      fieldValues = new Map();
      this.values.set(field, fieldValues);
    }
    for (const group of groups) {
      fieldValues.set(group, valueOf(group));
    }
  }
}
