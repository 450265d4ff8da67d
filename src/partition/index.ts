/**
 * Partition Module
 * @module partition
 */

export {
  createDiffRecord,
  emptyDiff,
  isEmptyDiff,
  affectedGroups,
  withHistory,
  invertPartitionDiff,
  combineDiffRecords,
  type DiffRecord,
  type DiffRecordInit,
  type DiffHistoryTag,
  type Descendant,
  type MetadataValue,
} from './diff-record.js';

export {
  uniqueLabels,
  itemsInGroups,
  groupItemsByLabel,
  flattenGroupItems,
  unionItems,
  concatenatePerGroupArrays,
  digestItems,
} from './partition-utils.js';

export { PartitionEngine, type PartitionEngineOptions } from './partition-engine.js';

export { GroupMetadata, metadataField, type GroupMetadataOptions } from './group-metadata.js';
