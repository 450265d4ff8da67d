/**
 * Cluster Curator
 * @module cluster-curator
 *
 * Partition engine with undo/redo history and a tiered per-group cache for
 * interactive spike-cluster curation.
 */

export * from './errors/index.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './partition/index.js';
export * from './history/index.js';
export * from './progress/index.js';
export * from './store/index.js';
export * from './items/index.js';
export * from './session/index.js';
export type { GroupId, ItemId, GroupItems, PartitionView } from './types/partition.js';
export type { ChannelPosition, SourceModel } from './types/source.js';
