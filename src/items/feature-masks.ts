/**
 * Feature/Mask Cache Item
 * @module items/feature-masks
 *
 * Streams per-item feature and mask rows from the source model into
 * per-group persistent arrays, then derives per-group mask statistics in
 * the memory tier:
 *
 * - sumMasks / meanMasks per channel
 * - unmaskedChannels: channels whose mean mask exceeds the threshold
 * - mainChannels: unmasked channels by descending mean mask
 * - meanChannelPosition: channel positions weighted by mean mask
 */

import { CacheItemError } from '../errors/index.js';
import type { CoreLogger } from '../logging/index.js';
import { digestItems } from '../partition/index.js';
import { MemoryStore } from '../store/memory-store.js';
import type {
  AggregationContext,
  CacheItem,
  DistributionContext,
  FieldDescriptor,
  MemoryValue,
  StoredArrayHeader,
} from '../store/interfaces.js';
import type { GroupId } from '../types/partition.js';
import type { ChannelPosition, SourceModel } from '../types/source.js';

// ============================================================================
// Types
// ============================================================================

export const FEATURE_MASKS_ITEM = 'features and masks';

export const FEATURES_FIELD = 'features';
export const MASKS_FIELD = 'masks';

/**
 * Memory-tier values of one group
 */
export type FeatureMasksSummary = {
  readonly sumMasks: Float32Array;
  readonly meanMasks: Float32Array;
  readonly unmaskedChannels: Int32Array;
  readonly nUnmaskedChannels: number;
  readonly mainChannels: Int32Array;
  readonly meanChannelPosition: ChannelPosition;
};

export interface FeatureMasksOptions {
  /** Mean mask above which a channel counts as unmasked */
  readonly unmaskedThreshold?: number;
  /** Items between two distribution progress reports */
  readonly progressBatchSize?: number;
  readonly logger?: CoreLogger;
}

export const DEFAULT_UNMASKED_THRESHOLD = 1e-3;
export const DEFAULT_PROGRESS_BATCH_SIZE = 100;

const FIELDS: readonly FieldDescriptor[] = [
  { name: FEATURES_FIELD, tier: 'persistent', dtype: 'float32' },
  { name: MASKS_FIELD, tier: 'persistent', dtype: 'float32' },
  { name: 'sumMasks', tier: 'memory' },
  { name: 'meanMasks', tier: 'memory' },
  { name: 'unmaskedChannels', tier: 'memory' },
  { name: 'nUnmaskedChannels', tier: 'memory' },
  { name: 'mainChannels', tier: 'memory' },
  { name: 'meanChannelPosition', tier: 'memory' },
];

// ============================================================================
// Aggregation
// ============================================================================

/**
 * Mask statistics of one group from its persisted masks
 * (rows × nChannels, row-major)
 */
export function summarizeMasks(
  masks: ArrayLike<number>,
  nChannels: number,
  positions: readonly ChannelPosition[],
  threshold: number = DEFAULT_UNMASKED_THRESHOLD
): FeatureMasksSummary {
  const rows = nChannels > 0 ? Math.floor(masks.length / nChannels) : 0;
  const sums = new Float64Array(nChannels);
  for (let row = 0; row < rows; row++) {
    const offset = row * nChannels;
    for (let channel = 0; channel < nChannels; channel++) {
      sums[channel] += masks[offset + channel];
    }
  }

  const sumMasks = Float32Array.from(sums);
  const meanMasks = new Float32Array(nChannels);
  if (rows > 0) {
    for (let channel = 0; channel < nChannels; channel++) {
      meanMasks[channel] = sums[channel] / rows;
    }
  }

  const unmasked: number[] = [];
  for (let channel = 0; channel < nChannels; channel++) {
    if (meanMasks[channel] > threshold) {
      unmasked.push(channel);
    }
  }
  const main = [...unmasked].sort((a, b) => meanMasks[b] - meanMasks[a] || a - b);

  return {
    sumMasks,
    meanMasks,
    unmaskedChannels: Int32Array.from(unmasked),
    nUnmaskedChannels: unmasked.length,
    mainChannels: Int32Array.from(main),
    meanChannelPosition: weightedCentroid(positions, meanMasks),
  };
}

/**
 * Positions weighted by `weights`; the plain mean when every weight is zero
 */
function weightedCentroid(positions: readonly ChannelPosition[], weights: Float32Array): ChannelPosition {
  if (positions.length === 0) {
    return [0, 0];
  }
  let total = 0;
  let x = 0;
  let y = 0;
  for (let channel = 0; channel < positions.length; channel++) {
    const weight = weights[channel] ?? 0;
    total += weight;
    x += weight * positions[channel][0];
    y += weight * positions[channel][1];
  }
  if (total > 0) {
    return [x / total, y / total];
  }

  for (const [px, py] of positions) {
    x += px;
    y += py;
  }
  return [x / positions.length, y / positions.length];
}

// ============================================================================
// Cache Item
// ============================================================================

export class FeatureMasks implements CacheItem {
  public readonly name = FEATURE_MASKS_ITEM;
  public readonly fields = FIELDS;

  private readonly memory = new MemoryStore<FeatureMasksSummary>();
  private readonly threshold: number;
  private readonly batchSize: number;
  private readonly logger?: CoreLogger;
  private readonly featureRowSize: number;

  /**
   * @throws CacheItemError when the source arrays disagree with its dimensions
   */
  constructor(private readonly source: SourceModel, options: FeatureMasksOptions = {}) {
    this.threshold = options.unmaskedThreshold ?? DEFAULT_UNMASKED_THRESHOLD;
    this.batchSize = Math.max(1, options.progressBatchSize ?? DEFAULT_PROGRESS_BATCH_SIZE);
    this.logger = options.logger;
    this.featureRowSize = source.nChannels * source.nFeaturesPerChannel;

    const problems: string[] = [];
    if (source.features.length !== source.nItems * this.featureRowSize) {
      problems.push(`features holds ${source.features.length} values, expected ${source.nItems * this.featureRowSize}`);
    }
    if (source.masks.length !== source.nItems * source.nChannels) {
      problems.push(`masks holds ${source.masks.length} values, expected ${source.nItems * source.nChannels}`);
    }
    if (source.channelPositions.length !== source.nChannels) {
      problems.push(`${source.channelPositions.length} channel positions for ${source.nChannels} channels`);
    }
    if (problems.length > 0) {
      throw new CacheItemError(`Source '${source.name}' is inconsistent: ${problems.join('; ')}`, this.name, {
        details: { problems },
      });
    }
  }

  expectedHeader(field: string, items: Int32Array): StoredArrayHeader {
    const n = items.length;
    const digest = digestItems(items);
    if (field === FEATURES_FIELD) {
      return {
        shape: [n, this.source.nChannels, this.source.nFeaturesPerChannel],
        dtype: 'float32',
        digest,
      };
    }
    if (field === MASKS_FIELD) {
      return { shape: [n, this.source.nChannels], dtype: 'float32', digest };
    }
    throw new CacheItemError(`'${field}' is not a persistent field`, this.name);
  }

  /**
   * Visit the candidate items once, in ascending order, appending each row
   * to its group's entry at a per-entry cursor.
   */
  distribute(context: DistributionContext): void {
    const { partition, toStore, items, handles, progress } = context;

    let total = 0;
    for (const item of items) {
      if (toStore.has(partition.groupOf(item))) {
        total++;
      }
    }
    progress.begin('distribute', total);

    const cursors = new Map<string, number>();
    let completed = 0;
    let lastReported = -1;

    for (const item of items) {
      const group = partition.groupOf(item);
      const fields = toStore.get(group);
      if (!fields) {
        continue;
      }

      for (const field of fields) {
        const key = `${group}:${field}`;
        const cursor = cursors.get(key) ?? 0;
        handles.acquire(group, field).writeRows(cursor, this.rowOf(field, item));
        cursors.set(key, cursor + 1);
      }

      completed++;
      if (completed % this.batchSize === 0) {
        progress.report('distribute', completed, total);
        lastReported = completed;
      }
    }

    if (lastReported !== completed) {
      progress.report('distribute', completed, total);
    }
    this.logger?.debug({ items: completed, groups: toStore.size }, 'Features and masks distributed');
  }

  aggregate(context: AggregationContext): void {
    const { groups, store, progress } = context;
    progress.begin('aggregate', groups.length);

    groups.forEach((group, index) => {
      const entry = store.read(group, MASKS_FIELD);
      if (!entry) {
        throw new CacheItemError(`No '${MASKS_FIELD}' entry for group ${group}`, this.name, {
          details: { group },
        });
      }
      this.memory.store(
        group,
        summarizeMasks(entry.data, this.source.nChannels, this.source.channelPositions, this.threshold)
      );
      progress.report('aggregate', index + 1, groups.length);
    });
  }

  /**
   * All memory-tier values of a group
   */
  summary(group: GroupId): FeatureMasksSummary | undefined {
    return this.memory.load(group);
  }

  memoryValue(group: GroupId, field: string): MemoryValue | undefined {
    const summary = this.memory.load(group);
    if (!summary) {
      return undefined;
    }
    const values: Readonly<Record<string, MemoryValue>> = summary;
    return field in values ? values[field] : undefined;
  }

  dropMemory(groups: readonly GroupId[]): void {
    this.memory.erase(groups);
  }

  private rowOf(field: string, item: number): Float32Array {
    if (field === FEATURES_FIELD) {
      const start = item * this.featureRowSize;
      return this.source.features.subarray(start, start + this.featureRowSize);
    }
    if (field === MASKS_FIELD) {
      const start = item * this.source.nChannels;
      return this.source.masks.subarray(start, start + this.source.nChannels);
    }
    throw new CacheItemError(`'${field}' is not a persistent field`, this.name);
  }
}
