/**
 * Store Module
 * @module store
 */

export {
  StoredDTypeSchema,
  StoredArrayHeaderSchema,
  type StoredDType,
  type StoredArray,
  type StoredArrayHeader,
  type StoredEntry,
  type PersistentHandle,
  type PersistentStore,
  type MemoryValue,
  type FieldTier,
  type FieldDescriptor,
  type HandleSource,
  type DistributionContext,
  type AggregationContext,
  type CacheItem,
} from './interfaces.js';

export {
  bytesPerElement,
  rowSizeOf,
  rowBytesOf,
  byteLengthOf,
  encode,
  decode,
  isAllZero,
  sameShape,
} from './dtype.js';

export { MemoryStore } from './memory-store.js';
export { DiskStore } from './disk-store.js';
export { InMemoryStore } from './in-memory-store.js';
export { HandlePool, withHandleScope, type HandlePoolStats } from './handle-pool.js';

export {
  TieredGroupCache,
  type TieredGroupCacheOptions,
  type PassKind,
  type PassSummary,
  type ProbeResult,
} from './tiered-cache.js';
