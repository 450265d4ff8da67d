/**
 * Cache Items Module
 * @module items
 */

export {
  FeatureMasks,
  summarizeMasks,
  FEATURE_MASKS_ITEM,
  FEATURES_FIELD,
  MASKS_FIELD,
  DEFAULT_UNMASKED_THRESHOLD,
  DEFAULT_PROGRESS_BATCH_SIZE,
  type FeatureMasksSummary,
  type FeatureMasksOptions,
} from './feature-masks.js';
