/**
 * Progress Module
 * @module progress
 */

export {
  ProgressReporter,
  createLoggingProgressSink,
  type ProgressCallback,
  type ProgressStage,
  type StageProgress,
} from './progress-reporter.js';
