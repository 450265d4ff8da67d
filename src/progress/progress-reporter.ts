/**
 * Progress Reporting
 * @module progress/progress-reporter
 *
 * Synchronous progress notifications for long cache passes. A reporter
 * keeps one (value, max) counter per stage and forwards every change to an
 * optional sink.
 */

import type { CoreLogger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export type ProgressStage = 'distribute' | 'aggregate';

/**
 * Progress callback for cache passes
 */
export type ProgressCallback = (completed: number, total: number, stage: ProgressStage) => void;

export interface StageProgress {
  readonly value: number;
  readonly max: number;
}

// ============================================================================
// Progress Reporter
// ============================================================================

export class ProgressReporter {
  private readonly stages = new Map<ProgressStage, StageProgress>();

  constructor(private readonly sink?: ProgressCallback) {}

  /**
   * Start (or restart) a stage at zero
   */
  begin(stage: ProgressStage, max: number): void {
    this.stages.set(stage, { value: 0, max });
  }

  /**
   * Record the absolute progress of a stage and notify the sink
   */
  report(stage: ProgressStage, value: number, max?: number): void {
    const current = this.stages.get(stage);
    const total = max ?? current?.max ?? value;
    this.stages.set(stage, { value, max: total });
    this.sink?.(value, total, stage);
  }

  /**
   * Advance a stage by `delta` and notify the sink
   */
  increment(stage: ProgressStage, delta = 1): void {
    const current = this.stages.get(stage) ?? { value: 0, max: 0 };
    this.report(stage, current.value + delta, current.max);
  }

  get(stage: ProgressStage): StageProgress | undefined {
    return this.stages.get(stage);
  }

  isComplete(stage: ProgressStage): boolean {
    const current = this.stages.get(stage);
    return current !== undefined && current.value >= current.max;
  }
}

/**
 * Sink that logs whole-percent steps of each stage at debug level
 */
export function createLoggingProgressSink(logger: CoreLogger): ProgressCallback {
  const lastPercent = new Map<ProgressStage, number>();

  return (completed, total, stage) => {
    const percent = total > 0 ? Math.floor((100 * completed) / total) : 100;
    if (lastPercent.get(stage) === percent) {
      return;
    }
    lastPercent.set(stage, percent);
    logger.debug({ stage, completed, total, percent }, `Cache ${stage}: ${percent}%`);
  };
}
