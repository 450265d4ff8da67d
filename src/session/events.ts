/**
 * Session Events
 * @module session/events
 *
 * Synchronous fan-out of diff records to subscribers. A failing listener is
 * logged and does not stop the others.
 */

import type { CoreLogger } from '../logging/index.js';
import type { DiffRecord } from '../partition/index.js';

/**
 * Payload delivered after every mutation, undo and redo
 */
export interface DiffEvent {
  readonly diff: DiffRecord;
  /** True when the diff was pushed onto the history stack */
  readonly recorded: boolean;
}

export type DiffListener = (event: DiffEvent) => void;

export class DiffEventBus {
  private readonly listeners = new Set<DiffListener>();

  constructor(private readonly logger?: CoreLogger) {}

  get listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * @returns A function that removes the listener
   */
  subscribe(listener: DiffListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  unsubscribe(listener: DiffListener): boolean {
    return this.listeners.delete(listener);
  }

  emit(event: DiffEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger?.error(
          { err: error, description: event.diff.description },
          'Diff listener failed'
        );
      }
    }
  }

  clear(): void {
    this.listeners.clear();
  }
}
