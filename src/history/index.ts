/**
 * History Module
 * @module history
 */

export {
  HistoryManager,
  type UndoableAspect,
  type ActionResult,
  type CombineFunction,
  type HistoryEntry,
  type HistoryManagerOptions,
} from './history-manager.js';
