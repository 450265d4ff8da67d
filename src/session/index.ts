/**
 * Session Module
 * @module session
 */

export {
  ClusteringSession,
  SESSION_OPERATIONS,
  GROUP_FIELD,
  type SessionOperation,
  type SessionOpenOptions,
} from './session.js';

export { DiffEventBus, type DiffEvent, type DiffListener } from './events.js';
export { createInMemorySource, type InMemorySourceInit } from './source.js';
export { resolveStorePath, sanitizeName } from './store-path.js';
