/**
 * Clustering Session
 * @module session/session
 *
 * Facade wiring one opened dataset: the partition engine, group metadata,
 * the history manager and the tiered cache with its feature/mask item.
 *
 * Every operation follows the same path: the owning aspect mutates and
 * returns a diff record, the session records it (fresh actions only),
 * updates the cache and notifies subscribers.
 */

import { defaultConfig, type AppConfig } from '../config/index.js';
import { SessionClosedError } from '../errors/index.js';
import { HistoryManager, type UndoableAspect } from '../history/index.js';
import { FeatureMasks } from '../items/index.js';
import { createLogger, withTiming, type StructuredLogger } from '../logging/index.js';
import {
  GroupMetadata,
  PartitionEngine,
  combineDiffRecords,
  isEmptyDiff,
  type DiffRecord,
  type MetadataValue,
} from '../partition/index.js';
import { createLoggingProgressSink, type ProgressCallback } from '../progress/index.js';
import {
  DiskStore,
  InMemoryStore,
  TieredGroupCache,
  type PassSummary,
  type PersistentStore,
} from '../store/index.js';
import type { GroupId, ItemId, PartitionView } from '../types/partition.js';
import type { SourceModel } from '../types/source.js';
import { DiffEventBus, type DiffListener } from './events.js';
import { resolveStorePath } from './store-path.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Named operations a session exposes to callers
 */
export const SESSION_OPERATIONS = ['merge', 'split', 'assign', 'setMetadata', 'undo', 'redo'] as const;

export type SessionOperation = (typeof SESSION_OPERATIONS)[number];

/**
 * Default curation category field
 */
export const GROUP_FIELD = 'group';

export interface SessionOpenOptions {
  readonly source: SourceModel;
  /** Persistent store; built from `config.store` when omitted */
  readonly store?: PersistentStore;
  readonly config?: AppConfig;
  readonly logger?: StructuredLogger;
  /** Progress sink; a debug-level logging sink is used when omitted */
  readonly onProgress?: ProgressCallback;
  /** Metadata field defaults */
  readonly metadataDefaults?: Readonly<Record<string, MetadataValue>>;
}

// ============================================================================
// Clustering Session
// ============================================================================

export class ClusteringSession {
  private readonly engine: PartitionEngine;
  private readonly groupMetadata: GroupMetadata;
  private readonly history: HistoryManager<DiffRecord>;
  private readonly tieredCache: TieredGroupCache;
  private readonly featureMasksItem: FeatureMasks;
  private readonly events: DiffEventBus;
  private isClosed = false;

  private constructor(
    private readonly source: SourceModel,
    store: PersistentStore,
    config: AppConfig,
    private readonly logger: StructuredLogger,
    onProgress: ProgressCallback,
    metadataDefaults: Readonly<Record<string, MetadataValue>>
  ) {
    this.engine = new PartitionEngine(source.initialAssignment, { logger });
    this.groupMetadata = new GroupMetadata({
      defaults: metadataDefaults,
      hasGroup: (group) => this.engine.hasGroup(group),
      logger,
    });
    this.history = new HistoryManager<DiffRecord>({ combine: combineDiffRecords, logger });
    this.tieredCache = new TieredGroupCache({ store, logger, onProgress });
    this.featureMasksItem = new FeatureMasks(source, {
      unmaskedThreshold: config.aggregation.unmaskedThreshold,
      progressBatchSize: config.aggregation.progressBatchSize,
      logger,
    });
    this.tieredCache.registerItem(this.featureMasksItem);
    this.events = new DiffEventBus(logger);
  }

  /**
   * Open a dataset and populate its cache
   */
  static open(options: SessionOpenOptions): ClusteringSession {
    const config = options.config ?? defaultConfig();
    const logger =
      options.logger ??
      createLogger(
        'clustering-session',
        { dataset: options.source.name },
        { level: config.logging.level, pretty: config.logging.pretty, environment: config.env }
      );
    const store = options.store ?? ClusteringSession.createStore(options.source, config);

    const session = new ClusteringSession(
      options.source,
      store,
      config,
      logger,
      options.onProgress ?? createLoggingProgressSink(logger),
      options.metadataDefaults ?? { [GROUP_FIELD]: null }
    );

    const summaries = withTiming(logger, 'cache.generate', () =>
      session.tieredCache.generate(session.engine)
    );
    session.logPasses(summaries);
    logger.sessionOpened(options.source.name, session.engine.nItems, session.engine.groupIds.length);
    return session;
  }

  private static createStore(source: SourceModel, config: AppConfig): PersistentStore {
    if (config.store.backend === 'memory') {
      return new InMemoryStore(`memory:${source.name}`);
    }
    return new DiskStore(resolveStorePath(config.store.rootPath, source.name));
  }

  // =========================================================================
  // Read API
  // =========================================================================

  get dataset(): string {
    return this.source.name;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get partition(): PartitionView {
    return this.engine;
  }

  get cache(): TieredGroupCache {
    return this.tieredCache;
  }

  get featureMasks(): FeatureMasks {
    return this.featureMasksItem;
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  metadata(field: string, group: GroupId): MetadataValue {
    return this.groupMetadata.get(field, group);
  }

  // =========================================================================
  // Operations
  // =========================================================================

  merge(groupIds: readonly GroupId[]): DiffRecord {
    this.ensureOpen('merge');
    return this.commit(this.engine, this.engine.merge(groupIds));
  }

  split(itemIds: readonly ItemId[]): DiffRecord {
    this.ensureOpen('split');
    return this.commit(this.engine, this.engine.split(itemIds));
  }

  assign(itemIds: readonly ItemId[], targetGroup?: GroupId): DiffRecord {
    this.ensureOpen('assign');
    return this.commit(this.engine, this.engine.assign(itemIds, targetGroup));
  }

  setMetadata(field: string, groupIds: readonly GroupId[], value: MetadataValue): DiffRecord {
    this.ensureOpen('setMetadata');
    return this.commit(this.groupMetadata, this.groupMetadata.set(field, groupIds, value));
  }

  /**
   * @throws EmptyHistoryError when nothing is left to undo
   */
  undo(): DiffRecord {
    this.ensureOpen('undo');
    const diff = this.history.undo();
    this.logger.historyMoved('undo', this.history.position, this.history.size);
    return this.publish(diff, false);
  }

  /**
   * @throws EmptyHistoryError when nothing is left to redo
   */
  redo(): DiffRecord {
    this.ensureOpen('redo');
    const diff = this.history.redo();
    this.groupMetadata.propagate(diff);
    this.logger.historyMoved('redo', this.history.position, this.history.size);
    return this.publish(diff, false);
  }

  // =========================================================================
  // Events
  // =========================================================================

  /**
   * @returns A function that removes the listener
   */
  subscribe(listener: DiffListener): () => void {
    this.ensureOpen('subscribe');
    return this.events.subscribe(listener);
  }

  unsubscribe(listener: DiffListener): boolean {
    return this.events.unsubscribe(listener);
  }

  /**
   * Drop listeners and history. Later operations throw SessionClosedError.
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.events.clear();
    this.history.clear();
    this.logger.sessionClosed(this.source.name);
  }

  // =========================================================================
  // Internals
  // =========================================================================

  private ensureOpen(operation: string): void {
    if (this.isClosed) {
      throw new SessionClosedError(operation, { dataset: this.source.name });
    }
  }

  private commit(source: UndoableAspect<DiffRecord>, diff: DiffRecord): DiffRecord {
    if (isEmptyDiff(diff)) {
      return diff;
    }
    if (source === this.engine) {
      this.groupMetadata.propagate(diff);
    }
    const recorded = this.history.record([{ source, record: diff }]) ?? diff;
    return this.publish(recorded, true);
  }

  private publish(diff: DiffRecord, recorded: boolean): DiffRecord {
    const summaries = this.tieredCache.update(diff, this.engine);
    this.logPasses(summaries);
    this.logger.mutationApplied({
      description: diff.description,
      history: diff.history,
      added: diff.added,
      deleted: diff.deleted,
      affectedItems: diff.affectedItems.length,
    });
    this.events.emit({ diff, recorded });
    return diff;
  }

  private logPasses(summaries: readonly PassSummary[]): void {
    for (const summary of summaries) {
      this.logger.passCompleted(summary.item, summary.kind, summary.aggregated, summary.durationMs);
    }
  }
}
