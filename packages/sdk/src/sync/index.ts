/**
 * Sync module - runs delta sync cycles against the authority
 * @module sync
 */

import type { ConflictRecord, ConflictResolutionChoice, ConflictStore } from '../conflicts/index.js';
import {
  ConnectivityLostError,
  CycleInProgressError,
  NotFoundError,
  StorageCorruptionError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import type { Logger } from '../logger.js';
import type { ConnectivityMonitor } from '../network/index.js';
import type { Outbox, OutboxEntry } from '../outbox/index.js';
import type {
  ConflictKind,
  ConflictResolver,
  FieldPick,
  RecordSnapshot,
  Resolution,
  ResolvableRecord,
} from '../resolver/index.js';
import type { EntityRecord, EntityStore } from '../storage/entity-store.js';
import { COLLECTIONS, isCollectionName } from '../storage/payloads.js';
import type { CollectionName } from '../storage/payloads.js';
import { entityKey } from '../storage/schema.js';
import type { SyncTransport } from '../transport/index.js';
import type { SyncMetadataStore } from './metadata.js';
import type {
  ServerChange,
  SyncRequest,
  SyncResponse,
  WireConflict,
  WireConflictType,
} from './protocol.js';

export type SyncPhase = 'idle' | 'gathering' | 'exchanging' | 'reconciling' | 'finalizing';

/**
 * Sync configuration
 */
export interface SyncConfig {
  collections?: readonly CollectionName[];
  /**
   * Most outbox entries sent per cycle
   * @default 100
   */
  batchSize?: number;
  /**
   * Overall bound on the exchange, in milliseconds
   * @default 30000
   */
  timeout?: number;
  deviceId?: string;
  /**
   * Clock used for backoff eligibility
   */
  now?: () => Date;
  logger?: Logger;
}

export interface SyncDependencies {
  store: EntityStore;
  outbox: Outbox;
  resolver: ConflictResolver;
  conflicts: ConflictStore;
  metadata: SyncMetadataStore;
  transport: SyncTransport;
  connectivity?: Pick<ConnectivityMonitor, 'isOnline'>;
}

/**
 * Outcome of one cycle
 */
export interface SyncResult {
  status: 'completed' | 'skipped' | 'interrupted' | 'failed';
  sent: number;
  acknowledged: number;
  applied: number;
  autoResolved: number;
  conflicts: number;
  rejected: number;
  failed: number;
  syncTimestamp: string | null;
  error: string | null;
}

/**
 * Sync state
 */
export interface SyncState {
  phase: SyncPhase;
  isSyncing: boolean;
  lastSyncAt: string | null;
  lastResult: SyncResult | null;
  error: string | null;
  halted: CollectionName[];
}

export interface PendingConflictSummary {
  resolved: number;
  needsManual: number;
}

const CONFLICT_KINDS = {
  status: 'status',
  delete_update: 'deleteUpdate',
  concurrent_update: 'concurrentUpdate',
  version_rollback: 'versionRollback',
} as const satisfies Record<WireConflictType, ConflictKind>;

const UNKNOWN_ACTOR = 'server';

/**
 * Times one entity is re-read when local writes keep landing while it is
 * being reconciled
 */
const MAX_RECONCILE_ATTEMPTS = 3;

/**
 * What reconciliation did with an entity; sent entries with no outcome
 * are acknowledged
 */
type EntityOutcome = 'held' | 'discarded' | 'failed';

/**
 * A local write landed between the read and the guarded write
 */
type SettleOutcome = EntityOutcome | 'stale';

interface CycleContext {
  batch: OutboxEntry[];
  sentByKey: Map<string, OutboxEntry>;
  outcomes: Map<string, EntityOutcome>;
  result: SyncResult;
}

/**
 * SyncCoordinator - one cycle at a time through
 * gathering, exchanging, reconciling and finalizing
 */
export class SyncCoordinator {
  private deps: SyncDependencies;
  private config: Required<Omit<SyncConfig, 'deviceId' | 'logger'>> & { deviceId?: string };
  private logger?: Logger;
  private inFlight: Promise<SyncResult> | null = null;
  private halted = new Set<CollectionName>();

  private state: SyncState = {
    phase: 'idle',
    isSyncing: false,
    lastSyncAt: null,
    lastResult: null,
    error: null,
    halted: [],
  };

  private stateChangeCallbacks: Array<(state: SyncState) => void> = [];

  private defaultConfig: Required<Omit<SyncConfig, 'deviceId' | 'logger'>> = {
    collections: COLLECTIONS,
    batchSize: 100,
    timeout: 30000,
    now: () => new Date(),
  };

  constructor(deps: SyncDependencies, config: SyncConfig = {}) {
    const { logger, ...rest } = config;
    this.deps = deps;
    this.config = { ...this.defaultConfig, ...rest };
    this.logger = logger?.child({ module: 'sync' });
  }

  /**
   * Run one cycle. A call while a cycle is running joins it.
   */
  sync(): Promise<SyncResult> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const cycle = this.performSync().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  get isSyncing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Apply a reviewer's decision to a pending conflict
   *
   * @throws CycleInProgressError while a cycle is running
   * @throws NotFoundError for an unknown conflict id
   * @throws ValidationError when a merge still has unpicked fields
   */
  async resolveConflict(
    conflictId: string,
    choice: Exclude<ConflictResolutionChoice, 'automatic'>,
    picks: Readonly<Record<string, FieldPick>> = {}
  ): Promise<ConflictRecord> {
    if (this.inFlight) {
      throw new CycleInProgressError();
    }

    const conflict = await this.deps.conflicts.get(conflictId);
    if (!conflict) {
      throw new NotFoundError(`Conflict ${conflictId} does not exist`);
    }
    if (conflict.status === 'resolved') {
      return conflict;
    }

    const { collection, entityId, clientSnapshot, serverSnapshot } = conflict;

    if (choice === 'keepServer') {
      await this.adoptServer(collection, entityId, serverSnapshot, {
        allowRollback: conflict.kind === 'versionRollback',
      });
    } else if (choice === 'keepClient') {
      const local = await this.deps.store.get(collection, entityId);
      await this.deps.store.rebase(collection, entityId, local?.payload ?? clientSnapshot.payload, {
        isDeleted: local?.isDeleted ?? clientSnapshot.isDeleted,
        baseVersion: Math.max(clientSnapshot.version, serverSnapshot.version),
      });
    } else {
      const resolution = this.deps.resolver.merge(conflict, picks);
      if (resolution.needsManualReview) {
        throw new ValidationError(
          resolution.explanation,
          resolution.unresolvedFields.map((field) => ({ path: field, message: 'pick client or server' }))
        );
      }
      await this.deps.store.rebase(collection, entityId, resolution.resolvedPayload, {
        isDeleted: false,
        baseVersion: resolution.resolvedVersion,
      });
    }

    this.logger?.info({ conflictId, collection, entityId, choice }, 'conflict resolved manually');
    return this.deps.conflicts.markResolved(conflictId, choice);
  }

  /**
   * Retry automatic resolution for every pending conflict
   */
  async resolvePendingConflicts(): Promise<PendingConflictSummary> {
    if (this.inFlight) {
      throw new CycleInProgressError();
    }

    const summary: PendingConflictSummary = { resolved: 0, needsManual: 0 };

    for (const conflict of await this.deps.conflicts.pending()) {
      const resolution = this.deps.resolver.resolve(
        toResolvable(conflict.collection, conflict.clientSnapshot),
        toResolvable(conflict.collection, conflict.serverSnapshot)
      );

      if (resolution.needsManualReview) {
        summary.needsManual++;
        continue;
      }

      if (resolution.winner === 'server') {
        await this.adoptServer(conflict.collection, conflict.entityId, conflict.serverSnapshot, {
          allowRollback: false,
        });
      } else {
        await this.deps.store.rebase(conflict.collection, conflict.entityId, resolution.resolvedPayload, {
          isDeleted: resolution.isDeleted,
          baseVersion: resolution.resolvedVersion,
        });
      }

      await this.deps.conflicts.markResolved(conflict.conflictId, 'automatic');
      summary.resolved++;
    }

    return summary;
  }

  /**
   * Collections whose sync stopped on unreadable data
   */
  haltedCollections(): CollectionName[] {
    return [...this.halted];
  }

  resumeCollection(collection: CollectionName): void {
    if (this.halted.delete(collection)) {
      this.logger?.info({ collection }, 'collection sync resumed');
      this.updateState({ halted: this.haltedCollections() });
    }
  }

  /**
   * Subscribe to sync state changes
   */
  onStateChange(callback: (state: SyncState) => void): () => void {
    this.stateChangeCallbacks.push(callback);

    return () => {
      const index = this.stateChangeCallbacks.indexOf(callback);
      if (index > -1) {
        this.stateChangeCallbacks.splice(index, 1);
      }
    };
  }

  getState(): SyncState {
    return { ...this.state, halted: [...this.state.halted] };
  }

  private async performSync(): Promise<SyncResult> {
    const result = emptyResult();

    if (this.deps.connectivity && !this.deps.connectivity.isOnline) {
      return this.finish({ ...result, status: 'skipped' });
    }

    this.updateState({ phase: 'gathering', isSyncing: true, error: null });

    try {
      const batch = await this.gather();
      const collections = this.activeCollections();
      if (collections.length === 0) {
        return this.finish({ ...result, status: 'skipped', error: 'every collection is halted' });
      }

      this.updateState({ phase: 'exchanging' });
      const request: SyncRequest = {
        lastSyncTimestamps: await this.deps.metadata.lastSyncTimestamps(collections),
        deviceId: this.config.deviceId,
        pendingChanges: batch.map((entry) => ({
          entityType: entry.collection,
          operation: entry.operation,
          entityId: entry.entityId,
          version: entry.recordVersion,
          data: entry.snapshot,
          updatedAt: entry.updatedAt,
        })),
      };
      result.sent = batch.length;

      let response: SyncResponse;
      try {
        response = await this.exchange(request);
      } catch (error) {
        if (error instanceof ConnectivityLostError) {
          this.logger?.info({ reason: error.message }, 'sync interrupted');
          return this.finish({ ...result, status: 'interrupted', error: error.message });
        }

        const message = errorMessage(error);
        this.logger?.warn({ error: message, sent: batch.length }, 'sync exchange failed');
        for (const entry of batch) {
          await this.deps.outbox.recordFailure(entry.entryId, message);
        }
        await this.deps.metadata.recordFailure(collections, message);
        return this.finish({ ...result, status: 'failed', failed: batch.length, error: message });
      }

      const context: CycleContext = {
        batch,
        sentByKey: new Map(batch.map((entry) => [entityKey(entry.collection, entry.entityId), entry])),
        outcomes: new Map(),
        result,
      };

      this.updateState({ phase: 'reconciling' });
      await this.reconcile(response, context);

      this.updateState({ phase: 'finalizing' });
      await this.finalize(response, context);

      result.syncTimestamp = response.syncTimestamp;
      this.logger?.info(
        {
          sent: result.sent,
          acknowledged: result.acknowledged,
          applied: result.applied,
          conflicts: result.conflicts,
          rejected: result.rejected,
        },
        'sync cycle completed'
      );
      return this.finish({ ...result, status: 'completed' }, response.syncTimestamp);
    } catch (error) {
      const message = errorMessage(error);
      this.logger?.error({ error: message }, 'sync cycle failed');
      return this.finish({ ...result, status: 'failed', error: message });
    }
  }

  /**
   * Pending entries past their backoff, oldest first, skipping entities
   * held by a pending conflict
   */
  private async gather(): Promise<OutboxEntry[]> {
    const now = this.config.now();
    const entries: OutboxEntry[] = [];

    for (const collection of this.activeCollections()) {
      try {
        await this.requeueOrphans(collection);

        const held = new Set(
          (await this.deps.conflicts.pending(collection)).map((conflict) => conflict.entityId)
        );
        const pending = await this.deps.outbox.pendingEntries({ collection, eligibleAt: now });
        entries.push(...pending.filter((entry) => !held.has(entry.entityId)));
      } catch (error) {
        if (error instanceof StorageCorruptionError) {
          this.halt(collection, error);
          continue;
        }
        throw error;
      }
    }

    return entries.sort((a, b) => a.sequence - b.sequence).slice(0, this.config.batchSize);
  }

  /**
   * Queue dirty records that lost their outbox entry
   */
  private async requeueOrphans(collection: CollectionName): Promise<void> {
    const dirty = await this.deps.store.dirtyRecords(collection);
    if (dirty.length === 0) {
      return;
    }

    const queued = new Set(
      [
        ...(await this.deps.outbox.pendingEntries({ collection })),
        ...(await this.deps.outbox.failedEntries()),
      ]
        .filter((entry) => entry.collection === collection)
        .map((entry) => entry.entityId)
    );

    for (const record of dirty) {
      if (queued.has(record.id)) {
        continue;
      }

      await this.deps.outbox.enqueue({
        collection,
        entityId: record.id,
        operation: record.isDeleted ? 'delete' : 'update',
        snapshot: { ...record.payload },
        recordVersion: record.version,
        updatedAt: record.updatedAt,
      });
      this.logger?.warn({ collection, id: record.id }, 're-queued dirty record without outbox entry');
    }
  }

  private async exchange(request: SyncRequest): Promise<SyncResponse> {
    const controller = new AbortController();
    const timeout = this.config.timeout;
    const timer = setTimeout(() => controller.abort(), timeout);

    const timedOut = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new ConnectivityLostError(`Sync cycle timed out after ${timeout}ms`)),
        { once: true }
      );
    });

    try {
      return await Promise.race([
        this.deps.transport.exchange(request, { signal: controller.signal }),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async reconcile(response: SyncResponse, context: CycleContext): Promise<void> {
    const conflicted = new Set<string>();

    for (const conflict of response.conflicts) {
      const collection = this.acceptCollection(conflict.entityType);
      const key = entityKey(conflict.entityType, conflict.entityId);
      conflicted.add(key);
      if (!collection) {
        context.outcomes.set(key, 'held');
        continue;
      }

      await this.isolate(collection, conflict.entityId, context, () =>
        this.reconcileConflict(collection, conflict, response.syncTimestamp, context)
      );
    }

    for (const change of response.serverChanges) {
      const collection = this.acceptCollection(change.entityType);
      if (!collection || conflicted.has(entityKey(collection, change.entityId))) {
        continue;
      }

      await this.isolate(collection, change.entityId, context, () =>
        this.reconcileChange(collection, change, context)
      );
    }
  }

  /**
   * Run one entity's reconciliation; its failure is recorded against the
   * entity's entry and does not stop the cycle
   */
  private async isolate(
    collection: CollectionName,
    entityId: string,
    context: CycleContext,
    fn: () => Promise<EntityOutcome | null>
  ): Promise<void> {
    const key = entityKey(collection, entityId);

    try {
      const outcome = await fn();
      if (outcome) {
        context.outcomes.set(key, outcome);
      }
    } catch (error) {
      context.outcomes.set(key, 'failed');

      if (error instanceof StorageCorruptionError) {
        this.halt(collection, error);
        return;
      }

      const message = errorMessage(error);
      this.logger?.error({ collection, entityId, error: message }, 'reconciliation failed');
      const sent = context.sentByKey.get(key);
      if (sent) {
        await this.deps.outbox.recordFailure(sent.entryId, message);
        context.result.failed++;
      }
    }
  }

  private async reconcileConflict(
    collection: CollectionName,
    conflict: WireConflict,
    syncTimestamp: string,
    context: CycleContext
  ): Promise<EntityOutcome> {
    const server: RecordSnapshot = {
      payload: conflict.serverData,
      isDeleted: conflict.serverDeleted ?? false,
      updatedAt: conflict.serverUpdatedAt ?? syncTimestamp,
      version: conflict.serverVersion,
      lastModifiedBy: conflict.serverModifiedBy ?? UNKNOWN_ACTOR,
    };

    for (let attempt = 0; attempt < MAX_RECONCILE_ATTEMPTS; attempt++) {
      const local = await this.deps.store.get(collection, conflict.entityId);
      if (!local) {
        const adopted = await this.adoptServer(collection, conflict.entityId, server, {
          allowRollback: false,
          expectedVersion: null,
        });
        if (!adopted) {
          continue;
        }
        context.result.applied++;
        return 'discarded';
      }

      const kind = CONFLICT_KINDS[conflict.conflictType];
      const outcome = await this.settle(collection, local, server, kind, context);
      if (outcome !== 'stale') {
        return outcome;
      }
    }

    return this.deferBusyEntity(collection, conflict.entityId);
  }

  private async reconcileChange(
    collection: CollectionName,
    change: ServerChange,
    context: CycleContext
  ): Promise<EntityOutcome | null> {
    const server: RecordSnapshot = {
      payload: change.data,
      isDeleted: change.operation === 'delete',
      updatedAt: change.updatedAt,
      version: change.version,
      lastModifiedBy: change.lastModifiedBy ?? UNKNOWN_ACTOR,
    };

    for (let attempt = 0; attempt < MAX_RECONCILE_ATTEMPTS; attempt++) {
      const local = await this.deps.store.get(collection, change.entityId);

      if (local && (local.isDirty || (await this.deps.conflicts.pendingFor(collection, local.id)))) {
        const kind = this.deps.resolver.classifyConflict(
          toResolvable(collection, snapshotOf(local)),
          toResolvable(collection, server)
        );
        const outcome = await this.settle(collection, local, server, kind, context);
        if (outcome !== 'stale') {
          return outcome;
        }
        continue;
      }

      if (local && server.version < local.version) {
        await this.deps.conflicts.record({
          collection,
          entityId: local.id,
          clientSnapshot: snapshotOf(local),
          serverSnapshot: server,
          kind: 'versionRollback',
        });
        context.result.conflicts++;
        return null;
      }

      const applied = await this.deps.store.applyRemoteIfCurrent(
        collection,
        change.entityId,
        server.payload,
        server.version,
        local?.version ?? null,
        {
          isDeleted: server.isDeleted,
          updatedAt: server.updatedAt,
          lastModifiedBy: server.lastModifiedBy,
        }
      );
      if (applied.status === 'stale') {
        this.logger?.debug(
          { collection, entityId: change.entityId },
          'local write landed, reconciling again'
        );
        continue;
      }
      if (applied.status !== 'skipped') {
        context.result.applied++;
      }
      return null;
    }

    return this.deferBusyEntity(collection, change.entityId);
  }

  /**
   * Leave an entity that kept changing for the next cycle
   */
  private deferBusyEntity(collection: CollectionName, entityId: string): EntityOutcome {
    this.logger?.warn({ collection, entityId }, 'entity kept changing during reconciliation, deferred');
    return 'held';
  }

  /**
   * Decide between local and authority state for one entity. The winning
   * state is only written while the record is still at `local.version`.
   */
  private async settle(
    collection: CollectionName,
    local: EntityRecord,
    server: RecordSnapshot,
    kind: ConflictKind,
    context: CycleContext
  ): Promise<SettleOutcome> {
    const client = snapshotOf(local);

    // An open review keeps the entity out of automatic resolution.
    if (await this.deps.conflicts.pendingFor(collection, local.id)) {
      await this.deps.conflicts.record({
        collection,
        entityId: local.id,
        clientSnapshot: client,
        serverSnapshot: server,
        kind,
      });
      return 'held';
    }

    const resolution: Resolution = this.deps.resolver.resolve(
      toResolvable(collection, client),
      toResolvable(collection, server)
    );

    if (resolution.needsManualReview) {
      const recorded = await this.deps.conflicts.record({
        collection,
        entityId: local.id,
        clientSnapshot: client,
        serverSnapshot: server,
        kind,
        needsManualReview: true,
      });
      context.result.conflicts++;
      this.logger?.info(
        { collection, entityId: local.id, kind, conflictId: recorded.conflictId },
        'conflict needs manual review'
      );
      return 'held';
    }

    let outcome: EntityOutcome;
    if (resolution.winner === 'server') {
      // The local version follows the authority's, even when it was ahead.
      const adopted = await this.adoptServer(
        collection,
        local.id,
        { ...server, payload: resolution.resolvedPayload },
        { allowRollback: true, expectedVersion: local.version }
      );
      if (!adopted) {
        return 'stale';
      }
      outcome = 'discarded';
    } else {
      const rebased = await this.deps.store.rebaseIfCurrent(
        collection,
        local.id,
        resolution.resolvedPayload,
        {
          isDeleted: resolution.isDeleted,
          baseVersion: resolution.resolvedVersion,
          expectedVersion: local.version,
        }
      );
      if (rebased.status === 'stale') {
        return 'stale';
      }
      outcome = 'held';
    }

    if (resolution.strategy !== 'identical') {
      const recorded = await this.deps.conflicts.record({
        collection,
        entityId: local.id,
        clientSnapshot: client,
        serverSnapshot: server,
        kind,
        needsManualReview: false,
      });
      await this.deps.conflicts.markResolved(recorded.conflictId, 'automatic');
      context.result.autoResolved++;
    }

    return outcome;
  }

  private async finalize(response: SyncResponse, context: CycleContext): Promise<void> {
    const rejections = new Map(
      response.rejected.map((rejection) => [entityKey(rejection.entityType, rejection.entityId), rejection])
    );

    const assigned = new Map(
      (response.accepted ?? []).map((change) => [
        entityKey(change.entityType, change.entityId),
        change.version,
      ])
    );
    const acknowledged = new Map<CollectionName, OutboxEntry[]>();

    for (const entry of context.batch) {
      const key = entityKey(entry.collection, entry.entityId);
      if (this.halted.has(entry.collection) || context.outcomes.has(key)) {
        continue;
      }

      const rejection = rejections.get(key);
      if (rejection) {
        context.result.rejected++;
        if (rejection.permanent) {
          this.logger?.warn({ entryId: entry.entryId, reason: rejection.reason }, 'change rejected permanently');
          await this.deps.outbox.reject(entry.entryId, rejection.reason);
        } else {
          await this.deps.outbox.recordFailure(entry.entryId, rejection.reason);
        }
        continue;
      }

      const entries = acknowledged.get(entry.collection) ?? [];
      entries.push(entry);
      acknowledged.set(entry.collection, entries);
    }

    for (const [collection, entries] of acknowledged) {
      await this.deps.outbox.clearEntries(
        entries.map((entry) => entry.entryId),
        { versions: new Map(entries.map((entry) => [entry.entryId, entry.recordVersion])) }
      );
      const serverVersions = new Map<string, number>();
      for (const entry of entries) {
        const version = assigned.get(entityKey(collection, entry.entityId));
        if (version !== undefined) {
          serverVersions.set(entry.entityId, version);
        }
      }

      await this.deps.store.markClean(
        collection,
        entries.map((entry) => entry.entityId),
        {
          versions: new Map(entries.map((entry) => [entry.entityId, entry.recordVersion])),
          serverVersions,
        }
      );
      context.result.acknowledged += entries.length;
    }

    await this.deps.metadata.recordSuccess(this.activeCollections(), response.syncTimestamp);
  }

  /**
   * Take the authority's state and drop the pending local change. With
   * `expectedVersion`, nothing happens unless the record is still at that
   * version (null: still absent).
   *
   * @returns false when a local write got there first
   */
  private async adoptServer(
    collection: CollectionName,
    entityId: string,
    server: RecordSnapshot,
    options: { allowRollback: boolean; expectedVersion?: number | null }
  ): Promise<boolean> {
    const remote = {
      isDeleted: server.isDeleted,
      updatedAt: server.updatedAt,
      lastModifiedBy: server.lastModifiedBy,
      allowRollback: options.allowRollback,
    };
    const expectedVersion = options.expectedVersion;

    if (expectedVersion === undefined) {
      await this.deps.store.applyRemote(collection, entityId, server.payload, server.version, remote);
    } else {
      const result = await this.deps.store.applyRemoteIfCurrent(
        collection,
        entityId,
        server.payload,
        server.version,
        expectedVersion,
        remote
      );
      if (result.status === 'stale') {
        return false;
      }
    }

    const pending = (await this.deps.outbox.entriesFor(collection, entityId)).filter(
      (entry) =>
        entry.partition === 'pending' &&
        (expectedVersion === undefined || expectedVersion === null || entry.recordVersion <= expectedVersion)
    );
    await this.deps.outbox.clearEntries(pending.map((entry) => entry.entryId));
    return true;
  }

  private acceptCollection(entityType: string): CollectionName | null {
    if (!isCollectionName(entityType) || !this.activeCollections().includes(entityType)) {
      return null;
    }
    return entityType;
  }

  private activeCollections(): CollectionName[] {
    return this.config.collections.filter((collection) => !this.halted.has(collection));
  }

  private halt(collection: CollectionName, error: StorageCorruptionError): void {
    this.halted.add(collection);
    this.logger?.error(
      { collection, documentId: error.documentId, error: error.message },
      'storage corruption, collection sync halted'
    );
    this.updateState({ halted: this.haltedCollections(), error: error.message });
  }

  private finish(result: SyncResult, syncTimestamp?: string): SyncResult {
    this.updateState({
      phase: 'idle',
      isSyncing: false,
      lastResult: result,
      error: result.error ?? this.state.error,
      ...(syncTimestamp ? { lastSyncAt: syncTimestamp } : {}),
    });
    return result;
  }

  private updateState(updates: Partial<SyncState>): void {
    this.state = {
      ...this.state,
      ...updates,
    };

    for (const callback of this.stateChangeCallbacks) {
      callback(this.getState());
    }
  }
}

function emptyResult(): SyncResult {
  return {
    status: 'completed',
    sent: 0,
    acknowledged: 0,
    applied: 0,
    autoResolved: 0,
    conflicts: 0,
    rejected: 0,
    failed: 0,
    syncTimestamp: null,
    error: null,
  };
}

function snapshotOf(record: EntityRecord): RecordSnapshot {
  return {
    payload: { ...record.payload },
    isDeleted: record.isDeleted,
    updatedAt: record.updatedAt,
    version: record.version,
    lastModifiedBy: record.lastModifiedBy,
  };
}

function toResolvable(collection: CollectionName, snapshot: RecordSnapshot): ResolvableRecord {
  return {
    collection,
    version: snapshot.version,
    updatedAt: snapshot.updatedAt,
    isDeleted: snapshot.isDeleted,
    payload: snapshot.payload,
  };
}

export { EPOCH, SyncMetadataStore } from './metadata.js';
export type { SyncMetadata } from './metadata.js';
export { SyncScheduler } from './scheduler.js';
export type { SchedulerConfig } from './scheduler.js';
export * from './protocol.js';
