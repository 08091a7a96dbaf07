/**
 * Authority module - the canonical record store behind the delta endpoint
 * @module authority
 */

import { isDeepStrictEqual } from 'node:util';
import {
  COLLECTIONS,
  ConflictResolver,
  EPOCH,
  entityKey,
  isCollectionName,
  safeParsePayload,
} from '@household-sync/sdk';
import type {
  AcceptedChange,
  CollectionName,
  ConflictKind,
  PendingChange,
  Rejection,
  ServerChange,
  SyncRequest,
  SyncResponse,
  WireConflict,
  WireConflictType,
} from '@household-sync/sdk';
import type { FastifyBaseLogger } from 'fastify';

/**
 * Server-side state of one entity
 */
export interface AuthorityRecord {
  collection: CollectionName;
  entityId: string;
  version: number;
  data: Record<string, unknown>;
  isDeleted: boolean;
  updatedAt: string;
  lastModifiedBy: string;
}

export interface AuthorityConfig {
  now?: () => Date;
  logger?: FastifyBaseLogger;
}

export interface AuthorityStats {
  totalChanges: number;
  byEntity: Record<CollectionName, number>;
  timeRange: { start: string; end: string };
}

const WIRE_CONFLICT_TYPES = {
  status: 'status',
  deleteUpdate: 'delete_update',
  concurrentUpdate: 'concurrent_update',
  versionRollback: 'version_rollback',
} as const satisfies Record<ConflictKind, WireConflictType>;

type ChangeOutcome =
  | { type: 'stored'; record: AuthorityRecord }
  | { type: 'ignored' }
  | { type: 'conflict'; conflict: WireConflict }
  | { type: 'rejected'; rejection: Rejection };

/**
 * SyncAuthority - applies client batches, detects conflicts and serves
 * deltas. Write stamps are strictly increasing so a `syncTimestamp`
 * marker never hides a later write. Versions are assigned here: an update
 * lands one above both the stored and the sent version.
 */
export class SyncAuthority {
  private records = new Map<string, AuthorityRecord>();
  private resolver = new ConflictResolver();
  private now: () => Date;
  private logger?: FastifyBaseLogger;
  private lastStamp = 0;

  constructor(config: AuthorityConfig = {}) {
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger;
  }

  /**
   * Process one delta request from `actor`
   */
  apply(request: SyncRequest, actor: string): SyncResponse {
    const touched = new Set<string>();
    const conflicts: WireConflict[] = [];
    const rejected: Rejection[] = [];
    const accepted: AcceptedChange[] = [];

    for (const change of request.pendingChanges) {
      touched.add(entityKey(change.entityType, change.entityId));
      const outcome = this.applyChange(change, request.lastSyncTimestamps, actor);

      if (outcome.type === 'conflict') {
        conflicts.push(outcome.conflict);
      } else if (outcome.type === 'rejected') {
        rejected.push(outcome.rejection);
      } else if (outcome.type === 'stored') {
        accepted.push({
          entityType: outcome.record.collection,
          entityId: outcome.record.entityId,
          version: outcome.record.version,
        });
      }
    }

    const serverChanges = this.changesSince(request.lastSyncTimestamps, touched);
    const syncTimestamp = this.stamp();

    this.logger?.info(
      {
        actor,
        deviceId: request.deviceId,
        received: request.pendingChanges.length,
        stored: accepted.length,
        conflicts: conflicts.length,
        rejected: rejected.length,
        serverChanges: serverChanges.length,
      },
      'delta sync processed'
    );

    return { serverChanges, conflicts, rejected, accepted, syncTimestamp };
  }

  getRecord(collection: CollectionName, entityId: string): AuthorityRecord | null {
    return this.records.get(entityKey(collection, entityId)) ?? null;
  }

  /**
   * Seed or overwrite a record directly, bypassing conflict detection
   */
  put(record: Omit<AuthorityRecord, 'updatedAt'> & { updatedAt?: string }): AuthorityRecord {
    const stored: AuthorityRecord = { ...record, updatedAt: record.updatedAt ?? this.stamp() };
    this.records.set(entityKey(record.collection, record.entityId), stored);
    return stored;
  }

  /**
   * Change counts per collection since `since`
   */
  getStats(since: string = EPOCH): AuthorityStats {
    const start = Date.parse(since);
    const byEntity: Record<CollectionName, number> = { tasks: 0, events: 0, ledger_entries: 0 };

    for (const record of this.records.values()) {
      if (Date.parse(record.updatedAt) > start) {
        byEntity[record.collection]++;
      }
    }

    return {
      totalChanges: COLLECTIONS.reduce((sum, collection) => sum + byEntity[collection], 0),
      byEntity,
      timeRange: { start: since, end: this.now().toISOString() },
    };
  }

  private applyChange(
    change: PendingChange,
    markers: Record<string, string>,
    actor: string
  ): ChangeOutcome {
    const collection = change.entityType;
    if (!isCollectionName(collection)) {
      return reject(change, `Unknown entity type: ${collection}`);
    }

    const key = entityKey(collection, change.entityId);
    const existing = this.records.get(key);
    const isDelete = change.operation === 'delete';

    let data = change.data;
    if (!isDelete) {
      const parsed = safeParsePayload(collection, change.data);
      if (!parsed.success) {
        return reject(change, parsed.error.message);
      }
      data = { ...parsed.data };
    }

    if (!existing) {
      if (isDelete) {
        return { type: 'ignored' };
      }
      return { type: 'stored', record: this.store(collection, change, data, actor, null) };
    }

    const marker = Date.parse(markers[collection] ?? EPOCH);
    const changedSinceMarker =
      Date.parse(existing.updatedAt) > marker && existing.lastModifiedBy !== actor;

    if (changedSinceMarker) {
      const kind = this.resolver.classifyConflict(
        { collection, version: change.version, updatedAt: change.updatedAt, isDeleted: isDelete, payload: data },
        {
          collection,
          version: existing.version,
          updatedAt: existing.updatedAt,
          isDeleted: existing.isDeleted,
          payload: existing.data,
        }
      );
      return this.conflict(change, existing, WIRE_CONFLICT_TYPES[kind]);
    }

    // A resend of a change already stored, its response lost on the way back
    if (
      existing.lastModifiedBy === actor &&
      existing.isDeleted === isDelete &&
      isDeepStrictEqual(existing.data, isDelete ? existing.data : data)
    ) {
      return { type: 'stored', record: existing };
    }

    if (change.version < existing.version) {
      return this.conflict(change, existing, 'version_rollback');
    }

    return {
      type: 'stored',
      record: this.store(collection, change, isDelete ? existing.data : data, actor, existing),
    };
  }

  private store(
    collection: CollectionName,
    change: PendingChange,
    data: Record<string, unknown>,
    actor: string,
    existing: AuthorityRecord | null
  ): AuthorityRecord {
    const record: AuthorityRecord = {
      collection,
      entityId: change.entityId,
      version: existing ? Math.max(existing.version, change.version) + 1 : change.version,
      data,
      isDeleted: change.operation === 'delete',
      updatedAt: this.stamp(),
      lastModifiedBy: actor,
    };
    this.records.set(entityKey(collection, change.entityId), record);
    return record;
  }

  private conflict(
    change: PendingChange,
    existing: AuthorityRecord,
    conflictType: WireConflictType
  ): ChangeOutcome {
    this.logger?.debug(
      { entityType: change.entityType, entityId: change.entityId, conflictType },
      'conflict detected'
    );

    return {
      type: 'conflict',
      conflict: {
        entityType: change.entityType,
        entityId: change.entityId,
        clientVersion: change.version,
        serverVersion: existing.version,
        clientData: change.data,
        serverData: existing.data,
        conflictType,
        serverUpdatedAt: existing.updatedAt,
        serverDeleted: existing.isDeleted,
        serverModifiedBy: existing.lastModifiedBy,
      },
    };
  }

  /**
   * Records written after each collection's marker, oldest first. Only
   * collections named in `markers` are included.
   */
  private changesSince(markers: Record<string, string>, exclude: ReadonlySet<string>): ServerChange[] {
    const changes: Array<{ at: number; change: ServerChange }> = [];

    for (const [key, record] of this.records) {
      const marker = markers[record.collection];
      if (marker === undefined || exclude.has(key)) {
        continue;
      }

      const at = Date.parse(record.updatedAt);
      if (at <= Date.parse(marker)) {
        continue;
      }

      changes.push({
        at,
        change: {
          entityType: record.collection,
          operation: record.isDeleted ? 'delete' : 'update',
          entityId: record.entityId,
          version: record.version,
          data: record.data,
          updatedAt: record.updatedAt,
          lastModifiedBy: record.lastModifiedBy,
        },
      });
    }

    return changes.sort((a, b) => a.at - b.at).map(({ change }) => change);
  }

  private stamp(): string {
    this.lastStamp = Math.max(this.now().getTime(), this.lastStamp + 1);
    return new Date(this.lastStamp).toISOString();
  }
}

function reject(change: PendingChange, reason: string): ChangeOutcome {
  return {
    type: 'rejected',
    rejection: { entityType: change.entityType, entityId: change.entityId, reason, permanent: true },
  };
}
