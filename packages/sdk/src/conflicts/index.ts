/**
 * Conflict store - persisted divergences awaiting or past resolution
 * @module conflicts
 */

import { nanoid } from 'nanoid';
import { map } from 'rxjs';
import type { Observable } from 'rxjs';
import type { RxCollection, RxDocument } from 'rxdb';
import { z } from 'zod';
import { NotFoundError, StorageCorruptionError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ConflictKind, RecordSnapshot } from '../resolver/index.js';
import { isCollectionName } from '../storage/payloads.js';
import type { CollectionName } from '../storage/payloads.js';
import type { ConflictDocument } from '../storage/schema.js';

export type ConflictResolutionChoice = 'keepClient' | 'keepServer' | 'merge' | 'automatic';

export interface ConflictRecord {
  conflictId: string;
  collection: CollectionName;
  entityId: string;
  clientVersion: number;
  serverVersion: number;
  clientSnapshot: RecordSnapshot;
  serverSnapshot: RecordSnapshot;
  kind: ConflictKind;
  resolution: ConflictResolutionChoice | null;
  needsManualReview: boolean;
  status: 'pending' | 'resolved';
  detectedAt: string;
  resolvedAt: string | null;
}

export interface RecordConflictInput {
  collection: CollectionName;
  entityId: string;
  clientSnapshot: RecordSnapshot;
  serverSnapshot: RecordSnapshot;
  kind: ConflictKind;
  needsManualReview?: boolean;
}

export interface ConflictStoreConfig {
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

const recordSnapshotSchema = z.object({
  payload: z.record(z.unknown()),
  isDeleted: z.boolean(),
  updatedAt: z.string(),
  version: z.number().int().nonnegative(),
  lastModifiedBy: z.string(),
});

const conflictKindSchema = z.enum(['status', 'deleteUpdate', 'concurrentUpdate', 'versionRollback']);

const resolutionSchema = z.enum(['keepClient', 'keepServer', 'merge', 'automatic']).nullable();

/**
 * ConflictStore - at most one pending conflict per entity
 */
export class ConflictStore {
  private collection: RxCollection<ConflictDocument>;
  private now: () => Date;
  private generateId: () => string;
  private logger?: Logger;

  constructor(collection: RxCollection<ConflictDocument>, config: ConflictStoreConfig = {}) {
    this.collection = collection;
    this.now = config.now ?? (() => new Date());
    this.generateId = config.generateId ?? (() => nanoid());
    this.logger = config.logger?.child({ module: 'conflicts' });
  }

  /**
   * Persist a conflict. A pending conflict for the same entity is
   * refreshed in place.
   */
  async record(input: RecordConflictInput): Promise<ConflictRecord> {
    const fields = {
      clientVersion: input.clientSnapshot.version,
      serverVersion: input.serverSnapshot.version,
      clientSnapshot: { ...input.clientSnapshot },
      serverSnapshot: { ...input.serverSnapshot },
      kind: input.kind,
      needsManualReview: input.needsManualReview ?? true,
      detectedAt: this.now().toISOString(),
    };

    const existing = await this.findPendingDocument(input.collection, input.entityId);
    if (existing) {
      const updated = await existing.incrementalPatch(fields);
      return this.toRecord(updated);
    }

    const doc = await this.collection.insert({
      conflictId: this.generateId(),
      entityType: input.collection,
      entityId: input.entityId,
      resolution: null,
      status: 'pending',
      resolvedAt: null,
      ...fields,
    });

    this.logger?.info(
      { conflictId: doc.conflictId, collection: input.collection, entityId: input.entityId, kind: input.kind },
      'conflict recorded'
    );
    return this.toRecord(doc);
  }

  /**
   * Pending conflicts, oldest first
   */
  async pending(collection?: CollectionName): Promise<ConflictRecord[]> {
    return this.findByStatus('pending', collection);
  }

  async resolved(collection?: CollectionName): Promise<ConflictRecord[]> {
    return this.findByStatus('resolved', collection);
  }

  async get(conflictId: string): Promise<ConflictRecord | null> {
    const doc = await this.collection.findOne(conflictId).exec();
    return doc ? this.toRecord(doc) : null;
  }

  async pendingFor(collection: CollectionName, entityId: string): Promise<ConflictRecord | null> {
    const doc = await this.findPendingDocument(collection, entityId);
    return doc ? this.toRecord(doc) : null;
  }

  /**
   * @throws NotFoundError when the conflict does not exist
   */
  async markResolved(
    conflictId: string,
    resolution: ConflictResolutionChoice
  ): Promise<ConflictRecord> {
    const doc = await this.collection.findOne(conflictId).exec();
    if (!doc) {
      throw new NotFoundError(`Conflict ${conflictId} does not exist`);
    }

    const updated = await doc.incrementalPatch({
      status: 'resolved',
      resolution,
      needsManualReview: false,
      resolvedAt: this.now().toISOString(),
    });

    this.logger?.info({ conflictId, resolution }, 'conflict resolved');
    return this.toRecord(updated);
  }

  async pendingCount(): Promise<number> {
    const docs = await this.collection.find({ selector: { status: 'pending' } }).exec();
    return docs.length;
  }

  observePendingCount$(): Observable<number> {
    return this.collection
      .find({ selector: { status: 'pending' } })
      .$.pipe(map((docs) => docs.length));
  }

  private async findByStatus(
    status: ConflictDocument['status'],
    collection?: CollectionName
  ): Promise<ConflictRecord[]> {
    const docs = await this.collection
      .find({ selector: { status, ...(collection ? { entityType: collection } : {}) } })
      .exec();

    return docs
      .map((doc) => this.toRecord(doc))
      .sort((a, b) => Date.parse(a.detectedAt) - Date.parse(b.detectedAt));
  }

  private async findPendingDocument(
    collection: CollectionName,
    entityId: string
  ): Promise<RxDocument<ConflictDocument> | null> {
    return this.collection
      .findOne({ selector: { entityType: collection, entityId, status: 'pending' } })
      .exec();
  }

  private toRecord(doc: RxDocument<ConflictDocument>): ConflictRecord {
    const data = doc.toMutableJSON();
    const clientSnapshot = recordSnapshotSchema.safeParse(data.clientSnapshot);
    const serverSnapshot = recordSnapshotSchema.safeParse(data.serverSnapshot);
    const kind = conflictKindSchema.safeParse(data.kind);
    const resolution = resolutionSchema.safeParse(data.resolution ?? null);

    if (
      !isCollectionName(data.entityType) ||
      !clientSnapshot.success ||
      !serverSnapshot.success ||
      !kind.success ||
      !resolution.success
    ) {
      throw new StorageCorruptionError(
        data.entityType,
        `Conflict ${data.conflictId} is unreadable`,
        data.conflictId
      );
    }

    return {
      conflictId: data.conflictId,
      collection: data.entityType,
      entityId: data.entityId,
      clientVersion: data.clientVersion,
      serverVersion: data.serverVersion,
      clientSnapshot: clientSnapshot.data,
      serverSnapshot: serverSnapshot.data,
      kind: kind.data,
      resolution: resolution.data,
      needsManualReview: data.needsManualReview,
      status: data.status,
      detectedAt: data.detectedAt,
      resolvedAt: data.resolvedAt ?? null,
    };
  }
}
