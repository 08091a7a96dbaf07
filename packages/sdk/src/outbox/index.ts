/**
 * Outbox module - durable queue of local mutations awaiting acknowledgement
 * @module outbox
 */

import { nanoid } from 'nanoid';
import { map } from 'rxjs';
import type { Observable } from 'rxjs';
import type { RxCollection, RxDocument } from 'rxdb';
import { StorageCorruptionError } from '../errors.js';
import { KeyedMutex } from '../utils/mutex.js';
import type { Logger } from '../logger.js';
import { isCollectionName } from '../storage/payloads.js';
import type { CollectionName } from '../storage/payloads.js';
import { entityKey } from '../storage/schema.js';
import type {
  OutboxEntryDocument,
  OutboxOperation,
  OutboxPartition,
} from '../storage/schema.js';

/**
 * Configuration for the outbox
 */
export interface OutboxConfig {
  /**
   * Failures after which an entry moves to the failed partition
   * @default 5
   */
  maxRetries?: number;
  /**
   * Upper bound of the retry backoff, in seconds
   * @default 16
   */
  maxBackoffSeconds?: number;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

/**
 * Mutation to queue
 */
export interface EnqueueInput {
  collection: CollectionName;
  entityId: string;
  operation: OutboxOperation;
  snapshot: Record<string, unknown>;
  recordVersion: number;
  updatedAt: string;
}

export interface OutboxEntry {
  entryId: string;
  collection: CollectionName;
  entityId: string;
  operation: OutboxOperation;
  snapshot: Record<string, unknown>;
  recordVersion: number;
  updatedAt: string;
  retryCount: number;
  queuedAt: string;
  sequence: number;
  lastAttemptAt: string | null;
  lastError: string | null;
  partition: OutboxPartition;
}

export interface PendingQuery {
  collection?: CollectionName;
  /**
   * Only entries whose backoff window has elapsed at this instant
   */
  eligibleAt?: Date;
  limit?: number;
}

/**
 * Only act on entries whose record version still matches
 */
export interface VersionGuard {
  versions?: ReadonlyMap<string, number>;
}

export interface OutboxStats {
  pending: number;
  failed: number;
}

const MS_PER_ENTRY_ESTIMATE = 100;

/**
 * Operation left in the queue after a new write lands on a queued entity
 */
export function coalesceOperation(
  queued: OutboxOperation,
  incoming: OutboxOperation
): OutboxOperation {
  if (incoming === 'delete') {
    return 'delete';
  }
  if (queued === 'create') {
    return 'create';
  }
  return incoming;
}

/**
 * Outbox - queues, retries and retires local mutations
 */
export class Outbox {
  private collection: RxCollection<OutboxEntryDocument>;
  private config: Required<Omit<OutboxConfig, 'logger'>>;
  private logger?: Logger;
  private mutex = new KeyedMutex();
  private nextSequence: Promise<number> | null = null;
  private sequenceCounter = 0;

  private defaultConfig: Required<Omit<OutboxConfig, 'logger'>> = {
    maxRetries: 5,
    maxBackoffSeconds: 16,
    now: () => new Date(),
    generateId: () => nanoid(),
  };

  constructor(collection: RxCollection<OutboxEntryDocument>, config: OutboxConfig = {}) {
    this.collection = collection;
    const { logger, ...rest } = config;
    this.config = { ...this.defaultConfig, ...rest };
    this.logger = logger?.child({ module: 'outbox' });
  }

  /**
   * Queue a mutation. A pending entry for the same entity is replaced in
   * place (same id, same FIFO position) instead of appending a duplicate.
   *
   * @returns The id of the entry now carrying the mutation
   */
  async enqueue(input: EnqueueInput): Promise<string> {
    return this.withLock(input.collection, async () => {
      const existing = await this.findPendingDocument(input.collection, input.entityId);

      if (existing) {
        const operation = coalesceOperation(existing.operation, input.operation);
        await existing.incrementalPatch({
          operation,
          snapshot: input.snapshot,
          recordVersion: input.recordVersion,
          updatedAt: input.updatedAt,
        });
        this.logger?.debug(
          { entryId: existing.entryId, entityId: input.entityId, operation },
          'coalesced outbox entry'
        );
        return existing.entryId;
      }

      const entryId = this.config.generateId();
      await this.collection.insert({
        entryId,
        entityType: input.collection,
        entityId: input.entityId,
        entityKey: entityKey(input.collection, input.entityId),
        operation: input.operation,
        snapshot: input.snapshot,
        recordVersion: input.recordVersion,
        updatedAt: input.updatedAt,
        retryCount: 0,
        queuedAt: this.config.now().toISOString(),
        sequence: await this.allocateSequence(),
        lastAttemptAt: null,
        lastError: null,
        partition: 'pending',
      });

      return entryId;
    });
  }

  /**
   * Pending entries, oldest first
   */
  async pendingEntries(query: PendingQuery = {}): Promise<OutboxEntry[]> {
    const docs = await this.collection
      .find({
        selector: {
          partition: 'pending',
          ...(query.collection ? { entityType: query.collection } : {}),
        },
        sort: [{ sequence: 'asc' }],
      })
      .exec();

    let entries = docs.map((doc) => this.toEntry(doc));

    const eligibleAt = query.eligibleAt;
    if (eligibleAt) {
      entries = entries.filter((entry) => this.isEligible(entry, eligibleAt));
    }

    return query.limit === undefined ? entries : entries.slice(0, query.limit);
  }

  /**
   * Entries that exhausted their retries or were rejected, oldest first
   */
  async failedEntries(): Promise<OutboxEntry[]> {
    const docs = await this.collection
      .find({
        selector: { partition: 'failed' },
        sort: [{ sequence: 'asc' }],
      })
      .exec();

    return docs.map((doc) => this.toEntry(doc));
  }

  async getEntry(entryId: string): Promise<OutboxEntry | null> {
    const doc = await this.collection.findOne(entryId).exec();
    return doc ? this.toEntry(doc) : null;
  }

  /**
   * All entries (either partition) for one entity
   */
  async entriesFor(collection: CollectionName, entityId: string): Promise<OutboxEntry[]> {
    const docs = await this.collection
      .find({ selector: { entityKey: entityKey(collection, entityId) } })
      .exec();

    return docs.map((doc) => this.toEntry(doc));
  }

  /**
   * Remove entries after the authority confirmed them
   *
   * @returns Number of entries removed
   */
  async clearEntries(entryIds: readonly string[], guard: VersionGuard = {}): Promise<number> {
    if (entryIds.length === 0) {
      return 0;
    }

    const found = await this.collection.findByIds([...entryIds]).exec();
    const byCollection = new Map<CollectionName, string[]>();
    for (const doc of found.values()) {
      const entry = this.toEntry(doc);
      const ids = byCollection.get(entry.collection) ?? [];
      ids.push(entry.entryId);
      byCollection.set(entry.collection, ids);
    }

    let removed = 0;
    for (const [collection, ids] of byCollection) {
      removed += await this.withLock(collection, async () => {
        const current = await this.collection.findByIds(ids).exec();
        const removable = [...current.values()]
          .filter((doc) => {
            const expected = guard.versions?.get(doc.entryId);
            return expected === undefined || expected === doc.recordVersion;
          })
          .map((doc) => doc.entryId);

        if (removable.length > 0) {
          await this.collection.bulkRemove(removable);
        }
        return removable.length;
      });
    }

    return removed;
  }

  /**
   * Count a failed attempt; moves the entry to the failed partition once
   * the retry ceiling is reached.
   *
   * @returns The updated entry, or null if it no longer exists
   */
  async recordFailure(entryId: string, error: string): Promise<OutboxEntry | null> {
    return this.updateEntry(entryId, (entry) => {
      const retryCount = entry.retryCount + 1;
      const partition: OutboxPartition =
        retryCount >= this.config.maxRetries ? 'failed' : entry.partition;

      if (partition === 'failed' && entry.partition !== 'failed') {
        this.logger?.warn(
          { entryId, entityId: entry.entityId, retryCount, error },
          'outbox entry exhausted its retries'
        );
      }

      return {
        retryCount,
        partition,
        lastAttemptAt: this.config.now().toISOString(),
        lastError: error,
      };
    });
  }

  /**
   * Move an entry straight to the failed partition without spending
   * retry budget
   */
  async reject(entryId: string, reason: string): Promise<OutboxEntry | null> {
    return this.updateEntry(entryId, () => ({
      partition: 'failed',
      lastAttemptAt: this.config.now().toISOString(),
      lastError: reason,
    }));
  }

  /**
   * Move every failed entry back to pending with its counters reset.
   * A failed entry superseded by a newer pending write is dropped.
   *
   * @returns Number of entries moved back
   */
  async retryAllFailed(): Promise<number> {
    const failed = await this.failedEntries();
    let moved = 0;

    for (const entry of failed) {
      moved += await this.withLock(entry.collection, async () => {
        const doc = await this.collection.findOne(entry.entryId).exec();
        if (!doc || doc.partition !== 'failed') {
          return 0;
        }

        const newer = await this.findPendingDocument(entry.collection, entry.entityId);
        if (newer) {
          await doc.remove();
          return 0;
        }

        await doc.incrementalPatch({
          partition: 'pending',
          retryCount: 0,
          lastAttemptAt: null,
          lastError: null,
        });
        return 1;
      });
    }

    if (moved > 0) {
      this.logger?.info({ moved }, 'failed outbox entries re-queued');
    }
    return moved;
  }

  /**
   * Drop every failed entry
   */
  async clearFailed(): Promise<number> {
    const failed = await this.failedEntries();
    await this.clearEntries(failed.map((entry) => entry.entryId));
    return failed.length;
  }

  /**
   * Retry delay for an entry that failed `retryCount` times
   *
   * @returns Delay in seconds: 1, 2, 4, 8, 16, 16, ...
   */
  backoffDelay(retryCount: number): number {
    return Math.min(2 ** retryCount, this.config.maxBackoffSeconds);
  }

  /**
   * Whether the entry's backoff window has elapsed at `now`
   */
  isEligible(entry: OutboxEntry, now: Date): boolean {
    if (entry.lastAttemptAt === null) {
      return true;
    }

    const retryAt = Date.parse(entry.lastAttemptAt) + this.backoffDelay(entry.retryCount) * 1000;
    return now.getTime() >= retryAt;
  }

  async stats(): Promise<OutboxStats> {
    const [pending, failed] = await Promise.all([
      this.collection.find({ selector: { partition: 'pending' } }).exec(),
      this.collection.find({ selector: { partition: 'failed' } }).exec(),
    ]);
    return { pending: pending.length, failed: failed.length };
  }

  /**
   * Rough time to drain the pending partition
   *
   * @returns Milliseconds
   */
  async estimateSyncTime(): Promise<number> {
    const { pending } = await this.stats();
    return pending * MS_PER_ENTRY_ESTIMATE;
  }

  /**
   * Observe the size of the pending partition
   */
  observePendingCount$(): Observable<number> {
    return this.collection
      .find({ selector: { partition: 'pending' } })
      .$.pipe(map((docs) => docs.length));
  }

  private async findPendingDocument(
    collection: CollectionName,
    entityId: string
  ): Promise<RxDocument<OutboxEntryDocument> | null> {
    return this.collection
      .findOne({
        selector: {
          entityKey: entityKey(collection, entityId),
          partition: 'pending',
        },
      })
      .exec();
  }

  private async updateEntry(
    entryId: string,
    patch: (entry: OutboxEntry) => Partial<OutboxEntryDocument>
  ): Promise<OutboxEntry | null> {
    const doc = await this.collection.findOne(entryId).exec();
    if (!doc) {
      return null;
    }

    const { collection } = this.toEntry(doc);
    return this.withLock(collection, async () => {
      const current = await this.collection.findOne(entryId).exec();
      if (!current) {
        return null;
      }

      const updated = await current.incrementalPatch(patch(this.toEntry(current)));
      return this.toEntry(updated);
    });
  }

  private async allocateSequence(): Promise<number> {
    if (!this.nextSequence) {
      this.nextSequence = this.collection
        .findOne({ selector: {}, sort: [{ sequence: 'desc' }] })
        .exec()
        .then((last) => (last ? last.sequence + 1 : 0));
    }

    const base = await this.nextSequence;
    return base + this.sequenceCounter++;
  }

  private async withLock<T>(collection: CollectionName, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(collection, fn);
  }

  private toEntry(doc: RxDocument<OutboxEntryDocument>): OutboxEntry {
    const data = doc.toMutableJSON();
    if (!isCollectionName(data.entityType)) {
      throw new StorageCorruptionError(
        data.entityType,
        `Outbox entry ${data.entryId} references unknown collection ${data.entityType}`,
        data.entryId
      );
    }

    return {
      entryId: data.entryId,
      collection: data.entityType,
      entityId: data.entityId,
      operation: data.operation,
      snapshot: data.snapshot,
      recordVersion: data.recordVersion,
      updatedAt: data.updatedAt,
      retryCount: data.retryCount,
      queuedAt: data.queuedAt,
      sequence: data.sequence,
      lastAttemptAt: data.lastAttemptAt ?? null,
      lastError: data.lastError ?? null,
      partition: data.partition,
    };
  }
}
