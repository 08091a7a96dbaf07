/**
 * Entity store - versioned local records with dirty and tombstone flags
 * @module storage/entity-store
 */

import { isDeepStrictEqual } from 'node:util';
import { nanoid } from 'nanoid';
import type { RxCollection, RxDocument } from 'rxdb';
import { NotFoundError, StorageCorruptionError, ValidationError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Outbox } from '../outbox/index.js';
import { KeyedMutex } from '../utils/mutex.js';
import type { HouseholdDatabase } from './init.js';
import { parsePayload, safeParsePayload } from './payloads.js';
import type { CollectionName, PayloadByCollection, PayloadPatch } from './payloads.js';
import { entityKey } from './schema.js';
import type { StoredRecordDocument } from './schema.js';

/**
 * A record as seen by callers, payload typed by its collection
 */
export interface EntityRecord<C extends CollectionName = CollectionName> {
  id: string;
  collection: C;
  version: number;
  updatedAt: string;
  isDirty: boolean;
  isDeleted: boolean;
  lastModifiedBy: string;
  payload: PayloadByCollection[C];
}

export interface EntityStoreConfig {
  /**
   * Written to `lastModifiedBy` on local writes
   */
  actorId: string;
  now?: () => Date;
  generateId?: () => string;
  logger?: Logger;
}

export type SortField = keyof EntityRecord | `payload.${string}`;

export interface QueryOptions {
  limit?: number;
  offset?: number;
  sort?: { field: SortField; direction?: 'asc' | 'desc' };
  includeDeleted?: boolean;
}

export interface ApplyRemoteOptions {
  isDeleted?: boolean;
  updatedAt?: string;
  lastModifiedBy?: string;
  /**
   * Take `serverVersion` as-is even when it is lower than the local one
   */
  allowRollback?: boolean;
}

export interface RebaseOptions {
  isDeleted: boolean;
  baseVersion: number;
}

/**
 * Outcome of a guarded remote write. `stale` means the local record moved
 * away from the expected version and nothing was written.
 */
export type RemoteApplyResult<C extends CollectionName = CollectionName> =
  | { status: 'applied'; record: EntityRecord<C> }
  | { status: 'unchanged'; record: EntityRecord<C> }
  | { status: 'skipped' }
  | { status: 'stale'; current: EntityRecord<C> | null };

export type RebaseResult<C extends CollectionName = CollectionName> =
  | { status: 'rebased'; record: EntityRecord<C> }
  | { status: 'stale'; current: EntityRecord<C> | null };

export interface CountOptions {
  dirty?: boolean;
  includeDeleted?: boolean;
}

const REMOTE_ACTOR = 'server';

/**
 * EntityStore - every write for a collection is serialized and queues
 * its outbox entry before the lock is released
 */
export class EntityStore {
  private db: HouseholdDatabase;
  private outbox: Pick<Outbox, 'enqueue'>;
  private actorId: string;
  private now: () => Date;
  private generateId: () => string;
  private logger?: Logger;
  private mutex = new KeyedMutex();

  constructor(db: HouseholdDatabase, outbox: Pick<Outbox, 'enqueue'>, config: EntityStoreConfig) {
    this.db = db;
    this.outbox = outbox;
    this.actorId = config.actorId;
    this.now = config.now ?? (() => new Date());
    this.generateId = config.generateId ?? (() => nanoid());
    this.logger = config.logger?.child({ module: 'entity-store' });
  }

  async get<C extends CollectionName>(collection: C, id: string): Promise<EntityRecord<C> | null> {
    const doc = await this.records(collection).findOne(id).exec();
    return doc ? this.toRecord(collection, doc) : null;
  }

  /**
   * Create a record or merge `patch` into the existing payload. Fields set
   * to undefined are removed.
   *
   * @throws ValidationError for an invalid payload, a tombstone or a retired id
   */
  async put<C extends CollectionName>(
    collection: C,
    id: string,
    patch: PayloadPatch<C>
  ): Promise<EntityRecord<C>> {
    return this.withLock(collection, async () => {
      await this.assertWritable(collection, id);

      const existing = await this.get(collection, id);
      if (existing?.isDeleted) {
        throw new ValidationError(`${collection}/${id} is deleted; recreate it under a new id`);
      }

      const payload = parsePayload(
        collection,
        withoutUndefined({ ...(existing?.payload ?? {}), ...patch })
      );

      const record: EntityRecord<C> = {
        id,
        collection,
        version: (existing?.version ?? 0) + 1,
        updatedAt: this.now().toISOString(),
        isDirty: true,
        isDeleted: false,
        lastModifiedBy: this.actorId,
        payload,
      };

      await this.commit(record, existing, existing ? 'update' : 'create');
      return record;
    });
  }

  /**
   * Tombstone a record. Deleting a tombstone again returns it unchanged.
   *
   * @throws NotFoundError when the id is unknown
   */
  async delete<C extends CollectionName>(collection: C, id: string): Promise<EntityRecord<C>> {
    return this.withLock(collection, async () => {
      const existing = await this.get(collection, id);
      if (!existing) {
        throw new NotFoundError(`${collection}/${id} does not exist`);
      }
      if (existing.isDeleted) {
        return existing;
      }

      const record: EntityRecord<C> = {
        ...existing,
        version: existing.version + 1,
        updatedAt: this.now().toISOString(),
        isDirty: true,
        isDeleted: true,
        lastModifiedBy: this.actorId,
      };

      await this.commit(record, existing, 'delete');
      return record;
    });
  }

  async query<C extends CollectionName>(
    collection: C,
    predicate?: (record: EntityRecord<C>) => boolean,
    options: QueryOptions = {}
  ): Promise<EntityRecord<C>[]> {
    const docs = await this.records(collection).find().exec();

    let records = docs
      .map((doc) => this.toRecord(collection, doc))
      .filter((record) => options.includeDeleted || !record.isDeleted);

    if (predicate) {
      records = records.filter(predicate);
    }

    const sort = options.sort;
    if (sort) {
      const sign = sort.direction === 'desc' ? -1 : 1;
      records.sort((a, b) => sign * compareValues(sortValue(a, sort.field), sortValue(b, sort.field)));
    }

    const offset = options.offset ?? 0;
    return records.slice(offset, options.limit === undefined ? undefined : offset + options.limit);
  }

  /**
   * Records with local changes not yet acknowledged, oldest first
   */
  async dirtyRecords<C extends CollectionName>(collection: C): Promise<EntityRecord<C>[]> {
    const docs = await this.records(collection).find({ selector: { isDirty: true } }).exec();

    return docs
      .map((doc) => this.toRecord(collection, doc))
      .sort((a, b) => Date.parse(a.updatedAt) - Date.parse(b.updatedAt));
  }

  /**
   * Write authority state. Never queues anything.
   *
   * @returns The stored record, or null when the id is retired or there is
   * nothing local to tombstone
   */
  async applyRemote<C extends CollectionName>(
    collection: C,
    id: string,
    payload: unknown,
    serverVersion: number,
    options: ApplyRemoteOptions = {}
  ): Promise<EntityRecord<C> | null> {
    const result = await this.withLock(collection, async () => {
      const existing = await this.get(collection, id);
      return this.writeRemote(collection, id, existing, payload, serverVersion, options);
    });
    return result.status === 'applied' || result.status === 'unchanged' ? result.record : null;
  }

  /**
   * applyRemote for a decision taken on an earlier read: writes only while
   * the local record is still at `expectedVersion` (null: still absent)
   */
  async applyRemoteIfCurrent<C extends CollectionName>(
    collection: C,
    id: string,
    payload: unknown,
    serverVersion: number,
    expectedVersion: number | null,
    options: ApplyRemoteOptions = {}
  ): Promise<RemoteApplyResult<C>> {
    return this.withLock<RemoteApplyResult<C>>(collection, async () => {
      const existing = await this.get(collection, id);
      if ((existing?.version ?? null) !== expectedVersion) {
        return { status: 'stale', current: existing };
      }
      return this.writeRemote(collection, id, existing, payload, serverVersion, options);
    });
  }

  /**
   * Keep local (client or merged) state after a conflict: written above
   * both known versions and queued so the next cycle pushes it
   */
  async rebase<C extends CollectionName>(
    collection: C,
    id: string,
    payload: unknown,
    options: RebaseOptions
  ): Promise<EntityRecord<C>> {
    return this.withLock(collection, async () => {
      await this.assertWritable(collection, id);
      const existing = await this.get(collection, id);
      return this.writeRebase(collection, id, existing, payload, options);
    });
  }

  /**
   * rebase for a decision taken on an earlier read: writes only while the
   * local record is still at `expectedVersion`
   */
  async rebaseIfCurrent<C extends CollectionName>(
    collection: C,
    id: string,
    payload: unknown,
    options: RebaseOptions & { expectedVersion: number }
  ): Promise<RebaseResult<C>> {
    return this.withLock<RebaseResult<C>>(collection, async () => {
      await this.assertWritable(collection, id);
      const existing = await this.get(collection, id);
      if (existing?.version !== options.expectedVersion) {
        return { status: 'stale', current: existing };
      }
      const record = await this.writeRebase(collection, id, existing, payload, options);
      return { status: 'rebased', record };
    });
  }

  /**
   * Clear the dirty flag. With `versions`, only records still at the
   * acknowledged version are cleaned. With `serverVersions`, a cleaned
   * record takes the version the authority assigned.
   *
   * @returns Number of records cleaned
   */
  async markClean(
    collection: CollectionName,
    ids: readonly string[],
    options: {
      versions?: ReadonlyMap<string, number>;
      serverVersions?: ReadonlyMap<string, number>;
    } = {}
  ): Promise<number> {
    if (ids.length === 0) {
      return 0;
    }

    return this.withLock(collection, async () => {
      const docs = await this.records(collection).findByIds([...ids]).exec();
      let cleaned = 0;

      for (const doc of docs.values()) {
        const expected = options.versions?.get(doc.id);
        if (!doc.isDirty || (expected !== undefined && expected !== doc.version)) {
          continue;
        }
        const assigned = options.serverVersions?.get(doc.id);
        await doc.incrementalPatch(
          assigned === undefined ? { isDirty: false } : { isDirty: false, version: Math.max(assigned, 1) }
        );
        cleaned++;
      }

      return cleaned;
    });
  }

  /**
   * Permanently remove a clean tombstone. The id can never be written again.
   */
  async purge(collection: CollectionName, id: string): Promise<void> {
    await this.withLock(collection, async () => {
      const doc = await this.records(collection).findOne(id).exec();
      if (!doc) {
        throw new NotFoundError(`${collection}/${id} does not exist`);
      }

      const record = this.toRecord(collection, doc);
      if (!record.isDeleted || record.isDirty) {
        throw new ValidationError(`${collection}/${id} is not a synced tombstone`);
      }

      await this.retire(collection, id);
      await doc.remove();
      this.logger?.info({ collection, id }, 'purged tombstone');
    });
  }

  /**
   * Bring a deleted entity back under a freshly minted id. The old id is
   * retired; its tombstone is removed once it has been synced.
   */
  async recreate<C extends CollectionName>(
    collection: C,
    id: string,
    patch: PayloadPatch<C>
  ): Promise<EntityRecord<C>> {
    await this.withLock(collection, async () => {
      const doc = await this.records(collection).findOne(id).exec();
      if (doc) {
        const record = this.toRecord(collection, doc);
        if (!record.isDeleted) {
          throw new ValidationError(`${collection}/${id} is live; delete it before recreating`);
        }
        if (!record.isDirty) {
          await doc.remove();
        }
      }
      await this.retire(collection, id);
    });

    return this.put(collection, this.generateId(), patch);
  }

  async count(collection: CollectionName, options: CountOptions = {}): Promise<number> {
    const docs = await this.records(collection)
      .find({
        selector: {
          ...(options.includeDeleted ? {} : { isDeleted: false }),
          ...(options.dirty === undefined ? {} : { isDirty: options.dirty }),
        },
      })
      .exec();
    return docs.length;
  }

  async isRetired(collection: CollectionName, id: string): Promise<boolean> {
    const doc = await this.db.retired_ids.findOne(entityKey(collection, id)).exec();
    return doc !== null;
  }

  private async assertWritable(collection: CollectionName, id: string): Promise<void> {
    if (await this.isRetired(collection, id)) {
      throw new ValidationError(`${collection}/${id} was permanently deleted and cannot be reused`);
    }
  }

  /**
   * Caller holds the collection lock
   */
  private async writeRemote<C extends CollectionName>(
    collection: C,
    id: string,
    existing: EntityRecord<C> | null,
    payload: unknown,
    serverVersion: number,
    options: ApplyRemoteOptions
  ): Promise<RemoteApplyResult<C>> {
    if (await this.isRetired(collection, id)) {
      this.logger?.debug({ collection, id }, 'ignoring remote change for retired id');
      return { status: 'skipped' };
    }

    const isDeleted = options.isDeleted ?? false;
    const parsed = safeParsePayload(collection, payload);

    let resolvedPayload: PayloadByCollection[C];
    if (parsed.success) {
      resolvedPayload = parsed.data;
    } else if (isDeleted && existing) {
      resolvedPayload = existing.payload;
    } else if (isDeleted) {
      return { status: 'skipped' };
    } else {
      throw parsed.error;
    }

    if (
      existing &&
      !existing.isDirty &&
      existing.version === serverVersion &&
      existing.isDeleted === isDeleted &&
      isDeepStrictEqual(existing.payload, resolvedPayload)
    ) {
      return { status: 'unchanged', record: existing };
    }

    const version = options.allowRollback
      ? serverVersion
      : Math.max(existing?.version ?? 0, serverVersion);

    const record: EntityRecord<C> = {
      id,
      collection,
      version: Math.max(version, 1),
      updatedAt: options.updatedAt ?? this.now().toISOString(),
      isDirty: false,
      isDeleted,
      lastModifiedBy: options.lastModifiedBy ?? existing?.lastModifiedBy ?? REMOTE_ACTOR,
      payload: resolvedPayload,
    };

    await this.persist(record);
    return { status: 'applied', record };
  }

  /**
   * Caller holds the collection lock
   */
  private async writeRebase<C extends CollectionName>(
    collection: C,
    id: string,
    existing: EntityRecord<C> | null,
    payload: unknown,
    options: RebaseOptions
  ): Promise<EntityRecord<C>> {
    const parsed = safeParsePayload(collection, payload);

    let resolvedPayload: PayloadByCollection[C];
    if (parsed.success) {
      resolvedPayload = parsed.data;
    } else if (options.isDeleted && existing) {
      resolvedPayload = existing.payload;
    } else {
      throw parsed.error;
    }

    const record: EntityRecord<C> = {
      id,
      collection,
      version: Math.max(existing?.version ?? 0, options.baseVersion) + 1,
      updatedAt: this.now().toISOString(),
      isDirty: true,
      isDeleted: options.isDeleted,
      lastModifiedBy: this.actorId,
      payload: resolvedPayload,
    };

    await this.commit(record, existing, options.isDeleted ? 'delete' : 'update');
    return record;
  }

  private async retire(collection: CollectionName, id: string): Promise<void> {
    await this.db.retired_ids.incrementalUpsert({
      key: entityKey(collection, id),
      entityType: collection,
      entityId: id,
      retiredAt: this.now().toISOString(),
    });
  }

  /**
   * Persist a local write and queue it. The previous state is restored if
   * the outbox refuses the entry.
   */
  private async commit<C extends CollectionName>(
    record: EntityRecord<C>,
    previous: EntityRecord<C> | null,
    operation: 'create' | 'update' | 'delete'
  ): Promise<void> {
    await this.persist(record);

    try {
      await this.outbox.enqueue({
        collection: record.collection,
        entityId: record.id,
        operation,
        snapshot: { ...record.payload },
        recordVersion: record.version,
        updatedAt: record.updatedAt,
      });
    } catch (error) {
      this.logger?.error(
        { collection: record.collection, id: record.id, err: error },
        'outbox enqueue failed, rolling back local write'
      );

      if (previous) {
        await this.persist(previous);
      } else {
        const doc = await this.records(record.collection).findOne(record.id).exec();
        await doc?.remove();
      }
      throw error;
    }
  }

  private async persist<C extends CollectionName>(record: EntityRecord<C>): Promise<void> {
    await this.records(record.collection).incrementalUpsert({
      id: record.id,
      entityType: record.collection,
      version: record.version,
      updatedAt: record.updatedAt,
      isDirty: record.isDirty,
      isDeleted: record.isDeleted,
      lastModifiedBy: record.lastModifiedBy,
      payload: { ...record.payload },
    });
  }

  private records(collection: CollectionName): RxCollection<StoredRecordDocument> {
    return this.db.collections[collection];
  }

  private toRecord<C extends CollectionName>(
    collection: C,
    doc: RxDocument<StoredRecordDocument>
  ): EntityRecord<C> {
    const data = doc.toMutableJSON();

    if (!Number.isInteger(data.version) || data.version < 1 || Number.isNaN(Date.parse(data.updatedAt))) {
      throw new StorageCorruptionError(
        collection,
        `Stored ${collection} record ${data.id} has an invalid version or timestamp`,
        data.id
      );
    }

    const parsed = safeParsePayload(collection, data.payload);
    if (!parsed.success) {
      throw new StorageCorruptionError(
        collection,
        `Stored ${collection} record ${data.id} is unreadable: ${parsed.error.message}`,
        data.id
      );
    }

    return {
      id: data.id,
      collection,
      version: data.version,
      updatedAt: data.updatedAt,
      isDirty: data.isDirty,
      isDeleted: data.isDeleted,
      lastModifiedBy: data.lastModifiedBy,
      payload: parsed.data,
    };
  }

  private async withLock<T>(collection: CollectionName, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(collection, fn);
  }
}

function withoutUndefined(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

function sortValue<C extends CollectionName>(record: EntityRecord<C>, field: SortField): unknown {
  if (field.startsWith('payload.')) {
    const key = field.slice('payload.'.length);
    return Object.entries(record.payload).find(([name]) => name === key)?.[1];
  }
  return Object.entries(record).find(([name]) => name === field)?.[1];
}

function compareValues(a: unknown, b: unknown): number {
  if (a === b) {
    return 0;
  }
  if (a === undefined || a === null) {
    return 1;
  }
  if (b === undefined || b === null) {
    return -1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  return String(a).localeCompare(String(b));
}
