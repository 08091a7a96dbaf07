/**
 * Per-collection sync checkpoints
 * @module sync/metadata
 */

import type { RxCollection } from 'rxdb';
import type { CollectionName } from '../storage/payloads.js';
import type { SyncMetadataDocument } from '../storage/schema.js';

/**
 * Marker sent for a collection that never completed a cycle
 */
export const EPOCH = new Date(0).toISOString();

export interface SyncMetadata {
  collection: CollectionName;
  lastSyncAt: string | null;
  successfulCycles: number;
  failedCycles: number;
  lastError: string | null;
}

export class SyncMetadataStore {
  private collection: RxCollection<SyncMetadataDocument>;

  constructor(collection: RxCollection<SyncMetadataDocument>) {
    this.collection = collection;
  }

  async get(collection: CollectionName): Promise<SyncMetadata> {
    const doc = await this.collection.findOne(collection).exec();
    return {
      collection,
      lastSyncAt: doc?.lastSyncAt ?? null,
      successfulCycles: doc?.successfulCycles ?? 0,
      failedCycles: doc?.failedCycles ?? 0,
      lastError: doc?.lastError ?? null,
    };
  }

  async lastSyncTimestamps(collections: readonly CollectionName[]): Promise<Record<string, string>> {
    const result: Record<string, string> = {};
    for (const collection of collections) {
      result[collection] = (await this.get(collection)).lastSyncAt ?? EPOCH;
    }
    return result;
  }

  /**
   * Advance the checkpoint to the authority's `syncTimestamp`
   */
  async recordSuccess(
    collections: readonly CollectionName[],
    syncTimestamp: string
  ): Promise<void> {
    for (const collection of collections) {
      const current = await this.get(collection);
      await this.collection.incrementalUpsert({
        entityType: collection,
        lastSyncAt: syncTimestamp,
        successfulCycles: current.successfulCycles + 1,
        failedCycles: current.failedCycles,
        lastError: null,
      });
    }
  }

  async recordFailure(collections: readonly CollectionName[], error: string): Promise<void> {
    for (const collection of collections) {
      const current = await this.get(collection);
      await this.collection.incrementalUpsert({
        entityType: collection,
        lastSyncAt: current.lastSyncAt,
        successfulCycles: current.successfulCycles,
        failedCycles: current.failedCycles + 1,
        lastError: error,
      });
    }
  }
}
