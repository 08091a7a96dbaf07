/**
 * Database initialization and configuration
 * @module storage/init
 */

import { createRxDatabase } from 'rxdb';
import { getRxStorageMemory } from 'rxdb/plugins/storage-memory';
import type { RxCollection, RxDatabase, RxStorage } from 'rxdb';
import {
  conflictSchema,
  createRecordSchema,
  outboxEntrySchema,
  retiredIdSchema,
  syncMetadataSchema,
} from './schema.js';
import type {
  ConflictDocument,
  OutboxEntryDocument,
  RetiredIdDocument,
  StoredRecordDocument,
  SyncMetadataDocument,
} from './schema.js';

export type HouseholdCollections = {
  tasks: RxCollection<StoredRecordDocument>;
  events: RxCollection<StoredRecordDocument>;
  ledger_entries: RxCollection<StoredRecordDocument>;
  outbox_entries: RxCollection<OutboxEntryDocument>;
  sync_metadata: RxCollection<SyncMetadataDocument>;
  conflicts: RxCollection<ConflictDocument>;
  retired_ids: RxCollection<RetiredIdDocument>;
};

export type HouseholdDatabase = RxDatabase<HouseholdCollections>;

/**
 * Database configuration options
 */
export interface DatabaseConfig {
  name?: string;
  /**
   * Storage engine; in-memory unless the host provides a persistent one
   */
  storage?: RxStorage<unknown, unknown>;
}

/**
 * Creates and initializes the local database
 *
 * @param config - Database configuration options
 * @returns Promise resolving to the initialized database instance
 */
export async function createDatabase(config: DatabaseConfig = {}): Promise<HouseholdDatabase> {
  const { name = 'household-sync', storage = getRxStorageMemory() } = config;

  const db = await createRxDatabase<HouseholdCollections>({
    name,
    storage,
    multiInstance: false,
    eventReduce: true,
  });

  await db.addCollections({
    tasks: { schema: createRecordSchema('tasks') },
    events: { schema: createRecordSchema('events') },
    ledger_entries: { schema: createRecordSchema('ledger_entries') },
    outbox_entries: { schema: outboxEntrySchema },
    sync_metadata: { schema: syncMetadataSchema },
    conflicts: { schema: conflictSchema },
    retired_ids: { schema: retiredIdSchema },
  });

  return db;
}
