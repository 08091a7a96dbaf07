/**
 * Client module - wires the engine together for one device
 * @module client
 */

import type { RxStorage } from 'rxdb';
import { nanoid } from 'nanoid';
import type { LevelWithSilent } from 'pino';
import { ConflictStore } from '../conflicts/index.js';
import { ValidationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { ConnectivityMonitor } from '../network/index.js';
import { Outbox } from '../outbox/index.js';
import { ConflictResolver } from '../resolver/index.js';
import type { ConflictResolverConfig } from '../resolver/index.js';
import { EntityStore } from '../storage/entity-store.js';
import { createDatabase } from '../storage/init.js';
import type { HouseholdDatabase } from '../storage/init.js';
import { COLLECTIONS } from '../storage/payloads.js';
import type { CollectionName } from '../storage/payloads.js';
import { SyncCoordinator } from '../sync/index.js';
import type { SyncResult } from '../sync/index.js';
import { SyncMetadataStore } from '../sync/metadata.js';
import { SyncScheduler } from '../sync/scheduler.js';
import { HttpTransport } from '../transport/http.js';
import type { SyncTransport } from '../transport/index.js';

/**
 * SDK client configuration
 */
export interface ClientConfig {
  /**
   * Identity recorded as `lastModifiedBy` and sent as the client id
   */
  actorId: string;
  database?: {
    name?: string;
    storage?: RxStorage<unknown, unknown>;
  };
  network?: {
    initialOnline?: boolean;
    pingUrl?: string;
    pingInterval?: number;
    pingTimeout?: number;
  };
  sync?: {
    url?: string;
    /**
     * Replaces the HTTP transport built from `url`
     */
    transport?: SyncTransport;
    headers?: Record<string, string>;
    interval?: number;
    timeout?: number;
    batchSize?: number;
    enableCompression?: boolean;
    collections?: readonly CollectionName[];
    /**
     * Start the scheduler as soon as the client is created
     */
    autoStart?: boolean;
  };
  outbox?: {
    maxRetries?: number;
    maxBackoffSeconds?: number;
  };
  resolver?: ConflictResolverConfig;
  logLevel?: LevelWithSilent;
  logger?: Logger;
  now?: () => Date;
}

export interface SyncClientStats {
  pending: number;
  failed: number;
  pendingConflicts: number;
  isSyncing: boolean;
  halted: CollectionName[];
}

/**
 * Everything a client owns
 */
export interface SyncClientComponents {
  db: HouseholdDatabase;
  store: EntityStore;
  outbox: Outbox;
  resolver: ConflictResolver;
  conflicts: ConflictStore;
  metadata: SyncMetadataStore;
  coordinator: SyncCoordinator;
  scheduler: SyncScheduler;
  connectivity: ConnectivityMonitor;
  logger: Logger;
}

const DEFAULTS = {
  database: {
    name: 'household-sync',
  },
  sync: {
    interval: 5 * 60 * 1000,
    timeout: 30000,
    batchSize: 100,
    enableCompression: true,
    collections: COLLECTIONS,
    autoStart: false,
  },
  outbox: {
    maxRetries: 5,
    maxBackoffSeconds: 16,
  },
};

/**
 * SDK client - the engine for one device
 */
export class SyncClient {
  readonly db: HouseholdDatabase;
  readonly store: EntityStore;
  readonly outbox: Outbox;
  readonly resolver: ConflictResolver;
  readonly conflicts: ConflictStore;
  readonly metadata: SyncMetadataStore;
  readonly coordinator: SyncCoordinator;
  readonly scheduler: SyncScheduler;
  readonly connectivity: ConnectivityMonitor;
  private logger: Logger;
  private destroyed = false;

  constructor(components: SyncClientComponents) {
    this.db = components.db;
    this.store = components.store;
    this.outbox = components.outbox;
    this.resolver = components.resolver;
    this.conflicts = components.conflicts;
    this.metadata = components.metadata;
    this.coordinator = components.coordinator;
    this.scheduler = components.scheduler;
    this.connectivity = components.connectivity;
    this.logger = components.logger;
  }

  /**
   * Run one sync cycle now
   */
  sync(): Promise<SyncResult> {
    return this.coordinator.sync();
  }

  start(): void {
    this.connectivity.start();
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  isOnline(): boolean {
    return this.connectivity.isOnline;
  }

  async stats(): Promise<SyncClientStats> {
    const [outbox, pendingConflicts] = await Promise.all([
      this.outbox.stats(),
      this.conflicts.pendingCount(),
    ]);

    return {
      pending: outbox.pending,
      failed: outbox.failed,
      pendingConflicts,
      isSyncing: this.coordinator.isSyncing,
      halted: this.coordinator.haltedCollections(),
    };
  }

  /**
   * Stop background work and close the database. A running cycle is
   * allowed to finish first.
   */
  async destroy(): Promise<void> {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;

    this.scheduler.stop();
    this.connectivity.destroy();
    if (this.coordinator.isSyncing) {
      await this.coordinator.sync();
    }
    await this.db.destroy();
    this.logger.info('client destroyed');
  }
}

/**
 * Build a client and its database
 *
 * @throws ValidationError when neither `sync.url` nor `sync.transport` is set
 */
export async function createSyncClient(config: ClientConfig): Promise<SyncClient> {
  const database = { ...DEFAULTS.database, ...config.database };
  const sync = { ...DEFAULTS.sync, ...config.sync };
  const outboxConfig = { ...DEFAULTS.outbox, ...config.outbox };
  const now = config.now ?? (() => new Date());
  const logger = config.logger ?? createLogger({ level: config.logLevel });

  const transport =
    sync.transport ??
    (sync.url
      ? new HttpTransport({
          url: sync.url,
          headers: sync.headers ?? {},
          clientId: config.actorId,
          enableCompression: sync.enableCompression,
          logger,
        })
      : null);
  if (!transport) {
    throw new ValidationError('sync.url or sync.transport is required');
  }

  const db = await createDatabase(database);

  const outbox = new Outbox(db.outbox_entries, { ...outboxConfig, now, logger });
  const store = new EntityStore(db, outbox, { actorId: config.actorId, now, logger });
  const resolver = new ConflictResolver(config.resolver);
  const conflicts = new ConflictStore(db.conflicts, { now, logger });
  const metadata = new SyncMetadataStore(db.sync_metadata);
  const connectivity = new ConnectivityMonitor({ ...config.network, logger });

  const coordinator = new SyncCoordinator(
    { store, outbox, resolver, conflicts, metadata, transport, connectivity },
    {
      collections: sync.collections,
      batchSize: sync.batchSize,
      timeout: sync.timeout,
      deviceId: `${config.actorId}:${nanoid(8)}`,
      now,
      logger,
    }
  );

  const scheduler = new SyncScheduler(() => coordinator.sync(), {
    interval: sync.interval,
    online$: connectivity.online$,
    logger,
  });

  const client = new SyncClient({
    db,
    store,
    outbox,
    resolver,
    conflicts,
    metadata,
    coordinator,
    scheduler,
    connectivity,
    logger,
  });

  if (sync.autoStart) {
    client.start();
  }

  logger.info({ actorId: config.actorId, database: database.name }, 'sync client ready');
  return client;
}
