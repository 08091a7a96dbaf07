/**
 * Persisted layout: one collection per entity type plus outbox,
 * sync metadata, conflicts and retired ids
 * @module storage/schema
 */

import type { RxJsonSchema } from 'rxdb';
import type { CollectionName } from './payloads.js';

/**
 * Record row as stored, one per (collection, id)
 */
export interface StoredRecordDocument {
  id: string;
  entityType: string;
  version: number;
  updatedAt: string;
  isDirty: boolean;
  isDeleted: boolean;
  lastModifiedBy: string;
  payload: Record<string, unknown>;
}

export type OutboxOperation = 'create' | 'update' | 'delete';

export type OutboxPartition = 'pending' | 'failed';

/**
 * Queued mutation row; `partition` separates pending from failed entries
 */
export interface OutboxEntryDocument {
  entryId: string;
  entityType: string;
  entityId: string;
  entityKey: string;
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

/**
 * Per-collection sync checkpoint
 */
export interface SyncMetadataDocument {
  entityType: string;
  lastSyncAt: string | null;
  successfulCycles: number;
  failedCycles: number;
  lastError: string | null;
}

/**
 * Conflict row, partitioned by `status`
 */
export interface ConflictDocument {
  conflictId: string;
  entityType: string;
  entityId: string;
  clientVersion: number;
  serverVersion: number;
  clientSnapshot: Record<string, unknown>;
  serverSnapshot: Record<string, unknown>;
  kind: string;
  resolution: string | null;
  needsManualReview: boolean;
  status: 'pending' | 'resolved';
  detectedAt: string;
  resolvedAt: string | null;
}

/**
 * Id that was permanently deleted and must never be written again
 */
export interface RetiredIdDocument {
  key: string;
  entityType: string;
  entityId: string;
  retiredAt: string;
}

const MAX_SEQUENCE = 9007199254740991;

/**
 * Builds the record schema for an entity collection
 */
export function createRecordSchema(collection: CollectionName): RxJsonSchema<StoredRecordDocument> {
  return {
    title: `${collection} records`,
    version: 0,
    description: `Versioned ${collection} rows with dirty and tombstone flags`,
    type: 'object',
    primaryKey: 'id',
    properties: {
      id: {
        type: 'string',
        maxLength: 128,
      },
      entityType: {
        type: 'string',
      },
      version: {
        type: 'integer',
        minimum: 1,
      },
      updatedAt: {
        type: 'string',
        format: 'date-time',
      },
      isDirty: {
        type: 'boolean',
      },
      isDeleted: {
        type: 'boolean',
      },
      lastModifiedBy: {
        type: 'string',
      },
      payload: {
        type: 'object',
        additionalProperties: true,
      },
    },
    required: [
      'id',
      'entityType',
      'version',
      'updatedAt',
      'isDirty',
      'isDeleted',
      'lastModifiedBy',
      'payload',
    ],
  };
}

export const outboxEntrySchema: RxJsonSchema<OutboxEntryDocument> = {
  title: 'outbox entries',
  version: 0,
  description: 'Pending and failed mutations awaiting acknowledgement',
  type: 'object',
  primaryKey: 'entryId',
  properties: {
    entryId: {
      type: 'string',
      maxLength: 64,
    },
    entityType: {
      type: 'string',
    },
    entityId: {
      type: 'string',
    },
    entityKey: {
      type: 'string',
      maxLength: 200,
    },
    operation: {
      type: 'string',
      enum: ['create', 'update', 'delete'],
    },
    snapshot: {
      type: 'object',
      additionalProperties: true,
    },
    recordVersion: {
      type: 'integer',
      minimum: 1,
    },
    updatedAt: {
      type: 'string',
      format: 'date-time',
    },
    retryCount: {
      type: 'integer',
      minimum: 0,
    },
    queuedAt: {
      type: 'string',
      format: 'date-time',
    },
    sequence: {
      type: 'integer',
      minimum: 0,
      maximum: MAX_SEQUENCE,
      multipleOf: 1,
    },
    lastAttemptAt: {
      type: ['string', 'null'],
    },
    lastError: {
      type: ['string', 'null'],
    },
    partition: {
      type: 'string',
      enum: ['pending', 'failed'],
      maxLength: 16,
    },
  },
  required: [
    'entryId',
    'entityType',
    'entityId',
    'entityKey',
    'operation',
    'snapshot',
    'recordVersion',
    'updatedAt',
    'retryCount',
    'queuedAt',
    'sequence',
    'partition',
  ],
  indexes: ['entityKey', ['partition', 'sequence']],
};

export const syncMetadataSchema: RxJsonSchema<SyncMetadataDocument> = {
  title: 'sync metadata',
  version: 0,
  description: 'Delta sync checkpoint per collection',
  type: 'object',
  primaryKey: 'entityType',
  properties: {
    entityType: {
      type: 'string',
      maxLength: 64,
    },
    lastSyncAt: {
      type: ['string', 'null'],
    },
    successfulCycles: {
      type: 'integer',
      minimum: 0,
    },
    failedCycles: {
      type: 'integer',
      minimum: 0,
    },
    lastError: {
      type: ['string', 'null'],
    },
  },
  required: ['entityType', 'successfulCycles', 'failedCycles'],
};

export const conflictSchema: RxJsonSchema<ConflictDocument> = {
  title: 'conflicts',
  version: 0,
  description: 'Divergences between local and authority state',
  type: 'object',
  primaryKey: 'conflictId',
  properties: {
    conflictId: {
      type: 'string',
      maxLength: 64,
    },
    entityType: {
      type: 'string',
    },
    entityId: {
      type: 'string',
    },
    clientVersion: {
      type: 'integer',
      minimum: 0,
    },
    serverVersion: {
      type: 'integer',
      minimum: 0,
    },
    clientSnapshot: {
      type: 'object',
      additionalProperties: true,
    },
    serverSnapshot: {
      type: 'object',
      additionalProperties: true,
    },
    kind: {
      type: 'string',
      enum: ['status', 'deleteUpdate', 'concurrentUpdate', 'versionRollback'],
    },
    resolution: {
      type: ['string', 'null'],
    },
    needsManualReview: {
      type: 'boolean',
    },
    status: {
      type: 'string',
      enum: ['pending', 'resolved'],
    },
    detectedAt: {
      type: 'string',
      format: 'date-time',
    },
    resolvedAt: {
      type: ['string', 'null'],
    },
  },
  required: [
    'conflictId',
    'entityType',
    'entityId',
    'clientVersion',
    'serverVersion',
    'clientSnapshot',
    'serverSnapshot',
    'kind',
    'needsManualReview',
    'status',
    'detectedAt',
  ],
};

export const retiredIdSchema: RxJsonSchema<RetiredIdDocument> = {
  title: 'retired ids',
  version: 0,
  description: 'Ids that were permanently deleted',
  type: 'object',
  primaryKey: 'key',
  properties: {
    key: {
      type: 'string',
      maxLength: 200,
    },
    entityType: {
      type: 'string',
    },
    entityId: {
      type: 'string',
    },
    retiredAt: {
      type: 'string',
      format: 'date-time',
    },
  },
  required: ['key', 'entityType', 'entityId', 'retiredAt'],
};

/**
 * Key used for per-entity lookups across collections
 */
export function entityKey(collection: string, entityId: string): string {
  return `${collection}:${entityId}`;
}
