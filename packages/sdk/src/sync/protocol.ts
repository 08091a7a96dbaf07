/**
 * Delta sync wire protocol, shared by the client and the reference server
 * @module sync/protocol
 */

import { z } from 'zod';

export const SYNC_PATH = '/api/sync/delta';

export const CLIENT_ID_HEADER = 'x-client-id';

const isoTimestamp = z.string().datetime({ offset: true });

export const changeOperationSchema = z.enum(['create', 'update', 'delete']);

export const pendingChangeSchema = z.object({
  entityType: z.string().min(1),
  operation: changeOperationSchema,
  entityId: z.string().min(1),
  version: z.number().int().positive(),
  data: z.record(z.unknown()),
  updatedAt: isoTimestamp,
});

export const syncRequestSchema = z.object({
  lastSyncTimestamps: z.record(isoTimestamp),
  deviceId: z.string().optional(),
  pendingChanges: z.array(pendingChangeSchema),
});

export const serverChangeSchema = pendingChangeSchema.extend({
  lastModifiedBy: z.string().optional(),
});

export const wireConflictTypeSchema = z.enum([
  'status',
  'delete_update',
  'concurrent_update',
  'version_rollback',
]);

export const wireConflictSchema = z.object({
  entityType: z.string(),
  entityId: z.string(),
  clientVersion: z.number().int().nonnegative(),
  serverVersion: z.number().int().nonnegative(),
  clientData: z.record(z.unknown()),
  serverData: z.record(z.unknown()),
  conflictType: wireConflictTypeSchema,
  serverUpdatedAt: isoTimestamp.optional(),
  serverDeleted: z.boolean().optional(),
  serverModifiedBy: z.string().optional(),
});

export const rejectionSchema = z.object({
  entityType: z.string(),
  entityId: z.string(),
  reason: z.string(),
  permanent: z.boolean(),
});

/**
 * Version the authority assigned to a stored change
 */
export const acceptedChangeSchema = z.object({
  entityType: z.string(),
  entityId: z.string(),
  version: z.number().int().positive(),
});

export const syncResponseSchema = z.object({
  serverChanges: z.array(serverChangeSchema),
  conflicts: z.array(wireConflictSchema),
  rejected: z.array(rejectionSchema).default([]),
  accepted: z.array(acceptedChangeSchema).optional(),
  syncTimestamp: isoTimestamp,
});

export type ChangeOperation = z.infer<typeof changeOperationSchema>;
export type PendingChange = z.infer<typeof pendingChangeSchema>;
export type SyncRequest = z.infer<typeof syncRequestSchema>;
export type ServerChange = z.infer<typeof serverChangeSchema>;
export type WireConflictType = z.infer<typeof wireConflictTypeSchema>;
export type WireConflict = z.infer<typeof wireConflictSchema>;
export type Rejection = z.infer<typeof rejectionSchema>;
export type AcceptedChange = z.infer<typeof acceptedChangeSchema>;
export type SyncResponse = z.output<typeof syncResponseSchema>;
/**
 * Response as a server may write it (`rejected` optional)
 */
export type SyncResponseInput = z.input<typeof syncResponseSchema>;
