/**
 * Resolver module - decides between a local and an authority version of
 * the same entity
 * @module resolver
 */

import { isDeepStrictEqual } from 'node:util';
import { TASK_STATUSES } from '../storage/payloads.js';

/**
 * The parts of a record the resolver inspects
 */
export interface ResolvableRecord {
  collection: string;
  version: number;
  updatedAt: string;
  isDeleted: boolean;
  payload: Record<string, unknown>;
}

/**
 * Frozen copy of one side of a conflict
 */
export interface RecordSnapshot {
  payload: Record<string, unknown>;
  isDeleted: boolean;
  updatedAt: string;
  version: number;
  lastModifiedBy: string;
}

/**
 * Both sides of a conflict, as persisted for review
 */
export interface ConflictInput {
  collection: string;
  clientSnapshot: RecordSnapshot;
  serverSnapshot: RecordSnapshot;
}

export type ConflictKind = 'status' | 'deleteUpdate' | 'concurrentUpdate' | 'versionRollback';

export type ResolutionStrategy =
  | 'deleteWins'
  | 'identical'
  | 'statusPriority'
  | 'lastWriterWins'
  | 'merge'
  | 'manualReview';

export type ResolutionWinner = 'client' | 'server' | 'merged';

export interface AutomaticResolution {
  strategy: Exclude<ResolutionStrategy, 'manualReview'>;
  needsManualReview: false;
  resolvedPayload: Record<string, unknown>;
  isDeleted: boolean;
  winner: ResolutionWinner;
  /**
   * Lowest version the resolved state may carry locally
   */
  resolvedVersion: number;
  explanation: string;
}

export interface ManualResolution {
  strategy: 'manualReview';
  needsManualReview: true;
  resolvedPayload: null;
  /**
   * Fields a reviewer still has to pick a side for (merge only)
   */
  unresolvedFields: string[];
  explanation: string;
}

export type Resolution = AutomaticResolution | ManualResolution;

export type FieldPick = 'client' | 'server';

export interface FieldDiff {
  clientValue: unknown;
  serverValue: unknown;
  hasConflict: boolean;
}

export interface ConflictResolverConfig {
  /**
   * Collections whose `status` field follows done > pendingApproval > open
   * @default ['tasks']
   */
  statusCollections?: readonly string[];
}

/**
 * Position of a status in the priority order, or null for unknown values
 */
export function statusRank(value: unknown): number | null {
  if (typeof value !== 'string') {
    return null;
  }
  const rank = TASK_STATUSES.findIndex((status) => status === value);
  return rank === -1 ? null : rank;
}

/**
 * Conflict resolver. Holds configuration only; every method is a pure
 * function of its arguments.
 */
export class ConflictResolver {
  private readonly statusCollections: ReadonlySet<string>;

  constructor(config: ConflictResolverConfig = {}) {
    this.statusCollections = new Set(config.statusCollections ?? ['tasks']);
  }

  /**
   * Resolve a client/server pair automatically. Rules, first match wins:
   * delete wins, identical states, status priority, last writer wins.
   * Anything else, timestamp ties included, needs manual review.
   */
  resolve(client: ResolvableRecord, server: ResolvableRecord): Resolution {
    const resolvedVersion = Math.max(client.version, server.version);

    // A concurrent un-delete on the other side loses.
    if (client.isDeleted || server.isDeleted) {
      const tombstone = server.isDeleted ? server : client;
      return {
        strategy: 'deleteWins',
        needsManualReview: false,
        resolvedPayload: tombstone.payload,
        isDeleted: true,
        winner: server.isDeleted ? 'server' : 'client',
        resolvedVersion,
        explanation: `Delete wins: deleted on the ${server.isDeleted ? 'server' : 'client'}`,
      };
    }

    if (isDeepStrictEqual(client.payload, server.payload)) {
      return {
        strategy: 'identical',
        needsManualReview: false,
        resolvedPayload: server.payload,
        isDeleted: false,
        winner: 'server',
        resolvedVersion,
        explanation: 'Both sides hold the same state',
      };
    }

    if (this.statusCollections.has(client.collection)) {
      const clientRank = statusRank(client.payload.status);
      const serverRank = statusRank(server.payload.status);

      if (clientRank !== null && serverRank !== null && clientRank !== serverRank) {
        const clientWins = clientRank > serverRank;
        return {
          strategy: 'statusPriority',
          needsManualReview: false,
          resolvedPayload: clientWins ? client.payload : server.payload,
          isDeleted: false,
          winner: clientWins ? 'client' : 'server',
          resolvedVersion,
          explanation: clientWins
            ? `Status ${String(client.payload.status)} beats ${String(server.payload.status)}`
            : `Status ${String(server.payload.status)} beats ${String(client.payload.status)}`,
        };
      }
    }

    const clientTime = Date.parse(client.updatedAt);
    const serverTime = Date.parse(server.updatedAt);

    if (clientTime > serverTime) {
      return {
        strategy: 'lastWriterWins',
        needsManualReview: false,
        resolvedPayload: client.payload,
        isDeleted: false,
        winner: 'client',
        resolvedVersion,
        explanation: `Client changes are newer (${client.updatedAt})`,
      };
    }

    if (serverTime > clientTime) {
      return {
        strategy: 'lastWriterWins',
        needsManualReview: false,
        resolvedPayload: server.payload,
        isDeleted: false,
        winner: 'server',
        resolvedVersion,
        explanation: `Server changes are newer (${server.updatedAt})`,
      };
    }

    return manualReview('Equal timestamps with differing fields');
  }

  /**
   * Field-level merge: arrays by union, numbers by max, everything else
   * from `picks`. Fields present on one side only keep that value.
   */
  merge(conflict: ConflictInput, picks: Readonly<Record<string, FieldPick>> = {}): Resolution {
    if (!this.canMerge(conflict)) {
      return manualReview('Deleted records cannot be merged');
    }

    const client = conflict.clientSnapshot.payload;
    const server = conflict.serverSnapshot.payload;
    const merged: Record<string, unknown> = {};
    const unresolvedFields: string[] = [];

    for (const field of fieldNames(client, server)) {
      const clientValue = client[field];
      const serverValue = server[field];

      if (isDeepStrictEqual(clientValue, serverValue)) {
        merged[field] = clientValue;
      } else if (!(field in server)) {
        merged[field] = clientValue;
      } else if (!(field in client)) {
        merged[field] = serverValue;
      } else if (Array.isArray(clientValue) && Array.isArray(serverValue)) {
        merged[field] = union(clientValue, serverValue);
      } else if (typeof clientValue === 'number' && typeof serverValue === 'number') {
        merged[field] = Math.max(clientValue, serverValue);
      } else if (picks[field]) {
        merged[field] = picks[field] === 'client' ? clientValue : serverValue;
      } else {
        unresolvedFields.push(field);
      }
    }

    if (unresolvedFields.length > 0) {
      return manualReview(`Pick a side for: ${unresolvedFields.join(', ')}`, unresolvedFields);
    }

    return {
      strategy: 'merge',
      needsManualReview: false,
      resolvedPayload: merged,
      isDeleted: false,
      winner: 'merged',
      resolvedVersion: Math.max(conflict.clientSnapshot.version, conflict.serverSnapshot.version),
      explanation: 'Merged client and server changes',
    };
  }

  /**
   * Deletion is not mergeable with any other change
   */
  canMerge(conflict: ConflictInput): boolean {
    return !conflict.clientSnapshot.isDeleted && !conflict.serverSnapshot.isDeleted;
  }

  /**
   * Field-by-field comparison for a reviewer
   */
  getDiff(conflict: ConflictInput): Record<string, FieldDiff> {
    const client = conflict.clientSnapshot.payload;
    const server = conflict.serverSnapshot.payload;
    const diff: Record<string, FieldDiff> = {};

    for (const field of fieldNames(client, server)) {
      diff[field] = {
        clientValue: client[field],
        serverValue: server[field],
        hasConflict: !isDeepStrictEqual(client[field], server[field]),
      };
    }

    return diff;
  }

  /**
   * Kind of divergence between two versions of an entity
   */
  classifyConflict(client: ResolvableRecord, server: ResolvableRecord): ConflictKind {
    if (client.isDeleted || server.isDeleted) {
      return 'deleteUpdate';
    }

    if (
      this.statusCollections.has(client.collection) &&
      client.payload.status !== undefined &&
      server.payload.status !== undefined &&
      client.payload.status !== server.payload.status
    ) {
      return 'status';
    }

    return 'concurrentUpdate';
  }
}

function manualReview(explanation: string, unresolvedFields: string[] = []): ManualResolution {
  return {
    strategy: 'manualReview',
    needsManualReview: true,
    resolvedPayload: null,
    unresolvedFields,
    explanation,
  };
}

function fieldNames(client: Record<string, unknown>, server: Record<string, unknown>): string[] {
  return [...new Set([...Object.keys(client), ...Object.keys(server)])];
}

function union(first: readonly unknown[], second: readonly unknown[]): unknown[] {
  const result: unknown[] = [];
  for (const value of [...first, ...second]) {
    if (!result.some((existing) => isDeepStrictEqual(existing, value))) {
      result.push(value);
    }
  }
  return result;
}
