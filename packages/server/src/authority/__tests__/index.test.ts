/**
 * Authority unit tests
 */
import { beforeEach, describe, expect, it } from 'vitest';
import { EPOCH } from '@household-sync/sdk';
import type { PendingChange, SyncRequest } from '@household-sync/sdk';
import { ManualClock } from '@household-sync/sdk/testing';
import { SyncAuthority } from '../index.js';

const T0 = '2026-01-05T09:00:00.000Z';

function change(overrides: Partial<PendingChange> = {}): PendingChange {
  return {
    entityType: 'tasks',
    operation: 'create',
    entityId: 't1',
    version: 1,
    data: { title: 'Walk Rex' },
    updatedAt: T0,
    ...overrides,
  };
}

function request(
  pendingChanges: PendingChange[] = [],
  lastSyncTimestamps: Record<string, string> = { tasks: EPOCH }
): SyncRequest {
  return { lastSyncTimestamps, pendingChanges };
}

const walkRex = { title: 'Walk Rex', status: 'open', assignees: [], points: 0 };

describe('SyncAuthority', () => {
  let clock: ManualClock;
  let authority: SyncAuthority;

  beforeEach(() => {
    clock = new ManualClock();
    authority = new SyncAuthority({ now: clock.now });
  });

  describe('storing changes', () => {
    it('stores a new entity with the client version and parsed payload', () => {
      const response = authority.apply(request([change()]), 'parent-1');

      expect(response).toEqual({
        serverChanges: [],
        conflicts: [],
        rejected: [],
        accepted: [{ entityType: 'tasks', entityId: 't1', version: 1 }],
        syncTimestamp: '2026-01-05T09:00:00.001Z',
      });
      expect(authority.getRecord('tasks', 't1')).toEqual({
        collection: 'tasks',
        entityId: 't1',
        version: 1,
        data: walkRex,
        isDeleted: false,
        updatedAt: T0,
        lastModifiedBy: 'parent-1',
      });
    });

    it('keeps write stamps strictly increasing while the clock stands still', () => {
      authority.apply(request([change({ entityId: 'a' }), change({ entityId: 'b' })]), 'parent-1');

      expect(authority.getRecord('tasks', 'a')?.updatedAt).toBe(T0);
      expect(authority.getRecord('tasks', 'b')?.updatedAt).toBe('2026-01-05T09:00:00.001Z');
    });

    it('follows the clock once it moves ahead', () => {
      clock.advance(5000);

      const response = authority.apply(request([change()]), 'parent-1');

      expect(authority.getRecord('tasks', 't1')?.updatedAt).toBe('2026-01-05T09:00:05.000Z');
      expect(response.syncTimestamp).toBe('2026-01-05T09:00:05.001Z');
    });

    it('lets an actor overwrite its own writes', () => {
      authority.apply(request([change()]), 'parent-1');

      const response = authority.apply(
        request([change({ operation: 'update', version: 2, data: { title: 'Walk Rex twice' } })]),
        'parent-1'
      );

      expect(response.conflicts).toEqual([]);
      expect(response.accepted).toEqual([{ entityType: 'tasks', entityId: 't1', version: 3 }]);
      expect(authority.getRecord('tasks', 't1')).toMatchObject({
        version: 3,
        data: { title: 'Walk Rex twice' },
      });
    });

    it('numbers an update above both the stored and the sent version', () => {
      authority.apply(request([change({ version: 4 })]), 'parent-1');

      const response = authority.apply(
        request([change({ operation: 'update', version: 9, data: { title: 'Walk Rex at noon' } })]),
        'parent-1'
      );

      expect(response.accepted).toEqual([{ entityType: 'tasks', entityId: 't1', version: 10 }]);
      expect(authority.getRecord('tasks', 't1')?.version).toBe(10);
    });

    it('acknowledges a resent change without storing it again', () => {
      authority.apply(request([change()]), 'parent-1');
      const stamped = authority.getRecord('tasks', 't1')?.updatedAt;

      const response = authority.apply(request([change()]), 'parent-1');

      expect(response.conflicts).toEqual([]);
      expect(response.accepted).toEqual([{ entityType: 'tasks', entityId: 't1', version: 1 }]);
      expect(authority.getRecord('tasks', 't1')).toMatchObject({ version: 1, updatedAt: stamped });
    });

    it('keeps the last payload on a tombstone', () => {
      authority.apply(request([change()]), 'parent-1');

      authority.apply(
        request([change({ operation: 'delete', version: 2, data: {} })]),
        'parent-1'
      );

      expect(authority.getRecord('tasks', 't1')).toMatchObject({
        version: 3,
        isDeleted: true,
        data: walkRex,
      });
    });

    it('acknowledges a delete of an unknown entity without storing it', () => {
      const response = authority.apply(
        request([change({ operation: 'delete', data: {} })]),
        'parent-1'
      );

      expect(response.rejected).toEqual([]);
      expect(response.conflicts).toEqual([]);
      expect(authority.getRecord('tasks', 't1')).toBeNull();
    });
  });

  describe('rejections', () => {
    it('rejects unknown entity types permanently', () => {
      const response = authority.apply(
        request([change({ entityType: 'chores', entityId: 'c1' })]),
        'parent-1'
      );

      expect(response.rejected).toEqual([
        { entityType: 'chores', entityId: 'c1', reason: 'Unknown entity type: chores', permanent: true },
      ]);
    });

    it('rejects payloads that fail validation', () => {
      const response = authority.apply(request([change({ data: { points: 3 } })]), 'parent-1');

      expect(response.rejected).toEqual([
        {
          entityType: 'tasks',
          entityId: 't1',
          reason: 'Invalid tasks payload: title: Required',
          permanent: true,
        },
      ]);
      expect(authority.getRecord('tasks', 't1')).toBeNull();
    });
  });

  describe('conflict detection', () => {
    beforeEach(() => {
      authority.apply(request([change()]), 'parent-1');
    });

    it('reports a status conflict against a write the client has not seen', () => {
      const response = authority.apply(
        request([
          change({ operation: 'update', version: 2, data: { title: 'Walk Rex', status: 'done' } }),
        ]),
        'parent-2'
      );

      expect(response.conflicts).toEqual([
        {
          entityType: 'tasks',
          entityId: 't1',
          clientVersion: 2,
          serverVersion: 1,
          clientData: { title: 'Walk Rex', status: 'done' },
          serverData: walkRex,
          conflictType: 'status',
          serverUpdatedAt: T0,
          serverDeleted: false,
          serverModifiedBy: 'parent-1',
        },
      ]);
      expect(response.serverChanges).toEqual([]);
      expect(authority.getRecord('tasks', 't1')?.version).toBe(1);
    });

    it('reports other concurrent edits as concurrent updates', () => {
      const response = authority.apply(
        request([change({ operation: 'update', version: 2, data: { title: 'Walk the dog' } })]),
        'parent-2'
      );

      expect(response.conflicts.map((conflict) => conflict.conflictType)).toEqual([
        'concurrent_update',
      ]);
    });

    it('reports a delete against an unseen edit as a delete/update conflict', () => {
      const response = authority.apply(
        request([change({ operation: 'delete', version: 2, data: {} })]),
        'parent-2'
      );

      expect(response.conflicts.map((conflict) => conflict.conflictType)).toEqual(['delete_update']);
    });

    it('accepts an edit from a client that has seen the latest write', () => {
      const seen = authority.apply(request(), 'parent-2').syncTimestamp;

      const response = authority.apply(
        request(
          [change({ operation: 'update', version: 2, data: { title: 'Walk Rex', status: 'done' } })],
          { tasks: seen }
        ),
        'parent-2'
      );

      expect(response.conflicts).toEqual([]);
      expect(authority.getRecord('tasks', 't1')).toMatchObject({
        version: 3,
        lastModifiedBy: 'parent-2',
      });
    });

    it('reports a version rollback for a stale version', () => {
      authority.apply(
        request([change({ operation: 'update', version: 2, data: { title: 'Walk Rex tonight' } })]),
        'parent-1'
      );
      const seen = authority.apply(request(), 'parent-2').syncTimestamp;

      const response = authority.apply(
        request([change({ operation: 'update', version: 1 })], { tasks: seen }),
        'parent-2'
      );

      expect(response.conflicts).toMatchObject([
        { entityId: 't1', clientVersion: 1, serverVersion: 3, conflictType: 'version_rollback' },
      ]);
    });
  });

  describe('server changes', () => {
    it('returns writes newer than the marker, oldest first', () => {
      authority.apply(request([change({ entityId: 'b' }), change({ entityId: 'a' })]), 'parent-1');

      const response = authority.apply(request(), 'parent-2');

      expect(response.serverChanges).toEqual([
        {
          entityType: 'tasks',
          operation: 'update',
          entityId: 'b',
          version: 1,
          data: walkRex,
          updatedAt: T0,
          lastModifiedBy: 'parent-1',
        },
        {
          entityType: 'tasks',
          operation: 'update',
          entityId: 'a',
          version: 1,
          data: walkRex,
          updatedAt: '2026-01-05T09:00:00.001Z',
          lastModifiedBy: 'parent-1',
        },
      ]);
    });

    it('returns nothing older than the marker', () => {
      const marker = authority.apply(request([change()]), 'parent-1').syncTimestamp;

      expect(authority.apply(request([], { tasks: marker }), 'parent-2').serverChanges).toEqual([]);
    });

    it('only returns collections the client asked about', () => {
      authority.apply(request([change()]), 'parent-1');

      expect(
        authority.apply(request([], { events: EPOCH }), 'parent-2').serverChanges
      ).toEqual([]);
    });

    it('sends tombstones as deletes', () => {
      authority.apply(request([change()]), 'parent-1');
      authority.apply(request([change({ operation: 'delete', version: 2, data: {} })]), 'parent-1');

      const [tombstone] = authority.apply(request(), 'parent-2').serverChanges;

      expect(tombstone).toMatchObject({ entityId: 't1', operation: 'delete', version: 3 });
    });
  });

  it('counts changes per collection', () => {
    authority.apply(
      request([
        change({ entityId: 'a' }),
        change({ entityId: 'b' }),
        change({
          entityType: 'ledger_entries',
          entityId: 'l1',
          data: { userId: 'kid-1', delta: 5, reason: 'Walked Rex' },
        }),
      ]),
      'parent-1'
    );

    expect(authority.getStats()).toEqual({
      totalChanges: 3,
      byEntity: { tasks: 2, events: 0, ledger_entries: 1 },
      timeRange: { start: EPOCH, end: T0 },
    });
    expect(authority.getStats('2026-01-05T09:00:00.001Z').totalChanges).toBe(1);
  });
});
