/**
 * Conflict store unit tests
 */
import { firstValueFrom } from 'rxjs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NotFoundError, StorageCorruptionError } from '../../errors.js';
import type { RecordSnapshot } from '../../resolver/index.js';
import type { HouseholdDatabase } from '../../storage/init.js';
import { ManualClock, createTestDatabase } from '../../testing/index.js';
import { ConflictStore } from '../index.js';
import type { RecordConflictInput } from '../index.js';

function snapshot(title: string, version: number): RecordSnapshot {
  return {
    payload: { title, status: 'open' },
    isDeleted: false,
    updatedAt: '2026-01-05T09:00:00.000Z',
    version,
    lastModifiedBy: 'parent-1',
  };
}

function input(entityId: string, overrides: Partial<RecordConflictInput> = {}): RecordConflictInput {
  return {
    collection: 'tasks',
    entityId,
    clientSnapshot: snapshot('Client title', 2),
    serverSnapshot: snapshot('Server title', 3),
    kind: 'concurrentUpdate',
    ...overrides,
  };
}

describe('ConflictStore', () => {
  let db: HouseholdDatabase;
  let clock: ManualClock;
  let conflicts: ConflictStore;
  let idCounter: number;

  beforeEach(async () => {
    db = await createTestDatabase('conflicts');
    clock = new ManualClock();
    idCounter = 0;
    conflicts = new ConflictStore(db.conflicts, {
      now: clock.now,
      generateId: () => `conflict-${++idCounter}`,
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('records a pending conflict awaiting review', async () => {
    const conflict = await conflicts.record(input('t1'));

    expect(conflict).toEqual({
      conflictId: 'conflict-1',
      collection: 'tasks',
      entityId: 't1',
      clientVersion: 2,
      serverVersion: 3,
      clientSnapshot: snapshot('Client title', 2),
      serverSnapshot: snapshot('Server title', 3),
      kind: 'concurrentUpdate',
      resolution: null,
      needsManualReview: true,
      status: 'pending',
      detectedAt: '2026-01-05T09:00:00.000Z',
      resolvedAt: null,
    });
    expect(await conflicts.get('conflict-1')).toEqual(conflict);
  });

  it('refreshes the pending conflict of an entity instead of adding another', async () => {
    await conflicts.record(input('t1'));
    clock.advance(60_000);

    const refreshed = await conflicts.record(
      input('t1', { serverSnapshot: snapshot('Newer server title', 4), kind: 'status' })
    );

    expect(refreshed.conflictId).toBe('conflict-1');
    expect(refreshed.serverVersion).toBe(4);
    expect(refreshed.kind).toBe('status');
    expect(refreshed.detectedAt).toBe('2026-01-05T09:01:00.000Z');
    expect(await conflicts.pendingCount()).toBe(1);
  });

  it('lists pending conflicts oldest first, optionally by collection', async () => {
    await conflicts.record(input('t1'));
    clock.advance(1000);
    await conflicts.record(input('e1', { collection: 'events' }));
    clock.advance(1000);
    await conflicts.record(input('t2'));

    expect((await conflicts.pending()).map((conflict) => conflict.entityId)).toEqual(['t1', 'e1', 't2']);
    expect((await conflicts.pending('tasks')).map((conflict) => conflict.entityId)).toEqual(['t1', 't2']);
    expect((await conflicts.pendingFor('events', 'e1'))?.conflictId).toBe('conflict-2');
  });

  it('moves a resolved conflict out of the pending list', async () => {
    await conflicts.record(input('t1'));
    clock.advance(5000);

    const resolved = await conflicts.markResolved('conflict-1', 'keepServer');

    expect(resolved).toMatchObject({
      status: 'resolved',
      resolution: 'keepServer',
      needsManualReview: false,
      resolvedAt: '2026-01-05T09:00:05.000Z',
    });
    expect(await conflicts.pending()).toEqual([]);
    expect(await conflicts.resolved()).toHaveLength(1);
    expect(await conflicts.pendingFor('tasks', 't1')).toBeNull();
  });

  it('opens a new conflict once the previous one is resolved', async () => {
    await conflicts.record(input('t1'));
    await conflicts.markResolved('conflict-1', 'automatic');

    const next = await conflicts.record(input('t1'));

    expect(next.conflictId).toBe('conflict-2');
  });

  it('records automatic resolutions without asking for review', async () => {
    const conflict = await conflicts.record(input('t1', { needsManualReview: false }));

    expect(conflict.needsManualReview).toBe(false);
  });

  it('throws NotFoundError when resolving an unknown conflict', async () => {
    await expect(conflicts.markResolved('missing', 'keepClient')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('emits the pending count', async () => {
    await conflicts.record(input('t1'));
    await conflicts.record(input('t2'));

    expect(await firstValueFrom(conflicts.observePendingCount$())).toBe(2);
  });

  it('raises StorageCorruptionError for an unreadable row', async () => {
    await db.conflicts.insert({
      conflictId: 'broken',
      entityType: 'tasks',
      entityId: 't1',
      clientVersion: 1,
      serverVersion: 2,
      clientSnapshot: { payload: 'not an object' },
      serverSnapshot: {},
      kind: 'concurrentUpdate',
      resolution: null,
      needsManualReview: true,
      status: 'pending',
      detectedAt: '2026-01-05T09:00:00.000Z',
      resolvedAt: null,
    });

    await expect(conflicts.get('broken')).rejects.toBeInstanceOf(StorageCorruptionError);
  });
});
