/**
 * EntityStore unit tests
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError, StorageCorruptionError, ValidationError } from '../../errors.js';
import { Outbox } from '../../outbox/index.js';
import { ManualClock, createTestDatabase, silentLogger } from '../../testing/index.js';
import { EntityStore } from '../entity-store.js';
import type { HouseholdDatabase } from '../init.js';

describe('EntityStore', () => {
  let db: HouseholdDatabase;
  let clock: ManualClock;
  let outbox: Outbox;
  let store: EntityStore;

  beforeEach(async () => {
    db = await createTestDatabase('store');
    clock = new ManualClock();
    outbox = new Outbox(db.outbox_entries, { now: clock.now });
    store = new EntityStore(db, outbox, {
      actorId: 'parent-1',
      now: clock.now,
      logger: silentLogger(),
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('put', () => {
    it('creates a dirty record at version 1 with payload defaults', async () => {
      const record = await store.put('tasks', 't1', { title: 'Take out bins' });

      expect(record).toEqual({
        id: 't1',
        collection: 'tasks',
        version: 1,
        updatedAt: '2026-01-05T09:00:00.000Z',
        isDirty: true,
        isDeleted: false,
        lastModifiedBy: 'parent-1',
        payload: { title: 'Take out bins', status: 'open', assignees: [], points: 0 },
      });
      expect(await store.get('tasks', 't1')).toEqual(record);
    });

    it('queues a create entry carrying the snapshot', async () => {
      await store.put('tasks', 't1', { title: 'Take out bins', points: 2 });

      const [entry] = await outbox.pendingEntries();
      expect(entry.operation).toBe('create');
      expect(entry.entityId).toBe('t1');
      expect(entry.recordVersion).toBe(1);
      expect(entry.snapshot).toEqual({
        title: 'Take out bins',
        status: 'open',
        assignees: [],
        points: 2,
      });
    });

    it('merges updates into the existing payload and bumps the version', async () => {
      await store.put('tasks', 't1', { title: 'Take out bins', assignees: ['kid-1'] });
      clock.advance(1000);

      const record = await store.put('tasks', 't1', { status: 'done' });

      expect(record.version).toBe(2);
      expect(record.updatedAt).toBe('2026-01-05T09:00:01.000Z');
      expect(record.payload).toEqual({
        title: 'Take out bins',
        status: 'done',
        assignees: ['kid-1'],
        points: 0,
      });

      const pending = await outbox.pendingEntries();
      expect(pending).toHaveLength(1);
      expect(pending[0].operation).toBe('create');
      expect(pending[0].recordVersion).toBe(2);
    });

    it('removes fields set to undefined', async () => {
      await store.put('tasks', 't1', { title: 'Water plants', category: 'garden' });
      const record = await store.put('tasks', 't1', { category: undefined });

      expect(record.payload).toEqual({ title: 'Water plants', status: 'open', assignees: [], points: 0 });
    });

    it('keeps unknown payload fields', async () => {
      const record = await store.put('tasks', 't1', { title: 'Feed cat', room: 'kitchen' });

      expect(record.payload.room).toBe('kitchen');
    });

    it('rejects an invalid payload without storing or queueing anything', async () => {
      await expect(store.put('tasks', 't1', { title: '' })).rejects.toBeInstanceOf(ValidationError);

      expect(await store.get('tasks', 't1')).toBeNull();
      expect(await outbox.pendingEntries()).toHaveLength(0);
    });

    it('reports the failing field of an event payload', async () => {
      const error = await store
        .put('events', 'e1', {
          title: 'Dentist',
          start: '2026-01-10T10:00:00.000Z',
          end: '2026-01-10T09:00:00.000Z',
        })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual([{ path: 'end', message: 'end must not be before start' }]);
      }
    });

    it('refuses to write a tombstoned id', async () => {
      await store.put('tasks', 't1', { title: 'Sweep' });
      await store.delete('tasks', 't1');

      await expect(store.put('tasks', 't1', { title: 'Sweep again' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('rolls back a new record when the enqueue fails', async () => {
      const failing = new EntityStore(
        db,
        { enqueue: vi.fn().mockRejectedValue(new Error('disk full')) },
        { actorId: 'parent-1', now: clock.now, logger: silentLogger() }
      );

      await expect(failing.put('tasks', 't1', { title: 'Sweep' })).rejects.toThrow('disk full');
      expect(await failing.get('tasks', 't1')).toBeNull();
    });

    it('restores the previous state when the enqueue of an update fails', async () => {
      const enqueue = vi
        .fn()
        .mockResolvedValueOnce('entry-1')
        .mockRejectedValueOnce(new Error('disk full'));
      const flaky = new EntityStore(db, { enqueue }, { actorId: 'parent-1', now: clock.now });

      await flaky.put('tasks', 't1', { title: 'Sweep' });
      await expect(flaky.put('tasks', 't1', { title: 'Mop' })).rejects.toThrow('disk full');

      const record = await flaky.get('tasks', 't1');
      expect(record?.version).toBe(1);
      expect(record?.payload.title).toBe('Sweep');
    });

    it('serializes concurrent writes to the same record', async () => {
      await Promise.all(
        Array.from({ length: 10 }, (_, i) => store.put('tasks', 't1', { title: 'Count', points: i }))
      );

      const record = await store.get('tasks', 't1');
      expect(record?.version).toBe(10);
      expect(record?.payload.points).toBe(9);
      expect(await outbox.pendingEntries()).toHaveLength(1);
    });
  });

  describe('delete', () => {
    it('tombstones the record and queues a delete', async () => {
      await store.put('tasks', 't1', { title: 'Sweep' });
      const record = await store.delete('tasks', 't1');

      expect(record.isDeleted).toBe(true);
      expect(record.isDirty).toBe(true);
      expect(record.version).toBe(2);
      expect(record.payload.title).toBe('Sweep');

      const pending = await outbox.pendingEntries();
      expect(pending).toHaveLength(1);
      expect(pending[0].operation).toBe('delete');
      expect(pending[0].recordVersion).toBe(2);
    });

    it('returns an existing tombstone unchanged', async () => {
      await store.put('tasks', 't1', { title: 'Sweep' });
      await store.delete('tasks', 't1');
      const again = await store.delete('tasks', 't1');

      expect(again.version).toBe(2);
    });

    it('throws NotFoundError for an unknown id', async () => {
      await expect(store.delete('tasks', 'missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('query', () => {
    beforeEach(async () => {
      await store.put('tasks', 'a', { title: 'Dishes', points: 5 });
      await store.put('tasks', 'b', { title: 'Laundry', points: 1 });
      await store.put('tasks', 'c', { title: 'Vacuum', points: 3 });
      await store.put('tasks', 'd', { title: 'Recycling', points: 0 });
      await store.delete('tasks', 'c');
    });

    it('filters, sorts and excludes tombstones', async () => {
      const records = await store.query('tasks', (record) => record.payload.points > 0, {
        sort: { field: 'payload.points', direction: 'desc' },
      });

      expect(records.map((record) => record.id)).toEqual(['a', 'b']);
    });

    it('includes tombstones on request', async () => {
      const records = await store.query('tasks', undefined, {
        includeDeleted: true,
        sort: { field: 'id' },
      });

      expect(records.map((record) => record.id)).toEqual(['a', 'b', 'c', 'd']);
    });

    it('pages with offset and limit', async () => {
      const records = await store.query('tasks', undefined, {
        sort: { field: 'payload.title' },
        offset: 1,
        limit: 2,
      });

      expect(records.map((record) => record.payload.title)).toEqual(['Laundry', 'Recycling']);
    });
  });

  describe('dirtyRecords and markClean', () => {
    it('lists dirty records oldest first', async () => {
      await store.put('tasks', 't2', { title: 'Second id, first write' });
      clock.advance(1000);
      await store.put('tasks', 't1', { title: 'First id, second write' });

      const dirty = await store.dirtyRecords('tasks');
      expect(dirty.map((record) => record.id)).toEqual(['t2', 't1']);
    });

    it('only cleans records still at the acknowledged version', async () => {
      await store.put('tasks', 't1', { title: 'Sweep' });
      await store.put('tasks', 't1', { title: 'Sweep the porch' });

      expect(await store.markClean('tasks', ['t1'], { versions: new Map([['t1', 1]]) })).toBe(0);
      expect((await store.get('tasks', 't1'))?.isDirty).toBe(true);

      expect(await store.markClean('tasks', ['t1'], { versions: new Map([['t1', 2]]) })).toBe(1);
      expect((await store.get('tasks', 't1'))?.isDirty).toBe(false);
    });

    it('takes the version the authority assigned', async () => {
      await store.put('tasks', 't1', { title: 'Sweep' });

      await store.markClean('tasks', ['t1'], {
        versions: new Map([['t1', 1]]),
        serverVersions: new Map([['t1', 4]]),
      });

      expect(await store.get('tasks', 't1')).toMatchObject({ version: 4, isDirty: false });
    });
  });

  describe('applyRemote', () => {
    it('stores authority state as clean without queueing', async () => {
      const record = await store.applyRemote('tasks', 't9', { title: 'From server' }, 4, {
        updatedAt: '2026-01-04T00:00:00.000Z',
        lastModifiedBy: 'parent-2',
      });

      expect(record).toEqual({
        id: 't9',
        collection: 'tasks',
        version: 4,
        updatedAt: '2026-01-04T00:00:00.000Z',
        isDirty: false,
        isDeleted: false,
        lastModifiedBy: 'parent-2',
        payload: { title: 'From server', status: 'open', assignees: [], points: 0 },
      });
      expect(await outbox.pendingEntries()).toHaveLength(0);
    });

    it('is a no-op when the same version is applied twice', async () => {
      await store.applyRemote('tasks', 't9', { title: 'From server' }, 4);
      clock.advance(5000);
      const again = await store.applyRemote('tasks', 't9', { title: 'From server' }, 4);

      expect(again?.updatedAt).toBe('2026-01-05T09:00:00.000Z');
    });

    it('never lowers the version unless rollback is allowed', async () => {
      await store.applyRemote('tasks', 't9', { title: 'v4' }, 4);

      const kept = await store.applyRemote('tasks', 't9', { title: 'v2' }, 2);
      expect(kept?.version).toBe(4);

      const rolledBack = await store.applyRemote('tasks', 't9', { title: 'v2' }, 2, {
        allowRollback: true,
      });
      expect(rolledBack?.version).toBe(2);
    });

    it('tombstones a known record and keeps its payload when none is sent', async () => {
      await store.applyRemote('tasks', 't9', { title: 'Old chore' }, 1);
      const record = await store.applyRemote('tasks', 't9', {}, 2, { isDeleted: true });

      expect(record?.isDeleted).toBe(true);
      expect(record?.payload.title).toBe('Old chore');
    });

    it('ignores deletes of records it never had', async () => {
      expect(await store.applyRemote('tasks', 'ghost', {}, 2, { isDeleted: true })).toBeNull();
    });
  });

  describe('applyRemoteIfCurrent', () => {
    it('writes while the record is still at the expected version', async () => {
      await store.applyRemote('tasks', 't1', { title: 'Walk dog' }, 1);

      const result = await store.applyRemoteIfCurrent('tasks', 't1', { title: 'Walk Rex' }, 2, 1);

      expect(result.status).toBe('applied');
      expect(await store.get('tasks', 't1')).toMatchObject({ version: 2, payload: { title: 'Walk Rex' } });
    });

    it('reports a record that moved on and leaves it alone', async () => {
      await store.applyRemote('tasks', 't1', { title: 'Walk dog' }, 1);
      await store.put('tasks', 't1', { title: 'Walk the dog' });

      const result = await store.applyRemoteIfCurrent('tasks', 't1', { title: 'Walk Rex' }, 2, 1);

      expect(result).toMatchObject({ status: 'stale', current: { version: 2, isDirty: true } });
      expect((await store.get('tasks', 't1'))?.payload.title).toBe('Walk the dog');
    });

    it('treats a record created since the read as stale', async () => {
      await store.put('tasks', 't1', { title: 'Walk the dog' });

      const result = await store.applyRemoteIfCurrent('tasks', 't1', { title: 'Walk Rex' }, 1, null);

      expect(result.status).toBe('stale');
    });
  });

  describe('rebase', () => {
    it('writes above both versions and keeps the record queued', async () => {
      await store.put('tasks', 't1', { title: 'Sweep' });

      const record = await store.rebase('tasks', 't1', { title: 'Sweep', points: 3 }, {
        isDeleted: false,
        baseVersion: 4,
      });

      expect(record.version).toBe(5);
      expect(record.isDirty).toBe(true);

      const pending = await outbox.pendingEntries();
      expect(pending).toHaveLength(1);
      expect(pending[0].recordVersion).toBe(5);
      expect(pending[0].snapshot).toEqual({ title: 'Sweep', status: 'open', assignees: [], points: 3 });
    });

    it('writes nothing when the record moved past the expected version', async () => {
      await store.put('tasks', 't1', { title: 'Sweep' });
      await store.put('tasks', 't1', { title: 'Sweep the porch' });

      const result = await store.rebaseIfCurrent('tasks', 't1', { title: 'Sweep' }, {
        isDeleted: false,
        baseVersion: 4,
        expectedVersion: 1,
      });

      expect(result).toMatchObject({ status: 'stale', current: { version: 2 } });
      expect((await store.get('tasks', 't1'))?.payload.title).toBe('Sweep the porch');
    });
  });

  describe('purge and recreate', () => {
    async function syncedTombstone(id: string): Promise<void> {
      await store.put('tasks', id, { title: 'Old chore' });
      await store.delete('tasks', id);
      await store.markClean('tasks', [id]);
    }

    it('removes a synced tombstone and retires its id', async () => {
      await syncedTombstone('t1');

      await store.purge('tasks', 't1');

      expect(await store.get('tasks', 't1')).toBeNull();
      expect(await store.isRetired('tasks', 't1')).toBe(true);
      await expect(store.put('tasks', 't1', { title: 'Reuse' })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(await store.applyRemote('tasks', 't1', { title: 'Remote reuse' }, 9)).toBeNull();
    });

    it('refuses to purge a tombstone that has not been synced', async () => {
      await store.put('tasks', 't1', { title: 'Old chore' });
      await store.delete('tasks', 't1');

      await expect(store.purge('tasks', 't1')).rejects.toBeInstanceOf(ValidationError);
    });

    it('recreates under a freshly minted id', async () => {
      const minting = new EntityStore(db, outbox, {
        actorId: 'parent-1',
        now: clock.now,
        generateId: () => 'fresh-1',
      });
      await syncedTombstone('t1');

      const record = await minting.recreate('tasks', 't1', { title: 'Old chore, again' });

      expect(record.id).toBe('fresh-1');
      expect(record.version).toBe(1);
      expect(await minting.get('tasks', 't1')).toBeNull();
      expect(await minting.isRetired('tasks', 't1')).toBe(true);
    });

    it('refuses to recreate a live record', async () => {
      await store.put('tasks', 't1', { title: 'Still here' });

      await expect(store.recreate('tasks', 't1', { title: 'Copy' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  describe('count', () => {
    it('counts live records, optionally by dirty flag', async () => {
      await store.put('tasks', 'a', { title: 'Dishes' });
      await store.put('tasks', 'b', { title: 'Laundry' });
      await store.applyRemote('tasks', 'c', { title: 'Vacuum' }, 1);
      await store.delete('tasks', 'a');

      expect(await store.count('tasks')).toBe(2);
      expect(await store.count('tasks', { dirty: true })).toBe(1);
      expect(await store.count('tasks', { includeDeleted: true })).toBe(3);
    });
  });

  it('raises StorageCorruptionError for a stored record that no longer parses', async () => {
    await db.tasks.insert({
      id: 'bad',
      entityType: 'tasks',
      version: 1,
      updatedAt: '2026-01-05T09:00:00.000Z',
      isDirty: false,
      isDeleted: false,
      lastModifiedBy: 'parent-1',
      payload: { title: 42 },
    });

    await expect(store.get('tasks', 'bad')).rejects.toBeInstanceOf(StorageCorruptionError);
  });
});
