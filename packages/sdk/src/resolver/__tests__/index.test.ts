/**
 * Conflict resolver unit tests
 */
import { describe, expect, it } from 'vitest';
import { ConflictResolver, statusRank } from '../index.js';
import type { ConflictInput, RecordSnapshot, ResolvableRecord } from '../index.js';

function task(overrides: Partial<ResolvableRecord> = {}): ResolvableRecord {
  return {
    collection: 'tasks',
    version: 2,
    updatedAt: '2026-01-05T09:00:00.000Z',
    isDeleted: false,
    payload: { title: 'Walk the dog', status: 'open', assignees: ['kid-1'], points: 2 },
    ...overrides,
  };
}

function snapshot(overrides: Partial<RecordSnapshot> = {}): RecordSnapshot {
  return {
    payload: { title: 'Walk the dog', status: 'open', assignees: ['kid-1'], points: 2 },
    isDeleted: false,
    updatedAt: '2026-01-05T09:00:00.000Z',
    version: 2,
    lastModifiedBy: 'parent-1',
    ...overrides,
  };
}

function conflict(client: Partial<RecordSnapshot>, server: Partial<RecordSnapshot>): ConflictInput {
  return {
    collection: 'tasks',
    clientSnapshot: snapshot(client),
    serverSnapshot: snapshot({ lastModifiedBy: 'parent-2', ...server }),
  };
}

describe('statusRank', () => {
  it('orders open below pendingApproval below done', () => {
    expect([statusRank('open'), statusRank('pendingApproval'), statusRank('done')]).toEqual([0, 1, 2]);
  });

  it('returns null for unknown values', () => {
    expect(statusRank('archived')).toBeNull();
    expect(statusRank(3)).toBeNull();
  });
});

describe('ConflictResolver', () => {
  const resolver = new ConflictResolver();

  describe('resolve', () => {
    it('lets a server delete win over a client edit', () => {
      const resolution = resolver.resolve(
        task({ version: 3, payload: { title: 'Edited', status: 'open' } }),
        task({ version: 4, isDeleted: true })
      );

      expect(resolution).toMatchObject({
        strategy: 'deleteWins',
        winner: 'server',
        isDeleted: true,
        resolvedVersion: 4,
      });
    });

    it('lets a client delete win over a server edit', () => {
      const resolution = resolver.resolve(
        task({ isDeleted: true, version: 5 }),
        task({ version: 3, payload: { title: 'Edited' } })
      );

      expect(resolution).toMatchObject({ strategy: 'deleteWins', winner: 'client', resolvedVersion: 5 });
    });

    it('treats identical payloads as agreement', () => {
      const resolution = resolver.resolve(
        task({ updatedAt: '2026-01-05T10:00:00.000Z' }),
        task({ version: 3 })
      );

      expect(resolution).toMatchObject({ strategy: 'identical', winner: 'server', resolvedVersion: 3 });
    });

    it('prefers the more advanced task status regardless of timestamps', () => {
      const resolution = resolver.resolve(
        task({
          payload: { title: 'Walk the dog', status: 'done' },
          updatedAt: '2026-01-05T08:00:00.000Z',
        }),
        task({
          payload: { title: 'Walk the dog', status: 'pendingApproval' },
          updatedAt: '2026-01-05T09:30:00.000Z',
        })
      );

      expect(resolution).toMatchObject({ strategy: 'statusPriority', winner: 'client' });
      expect(resolution.resolvedPayload).toEqual({ title: 'Walk the dog', status: 'done' });
    });

    it('ignores status outside status collections', () => {
      const resolution = resolver.resolve(
        task({
          collection: 'events',
          payload: { title: 'Picnic', status: 'done' },
          updatedAt: '2026-01-05T08:00:00.000Z',
        }),
        task({
          collection: 'events',
          payload: { title: 'Picnic', status: 'open' },
          updatedAt: '2026-01-05T09:00:00.000Z',
        })
      );

      expect(resolution).toMatchObject({ strategy: 'lastWriterWins', winner: 'server' });
    });

    it('takes the newer side when statuses agree', () => {
      const resolution = resolver.resolve(
        task({ payload: { title: 'Walk the dog twice', status: 'open' }, updatedAt: '2026-01-05T09:00:05.000Z' }),
        task({ payload: { title: 'Walk the cat', status: 'open' } })
      );

      expect(resolution).toMatchObject({ strategy: 'lastWriterWins', winner: 'client' });
      expect(resolution.resolvedPayload).toEqual({ title: 'Walk the dog twice', status: 'open' });
    });

    it('compares timestamps as instants, not strings', () => {
      const resolution = resolver.resolve(
        task({ payload: { title: 'A' }, updatedAt: '2026-01-05T10:00:00.000+02:00' }),
        task({ payload: { title: 'B' }, updatedAt: '2026-01-05T09:00:00.000Z' })
      );

      expect(resolution).toMatchObject({ strategy: 'lastWriterWins', winner: 'server' });
    });

    it('asks for review on a timestamp tie', () => {
      const resolution = resolver.resolve(
        task({ payload: { title: 'A', status: 'open' } }),
        task({ payload: { title: 'B', status: 'open' } })
      );

      expect(resolution).toEqual({
        strategy: 'manualReview',
        needsManualReview: true,
        resolvedPayload: null,
        unresolvedFields: [],
        explanation: 'Equal timestamps with differing fields',
      });
    });
  });

  describe('merge', () => {
    it('unions arrays and takes the larger number', () => {
      const resolution = resolver.merge(
        conflict(
          { payload: { title: 'Walk the dog', assignees: ['kid-1', 'kid-2'], points: 2 }, version: 3 },
          { payload: { title: 'Walk the dog', assignees: ['kid-1', 'kid-3'], points: 5 }, version: 4 }
        )
      );

      expect(resolution).toMatchObject({ strategy: 'merge', winner: 'merged', resolvedVersion: 4 });
      expect(resolution.resolvedPayload).toEqual({
        title: 'Walk the dog',
        assignees: ['kid-1', 'kid-2', 'kid-3'],
        points: 5,
      });
    });

    it('keeps fields present on one side only', () => {
      const resolution = resolver.merge(
        conflict(
          { payload: { title: 'Walk the dog', category: 'pets' } },
          { payload: { title: 'Walk the dog', dueAt: '2026-01-06T18:00:00.000Z' } }
        )
      );

      expect(resolution.resolvedPayload).toEqual({
        title: 'Walk the dog',
        category: 'pets',
        dueAt: '2026-01-06T18:00:00.000Z',
      });
    });

    it('lists scalar fields without a pick as unresolved', () => {
      const resolution = resolver.merge(
        conflict({ payload: { title: 'Walk the dog', status: 'open' } }, { payload: { title: 'Walk Rex', status: 'done' } })
      );

      expect(resolution).toMatchObject({
        strategy: 'manualReview',
        unresolvedFields: ['title', 'status'],
        explanation: 'Pick a side for: title, status',
      });
    });

    it('applies field picks', () => {
      const resolution = resolver.merge(
        conflict({ payload: { title: 'Walk the dog', status: 'open' } }, { payload: { title: 'Walk Rex', status: 'done' } }),
        { title: 'client', status: 'server' }
      );

      expect(resolution.resolvedPayload).toEqual({ title: 'Walk the dog', status: 'done' });
    });

    it('refuses to merge a deleted side', () => {
      const input = conflict({}, { isDeleted: true });

      expect(resolver.canMerge(input)).toBe(false);
      expect(resolver.merge(input)).toMatchObject({
        strategy: 'manualReview',
        explanation: 'Deleted records cannot be merged',
      });
    });
  });

  describe('getDiff', () => {
    it('flags the fields that differ', () => {
      const diff = resolver.getDiff(
        conflict({ payload: { title: 'Walk the dog', points: 2 } }, { payload: { title: 'Walk the dog', points: 3 } })
      );

      expect(diff).toEqual({
        title: { clientValue: 'Walk the dog', serverValue: 'Walk the dog', hasConflict: false },
        points: { clientValue: 2, serverValue: 3, hasConflict: true },
      });
    });
  });

  describe('classifyConflict', () => {
    it('labels deletes, status changes and plain edits', () => {
      expect(resolver.classifyConflict(task({ isDeleted: true }), task())).toBe('deleteUpdate');
      expect(
        resolver.classifyConflict(task(), task({ payload: { title: 'Walk the dog', status: 'done' } }))
      ).toBe('status');
      expect(resolver.classifyConflict(task(), task({ payload: { title: 'Walk Rex', status: 'open' } }))).toBe(
        'concurrentUpdate'
      );
    });
  });

  it('honours configured status collections', () => {
    const custom = new ConflictResolver({ statusCollections: ['events'] });

    const resolution = custom.resolve(
      task({ collection: 'events', payload: { title: 'Picnic', status: 'done' }, updatedAt: '2026-01-05T08:00:00.000Z' }),
      task({ collection: 'events', payload: { title: 'Picnic', status: 'open' } })
    );

    expect(resolution).toMatchObject({ strategy: 'statusPriority', winner: 'client' });
  });
});
