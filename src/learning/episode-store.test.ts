import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../db/index.js';
import { InvalidStateError } from '../errors.js';
import type { LearningEvent } from '../types.js';
import { MemoryEpisodeStore, SqliteEpisodeStore, participantsOf } from './episode-store.js';

function episode(id: string, recordedAt: string, success = true): LearningEvent {
    return {
        id,
        taskId: `task-${id}`,
        teamId: `team-${id}`,
        team: {
            id: `team-${id}`,
            taskId: `task-${id}`,
            members: [{ agentId: 'A', role: 'research', capability: 'research', score: 0.9 }],
            vacated: [{ agentId: 'B', role: 'writing', capability: 'writing', score: 0.8 }],
            requirement: { required: [{ capability: 'research', minProficiency: 0.7 }], teamSize: { min: 1, max: 2 } },
            formedAt: recordedAt,
            status: success ? 'RELEASED' : 'FAILED',
        },
        negotiation: { negotiationId: `n-${id}`, status: 'RESOLVED', rounds: [], resolution: [] },
        metrics: { success, durationMs: 50, rounds: 1, replacements: 1 },
        recordedAt,
    };
}

describe('participantsOf', () => {
    it('should list members and vacated members', () => {
        expect(participantsOf(episode('1', '2026-06-01T00:00:00.000Z'))).toEqual([
            { agentId: 'A', role: 'research' },
            { agentId: 'B', role: 'writing' },
        ]);
    });
});

describe('MemoryEpisodeStore', () => {
    it('should refuse to record the same episode twice', async () => {
        const store = new MemoryEpisodeStore();
        await store.append(episode('1', '2026-06-01T00:00:00.000Z'));
        await expect(store.append(episode('1', '2026-06-01T00:00:00.000Z'))).rejects.toBeInstanceOf(InvalidStateError);
    });
});

describe('SqliteEpisodeStore', () => {
    let database: Database.Database;
    let store: SqliteEpisodeStore;

    beforeEach(() => {
        database = openDatabase(':memory:');
        store = new SqliteEpisodeStore(database);
    });

    afterEach(() => {
        database.close();
    });

    it('should round-trip an episode', async () => {
        const event = episode('1', '2026-06-01T00:00:00.000Z');
        await store.append(event);

        expect(await store.get('1')).toEqual(event);
        expect(await store.get('missing')).toBeUndefined();
        expect(await store.byTask('task-1')).toEqual([event]);
        expect(await store.byTeam('team-1')).toEqual([event]);
    });

    it('should index episodes by every participating agent', async () => {
        await store.append(episode('1', '2026-06-01T00:00:00.000Z'));
        await store.append(episode('2', '2026-06-02T00:00:00.000Z', false));

        expect((await store.byAgent('B')).map(e => e.id)).toEqual(['1', '2']);
        expect(await store.byAgent('Z')).toEqual([]);
        expect((await store.recent(1)).map(e => e.id)).toEqual(['2']);
    });

    it('should reject a duplicate episode id', async () => {
        await store.append(episode('1', '2026-06-01T00:00:00.000Z'));
        await expect(store.append(episode('1', '2026-06-01T00:00:00.000Z'))).rejects.toThrow();
    });
});
