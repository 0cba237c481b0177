import { describe, it, expect, afterEach } from 'vitest';
import { fileURLToPath } from 'url';
import type Database from 'better-sqlite3';
import { openDatabase } from '../db/index.js';
import { ValidationError } from '../errors.js';
import { SqliteEpisodeStore } from '../learning/episode-store.js';
import { defaultGlobalConfig } from '../types.js';
import { runScenario } from './commands/simulate.js';
import { loadScenario, parseScenario } from './scenario.js';

const examplePath = fileURLToPath(new URL('../../examples/scenario.json', import.meta.url));

function fieldOf(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        if (error instanceof ValidationError) return error.details.field;
        throw error;
    }
    return undefined;
}

describe('parseScenario', () => {
    it('should fill in defaults for names and agenda items', () => {
        const scenario = parseScenario({
            agents: [{ id: 'a', capabilities: [{ kind: 'coding', proficiency: 0.7 }], behavior: { departOnExecute: true } }],
            tasks: [
                {
                    requirement: { required: [{ capability: 'coding', minProficiency: 0.5 }], teamSize: { min: 1, max: 1 } },
                    agenda: { items: [{ id: 'build', capability: 'coding' }] },
                },
            ],
        });

        expect(scenario.agents[0].behavior.departOnExecute).toBe(true);
        expect(scenario.tasks[0].name).toBe('task-1');
        expect(scenario.tasks[0].agenda?.items[0]).toEqual({
            id: 'build',
            kind: 'subtask',
            capability: 'coding',
            minProficiency: 0,
            cost: 1,
        });
    });

    it('should point at the offending field', () => {
        expect(fieldOf(() => parseScenario({ agents: [], tasks: 'none' }))).toBe('tasks');
        expect(
            fieldOf(() => parseScenario({ agents: [{ id: 'a', capabilities: [{ kind: 'juggling', proficiency: 1 }] }], tasks: [] }))
        ).toBe('agents[0].capabilities[0].kind');
        expect(
            fieldOf(() =>
                parseScenario({
                    agents: [],
                    tasks: [{ requirement: { required: [], teamSize: { min: 1, max: 1 }, priority: 'urgent' } }],
                })
            )
        ).toBe('tasks[0].requirement.priority');
    });

    it('should load the bundled example', () => {
        const scenario = loadScenario(examplePath);
        expect(scenario.agents.map(a => a.registration.id)).toEqual(['agent-a', 'agent-b', 'agent-c', 'agent-d']);
        expect(scenario.tasks.map(t => t.name)).toEqual(['market-brief', 'review-pass']);
    });
});

describe('runScenario', () => {
    let database: Database.Database | undefined;

    afterEach(() => {
        database?.close();
        database = undefined;
    });

    it('should run the example tasks one after another', async () => {
        const results = await runScenario(loadScenario(examplePath), { config: defaultGlobalConfig });

        expect(results.map(r => [r.name, r.task.status])).toEqual([
            ['market-brief', 'COMPLETED'],
            ['review-pass', 'COMPLETED'],
        ]);

        // agent-b's writing has gone stale, so agent-c takes the writing role
        const [brief, review] = results;
        expect(brief.members.map(m => [m.agentId, m.role])).toEqual([
            ['agent-a', 'research'],
            ['agent-c', 'writing'],
        ]);
        expect(brief.analysis).toMatchObject({ rounds: 1, conflicts: 1, totalCost: 8, fairness: 1 });

        expect(review.members.map(m => m.agentId)).toEqual(['agent-d']);
        expect(review.members[0].score).toBeCloseTo(0.95, 9);
        expect(review.analysis?.totalCost).toBe(0.5);
    });

    it('should run tasks in parallel and persist episodes', async () => {
        database = openDatabase(':memory:');
        const results = await runScenario(loadScenario(examplePath), {
            config: defaultGlobalConfig,
            database,
            parallel: true,
        });

        expect(results.map(r => r.task.status)).toEqual(['COMPLETED', 'COMPLETED']);
        const episodes = await new SqliteEpisodeStore(database).byTask(results[0].task.id);
        expect(episodes).toHaveLength(1);
        expect(episodes[0].metrics.success).toBe(true);
    });
});
