import { describe, it, expect } from 'vitest';
import { MemoryContextBackend } from '../collaboration/context-backend.js';
import { SharedContextStore } from '../collaboration/context-store.js';
import { AgentUnavailableError } from '../errors.js';
import type { ProposalRequest } from '../negotiation/negotiation-driver.js';
import type { AgendaItem } from '../types.js';
import { ParticipantDirectory, updateWithRetry, type RoleAssignment } from './base.js';
import { PROGRESS_KEY, ScriptedParticipant, resultKey } from './scripted.js';

const items: AgendaItem[] = [
    { id: 'summary', kind: 'subtask', capability: 'research', minProficiency: 0.7, cost: 4 },
    { id: 'draft', kind: 'subtask', capability: 'writing', minProficiency: 0.6, cost: 5 },
];

function request(agentId: string): ProposalRequest {
    return {
        negotiationId: 'n-1',
        taskId: 'task-1',
        round: 1,
        agentId,
        openItems: items,
        settled: [],
        relaxation: 0,
        signal: new AbortController().signal,
    };
}

function assignment(store: SharedContextStore, agentId: string, itemIds: string[]): RoleAssignment {
    return {
        taskId: store.taskId,
        agentId,
        role: 'writing',
        items: itemIds.map(itemId => ({ itemId, agentId, cost: 1, round: 1, rule: 'uncontested' })),
        context: store.forAgent(agentId),
        signal: new AbortController().signal,
    };
}

describe('ScriptedParticipant', () => {
    it('should claim the items it has a capability for, scaled by its cost factor', async () => {
        const agent = new ScriptedParticipant({
            agentId: 'D',
            capabilities: [{ kind: 'writing', proficiency: 0.6 }],
            costFactor: 0.5,
        });
        expect(await agent.propose(request('D'))).toEqual([{ itemId: 'draft', estimatedCost: 2.5 }]);
    });

    it('should use fixed claims when given', async () => {
        const agent = new ScriptedParticipant({ agentId: 'D', capabilities: [], claims: ['summary'] });
        expect(await agent.propose(request('D'))).toEqual([{ itemId: 'summary', estimatedCost: 4 }]);
    });

    it('should fail proposals on request', async () => {
        const agent = new ScriptedParticipant({ agentId: 'D', capabilities: [], proposeError: 'no quota' });
        await expect(agent.propose(request('D'))).rejects.toThrow('no quota');
    });

    it('should write a result per item and append to the progress log', async () => {
        const store = new SharedContextStore('task-1', new MemoryContextBackend());
        const agent = new ScriptedParticipant({ agentId: 'B', capabilities: [{ kind: 'writing', proficiency: 0.8 }] });

        const result = await agent.execute(assignment(store, 'B', ['draft', 'notes']));

        expect(result).toEqual({ success: true, output: 'B completed 2 item(s) as writing' });
        expect((await store.read(resultKey('draft')))?.value).toEqual({ agentId: 'B', role: 'writing', itemId: 'draft' });
        expect((await store.read(PROGRESS_KEY))?.value).toEqual(['B:draft', 'B:notes']);
        expect(agent.executionCount).toBe(1);
    });

    it('should leave the task when told to depart', async () => {
        const store = new SharedContextStore('task-1', new MemoryContextBackend());
        const agent = new ScriptedParticipant({ agentId: 'B', capabilities: [], departOnExecute: true });

        await expect(agent.execute(assignment(store, 'B', ['draft']))).rejects.toBeInstanceOf(AgentUnavailableError);
    });

    it('should report execution failures as a result', async () => {
        const store = new SharedContextStore('task-1', new MemoryContextBackend());
        const agent = new ScriptedParticipant({ agentId: 'B', capabilities: [], executeError: 'tool crashed' });

        expect(await agent.execute(assignment(store, 'B', ['draft']))).toEqual({ success: false, error: 'tool crashed' });
    });
});

describe('updateWithRetry', () => {
    it('should re-read and retry when another writer got there first', async () => {
        const store = new SharedContextStore('task-1', new MemoryContextBackend());
        const handle = store.forAgent('A');
        await store.write('counter', 0, null, 'Z');

        let interfered = false;
        const version = await updateWithRetry(handle, 'counter', current => {
            const value = typeof current?.value === 'number' ? current.value : 0;
            if (!interfered) {
                interfered = true;
                // Races ahead of this update, forcing one conflict
                void store.write('counter', 10, 1, 'Z');
            }
            return value + 1;
        });

        expect(version).toBe(3);
        expect((await store.read('counter'))?.value).toBe(11);
    });

    it('should give up after the attempt limit', async () => {
        const store = new SharedContextStore('task-1', new MemoryContextBackend());
        await store.write('k', 0, null, 'Z');
        let bump = 1;

        await expect(
            updateWithRetry(
                store.forAgent('A'),
                'k',
                () => {
                    void store.write('k', 'other', bump++, 'Z');
                    return 'mine';
                },
                2
            )
        ).rejects.toMatchObject({ code: 'VERSION_CONFLICT' });
    });
});

describe('ParticipantDirectory', () => {
    it('should register and look up participants by agent id', () => {
        const directory = new ParticipantDirectory();
        directory.register(new ScriptedParticipant({ agentId: 'A', capabilities: [] }));

        expect(directory.has('A')).toBe(true);
        expect(directory.get('A')?.agentId).toBe('A');
        expect(directory.unregister('A')).toBe(true);
        expect(directory.get('A')).toBeUndefined();
    });
});
