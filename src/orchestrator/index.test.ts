import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ParticipantDirectory } from '../agents/base.js';
import { PROGRESS_KEY, ScriptedParticipant, resultKey, type ScriptedParticipantOptions } from '../agents/scripted.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { AgentRegistry } from '../registry/agent-registry.js';
import { defaultGlobalConfig, toRuntimeConfig, type Capability, type TaskRequirement } from '../types.js';
import { CollaborationOrchestrator, defaultAgenda } from './index.js';

const requirement: TaskRequirement = {
    required: [
        { capability: 'research', minProficiency: 0.7 },
        { capability: 'writing', minProficiency: 0.6 },
    ],
    teamSize: { min: 2, max: 2 },
};

const A: Capability[] = [{ kind: 'research', proficiency: 0.9 }, { kind: 'writing', proficiency: 0.3 }];
const B: Capability[] = [{ kind: 'research', proficiency: 0.5 }, { kind: 'writing', proficiency: 0.8 }];
const C: Capability[] = [{ kind: 'research', proficiency: 0.8 }, { kind: 'writing', proficiency: 0.7 }];

describe('defaultAgenda', () => {
    it('should create one unit-cost sub-task per role', () => {
        expect(defaultAgenda(requirement)).toEqual({
            items: [
                { id: 'research', kind: 'subtask', capability: 'research', minProficiency: 0.7, cost: 1 },
                { id: 'writing', kind: 'subtask', capability: 'writing', minProficiency: 0.6, cost: 1 },
            ],
        });
    });
});

describe('CollaborationOrchestrator', () => {
    let registry: AgentRegistry;
    let participants: ParticipantDirectory;
    let orchestrator: CollaborationOrchestrator;

    function addAgent(id: string, capabilities: Capability[], behavior: Partial<ScriptedParticipantOptions> = {}, load = 0) {
        registry.register({ id, capabilities, load });
        const participant = new ScriptedParticipant({ agentId: id, capabilities, ...behavior });
        participants.register(participant);
        return participant;
    }

    beforeEach(() => {
        registry = new AgentRegistry();
        participants = new ParticipantDirectory();
        const config = toRuntimeConfig({ ...defaultGlobalConfig, roundTimeoutMs: 1000, negotiationTimeoutMs: 5000 });
        orchestrator = new CollaborationOrchestrator({ registry, participants, config: { ...config, recorder: { ...config.recorder, initialBackoffMs: 1 } } });
    });

    it('should take a task from submission to completion', async () => {
        addAgent('A', A, {}, 1);
        addAgent('B', B);
        addAgent('C', C, {}, 2);

        const taskId = orchestrator.submitTask(requirement);
        expect(orchestrator.getTaskStatus(taskId)).toBe('FORMING');

        const task = await orchestrator.waitForTask(taskId);
        expect(task.status).toBe('COMPLETED');
        expect(task.failure).toBeUndefined();
        expect(Object.keys(task.results).sort()).toEqual(['A', 'B']);
        expect(task.negotiationIds).toHaveLength(1);

        const context = orchestrator.getContext(taskId);
        expect((await context?.read(resultKey('research')))?.value).toMatchObject({ agentId: 'A' });
        expect((await context?.read(resultKey('writing')))?.value).toMatchObject({ agentId: 'B' });
        const progress = (await context?.read(PROGRESS_KEY))?.value;
        expect(Array.isArray(progress) ? [...progress].sort() : progress).toEqual(['A:research', 'B:writing']);

        expect(registry.listAvailable().map(p => p.id)).toEqual(['A', 'B', 'C']);
        await orchestrator.recorder.flush();
        const [episode] = await orchestrator.recorder.getTaskHistory(taskId);
        expect(episode.metrics).toMatchObject({ success: true, rounds: 1, replacements: 0 });
        expect(episode.negotiation.status).toBe('RESOLVED');
    });

    it('should replace a member that leaves mid-execution and hand off its context', async () => {
        addAgent('A', A, {}, 1);
        const leaving = addAgent('B', B, { departOnExecute: true });
        const joining = addAgent('C', C, {}, 2);

        const task = await orchestrator.waitForTask(orchestrator.submitTask(requirement));

        expect(task.status).toBe('COMPLETED');
        expect(task.replacements).toBe(1);
        expect(leaving.executionCount).toBe(1);
        expect(joining.executionCount).toBe(1);
        expect(Object.keys(task.results).sort()).toEqual(['A', 'C']);
        expect((await orchestrator.getContext(task.id)?.read(resultKey('writing')))?.value).toMatchObject({ agentId: 'C' });

        const team = orchestrator.formation.getTeam(task.teamId ?? '');
        expect(team?.members.map(m => [m.agentId, m.role])).toEqual([
            ['A', 'research'],
            ['C', 'writing'],
        ]);
        expect(registry.require('B').availability).toBe('OFFLINE');
    });

    it('should degrade and renegotiate orphaned items when no replacement exists', async () => {
        const versatile: Capability[] = [{ kind: 'research', proficiency: 0.9 }, { kind: 'writing', proficiency: 0.65 }];
        const staying = addAgent('A', versatile);
        addAgent('B', B, { departOnExecute: true });

        const task = await orchestrator.waitForTask(orchestrator.submitTask(requirement));

        expect(task.status).toBe('COMPLETED');
        expect(task.negotiationIds).toHaveLength(2);
        expect(staying.executionCount).toBe(2);
        expect(orchestrator.formation.getTeam(task.teamId ?? '')?.vacated.map(m => m.agentId)).toEqual(['B']);
        expect((await orchestrator.getContext(task.id)?.read(resultKey('writing')))?.value).toMatchObject({ agentId: 'A' });
    });

    it('should report DEGRADED while the degraded team finishes its work', async () => {
        const versatile: Capability[] = [{ kind: 'research', proficiency: 0.9 }, { kind: 'writing', proficiency: 0.65 }];
        addAgent('A', versatile, { executeDelayMs: 300 });
        addAgent('B', B, { departOnExecute: true });

        const taskId = orchestrator.submitTask(requirement);
        await vi.waitFor(() => expect(orchestrator.getTaskStatus(taskId)).toBe('DEGRADED'), { timeout: 2000, interval: 20 });
        expect(orchestrator.formation.getTeam(orchestrator.getTask(taskId).teamId ?? '')?.status).toBe('DEGRADED');

        const task = await orchestrator.waitForTask(taskId);
        expect(task.status).toBe('COMPLETED');
    });

    describe('negotiation recovery', () => {
        it('should replace a member left unplaced and renegotiate', async () => {
            addAgent('A', A, {}, 1);
            addAgent('B', B, { claims: [] });
            const joining = addAgent('C', C, {}, 2);

            const task = await orchestrator.waitForTask(orchestrator.submitTask(requirement));

            expect(task.status).toBe('COMPLETED');
            expect(task.replacements).toBe(1);
            expect(task.negotiationIds).toHaveLength(2);
            expect(orchestrator.negotiations.get(task.negotiationIds[0])).toMatchObject({
                status: 'FAILED',
                failureReason: 'ROUND_LIMIT',
            });
            expect(orchestrator.negotiations.get(task.negotiationIds[1])?.resolution.map(a => [a.itemId, a.agentId])).toEqual([
                ['research', 'A'],
                ['writing', 'C'],
            ]);
            expect(joining.executionCount).toBe(1);
            expect(Object.keys(task.results).sort()).toEqual(['A', 'C']);
            expect(registry.listAvailable().map(p => p.id)).toEqual(['A', 'B', 'C']);

            await orchestrator.recorder.flush();
            const [episode] = await orchestrator.recorder.getTaskHistory(task.id);
            expect(episode.metrics).toMatchObject({ success: true, rounds: 6, replacements: 1 });
        });

        it('should fail with NEGOTIATION_FAILED when renegotiation fails too', async () => {
            addAgent('A', A);
            addAgent('B', B, { claims: [] });

            const task = await orchestrator.waitForTask(orchestrator.submitTask(requirement));

            expect(task.status).toBe('FAILED');
            expect(task.failure?.code).toBe('NEGOTIATION_FAILED');
            expect(task.failure?.message).toBe(`Negotiation ${task.negotiationIds[1]} failed: ROUND_LIMIT`);
            expect(task.negotiationIds).toHaveLength(2);

            const team = orchestrator.formation.getTeam(task.teamId ?? '');
            expect(team?.status).toBe('FAILED');
            expect(team?.vacated.map(m => m.agentId)).toEqual(['B']);
            expect(registry.listAvailable().map(p => p.id)).toEqual(['A', 'B']);
        });
    });

    it('should fail with NO_CANDIDATE when no team can be formed', async () => {
        addAgent('A', A);

        const task = await orchestrator.waitForTask(orchestrator.submitTask(requirement));

        expect(task.status).toBe('FAILED');
        expect(task.failure?.code).toBe('NO_CANDIDATE');
        expect(task.teamId).toBeUndefined();
    });

    it('should relax the requirement once before giving up', async () => {
        addAgent('A', A);
        addAgent('E', [{ kind: 'writing', proficiency: 0.55 }]);

        const task = await orchestrator.waitForTask(orchestrator.submitTask(requirement));

        expect(task.status).toBe('COMPLETED');
        expect(orchestrator.formation.getTeam(task.teamId ?? '')?.members.map(m => m.agentId)).toEqual(['A', 'E']);
    });

    it('should fail the task when a member reports failure', async () => {
        addAgent('A', A);
        addAgent('B', B, { executeError: 'tool crashed' });

        const task = await orchestrator.waitForTask(orchestrator.submitTask(requirement));

        expect(task.status).toBe('FAILED');
        expect(task.failure).toEqual({ code: 'EXECUTION_FAILED', message: 'tool crashed' });
        expect(registry.listAvailable().map(p => p.id)).toEqual(['A', 'B']);

        await orchestrator.recorder.flush();
        const [episode] = await orchestrator.recorder.getTaskHistory(task.id);
        expect(episode.metrics).toMatchObject({ success: false, failureCode: 'EXECUTION_FAILED' });
    });

    describe('cancelTask', () => {
        it('should cancel a task before its team commits', async () => {
            addAgent('A', A);
            addAgent('B', B);

            const taskId = orchestrator.submitTask(requirement);
            expect(orchestrator.cancelTask(taskId)).toBe(true);
            expect(orchestrator.cancelTask(taskId)).toBe(false);

            const task = await orchestrator.waitForTask(taskId);
            expect(task.status).toBe('FAILED');
            expect(task.failure?.code).toBe('CANCELLED');
            expect(registry.listAvailable().map(p => p.id)).toEqual(['A', 'B']);
        });

        it('should abort members mid-execution and close the context', async () => {
            addAgent('A', A, { executeDelayMs: 5000 });
            addAgent('B', B, { executeDelayMs: 5000 });

            const taskId = orchestrator.submitTask(requirement);
            await vi.waitFor(() => expect(orchestrator.getTaskStatus(taskId)).toBe('EXECUTING'));
            expect(orchestrator.cancelTask(taskId)).toBe(true);

            const task = await orchestrator.waitForTask(taskId);
            expect(task.status).toBe('FAILED');
            expect(task.failure?.code).toBe('CANCELLED');
            expect(orchestrator.getContext(taskId)?.isClosed).toBe(true);
            expect(orchestrator.cancelTask(taskId)).toBe(false);
        });
    });

    it('should reject invalid requirements at submission', () => {
        expect(() => orchestrator.submitTask({ ...requirement, teamSize: { min: 0, max: 2 } })).toThrow(ValidationError);
        expect(() => orchestrator.submitTask(requirement, { agenda: { items: [] } })).toThrow(ValidationError);
    });

    it('should throw NotFoundError for unknown tasks', () => {
        expect(() => orchestrator.getTaskStatus('missing')).toThrow(NotFoundError);
        expect(() => orchestrator.cancelTask('missing')).toThrow(NotFoundError);
    });

    it('should cancel running tasks on shutdown', async () => {
        addAgent('A', A, { executeDelayMs: 5000 });
        addAgent('B', B);

        const taskId = orchestrator.submitTask(requirement);
        await vi.waitFor(() => expect(orchestrator.getTaskStatus(taskId)).toBe('EXECUTING'));
        await orchestrator.shutdown();

        expect(orchestrator.getTaskStatus(taskId)).toBe('FAILED');
        expect(orchestrator.recorder.pending).toBe(0);
    });
});
