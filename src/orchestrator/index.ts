/**
 * Collaboration orchestrator
 *
 * Drives a task through its lifecycle:
 *   FORMING -> NEGOTIATING -> EXECUTING (-> DEGRADED) -> COMPLETED | FAILED
 * Team formation, negotiation, the shared context and episode recording are
 * wired together here; each stage's failure ends the task with a typed reason.
 */

import { randomUUID } from 'crypto';
import type { ParticipantDirectory, AgentResult } from '../agents/base.js';
import { MemoryContextBackend, type ContextBackend } from '../collaboration/context-backend.js';
import { SharedContextStore } from '../collaboration/context-store.js';
import { HandoffManager } from '../collaboration/handoff-manager.js';
import {
    AgentUnavailableError,
    CancelledError,
    ErrorCode,
    ExecutionFailedError,
    NegotiationFailedError,
    NotFoundError,
    ValidationError,
    toTaskFailure,
} from '../errors.js';
import { TeamFormationService } from '../formation/team-formation.js';
import { MemoryEpisodeStore, type EpisodeStore } from '../learning/episode-store.js';
import { LearningRecorder } from '../learning/recorder.js';
import { logEvent } from '../logging/index.js';
import { NegotiationDriver } from '../negotiation/negotiation-driver.js';
import { NegotiationEngine } from '../negotiation/negotiation-engine.js';
import type { AgentRegistry } from '../registry/agent-registry.js';
import { roleSlots } from '../registry/capability-matcher.js';
import { relaxRequirement, validateRequirement } from '../registry/validation.js';
import {
    defaultGlobalConfig,
    toRuntimeConfig,
    type AgentTeam,
    type Assignment,
    type Negotiation,
    type NegotiationAgenda,
    type NegotiationMember,
    type NegotiationTrace,
    type RuntimeConfig,
    type TaskFailure,
    type TaskRequirement,
    type TaskStatus,
    type TeamMember,
} from '../types.js';

export interface SubmitTaskOptions {
    /** Sub-tasks and resources to negotiate; defaults to one sub-task per required role */
    agenda?: NegotiationAgenda;
}

export interface TaskRecord {
    id: string;
    status: TaskStatus;
    requirement: TaskRequirement;
    agenda: NegotiationAgenda;
    teamId?: string;
    negotiationIds: string[];
    replacements: number;
    results: Record<string, AgentResult>;
    failure?: TaskFailure;
    createdAt: string;
    updatedAt: string;
    completedAt?: string;
}

export interface CollaborationOrchestratorOptions {
    registry: AgentRegistry;
    participants: ParticipantDirectory;
    contextBackend?: ContextBackend;
    episodeStore?: EpisodeStore;
    config?: RuntimeConfig;
    clock?: () => Date;
}

interface TaskState {
    record: TaskRecord;
    controller: AbortController;
    memberControllers: Map<string, AbortController>;
    lost: Set<string>;
    store?: SharedContextStore;
    negotiation?: Negotiation;
    rounds: number;
    done: Promise<void>;
}

interface Work {
    member: TeamMember;
    items: Assignment[];
}

const TERMINAL: readonly TaskStatus[] = ['COMPLETED', 'FAILED'];

/**
 * One sub-task per required role, costed at 1
 */
export function defaultAgenda(requirement: TaskRequirement): NegotiationAgenda {
    return {
        items: roleSlots(requirement).map(slot => ({
            id: slot.role,
            kind: 'subtask',
            capability: slot.requirement.capability,
            minProficiency: slot.requirement.minProficiency,
            cost: 1,
        })),
    };
}

export class CollaborationOrchestrator {
    readonly registry: AgentRegistry;
    readonly formation: TeamFormationService;
    readonly negotiations: NegotiationEngine;
    readonly recorder: LearningRecorder;
    private participants: ParticipantDirectory;
    private driver: NegotiationDriver;
    private contextBackend: ContextBackend;
    private config: RuntimeConfig;
    private clock: () => Date;
    private tasks: Map<string, TaskState> = new Map();

    constructor(options: CollaborationOrchestratorOptions) {
        this.config = options.config ?? toRuntimeConfig(defaultGlobalConfig);
        this.clock = options.clock ?? (() => new Date());
        this.registry = options.registry;
        this.participants = options.participants;
        this.contextBackend = options.contextBackend ?? new MemoryContextBackend();
        this.formation = new TeamFormationService(this.registry, {
            formation: this.config.formation,
            matcher: this.config.matcher,
            clock: this.clock,
        });
        this.negotiations = new NegotiationEngine(this.config.negotiation, this.clock);
        this.driver = new NegotiationDriver(this.negotiations, agentId => this.participants.get(agentId));
        this.recorder = new LearningRecorder(options.episodeStore ?? new MemoryEpisodeStore(), this.config.recorder, this.clock);

        this.formation.onMemberLost((team, agentId) => this.handleMemberLost(team, agentId));
        this.formation.onDegraded(team => this.handleTeamDegraded(team));
    }

    /**
     * Accept a task and start forming its team. Invalid requirements are rejected here.
     */
    submitTask(requirement: TaskRequirement, options: SubmitTaskOptions = {}): string {
        validateRequirement(requirement, this.clock());
        const agenda = options.agenda ?? defaultAgenda(requirement);
        if (agenda.items.length === 0) {
            throw new ValidationError('Agenda needs at least one item', 'agenda.items', agenda.items);
        }

        const now = this.clock().toISOString();
        const state: TaskState = {
            record: {
                id: randomUUID(),
                status: 'FORMING',
                requirement,
                agenda,
                negotiationIds: [],
                replacements: 0,
                results: {},
                createdAt: now,
                updatedAt: now,
            },
            controller: new AbortController(),
            memberControllers: new Map(),
            lost: new Set(),
            rounds: 0,
            done: Promise.resolve(),
        };
        this.tasks.set(state.record.id, state);
        logEvent({ level: 'info', taskId: state.record.id, message: 'Task submitted', details: { items: agenda.items.length } });

        state.done = Promise.resolve()
            .then(() => this.run(state))
            .catch((error: unknown) => {
                state.record.failure = toTaskFailure(error);
                this.setStatus(state, 'FAILED');
                logEvent({
                    level: 'error',
                    taskId: state.record.id,
                    message: 'Task pipeline crashed',
                    details: { error: state.record.failure.message },
                });
            });
        return state.record.id;
    }

    /**
     * Cancel a running task: negotiation aborts, the context closes to writes.
     * Returns false when the task had already finished.
     */
    cancelTask(taskId: string): boolean {
        const state = this.requireTask(taskId);
        if (TERMINAL.includes(state.record.status) || state.controller.signal.aborted) {
            return false;
        }
        state.controller.abort();
        state.store?.close();
        logEvent({ level: 'warn', taskId, message: 'Task cancellation requested' });
        return true;
    }

    getTaskStatus(taskId: string): TaskStatus {
        return this.requireTask(taskId).record.status;
    }

    getTask(taskId: string): TaskRecord {
        return structuredClone(this.requireTask(taskId).record);
    }

    listTasks(): TaskRecord[] {
        return [...this.tasks.values()].map(state => structuredClone(state.record));
    }

    /**
     * The task's shared context, kept readable after the task ends
     */
    getContext(taskId: string): SharedContextStore | undefined {
        return this.requireTask(taskId).store;
    }

    async waitForTask(taskId: string): Promise<TaskRecord> {
        await this.requireTask(taskId).done;
        return this.getTask(taskId);
    }

    /**
     * Cancel everything still running and wait for pending episodes
     */
    async shutdown(): Promise<void> {
        for (const state of this.tasks.values()) {
            if (!TERMINAL.includes(state.record.status)) {
                this.cancelTask(state.record.id);
            }
        }
        await Promise.all([...this.tasks.values()].map(state => state.done));
        await this.recorder.flush();
    }

    private async run(state: TaskState): Promise<void> {
        const taskId = state.record.id;
        const startedAt = Date.now();
        let team: AgentTeam | undefined;
        let failure: unknown;

        try {
            team = this.form(state);
            state.record.teamId = team.id;
            this.throwIfCancelled(state);
            team = this.formation.commit(team.id);

            this.setStatus(state, 'NEGOTIATING');
            const negotiation = await this.negotiate(state, team.id);

            this.setStatus(state, this.currentTeam(team.id).status === 'DEGRADED' ? 'DEGRADED' : 'EXECUTING');
            const store = new SharedContextStore(taskId, this.contextBackend, {
                writeTimeoutMs: this.config.context.writeTimeoutMs,
                writers: this.currentTeam(team.id).members.map(m => m.agentId),
                clock: this.clock,
            });
            state.store = store;
            this.throwIfCancelled(state);

            await this.execute(state, store, team.id, negotiation);
            this.throwIfCancelled(state);
        } catch (error) {
            failure = state.controller.signal.aborted ? new CancelledError('Task was cancelled', { taskId }) : error;
        } finally {
            state.store?.close();
        }

        if (failure === undefined) {
            this.setStatus(state, 'COMPLETED');
        } else {
            state.record.failure = toTaskFailure(failure);
            this.setStatus(state, 'FAILED');
            logEvent({
                level: 'error',
                taskId,
                teamId: team?.id,
                message: `Task failed: ${state.record.failure.message}`,
                details: { code: state.record.failure.code },
            });
        }
        state.record.completedAt = this.clock().toISOString();

        if (team) {
            const finalTeam =
                failure === undefined
                    ? this.formation.release(team.id)
                    : this.formation.dissolve(team.id, state.record.failure?.code ?? ErrorCode.INTERNAL);
            this.recorder.submit(finalTeam, this.traceOf(state), {
                success: failure === undefined,
                durationMs: Date.now() - startedAt,
                rounds: state.rounds,
                replacements: state.record.replacements,
                failureCode: state.record.failure?.code,
            });
        }
    }

    /**
     * Form a team, relaxing the requirement after each NoCandidateError up to the configured limit
     */
    private form(state: TaskState): AgentTeam {
        let requirement = state.record.requirement;
        for (let relaxed = 0; ; relaxed++) {
            const result = this.formation.formTeam(requirement, state.record.id);
            if (result.success) {
                return result.team;
            }
            if (relaxed >= this.config.formation.relaxations) {
                throw result.error;
            }
            requirement = relaxRequirement(requirement, this.config.formation.relaxationStep);
            logEvent({
                level: 'warn',
                taskId: state.record.id,
                message: 'No candidate team; relaxing requirement',
                details: { unfilledRoles: result.error.unfilledRoles, step: this.config.formation.relaxationStep },
            });
        }
    }

    /**
     * Negotiate assignments. A failed negotiation gets one second chance: the
     * members left UNPLACED are replaced and the team renegotiates.
     */
    private async negotiate(state: TaskState, teamId: string): Promise<Negotiation> {
        let negotiation = await this.runNegotiation(
            state,
            this.negotiations.open({
                teamId,
                taskId: state.record.id,
                agenda: state.record.agenda,
                members: this.negotiationMembers(teamId),
            })
        );

        if (negotiation.status === 'FAILED') {
            const lastRound = negotiation.rounds[negotiation.rounds.length - 1];
            const unplaced = lastRound?.unplaced ?? [];
            if (unplaced.length > 0) {
                for (const agentId of unplaced) {
                    const result = await this.formation.replaceMember(teamId, agentId);
                    if (result.outcome === 'replaced') {
                        state.record.replacements++;
                    }
                }
                negotiation = await this.runNegotiation(
                    state,
                    this.negotiations.renegotiate(negotiation.id, {
                        members: this.negotiationMembers(teamId),
                        vacatedAgentIds: unplaced,
                        keepAssignments: false,
                    })
                );
            }
        }

        if (negotiation.status !== 'RESOLVED') {
            throw new NegotiationFailedError(negotiation.id, negotiation.failureReason ?? 'ROUND_LIMIT', {
                taskId: state.record.id,
                teamId,
            });
        }
        return negotiation;
    }

    private async runNegotiation(state: TaskState, opened: Negotiation): Promise<Negotiation> {
        state.record.negotiationIds.push(opened.id);
        const negotiation = await this.driver.run(opened.id, { signal: state.controller.signal });
        state.negotiation = negotiation;
        state.rounds += negotiation.rounds.length;
        if (negotiation.status === 'ABORTED') {
            throw new CancelledError('Task was cancelled during negotiation', { taskId: state.record.id });
        }
        return negotiation;
    }

    /**
     * Run every member's share concurrently. Members that leave are replaced
     * (with a context handoff) and their share re-run; if no replacement
     * exists the team degrades and the orphaned items are renegotiated.
     */
    private async execute(state: TaskState, store: SharedContextStore, teamId: string, negotiation: Negotiation): Promise<void> {
        const handoffs = new HandoffManager(store);
        let work: Work[] = this.currentTeam(teamId).members.map(member => ({
            member,
            items: negotiation.resolution.filter(a => a.agentId === member.agentId),
        }));

        while (work.length > 0) {
            const outcomes = await Promise.allSettled(work.map(w => this.executeMember(state, store, w)));
            this.throwIfCancelled(state);

            const next: Work[] = [];
            for (const [index, outcome] of outcomes.entries()) {
                const { member, items } = work[index];
                if (outcome.status === 'fulfilled') {
                    if (!outcome.value.success) {
                        throw new ExecutionFailedError(member.agentId, outcome.value.error ?? `Agent ${member.agentId} failed`, {
                            taskId: state.record.id,
                            teamId,
                        });
                    }
                    state.record.results[member.agentId] = outcome.value;
                    continue;
                }
                if (!(outcome.reason instanceof AgentUnavailableError) && !state.lost.has(member.agentId)) {
                    throw outcome.reason;
                }
                next.push(...(await this.recover(state, store, handoffs, teamId, { member, items })));
            }
            work = next;
        }
    }

    private async executeMember(state: TaskState, store: SharedContextStore, work: Work): Promise<AgentResult> {
        const { agentId } = work.member;
        if (state.lost.has(agentId)) {
            throw new AgentUnavailableError(agentId, undefined, { taskId: state.record.id });
        }
        const participant = this.participants.get(agentId);
        if (!participant) {
            throw new AgentUnavailableError(agentId, `No participant is acting for agent ${agentId}`, { taskId: state.record.id });
        }

        const controller = new AbortController();
        const onAbort = () => controller.abort();
        state.controller.signal.addEventListener('abort', onAbort, { once: true });
        state.memberControllers.set(agentId, controller);
        try {
            return await participant.execute({
                taskId: state.record.id,
                agentId,
                role: work.member.role,
                items: work.items,
                context: store.forAgent(agentId),
                signal: controller.signal,
            });
        } finally {
            state.controller.signal.removeEventListener('abort', onAbort);
            state.memberControllers.delete(agentId);
        }
    }

    private async recover(
        state: TaskState,
        store: SharedContextStore,
        handoffs: HandoffManager,
        teamId: string,
        work: Work
    ): Promise<Work[]> {
        const { agentId } = work.member;
        const profile = this.registry.get(agentId);
        if (profile && profile.availability !== 'OFFLINE') {
            this.registry.updateAvailability(agentId, 'OFFLINE');
        }

        const result = await this.formation.replaceMember(teamId, agentId, {
            handoff: async (from, to) => {
                await handoffs.perform(from, to);
            },
        });

        if (result.outcome === 'replaced' && result.replacement) {
            state.record.replacements++;
            return [{ member: result.replacement, items: work.items }];
        }

        store.revoke(agentId);
        if (work.items.length === 0) {
            return [];
        }

        // Renegotiate the orphaned items among the remaining members
        const previous = state.negotiation;
        if (!previous) {
            throw new NegotiationFailedError('none', 'NO_PARTICIPANTS', { taskId: state.record.id, teamId });
        }
        const negotiation = await this.runNegotiation(
            state,
            this.negotiations.renegotiate(previous.id, {
                members: this.negotiationMembers(teamId),
                vacatedAgentIds: [agentId],
                keepAssignments: true,
            })
        );
        if (negotiation.status !== 'RESOLVED') {
            throw new NegotiationFailedError(negotiation.id, negotiation.failureReason ?? 'ROUND_LIMIT', {
                taskId: state.record.id,
                teamId,
            });
        }

        const orphaned = new Set(work.items.map(a => a.itemId));
        const team = this.currentTeam(teamId);
        return team.members
            .map(member => ({
                member,
                items: negotiation.resolution.filter(a => a.agentId === member.agentId && orphaned.has(a.itemId)),
            }))
            .filter(w => w.items.length > 0);
    }

    private handleMemberLost(team: AgentTeam, agentId: string): void {
        const state = this.tasks.get(team.taskId);
        if (!state || TERMINAL.includes(state.record.status)) return;
        state.lost.add(agentId);
        state.memberControllers.get(agentId)?.abort();
        logEvent({ level: 'warn', taskId: team.taskId, teamId: team.id, agentId, message: 'Team member went offline' });
    }

    private handleTeamDegraded(team: AgentTeam): void {
        const state = this.tasks.get(team.taskId);
        if (!state || TERMINAL.includes(state.record.status)) return;
        this.setStatus(state, 'DEGRADED');
        logEvent({
            level: 'warn',
            taskId: team.taskId,
            teamId: team.id,
            message: 'Team degraded; remaining scope is renegotiated',
            details: { members: team.members.map(m => m.agentId), vacated: team.vacated.map(m => m.agentId) },
        });
    }

    private negotiationMembers(teamId: string): NegotiationMember[] {
        return this.currentTeam(teamId).members.map(member => {
            const profile = this.registry.require(member.agentId);
            return {
                agentId: member.agentId,
                role: member.role,
                load: profile.load,
                capabilities: profile.capabilities,
            };
        });
    }

    private traceOf(state: TaskState): NegotiationTrace {
        const negotiation = state.negotiation;
        if (!negotiation) {
            return { negotiationId: '', status: 'ABORTED', rounds: [], resolution: [] };
        }
        return this.negotiations.trace(negotiation.id);
    }

    private currentTeam(teamId: string): AgentTeam {
        const team = this.formation.getTeam(teamId);
        if (!team) {
            throw new NotFoundError('Team', teamId);
        }
        return team;
    }

    private setStatus(state: TaskState, status: TaskStatus): void {
        if (state.record.status === status) return;
        // DEGRADED is sticky until the task finishes
        if (state.record.status === 'DEGRADED' && status === 'EXECUTING') return;
        const previous = state.record.status;
        state.record.status = status;
        state.record.updatedAt = this.clock().toISOString();
        logEvent({ level: 'info', taskId: state.record.id, message: `Task ${previous} -> ${status}` });
    }

    private throwIfCancelled(state: TaskState): void {
        if (state.controller.signal.aborted) {
            throw new CancelledError('Task was cancelled', { taskId: state.record.id });
        }
    }

    private requireTask(taskId: string): TaskState {
        const state = this.tasks.get(taskId);
        if (!state) {
            throw new NotFoundError('Task', taskId);
        }
        return state;
    }
}
