/**
 * Team Formation Service
 *
 * Turns a task requirement into a committed team: matches candidates, reserves
 * them, commits them to BUSY, and keeps the team whole under churn through the
 * replacement protocol.
 */

import { randomUUID } from 'crypto';
import {
    AgentUnavailableError,
    InvalidStateError,
    NoCandidateError,
    NotFoundError,
} from '../errors.js';
import { logEvent } from '../logging/index.js';
import type { AgentRegistry, AvailabilityChange } from '../registry/agent-registry.js';
import {
    SUPPORT_ROLE,
    matchTeam,
    rankForRole,
    rankForSupport,
    roleSlots,
    unfillableRoles,
    type ScoredCandidate,
} from '../registry/capability-matcher.js';
import { validateRequirement } from '../registry/validation.js';
import {
    defaultFormationConfig,
    defaultMatcherConfig,
    type AgentTeam,
    type FormationConfig,
    type MatcherConfig,
    type TaskRequirement,
    type TeamMember,
    type TeamStatus,
} from '../types.js';

export type FormationResult =
    | { success: true; team: AgentTeam }
    | { success: false; error: NoCandidateError };

export type ContextHandoff = (fromAgentId: string, toAgentId: string) => Promise<void>;

export interface ReplacementResult {
    outcome: 'replaced' | 'degraded';
    team: AgentTeam;
    vacated: TeamMember;
    replacement?: TeamMember;
}

export interface TeamFormationOptions {
    formation?: Partial<FormationConfig>;
    matcher?: Partial<MatcherConfig>;
    clock?: () => Date;
}

export type MemberLostListener = (team: AgentTeam, agentId: string) => void;
export type TeamListener = (team: AgentTeam) => void;

interface TeamState {
    id: string;
    taskId: string;
    members: TeamMember[];
    vacated: TeamMember[];
    requirement: TaskRequirement;
    formedAt: string;
    status: TeamStatus;
    churnRetries: number;
}

function snapshot(state: TeamState): AgentTeam {
    return Object.freeze({
        id: state.id,
        taskId: state.taskId,
        members: Object.freeze(state.members.map(m => Object.freeze({ ...m }))),
        vacated: Object.freeze(state.vacated.map(m => Object.freeze({ ...m }))),
        requirement: state.requirement,
        formedAt: state.formedAt,
        status: state.status,
    });
}

export class TeamFormationService {
    private teams: Map<string, TeamState> = new Map();
    private formationConfig: FormationConfig;
    private matcherConfig: MatcherConfig;
    private clock: () => Date;
    private memberLostListeners: MemberLostListener[] = [];
    private degradedListeners: TeamListener[] = [];
    private replaceQueues: Map<string, Promise<void>> = new Map();

    constructor(private registry: AgentRegistry, options: TeamFormationOptions = {}) {
        this.formationConfig = { ...defaultFormationConfig, ...options.formation };
        this.matcherConfig = { ...defaultMatcherConfig, ...options.matcher };
        this.clock = options.clock ?? (() => new Date());
        this.registry.onAvailabilityChange(change => this.handleAvailabilityChange(change));
    }

    /**
     * Match and reserve a team for a task. The team starts PROPOSED; members are
     * reserved but stay FREE until commit. A missing team is reported, not thrown.
     */
    formTeam(requirement: TaskRequirement, taskId: string = randomUUID()): FormationResult {
        const validated = validateRequirement(requirement, this.clock());
        const teamId = randomUUID();
        const attempts = 1 + this.formationConfig.matchRetries;

        for (let attempt = 1; attempt <= attempts; attempt++) {
            const available = this.registry.listAvailable();
            const candidate = matchTeam(validated, available, { config: this.matcherConfig, now: this.clock() });

            if (!candidate) {
                const unfilled = unfillableRoles(validated, available, { config: this.matcherConfig, now: this.clock() });
                const error = new NoCandidateError(
                    unfilled.length > 0
                        ? `No eligible agents for role(s): ${unfilled.join(', ')}`
                        : `No team satisfies size ${validated.teamSize.min}-${validated.teamSize.max}`,
                    unfilled,
                    { taskId }
                );
                logEvent({ level: 'warn', taskId, message: error.message, details: { attempt } });
                return { success: false, error };
            }

            const reserved: string[] = [];
            for (const member of candidate.members) {
                if (!this.registry.reserve(member.agentId, teamId)) break;
                reserved.push(member.agentId);
            }

            if (reserved.length === candidate.members.length) {
                const state: TeamState = {
                    id: teamId,
                    taskId,
                    members: candidate.members,
                    vacated: [],
                    requirement: validated,
                    formedAt: this.clock().toISOString(),
                    status: 'PROPOSED',
                    churnRetries: 0,
                };
                this.teams.set(teamId, state);

                logEvent({
                    level: 'info',
                    taskId,
                    teamId,
                    message: `Proposed team of ${state.members.length}`,
                    details: { members: state.members.map(m => `${m.agentId}:${m.role}`) },
                });
                return { success: true, team: snapshot(state) };
            }

            // Lost a reservation race: release what we hold and match again
            for (const agentId of reserved) {
                this.registry.release(agentId, teamId);
            }
            logEvent({ level: 'warn', taskId, teamId, message: 'Reservation race lost, retrying match', details: { attempt } });
        }

        const error = new NoCandidateError('Could not reserve a candidate team', [], { taskId });
        return { success: false, error };
    }

    /**
     * PROPOSED -> COMMITTED; members become BUSY. Committing twice is a no-op.
     */
    commit(teamId: string): AgentTeam {
        const state = this.requireTeam(teamId);
        if (state.status === 'COMMITTED') {
            return snapshot(state);
        }
        if (state.status !== 'PROPOSED') {
            throw new InvalidStateError(`Cannot commit team in status ${state.status}`, { teamId });
        }

        const lost = state.members.find(member => {
            const profile = this.registry.require(member.agentId);
            return profile.availability !== 'FREE' || profile.heldBy !== teamId;
        });
        if (lost) {
            throw new AgentUnavailableError(lost.agentId, `Agent ${lost.agentId} is no longer reserved for team ${teamId}`, {
                teamId,
                taskId: state.taskId,
            });
        }

        for (const member of state.members) {
            this.registry.markBusy(member.agentId, teamId);
        }
        state.status = 'COMMITTED';

        logEvent({ level: 'info', taskId: state.taskId, teamId, message: 'Team committed' });
        return snapshot(state);
    }

    /**
     * Replace a departed member. The vacated role is re-matched on its own; a
     * replacement joins through the context handoff before the old member is
     * released. Without a replacement the team becomes DEGRADED. Replacements
     * on one team run one at a time.
     */
    replaceMember(
        teamId: string,
        oldAgentId: string,
        options: { handoff?: ContextHandoff } = {}
    ): Promise<ReplacementResult> {
        const previous = this.replaceQueues.get(teamId) ?? Promise.resolve();
        const run = previous.then(() => this.replaceNow(teamId, oldAgentId, options));
        const tail = run.then(
            () => undefined,
            () => undefined
        );
        this.replaceQueues.set(teamId, tail);
        return run.finally(() => {
            if (this.replaceQueues.get(teamId) === tail) {
                this.replaceQueues.delete(teamId);
            }
        });
    }

    /**
     * Release all members at the end of a task. BUSY members become FREE.
     */
    release(teamId: string): AgentTeam {
        const state = this.requireTeam(teamId);
        if (state.status === 'RELEASED' || state.status === 'FAILED') {
            return snapshot(state);
        }
        const now = this.clock();
        for (const member of state.members) {
            this.registry.release(member.agentId, teamId);
            if (member.capability && this.registry.get(member.agentId)) {
                this.registry.touchCapabilities(member.agentId, [member.capability], now);
            }
        }
        state.status = 'RELEASED';
        logEvent({ level: 'info', taskId: state.taskId, teamId, message: 'Team released' });
        return snapshot(state);
    }

    /**
     * Abandon a team (formation or negotiation failed); drops every hold
     */
    dissolve(teamId: string, reason: string): AgentTeam {
        const state = this.requireTeam(teamId);
        if (state.status === 'RELEASED' || state.status === 'FAILED') {
            return snapshot(state);
        }
        for (const member of state.members) {
            this.registry.release(member.agentId, teamId);
        }
        state.status = 'FAILED';
        logEvent({ level: 'warn', taskId: state.taskId, teamId, message: `Team dissolved: ${reason}` });
        return snapshot(state);
    }

    /**
     * Churn policy. An agent going OFFLINE while reserved is dropped from the
     * proposal and its role re-matched once; after that the formation fails.
     * Committed teams are told through onMemberLost and use replaceMember.
     */
    handleAvailabilityChange(change: AvailabilityChange): void {
        if (change.current.availability !== 'OFFLINE') return;
        const teamId = change.previous.heldBy;
        if (!teamId) return;
        const state = this.teams.get(teamId);
        if (!state) return;
        const index = state.members.findIndex(m => m.agentId === change.agentId);
        if (index === -1) return;

        if (state.status === 'PROPOSED') {
            this.handleProposedChurn(state, index);
            return;
        }

        if (state.status === 'COMMITTED' || state.status === 'DEGRADED') {
            const team = snapshot(state);
            for (const listener of [...this.memberLostListeners]) {
                listener(team, change.agentId);
            }
        }
    }

    getTeam(teamId: string): AgentTeam | undefined {
        const state = this.teams.get(teamId);
        return state ? snapshot(state) : undefined;
    }

    listTeams(): AgentTeam[] {
        return [...this.teams.values()].map(snapshot);
    }

    onMemberLost(listener: MemberLostListener): () => void {
        this.memberLostListeners.push(listener);
        return () => {
            this.memberLostListeners = this.memberLostListeners.filter(l => l !== listener);
        };
    }

    onDegraded(listener: TeamListener): () => void {
        this.degradedListeners.push(listener);
        return () => {
            this.degradedListeners = this.degradedListeners.filter(l => l !== listener);
        };
    }

    private handleProposedChurn(state: TeamState, index: number): void {
        const vacated = state.members[index];

        if (state.churnRetries < this.formationConfig.matchRetries) {
            state.churnRetries++;
            const best = this.bestForRole(state, vacated);
            if (best && this.registry.reserve(best.profile.id, state.id)) {
                state.members[index] = {
                    agentId: best.profile.id,
                    role: vacated.role,
                    capability: vacated.capability,
                    score: best.score,
                };
                logEvent({
                    level: 'info',
                    taskId: state.taskId,
                    teamId: state.id,
                    message: `Reserved ${best.profile.id} in place of offline ${vacated.agentId}`,
                });
                return;
            }
        }

        state.members.splice(index, 1);
        for (const member of state.members) {
            this.registry.release(member.agentId, state.id);
        }
        state.status = 'FAILED';
        logEvent({
            level: 'warn',
            taskId: state.taskId,
            teamId: state.id,
            message: `Formation failed: no replacement for ${vacated.agentId} (${vacated.role})`,
        });
    }

    private async replaceNow(
        teamId: string,
        oldAgentId: string,
        options: { handoff?: ContextHandoff }
    ): Promise<ReplacementResult> {
        const state = this.requireTeam(teamId);
        this.requireActive(state);
        const vacated = state.members.find(m => m.agentId === oldAgentId);
        if (!vacated) {
            throw new NotFoundError('Team member', oldAgentId);
        }

        const best = this.bestForRole(state, vacated);
        if (!best || !this.registry.reserve(best.profile.id, teamId)) {
            return this.degrade(state, vacated);
        }
        const replacement: TeamMember = {
            agentId: best.profile.id,
            role: vacated.role,
            capability: vacated.capability,
            score: best.score,
        };

        try {
            await options.handoff?.(oldAgentId, replacement.agentId);
            // The team may have been released or dissolved during the handoff
            this.requireActive(state);
        } catch (error) {
            this.registry.release(replacement.agentId, teamId);
            throw error;
        }

        const index = state.members.findIndex(m => m.agentId === oldAgentId);
        if (index === -1) {
            this.registry.release(replacement.agentId, teamId);
            throw new NotFoundError('Team member', oldAgentId);
        }
        if (!this.registry.markBusy(replacement.agentId, teamId)) {
            this.registry.release(replacement.agentId, teamId);
            return this.degrade(state, vacated);
        }
        this.registry.release(oldAgentId, teamId);
        state.members[index] = replacement;

        logEvent({
            level: 'info',
            taskId: state.taskId,
            teamId,
            message: `Replaced ${oldAgentId} with ${replacement.agentId} as ${vacated.role}`,
        });
        return { outcome: 'replaced', team: snapshot(state), vacated, replacement };
    }

    private requireActive(state: TeamState): void {
        if (state.status !== 'COMMITTED' && state.status !== 'DEGRADED') {
            throw new InvalidStateError(`Cannot replace members of a ${state.status} team`, { teamId: state.id });
        }
    }

    private bestForRole(state: TeamState, vacated: TeamMember): ScoredCandidate | undefined {
        const exclude = new Set(state.members.map(m => m.agentId));
        for (const member of state.vacated) exclude.add(member.agentId);
        const options = { config: this.matcherConfig, now: this.clock(), exclude };
        const available = this.registry.listAvailable();

        if (vacated.capability === null || vacated.role.startsWith(SUPPORT_ROLE)) {
            return rankForSupport(available, state.requirement, options)[0];
        }
        const slot = roleSlots(state.requirement).find(s => s.role === vacated.role);
        if (!slot) {
            return undefined;
        }
        return rankForRole(available, slot.requirement, state.requirement, options)[0];
    }

    private degrade(state: TeamState, vacated: TeamMember): ReplacementResult {
        state.members = state.members.filter(m => m.agentId !== vacated.agentId);
        state.vacated.push(vacated);
        this.registry.release(vacated.agentId, state.id);
        state.status = 'DEGRADED';

        logEvent({
            level: 'warn',
            taskId: state.taskId,
            teamId: state.id,
            message: `No replacement for ${vacated.agentId} (${vacated.role}); team degraded`,
        });

        const team = snapshot(state);
        for (const listener of [...this.degradedListeners]) {
            listener(team);
        }
        return { outcome: 'degraded', team, vacated };
    }

    private requireTeam(teamId: string): TeamState {
        const state = this.teams.get(teamId);
        if (!state) {
            throw new NotFoundError('Team', teamId);
        }
        return state;
    }
}
