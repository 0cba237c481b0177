/**
 * Negotiation Engine
 *
 * Explicit state machine for the assignment protocol:
 *   OPEN -> RESOLVED | FAILED | ABORTED
 * Rounds are barriers. The engine only records proposals and closes rounds;
 * scheduling, broadcast and timeouts belong to the driver.
 */

import { randomUUID } from 'crypto';
import { InvalidStateError, NotFoundError, ValidationError } from '../errors.js';
import { logEvent } from '../logging/index.js';
import {
    defaultNegotiationConfig,
    type AgendaItem,
    type Assignment,
    type Claim,
    type Negotiation,
    type NegotiationAgenda,
    type NegotiationConfig,
    type NegotiationFailureReason,
    type NegotiationMember,
    type NegotiationTrace,
} from '../types.js';
import { resolveRound } from './conflict-resolver.js';

export interface OpenNegotiationInput {
    teamId: string;
    taskId: string;
    agenda: NegotiationAgenda;
    members: NegotiationMember[];
    /** Assignments that stay fixed, e.g. carried over from a degraded team */
    settled?: Assignment[];
}

export interface NegotiationAnalysis {
    negotiationId: string;
    status: Negotiation['status'];
    rounds: number;
    conflicts: number;
    conflictsByRule: Record<string, number>;
    reoffers: number;
    /** itemId count per member */
    itemsPerAgent: Record<string, number>;
    costPerAgent: Record<string, number>;
    totalCost: number;
    /** Jain's index over items per member: 1 is perfectly even, 1/n maximally skewed */
    fairness: number;
    unplacedRounds: Record<string, number>;
}

function isTerminal(negotiation: Negotiation): boolean {
    return negotiation.status !== 'OPEN';
}

function validateAgenda(agenda: NegotiationAgenda): void {
    const ids = new Set<string>();
    agenda.items.forEach((item: AgendaItem, index) => {
        if (!item.id) {
            throw new ValidationError('Agenda item id is required', `agenda.items[${index}].id`, item.id);
        }
        if (ids.has(item.id)) {
            throw new ValidationError(`Duplicate agenda item: ${item.id}`, `agenda.items[${index}].id`, item.id);
        }
        ids.add(item.id);
        if (!(item.cost >= 0)) {
            throw new ValidationError('Item cost must be >= 0', `agenda.items[${index}].cost`, item.cost);
        }
    });
    if (agenda.budget !== undefined && !(agenda.budget >= 0)) {
        throw new ValidationError('Budget must be >= 0', 'agenda.budget', agenda.budget);
    }
}

/**
 * Jain's fairness index: (sum x)^2 / (n * sum x^2)
 */
export function jainIndex(values: number[]): number {
    if (values.length === 0) return 1;
    const sum = values.reduce((a, b) => a + b, 0);
    const squares = values.reduce((a, b) => a + b * b, 0);
    if (squares === 0) return 1;
    return (sum * sum) / (values.length * squares);
}

export class NegotiationEngine {
    private negotiations: Map<string, Negotiation> = new Map();
    private pending: Map<string, Map<string, Claim[]>> = new Map();
    private config: NegotiationConfig;
    private clock: () => Date;

    constructor(config: Partial<NegotiationConfig> = {}, clock: () => Date = () => new Date()) {
        this.config = { ...defaultNegotiationConfig, ...config };
        this.clock = clock;
    }

    get settings(): Readonly<NegotiationConfig> {
        return this.config;
    }

    /**
     * Start a negotiation at round 1. With nobody to negotiate, it fails immediately.
     */
    open(input: OpenNegotiationInput): Negotiation {
        validateAgenda(input.agenda);
        const now = this.clock().toISOString();
        const negotiation: Negotiation = {
            id: randomUUID(),
            teamId: input.teamId,
            taskId: input.taskId,
            round: 1,
            status: 'OPEN',
            agenda: { ...input.agenda, items: input.agenda.items.map(item => ({ ...item })) },
            members: input.members.map(m => ({ ...m })),
            settled: (input.settled ?? []).map(a => ({ ...a })),
            resolution: (input.settled ?? []).map(a => ({ ...a })),
            rounds: [],
            relaxation: {},
            openedAt: now,
        };
        this.negotiations.set(negotiation.id, negotiation);
        this.pending.set(negotiation.id, new Map());

        logEvent({
            level: 'info',
            taskId: input.taskId,
            teamId: input.teamId,
            message: `Negotiation ${negotiation.id} opened`,
            details: { members: negotiation.members.length, items: negotiation.agenda.items.length },
        });

        const open = negotiation.agenda.items.filter(item => !negotiation.settled.some(a => a.itemId === item.id));
        if (negotiation.members.length === 0 && open.length > 0) {
            this.finish(negotiation, 'FAILED', 'NO_PARTICIPANTS');
        } else if (open.length === 0) {
            this.finish(negotiation, 'RESOLVED');
        }
        return this.snapshot(negotiation);
    }

    /**
     * Record one member's proposal for the current round. Re-submitting replaces it.
     */
    submit(negotiationId: string, agentId: string, round: number, claims: Claim[]): void {
        const negotiation = this.require(negotiationId);
        if (isTerminal(negotiation)) {
            throw new InvalidStateError(`Negotiation is ${negotiation.status}`, { negotiationId });
        }
        if (round !== negotiation.round) {
            throw new InvalidStateError(`Proposal for round ${round} but round ${negotiation.round} is open`, {
                negotiationId,
                agentId,
            });
        }
        if (!negotiation.members.some(m => m.agentId === agentId)) {
            throw new ValidationError(`Agent ${agentId} is not negotiating`, 'agentId', agentId);
        }
        claims.forEach((claim, index) => {
            if (!(claim.estimatedCost >= 0)) {
                throw new ValidationError('Estimated cost must be >= 0', `claims[${index}].estimatedCost`, claim.estimatedCost);
            }
        });
        this.pendingFor(negotiationId).set(agentId, claims.map(c => ({ ...c })));
    }

    /**
     * Members that have not yet submitted for the current round
     */
    pendingMembers(negotiationId: string): string[] {
        const negotiation = this.require(negotiationId);
        const submitted = this.pendingFor(negotiationId);
        return negotiation.members.map(m => m.agentId).filter(id => !submitted.has(id));
    }

    /**
     * Close the current round. Members without a proposal are recorded as timed out.
     */
    closeRound(negotiationId: string): Negotiation {
        const negotiation = this.require(negotiationId);
        if (isTerminal(negotiation)) {
            throw new InvalidStateError(`Negotiation is ${negotiation.status}`, { negotiationId });
        }
        const submitted = this.pendingFor(negotiationId);
        const timedOut = this.pendingMembers(negotiationId);

        const outcome = resolveRound({
            round: negotiation.round,
            items: negotiation.agenda.items,
            budget: negotiation.agenda.budget,
            members: negotiation.members,
            settled: negotiation.resolution,
            proposals: negotiation.members
                .filter(m => submitted.has(m.agentId))
                .map(m => ({ agentId: m.agentId, round: negotiation.round, claims: submitted.get(m.agentId) ?? [] })),
            timedOut,
            relaxation: negotiation.relaxation,
            config: this.config,
            closedAt: this.clock().toISOString(),
        });

        negotiation.rounds.push(outcome.record);
        negotiation.resolution = outcome.settled;
        negotiation.relaxation = outcome.relaxation;
        submitted.clear();

        logEvent({
            level: outcome.record.unplaced.length > 0 ? 'warn' : 'info',
            taskId: negotiation.taskId,
            teamId: negotiation.teamId,
            message: `Round ${negotiation.round} closed`,
            details: {
                negotiationId,
                conflicts: outcome.record.conflicts.length,
                assigned: outcome.record.assignments.length,
                unplaced: outcome.record.unplaced,
                timedOut,
            },
        });

        if (outcome.status === 'FAILED') {
            this.finish(negotiation, 'FAILED', outcome.failureReason);
        } else if (outcome.status === 'RESOLVED') {
            this.finish(negotiation, 'RESOLVED');
        } else if (negotiation.round >= this.config.maxRounds) {
            this.finish(negotiation, 'FAILED', 'ROUND_LIMIT');
        } else {
            negotiation.round++;
        }
        return this.snapshot(negotiation);
    }

    /**
     * External cancellation. Terminal negotiations are left as they are.
     */
    cancel(negotiationId: string): Negotiation {
        const negotiation = this.require(negotiationId);
        if (!isTerminal(negotiation)) {
            this.finish(negotiation, 'ABORTED');
        }
        return this.snapshot(negotiation);
    }

    /**
     * Fail an open negotiation from outside the round loop (overall timeout)
     */
    fail(negotiationId: string, reason: NegotiationFailureReason): Negotiation {
        const negotiation = this.require(negotiationId);
        if (!isTerminal(negotiation)) {
            this.finish(negotiation, 'FAILED', reason);
        }
        return this.snapshot(negotiation);
    }

    /**
     * Open a follow-up negotiation after a membership change. Items owned by
     * remaining members stay settled; the vacated member's items reopen.
     */
    renegotiate(
        previousId: string,
        input: { members: NegotiationMember[]; vacatedAgentIds: string[]; keepAssignments?: boolean }
    ): Negotiation {
        const previous = this.require(previousId);
        const vacated = new Set(input.vacatedAgentIds);
        const memberIds = new Set(input.members.map(m => m.agentId));
        const keep = input.keepAssignments ?? previous.status === 'RESOLVED';
        const settled = keep
            ? previous.resolution.filter(a => !vacated.has(a.agentId) && memberIds.has(a.agentId))
            : [];
        return this.open({
            teamId: previous.teamId,
            taskId: previous.taskId,
            agenda: previous.agenda,
            members: input.members,
            settled,
        });
    }

    get(negotiationId: string): Negotiation | undefined {
        const negotiation = this.negotiations.get(negotiationId);
        return negotiation ? this.snapshot(negotiation) : undefined;
    }

    trace(negotiationId: string): NegotiationTrace {
        const negotiation = this.require(negotiationId);
        return {
            negotiationId: negotiation.id,
            status: negotiation.status,
            rounds: structuredClone(negotiation.rounds),
            resolution: negotiation.resolution.map(a => ({ ...a })),
            failureReason: negotiation.failureReason,
        };
    }

    /**
     * Summarise how a negotiation went: conflicts by rule, cost and item spread, fairness
     */
    analyze(negotiationId: string): NegotiationAnalysis {
        const negotiation = this.require(negotiationId);
        const conflictsByRule: Record<string, number> = {};
        let conflicts = 0;
        let reoffers = 0;
        const unplacedRounds: Record<string, number> = {};

        for (const round of negotiation.rounds) {
            for (const conflict of round.conflicts) {
                conflicts++;
                conflictsByRule[conflict.rule] = (conflictsByRule[conflict.rule] ?? 0) + 1;
            }
            reoffers += round.assignments.filter(a => a.rule === 'reoffer').length;
            for (const agentId of round.unplaced) {
                unplacedRounds[agentId] = (unplacedRounds[agentId] ?? 0) + 1;
            }
        }

        const itemsPerAgent: Record<string, number> = {};
        const costPerAgent: Record<string, number> = {};
        for (const member of negotiation.members) {
            itemsPerAgent[member.agentId] = 0;
            costPerAgent[member.agentId] = 0;
        }
        for (const assignment of negotiation.resolution) {
            itemsPerAgent[assignment.agentId] = (itemsPerAgent[assignment.agentId] ?? 0) + 1;
            costPerAgent[assignment.agentId] = (costPerAgent[assignment.agentId] ?? 0) + assignment.cost;
        }

        return {
            negotiationId,
            status: negotiation.status,
            rounds: negotiation.rounds.length,
            conflicts,
            conflictsByRule,
            reoffers,
            itemsPerAgent,
            costPerAgent,
            totalCost: negotiation.resolution.reduce((sum, a) => sum + a.cost, 0),
            fairness: jainIndex(Object.values(itemsPerAgent)),
            unplacedRounds,
        };
    }

    private finish(negotiation: Negotiation, status: 'RESOLVED' | 'FAILED' | 'ABORTED', reason?: NegotiationFailureReason): void {
        negotiation.status = status;
        negotiation.failureReason = reason;
        negotiation.closedAt = this.clock().toISOString();
        this.pending.delete(negotiation.id);

        logEvent({
            level: status === 'RESOLVED' ? 'info' : 'warn',
            taskId: negotiation.taskId,
            teamId: negotiation.teamId,
            message: `Negotiation ${negotiation.id} ${status}${reason ? `: ${reason}` : ''}`,
            details: { rounds: negotiation.rounds.length },
        });
    }

    private pendingFor(negotiationId: string): Map<string, Claim[]> {
        let submitted = this.pending.get(negotiationId);
        if (!submitted) {
            submitted = new Map();
            this.pending.set(negotiationId, submitted);
        }
        return submitted;
    }

    private require(negotiationId: string): Negotiation {
        const negotiation = this.negotiations.get(negotiationId);
        if (!negotiation) {
            throw new NotFoundError('Negotiation', negotiationId);
        }
        return negotiation;
    }

    private snapshot(negotiation: Negotiation): Negotiation {
        return structuredClone(negotiation);
    }
}
