/**
 * Round resolution for the negotiation protocol.
 *
 * Given the proposals collected for one round, decide who owns each contested
 * item, re-offer leftovers to losing agents, flag UNPLACED agents and enforce
 * the budget. Pure: the engine owns all state and timing.
 */

import type {
    AgendaItem,
    Assignment,
    Claim,
    ConflictRecord,
    NegotiationConfig,
    NegotiationMember,
    Proposal,
    RoundRecord,
} from '../types.js';
import { proficiencyOf } from '../registry/capability-matcher.js';

export interface RoundInput {
    round: number;
    items: readonly AgendaItem[];
    budget?: number;
    members: readonly NegotiationMember[];
    /** Assignments fixed before this round */
    settled: readonly Assignment[];
    proposals: readonly Proposal[];
    timedOut: readonly string[];
    relaxation: Readonly<Record<string, number>>;
    config: Pick<NegotiationConfig, 'proficiencyEpsilon' | 'relaxationStep'>;
    closedAt: string;
}

export type RoundStatus = 'OPEN' | 'RESOLVED' | 'FAILED';

export interface RoundOutcome {
    record: RoundRecord;
    /** All assignments after this round, in agenda order */
    settled: Assignment[];
    relaxation: Record<string, number>;
    status: RoundStatus;
    failureReason?: 'BUDGET';
}

interface Bid {
    member: NegotiationMember;
    claim: Claim;
    proficiency: number;
}

function byId(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Minimum proficiency an agent must show for an item, lowered for every round it spent UNPLACED
 */
export function eligibilityThreshold(
    item: AgendaItem,
    agentId: string,
    relaxation: Readonly<Record<string, number>>,
    relaxationStep: number
): number {
    const relaxed = item.minProficiency - (relaxation[agentId] ?? 0) * relaxationStep;
    return Math.max(0, Math.round(relaxed * 1e9) / 1e9);
}

export function canTake(
    member: NegotiationMember,
    item: AgendaItem,
    relaxation: Readonly<Record<string, number>>,
    relaxationStep: number
): boolean {
    return proficiencyOf(member, item.capability) >= eligibilityThreshold(item, member.agentId, relaxation, relaxationStep);
}

/**
 * Conflict policy, in order: higher proficiency (within epsilon), lower load, lower id
 */
export function compareBids(a: Bid, b: Bid, epsilon: number): number {
    if (Math.abs(a.proficiency - b.proficiency) > epsilon) {
        return b.proficiency - a.proficiency;
    }
    if (a.member.load !== b.member.load) {
        return a.member.load - b.member.load;
    }
    return byId(a.member.agentId, b.member.agentId);
}

function decidingRule(winner: Bid, runnerUp: Bid, epsilon: number): ConflictRecord['rule'] {
    if (Math.abs(winner.proficiency - runnerUp.proficiency) > epsilon) return 'capability';
    if (winner.member.load !== runnerUp.member.load) return 'load';
    return 'agent-id';
}

function totalCost(assignments: readonly Assignment[]): number {
    return assignments.reduce((sum, a) => sum + a.cost, 0);
}

/**
 * Resolve one negotiation round
 */
export function resolveRound(input: RoundInput): RoundOutcome {
    const { round, items, members, config, relaxation } = input;
    const epsilon = config.proficiencyEpsilon;
    const settledIds = new Set(input.settled.map(a => a.itemId));
    const openItems = items.filter(item => !settledIds.has(item.id));
    const timedOut = new Set(input.timedOut);
    const memberById = new Map(members.map(m => [m.agentId, m]));

    // Collect eligible bids per item; claims on unknown, settled or out-of-reach items are dropped
    const bidsByItem = new Map<string, Bid[]>();
    const claimants = new Set<string>();
    for (const proposal of input.proposals) {
        const member = memberById.get(proposal.agentId);
        if (!member || timedOut.has(proposal.agentId)) continue;
        const seen = new Set<string>();
        for (const claim of proposal.claims) {
            const item = openItems.find(i => i.id === claim.itemId);
            if (!item || seen.has(item.id)) continue;
            seen.add(item.id);
            if (!canTake(member, item, relaxation, config.relaxationStep)) continue;
            const bids = bidsByItem.get(item.id) ?? [];
            bids.push({ member, claim, proficiency: proficiencyOf(member, item.capability) });
            bidsByItem.set(item.id, bids);
            claimants.add(member.agentId);
        }
    }

    const conflicts: ConflictRecord[] = [];
    const awarded: Assignment[] = [];
    const rankedBids = new Map<string, Bid[]>();

    for (const item of openItems) {
        const bids = bidsByItem.get(item.id);
        if (!bids || bids.length === 0) continue;
        const ranked = [...bids].sort((a, b) => compareBids(a, b, epsilon));
        rankedBids.set(item.id, ranked);
        const [winner, runnerUp] = ranked;

        if (!runnerUp) {
            awarded.push({ itemId: item.id, agentId: winner.member.agentId, cost: winner.claim.estimatedCost, round, rule: 'uncontested' });
            continue;
        }

        const rule = decidingRule(winner, runnerUp, epsilon);
        conflicts.push({
            itemId: item.id,
            claimants: ranked.map(b => b.member.agentId),
            winner: winner.member.agentId,
            rule,
        });
        awarded.push({ itemId: item.id, agentId: winner.member.agentId, cost: winner.claim.estimatedCost, round, rule });
    }

    // Losers get the best item nobody claimed this round
    const winners = new Set(awarded.map(a => a.agentId));
    const losers = [...claimants].filter(id => !winners.has(id)).sort(byId);
    for (const agentId of losers) {
        const member = memberById.get(agentId);
        if (!member) continue;
        const taken = new Set(awarded.map(a => a.itemId));
        let best: AgendaItem | undefined;
        for (const item of openItems) {
            if (taken.has(item.id) || bidsByItem.has(item.id)) continue;
            if (!canTake(member, item, relaxation, config.relaxationStep)) continue;
            if (!best || proficiencyOf(member, item.capability) > proficiencyOf(member, best.capability) + epsilon) {
                best = item;
            }
        }
        if (best) {
            awarded.push({ itemId: best.id, agentId, cost: best.cost, round, rule: 'reoffer' });
        }
    }

    // Budget: move items to their cheapest claimant, largest saving first
    let failureReason: 'BUDGET' | undefined;
    if (input.budget !== undefined) {
        const spent = totalCost(input.settled);
        if (spent + totalCost(awarded) > input.budget) {
            const swaps = awarded
                .map((assignment, index) => {
                    const ranked = rankedBids.get(assignment.itemId);
                    if (!ranked || assignment.rule === 'reoffer') return undefined;
                    const cheapest = ranked.reduce((min, bid) => (bid.claim.estimatedCost < min.claim.estimatedCost ? bid : min));
                    const saving = assignment.cost - cheapest.claim.estimatedCost;
                    return saving > 0 ? { index, bid: cheapest, saving } : undefined;
                })
                .filter((swap): swap is { index: number; bid: Bid; saving: number } => swap !== undefined)
                .sort((a, b) => b.saving - a.saving || a.index - b.index);

            for (const swap of swaps) {
                if (spent + totalCost(awarded) <= input.budget) break;
                const current = awarded[swap.index];
                awarded[swap.index] = {
                    ...current,
                    agentId: swap.bid.member.agentId,
                    cost: swap.bid.claim.estimatedCost,
                    rule: 'budget',
                };
            }

            if (spent + totalCost(awarded) > input.budget) {
                failureReason = 'BUDGET';
            }
        }
    }

    const order = new Map(items.map((item, index) => [item.id, index]));
    const settled = [...input.settled, ...awarded].sort(
        (a, b) => (order.get(a.itemId) ?? 0) - (order.get(b.itemId) ?? 0)
    );
    const owners = new Set(settled.map(a => a.agentId));
    const remaining = items.filter(item => !settled.some(a => a.itemId === item.id));

    const unplaced: string[] = [];
    const idle: string[] = [];
    for (const member of [...members].sort((a, b) => byId(a.agentId, b.agentId))) {
        if (owners.has(member.agentId)) continue;
        if (remaining.length > 0 || timedOut.has(member.agentId)) {
            unplaced.push(member.agentId);
        } else {
            idle.push(member.agentId);
        }
    }

    const nextRelaxation: Record<string, number> = { ...relaxation };
    for (const agentId of unplaced) {
        nextRelaxation[agentId] = (nextRelaxation[agentId] ?? 0) + 1;
    }

    const record: RoundRecord = {
        round,
        proposals: input.proposals.map(p => ({ ...p, claims: p.claims.map(c => ({ ...c })) })),
        timedOut: [...input.timedOut].sort(byId),
        conflicts,
        assignments: awarded,
        unplaced,
        idle,
        totalCost: totalCost(settled),
        closedAt: input.closedAt,
    };

    let status: RoundStatus = 'OPEN';
    if (failureReason) {
        status = 'FAILED';
    } else if (remaining.length === 0 && unplaced.length === 0) {
        status = 'RESOLVED';
    }

    return { record, settled, relaxation: nextRelaxation, status, failureReason };
}
