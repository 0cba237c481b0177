import { describe, it, expect } from 'vitest';
import type { AgendaItem, Assignment, NegotiationMember, Proposal } from '../types.js';
import { eligibilityThreshold, resolveRound, type RoundInput } from './conflict-resolver.js';

const A: NegotiationMember = {
    agentId: 'A',
    role: 'research',
    load: 1,
    capabilities: [{ kind: 'research', proficiency: 0.9 }, { kind: 'writing', proficiency: 0.3 }],
};
const C: NegotiationMember = {
    agentId: 'C',
    role: 'writing',
    load: 2,
    capabilities: [{ kind: 'research', proficiency: 0.8 }, { kind: 'writing', proficiency: 0.7 }],
};

const summary: AgendaItem = { id: 'summary', kind: 'subtask', capability: 'research', minProficiency: 0.7, cost: 3 };
const draft: AgendaItem = { id: 'draft', kind: 'subtask', capability: 'writing', minProficiency: 0.6, cost: 5 };

function claimAll(agentId: string, itemIds: string[], cost = 1): Proposal {
    return { agentId, round: 1, claims: itemIds.map(itemId => ({ itemId, estimatedCost: cost })) };
}

function input(overrides: Partial<RoundInput>): RoundInput {
    return {
        round: 1,
        items: [summary, draft],
        members: [A, C],
        settled: [],
        proposals: [],
        timedOut: [],
        relaxation: {},
        config: { proficiencyEpsilon: 1e-6, relaxationStep: 0.1 },
        closedAt: '2026-06-01T00:00:00.000Z',
        ...overrides,
    };
}

function owners(settled: Assignment[]): Array<[string, string, string]> {
    return settled.map(a => [a.itemId, a.agentId, a.rule]);
}

describe('resolveRound', () => {
    it('should award contested items on capability and uncontested ones directly', () => {
        const outcome = resolveRound(input({ proposals: [claimAll('A', ['summary', 'draft']), claimAll('C', ['summary', 'draft'])] }));

        expect(outcome.status).toBe('RESOLVED');
        expect(owners(outcome.settled)).toEqual([
            ['summary', 'A', 'capability'],
            ['draft', 'C', 'uncontested'],
        ]);
        expect(outcome.record.conflicts).toEqual([{ itemId: 'summary', claimants: ['A', 'C'], winner: 'A', rule: 'capability' }]);
        expect(outcome.record.totalCost).toBe(2);
    });

    it('should fall back to load and then agent id when proficiencies tie', () => {
        const X: NegotiationMember = { agentId: 'X', role: 'r', load: 3, capabilities: [{ kind: 'coding', proficiency: 0.8 }] };
        const Y: NegotiationMember = { agentId: 'Y', role: 'r', load: 1, capabilities: [{ kind: 'coding', proficiency: 0.8 }] };
        const Z: NegotiationMember = { agentId: 'Z', role: 'r', load: 1, capabilities: [{ kind: 'coding', proficiency: 0.8 }] };
        const build: AgendaItem = { id: 'build', kind: 'subtask', capability: 'coding', minProficiency: 0.5, cost: 1 };

        const byLoad = resolveRound(input({ items: [build], members: [X, Y], proposals: [claimAll('X', ['build']), claimAll('Y', ['build'])] }));
        expect(byLoad.record.conflicts[0]).toMatchObject({ winner: 'Y', rule: 'load' });

        const byId = resolveRound(input({ items: [build], members: [Z, Y], proposals: [claimAll('Z', ['build']), claimAll('Y', ['build'])] }));
        expect(byId.record.conflicts[0]).toMatchObject({ winner: 'Y', rule: 'agent-id', claimants: ['Y', 'Z'] });
    });

    it('should re-offer an unclaimed item to an agent that lost a conflict', () => {
        const outcome = resolveRound(
            input({
                items: [summary, { ...summary, id: 'sources', cost: 4 }],
                proposals: [claimAll('A', ['summary']), claimAll('C', ['summary'])],
            })
        );

        expect(outcome.status).toBe('RESOLVED');
        expect(owners(outcome.settled)).toEqual([
            ['summary', 'A', 'capability'],
            ['sources', 'C', 'reoffer'],
        ]);
        expect(outcome.settled[1].cost).toBe(4);
    });

    it('should drop claims an agent is not proficient enough for and mark it UNPLACED', () => {
        const outcome = resolveRound(input({ proposals: [claimAll('A', ['summary', 'draft']), claimAll('C', [])] }));

        expect(outcome.status).toBe('OPEN');
        expect(owners(outcome.settled)).toEqual([['summary', 'A', 'uncontested']]);
        expect(outcome.record.unplaced).toEqual(['C']);
        expect(outcome.relaxation).toEqual({ C: 1 });
    });

    it('should lower the threshold for agents that spent rounds UNPLACED', () => {
        const W: NegotiationMember = { agentId: 'W', role: 'writing', load: 0, capabilities: [{ kind: 'writing', proficiency: 0.5 }] };
        expect(eligibilityThreshold(draft, 'W', { W: 1 }, 0.1)).toBe(0.5);
        expect(eligibilityThreshold(draft, 'W', { W: 9 }, 0.1)).toBe(0);

        const first = resolveRound(input({ items: [draft], members: [W], proposals: [claimAll('W', ['draft'])] }));
        expect(first.status).toBe('OPEN');
        expect(first.record.unplaced).toEqual(['W']);

        const second = resolveRound(
            input({ round: 2, items: [draft], members: [W], relaxation: first.relaxation, proposals: [{ ...claimAll('W', ['draft']), round: 2 }] })
        );
        expect(second.status).toBe('RESOLVED');
        expect(owners(second.settled)).toEqual([['draft', 'W', 'uncontested']]);
    });

    it('should treat a silent member as UNPLACED and ignore its claims', () => {
        const outcome = resolveRound(
            input({
                items: [summary],
                proposals: [claimAll('A', ['summary']), claimAll('C', ['summary'])],
                timedOut: ['C'],
            })
        );

        expect(outcome.record.conflicts).toEqual([]);
        expect(owners(outcome.settled)).toEqual([['summary', 'A', 'uncontested']]);
        expect(outcome.record.unplaced).toEqual(['C']);
        expect(outcome.status).toBe('OPEN');
    });

    it('should leave a member idle when every item is owned', () => {
        const outcome = resolveRound(input({ items: [summary], proposals: [claimAll('A', ['summary']), claimAll('C', [])] }));
        expect(outcome.status).toBe('RESOLVED');
        expect(outcome.record.idle).toEqual(['C']);
        expect(outcome.record.unplaced).toEqual([]);
    });

    it('should ignore claims on settled items', () => {
        const settled: Assignment[] = [{ itemId: 'summary', agentId: 'A', cost: 3, round: 1, rule: 'uncontested' }];
        const outcome = resolveRound(
            input({ round: 2, settled, proposals: [{ agentId: 'C', round: 2, claims: [{ itemId: 'summary', estimatedCost: 1 }, { itemId: 'draft', estimatedCost: 2 }] }] })
        );

        expect(owners(outcome.settled)).toEqual([
            ['summary', 'A', 'uncontested'],
            ['draft', 'C', 'uncontested'],
        ]);
        expect(outcome.record.assignments).toHaveLength(1);
        expect(outcome.record.totalCost).toBe(5);
    });

    describe('budget', () => {
        const proposals: Proposal[] = [
            { agentId: 'A', round: 1, claims: [{ itemId: 'summary', estimatedCost: 6 }] },
            { agentId: 'C', round: 1, claims: [{ itemId: 'summary', estimatedCost: 2 }] },
        ];

        it('should move an item to its cheapest claimant to fit the budget', () => {
            const outcome = resolveRound(input({ items: [summary], budget: 5, proposals }));

            expect(outcome.status).toBe('RESOLVED');
            expect(outcome.settled).toEqual([{ itemId: 'summary', agentId: 'C', cost: 2, round: 1, rule: 'budget' }]);
            expect(outcome.record.idle).toEqual(['A']);
        });

        it('should fail when even the cheapest claims exceed the budget', () => {
            const outcome = resolveRound(input({ items: [summary], budget: 1, proposals }));
            expect(outcome.status).toBe('FAILED');
            expect(outcome.failureReason).toBe('BUDGET');
        });
    });
});
