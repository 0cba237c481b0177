/**
 * Negotiation Driver
 *
 * Runs the engine's rounds as broadcast/collect steps: every active member is
 * asked for a proposal, the round closes when all have answered or the round
 * timer fires, and the whole run is bounded by the overall negotiation timeout.
 */

import { CancelledError } from '../errors.js';
import { logEvent } from '../logging/index.js';
import type { AgendaItem, Assignment, Claim, Negotiation, RoundRecord } from '../types.js';
import type { NegotiationEngine } from './negotiation-engine.js';

export interface ProposalRequest {
    negotiationId: string;
    taskId: string;
    round: number;
    agentId: string;
    /** Items still without an owner */
    openItems: AgendaItem[];
    settled: Assignment[];
    /** Rounds this agent has spent UNPLACED; its proficiency threshold drops accordingly */
    relaxation: number;
    budget?: number;
    previousRound?: RoundRecord;
    signal: AbortSignal;
}

export interface ProposalSource {
    propose(request: ProposalRequest): Promise<Claim[]>;
}

export interface DriveOptions {
    signal?: AbortSignal;
}

type RoundEnd = 'complete' | 'timeout' | 'deadline' | 'aborted';

export class NegotiationDriver {
    constructor(
        private engine: NegotiationEngine,
        private participants: (agentId: string) => ProposalSource | undefined
    ) {}

    /**
     * Drive an open negotiation to a terminal state
     */
    async run(negotiationId: string, options: DriveOptions = {}): Promise<Negotiation> {
        const settings = this.engine.settings;
        const deadline = Date.now() + settings.negotiationTimeoutMs;
        let negotiation = this.current(negotiationId);

        while (negotiation.status === 'OPEN') {
            if (options.signal?.aborted) {
                return this.engine.cancel(negotiationId);
            }
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                return this.engine.fail(negotiationId, 'TIMEOUT');
            }

            const end = await this.collectRound(negotiation, Math.min(settings.roundTimeoutMs, remaining), remaining, options.signal);
            if (end === 'aborted') {
                return this.engine.cancel(negotiationId);
            }
            if (end === 'deadline') {
                return this.engine.fail(negotiationId, 'TIMEOUT');
            }
            negotiation = this.engine.closeRound(negotiationId);
        }
        return negotiation;
    }

    private current(negotiationId: string): Negotiation {
        const negotiation = this.engine.get(negotiationId);
        if (!negotiation) {
            throw new CancelledError(`Negotiation ${negotiationId} disappeared`);
        }
        return negotiation;
    }

    private collectRound(
        negotiation: Negotiation,
        roundMs: number,
        remainingMs: number,
        signal?: AbortSignal
    ): Promise<RoundEnd> {
        const round = negotiation.round;
        const settledIds = new Set(negotiation.resolution.map(a => a.itemId));
        const openItems = negotiation.agenda.items.filter(item => !settledIds.has(item.id));
        const previousRound = negotiation.rounds[negotiation.rounds.length - 1];
        const roundController = new AbortController();

        return new Promise<RoundEnd>(resolve => {
            let outstanding = negotiation.members.length;
            let settled = false;

            const finish = (end: RoundEnd) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                // Late answers are dropped from here on
                roundController.abort();
                resolve(end);
            };
            const onAbort = () => finish('aborted');
            // The round timer is capped by the overall deadline
            const timer = setTimeout(() => finish(roundMs >= remainingMs ? 'deadline' : 'timeout'), roundMs);
            signal?.addEventListener('abort', onAbort, { once: true });
            if (signal?.aborted) {
                finish('aborted');
                return;
            }
            if (outstanding === 0) {
                finish('complete');
                return;
            }

            for (const member of negotiation.members) {
                const source = this.participants(member.agentId);
                const answered = () => {
                    outstanding--;
                    if (outstanding === 0) finish('complete');
                };

                if (!source) {
                    logEvent({
                        level: 'warn',
                        taskId: negotiation.taskId,
                        agentId: member.agentId,
                        message: 'No participant registered; member is unplaced this round',
                    });
                    answered();
                    continue;
                }

                void source
                    .propose({
                        negotiationId: negotiation.id,
                        taskId: negotiation.taskId,
                        round,
                        agentId: member.agentId,
                        openItems: openItems.map(item => ({ ...item })),
                        settled: negotiation.resolution.map(a => ({ ...a })),
                        relaxation: negotiation.relaxation[member.agentId] ?? 0,
                        budget: negotiation.agenda.budget,
                        previousRound,
                        signal: roundController.signal,
                    })
                    .then(claims => {
                        if (roundController.signal.aborted) return;
                        this.engine.submit(negotiation.id, member.agentId, round, claims);
                    })
                    .catch((error: unknown) => {
                        // A failing participant counts as not having answered
                        logEvent({
                            level: 'warn',
                            taskId: negotiation.taskId,
                            agentId: member.agentId,
                            message: `Proposal failed in round ${round}`,
                            details: { error: error instanceof Error ? error.message : String(error) },
                        });
                    })
                    .finally(answered);
            }
        });
    }
}
