/**
 * Scripted participant
 *
 * A deterministic stand-in for a model-backed agent. It claims the open items
 * it has a capability for, and executes by writing one result per item plus
 * an entry in the shared progress log. Used by `concord simulate` and tests.
 */

import { AgentUnavailableError } from '../errors.js';
import type { ProposalRequest } from '../negotiation/negotiation-driver.js';
import { delay } from '../utils/timing.js';
import type { Capability, Claim } from '../types.js';
import { updateWithRetry, type AgentResult, type Participant, type RoleAssignment } from './base.js';

export interface ScriptedParticipantOptions {
    agentId: string;
    capabilities: readonly Capability[];
    /** Multiplier applied to each item's declared cost when estimating */
    costFactor?: number;
    /** Fixed claims by item id; overrides capability-based claiming */
    claims?: string[];
    proposeDelayMs?: number;
    executeDelayMs?: number;
    /** Fail every proposal with this message */
    proposeError?: string;
    /** Leave the task (AgentUnavailableError) when asked to execute */
    departOnExecute?: boolean;
    /** Report failure from execute with this message */
    executeError?: string;
}

export const PROGRESS_KEY = 'progress';

export function resultKey(itemId: string): string {
    return `result:${itemId}`;
}

export class ScriptedParticipant implements Participant {
    readonly agentId: string;
    private options: ScriptedParticipantOptions;
    private executions = 0;

    constructor(options: ScriptedParticipantOptions) {
        this.agentId = options.agentId;
        this.options = options;
    }

    get executionCount(): number {
        return this.executions;
    }

    async propose(request: ProposalRequest): Promise<Claim[]> {
        if (this.options.proposeDelayMs) {
            await delay(this.options.proposeDelayMs, request.signal);
        }
        if (this.options.proposeError) {
            throw new Error(this.options.proposeError);
        }
        const costFactor = this.options.costFactor ?? 1;
        const wanted = this.options.claims;
        return request.openItems
            .filter(item =>
                wanted ? wanted.includes(item.id) : this.options.capabilities.some(c => c.kind === item.capability)
            )
            .map(item => ({ itemId: item.id, estimatedCost: item.cost * costFactor }));
    }

    async execute(assignment: RoleAssignment): Promise<AgentResult> {
        this.executions++;
        if (this.options.departOnExecute) {
            throw new AgentUnavailableError(this.agentId, `Agent ${this.agentId} left during execution`, {
                taskId: assignment.taskId,
            });
        }
        if (this.options.executeDelayMs) {
            await delay(this.options.executeDelayMs, assignment.signal);
        }
        if (this.options.executeError) {
            return { success: false, error: this.options.executeError };
        }

        const { context } = assignment;
        for (const item of assignment.items) {
            const current = await context.read(resultKey(item.itemId));
            await context.write(
                resultKey(item.itemId),
                { agentId: this.agentId, role: assignment.role, itemId: item.itemId },
                current?.version ?? null
            );
            await updateWithRetry(context, PROGRESS_KEY, previous => {
                const value = previous?.value;
                const entries: unknown[] = Array.isArray(value) ? value : [];
                return [...entries, `${this.agentId}:${item.itemId}`];
            });
        }

        return {
            success: true,
            output: `${this.agentId} completed ${assignment.items.length} item(s) as ${assignment.role}`,
        };
    }
}
