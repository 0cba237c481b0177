import type { AgentContextHandle } from '../collaboration/context-store.js';
import { VersionConflictError } from '../errors.js';
import type { ProposalSource } from '../negotiation/negotiation-driver.js';
import type { Assignment, ContextItem } from '../types.js';

/**
 * What a team member receives once the negotiation has settled its role
 */
export interface RoleAssignment {
    taskId: string;
    agentId: string;
    role: string;
    items: Assignment[];
    /** The agent's view of the task's shared context */
    context: AgentContextHandle;
    signal: AbortSignal;
}

/**
 * Result returned by agents
 */
export interface AgentResult {
    success: boolean;
    output?: string;
    error?: string;
    artifacts?: Record<string, unknown>;
}

/**
 * A collaborating agent: it negotiates for work, then executes its share.
 * How it executes (which model, which prompts) is its own business.
 */
export interface Participant extends ProposalSource {
    readonly agentId: string;

    /**
     * Execute the agent's share of the task. Throwing AgentUnavailableError
     * means the agent left; the team replaces it and hands off its context.
     */
    execute(assignment: RoleAssignment): Promise<AgentResult>;
}

/**
 * Lookup from agent id to the participant acting for it
 */
export class ParticipantDirectory {
    private participants: Map<string, Participant> = new Map();

    register(participant: Participant): void {
        this.participants.set(participant.agentId, participant);
    }

    unregister(agentId: string): boolean {
        return this.participants.delete(agentId);
    }

    get(agentId: string): Participant | undefined {
        return this.participants.get(agentId);
    }

    has(agentId: string): boolean {
        return this.participants.has(agentId);
    }
}

/**
 * Read-modify-write against the shared context, re-reading on version conflicts
 */
export async function updateWithRetry(
    context: AgentContextHandle,
    key: string,
    update: (current: ContextItem | undefined) => unknown,
    maxAttempts = 5
): Promise<number> {
    for (let attempt = 1; ; attempt++) {
        const current = await context.read(key);
        try {
            return await context.write(key, update(current), current?.version ?? null);
        } catch (error) {
            if (!(error instanceof VersionConflictError) || attempt >= maxAttempts) {
                throw error;
            }
        }
    }
}
