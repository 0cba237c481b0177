/**
 * Context Handoff Manager
 *
 * Tracks member replacements inside a task's shared context. A handoff brings
 * the incoming agent up to the outgoing agent's acknowledged position before
 * the incoming agent may write, so no acknowledged context is lost.
 */

import { randomUUID } from 'crypto';
import { isConcordError } from '../errors.js';
import { logEvent } from '../logging/index.js';
import type { HandoffReceipt, SharedContextStore } from './context-store.js';

export type HandoffStatus = 'pending' | 'completed' | 'failed';

export interface HandoffInfo {
    id: string;
    taskId: string;
    fromAgent: string;
    toAgent: string;
    status: HandoffStatus;
    /** Commit-log position the incoming agent starts from */
    position?: number;
    replayed?: number;
    error?: string;
    createdAt: Date;
    completedAt?: Date;
}

/**
 * Manages handoffs for one task
 */
export class HandoffManager {
    private handoffs: HandoffInfo[] = [];

    constructor(private store: SharedContextStore) {}

    get taskId(): string {
        return this.store.taskId;
    }

    /**
     * Hand the outgoing agent's context position to the incoming agent
     */
    async perform(fromAgent: string, toAgent: string): Promise<HandoffReceipt> {
        const info: HandoffInfo = {
            id: randomUUID(),
            taskId: this.store.taskId,
            fromAgent,
            toAgent,
            status: 'pending',
            createdAt: new Date(),
        };
        this.handoffs.push(info);

        try {
            const receipt = await this.store.handoff(fromAgent, toAgent);
            info.status = 'completed';
            info.position = receipt.position;
            info.replayed = receipt.replayed;
            info.completedAt = new Date();
            return receipt;
        } catch (error) {
            info.status = 'failed';
            info.error = error instanceof Error ? error.message : String(error);
            info.completedAt = new Date();
            logEvent({
                level: 'error',
                taskId: info.taskId,
                agentId: toAgent,
                message: `Handoff from ${fromAgent} failed`,
                details: { code: isConcordError(error) ? error.code : undefined, error: info.error },
            });
            throw error;
        }
    }

    /**
     * Handoffs for this task, oldest first
     */
    list(): HandoffInfo[] {
        return this.handoffs.map(h => ({ ...h }));
    }

    /**
     * Handoffs an agent took part in, on either side
     */
    forAgent(agentId: string): HandoffInfo[] {
        return this.list().filter(h => h.fromAgent === agentId || h.toAgent === agentId);
    }
}
