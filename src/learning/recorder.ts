/**
 * Collaborative Learning Recorder
 *
 * Appends one immutable episode per finished task. Recording is best-effort:
 * storage failures are logged and retried with exponential backoff, and never
 * reach the task that produced the episode.
 */

import { randomUUID } from 'crypto';
import { logEvent } from '../logging/index.js';
import { backoffMs, delay } from '../utils/timing.js';
import {
    defaultRecorderConfig,
    type AgentTeam,
    type LearningEvent,
    type NegotiationTrace,
    type OutcomeMetrics,
    type RecorderConfig,
} from '../types.js';
import { participantsOf, type EpisodeStore } from './episode-store.js';

export interface RecordResult {
    recorded: boolean;
    attempts: number;
    event: LearningEvent;
    error?: string;
}

export interface AgentSummary {
    agentId: string;
    episodes: number;
    successes: number;
    successRate: number;
    averageDurationMs: number;
    /** role -> number of episodes served in it */
    roles: Record<string, number>;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const nested of Object.values(value)) {
            deepFreeze(nested);
        }
    }
    return value;
}

export class LearningRecorder {
    private config: RecorderConfig;
    private inFlight: Set<Promise<RecordResult>> = new Set();

    constructor(
        private store: EpisodeStore,
        config: Partial<RecorderConfig> = {},
        private clock: () => Date = () => new Date()
    ) {
        this.config = { ...defaultRecorderConfig, ...config };
    }

    /**
     * Append an episode. Resolves once it is stored or retries are exhausted; never rejects.
     */
    async recordEpisode(team: AgentTeam, trace: NegotiationTrace, metrics: OutcomeMetrics): Promise<RecordResult> {
        const event: LearningEvent = deepFreeze(
            structuredClone({
                id: randomUUID(),
                taskId: team.taskId,
                teamId: team.id,
                team,
                negotiation: trace,
                metrics,
                recordedAt: this.clock().toISOString(),
            })
        );

        const attempts = 1 + this.config.maxRetries;
        let lastError = '';
        for (let attempt = 1; attempt <= attempts; attempt++) {
            try {
                await this.store.append(event);
                logEvent({
                    level: 'info',
                    taskId: event.taskId,
                    teamId: event.teamId,
                    message: 'Episode recorded',
                    details: { episodeId: event.id, success: metrics.success, attempt },
                });
                return { recorded: true, attempts: attempt, event };
            } catch (error) {
                lastError = error instanceof Error ? error.message : String(error);
                logEvent({
                    level: attempt < attempts ? 'warn' : 'error',
                    taskId: event.taskId,
                    teamId: event.teamId,
                    message: `Recording episode failed (attempt ${attempt}/${attempts})`,
                    details: { episodeId: event.id, error: lastError },
                });
                if (attempt < attempts) {
                    await delay(
                        backoffMs(attempt, this.config.initialBackoffMs, this.config.backoffMultiplier, this.config.maxBackoffMs)
                    );
                }
            }
        }
        return { recorded: false, attempts, event, error: lastError };
    }

    /**
     * Record without waiting; flush() waits for everything submitted so far
     */
    submit(team: AgentTeam, trace: NegotiationTrace, metrics: OutcomeMetrics): void {
        const pending = this.recordEpisode(team, trace, metrics);
        this.inFlight.add(pending);
        void pending.finally(() => this.inFlight.delete(pending));
    }

    async flush(): Promise<RecordResult[]> {
        return Promise.all([...this.inFlight]);
    }

    get pending(): number {
        return this.inFlight.size;
    }

    getAgentHistory(agentId: string): Promise<LearningEvent[]> {
        return this.store.byAgent(agentId);
    }

    getTeamHistory(teamId: string): Promise<LearningEvent[]> {
        return this.store.byTeam(teamId);
    }

    getTaskHistory(taskId: string): Promise<LearningEvent[]> {
        return this.store.byTask(taskId);
    }

    recent(limit?: number): Promise<LearningEvent[]> {
        return this.store.recent(limit);
    }

    async summarizeAgent(agentId: string): Promise<AgentSummary> {
        const history = await this.getAgentHistory(agentId);
        const roles: Record<string, number> = {};
        let successes = 0;
        let duration = 0;

        for (const event of history) {
            if (event.metrics.success) successes++;
            duration += event.metrics.durationMs;
            const participant = participantsOf(event).find(p => p.agentId === agentId);
            if (participant) {
                roles[participant.role] = (roles[participant.role] ?? 0) + 1;
            }
        }

        return {
            agentId,
            episodes: history.length,
            successes,
            successRate: history.length === 0 ? 0 : successes / history.length,
            averageDurationMs: history.length === 0 ? 0 : duration / history.length,
            roles,
        };
    }
}
