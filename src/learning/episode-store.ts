import type Database from 'better-sqlite3';
import {
    getLearningEventById,
    getLearningEventsByAgent,
    getLearningEventsByTask,
    getLearningEventsByTeam,
    getRecentLearningEvents,
    insertLearningEvent,
    type LearningEventRow,
} from '../db/index.js';
import { InvalidStateError } from '../errors.js';
import type { LearningEvent } from '../types.js';

/**
 * Append-only storage for learning episodes, keyed by (taskId, episode id)
 */
export interface EpisodeStore {
    append(event: LearningEvent): Promise<void>;
    get(id: string): Promise<LearningEvent | undefined>;
    byTask(taskId: string): Promise<LearningEvent[]>;
    byTeam(teamId: string): Promise<LearningEvent[]>;
    byAgent(agentId: string): Promise<LearningEvent[]>;
    recent(limit?: number): Promise<LearningEvent[]>;
}

/**
 * Every agent that served on the team, including members that left without replacement
 */
export function participantsOf(event: LearningEvent): { agentId: string; role: string }[] {
    return [...event.team.members, ...event.team.vacated].map(m => ({ agentId: m.agentId, role: m.role }));
}

export class MemoryEpisodeStore implements EpisodeStore {
    private events: LearningEvent[] = [];

    async append(event: LearningEvent): Promise<void> {
        if (this.events.some(e => e.id === event.id)) {
            throw new InvalidStateError(`Episode already recorded: ${event.id}`, { taskId: event.taskId });
        }
        this.events.push(structuredClone(event));
    }

    async get(id: string): Promise<LearningEvent | undefined> {
        const event = this.events.find(e => e.id === id);
        return event ? structuredClone(event) : undefined;
    }

    async byTask(taskId: string): Promise<LearningEvent[]> {
        return structuredClone(this.events.filter(e => e.taskId === taskId));
    }

    async byTeam(teamId: string): Promise<LearningEvent[]> {
        return structuredClone(this.events.filter(e => e.teamId === teamId));
    }

    async byAgent(agentId: string): Promise<LearningEvent[]> {
        return structuredClone(this.events.filter(e => participantsOf(e).some(p => p.agentId === agentId)));
    }

    async recent(limit = 20): Promise<LearningEvent[]> {
        return structuredClone(this.events.slice(-limit).reverse());
    }
}

function isLearningEvent(value: unknown): value is LearningEvent {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'id' in value &&
        typeof value.id === 'string' &&
        'taskId' in value &&
        typeof value.taskId === 'string' &&
        'team' in value &&
        typeof value.team === 'object' &&
        'metrics' in value &&
        typeof value.metrics === 'object'
    );
}

function fromRow(row: LearningEventRow): LearningEvent {
    const parsed: unknown = JSON.parse(row.episode);
    if (!isLearningEvent(parsed)) {
        throw new InvalidStateError(`Stored episode ${row.id} is malformed`, { taskId: row.task_id });
    }
    return parsed;
}

export class SqliteEpisodeStore implements EpisodeStore {
    constructor(private database: Database.Database) {}

    async append(event: LearningEvent): Promise<void> {
        insertLearningEvent(
            {
                id: event.id,
                task_id: event.taskId,
                team_id: event.teamId,
                success: event.metrics.success ? 1 : 0,
                episode: JSON.stringify(event),
                recorded_at: event.recordedAt,
            },
            participantsOf(event).map(p => ({ agent_id: p.agentId, role: p.role })),
            this.database
        );
    }

    async get(id: string): Promise<LearningEvent | undefined> {
        const row = getLearningEventById(id, this.database);
        return row ? fromRow(row) : undefined;
    }

    async byTask(taskId: string): Promise<LearningEvent[]> {
        return getLearningEventsByTask(taskId, this.database).map(fromRow);
    }

    async byTeam(teamId: string): Promise<LearningEvent[]> {
        return getLearningEventsByTeam(teamId, this.database).map(fromRow);
    }

    async byAgent(agentId: string): Promise<LearningEvent[]> {
        return getLearningEventsByAgent(agentId, this.database).map(fromRow);
    }

    async recent(limit = 20): Promise<LearningEvent[]> {
        return getRecentLearningEvents(limit, this.database).map(fromRow);
    }
}
