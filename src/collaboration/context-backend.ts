/**
 * Durable storage behind the shared context. Any store offering a conditional
 * append (check the predecessor version, then write) can back a task's context.
 */

import type Database from 'better-sqlite3';
import {
    appendContextRow,
    getContextHistory,
    getContextRowAt,
    getContextRowsSince,
    getHeadSequence,
    getLatestContextRow,
    type ContextItemRow,
} from '../db/index.js';
import type { ContextItem } from '../types.js';

export type ContextDraft = Omit<ContextItem, 'version' | 'sequence'>;

export interface ContextBackend {
    latest(taskId: string, key: string): Promise<ContextItem | undefined>;
    at(taskId: string, key: string, version: number): Promise<ContextItem | undefined>;
    history(taskId: string, key: string): Promise<ContextItem[]>;
    /** Commit log entries with sequence > afterSequence, in order */
    since(taskId: string, afterSequence: number): Promise<ContextItem[]>;
    headSequence(taskId: string): Promise<number>;
    /**
     * Append the next version of draft.key if its current version equals
     * draft.predecessor; resolves null otherwise.
     */
    append(draft: ContextDraft): Promise<ContextItem | null>;
}

/**
 * In-process backend, used for tests and ephemeral runs
 */
export class MemoryContextBackend implements ContextBackend {
    private logs: Map<string, ContextItem[]> = new Map();

    async latest(taskId: string, key: string): Promise<ContextItem | undefined> {
        const versions = this.versions(taskId, key);
        const item = versions[versions.length - 1];
        return item ? structuredClone(item) : undefined;
    }

    async at(taskId: string, key: string, version: number): Promise<ContextItem | undefined> {
        const item = this.versions(taskId, key).find(i => i.version === version);
        return item ? structuredClone(item) : undefined;
    }

    async history(taskId: string, key: string): Promise<ContextItem[]> {
        return structuredClone(this.versions(taskId, key));
    }

    async since(taskId: string, afterSequence: number): Promise<ContextItem[]> {
        return structuredClone(this.log(taskId).filter(item => item.sequence > afterSequence));
    }

    async headSequence(taskId: string): Promise<number> {
        return this.log(taskId).length;
    }

    async append(draft: ContextDraft): Promise<ContextItem | null> {
        const versions = this.versions(draft.taskId, draft.key);
        const current = versions[versions.length - 1]?.version ?? null;
        if (current !== draft.predecessor) {
            return null;
        }
        const log = this.log(draft.taskId);
        const item: ContextItem = structuredClone({
            ...draft,
            version: (current ?? 0) + 1,
            sequence: log.length + 1,
        });
        log.push(item);
        this.logs.set(draft.taskId, log);
        return structuredClone(item);
    }

    private log(taskId: string): ContextItem[] {
        return this.logs.get(taskId) ?? [];
    }

    private versions(taskId: string, key: string): ContextItem[] {
        return this.log(taskId).filter(item => item.key === key);
    }
}

function fromRow(row: ContextItemRow): ContextItem {
    const value: unknown = JSON.parse(row.value);
    return {
        taskId: row.task_id,
        key: row.key,
        value,
        version: row.version,
        sequence: row.sequence,
        writer: row.writer,
        timestamp: row.timestamp,
        predecessor: row.predecessor,
    };
}

/**
 * SQLite-backed context log; the version check and insert share one IMMEDIATE transaction
 */
export class SqliteContextBackend implements ContextBackend {
    constructor(private database: Database.Database) {}

    async latest(taskId: string, key: string): Promise<ContextItem | undefined> {
        const row = getLatestContextRow(taskId, key, this.database);
        return row ? fromRow(row) : undefined;
    }

    async at(taskId: string, key: string, version: number): Promise<ContextItem | undefined> {
        const row = getContextRowAt(taskId, key, version, this.database);
        return row ? fromRow(row) : undefined;
    }

    async history(taskId: string, key: string): Promise<ContextItem[]> {
        return getContextHistory(taskId, key, this.database).map(fromRow);
    }

    async since(taskId: string, afterSequence: number): Promise<ContextItem[]> {
        return getContextRowsSince(taskId, afterSequence, this.database).map(fromRow);
    }

    async headSequence(taskId: string): Promise<number> {
        return getHeadSequence(taskId, this.database);
    }

    async append(draft: ContextDraft): Promise<ContextItem | null> {
        const row = appendContextRow(
            {
                task_id: draft.taskId,
                key: draft.key,
                value: JSON.stringify(draft.value ?? null),
                writer: draft.writer,
                timestamp: draft.timestamp,
                predecessor: draft.predecessor,
            },
            this.database
        );
        return row ? fromRow(row) : null;
    }
}
