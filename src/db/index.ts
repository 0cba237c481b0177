import Database from 'better-sqlite3';
import { readFileSync, mkdirSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { getConcordDir } from '../logging/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;

export function getDbPath(): string {
    return join(getConcordDir(), 'concord.db');
}

/**
 * Open a database file (or ':memory:') and apply the schema
 */
export function openDatabase(path: string): Database.Database {
    if (path !== ':memory:') {
        const dir = dirname(path);
        if (!existsSync(dir)) {
            mkdirSync(dir, { recursive: true });
        }
    }
    const database = new Database(path);
    if (path !== ':memory:') {
        database.pragma('journal_mode = WAL');
    }
    initializeSchema(database);
    return database;
}

export function getDb(path: string = getDbPath()): Database.Database {
    if (!db) {
        db = openDatabase(path);
    }
    return db;
}

function initializeSchema(database: Database.Database): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    database.exec(schema);
}

export function closeDb(): void {
    if (db) {
        db.close();
        db = null;
    }
}

// Row types
export interface ContextItemRow {
    task_id: string;
    key: string;
    version: number;
    sequence: number;
    value: string;
    writer: string;
    timestamp: string;
    predecessor: number | null;
}

export interface LearningEventRow {
    id: string;
    task_id: string;
    team_id: string;
    success: number;
    episode: string;
    recorded_at: string;
}

export interface LearningEventAgentRow {
    event_id: string;
    agent_id: string;
    role: string;
}

// Context queries
export function getLatestContextRow(taskId: string, key: string, database: Database.Database = getDb()): ContextItemRow | undefined {
    return database
        .prepare<[string, string], ContextItemRow>(
            'SELECT * FROM context_items WHERE task_id = ? AND key = ? ORDER BY version DESC LIMIT 1'
        )
        .get(taskId, key);
}

export function getContextRowAt(
    taskId: string,
    key: string,
    version: number,
    database: Database.Database = getDb()
): ContextItemRow | undefined {
    return database
        .prepare<[string, string, number], ContextItemRow>(
            'SELECT * FROM context_items WHERE task_id = ? AND key = ? AND version = ?'
        )
        .get(taskId, key, version);
}

export function getContextHistory(taskId: string, key: string, database: Database.Database = getDb()): ContextItemRow[] {
    return database
        .prepare<[string, string], ContextItemRow>(
            'SELECT * FROM context_items WHERE task_id = ? AND key = ? ORDER BY version'
        )
        .all(taskId, key);
}

export function getContextRowsSince(taskId: string, afterSequence: number, database: Database.Database = getDb()): ContextItemRow[] {
    return database
        .prepare<[string, number], ContextItemRow>(
            'SELECT * FROM context_items WHERE task_id = ? AND sequence > ? ORDER BY sequence'
        )
        .all(taskId, afterSequence);
}

export function getHeadSequence(taskId: string, database: Database.Database = getDb()): number {
    const row = database
        .prepare<[string], { head: number | null }>('SELECT MAX(sequence) AS head FROM context_items WHERE task_id = ?')
        .get(taskId);
    return row?.head ?? 0;
}

/**
 * Conditionally append the next version of a key. The version check and the
 * sequence allocation run in one transaction; returns undefined when the key
 * has moved past `predecessor`.
 */
export function appendContextRow(
    row: Omit<ContextItemRow, 'version' | 'sequence'>,
    database: Database.Database = getDb()
): ContextItemRow | undefined {
    const append = database.transaction((draft: Omit<ContextItemRow, 'version' | 'sequence'>) => {
        const current = getLatestContextRow(draft.task_id, draft.key, database);
        const currentVersion = current?.version ?? null;
        if (currentVersion !== draft.predecessor) {
            return undefined;
        }
        const stored: ContextItemRow = {
            ...draft,
            version: (currentVersion ?? 0) + 1,
            sequence: getHeadSequence(draft.task_id, database) + 1,
        };
        database
            .prepare<[string, string, number, number, string, string, string, number | null]>(`
                INSERT INTO context_items (task_id, key, version, sequence, value, writer, timestamp, predecessor)
                VALUES (?, ?, ?, ?, ?, ?, ?, ?)
            `)
            .run(
                stored.task_id,
                stored.key,
                stored.version,
                stored.sequence,
                stored.value,
                stored.writer,
                stored.timestamp,
                stored.predecessor
            );
        return stored;
    });
    return append.immediate(row);
}

// Learning queries
export function insertLearningEvent(
    event: LearningEventRow,
    agents: Omit<LearningEventAgentRow, 'event_id'>[],
    database: Database.Database = getDb()
): void {
    const insert = database.transaction(() => {
        database
            .prepare<[string, string, string, number, string, string]>(`
                INSERT INTO learning_events (id, task_id, team_id, success, episode, recorded_at)
                VALUES (?, ?, ?, ?, ?, ?)
            `)
            .run(event.id, event.task_id, event.team_id, event.success, event.episode, event.recorded_at);
        const insertAgent = database.prepare<[string, string, string]>(
            'INSERT OR IGNORE INTO learning_event_agents (event_id, agent_id, role) VALUES (?, ?, ?)'
        );
        for (const agent of agents) {
            insertAgent.run(event.id, agent.agent_id, agent.role);
        }
    });
    insert();
}

export function getLearningEventById(id: string, database: Database.Database = getDb()): LearningEventRow | undefined {
    return database.prepare<[string], LearningEventRow>('SELECT * FROM learning_events WHERE id = ?').get(id);
}

export function getLearningEventsByTask(taskId: string, database: Database.Database = getDb()): LearningEventRow[] {
    return database
        .prepare<[string], LearningEventRow>('SELECT * FROM learning_events WHERE task_id = ? ORDER BY recorded_at, id')
        .all(taskId);
}

export function getLearningEventsByTeam(teamId: string, database: Database.Database = getDb()): LearningEventRow[] {
    return database
        .prepare<[string], LearningEventRow>('SELECT * FROM learning_events WHERE team_id = ? ORDER BY recorded_at, id')
        .all(teamId);
}

export function getLearningEventsByAgent(agentId: string, database: Database.Database = getDb()): LearningEventRow[] {
    return database
        .prepare<[string], LearningEventRow>(`
            SELECT e.* FROM learning_events e
            JOIN learning_event_agents a ON a.event_id = e.id
            WHERE a.agent_id = ?
            ORDER BY e.recorded_at, e.id
        `)
        .all(agentId);
}

export function getRecentLearningEvents(limit = 20, database: Database.Database = getDb()): LearningEventRow[] {
    return database
        .prepare<[number], LearningEventRow>('SELECT * FROM learning_events ORDER BY recorded_at DESC, id DESC LIMIT ?')
        .all(limit);
}

export function countContextItems(taskId: string, database: Database.Database = getDb()): number {
    const row = database
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM context_items WHERE task_id = ?')
        .get(taskId);
    return row?.count ?? 0;
}
