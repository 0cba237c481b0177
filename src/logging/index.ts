import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

/**
 * Root directory for Concord state; CONCORD_HOME overrides ~/.concord
 */
export function getConcordDir(): string {
    return process.env.CONCORD_HOME ?? join(homedir(), '.concord');
}

function getLogDir(): string {
    return join(getConcordDir(), 'logs');
}

function ensureLogDir(): void {
    const logDir = getLogDir();
    if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
    }
}

export interface LogEvent {
    level: 'debug' | 'info' | 'warn' | 'error';
    taskId?: string;
    teamId?: string;
    agentId?: string;
    message: string;
    details?: Record<string, unknown>;
}

export function logEvent(event: LogEvent): void {
    const logLine = JSON.stringify({
        timestamp: new Date().toISOString(),
        ...event,
    });
    try {
        ensureLogDir();
        appendFileSync(join(getLogDir(), 'concord.log'), logLine + '\n');
    } catch {
        // Log file unwritable; drop the line
    }
}
