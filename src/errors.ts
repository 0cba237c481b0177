import type { NegotiationFailureReason, TaskFailure } from './types.js';

/**
 * Machine-readable error codes, one per failure the core can surface
 */
export const ErrorCode = {
    NO_CANDIDATE: 'NO_CANDIDATE',
    VERSION_CONFLICT: 'VERSION_CONFLICT',
    NEGOTIATION_FAILED: 'NEGOTIATION_FAILED',
    AGENT_UNAVAILABLE: 'AGENT_UNAVAILABLE',
    CONTEXT_STORE_UNAVAILABLE: 'CONTEXT_STORE_UNAVAILABLE',
    CONTEXT_CLOSED: 'CONTEXT_CLOSED',
    CONTEXT_WRITE_TIMEOUT: 'CONTEXT_WRITE_TIMEOUT',
    WRITER_NOT_ELIGIBLE: 'WRITER_NOT_ELIGIBLE',
    EXECUTION_FAILED: 'EXECUTION_FAILED',
    CANCELLED: 'CANCELLED',
    INVALID_INPUT: 'INVALID_INPUT',
    NOT_FOUND: 'NOT_FOUND',
    INVALID_STATE: 'INVALID_STATE',
    INTERNAL: 'INTERNAL',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export interface ErrorDetails {
    taskId?: string;
    teamId?: string;
    agentId?: string;
    field?: string;
    value?: unknown;
    [key: string]: unknown;
}

/**
 * Base class for every error raised by the collaboration core
 */
export class ConcordError extends Error {
    readonly code: ErrorCode;
    readonly details: ErrorDetails;

    constructor(message: string, code: ErrorCode, details: ErrorDetails = {}, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'ConcordError';
        this.code = code;
        this.details = details;
    }

    toJSON(): { name: string; message: string; code: ErrorCode; details: ErrorDetails } {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            details: this.details,
        };
    }
}

/**
 * No team satisfying the hard requirements exists right now. Recoverable:
 * relax the requirement or queue the task.
 */
export class NoCandidateError extends ConcordError {
    readonly unfilledRoles: string[];

    constructor(message: string, unfilledRoles: string[], details: ErrorDetails = {}) {
        super(message, ErrorCode.NO_CANDIDATE, { ...details, unfilledRoles });
        this.name = 'NoCandidateError';
        this.unfilledRoles = unfilledRoles;
    }
}

/**
 * Optimistic-concurrency violation: the key advanced past the version the writer expected
 */
export class VersionConflictError extends ConcordError {
    readonly key: string;
    readonly expectedVersion: number | null;
    readonly currentVersion: number | null;

    constructor(key: string, expectedVersion: number | null, currentVersion: number | null, details: ErrorDetails = {}) {
        super(
            `Version conflict on "${key}": expected ${expectedVersion ?? 'none'}, current ${currentVersion ?? 'none'}`,
            ErrorCode.VERSION_CONFLICT,
            { ...details, key, expectedVersion, currentVersion }
        );
        this.name = 'VersionConflictError';
        this.key = key;
        this.expectedVersion = expectedVersion;
        this.currentVersion = currentVersion;
    }
}

export class NegotiationFailedError extends ConcordError {
    readonly reason: NegotiationFailureReason;
    readonly negotiationId: string;

    constructor(negotiationId: string, reason: NegotiationFailureReason, details: ErrorDetails = {}) {
        super(`Negotiation ${negotiationId} failed: ${reason}`, ErrorCode.NEGOTIATION_FAILED, {
            ...details,
            negotiationId,
            reason,
        });
        this.name = 'NegotiationFailedError';
        this.reason = reason;
        this.negotiationId = negotiationId;
    }
}

export class AgentUnavailableError extends ConcordError {
    readonly agentId: string;

    constructor(agentId: string, message = `Agent ${agentId} is unavailable`, details: ErrorDetails = {}) {
        super(message, ErrorCode.AGENT_UNAVAILABLE, { ...details, agentId });
        this.name = 'AgentUnavailableError';
        this.agentId = agentId;
    }
}

/**
 * The durability layer behind the shared context is unreachable. Fatal for the task.
 */
export class ContextStoreUnavailableError extends ConcordError {
    constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
        super(message, ErrorCode.CONTEXT_STORE_UNAVAILABLE, details, cause);
        this.name = 'ContextStoreUnavailableError';
    }
}

export class ContextClosedError extends ConcordError {
    constructor(taskId: string) {
        super(`Context for task ${taskId} is closed`, ErrorCode.CONTEXT_CLOSED, { taskId });
        this.name = 'ContextClosedError';
    }
}

export class ContextWriteTimeoutError extends ConcordError {
    constructor(key: string, timeoutMs: number, details: ErrorDetails = {}) {
        super(`Write to "${key}" did not complete within ${timeoutMs}ms`, ErrorCode.CONTEXT_WRITE_TIMEOUT, {
            ...details,
            key,
            timeoutMs,
        });
        this.name = 'ContextWriteTimeoutError';
    }
}

export class WriterNotEligibleError extends ConcordError {
    constructor(agentId: string, taskId: string) {
        super(`Agent ${agentId} may not write to the context of task ${taskId}`, ErrorCode.WRITER_NOT_ELIGIBLE, {
            agentId,
            taskId,
        });
        this.name = 'WriterNotEligibleError';
    }
}

export class ExecutionFailedError extends ConcordError {
    constructor(agentId: string, message: string, details: ErrorDetails = {}) {
        super(message, ErrorCode.EXECUTION_FAILED, { ...details, agentId });
        this.name = 'ExecutionFailedError';
    }
}

export class CancelledError extends ConcordError {
    constructor(message = 'Task was cancelled', details: ErrorDetails = {}) {
        super(message, ErrorCode.CANCELLED, details);
        this.name = 'CancelledError';
    }
}

export class ValidationError extends ConcordError {
    constructor(message: string, field: string, value?: unknown) {
        super(message, ErrorCode.INVALID_INPUT, { field, value });
        this.name = 'ValidationError';
    }
}

export class NotFoundError extends ConcordError {
    constructor(entity: string, id: string) {
        super(`${entity} not found: ${id}`, ErrorCode.NOT_FOUND, { entity, id });
        this.name = 'NotFoundError';
    }
}

export class InvalidStateError extends ConcordError {
    constructor(message: string, details: ErrorDetails = {}) {
        super(message, ErrorCode.INVALID_STATE, details);
        this.name = 'InvalidStateError';
    }
}

export function isConcordError(error: unknown): error is ConcordError {
    return error instanceof ConcordError;
}

/**
 * Convert any thrown value into the typed reason attached to a failed task
 */
export function toTaskFailure(error: unknown): TaskFailure {
    if (isConcordError(error)) {
        return { code: error.code, message: error.message };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { code: ErrorCode.INTERNAL, message };
}
