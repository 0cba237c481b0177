/**
 * Shared Context Store
 *
 * Versioned key/value context for one task. Writes use optimistic concurrency:
 * the writer names the version it built on, and the store rejects the write if
 * the key has moved on. Each key has its own write queue; there is no cross-key
 * locking. Every accepted write also gets a position in the task-wide commit
 * log, which drives subscriptions, snapshots and handoffs.
 */

import {
    ContextClosedError,
    ContextStoreUnavailableError,
    ContextWriteTimeoutError,
    NotFoundError,
    ValidationError,
    VersionConflictError,
    WriterNotEligibleError,
    isConcordError,
} from '../errors.js';
import { logEvent } from '../logging/index.js';
import { withTimeout } from '../utils/timing.js';
import { defaultContextConfig, type ContextItem } from '../types.js';
import type { ContextBackend } from './context-backend.js';

/**
 * Path to the first part of `value` that does not survive a JSON round trip
 * unchanged, or null when the whole value is plain JSON data
 */
function nonJsonPath(value: unknown, path: string, ancestors: readonly object[] = []): string | null {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') return null;
    if (typeof value === 'number') return Number.isFinite(value) ? null : path;
    if (typeof value !== 'object' || ancestors.includes(value)) return path;

    const nested = [...ancestors, value];
    if (Array.isArray(value)) {
        for (let index = 0; index < value.length; index++) {
            const found = nonJsonPath(value[index], `${path}[${index}]`, nested);
            if (found !== null) return found;
        }
        return null;
    }
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) return path;
    for (const [key, entry] of Object.entries(value)) {
        const found = nonJsonPath(entry, `${path}.${key}`, nested);
        if (found !== null) return found;
    }
    return null;
}

export interface SharedContextStoreOptions {
    writeTimeoutMs?: number;
    /** Agents allowed to write. When omitted, any writer is accepted. */
    writers?: Iterable<string>;
    clock?: () => Date;
}

export interface SubscribeOptions {
    /** Replay starts after this commit-log position; 0 replays everything */
    fromSequence?: number;
    signal?: AbortSignal;
}

export type ContextSnapshot = Record<string, ContextItem>;

export interface VersionComparison {
    key: string;
    from: ContextItem;
    to: ContextItem;
    changed: boolean;
    /** Writers of the versions after `from` up to and including `to` */
    writers: string[];
}

export interface HandoffReceipt {
    fromAgentId: string;
    toAgentId: string;
    /** Commit-log position the incoming agent was brought up to */
    position: number;
    replayed: number;
    context: ContextSnapshot;
}

function compilePattern(pattern: string): (key: string) => boolean {
    if (pattern === '*') return () => true;
    const source = pattern
        .split('*')
        .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*');
    const regex = new RegExp(`^${source}$`);
    return key => regex.test(key);
}

function toSnapshot(items: readonly ContextItem[]): ContextSnapshot {
    const snapshot: ContextSnapshot = {};
    for (const item of items) {
        snapshot[item.key] = item;
    }
    return snapshot;
}

export class SharedContextStore {
    readonly taskId: string;
    private backend: ContextBackend;
    private writeTimeoutMs: number;
    private clock: () => Date;
    private writers: Set<string> | null;
    private revoked: Set<string> = new Set();
    private keyQueues: Map<string, Promise<void>> = new Map();
    private acks: Map<string, number> = new Map();
    private waiters: Set<() => void> = new Set();
    private commits = 0;
    private closed = false;

    constructor(taskId: string, backend: ContextBackend, options: SharedContextStoreOptions = {}) {
        this.taskId = taskId;
        this.backend = backend;
        this.writeTimeoutMs = options.writeTimeoutMs ?? defaultContextConfig.writeTimeoutMs;
        this.clock = options.clock ?? (() => new Date());
        this.writers = options.writers ? new Set(options.writers) : null;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Write the next version of `key`. `expectedPredecessorVersion` is the
     * version the writer read (null for a key it believes is new). Resolves
     * to the new version or rejects with VersionConflictError.
     */
    async write(key: string, value: unknown, expectedPredecessorVersion: number | null, writerId: string): Promise<number> {
        const item = await this.writeItem(key, value, expectedPredecessorVersion, writerId);
        return item.version;
    }

    async writeItem(
        key: string,
        value: unknown,
        expectedPredecessorVersion: number | null,
        writerId: string
    ): Promise<ContextItem> {
        if (!key) {
            throw new ValidationError('Context key is required', 'key', key);
        }
        const invalid = nonJsonPath(value, 'value');
        if (invalid !== null) {
            throw new ValidationError(`Context values must be plain JSON data (${invalid})`, invalid);
        }
        if (
            expectedPredecessorVersion !== null &&
            (!Number.isInteger(expectedPredecessorVersion) || expectedPredecessorVersion < 1)
        ) {
            throw new ValidationError(
                'Expected predecessor must be null or a version >= 1',
                'expectedPredecessorVersion',
                expectedPredecessorVersion
            );
        }
        this.assertOpen();
        this.assertWriter(writerId);

        // Writes to the same key run one at a time, in arrival order
        const previous = this.keyQueues.get(key) ?? Promise.resolve();
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => gate);
        this.keyQueues.set(key, tail);

        let abandoned = false;
        const attempt = previous
            .then(() => {
                if (abandoned) {
                    throw new ContextWriteTimeoutError(key, this.writeTimeoutMs, { taskId: this.taskId, writer: writerId });
                }
                return this.commit(key, value, expectedPredecessorVersion, writerId);
            })
            .finally(() => {
                release();
                if (this.keyQueues.get(key) === tail) {
                    this.keyQueues.delete(key);
                }
            });

        return withTimeout(attempt, this.writeTimeoutMs, () => {
            abandoned = true;
            logEvent({
                level: 'warn',
                taskId: this.taskId,
                agentId: writerId,
                message: `Context write to "${key}" timed out`,
                details: { timeoutMs: this.writeTimeoutMs },
            });
            return new ContextWriteTimeoutError(key, this.writeTimeoutMs, { taskId: this.taskId, writer: writerId });
        });
    }

    /**
     * Latest committed version of a key
     */
    async read(key: string): Promise<ContextItem | undefined> {
        return this.guard(() => this.backend.latest(this.taskId, key));
    }

    async readAt(key: string, version: number): Promise<ContextItem | undefined> {
        return this.guard(() => this.backend.at(this.taskId, key, version));
    }

    async history(key: string): Promise<ContextItem[]> {
        return this.guard(() => this.backend.history(this.taskId, key));
    }

    /**
     * Diff two versions of one key
     */
    async compare(key: string, fromVersion: number, toVersion: number): Promise<VersionComparison> {
        const versions = await this.history(key);
        const from = versions.find(v => v.version === fromVersion);
        const to = versions.find(v => v.version === toVersion);
        if (!from) throw new NotFoundError(`Version of "${key}"`, String(fromVersion));
        if (!to) throw new NotFoundError(`Version of "${key}"`, String(toVersion));

        const low = Math.min(fromVersion, toVersion);
        const high = Math.max(fromVersion, toVersion);
        return {
            key,
            from,
            to,
            changed: JSON.stringify(from.value) !== JSON.stringify(to.value),
            writers: versions.filter(v => v.version > low && v.version <= high).map(v => v.writer),
        };
    }

    /**
     * Latest value of every key as of a commit-log position (default: head)
     */
    async snapshot(atSequence?: number): Promise<ContextSnapshot> {
        const items = await this.guard(() => this.backend.since(this.taskId, 0));
        return toSnapshot(atSequence === undefined ? items : items.filter(item => item.sequence <= atSequence));
    }

    async headSequence(): Promise<number> {
        return this.guard(() => this.backend.headSequence(this.taskId));
    }

    /**
     * Stream committed items whose key matches `pattern` (`*` is a wildcard).
     * Replays from `fromSequence`, then follows new commits; ends once the
     * store is closed and the log is drained.
     */
    async *subscribe(pattern = '*', options: SubscribeOptions = {}): AsyncGenerator<ContextItem, void, undefined> {
        const matches = compilePattern(pattern);
        let cursor = options.fromSequence ?? 0;

        while (true) {
            const seen = this.commits;
            const items = await this.guard(() => this.backend.since(this.taskId, cursor));
            for (const item of items) {
                cursor = item.sequence;
                if (matches(item.key)) {
                    yield item;
                }
            }
            if (items.length > 0) continue;
            if (this.closed || options.signal?.aborted) return;
            await this.nextCommit(seen, options.signal);
        }
    }

    /**
     * Record that an agent has processed the commit log up to `sequence`
     */
    acknowledge(agentId: string, sequence: number): void {
        const current = this.acks.get(agentId) ?? 0;
        if (sequence > current) {
            this.acks.set(agentId, sequence);
        }
    }

    lastAcknowledged(agentId: string): number {
        return this.acks.get(agentId) ?? 0;
    }

    admit(agentId: string): void {
        this.revoked.delete(agentId);
        this.writers?.add(agentId);
    }

    revoke(agentId: string): void {
        this.revoked.add(agentId);
        this.writers?.delete(agentId);
    }

    canWrite(agentId: string): boolean {
        if (this.revoked.has(agentId)) return false;
        return this.writers === null || this.writers.has(agentId);
    }

    /**
     * What an agent has seen: the snapshot at its last acknowledged position
     */
    async visibleContext(agentId: string): Promise<ContextSnapshot> {
        return this.snapshot(this.lastAcknowledged(agentId));
    }

    /**
     * Bring an incoming agent up to the outgoing agent's acknowledged position,
     * then move write eligibility across. The outgoing agent loses write access.
     */
    async handoff(fromAgentId: string, toAgentId: string): Promise<HandoffReceipt> {
        this.assertOpen();
        const position = this.lastAcknowledged(fromAgentId);
        const log = await this.guard(() => this.backend.since(this.taskId, 0));
        const replayed = log.filter(item => item.sequence <= position);

        this.acknowledge(toAgentId, position);
        this.admit(toAgentId);
        this.revoke(fromAgentId);

        logEvent({
            level: 'info',
            taskId: this.taskId,
            agentId: toAgentId,
            message: `Context handed off from ${fromAgentId}`,
            details: { position, replayed: replayed.length },
        });

        return {
            fromAgentId,
            toAgentId,
            position,
            replayed: replayed.length,
            context: toSnapshot(replayed),
        };
    }

    forAgent(agentId: string): AgentContextHandle {
        return new AgentContextHandle(this, agentId);
    }

    /**
     * Reject further writes; reads stay available for audit. Open subscriptions drain and end.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.wake();
        logEvent({ level: 'info', taskId: this.taskId, message: 'Context closed' });
    }

    private async commit(
        key: string,
        value: unknown,
        expectedPredecessorVersion: number | null,
        writerId: string
    ): Promise<ContextItem> {
        this.assertOpen();
        this.assertWriter(writerId);

        const payload = structuredClone(value);
        const item = await this.guard(() =>
            this.backend.append({
                taskId: this.taskId,
                key,
                value: payload,
                writer: writerId,
                timestamp: this.clock().toISOString(),
                predecessor: expectedPredecessorVersion,
            })
        );

        if (!item) {
            const current = await this.read(key);
            throw new VersionConflictError(key, expectedPredecessorVersion, current?.version ?? null, {
                taskId: this.taskId,
                agentId: writerId,
            });
        }

        this.commits++;
        this.wake();
        return item;
    }

    private nextCommit(seen: number, signal?: AbortSignal): Promise<void> {
        return new Promise<void>(resolve => {
            if (this.commits !== seen || this.closed || signal?.aborted) {
                resolve();
                return;
            }
            const waiter = () => {
                this.waiters.delete(waiter);
                signal?.removeEventListener('abort', waiter);
                resolve();
            };
            this.waiters.add(waiter);
            signal?.addEventListener('abort', waiter, { once: true });
        });
    }

    private wake(): void {
        for (const waiter of [...this.waiters]) {
            waiter();
        }
    }

    private async guard<T>(operation: () => Promise<T>): Promise<T> {
        try {
            return await operation();
        } catch (error) {
            if (isConcordError(error)) throw error;
            logEvent({
                level: 'error',
                taskId: this.taskId,
                message: 'Context backend unavailable',
                details: { error: error instanceof Error ? error.message : String(error) },
            });
            throw new ContextStoreUnavailableError('Context backend unavailable', { taskId: this.taskId }, error);
        }
    }

    private assertOpen(): void {
        if (this.closed) {
            throw new ContextClosedError(this.taskId);
        }
    }

    private assertWriter(agentId: string): void {
        if (!this.canWrite(agentId)) {
            throw new WriterNotEligibleError(agentId, this.taskId);
        }
    }
}

/**
 * The view of the context an agent receives with its role
 */
export class AgentContextHandle {
    constructor(
        private store: SharedContextStore,
        readonly agentId: string
    ) {}

    get taskId(): string {
        return this.store.taskId;
    }

    write(key: string, value: unknown, expectedPredecessorVersion: number | null): Promise<number> {
        return this.store.write(key, value, expectedPredecessorVersion, this.agentId);
    }

    read(key: string): Promise<ContextItem | undefined> {
        return this.store.read(key);
    }

    readAt(key: string, version: number): Promise<ContextItem | undefined> {
        return this.store.readAt(key, version);
    }

    history(key: string): Promise<ContextItem[]> {
        return this.store.history(key);
    }

    /**
     * Subscribe from this agent's last acknowledged position; each item is
     * acknowledged once the consumer asks for the next one.
     */
    async *subscribe(pattern = '*', options: SubscribeOptions = {}): AsyncGenerator<ContextItem, void, undefined> {
        const fromSequence = options.fromSequence ?? this.store.lastAcknowledged(this.agentId);
        for await (const item of this.store.subscribe(pattern, { ...options, fromSequence })) {
            yield item;
            this.store.acknowledge(this.agentId, item.sequence);
        }
    }

    acknowledge(sequence: number): void {
        this.store.acknowledge(this.agentId, sequence);
    }

    get lastAcknowledged(): number {
        return this.store.lastAcknowledged(this.agentId);
    }
}
