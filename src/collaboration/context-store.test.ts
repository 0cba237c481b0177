import { describe, it, expect, beforeEach } from 'vitest';
import {
    ContextClosedError,
    ContextStoreUnavailableError,
    ContextWriteTimeoutError,
    NotFoundError,
    ValidationError,
    VersionConflictError,
    WriterNotEligibleError,
} from '../errors.js';
import type { ContextItem } from '../types.js';
import { MemoryContextBackend, type ContextBackend } from './context-backend.js';
import { SharedContextStore } from './context-store.js';

async function collect(iterable: AsyncIterable<ContextItem>): Promise<ContextItem[]> {
    const items: ContextItem[] = [];
    for await (const item of iterable) {
        items.push(item);
    }
    return items;
}

describe('SharedContextStore', () => {
    let store: SharedContextStore;

    beforeEach(() => {
        store = new SharedContextStore('task-1', new MemoryContextBackend(), {
            clock: () => new Date('2026-06-01T00:00:00.000Z'),
        });
    });

    async function outlineAtV3(): Promise<void> {
        await store.write('outline', ['intro'], null, 'A');
        await store.write('outline', ['intro', 'body'], 1, 'B');
        await store.write('outline', ['intro', 'body', 'end'], 2, 'A');
    }

    describe('write', () => {
        it('should let exactly one of two concurrent writers win', async () => {
            await outlineAtV3();

            const [first, second] = await Promise.allSettled([
                store.write('outline', ['A edit'], 3, 'A'),
                store.write('outline', ['B edit'], 3, 'B'),
            ]);

            expect(first).toEqual({ status: 'fulfilled', value: 4 });
            expect(second.status).toBe('rejected');
            if (second.status === 'rejected') {
                expect(second.reason).toBeInstanceOf(VersionConflictError);
                expect(second.reason).toMatchObject({ key: 'outline', expectedVersion: 3, currentVersion: 4 });
            }
            expect((await store.read('outline'))?.value).toEqual(['A edit']);
        });

        it('should reject a second initial write of the same key', async () => {
            await store.write('notes', 'first', null, 'A');
            await expect(store.write('notes', 'again', null, 'B')).rejects.toMatchObject({
                code: 'VERSION_CONFLICT',
                currentVersion: 1,
            });
        });

        it('should not serialise writes to different keys behind each other', async () => {
            const versions = await Promise.all([
                store.write('a', 1, null, 'A'),
                store.write('b', 2, null, 'B'),
            ]);
            expect(versions).toEqual([1, 1]);
            expect(await store.headSequence()).toBe(2);
        });

        it('should validate the key and the expected version', async () => {
            await expect(store.write('', 1, null, 'A')).rejects.toBeInstanceOf(ValidationError);
            await expect(store.write('k', 1, 0, 'A')).rejects.toBeInstanceOf(ValidationError);
            await expect(store.write('k', 1, 1.5, 'A')).rejects.toBeInstanceOf(ValidationError);
        });

        it('should only accept plain JSON data', async () => {
            const cyclic: Record<string, unknown> = { name: 'loop' };
            cyclic.self = cyclic;

            await expect(store.write('when', new Date('2026-06-01T00:00:00.000Z'), null, 'A')).rejects.toThrow(
                'Context values must be plain JSON data (value)'
            );
            await expect(store.write('lookup', new Map([['a', 1]]), null, 'A')).rejects.toBeInstanceOf(ValidationError);
            await expect(store.write('missing', undefined, null, 'A')).rejects.toBeInstanceOf(ValidationError);
            await expect(store.write('callback', () => 'done', null, 'A')).rejects.toBeInstanceOf(ValidationError);
            await expect(store.write('score', Number.NaN, null, 'A')).rejects.toBeInstanceOf(ValidationError);
            await expect(store.write('draft', { sections: ['intro', undefined] }, null, 'A')).rejects.toMatchObject({
                details: { field: 'value.sections[1]' },
            });
            await expect(store.write('loop', cyclic, null, 'A')).rejects.toMatchObject({
                details: { field: 'value.self' },
            });
            expect(await store.headSequence()).toBe(0);

            await store.write('draft', { sections: ['intro'], words: 120, final: false, owner: null }, null, 'A');
            expect((await store.read('draft'))?.value).toEqual({ sections: ['intro'], words: 120, final: false, owner: null });
        });

        it('should store a copy of the value', async () => {
            const value = { items: ['x'] };
            await store.write('draft', value, null, 'A');
            value.items.push('y');

            expect((await store.read('draft'))?.value).toEqual({ items: ['x'] });
        });

        it('should record writer, predecessor and commit position', async () => {
            await store.write('other', true, null, 'C');
            const item = await store.writeItem('outline', 'v1', null, 'A');

            expect(item).toEqual({
                taskId: 'task-1',
                key: 'outline',
                value: 'v1',
                version: 1,
                sequence: 2,
                writer: 'A',
                timestamp: '2026-06-01T00:00:00.000Z',
                predecessor: null,
            });
        });
    });

    describe('writers', () => {
        it('should only accept writes from eligible agents', async () => {
            const restricted = new SharedContextStore('task-2', new MemoryContextBackend(), { writers: ['A'] });

            await expect(restricted.write('k', 1, null, 'B')).rejects.toBeInstanceOf(WriterNotEligibleError);
            restricted.admit('B');
            await expect(restricted.write('k', 1, null, 'B')).resolves.toBe(1);
            restricted.revoke('A');
            await expect(restricted.write('k', 2, 1, 'A')).rejects.toBeInstanceOf(WriterNotEligibleError);
        });

        it('should honour revocation on an open store', async () => {
            store.revoke('A');
            expect(store.canWrite('A')).toBe(false);
            expect(store.canWrite('B')).toBe(true);
        });
    });

    describe('history and comparison', () => {
        it('should keep every version in order', async () => {
            await outlineAtV3();
            const history = await store.history('outline');

            expect(history.map(i => [i.version, i.writer, i.predecessor])).toEqual([
                [1, 'A', null],
                [2, 'B', 1],
                [3, 'A', 2],
            ]);
            expect((await store.readAt('outline', 2))?.value).toEqual(['intro', 'body']);
            expect(await store.readAt('outline', 9)).toBeUndefined();
        });

        it('should compare two versions of a key', async () => {
            await store.write('title', 'Draft', null, 'A');
            await store.write('title', 'Final', 1, 'B');
            await store.write('title', 'Final', 2, 'A');

            const comparison = await store.compare('title', 1, 3);
            expect(comparison.changed).toBe(true);
            expect(comparison.writers).toEqual(['B', 'A']);

            expect((await store.compare('title', 2, 3)).changed).toBe(false);
            await expect(store.compare('title', 1, 7)).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should snapshot the latest values as of a commit position', async () => {
            await store.write('a', 'a1', null, 'A');
            await store.write('b', 'b1', null, 'A');
            await store.write('a', 'a2', 1, 'B');

            const head = await store.snapshot();
            expect(Object.fromEntries(Object.entries(head).map(([k, v]) => [k, v.value]))).toEqual({ a: 'a2', b: 'b1' });

            const earlier = await store.snapshot(2);
            expect(Object.fromEntries(Object.entries(earlier).map(([k, v]) => [k, v.value]))).toEqual({ a: 'a1', b: 'b1' });
        });
    });

    describe('subscribe', () => {
        it('should replay matching items and end after close', async () => {
            await store.write('draft:intro', 1, null, 'A');
            await store.write('notes', 2, null, 'A');
            await store.write('draft:body', 3, null, 'B');
            store.close();

            const items = await collect(store.subscribe('draft:*'));
            expect(items.map(i => i.key)).toEqual(['draft:intro', 'draft:body']);
        });

        it('should follow new commits live', async () => {
            const received = collect(store.subscribe());

            await store.write('a', 1, null, 'A');
            await store.write('a', 2, 1, 'B');
            store.close();

            expect((await received).map(i => [i.key, i.version])).toEqual([
                ['a', 1],
                ['a', 2],
            ]);
        });

        it('should resume after a commit position', async () => {
            await store.write('a', 1, null, 'A');
            await store.write('b', 1, null, 'A');
            await store.write('c', 1, null, 'A');
            store.close();

            const items = await collect(store.subscribe('*', { fromSequence: 2 }));
            expect(items.map(i => i.key)).toEqual(['c']);
        });

        it('should stop when the signal aborts', async () => {
            const controller = new AbortController();
            const received = collect(store.subscribe('*', { signal: controller.signal }));
            await store.write('a', 1, null, 'A');
            controller.abort();

            expect((await received).map(i => i.key)).toEqual(['a']);
            expect(store.isClosed).toBe(false);
        });

        it('should acknowledge what an agent handle has consumed', async () => {
            await store.write('a', 1, null, 'A');
            await store.write('b', 1, null, 'A');
            store.close();

            const handle = store.forAgent('B');
            expect(await collect(handle.subscribe())).toHaveLength(2);
            expect(handle.lastAcknowledged).toBe(2);
        });
    });

    describe('handoff', () => {
        it('should give the incoming agent exactly what the outgoing agent acknowledged', async () => {
            await store.write('a', 'a1', null, 'A');
            await store.write('b', 'b1', null, 'A');
            await store.write('a', 'a2', 1, 'C');
            store.acknowledge('A', 2);

            const expected = await store.visibleContext('A');
            const receipt = await store.handoff('A', 'B');

            expect(receipt.position).toBe(2);
            expect(receipt.replayed).toBe(2);
            expect(receipt.context).toEqual(expected);
            expect(receipt.context.a.value).toBe('a1');
            expect(await store.visibleContext('B')).toEqual(expected);
            expect(store.lastAcknowledged('B')).toBe(2);
        });

        it('should move write access to the incoming agent', async () => {
            const restricted = new SharedContextStore('task-3', new MemoryContextBackend(), { writers: ['A'] });
            await restricted.handoff('A', 'B');

            expect(restricted.canWrite('A')).toBe(false);
            expect(restricted.canWrite('B')).toBe(true);
        });

        it('should start from the beginning when the outgoing agent acknowledged nothing', async () => {
            await store.write('a', 'a1', null, 'A');
            const receipt = await store.handoff('A', 'B');
            expect(receipt).toMatchObject({ position: 0, replayed: 0, context: {} });
        });
    });

    describe('close', () => {
        it('should reject writes and keep reads available', async () => {
            await store.write('a', 1, null, 'A');
            store.close();

            await expect(store.write('a', 2, 1, 'A')).rejects.toBeInstanceOf(ContextClosedError);
            expect((await store.read('a'))?.value).toBe(1);
            await expect(store.handoff('A', 'B')).rejects.toBeInstanceOf(ContextClosedError);
        });
    });

    describe('backend failures', () => {
        const failing: ContextBackend = {
            latest: () => Promise.reject(new Error('disk gone')),
            at: () => Promise.reject(new Error('disk gone')),
            history: () => Promise.reject(new Error('disk gone')),
            since: () => Promise.reject(new Error('disk gone')),
            headSequence: () => Promise.reject(new Error('disk gone')),
            append: () => Promise.reject(new Error('disk gone')),
        };

        it('should surface an unreachable backend as ContextStoreUnavailableError', async () => {
            const broken = new SharedContextStore('task-4', failing);
            await expect(broken.read('a')).rejects.toBeInstanceOf(ContextStoreUnavailableError);
            await expect(broken.write('a', 1, null, 'A')).rejects.toBeInstanceOf(ContextStoreUnavailableError);
        });

        it('should time out a write the backend never completes', async () => {
            const hanging: ContextBackend = { ...failing, append: () => new Promise<ContextItem | null>(() => undefined) };
            const slow = new SharedContextStore('task-5', hanging, { writeTimeoutMs: 20 });

            await expect(slow.write('a', 1, null, 'A')).rejects.toBeInstanceOf(ContextWriteTimeoutError);
        });
    });
});
