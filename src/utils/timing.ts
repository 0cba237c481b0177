import { CancelledError } from '../errors.js';

/**
 * Resolve after `ms`, or reject with CancelledError if the signal aborts first
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new CancelledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new CancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Race a promise against a timer. The timer is cleared when the promise settles.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout()), ms);
    });
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Exponential backoff for attempt n (1-based), capped at maxMs
 */
export function backoffMs(attempt: number, initialMs: number, multiplier: number, maxMs: number): number {
    return Math.min(initialMs * Math.pow(multiplier, attempt - 1), maxMs);
}
