/**
 * Account Service - Idempotency Cache
 *
 * Maps an OAuth authorization code to the session response already produced
 * for it, so a repeated callback (browser refresh, proxy retry) gets the same
 * answer instead of a provider `invalid_grant`.
 *
 * Invariants:
 * - An entry is written once and never updated in place
 * - At most one task runs per key; concurrent callers for the key share it
 * - Only successful results are stored; failures may be retried
 * - When size exceeds maxEntries, the oldest half (by insertion) is evicted
 *
 * Single process, in memory, best effort: a cold start or another Lambda
 * instance starts empty.
 */

import { ok } from '../result';
import type { Result } from '../result';

export const DEFAULT_CACHE_MAX_ENTRIES = 1000;

export class IdempotencyCache<T, E> {
    /** Map iteration order is insertion order, which drives eviction */
    private readonly entries = new Map<string, T>();
    private readonly inFlight = new Map<string, Promise<Result<T, E>>>();
    private readonly maxEntries: number;

    constructor(maxEntries = DEFAULT_CACHE_MAX_ENTRIES) {
        if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
            throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
        }
        this.maxEntries = maxEntries;
    }

    get size(): number {
        return this.entries.size;
    }

    /** Number of keys with a task currently running */
    get pending(): number {
        return this.inFlight.size;
    }

    get(key: string): T | undefined {
        return this.entries.get(key);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    /**
     * Store a value unless the key is already present (first write wins).
     *
     * @returns true when the value was stored
     */
    put(key: string, value: T): boolean {
        if (this.entries.has(key)) {
            return false;
        }

        this.entries.set(key, value);
        if (this.entries.size > this.maxEntries) {
            this.evictOldest(Math.floor(this.entries.size / 2));
        }
        return true;
    }

    /**
     * Return the cached value for `key`, join the task already running for it,
     * or run `task` and cache its value if it succeeds.
     *
     * A rejected task rejects every caller that joined it and leaves no entry.
     */
    resolve(key: string, task: () => Promise<Result<T, E>>): Promise<Result<T, E>> {
        const cached = this.entries.get(key);
        if (cached !== undefined) {
            return Promise.resolve(ok(cached));
        }

        const running = this.inFlight.get(key);
        if (running) {
            return running;
        }

        // task starts on a later microtask, after the key is registered
        const started = Promise.resolve()
            .then(task)
            .then(result => {
                if (result.ok) {
                    this.put(key, result.value);
                }
                return result;
            })
            .finally(() => {
                this.inFlight.delete(key);
            });

        this.inFlight.set(key, started);
        return started;
    }

    private evictOldest(count: number): void {
        let removed = 0;
        for (const key of this.entries.keys()) {
            if (removed >= count) {
                break;
            }
            this.entries.delete(key);
            removed++;
        }
    }
}
