import { UpstreamUnavailableError } from '../types/errors.js';
import type { CacheLookup, PriceCacheEntry } from '../types/market.js';
import { withDeadline } from '../utils/deadline.js';
import { logThought } from '../utils/logger.js';

export interface PriceCacheOptions {
    /** Lifetime of a fetched value. @default 300000 */
    ttlMs?: number;
    /** Deadline for one upstream fetch. @default 5000 */
    fetchTimeoutMs?: number;
    /** Return an expired entry when a refresh fails. @default false */
    serveStaleOnError?: boolean;
    /** How far past its TTL an entry may still be served stale. @default 900000 */
    maxStaleMs?: number;
    now?: () => number;
}

const DEFAULTS = {
    ttlMs: 300_000,
    fetchTimeoutMs: 5_000,
    serveStaleOnError: false,
    maxStaleMs: 900_000,
};

export type CacheFetcher<V> = (signal: AbortSignal) => Promise<V>;

/**
 * TTL cache with single-flight fetching. Concurrent misses on one key share a
 * single upstream call; failures are never cached.
 */
export class PriceCache<V> {
    readonly #entries: Map<string, PriceCacheEntry<V>> = new Map();
    readonly #inFlight: Map<string, Promise<CacheLookup<V>>> = new Map();
    readonly #ttlMs: number;
    readonly #fetchTimeoutMs: number;
    readonly #serveStaleOnError: boolean;
    readonly #maxStaleMs: number;
    readonly #now: () => number;

    constructor(options: PriceCacheOptions = {}) {
        this.#ttlMs = options.ttlMs ?? DEFAULTS.ttlMs;
        this.#fetchTimeoutMs = options.fetchTimeoutMs ?? DEFAULTS.fetchTimeoutMs;
        this.#serveStaleOnError = options.serveStaleOnError ?? DEFAULTS.serveStaleOnError;
        this.#maxStaleMs = options.maxStaleMs ?? DEFAULTS.maxStaleMs;
        this.#now = options.now ?? Date.now;
    }

    /** Live entry for `key`, without fetching. */
    peek(key: string): CacheLookup<V> | undefined {
        const entry = this.#entries.get(key);
        if (!entry || !this.#isLive(entry)) return undefined;
        return { value: entry.value, fetchedAt: entry.fetchedAt, stale: false };
    }

    /**
     * Return the live value for `key`, join an in-flight fetch, or start one.
     * @throws UpstreamUnavailableError when the fetch fails or times out and no
     * stale value may be served.
     */
    getOrFetch(key: string, fetchFn: CacheFetcher<V>, ttlMs: number = this.#ttlMs): Promise<CacheLookup<V>> {
        const live = this.peek(key);
        if (live) return Promise.resolve(live);

        const pending = this.#inFlight.get(key);
        if (pending) return pending;

        const request = this.#fetch(key, fetchFn, ttlMs).finally(() => {
            this.#inFlight.delete(key);
        });
        this.#inFlight.set(key, request);
        return request;
    }

    /** Drop entries too old to be served, even stale. Returns how many were removed. */
    prune(): number {
        const graceMs = this.#serveStaleOnError ? this.#maxStaleMs : 0;
        const now = this.#now();
        let removed = 0;
        for (const [key, entry] of this.#entries) {
            if (now - entry.fetchedAt >= entry.ttlMs + graceMs) {
                this.#entries.delete(key);
                removed++;
            }
        }
        return removed;
    }

    clear(): void {
        this.#entries.clear();
    }

    get size(): number {
        return this.#entries.size;
    }

    get inFlightCount(): number {
        return this.#inFlight.size;
    }

    #isLive(entry: PriceCacheEntry<V>): boolean {
        return this.#now() - entry.fetchedAt < entry.ttlMs;
    }

    async #fetch(key: string, fetchFn: CacheFetcher<V>, ttlMs: number): Promise<CacheLookup<V>> {
        try {
            const value = await withDeadline(`market:${key}`, this.#fetchTimeoutMs, fetchFn);
            const fetchedAt = this.#now();
            this.#entries.set(key, { value, fetchedAt, ttlMs });
            return { value, fetchedAt, stale: false };
        } catch (err) {
            const previous = this.#entries.get(key);
            if (
                this.#serveStaleOnError &&
                previous &&
                this.#now() - previous.fetchedAt < previous.ttlMs + this.#maxStaleMs
            ) {
                const reason = err instanceof Error ? err.message : String(err);
                void logThought(`[PriceCache] Serving stale '${key}' after refresh failure: ${reason}`);
                return { value: previous.value, fetchedAt: previous.fetchedAt, stale: true };
            }
            throw err instanceof UpstreamUnavailableError ? err : new UpstreamUnavailableError(key, err);
        }
    }
}
