/**
 * In-Memory Cache Adapter
 *
 * Process-local cache for development, tests and single-instance deployments.
 * Supports TTL with lazy expiration and an optional size bound.
 */

import { ICachePort } from '../../domain/ports/ICachePort';

interface CacheEntry {
    value: unknown;
    expiresAt: number | null; // null = no expiry
}

export interface InMemoryCacheOptions {
    /** Maximum number of entries; the oldest entry is evicted first. 0 = unbounded */
    maxEntries?: number;
    now?: () => number;
}

export class InMemoryCacheAdapter implements ICachePort {
    private cache: Map<string, CacheEntry> = new Map();
    private readonly maxEntries: number;
    private readonly now: () => number;

    constructor(options: InMemoryCacheOptions = {}) {
        this.maxEntries = options.maxEntries ?? 0;
        this.now = options.now ?? Date.now;
    }

    async get<T>(key: string): Promise<T | null> {
        const entry = this.cache.get(key);

        if (!entry) {
            return null;
        }

        if (this.isExpired(entry)) {
            this.cache.delete(key);
            return null;
        }

        // Values are only ever written through set<T> for the same key.
        return entry.value as T;
    }

    async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
        const expiresAt = ttlSeconds ? this.now() + ttlSeconds * 1000 : null;

        // Re-inserting moves the key to the back of the eviction order
        this.cache.delete(key);
        this.cache.set(key, { value, expiresAt });

        if (this.maxEntries > 0) {
            while (this.cache.size > this.maxEntries) {
                const oldest = this.cache.keys().next();
                if (oldest.done) break;
                this.cache.delete(oldest.value);
            }
        }
    }

    async keys(prefix: string): Promise<string[]> {
        const live: string[] = [];
        for (const [key, entry] of this.cache.entries()) {
            if (!key.startsWith(prefix)) continue;
            if (this.isExpired(entry)) {
                this.cache.delete(key);
                continue;
            }
            live.push(key);
        }
        return live;
    }

    private isExpired(entry: CacheEntry): boolean {
        return entry.expiresAt !== null && this.now() > entry.expiresAt;
    }
}
