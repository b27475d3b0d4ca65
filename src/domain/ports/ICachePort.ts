/**
 * Cache Port Interface
 *
 * Key-value storage for jobs and memoized analysis results.
 * Implementations: Redis, In-Memory.
 */
export interface ICachePort {
    /**
     * Get a value from the cache.
     * @returns The cached value or null if not found/expired
     */
    get<T>(key: string): Promise<T | null>;

    /**
     * Set a value in the cache.
     * @param ttlSeconds - Optional TTL in seconds (0 or omitted: no expiry)
     */
    set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;

    /**
     * List live keys starting with the given prefix.
     */
    keys(prefix: string): Promise<string[]>;
}

/**
 * Key prefixes for the data types sharing a cache backend.
 */
export const CACHE_PREFIXES = {
    JOB: 'job:',
    ANALYSIS: 'analysis:',
} as const;
