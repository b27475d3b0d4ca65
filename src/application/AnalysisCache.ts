import { ICachePort, CACHE_PREFIXES } from '../domain/ports/ICachePort';
import { JsonValue } from '../domain/entities/Analysis';
import { analysisCacheKey } from '../domain/services/UrlNormalizer';

/**
 * Response payload memoized per (kind, normalized URL).
 */
export type CachedAnalysis = { [key: string]: JsonValue };

/**
 * Memoizes single-kind analysis payloads.
 * Store failures are logged and treated as a miss so the request still succeeds.
 */
export class AnalysisCache {
    constructor(
        private readonly store: ICachePort,
        private readonly ttlSeconds: number = 0
    ) {}

    async get(kind: string, normalizedUrl: string): Promise<CachedAnalysis | null> {
        try {
            return await this.store.get<CachedAnalysis>(this.key(kind, normalizedUrl));
        } catch (error) {
            console.warn(`[Cache] Read failed for ${kind} ${normalizedUrl}:`, error);
            return null;
        }
    }

    async set(kind: string, normalizedUrl: string, payload: CachedAnalysis): Promise<void> {
        try {
            await this.store.set(this.key(kind, normalizedUrl), payload, this.ttlSeconds);
        } catch (error) {
            console.warn(`[Cache] Write failed for ${kind} ${normalizedUrl}:`, error);
        }
    }

    /**
     * Number of memoized payloads.
     */
    async size(): Promise<number> {
        const keys = await this.store.keys(CACHE_PREFIXES.ANALYSIS);
        return keys.length;
    }

    private key(kind: string, normalizedUrl: string): string {
        return `${CACHE_PREFIXES.ANALYSIS}${analysisCacheKey(kind, normalizedUrl)}`;
    }
}
