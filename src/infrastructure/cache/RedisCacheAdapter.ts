import Redis from 'ioredis';
import { ICachePort } from '../../domain/ports/ICachePort';

/**
 * Redis Cache Adapter
 *
 * Shared cache for multi-instance deployments.
 * Values are stored as JSON; TTL maps to EX.
 */
export class RedisCacheAdapter implements ICachePort {
    private client: Redis;

    constructor(redisUrl: string) {
        this.client = new Redis(redisUrl, {
            retryStrategy: (times) => {
                const delay = Math.min(times * 50, 2000);
                return delay;
            },
            maxRetriesPerRequest: 3
        });

        this.client.on('error', (err) => {
            console.error('[Redis] Cache adapter error:', err);
        });
    }

    async get<T>(key: string): Promise<T | null> {
        const data = await this.client.get(key);
        if (data === null) {
            return null;
        }
        const parsed: T = JSON.parse(data);
        return parsed;
    }

    async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
        const data = JSON.stringify(value);
        if (ttlSeconds && ttlSeconds > 0) {
            await this.client.set(key, data, 'EX', ttlSeconds);
        } else {
            await this.client.set(key, data);
        }
    }

    async keys(prefix: string): Promise<string[]> {
        const found: string[] = [];
        let cursor = '0';
        do {
            const [next, batch] = await this.client.scan(cursor, 'MATCH', `${prefix}*`, 'COUNT', 100);
            found.push(...batch);
            cursor = next;
        } while (cursor !== '0');
        return Array.from(new Set(found));
    }

    /**
     * Gracefully close the Redis connection.
     */
    async disconnect(): Promise<void> {
        await this.client.quit();
    }
}
