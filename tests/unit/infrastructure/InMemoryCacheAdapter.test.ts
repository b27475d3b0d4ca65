import { InMemoryCacheAdapter } from '../../../src/infrastructure/cache/InMemoryCacheAdapter';

describe('InMemoryCacheAdapter', () => {
    let now: number;

    beforeEach(() => {
        now = 0;
    });

    it('should return null for missing keys', async () => {
        const cache = new InMemoryCacheAdapter();
        expect(await cache.get('missing')).toBeNull();
    });

    it('should store values without expiry by default', async () => {
        const cache = new InMemoryCacheAdapter({ now: () => now });
        await cache.set('analysis:seo_https://acme.example', { analysis: 'report' });

        now = 10 * 365 * 24 * 3600 * 1000;

        expect(await cache.get('analysis:seo_https://acme.example')).toEqual({ analysis: 'report' });
    });

    it('should expire entries after their TTL', async () => {
        const cache = new InMemoryCacheAdapter({ now: () => now });
        await cache.set('key', 'value', 10);

        now = 10000;
        expect(await cache.get<string>('key')).toBe('value');

        now = 10001;
        expect(await cache.get<string>('key')).toBeNull();
        expect(await cache.keys('')).toEqual([]);
    });

    it('should evict the oldest entry when the size bound is exceeded', async () => {
        const cache = new InMemoryCacheAdapter({ maxEntries: 2 });
        await cache.set('a', 1);
        await cache.set('b', 2);
        await cache.set('c', 3);

        expect(await cache.keys('')).toEqual(['b', 'c']);
        expect(await cache.get('a')).toBeNull();
    });

    it('should treat a rewrite as the newest entry', async () => {
        const cache = new InMemoryCacheAdapter({ maxEntries: 2 });
        await cache.set('a', 1);
        await cache.set('b', 2);
        await cache.set('a', 10);
        await cache.set('c', 3);

        expect(await cache.keys('')).toEqual(['a', 'c']);
        expect(await cache.get('a')).toBe(10);
    });

    it('should list keys by prefix', async () => {
        const cache = new InMemoryCacheAdapter();
        await cache.set('job:job_1', {});
        await cache.set('analysis:seo_https://acme.example', {});
        await cache.set('job:job_2', {});

        expect(await cache.keys('job:')).toEqual(['job:job_1', 'job:job_2']);
    });
});
