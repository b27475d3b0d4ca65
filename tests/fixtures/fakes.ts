import { Config } from '../../src/config';
import { ILlmClient } from '../../src/domain/ports/ILlmClient';
import { IWebsiteScraperClient } from '../../src/domain/ports/IWebsiteScraperClient';
import {
    SiteSnapshot,
    SiteLink,
    createDegradedSnapshot,
    createSiteSnapshot,
} from '../../src/domain/entities/SiteSnapshot';

export const LONG_BODY = 'Acme builds hand tools for carpenters and metal workers. '.repeat(5);

export function validSite(url: string = 'https://acme.example', links: SiteLink[] = []): SiteSnapshot {
    return createSiteSnapshot(
        url,
        {
            title: 'Acme Tools',
            metaDescription: 'Hand tools since 1950',
            metaKeywords: 'hammers, saws',
            bodyText: LONG_BODY,
            links,
            images: [],
        },
        200
    );
}

export function degradedSite(url: string = 'https://down.example'): SiteSnapshot {
    return createDegradedSnapshot(url, `Error scraping ${url}: timeout of 15000ms exceeded`);
}

export function fakeScraper(): jest.Mocked<IWebsiteScraperClient> {
    return { scrape: jest.fn() };
}

export function fakeLlm(text: string = 'report'): jest.Mocked<ILlmClient> {
    const llm: jest.Mocked<ILlmClient> = { generate: jest.fn() };
    llm.generate.mockResolvedValue({ ok: true, format: 'text', text });
    return llm;
}

/**
 * A promise the test resolves by hand, for holding work in flight.
 */
export function gate(): { wait: Promise<void>; release: () => void } {
    let release: () => void = () => undefined;
    const wait = new Promise<void>((resolve) => {
        release = resolve;
    });
    return { wait, release };
}

export function testConfig(overrides: Partial<Config> = {}): Config {
    return {
        port: 8000,
        environment: 'test',
        corsOrigins: ['http://localhost:3000'],
        openaiApiKey: 'test-secret',
        openaiModel: 'gpt-4o-mini',
        openaiBaseUrl: 'https://api.openai.test/v1',
        llmTimeoutMs: 1000,
        llmRequestsPerInterval: 1,
        llmRateIntervalMs: 0,
        scraperTimeoutMs: 1000,
        scraperMaxRedirects: 5,
        redisUrl: undefined,
        cacheTtlSeconds: 0,
        cacheMaxEntries: 0,
        jobTtlSeconds: 0,
        ...overrides,
    };
}

/**
 * Silences console output for the duration of a test file.
 */
export function silenceConsole(): void {
    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });
}
