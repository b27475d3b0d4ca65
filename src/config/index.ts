import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    corsOrigins: string[];

    // OpenAI-compatible provider
    openaiApiKey: string;
    openaiModel: string;
    openaiBaseUrl: string;
    llmTimeoutMs: number;

    // Provider rate limit (sliding window)
    llmRequestsPerInterval: number;
    llmRateIntervalMs: number;

    // Scraper
    scraperTimeoutMs: number;
    scraperMaxRedirects: number;

    // Storage (Redis when set, in-memory otherwise)
    redisUrl?: string;
    cacheTtlSeconds: number; // 0 = never expires
    cacheMaxEntries: number; // 0 = unbounded, in-memory store only
    jobTtlSeconds: number;
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:8080'];

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string, defaultValue: string[]): string[] {
    const value = getEnvVar(key, '');
    if (!value) {
        return defaultValue;
    }
    return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value || undefined;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 8000),
        environment: getEnvVar('NODE_ENV', 'development'),
        corsOrigins: getEnvVarList('CORS_ORIGINS', DEFAULT_CORS_ORIGINS),

        // OpenAI
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4o-mini'),
        openaiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com/v1'),
        llmTimeoutMs: getEnvVarNumber('LLM_TIMEOUT_MS', 60000),

        // Rate limit
        llmRequestsPerInterval: getEnvVarNumber('LLM_REQUESTS_PER_INTERVAL', 1),
        llmRateIntervalMs: getEnvVarNumber('LLM_RATE_INTERVAL_MS', 2000),

        // Scraper
        scraperTimeoutMs: getEnvVarNumber('SCRAPER_TIMEOUT_MS', 15000),
        scraperMaxRedirects: getEnvVarNumber('SCRAPER_MAX_REDIRECTS', 5),

        // Storage
        redisUrl: getOptionalEnvVar('REDIS_URL'),
        cacheTtlSeconds: getEnvVarNumber('CACHE_TTL_SECONDS', 0),
        cacheMaxEntries: getEnvVarNumber('CACHE_MAX_ENTRIES', 0),
        jobTtlSeconds: getEnvVarNumber('JOB_TTL_SECONDS', 0),
    };
}

/**
 * Checks the configuration. Problems are returned as warnings;
 * analysis requests fail individually until they are fixed.
 */
export function validateConfig(config: Config): string[] {
    const warnings: string[] = [];

    if (!config.openaiApiKey) {
        warnings.push('OPENAI_API_KEY is not set; analyses will report provider errors');
    }
    if (config.llmRequestsPerInterval < 1) {
        warnings.push('LLM_REQUESTS_PER_INTERVAL must be at least 1; using 1');
    }
    if (config.llmRateIntervalMs < 0) {
        warnings.push('LLM_RATE_INTERVAL_MS cannot be negative; rate limiting disabled');
    }
    if (config.redisUrl && config.cacheMaxEntries > 0) {
        warnings.push('CACHE_MAX_ENTRIES only applies to the in-memory store; use CACHE_TTL_SECONDS with Redis');
    }

    return warnings;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
