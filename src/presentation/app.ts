import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { AnalysisService } from '../application/AnalysisService';
import { AnalysisCache } from '../application/AnalysisCache';
import { JobManager } from '../application/JobManager';
import { JobRunner } from '../application/JobRunner';
import { ICachePort } from '../domain/ports/ICachePort';
import { ILlmClient } from '../domain/ports/ILlmClient';
import { IWebsiteScraperClient } from '../domain/ports/IWebsiteScraperClient';

// Infrastructure imports
import { WebsiteScraperClient } from '../infrastructure/scraper/WebsiteScraperClient';
import { GptLlmClient } from '../infrastructure/llm/GptLlmClient';
import { RateLimiter } from '../infrastructure/llm/RateLimiter';
import { InMemoryCacheAdapter } from '../infrastructure/cache/InMemoryCacheAdapter';
import { RedisCacheAdapter } from '../infrastructure/cache/RedisCacheAdapter';

// Route imports
import { createAnalysisRoutes } from './routes/analysisRoutes';
import { createJobRoutes } from './routes/jobRoutes';
import { createWebsiteRoutes } from './routes/websiteRoutes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { ENDPOINT_CATALOG, SERVICE_NAME, SERVICE_VERSION } from './endpoints';

export interface AppDependencies {
    scraper: IWebsiteScraperClient;
    analysisService: AnalysisService;
    analysisCache: AnalysisCache;
    jobManager: JobManager;
    jobRunner: JobRunner;
    /** Cancels running jobs and releases store connections */
    shutdown(): Promise<void>;
}

export interface DependencyOverrides {
    scraper?: IWebsiteScraperClient;
    llmClient?: ILlmClient;
    jobStore?: ICachePort;
    analysisStore?: ICachePort;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors({ origin: config.corsOrigins, credentials: true }));
    app.use(express.json());

    app.get('/', (_req: Request, res: Response) => {
        res.json({
            message: SERVICE_NAME,
            version: SERVICE_VERSION,
            status: 'operational',
            endpoints: ENDPOINT_CATALOG,
        });
    });

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
        });
    });

    // Routes
    app.use(createAnalysisRoutes(deps.analysisService, deps.analysisCache, deps.jobManager, deps.jobRunner));
    app.use(createJobRoutes(deps.jobManager, deps.jobRunner, deps.analysisCache));
    app.use(createWebsiteRoutes(deps.scraper));

    app.use(notFoundHandler(ENDPOINT_CATALOG));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 * With REDIS_URL set, jobs and cached analyses share one Redis instance.
 */
export function createDependencies(config: Config, overrides: DependencyOverrides = {}): AppDependencies {
    const redis = config.redisUrl && !(overrides.jobStore && overrides.analysisStore)
        ? new RedisCacheAdapter(config.redisUrl)
        : null;
    if (redis) {
        console.log('[Store] Using Redis for jobs and analysis cache');
    }

    const jobStore = overrides.jobStore ?? redis ?? new InMemoryCacheAdapter();
    const analysisStore = overrides.analysisStore
        ?? redis
        ?? new InMemoryCacheAdapter({ maxEntries: config.cacheMaxEntries });

    const scraper = overrides.scraper ?? new WebsiteScraperClient({
        timeout: config.scraperTimeoutMs,
        maxRedirects: config.scraperMaxRedirects,
    });
    const llmClient = overrides.llmClient ?? createLlmClient(config);

    const analysisService = new AnalysisService({ scraper, llmClient });
    const analysisCache = new AnalysisCache(analysisStore, config.cacheTtlSeconds);
    const jobManager = new JobManager(jobStore, { ttlSeconds: config.jobTtlSeconds });
    const jobRunner = new JobRunner(jobManager, analysisService);

    return {
        scraper,
        analysisService,
        analysisCache,
        jobManager,
        jobRunner,
        async shutdown(): Promise<void> {
            const cancelled = jobRunner.cancelAll();
            if (cancelled > 0) {
                console.log(`[Jobs] Cancelled ${cancelled} running job(s)`);
            }
            if (redis) {
                await redis.disconnect();
            }
        },
    };
}

function createLlmClient(config: Config): GptLlmClient {
    const rateLimiter = new RateLimiter({
        maxRequests: Math.max(1, config.llmRequestsPerInterval),
        intervalMs: config.llmRateIntervalMs,
    });
    console.log(
        `[LLM] Using ${config.openaiModel}, ${config.llmRequestsPerInterval} call(s) per ${config.llmRateIntervalMs}ms`
    );
    return new GptLlmClient(config.openaiApiKey, config.openaiModel, config.openaiBaseUrl, {
        timeout: config.llmTimeoutMs,
        rateLimiter,
    });
}
