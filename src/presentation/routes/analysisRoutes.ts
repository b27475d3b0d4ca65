import { Router, Request, Response } from 'express';
import { AnalysisService } from '../../application/AnalysisService';
import { AnalysisCache, CachedAnalysis } from '../../application/AnalysisCache';
import { JobManager } from '../../application/JobManager';
import { JobRunner } from '../../application/JobRunner';
import { AnalysisArtifact } from '../../domain/entities/Analysis';
import { AnalysisJob } from '../../domain/entities/AnalysisJob';
import { normalizeUrl } from '../../domain/services/UrlNormalizer';
import { companyNameFromDomain, domainOf } from '../../domain/entities/SiteSnapshot';
import { DEFAULT_CAMPAIGN_TYPE, DEFAULT_CONTENT_TYPE, DEFAULT_PLATFORMS } from '../../application/prompts/PromptComposer';
import { asyncHandler, AppError } from '../middleware/errorHandler';
import {
    optionalBoolean,
    optionalString,
    optionalStringArray,
    requireString,
    requireStringArray,
} from '../requestFields';
import { envelope } from '../envelope';

export const ESTIMATED_COMPLETE_TIME = '3-8 minutes';

/**
 * Runs an analysis, turning any exception into a 500 with the given prefix.
 */
async function runAnalysis(failurePrefix: string, run: () => Promise<AnalysisArtifact>): Promise<AnalysisArtifact> {
    try {
        return await run();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new AppError(500, `${failurePrefix}: ${message}`);
    }
}

/**
 * Creates the single-kind analysis routes and the background "complete" route.
 */
export function createAnalysisRoutes(
    analysisService: AnalysisService,
    cache: AnalysisCache,
    jobManager: JobManager,
    jobRunner: JobRunner
): Router {
    const router = Router();

    /**
     * POST /analyze/seo
     *
     * Served from the analysis cache when the normalized URL was seen before.
     */
    router.post(
        '/analyze/seo',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));

            const cached = await cache.get('seo', url);
            if (cached) {
                console.log(`[API] seo for ${url} served from cache`);
                res.json(envelope(cached, 'SEO analysis retrieved from cache'));
                return;
            }

            const analysis = await runAnalysis('SEO analysis failed', () => analysisService.analyzeSeo(url));
            const data: CachedAnalysis = { analysis, type: 'seo', url };
            await cache.set('seo', url, data);

            res.json(envelope(data, 'SEO analysis completed successfully'));
        })
    );

    /**
     * POST /analyze/contact
     *
     * Structured contact and lead magnet extraction.
     */
    router.post(
        '/analyze/contact',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));

            const analysis = await runAnalysis('Contact extraction failed', () =>
                analysisService.extractContactInfo(url)
            );

            res.json(envelope({ analysis, type: 'contact', url }, 'Contact information extracted successfully'));
        })
    );

    /**
     * POST /analyze/audit
     */
    router.post(
        '/analyze/audit',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));

            const analysis = await runAnalysis('Website audit failed', () => analysisService.auditWebsite(url));

            res.json(envelope({ analysis, type: 'audit', url }, 'Website audit completed successfully'));
        })
    );

    /**
     * POST /analyze/competitors
     */
    router.post(
        '/analyze/competitors',
        asyncHandler(async (req: Request, res: Response) => {
            const mainUrl = normalizeUrl(requireString(req.body, 'main_url'));
            const competitorUrls = requireStringArray(req.body, 'competitor_urls').map(normalizeUrl);

            const analysis = await runAnalysis('Competitor analysis failed', () =>
                analysisService.analyzeCompetitors(mainUrl, competitorUrls)
            );

            res.json(envelope(
                { analysis, type: 'competitors', main_url: mainUrl, competitor_urls: competitorUrls },
                'Competitor analysis completed successfully'
            ));
        })
    );

    /**
     * POST /analyze/content
     */
    router.post(
        '/analyze/content',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));
            const contentType = optionalString(req.body, 'content_type') || DEFAULT_CONTENT_TYPE;

            const analysis = await runAnalysis('Content generation failed', () =>
                analysisService.generateContentIdeas(url, contentType)
            );

            res.json(envelope(
                { analysis, type: 'content', content_type: contentType, url },
                'Content ideas generated successfully'
            ));
        })
    );

    /**
     * POST /analyze/social
     */
    router.post(
        '/analyze/social',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));
            const requested = optionalStringArray(req.body, 'platforms');
            const platforms = requested && requested.length > 0 ? requested : [...DEFAULT_PLATFORMS];

            const analysis = await runAnalysis('Social media strategy failed', () =>
                analysisService.generateSocialStrategy(url, platforms)
            );

            res.json(envelope(
                { analysis, type: 'social', platforms, url },
                'Social media strategy generated successfully'
            ));
        })
    );

    /**
     * POST /analyze/email
     */
    router.post(
        '/analyze/email',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));
            const campaignType = optionalString(req.body, 'campaign_type') || DEFAULT_CAMPAIGN_TYPE;

            const analysis = await runAnalysis('Email campaign generation failed', () =>
                analysisService.generateEmailCampaign(url, campaignType)
            );

            res.json(envelope(
                { analysis, type: 'email', campaign_type: campaignType, url },
                'Email campaign generated successfully'
            ));
        })
    );

    /**
     * POST /analyze/brochure
     *
     * Company name defaults to one derived from the domain.
     */
    router.post(
        '/analyze/brochure',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));
            const companyName = optionalString(req.body, 'company_name')?.trim() || companyNameFromDomain(domainOf(url));
            const humorous = optionalBoolean(req.body, 'humorous') ?? false;

            const analysis = await runAnalysis('Brochure creation failed', () =>
                analysisService.createBrochure(url, { companyName, humorous })
            );

            res.json(envelope(
                { analysis, type: 'brochure', company_name: companyName, humorous, url },
                'Company brochure created successfully'
            ));
        })
    );

    /**
     * POST /analyze/links
     *
     * Structured selection of brochure-relevant links.
     */
    router.post(
        '/analyze/links',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));

            const analysis = await runAnalysis('Link selection failed', () =>
                analysisService.selectBrochureLinks(url)
            );

            res.json(envelope({ analysis, type: 'links', url }, 'Brochure links selected successfully'));
        })
    );

    /**
     * POST /analyze/complete
     *
     * Starts a background job and returns its ID for polling.
     */
    router.post(
        '/analyze/complete',
        asyncHandler(async (req: Request, res: Response) => {
            const url = normalizeUrl(requireString(req.body, 'url'));
            const analysisType = optionalString(req.body, 'analysis_type')?.trim() || 'all';

            let job: AnalysisJob;
            try {
                job = await jobManager.createJob({ url, analysisType });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                throw new AppError(500, `Failed to start analysis: ${message}`);
            }

            // Runs in the background; the runner records success or failure on the job
            jobRunner.start(job);
            console.log(`[API] Started job ${job.id} (${analysisType}) for ${url}`);

            res.status(202).json({
                job_id: job.id,
                status: 'started',
                message: `Complete analysis started. Use /jobs/${job.id} to check progress`,
                estimated_time: ESTIMATED_COMPLETE_TIME,
                url,
                analysis_type: analysisType,
            });
        })
    );

    return router;
}
