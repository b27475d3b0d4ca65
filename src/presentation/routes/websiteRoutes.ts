import { Router, Request, Response } from 'express';
import { IWebsiteScraperClient } from '../../domain/ports/IWebsiteScraperClient';
import { SiteSnapshot } from '../../domain/entities/SiteSnapshot';
import { normalizeUrl } from '../../domain/services/UrlNormalizer';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

function summarize(site: SiteSnapshot) {
    return {
        title: site.title,
        meta_description: site.metaDescription,
        keywords: site.metaKeywords,
        domain: site.domain,
        links_count: site.links.length,
        images_count: site.images.length,
        content_length: site.bodyText.length,
        status_code: site.statusCode ?? null,
        fetch_error: site.fetchError ?? null,
    };
}

/**
 * Creates the snapshot inspection route.
 */
export function createWebsiteRoutes(scraper: IWebsiteScraperClient): Router {
    const router = Router();

    /**
     * GET /website/info?url=
     *
     * Raw snapshot summary without calling the provider. A site that could not
     * be fetched still answers 200 with fetch_error set.
     */
    router.get(
        '/website/info',
        asyncHandler(async (req: Request, res: Response) => {
            const raw = req.query.url;
            if (typeof raw !== 'string' || !raw.trim()) {
                throw new BadRequestError('url query parameter is required');
            }
            const url = normalizeUrl(raw);

            let site: SiteSnapshot;
            try {
                site = await scraper.scrape(url);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                throw new BadRequestError(`Failed to fetch website info: ${message}`);
            }

            res.json({ success: true, data: summarize(site), url });
        })
    );

    return router;
}
