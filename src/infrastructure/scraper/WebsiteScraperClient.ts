import { IWebsiteScraperClient } from '../../domain/ports/IWebsiteScraperClient';
import {
    SiteSnapshot,
    createDegradedSnapshot,
    createSiteSnapshot,
    domainOf,
} from '../../domain/entities/SiteSnapshot';
import { PageFetcher, PageFetcherOptions } from './PageFetcher';
import { HtmlExtractor } from './HtmlExtractor';

/**
 * Website scraper client using axios + cheerio.
 * Every failure is recorded on the snapshot instead of being thrown.
 */
export class WebsiteScraperClient implements IWebsiteScraperClient {
    private readonly fetcher: PageFetcher;
    private readonly extractor: HtmlExtractor;

    constructor(options?: PageFetcherOptions) {
        this.fetcher = new PageFetcher(options);
        this.extractor = new HtmlExtractor();
    }

    async scrape(url: string): Promise<SiteSnapshot> {
        console.log(`[Scraper] Scraping ${url}...`);

        const outcome = await this.fetcher.fetch(url);
        if (!outcome.ok) {
            console.error(`[Scraper] ${outcome.error}`);
            return createDegradedSnapshot(url, outcome.error, {
                unexpected: outcome.unexpected,
                statusCode: outcome.statusCode,
            });
        }

        try {
            const page = this.extractor.extract(outcome.body, url, domainOf(url));
            console.log(`[Scraper] Successfully scraped ${url} (${page.bodyText.length} chars, ${page.links.length} links)`);
            return createSiteSnapshot(url, page, outcome.statusCode);
        } catch (error) {
            const message = `Unexpected error scraping ${url}: ${error instanceof Error ? error.message : String(error)}`;
            console.error(`[Scraper] ${message}`);
            return createDegradedSnapshot(url, message, {
                unexpected: true,
                statusCode: outcome.statusCode,
            });
        }
    }
}
