import { SiteSnapshot } from '../entities/SiteSnapshot';

/**
 * Port for turning a URL into a site snapshot.
 */
export interface IWebsiteScraperClient {
    /**
     * Fetches and extracts a page.
     * Never rejects for fetch or parse failures: those produce a degraded
     * snapshot with `fetchError` set.
     */
    scrape(url: string): Promise<SiteSnapshot>;
}
