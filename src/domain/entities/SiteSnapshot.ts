/**
 * A hyperlink found on a scraped page.
 */
export interface SiteLink {
    /** Absolute URL, resolved against the page URL */
    url: string;
    /** Anchor text with whitespace collapsed */
    text: string;
    /** Value of the title attribute, or empty string */
    title: string;
}

/**
 * An image found on a scraped page.
 */
export interface SiteImage {
    /** Absolute URL, resolved against the page URL */
    url: string;
    alt: string;
    title: string;
}

/**
 * Point-in-time extraction of a fetched page.
 * Built once per request and frozen; never persisted.
 */
export interface SiteSnapshot {
    /** URL as requested */
    readonly sourceUrl: string;
    /** Host component of the URL, empty when the URL cannot be parsed */
    readonly domain: string;
    readonly title: string;
    readonly metaDescription: string;
    readonly metaKeywords: string;
    /** Visible text of the page body, one text node per line */
    readonly bodyText: string;
    readonly links: readonly SiteLink[];
    readonly images: readonly SiteImage[];
    /** HTTP status code, absent when no response was received */
    readonly statusCode?: number;
    /** Set when the page could not be fetched or parsed */
    readonly fetchError?: string;
}

/** Body text must be longer than this for a snapshot to be usable. */
export const MIN_VALID_TEXT_LENGTH = 100;

/** Characters of body text included in the snapshot summary. */
export const SUMMARY_TEXT_LIMIT = 3000;

/**
 * Fields produced by the HTML extractor.
 */
export type ExtractedPage = Pick<
    SiteSnapshot,
    'title' | 'metaDescription' | 'metaKeywords' | 'bodyText' | 'links' | 'images'
>;

/**
 * Returns the host of a URL, or an empty string if it cannot be parsed.
 */
export function domainOf(url: string): string {
    try {
        return new URL(url).host;
    } catch {
        return '';
    }
}

/**
 * Creates a snapshot from a successfully fetched and extracted page.
 */
export function createSiteSnapshot(
    sourceUrl: string,
    page: ExtractedPage,
    statusCode?: number
): SiteSnapshot {
    return Object.freeze({
        sourceUrl,
        domain: domainOf(sourceUrl),
        title: page.title,
        metaDescription: page.metaDescription,
        metaKeywords: page.metaKeywords,
        bodyText: page.bodyText,
        links: Object.freeze([...page.links]),
        images: Object.freeze([...page.images]),
        statusCode,
    });
}

/**
 * Creates a degraded snapshot for a page that could not be fetched or parsed.
 * Text, links and images stay empty; the title names the domain.
 */
export function createDegradedSnapshot(
    sourceUrl: string,
    fetchError: string,
    options: { unexpected?: boolean; statusCode?: number } = {}
): SiteSnapshot {
    const domain = domainOf(sourceUrl);
    return Object.freeze({
        sourceUrl,
        domain,
        title: options.unexpected ? `Error processing ${domain}` : `Error accessing ${domain}`,
        metaDescription: '',
        metaKeywords: '',
        bodyText: '',
        links: Object.freeze([]),
        images: Object.freeze([]),
        statusCode: options.statusCode,
        fetchError,
    });
}

/**
 * A snapshot is valid when it was fetched without error and has meaningful text.
 */
export function isSnapshotValid(snapshot: SiteSnapshot): boolean {
    return snapshot.fetchError === undefined && snapshot.bodyText.length > MIN_VALID_TEXT_LENGTH;
}

/**
 * Formats a snapshot as a bounded text summary for prompting.
 */
export function getSnapshotContents(snapshot: SiteSnapshot): string {
    let content = `Webpage Title: ${snapshot.title}\n\n`;

    if (snapshot.metaDescription) {
        content += `Meta Description: ${snapshot.metaDescription}\n\n`;
    }

    if (snapshot.fetchError !== undefined) {
        content += `Error: ${snapshot.fetchError}\n\n`;
        content += 'Note: Limited information available due to scraping restrictions.\n';
        content += `Company appears to be: ${snapshot.domain}\n\n`;
    } else {
        content += `Webpage Contents:\n${snapshot.bodyText.substring(0, SUMMARY_TEXT_LIMIT)}...\n\n`;
    }

    return content;
}

/**
 * Derives a display company name from a domain: "www.acme-tools.com" -> "Acme-Tools".
 */
export function companyNameFromDomain(domain: string): string {
    const label = domain.replace('www.', '').split('.')[0];
    return label
        .toLowerCase()
        .replace(/(^|[^a-z])([a-z])/g, (_match, before: string, letter: string) => before + letter.toUpperCase());
}
