import * as cheerio from 'cheerio';
import { AnyNode, hasChildren, isText } from 'domhandler';
import { ExtractedPage, SiteImage, SiteLink } from '../../domain/entities/SiteSnapshot';

/** Elements whose text never counts as page content. */
const NON_CONTENT_SELECTOR = 'script, style, img, input, nav, footer, header';

/**
 * Parses fetched HTML into the structured fields of a site snapshot.
 */
export class HtmlExtractor {
    extract(html: string, pageUrl: string, domain: string): ExtractedPage {
        const $ = cheerio.load(html);

        // Links and images come from the untouched document; body text
        // extraction removes elements, so it runs last.
        const links = this.extractLinks($, pageUrl);
        const images = this.extractImages($, pageUrl);

        return {
            title: this.resolveTitle($, domain),
            metaDescription: this.resolveMetaDescription($),
            metaKeywords: ($('meta[name="keywords"]').first().attr('content') ?? '').trim(),
            bodyText: this.extractBodyText($),
            links,
            images,
        };
    }

    /**
     * <title> -> first <h1> -> "Website: {domain}".
     */
    private resolveTitle($: cheerio.CheerioAPI, domain: string): string {
        const title = this.cleanText($('title').first().text());
        if (title) {
            return title;
        }

        const h1 = this.cleanText($('h1').first().text());
        if (h1) {
            return h1;
        }

        return `Website: ${domain}`;
    }

    private resolveMetaDescription($: cheerio.CheerioAPI): string {
        let tag = $('meta[name="description"]').first();
        if (tag.length === 0) {
            tag = $('meta[property="og:description"]').first();
        }
        return (tag.attr('content') ?? '').trim();
    }

    /**
     * Flattens the visible body text, one trimmed text node per line.
     * Falls back to the whole document when there is no body element.
     */
    private extractBodyText($: cheerio.CheerioAPI): string {
        const container: AnyNode | undefined = $('body').get(0) ?? $.root().get(0);
        if (!container) {
            return '';
        }

        $(container).find(NON_CONTENT_SELECTOR).remove();

        const lines: string[] = [];
        this.collectText(container, lines);
        return lines.join('\n');
    }

    private collectText(node: AnyNode, lines: string[]): void {
        if (isText(node)) {
            const text = node.data.trim();
            if (text) {
                lines.push(text);
            }
            return;
        }
        if (hasChildren(node)) {
            for (const child of node.children) {
                this.collectText(child, lines);
            }
        }
    }

    private extractLinks($: cheerio.CheerioAPI, pageUrl: string): SiteLink[] {
        const links: SiteLink[] = [];

        $('a[href]').each((_, element) => {
            const anchor = $(element);
            const href = (anchor.attr('href') ?? '').trim();
            if (!href || href.startsWith('#')) {
                return;
            }

            const url = this.resolveUrl(href, pageUrl);
            if (url === undefined) {
                console.warn(`[Scraper] Skipping link with unresolvable href "${href}" on ${pageUrl}`);
                return;
            }

            links.push({
                url,
                text: this.cleanText(anchor.text()),
                title: anchor.attr('title') ?? '',
            });
        });

        return links;
    }

    private extractImages($: cheerio.CheerioAPI, pageUrl: string): SiteImage[] {
        const images: SiteImage[] = [];

        $('img[src]').each((_, element) => {
            const img = $(element);
            const src = (img.attr('src') ?? '').trim();
            if (!src) {
                return;
            }

            const url = this.resolveUrl(src, pageUrl);
            if (url === undefined) {
                console.warn(`[Scraper] Skipping image with unresolvable src "${src}" on ${pageUrl}`);
                return;
            }

            images.push({
                url,
                alt: img.attr('alt') ?? '',
                title: img.attr('title') ?? '',
            });
        });

        return images;
    }

    private resolveUrl(reference: string, pageUrl: string): string | undefined {
        try {
            return new URL(reference, pageUrl).href;
        } catch {
            return undefined;
        }
    }

    /**
     * Collapses runs of whitespace.
     */
    private cleanText(text: string): string {
        return text.replace(/\s+/g, ' ').trim();
    }
}
