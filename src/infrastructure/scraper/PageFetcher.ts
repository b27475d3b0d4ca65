import axios from 'axios';
import * as iconv from 'iconv-lite';

/**
 * Result of fetching a page. Failures are values, never exceptions.
 */
export type FetchOutcome =
    | { ok: true; statusCode: number; body: string }
    | { ok: false; error: string; unexpected: boolean; statusCode?: number };

export interface PageFetcherOptions {
    timeout?: number;
    maxRedirects?: number;
    userAgent?: string;
}

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const CONTENT_TYPE_CHARSET = /charset\s*=\s*["']?([^"';\s]+)/i;
const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i;

/**
 * Decodes a raw HTML body. The charset comes from the Content-Type header,
 * then from a <meta> declaration in the first 1024 bytes, then UTF-8.
 */
export function decodeHtml(raw: Buffer, contentType?: unknown): string {
    const fromHeader = typeof contentType === 'string' ? CONTENT_TYPE_CHARSET.exec(contentType)?.[1] : undefined;
    const declared = fromHeader ?? META_CHARSET.exec(raw.subarray(0, 1024).toString('latin1'))?.[1];
    const charset = declared && iconv.encodingExists(declared) ? declared : 'utf-8';
    return iconv.decode(raw, charset);
}

/**
 * Issues browser-like GET requests for HTML pages using axios.
 */
export class PageFetcher {
    private readonly timeout: number;
    private readonly maxRedirects: number;
    private readonly userAgent: string;

    constructor(options?: PageFetcherOptions) {
        this.timeout = options?.timeout ?? 15000;
        this.maxRedirects = options?.maxRedirects ?? 5;
        this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    }

    async fetch(url: string): Promise<FetchOutcome> {
        if (!this.isValidUrl(url)) {
            return { ok: false, error: `Error scraping ${url}: Invalid URL`, unexpected: false };
        }

        try {
            const response = await axios.get<ArrayBuffer>(url, {
                headers: {
                    'User-Agent': this.userAgent,
                    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.5',
                    'Accept-Encoding': 'gzip, deflate',
                    'Upgrade-Insecure-Requests': '1',
                },
                timeout: this.timeout,
                maxRedirects: this.maxRedirects,
                responseType: 'arraybuffer',
            });

            const body = decodeHtml(Buffer.from(response.data), response.headers['content-type']);
            return { ok: true, statusCode: response.status, body };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const reason = error.code === 'ECONNABORTED'
                    ? `timed out after ${this.timeout}ms`
                    : error.message;
                return {
                    ok: false,
                    error: `Error scraping ${url}: ${reason}`,
                    unexpected: false,
                    statusCode: error.response?.status,
                };
            }
            const message = error instanceof Error ? error.message : String(error);
            return { ok: false, error: `Unexpected error scraping ${url}: ${message}`, unexpected: true };
        }
    }

    /**
     * Validates URL format.
     */
    private isValidUrl(url: string): boolean {
        try {
            const parsed = new URL(url);
            return parsed.protocol === 'http:' || parsed.protocol === 'https:';
        } catch {
            return false;
        }
    }
}
