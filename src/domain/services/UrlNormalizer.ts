/**
 * Prefixes `https://` when the URL has no http(s) scheme.
 */
export function normalizeUrl(url: string): string {
    const trimmed = url.trim();
    if (trimmed.startsWith('http://') || trimmed.startsWith('https://')) {
        return trimmed;
    }
    return `https://${trimmed}`;
}

/**
 * Cache key for a single-kind analysis of a normalized URL.
 */
export function analysisCacheKey(kind: string, normalizedUrl: string): string {
    return `${kind}_${normalizedUrl}`;
}
