/**
 * Public endpoint catalog, served at the root and with 404 responses.
 */
export const ENDPOINT_CATALOG: Record<string, readonly string[]> = {
    analysis: [
        '/analyze/seo',
        '/analyze/competitors',
        '/analyze/content',
        '/analyze/contact',
        '/analyze/audit',
        '/analyze/social',
        '/analyze/email',
        '/analyze/brochure',
        '/analyze/links',
        '/analyze/complete',
    ],
    utility: ['/website/info', '/jobs', '/jobs/{job_id}', '/health'],
};

export const SERVICE_NAME = 'Site Insights API';
export const SERVICE_VERSION = '1.0.0';
