/**
 * Kinds that answer with a templated report instead of calling the provider
 * when the site cannot be read.
 */
export type FallbackKind = 'seo' | 'audit';

const KIND_SECTIONS: Record<FallbackKind, { heading: string; items: string[] }> = {
    seo: {
        heading: 'SEO Specific Recommendations',
        items: [
            'Ensure the website is crawlable by search engines',
            'Check the robots.txt file',
            'Verify server response codes',
            'Test website accessibility from different locations',
        ],
    },
    audit: {
        heading: 'Audit Specific Recommendations',
        items: [
            'Fix website accessibility issues',
            'Ensure proper server configuration',
            'Review security settings',
            'Test from multiple locations and devices',
        ],
    },
};

/**
 * Builds the degraded-mode markdown report for a site that could not be scraped.
 */
export function createFallbackReport(kind: FallbackKind, url: string, domain: string): string {
    const section = KIND_SECTIONS[kind];

    return [
        `# Website Analysis for ${domain}`,
        '',
        '## Status',
        '⚠️ **Limited Analysis Available**',
        '',
        `The website ${url} could not be fully accessed (likely bot protection, rate limiting or a server error).`,
        '',
        '## Basic Information',
        `- **Domain**: ${domain}`,
        `- **URL**: ${url}`,
        '- **Status**: Access restricted',
        '',
        '## Recommendations',
        '',
        '### Accessibility',
        '1. Make sure the site responds to search engine crawlers',
        '2. Check that robots.txt does not block legitimate crawlers',
        '3. If a CDN is in front of the site, review its bot settings',
        '',
        '### Content Strategy',
        '1. Research content trends in your industry',
        '2. Review accessible competitor websites',
        '3. Run keyword research for your core services',
        '',
        '### Technical',
        '1. Set up uptime monitoring to catch access issues',
        '2. Optimize page load speed',
        '3. Confirm the site is mobile friendly',
        '',
        '## Next Steps',
        '1. Ask your web developer to review access restrictions',
        '2. Check server logs for blocked requests',
        '3. Handle automated user agents deliberately',
        '',
        '*This analysis is limited because the website could not be read. Make it accessible to automated tools for a complete report.*',
        '',
        `## ${section.heading}`,
        ...section.items.map((item) => `- ${item}`),
    ].join('\n');
}
