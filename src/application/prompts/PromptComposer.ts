import { ComposedPrompt } from '../../domain/entities/Analysis';
import { SiteSnapshot, isSnapshotValid } from '../../domain/entities/SiteSnapshot';
import {
    AUDIT_SYSTEM_PROMPT,
    BROCHURE_HUMOROUS_STYLE,
    BROCHURE_SYSTEM_PROMPT,
    COMPETITOR_SYSTEM_PROMPT,
    CONTENT_SYSTEM_PROMPT,
    EMAIL_SYSTEM_PROMPT,
    LEADS_SYSTEM_PROMPT,
    LINKS_SYSTEM_PROMPT,
    SEO_SYSTEM_PROMPT,
    SOCIAL_SYSTEM_PROMPT,
} from './AnalysisPrompts';

/**
 * Maximum characters of body text embedded per snapshot, by kind.
 */
export const TEXT_LIMITS = {
    seo: 3000,
    competitors: 2000,
    content: 2000,
    leads: 2000,
    audit: 4000,
    social: 2000,
    email: 2000,
    brochure: 3000,
} as const;

export const LEADS_LINK_LIMIT = 20;
export const AUDIT_NAVIGATION_LIMIT = 15;

export const DEFAULT_CONTENT_TYPE = 'blog';
export const DEFAULT_PLATFORMS: readonly string[] = ['LinkedIn', 'Twitter', 'Instagram'];
export const DEFAULT_CAMPAIGN_TYPE = 'welcome_series';

export const NOT_ACCESSIBLE = 'Content not accessible';

/**
 * Instruction used in place of page content when a snapshot is degraded.
 */
export function inferFromDomainNote(domain: string): string {
    return `Limited access to ${domain} - please infer business type from domain name`;
}

/**
 * Builds the system and data prompts for every analysis kind.
 * Body text is truncated per kind so prompt size stays bounded.
 */
export class PromptComposer {
    seo(site: SiteSnapshot): ComposedPrompt {
        const userPrompt = [
            'Analyze this website for SEO:',
            `URL: ${site.sourceUrl}`,
            `Title: ${site.title}`,
            `Meta Description: ${site.metaDescription}`,
            `Keywords: ${site.metaKeywords}`,
            `Content Length: ${site.bodyText.length} characters`,
            `Number of Images: ${site.images.length}`,
            `Number of Links: ${site.links.length}`,
            '',
            'Page Content:',
            this.body(site, TEXT_LIMITS.seo, inferFromDomainNote(site.domain)),
        ].join('\n');

        return { systemPrompt: SEO_SYSTEM_PROMPT, userPrompt, structured: false };
    }

    competitors(main: SiteSnapshot, competitors: readonly SiteSnapshot[]): ComposedPrompt {
        const lines = [
            'Main Company Website:',
            `Title: ${main.title}`,
            `URL: ${main.sourceUrl}`,
            `Accessible: ${isSnapshotValid(main)}`,
            `Content: ${this.body(main, TEXT_LIMITS.competitors, NOT_ACCESSIBLE)}`,
            '',
            'Competitor Websites:',
        ];

        for (const competitor of competitors) {
            lines.push(
                '',
                `Competitor: ${competitor.title} (${competitor.sourceUrl})`,
                `Accessible: ${isSnapshotValid(competitor)}`,
                `Content: ${this.body(competitor, TEXT_LIMITS.competitors, NOT_ACCESSIBLE)}`
            );
        }

        return { systemPrompt: COMPETITOR_SYSTEM_PROMPT, userPrompt: lines.join('\n'), structured: false };
    }

    content(site: SiteSnapshot, contentType: string = DEFAULT_CONTENT_TYPE): ComposedPrompt {
        const userPrompt = [
            `Generate ${contentType} content ideas for this company:`,
            ...this.companyHeader(site, 'Description'),
            '',
            'Available Business Context:',
            this.body(site, TEXT_LIMITS.content, inferFromDomainNote(site.domain)),
        ].join('\n');

        return {
            systemPrompt: CONTENT_SYSTEM_PROMPT.replace('{{content_type}}', contentType),
            userPrompt,
            structured: false,
        };
    }

    leads(site: SiteSnapshot): ComposedPrompt {
        const links = site.links
            .slice(0, LEADS_LINK_LIMIT)
            .map((link) => `- ${link.text} -> ${link.url}`);

        const userPrompt = [
            'Extract contact information and lead magnets from:',
            `URL: ${site.sourceUrl}`,
            `Title: ${site.title}`,
            `Domain: ${site.domain}`,
            `Accessible: ${isSnapshotValid(site)}`,
            `Content: ${this.body(site, TEXT_LIMITS.leads, 'Limited access')}`,
            '',
            'Links found:',
            ...(links.length > 0 ? links : ['(none)']),
        ].join('\n');

        return { systemPrompt: LEADS_SYSTEM_PROMPT, userPrompt, structured: true };
    }

    audit(site: SiteSnapshot): ComposedPrompt {
        const internal = site.links.filter((link) => site.domain !== '' && link.url.includes(site.domain));
        const navigation = site.links.slice(0, AUDIT_NAVIGATION_LIMIT).map((link) => link.text);

        const userPrompt = [
            'Audit this website comprehensively:',
            `URL: ${site.sourceUrl}`,
            `Title: ${site.title}`,
            `Meta Description: ${site.metaDescription}`,
            `Content Length: ${site.bodyText.length} characters`,
            `Number of Pages Linked: ${internal.length}`,
            `External Links: ${site.links.length - internal.length}`,
            '',
            'Content:',
            this.body(site, TEXT_LIMITS.audit, inferFromDomainNote(site.domain)),
            '',
            'Navigation/Links:',
            navigation.join(' | '),
        ].join('\n');

        return { systemPrompt: AUDIT_SYSTEM_PROMPT, userPrompt, structured: false };
    }

    social(site: SiteSnapshot, platforms: readonly string[] = DEFAULT_PLATFORMS): ComposedPrompt {
        const userPrompt = [
            'Create a social media strategy for:',
            ...this.companyHeader(site, 'Business Description'),
            '',
            `Target Platforms: ${platforms.join(', ')}`,
            '',
            'Available Business Context:',
            this.body(site, TEXT_LIMITS.social, inferFromDomainNote(site.domain)),
        ].join('\n');

        return {
            systemPrompt: SOCIAL_SYSTEM_PROMPT.replace('{{platforms}}', platforms.join(', ')),
            userPrompt,
            structured: false,
        };
    }

    email(site: SiteSnapshot, campaignType: string = DEFAULT_CAMPAIGN_TYPE): ComposedPrompt {
        const userPrompt = [
            `Create a ${campaignType} email campaign for:`,
            ...this.companyHeader(site, 'Business'),
            '',
            'Available Company Information:',
            this.body(site, TEXT_LIMITS.email, inferFromDomainNote(site.domain)),
        ].join('\n');

        return {
            systemPrompt: EMAIL_SYSTEM_PROMPT.replace('{{campaign_type}}', campaignType),
            userPrompt,
            structured: false,
        };
    }

    brochure(site: SiteSnapshot, companyName: string, humorous: boolean = false): ComposedPrompt {
        const degradedNote =
            `Limited access to ${site.domain} - please create a professional brochure template based on the company name and domain`;

        const userPrompt = [
            `Company: ${companyName}`,
            `URL: ${site.sourceUrl}`,
            `Domain: ${site.domain}`,
            `Title: ${site.title}`,
            `Accessible: ${isSnapshotValid(site)}`,
            `Content: ${this.body(site, TEXT_LIMITS.brochure, degradedNote)}`,
        ].join('\n');

        const systemPrompt = humorous
            ? BROCHURE_SYSTEM_PROMPT.replace('short brochure', BROCHURE_HUMOROUS_STYLE)
            : BROCHURE_SYSTEM_PROMPT;

        return { systemPrompt, userPrompt, structured: false };
    }

    links(site: SiteSnapshot): ComposedPrompt {
        const userPrompt = [
            `Here is the list of links on the website of ${site.sourceUrl} - `
                + 'please decide which of these are relevant web links for a brochure about the company.',
            'Links:',
            ...site.links.map((link) => link.url),
        ].join('\n');

        return { systemPrompt: LINKS_SYSTEM_PROMPT, userPrompt, structured: true };
    }

    private companyHeader(site: SiteSnapshot, descriptionLabel: string): string[] {
        return [
            `Company: ${site.title}`,
            `URL: ${site.sourceUrl}`,
            `${descriptionLabel}: ${site.metaDescription}`,
            `Domain: ${site.domain}`,
        ];
    }

    private body(site: SiteSnapshot, limit: number, degradedNote: string): string {
        return isSnapshotValid(site) ? site.bodyText.substring(0, limit) : degradedNote;
    }
}
