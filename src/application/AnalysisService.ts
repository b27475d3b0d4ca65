import { IWebsiteScraperClient } from '../domain/ports/IWebsiteScraperClient';
import { ILlmClient } from '../domain/ports/ILlmClient';
import {
    AnalysisArtifact,
    COMPLETE_ANALYSIS_ORDER,
    CompleteAnalysisKind,
    ComposedPrompt,
    KindOutcome,
    toArtifact,
} from '../domain/entities/Analysis';
import { SiteSnapshot, companyNameFromDomain, isSnapshotValid } from '../domain/entities/SiteSnapshot';
import { PromptComposer } from './prompts/PromptComposer';
import { createFallbackReport } from './prompts/FallbackReport';

export interface AnalysisServiceDependencies {
    scraper: IWebsiteScraperClient;
    llmClient: ILlmClient;
    composer?: PromptComposer;
}

export interface BrochureOptions {
    /** Defaults to a name derived from the domain */
    companyName?: string;
    humorous?: boolean;
}

export interface RunAllOptions {
    /** Checked before each kind starts */
    signal?: AbortSignal;
    /** Called after each kind finishes; a rejection aborts the run */
    onResult?: (kind: CompleteAnalysisKind, artifact: AnalysisArtifact) => Promise<void> | void;
}

/**
 * Raised when a complete analysis is cancelled between kinds.
 */
export class AnalysisCancelledError extends Error {
    constructor() {
        super('Job cancelled');
        this.name = 'AnalysisCancelledError';
    }
}

type KindRunner = (url: string) => Promise<AnalysisArtifact>;

/**
 * Orchestrates scraping, prompt composition and generation for every analysis kind.
 */
export class AnalysisService {
    private readonly scraper: IWebsiteScraperClient;
    private readonly llmClient: ILlmClient;
    private readonly composer: PromptComposer;
    private readonly dispatch: Map<string, KindRunner>;

    constructor(deps: AnalysisServiceDependencies) {
        this.scraper = deps.scraper;
        this.llmClient = deps.llmClient;
        this.composer = deps.composer ?? new PromptComposer();

        this.dispatch = new Map<string, KindRunner>([
            ['seo', (url) => this.analyzeSeo(url)],
            ['audit', (url) => this.auditWebsite(url)],
            ['content', (url) => this.generateContentIdeas(url)],
            ['social', (url) => this.generateSocialStrategy(url)],
            ['leads', (url) => this.extractContactInfo(url)],
            ['contact', (url) => this.extractContactInfo(url)],
            ['email', (url) => this.generateEmailCampaign(url)],
            ['brochure', (url) => this.createBrochure(url)],
        ]);
    }

    /**
     * Names accepted by runKind.
     */
    availableKinds(): string[] {
        return Array.from(this.dispatch.keys());
    }

    async analyzeSeo(url: string): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        if (!isSnapshotValid(site)) {
            console.warn(`[Analysis] ${site.domain} not readable, returning fallback SEO report`);
            return createFallbackReport('seo', url, site.domain);
        }
        return this.generate(this.composer.seo(site));
    }

    async analyzeCompetitors(mainUrl: string, competitorUrls: readonly string[]): Promise<AnalysisArtifact> {
        const main = await this.scraper.scrape(mainUrl);
        const competitors: SiteSnapshot[] = [];
        for (const competitorUrl of competitorUrls) {
            competitors.push(await this.scraper.scrape(competitorUrl));
        }
        return this.generate(this.composer.competitors(main, competitors));
    }

    async generateContentIdeas(url: string, contentType?: string): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        return this.generate(this.composer.content(site, contentType));
    }

    async extractContactInfo(url: string): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        return this.generate(this.composer.leads(site));
    }

    async auditWebsite(url: string): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        if (!isSnapshotValid(site)) {
            console.warn(`[Analysis] ${site.domain} not readable, returning fallback audit report`);
            return createFallbackReport('audit', url, site.domain);
        }
        return this.generate(this.composer.audit(site));
    }

    async generateSocialStrategy(url: string, platforms?: readonly string[]): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        return this.generate(this.composer.social(site, platforms));
    }

    async generateEmailCampaign(url: string, campaignType?: string): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        return this.generate(this.composer.email(site, campaignType));
    }

    async createBrochure(url: string, options: BrochureOptions = {}): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        const companyName = options.companyName?.trim() || companyNameFromDomain(site.domain);
        return this.generate(this.composer.brochure(site, companyName, options.humorous ?? false));
    }

    /**
     * Asks the provider which of the page's links belong in a brochure.
     */
    async selectBrochureLinks(url: string): Promise<AnalysisArtifact> {
        const site = await this.scraper.scrape(url);
        if (!isSnapshotValid(site)) {
            return { error: `Could not access website: ${site.fetchError ?? 'not enough readable content'}` };
        }
        return this.generate(this.composer.links(site));
    }

    /**
     * Runs one analysis by name. Unknown names are reported as a failed outcome.
     */
    async runKind(name: string, url: string): Promise<KindOutcome> {
        const run = this.dispatch.get(name);
        if (!run) {
            return {
                ok: false,
                error: `Invalid analysis type: ${name}. Available: ${this.availableKinds().join(', ')}`,
            };
        }
        return { ok: true, kind: name, artifact: await run(url) };
    }

    /**
     * Runs every kind in fixed order. A kind that throws is recorded as an
     * error string and the run continues; pacing comes from the gateway's rate limiter.
     */
    async runAll(url: string, options: RunAllOptions = {}): Promise<Record<string, AnalysisArtifact>> {
        const results: Record<string, AnalysisArtifact> = {};

        for (const kind of COMPLETE_ANALYSIS_ORDER) {
            if (options.signal?.aborted) {
                throw new AnalysisCancelledError();
            }

            console.log(`[Analysis] Running ${kind.toUpperCase()} analysis for ${url}`);
            let artifact: AnalysisArtifact;
            try {
                const outcome = await this.runKind(kind, url);
                artifact = outcome.ok ? outcome.artifact : outcome.error;
                console.log(`[Analysis] ${kind.toUpperCase()} analysis completed`);
            } catch (error) {
                artifact = `Error in ${kind} analysis: ${error instanceof Error ? error.message : String(error)}`;
                console.error(`[Analysis] ${artifact}`);
            }

            results[kind] = artifact;
            if (options.onResult) {
                await options.onResult(kind, artifact);
            }
        }

        return results;
    }

    private async generate(prompt: ComposedPrompt): Promise<AnalysisArtifact> {
        return toArtifact(await this.llmClient.generate(prompt));
    }
}
