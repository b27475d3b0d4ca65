import request from 'supertest';
import { Application } from 'express';
import { createApp, createDependencies } from '../../../src/presentation/app';
import { IWebsiteScraperClient } from '../../../src/domain/ports/IWebsiteScraperClient';
import { ILlmClient } from '../../../src/domain/ports/ILlmClient';
import { fakeLlm, fakeScraper, silenceConsole, testConfig, validSite } from '../../fixtures/fakes';

describe('Analysis routes', () => {
    let app: Application;
    let scraper: jest.Mocked<IWebsiteScraperClient>;
    let llm: jest.Mocked<ILlmClient>;

    silenceConsole();

    beforeEach(() => {
        scraper = fakeScraper();
        scraper.scrape.mockImplementation(async (url: string) => validSite(url));
        llm = fakeLlm('report');

        const config = testConfig();
        app = createApp(config, createDependencies(config, { scraper, llmClient: llm }));
    });

    describe('POST /analyze/seo', () => {
        it('should normalize the url and wrap the result in the envelope', async () => {
            const res = await request(app).post('/analyze/seo').send({ url: 'example.com' });

            expect(res.status).toBe(200);
            expect(res.body.success).toBe(true);
            expect(res.body.message).toBe('SEO analysis completed successfully');
            expect(res.body.data).toEqual({ analysis: 'report', type: 'seo', url: 'https://example.com' });
            expect(typeof res.body.timestamp).toBe('string');
            expect(scraper.scrape).toHaveBeenCalledWith('https://example.com');
        });

        it('should serve the second request for the same normalized url from the cache', async () => {
            const first = await request(app).post('/analyze/seo').send({ url: 'example.com' });
            const second = await request(app).post('/analyze/seo').send({ url: 'https://example.com' });

            expect(second.status).toBe(200);
            expect(second.body.message).toBe('SEO analysis retrieved from cache');
            expect(second.body.data).toEqual(first.body.data);
            expect(llm.generate).toHaveBeenCalledTimes(1);
            expect(scraper.scrape).toHaveBeenCalledTimes(1);
        });

        it('should not reuse the seo entry for an audit', async () => {
            await request(app).post('/analyze/seo').send({ url: 'example.com' });
            const res = await request(app).post('/analyze/audit').send({ url: 'example.com' });

            expect(res.body.message).toBe('Website audit completed successfully');
            expect(res.body.data.type).toBe('audit');
            expect(llm.generate).toHaveBeenCalledTimes(2);
        });

        it('should reject a missing url with 400', async () => {
            const res = await request(app).post('/analyze/seo').send({});

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ detail: 'url is required and must be a string' });
        });

        it('should reject malformed JSON with 400', async () => {
            const res = await request(app)
                .post('/analyze/seo')
                .set('Content-Type', 'application/json')
                .send('{"url":');

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ detail: 'Malformed JSON request body' });
        });
    });

    describe('POST /analyze/contact', () => {
        it('should extract fresh contact data on every request', async () => {
            llm.generate
                .mockResolvedValueOnce({ ok: true, format: 'json', data: { emails: ['old@example.com'] } })
                .mockResolvedValueOnce({ ok: true, format: 'json', data: { emails: ['new@example.com'] } });

            const first = await request(app).post('/analyze/contact').send({ url: 'example.com' });
            const second = await request(app).post('/analyze/contact').send({ url: 'example.com' });

            expect(first.body.data).toEqual({
                analysis: { emails: ['old@example.com'] },
                type: 'contact',
                url: 'https://example.com',
            });
            expect(second.body.data.analysis).toEqual({ emails: ['new@example.com'] });
            expect(second.body.message).toBe('Contact information extracted successfully');
            expect(llm.generate).toHaveBeenCalledTimes(2);
        });
    });

    describe('POST /analyze/audit', () => {
        it('should run the audit again for a repeated url', async () => {
            llm.generate
                .mockResolvedValueOnce({ ok: true, format: 'text', text: 'first audit' })
                .mockResolvedValueOnce({ ok: true, format: 'text', text: 'second audit' });

            await request(app).post('/analyze/audit').send({ url: 'example.com' });
            const second = await request(app).post('/analyze/audit').send({ url: 'example.com' });

            expect(second.body.data).toEqual({ analysis: 'second audit', type: 'audit', url: 'https://example.com' });
            expect(second.body.message).toBe('Website audit completed successfully');
            expect(llm.generate).toHaveBeenCalledTimes(2);
        });
    });

    describe('POST /analyze/competitors', () => {
        it('should normalize every url', async () => {
            const res = await request(app)
                .post('/analyze/competitors')
                .send({ main_url: 'acme.example', competitor_urls: ['rival.example', 'http://other.example'] });

            expect(res.status).toBe(200);
            expect(res.body.data).toEqual({
                analysis: 'report',
                type: 'competitors',
                main_url: 'https://acme.example',
                competitor_urls: ['https://rival.example', 'http://other.example'],
            });
            expect(res.body.message).toBe('Competitor analysis completed successfully');
        });

        it('should require a competitor list', async () => {
            const res = await request(app).post('/analyze/competitors').send({ main_url: 'acme.example' });

            expect(res.status).toBe(400);
            expect(res.body.detail).toBe('competitor_urls is required and must be an array of strings');
        });
    });

    describe('POST /analyze/content', () => {
        it('should default the content type', async () => {
            const res = await request(app).post('/analyze/content').send({ url: 'acme.example' });

            expect(res.body.data).toEqual({
                analysis: 'report',
                type: 'content',
                content_type: 'blog',
                url: 'https://acme.example',
            });
            expect(res.body.message).toBe('Content ideas generated successfully');
        });

        it('should turn analysis exceptions into 500 with the kind prefix', async () => {
            scraper.scrape.mockRejectedValue(new Error('boom'));

            const res = await request(app).post('/analyze/content').send({ url: 'acme.example' });

            expect(res.status).toBe(500);
            expect(res.body).toEqual({ detail: 'Content generation failed: boom' });
        });
    });

    describe('POST /analyze/social', () => {
        it('should default the platforms', async () => {
            const res = await request(app).post('/analyze/social').send({ url: 'acme.example' });

            expect(res.body.data.platforms).toEqual(['LinkedIn', 'Twitter', 'Instagram']);
            expect(res.body.message).toBe('Social media strategy generated successfully');
        });

        it('should reject platforms that are not strings', async () => {
            const res = await request(app).post('/analyze/social').send({ url: 'acme.example', platforms: [1] });

            expect(res.status).toBe(400);
            expect(res.body.detail).toBe('platforms must be an array of strings');
        });
    });

    describe('POST /analyze/email', () => {
        it('should pass the campaign type through', async () => {
            const res = await request(app)
                .post('/analyze/email')
                .send({ url: 'acme.example', campaign_type: 're_engagement' });

            expect(res.body.data.campaign_type).toBe('re_engagement');
            expect(llm.generate.mock.calls[0][0].userPrompt.split('\n')[0])
                .toBe('Create a re_engagement email campaign for:');
        });
    });

    describe('POST /analyze/brochure', () => {
        it('should derive the company name from the domain when none is given', async () => {
            const res = await request(app).post('/analyze/brochure').send({ url: 'www.acme-tools.com' });

            expect(res.body.data).toEqual({
                analysis: 'report',
                type: 'brochure',
                company_name: 'Acme-Tools',
                humorous: false,
                url: 'https://www.acme-tools.com',
            });
            expect(res.body.message).toBe('Company brochure created successfully');
        });

        it('should reject a non-boolean humorous flag', async () => {
            const res = await request(app).post('/analyze/brochure').send({ url: 'acme.example', humorous: 'yes' });

            expect(res.status).toBe(400);
            expect(res.body.detail).toBe('humorous must be a boolean');
        });
    });

    describe('POST /analyze/links', () => {
        it('should return the structured link selection', async () => {
            llm.generate.mockResolvedValue({
                ok: true,
                format: 'json',
                data: { links: [{ type: 'careers page', url: 'https://acme.example/jobs' }] },
            });

            const res = await request(app).post('/analyze/links').send({ url: 'acme.example' });

            expect(res.body.data).toEqual({
                analysis: { links: [{ type: 'careers page', url: 'https://acme.example/jobs' }] },
                type: 'links',
                url: 'https://acme.example',
            });
        });
    });
});
