import nock from 'nock';
import { GptLlmClient } from '../../../src/infrastructure/llm/GptLlmClient';
import { RateLimiter } from '../../../src/infrastructure/llm/RateLimiter';
import { ComposedPrompt } from '../../../src/domain/entities/Analysis';
import { silenceConsole } from '../../fixtures/fakes';

const BASE_URL = 'https://api.openai.test/v1';

function completion(content: string) {
    return { choices: [{ message: { role: 'assistant', content } }] };
}

const textPrompt: ComposedPrompt = { systemPrompt: 'You are an SEO expert.', userPrompt: 'Analyze this', structured: false };
const jsonPrompt: ComposedPrompt = { systemPrompt: 'Respond in JSON.', userPrompt: 'Extract contacts', structured: true };

describe('GptLlmClient', () => {
    let client: GptLlmClient;
    const apiKey = 'test-secret';

    silenceConsole();

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(() => {
        client = new GptLlmClient(apiKey, 'gpt-4o-mini', BASE_URL);
        nock.cleanAll();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    it('should return text for free-text prompts', async () => {
        let capturedBody: { model?: string; messages?: unknown; response_format?: unknown } = {};
        nock('https://api.openai.test')
            .matchHeader('authorization', 'Bearer test-secret')
            .post('/v1/chat/completions', (body) => {
                capturedBody = body;
                return true;
            })
            .reply(200, completion('# SEO Report'));

        const result = await client.generate(textPrompt);

        expect(result).toEqual({ ok: true, format: 'text', text: '# SEO Report' });
        expect(capturedBody.model).toBe('gpt-4o-mini');
        expect(capturedBody.messages).toEqual([
            { role: 'system', content: 'You are an SEO expert.' },
            { role: 'user', content: 'Analyze this' },
        ]);
        expect(capturedBody.response_format).toBeUndefined();
    });

    it('should request JSON mode and parse fenced JSON for structured prompts', async () => {
        let capturedFormat: unknown;
        nock('https://api.openai.test')
            .post('/v1/chat/completions', (body) => {
                capturedFormat = body.response_format;
                return true;
            })
            .reply(200, completion('```json\n{"emails":["info@acme.example"]}\n```'));

        const result = await client.generate(jsonPrompt);

        expect(capturedFormat).toEqual({ type: 'json_object' });
        expect(result).toEqual({ ok: true, format: 'json', data: { emails: ['info@acme.example'] } });
    });

    it('should report unparseable structured output with the raw response', async () => {
        nock('https://api.openai.test')
            .post('/v1/chat/completions')
            .reply(200, completion('Sorry, no JSON today'));

        const result = await client.generate(jsonPrompt);

        expect(result).toEqual({
            ok: false,
            reason: 'parse',
            error: 'Failed to parse AI response as JSON',
            rawResponse: 'Sorry, no JSON today',
        });
    });

    it('should report provider errors instead of throwing', async () => {
        nock('https://api.openai.test')
            .post('/v1/chat/completions')
            .reply(429, { error: { message: 'Rate limit reached' } });

        const result = await client.generate(textPrompt);

        expect(result).toEqual({ ok: false, reason: 'provider', error: 'OpenAI call failed: Rate limit reached' });
    });

    it('should report a missing message as a provider error', async () => {
        nock('https://api.openai.test')
            .post('/v1/chat/completions')
            .reply(200, { choices: [] });

        const result = await client.generate(textPrompt);

        expect(result).toEqual({
            ok: false,
            reason: 'provider',
            error: 'OpenAI response contained no message content',
        });
    });

    it('should fail without calling the provider when no key is configured', async () => {
        const unconfigured = new GptLlmClient('', 'gpt-4o-mini', BASE_URL);

        const result = await unconfigured.generate(textPrompt);

        expect(result).toEqual({ ok: false, reason: 'provider', error: 'OpenAI API key is not configured' });
    });

    it('should route every call through the rate limiter', async () => {
        const rateLimiter = new RateLimiter({ maxRequests: 1, intervalMs: 0 });
        const schedule = jest.spyOn(rateLimiter, 'schedule');
        const limited = new GptLlmClient(apiKey, 'gpt-4o-mini', BASE_URL, { rateLimiter });

        nock('https://api.openai.test')
            .post('/v1/chat/completions')
            .times(2)
            .reply(200, completion('ok'));

        await limited.generate(textPrompt);
        await limited.generate(textPrompt);

        expect(schedule).toHaveBeenCalledTimes(2);
    });
});
