import { ILlmClient } from '../../domain/ports/ILlmClient';
import { ComposedPrompt, GenerationResult } from '../../domain/entities/Analysis';
import { GptService, JsonParseError } from './GptService';
import { RateLimiter } from './RateLimiter';

/**
 * GPT-based gateway for analysis prompts.
 * Every call goes through the shared rate limiter and resolves with a
 * GenerationResult; provider and parse failures never reject.
 */
export class GptLlmClient implements ILlmClient {
    private readonly llmService: GptService;
    private readonly rateLimiter: RateLimiter;

    constructor(
        apiKey: string,
        model: string = 'gpt-4o-mini',
        baseUrl: string = 'https://api.openai.com/v1',
        options: { timeout?: number; rateLimiter?: RateLimiter } = {}
    ) {
        this.llmService = new GptService(apiKey, model, baseUrl, options.timeout);
        this.rateLimiter = options.rateLimiter ?? new RateLimiter({ maxRequests: 1, intervalMs: 0 });
    }

    async generate(prompt: ComposedPrompt): Promise<GenerationResult> {
        try {
            return await this.rateLimiter.schedule(() => this.execute(prompt));
        } catch (error) {
            if (error instanceof JsonParseError) {
                console.error(`[LLM] JSON parsing error: ${error.rawResponse.substring(0, 200)}`);
                return { ok: false, reason: 'parse', error: error.message, rawResponse: error.rawResponse };
            }
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[LLM] AI API error: ${message}`);
            return { ok: false, reason: 'provider', error: message };
        }
    }

    private async execute(prompt: ComposedPrompt): Promise<GenerationResult> {
        const response = await this.llmService.chatCompletion(prompt.userPrompt, prompt.systemPrompt, {
            jsonMode: prompt.structured,
        });

        if (prompt.structured) {
            return { ok: true, format: 'json', data: this.llmService.parseJSON(response) };
        }
        return { ok: true, format: 'text', text: response };
    }
}
