import axios from 'axios';
import { JSON_PARSE_ERROR, JsonValue } from '../../domain/entities/Analysis';

/**
 * Thrown when a structured response is not valid JSON.
 */
export class JsonParseError extends Error {
    constructor(public readonly rawResponse: string) {
        super(JSON_PARSE_ERROR);
        this.name = 'JsonParseError';
    }
}

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * Thin client for OpenAI-compatible chat completion endpoints.
 */
export class GptService {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly timeout: number;

    constructor(
        apiKey: string,
        model: string = 'gpt-4o-mini',
        baseUrl: string = 'https://api.openai.com/v1',
        timeout: number = 60000
    ) {
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.timeout = timeout;
    }

    /**
     * Executes a single chat completion request. No retries: a failure surfaces immediately.
     */
    async chatCompletion(
        prompt: string,
        systemPrompt: string,
        options: { jsonMode?: boolean; temperature?: number } = {}
    ): Promise<string> {
        const { jsonMode = false, temperature = 0.7 } = options;

        if (!this.apiKey) {
            throw new Error('OpenAI API key is not configured');
        }

        try {
            const response = await axios.post<ChatCompletionResponse>(
                `${this.baseUrl}/chat/completions`,
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: systemPrompt },
                        { role: 'user', content: prompt },
                    ],
                    temperature,
                    ...(jsonMode && { response_format: { type: 'json_object' } }),
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    timeout: this.timeout,
                }
            );

            const content = response.data.choices?.[0]?.message?.content;
            if (typeof content !== 'string') {
                throw new Error('OpenAI response contained no message content');
            }
            return content;
        } catch (error) {
            if (axios.isAxiosError<{ error?: { message?: string } }>(error)) {
                const message = error.response?.data?.error?.message || error.message;
                throw new Error(`OpenAI call failed: ${message}`);
            }
            throw error;
        }
    }

    /**
     * Parses a JSON response from the LLM, handling potential markdown code blocks.
     */
    parseJSON(response: string): JsonValue {
        const jsonStr = response.replace(/```json\n?|\n?```/g, '').trim();
        try {
            const parsed: JsonValue = JSON.parse(jsonStr);
            return parsed;
        } catch {
            throw new JsonParseError(response);
        }
    }
}
