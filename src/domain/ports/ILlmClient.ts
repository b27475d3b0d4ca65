import { ComposedPrompt, GenerationResult } from '../entities/Analysis';

/**
 * Port for the external text-generation provider.
 */
export interface ILlmClient {
    /**
     * Sends a composed prompt to the provider.
     * Implementations resolve with a failure result instead of rejecting.
     */
    generate(prompt: ComposedPrompt): Promise<GenerationResult>;
}
