/**
 * JSON value as returned by the generation provider in structured mode.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Analysis categories produced by the service.
 */
export type AnalysisKind =
    | 'seo'
    | 'competitors'
    | 'content'
    | 'leads'
    | 'audit'
    | 'social'
    | 'email'
    | 'brochure'
    | 'links';

/**
 * Kinds run by a complete ("all") analysis, in execution order.
 */
export const COMPLETE_ANALYSIS_ORDER = [
    'seo',
    'audit',
    'content',
    'social',
    'leads',
    'email',
    'brochure',
] as const satisfies readonly AnalysisKind[];

export type CompleteAnalysisKind = (typeof COMPLETE_ANALYSIS_ORDER)[number];

/**
 * An analysis result as handed back to API clients:
 * markdown text, a structured payload, or an error description.
 */
export type AnalysisArtifact = JsonValue;

/**
 * A prompt ready to be sent to the generation provider.
 */
export interface ComposedPrompt {
    /** Fixed instruction describing the desired output */
    systemPrompt: string;
    /** Data prompt embedding (truncated) snapshot fields */
    userPrompt: string;
    /** Request JSON output instead of free text */
    structured: boolean;
}

/**
 * Outcome of a generation call. The gateway never throws; failures are values.
 */
export type GenerationResult =
    | { ok: true; format: 'text'; text: string }
    | { ok: true; format: 'json'; data: JsonValue }
    | { ok: false; reason: 'parse'; error: string; rawResponse: string }
    | { ok: false; reason: 'provider'; error: string };

export const JSON_PARSE_ERROR = 'Failed to parse AI response as JSON';

/**
 * Converts a generation result into the payload returned to clients.
 */
export function toArtifact(result: GenerationResult): AnalysisArtifact {
    if (result.ok) {
        return result.format === 'text' ? result.text : result.data;
    }
    if (result.reason === 'parse') {
        return { error: result.error, raw_response: result.rawResponse };
    }
    return `Error: Unable to complete analysis - ${result.error}`;
}

/**
 * Outcome of dispatching an analysis by name.
 */
export type KindOutcome =
    | { ok: true; kind: string; artifact: AnalysisArtifact }
    | { ok: false; error: string };
