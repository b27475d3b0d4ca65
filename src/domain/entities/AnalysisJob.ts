import { AnalysisArtifact } from './Analysis';

/**
 * Possible statuses for an AnalysisJob.
 */
export type AnalysisJobStatus = 'running' | 'completed' | 'failed';

/**
 * Input parameters for creating a new analysis job.
 */
export interface AnalysisJobInput {
    /** Normalized URL of the site to analyze */
    url: string;
    /** "all" or the name of a single analysis kind */
    analysisType: string;
}

/**
 * AnalysisJob tracks a background analysis run.
 * Timestamps are ISO-8601 strings so jobs survive JSON-backed stores unchanged.
 */
export interface AnalysisJob {
    id: string;
    status: AnalysisJobStatus;
    /** 0 while running, 100 once finished */
    progress: number;
    url: string;
    analysisType: string;
    /** Artifacts keyed by analysis kind; filled in as kinds finish */
    results: Record<string, AnalysisArtifact>;
    startedAt: string;
    completedAt?: string;
    /** Error message if the job failed */
    error?: string;
}

/**
 * Creates a new AnalysisJob in the running state.
 */
export function createAnalysisJob(id: string, input: AnalysisJobInput): AnalysisJob {
    if (!id.trim()) {
        throw new Error('AnalysisJob id cannot be empty');
    }
    if (!input.url.trim()) {
        throw new Error('AnalysisJob requires a url');
    }

    return {
        id: id.trim(),
        status: 'running',
        progress: 0,
        url: input.url,
        analysisType: input.analysisType,
        results: {},
        startedAt: new Date().toISOString(),
    };
}

/**
 * Returns a copy of the job with one more result recorded.
 */
export function withResult(job: AnalysisJob, kind: string, artifact: AnalysisArtifact): AnalysisJob {
    return {
        ...job,
        results: { ...job.results, [kind]: artifact },
    };
}

/**
 * Marks a job as completed, returning a new object.
 */
export function completeJob(job: AnalysisJob): AnalysisJob {
    return {
        ...job,
        status: 'completed',
        progress: 100,
        completedAt: new Date().toISOString(),
    };
}

/**
 * Marks a job as failed, returning a new object.
 * Results recorded before the failure are kept.
 */
export function failJob(job: AnalysisJob, error: string): AnalysisJob {
    return {
        ...job,
        status: 'failed',
        error,
        completedAt: new Date().toISOString(),
    };
}
