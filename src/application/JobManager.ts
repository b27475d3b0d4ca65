import { v4 as uuidv4 } from 'uuid';
import { ICachePort, CACHE_PREFIXES } from '../domain/ports/ICachePort';
import { AnalysisArtifact } from '../domain/entities/Analysis';
import {
    AnalysisJob,
    AnalysisJobInput,
    createAnalysisJob,
    withResult,
    completeJob,
    failJob,
} from '../domain/entities/AnalysisJob';

export interface JobManagerOptions {
    /** Seconds a job record is kept; 0 keeps it until the store drops it */
    ttlSeconds?: number;
    generateId?: () => string;
}

/**
 * Job manager backed by the shared key-value store.
 * With Redis behind it, jobs are visible to every process sharing the instance.
 */
export class JobManager {
    private readonly store: ICachePort;
    private readonly ttlSeconds: number;
    private readonly generateId: () => string;

    constructor(store: ICachePort, options: JobManagerOptions = {}) {
        this.store = store;
        this.ttlSeconds = options.ttlSeconds ?? 0;
        this.generateId = options.generateId ?? (() => `job_${uuidv4()}`);
    }

    /**
     * Creates a new running job.
     */
    async createJob(input: AnalysisJobInput): Promise<AnalysisJob> {
        const job = createAnalysisJob(this.generateId(), input);
        await this.save(job);
        return job;
    }

    /**
     * Gets a job by ID.
     */
    async getJob(id: string): Promise<AnalysisJob | null> {
        return this.store.get<AnalysisJob>(this.key(id));
    }

    /**
     * Records the artifact of one finished kind.
     */
    async recordResult(id: string, kind: string, artifact: AnalysisArtifact): Promise<AnalysisJob | null> {
        return this.update(id, (job) => withResult(job, kind, artifact));
    }

    async completeJob(id: string): Promise<AnalysisJob | null> {
        return this.update(id, completeJob);
    }

    /**
     * Marks a job as failed. Results recorded so far stay on the job.
     */
    async failJob(id: string, error: string): Promise<AnalysisJob | null> {
        return this.update(id, (job) => failJob(job, error));
    }

    /**
     * IDs of every job the store still holds.
     */
    async listJobIds(): Promise<string[]> {
        const keys = await this.store.keys(CACHE_PREFIXES.JOB);
        return keys.map((key) => key.substring(CACHE_PREFIXES.JOB.length));
    }

    private async update(id: string, change: (job: AnalysisJob) => AnalysisJob): Promise<AnalysisJob | null> {
        const job = await this.getJob(id);
        if (!job) {
            return null;
        }
        const updated = change(job);
        await this.save(updated);
        return updated;
    }

    private async save(job: AnalysisJob): Promise<void> {
        await this.store.set(this.key(job.id), job, this.ttlSeconds);
    }

    private key(id: string): string {
        return `${CACHE_PREFIXES.JOB}${id}`;
    }
}
