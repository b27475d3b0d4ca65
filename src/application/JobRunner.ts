import { AnalysisJob } from '../domain/entities/AnalysisJob';
import { AnalysisService, AnalysisCancelledError } from './AnalysisService';
import { JobManager } from './JobManager';

interface RunningTask {
    controller: AbortController;
    done: Promise<AnalysisJob | null>;
}

/**
 * Runs analysis jobs in the background and keeps a handle on each one,
 * so callers can await or cancel them instead of firing and forgetting.
 */
export class JobRunner {
    private readonly tasks = new Map<string, RunningTask>();

    constructor(
        private readonly jobManager: JobManager,
        private readonly analysisService: AnalysisService
    ) {}

    /**
     * Starts processing a job that was already created. Returns immediately.
     */
    start(job: AnalysisJob): void {
        const controller = new AbortController();
        const done = this.process(job, controller.signal).finally(() => {
            this.tasks.delete(job.id);
        });
        this.tasks.set(job.id, { controller, done });
    }

    /**
     * Resolves with the final job state, or undefined if the job is not running here.
     */
    waitFor(jobId: string): Promise<AnalysisJob | null> | undefined {
        return this.tasks.get(jobId)?.done;
    }

    /**
     * Requests cancellation. A complete analysis stops before its next kind.
     */
    cancel(jobId: string): boolean {
        const task = this.tasks.get(jobId);
        if (!task) {
            return false;
        }
        task.controller.abort();
        return true;
    }

    cancelAll(): number {
        for (const task of this.tasks.values()) {
            task.controller.abort();
        }
        return this.tasks.size;
    }

    activeCount(): number {
        return this.tasks.size;
    }

    private async process(job: AnalysisJob, signal: AbortSignal): Promise<AnalysisJob | null> {
        console.log(`[Jobs] ${job.id} started (${job.analysisType}) for ${job.url}`);

        try {
            if (job.analysisType === 'all') {
                await this.analysisService.runAll(job.url, {
                    signal,
                    onResult: async (kind, artifact) => {
                        await this.jobManager.recordResult(job.id, kind, artifact);
                    },
                });
            } else {
                const outcome = await this.analysisService.runKind(job.analysisType, job.url);
                if (!outcome.ok) {
                    throw new Error(outcome.error);
                }
                if (signal.aborted) {
                    throw new AnalysisCancelledError();
                }
                await this.jobManager.recordResult(job.id, outcome.kind, outcome.artifact);
            }

            const completed = await this.jobManager.completeJob(job.id);
            console.log(`[Jobs] ${job.id} completed`);
            return completed;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Jobs] ${job.id} failed: ${message}`);
            try {
                return await this.jobManager.failJob(job.id, message);
            } catch (bookkeepingError) {
                console.error(`[Jobs] Could not record failure of ${job.id}:`, bookkeepingError);
                return null;
            }
        }
    }
}
