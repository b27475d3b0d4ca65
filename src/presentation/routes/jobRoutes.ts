import { Router, Request, Response } from 'express';
import { JobManager } from '../../application/JobManager';
import { JobRunner } from '../../application/JobRunner';
import { AnalysisCache } from '../../application/AnalysisCache';
import { AnalysisJob } from '../../domain/entities/AnalysisJob';
import { asyncHandler, NotFoundError } from '../middleware/errorHandler';

/**
 * Wire representation of a job.
 */
export function serializeJob(job: AnalysisJob): Record<string, unknown> {
    const response: Record<string, unknown> = {
        job_id: job.id,
        status: job.status,
        progress: job.progress,
        url: job.url,
        analysis_type: job.analysisType,
        results: job.results,
        started_at: job.startedAt,
    };

    if (job.completedAt) {
        response.completed_at = job.completedAt;
    }
    // Add error for failed jobs
    if (job.status === 'failed' && job.error) {
        response.error = job.error;
    }

    return response;
}

/**
 * Creates job status routes with dependency injection.
 */
export function createJobRoutes(jobManager: JobManager, jobRunner: JobRunner, cache: AnalysisCache): Router {
    const router = Router();

    /**
     * GET /jobs/:jobId
     *
     * Returns the current status and results recorded so far.
     */
    router.get(
        '/jobs/:jobId',
        asyncHandler(async (req: Request, res: Response) => {
            const { jobId } = req.params;
            const job = await jobManager.getJob(jobId);

            if (!job) {
                throw new NotFoundError('Job not found');
            }

            res.json(serializeJob(job));
        })
    );

    /**
     * GET /jobs
     *
     * Lists job IDs (for debugging/monitoring).
     */
    router.get(
        '/jobs',
        asyncHandler(async (_req: Request, res: Response) => {
            const jobs = await jobManager.listJobIds();

            res.json({
                total_jobs: jobs.length,
                jobs,
                active_jobs: jobRunner.activeCount(),
                cache_size: await cache.size(),
            });
        })
    );

    return router;
}
