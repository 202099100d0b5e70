import { v4 as uuidv4 } from "uuid";
import type { PageConfig } from "../scraper/PageConfig";
import { logger } from "../utils/logger";
import { PagePipeline } from "./PagePipeline";
import { CancellationError, PipelineStateError } from "./errors";
import type { PipelineJob, PipelineManagerCallbacks } from "./types";
import { PipelineJobStatus } from "./types";

/**
 * Runs one page pipeline per submitted URL, concurrently, and tracks progress.
 * A failing page never affects the others.
 */
export class PipelineManager {
  private jobMap: Map<string, PipelineJob> = new Map();
  private jobQueue: string[] = [];
  private activeWorkers: Set<string> = new Set();
  private isRunning = false;
  private concurrency: number;
  private callbacks: PipelineManagerCallbacks = {};
  private pipeline: PagePipeline;

  /**
   * @param concurrency - Pages processed at the same time; unbounded by default
   */
  constructor(
    pipeline: PagePipeline = new PagePipeline(),
    concurrency: number = Number.POSITIVE_INFINITY,
  ) {
    this.pipeline = pipeline;
    this.concurrency = concurrency;
  }

  /**
   * Registers callback handlers for pipeline manager events.
   */
  setCallbacks(callbacks: PipelineManagerCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Starts processing queued jobs.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn("PipelineManager is already running.");
      return;
    }
    this.isRunning = true;
    logger.debug(`PipelineManager started with concurrency ${this.concurrency}.`);
    this._processQueue();
  }

  /**
   * Stops starting new jobs. Running jobs continue until they finish or are cancelled.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      logger.warn("PipelineManager is not running.");
      return;
    }
    this.isRunning = false;
    logger.debug("PipelineManager stopping. No new jobs will be started.");
  }

  /**
   * Enqueues a page URL for scraping. `url` defaults to the page's configured URL.
   */
  async enqueueJob(page: PageConfig, url: string = page.url): Promise<string> {
    const jobId = uuidv4();
    let resolveCompletion: (job: PipelineJob) => void = () => {};
    const completion = new Promise<PipelineJob>((resolve) => {
      resolveCompletion = resolve;
    });

    const job: PipelineJob = {
      id: jobId,
      page,
      url,
      status: PipelineJobStatus.QUEUED,
      stage: null,
      result: null,
      error: null,
      createdAt: new Date(),
      startedAt: null,
      finishedAt: null,
      abortController: new AbortController(),
      completion,
      resolveCompletion,
    };

    this.jobMap.set(jobId, job);
    this.jobQueue.push(jobId);
    logger.info(`📝 Job enqueued: ${jobId} for ${url}`);

    await this.callbacks.onJobStatusChange?.(job);

    if (this.isRunning) {
      this._processQueue();
    }

    return jobId;
  }

  async getJob(jobId: string): Promise<PipelineJob | undefined> {
    return this.jobMap.get(jobId);
  }

  /**
   * Retrieves all jobs, optionally only those with the given status.
   */
  async getJobs(status?: PipelineJobStatus): Promise<PipelineJob[]> {
    const allJobs = Array.from(this.jobMap.values());
    if (status) {
      return allJobs.filter((job) => job.status === status);
    }
    return allJobs;
  }

  /**
   * Waits for a job to finish.
   * @throws the job's error if it failed or was cancelled
   */
  async waitForJobCompletion(jobId: string): Promise<PipelineJob> {
    const job = this.jobMap.get(jobId);
    if (!job) {
      throw new PipelineStateError(`Job not found: ${jobId}`);
    }
    await job.completion;
    if (job.error) {
      throw job.error;
    }
    return job;
  }

  /**
   * Waits until every job enqueued so far has finished, whatever the outcome.
   */
  async waitForAll(): Promise<PipelineJob[]> {
    return Promise.all(Array.from(this.jobMap.values(), (job) => job.completion));
  }

  /**
   * Cancels a queued job, or aborts the requests of a running one.
   */
  async cancelJob(jobId: string): Promise<void> {
    const job = this.jobMap.get(jobId);
    if (!job) {
      logger.warn(`Attempted to cancel non-existent job: ${jobId}`);
      return;
    }

    switch (job.status) {
      case PipelineJobStatus.QUEUED:
        this.jobQueue = this.jobQueue.filter((id) => id !== jobId);
        await this._finish(
          job,
          PipelineJobStatus.CANCELLED,
          new CancellationError("Job cancelled before starting"),
        );
        logger.info(`🚫 Job cancelled (was queued): ${jobId}`);
        break;

      case PipelineJobStatus.RUNNING:
        // _runJob marks the job cancelled once the pipeline gives up
        job.abortController.abort();
        logger.info(`🚫 Signalling cancellation for running job: ${jobId}`);
        break;

      default:
        logger.warn(`Job ${jobId} cannot be cancelled in its current state: ${job.status}`);
        break;
    }
  }

  // --- Private Methods ---

  /**
   * Starts queued jobs while capacity allows.
   */
  private _processQueue(): void {
    if (!this.isRunning) return;

    while (this.activeWorkers.size < this.concurrency && this.jobQueue.length > 0) {
      const jobId = this.jobQueue.shift();
      if (!jobId) continue;

      const job = this.jobMap.get(jobId);
      if (!job || job.status !== PipelineJobStatus.QUEUED) {
        logger.warn(`Skipping job ${jobId} in queue (not found or not queued).`);
        continue;
      }

      this.activeWorkers.add(jobId);
      this._runJob(job).catch((error) => {
        // _runJob settles the job itself; this only guards its bookkeeping.
        logger.error(`Unhandled error during job ${jobId} execution: ${error}`);
      });
    }
  }

  private async _runJob(job: PipelineJob): Promise<void> {
    const { id: jobId, abortController } = job;
    const signal = abortController.signal;

    try {
      job.status = PipelineJobStatus.RUNNING;
      job.startedAt = new Date();
      logger.info(`🚀 Starting job: ${jobId}`);
      await this.callbacks.onJobStatusChange?.(job);

      const result = await this.pipeline.runPage(
        job.page,
        job.url,
        { signal },
        {
          onStateChange: async (change) => {
            job.stage = change.state;
            await this.callbacks.onJobStageChange?.(job, change);
          },
        },
      );

      if (signal.aborted) {
        throw new CancellationError("Job cancelled just before completion");
      }

      job.result = result;
      await this._finish(job, PipelineJobStatus.COMPLETED);
      logger.info(`✅ Job completed: ${jobId} → ${result.path}`);
    } catch (error) {
      if (error instanceof CancellationError || signal.aborted) {
        await this._finish(
          job,
          PipelineJobStatus.CANCELLED,
          error instanceof CancellationError
            ? error
            : new CancellationError("Job cancelled by signal"),
        );
        logger.info(`🚫 Job execution cancelled: ${jobId}`);
      } else {
        const reason = error instanceof Error ? error : new Error(String(error));
        await this._finish(job, PipelineJobStatus.FAILED, reason);
        logger.error(`❌ Job failed: ${jobId}: ${reason.message}`);
      }
    } finally {
      this.activeWorkers.delete(jobId);
      this._processQueue();
    }
  }

  private async _finish(
    job: PipelineJob,
    status: PipelineJobStatus,
    error: Error | null = null,
  ): Promise<void> {
    job.status = status;
    job.error = error;
    job.finishedAt = new Date();
    try {
      await this.callbacks.onJobStatusChange?.(job);
    } finally {
      job.resolveCompletion(job);
    }
  }
}
