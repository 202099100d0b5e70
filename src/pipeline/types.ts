import type { CollectorProgress } from "../collector/types";
import type { PageConfig } from "../scraper/PageConfig";
import type { FetchOptions } from "../scraper/fetcher/types";
import type { PersistedArchive, ProgressCallback } from "../types";

/**
 * Stages of one page's pipeline, in the only order they can occur.
 * `FAILED` can follow any stage before `DONE`.
 */
export enum PageState {
  FETCHING = "fetching",
  COLLECTING = "collecting",
  ARCHIVING = "archiving",
  PERSISTING = "persisting",
  DONE = "done",
  FAILED = "failed",
}

export interface PageStateChange {
  state: PageState;
  /** Page URL, when the pipeline started from a page */
  url?: string;
  /** Known once the page has been scraped */
  title?: string;
  /** Set on the transition to `FAILED` */
  error?: Error;
}

export interface PagePipelineCallbacks {
  /** Called on every state transition, in order. */
  onStateChange?: (change: PageStateChange) => void | Promise<void>;
  /** Called after each image arrives. */
  onImageProgress?: ProgressCallback<CollectorProgress>;
}

export interface PagePipelineOptions {
  /** Cap on concurrent image downloads; unbounded when omitted */
  maxConcurrency?: number;
  /** Request options for the page and every image */
  fetchOptions?: Omit<FetchOptions, "signal">;
  /** Aborts outstanding requests */
  signal?: AbortSignal;
}

/**
 * Represents the possible states of a page job.
 */
export enum PipelineJobStatus {
  QUEUED = "queued",
  RUNNING = "running",
  COMPLETED = "completed",
  FAILED = "failed",
  CANCELLED = "cancelled",
}

/**
 * One submitted page URL and everything known about its processing.
 */
export interface PipelineJob {
  /** Unique identifier for the job. */
  id: string;
  /** Selectors used for the page. */
  page: PageConfig;
  /** The URL being scraped. */
  url: string;
  status: PipelineJobStatus;
  /** Latest pipeline stage reached. */
  stage: PageState | null;
  /** Archive written by a completed job. */
  result: PersistedArchive | null;
  /** Error object if the job failed or was cancelled. */
  error: Error | null;
  createdAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
  /** AbortController to signal cancellation. */
  abortController: AbortController;
  /** Resolves with the job once it completes, fails or is cancelled. Never rejects. */
  completion: Promise<PipelineJob>;
  /** Resolver function for the completion promise. */
  resolveCompletion: (job: PipelineJob) => void;
}

/**
 * Allows external components to hook into job lifecycle events.
 */
export interface PipelineManagerCallbacks {
  /** Callback triggered when a job's status changes. */
  onJobStatusChange?: (job: PipelineJob) => void | Promise<void>;
  /** Callback triggered when a running job moves to another pipeline stage. */
  onJobStageChange?: (job: PipelineJob, change: PageStateChange) => void | Promise<void>;
}
