import { Archiver } from "../archive/Archiver";
import { ImageCollector } from "../collector/ImageCollector";
import type { PageConfig } from "../scraper/PageConfig";
import { PageScraper } from "../scraper/PageScraper";
import { Persister } from "../store/Persister";
import type { PageResult, PersistedArchive } from "../types";
import { logger } from "../utils/logger";
import { CancellationError, PipelineStateError } from "./errors";
import {
  type PagePipelineCallbacks,
  type PagePipelineOptions,
  PageState,
  type PageStateChange,
} from "./types";

const STAGE_ORDER: PageState[] = [
  PageState.FETCHING,
  PageState.COLLECTING,
  PageState.ARCHIVING,
  PageState.PERSISTING,
  PageState.DONE,
];

/**
 * Nothing is archived or written to disk once the run has been cancelled.
 */
function throwIfAborted(signal: AbortSignal | undefined, title: string): void {
  if (signal?.aborted) {
    throw new CancellationError(`Cancelled before ${title} was saved`);
  }
}

export interface PagePipelineDependencies {
  scraper?: PageScraper;
  collector?: ImageCollector;
  archiver?: Archiver;
  persister?: Persister;
}

/**
 * Tracks one run through the stages and reports each transition.
 */
class StageTracker {
  private current: PageState | null = null;

  constructor(
    readonly callbacks: PagePipelineCallbacks,
    readonly url?: string,
  ) {}

  title?: string;

  get finished(): boolean {
    return this.current === PageState.DONE || this.current === PageState.FAILED;
  }

  async enter(state: PageState, error?: Error): Promise<void> {
    if (this.finished) {
      throw new PipelineStateError(`Cannot enter ${state} after ${this.current}`);
    }
    if (state !== PageState.FAILED) {
      const from = this.current === null ? -1 : STAGE_ORDER.indexOf(this.current);
      if (STAGE_ORDER.indexOf(state) <= from) {
        throw new PipelineStateError(`Cannot move from ${this.current} back to ${state}`);
      }
    }
    this.current = state;

    const change: PageStateChange = { state, url: this.url, title: this.title };
    if (error) {
      change.error = error;
    }
    logger.debug(`[${this.title ?? this.url ?? "page"}] ${state}`);
    await this.callbacks.onStateChange?.(change);
  }
}

/**
 * Drives a page through download, archiving and persisting.
 *
 * `Fetching → Collecting → Archiving → Persisting → Done`, or `Failed` from any
 * stage. A stage is never repeated and nothing is retried. The archiver is not
 * called unless every image downloaded.
 */
export class PagePipeline {
  private readonly scraper: PageScraper;
  private readonly collector: ImageCollector;
  private readonly archiver: Archiver;
  private readonly persister: Persister;
  private readonly options: PagePipelineOptions;
  private callbacks: PagePipelineCallbacks = {};

  constructor(dependencies: PagePipelineDependencies = {}, options: PagePipelineOptions = {}) {
    this.scraper = dependencies.scraper ?? new PageScraper();
    this.collector = dependencies.collector ?? new ImageCollector();
    this.archiver = dependencies.archiver ?? new Archiver();
    this.persister = dependencies.persister ?? new Persister();
    this.options = options;
  }

  /**
   * Registers the default callback handlers for pipeline events. A run can
   * pass its own handlers instead.
   */
  setCallbacks(callbacks: PagePipelineCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Scrapes `url` (default `page.url`) for its title and images, then archives them.
   */
  async runPage(
    page: PageConfig,
    url: string = page.url,
    overrides: PagePipelineOptions = {},
    callbacks: PagePipelineCallbacks = this.callbacks,
  ): Promise<PersistedArchive> {
    const options = { ...this.options, ...overrides };
    const tracker = new StageTracker(callbacks, url);
    await tracker.enter(PageState.FETCHING);

    let title: string;
    let sources: string[];
    try {
      const scraped = await this.scraper.scrape(page, url, {
        ...options.fetchOptions,
        signal: options.signal,
      });
      title = scraped.title;
      sources = scraped.imageSources;
    } catch (error) {
      await this.fail(tracker, error);
      throw error;
    }

    tracker.title = title;
    return this.process(tracker, title, sources, options);
  }

  /**
   * Downloads `sources`, archives them and writes the archive under `title`.
   */
  async run(
    title: string,
    sources: string[],
    overrides: PagePipelineOptions = {},
    callbacks: PagePipelineCallbacks = this.callbacks,
  ): Promise<PersistedArchive> {
    const tracker = new StageTracker(callbacks);
    tracker.title = title;
    await tracker.enter(PageState.FETCHING);
    return this.process(tracker, title, sources, { ...this.options, ...overrides });
  }

  private async process(
    tracker: StageTracker,
    title: string,
    sources: string[],
    options: PagePipelineOptions,
  ): Promise<PersistedArchive> {
    try {
      const images = await this.collector.collect(sources, {
        maxConcurrency: options.maxConcurrency,
        signal: options.signal,
        fetchOptions: options.fetchOptions,
        onProgress: tracker.callbacks.onImageProgress,
      });
      await tracker.enter(PageState.COLLECTING);
      logger.debug(`Collected ${images.length} images for ${title}`);

      throwIfAborted(options.signal, title);
      await tracker.enter(PageState.ARCHIVING);
      const result: PageResult = { title, archive: await this.archiver.archive(images) };

      throwIfAborted(options.signal, title);
      await tracker.enter(PageState.PERSISTING);
      const bytesWritten = await this.persister.persist(result.title, result.archive);

      await tracker.enter(PageState.DONE);
      return {
        title,
        path: this.persister.pathFor(title),
        bytesWritten,
        imageCount: images.length,
      };
    } catch (error) {
      await this.fail(tracker, error);
      throw error;
    }
  }

  private async fail(tracker: StageTracker, error: unknown): Promise<void> {
    const reason = error instanceof Error ? error : new Error(String(error));
    logger.error(`❌ ${tracker.title ?? tracker.url ?? "Page"} failed: ${reason.message}`);
    if (tracker.finished) {
      return;
    }
    try {
      await tracker.enter(PageState.FAILED, reason);
    } catch (callbackError) {
      // The original failure is what the caller sees
      logger.warn(`State callback failed while reporting an error: ${callbackError}`);
    }
  }
}
