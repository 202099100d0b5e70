import { FetcherRegistry } from "../scraper/fetcher/FetcherRegistry";
import type { ContentFetcher } from "../scraper/fetcher/types";
import type { Image, ImageSet } from "../types";
import { Channel } from "../utils/Channel";
import { WaitGroup } from "../utils/WaitGroup";
import { logger } from "../utils/logger";
import { imageEntryName } from "../utils/url";
import type { CollectOptions, CollectorMessage } from "./types";

interface CollectTask {
  index: number;
  source: string;
}

/**
 * Downloads all images of a page concurrently.
 *
 * Every source gets its own fetch task. Tasks never touch the result list: they
 * send what they produced over a {@link Channel} to a single aggregator, which
 * is the list's only writer. The launcher waits on a {@link WaitGroup} covering
 * every task and only then sends a `finished` message, so the aggregator has
 * seen each task's image or error by the time it returns.
 *
 * The first failure is latched. Later results are discarded, and `collect`
 * rejects with that first error after the barrier has been crossed. Sibling
 * fetches already in flight are left to finish.
 */
export class ImageCollector {
  private readonly fetcher: ContentFetcher;
  private readonly defaults: CollectOptions;

  constructor(fetcher: ContentFetcher = new FetcherRegistry(), defaults: CollectOptions = {}) {
    this.fetcher = fetcher;
    this.defaults = defaults;
  }

  async collect(sources: string[], options: CollectOptions = {}): Promise<ImageSet> {
    const resolved: CollectOptions = { ...this.defaults, ...options };
    const maxConcurrency = resolved.maxConcurrency;
    if (maxConcurrency !== undefined && (!Number.isInteger(maxConcurrency) || maxConcurrency < 1)) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }

    logger.info(`🖼️ ${sources.length} images.`);
    const channel = new Channel<CollectorMessage>();
    const aggregation = this.aggregate(channel, sources.length, resolved);
    const launching = this.launch(sources, channel, resolved);

    const [, images] = await Promise.all([launching, aggregation]);
    return images;
  }

  /**
   * Starts one task per source, at most `maxConcurrency` at a time, and sends
   * `finished` once every task has reported.
   */
  private async launch(
    sources: string[],
    channel: Channel<CollectorMessage>,
    options: CollectOptions,
  ): Promise<void> {
    const limit = options.maxConcurrency ?? Number.POSITIVE_INFINITY;
    const queue: CollectTask[] = sources.map((source, index) => ({ index, source }));
    const group = new WaitGroup();
    group.add(queue.length);
    let active = 0;
    let halted = false;

    const pump = (): void => {
      while (queue.length > 0 && (halted || active < limit)) {
        const task = queue.shift();
        if (!task) break;

        if (halted) {
          // A fetch already failed; tasks that never started are not launched.
          logger.debug(`Skipping [${task.index}] ${task.source}`);
          group.done();
          continue;
        }

        active++;
        this.runTask(task, channel, options)
          .then((succeeded) => {
            if (!succeeded) {
              halted = true;
            }
          })
          .catch((error) => {
            // runTask reports its own failures; anything here is a bug in the reporting path.
            logger.error(`Unhandled error in image task ${task.index}: ${error}`);
            halted = true;
          })
          .finally(() => {
            active--;
            group.done();
            pump();
          });
      }
    };

    pump();
    await group.wait();
    channel.send({ kind: "finished" });
  }

  /**
   * Fetches one source and reports the outcome to the aggregator.
   * @returns whether the fetch succeeded
   */
  private async runTask(
    task: CollectTask,
    channel: Channel<CollectorMessage>,
    options: CollectOptions,
  ): Promise<boolean> {
    const { index, source } = task;
    logger.debug(`START [${index}] ${source}`);
    try {
      const raw = await this.fetcher.fetch(source, {
        ...options.fetchOptions,
        signal: options.signal,
      });
      logger.debug(`DONE [${index}] ${source}`);
      const image: Image = { name: imageEntryName(index, source), content: raw.content };
      channel.send({ kind: "image", image });
      return true;
    } catch (error) {
      logger.debug(`FAILED [${index}] ${source}`);
      channel.send({
        kind: "error",
        index,
        source,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      return false;
    }
  }

  /**
   * Sole owner of the result list. Runs until the `finished` message arrives.
   */
  private async aggregate(
    channel: Channel<CollectorMessage>,
    total: number,
    options: CollectOptions,
  ): Promise<ImageSet> {
    const images: Image[] = [];
    let firstError: Error | undefined;

    for (;;) {
      const message = await channel.receive();
      switch (message.kind) {
        case "image": {
          if (firstError) {
            logger.debug(`Discarding ${message.image.name} after an earlier failure`);
            break;
          }
          images.push(message.image);
          try {
            await options.onProgress?.({
              completed: images.length,
              total,
              name: message.image.name,
            });
          } catch (error) {
            firstError = error instanceof Error ? error : new Error(String(error));
          }
          break;
        }
        case "error": {
          if (firstError) {
            logger.debug(`Ignoring error for [${message.index}] ${message.source}: ${message.error.message}`);
            break;
          }
          logger.error(`❌ Failed to download [${message.index}] ${message.source}: ${message.error.message}`);
          firstError = message.error;
          break;
        }
        case "finished": {
          channel.close();
          if (firstError) {
            throw firstError;
          }
          logger.info(`✅ Downloaded ${images.length}/${total} images.`);
          return images;
        }
      }
    }
  }
}
