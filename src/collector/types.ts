import type { FetchOptions } from "../scraper/fetcher/types";
import type { Image, ProgressCallback } from "../types";

/**
 * Messages sent from fetch tasks to the aggregator.
 */
export type CollectorMessage =
  | { kind: "image"; image: Image }
  | { kind: "error"; index: number; source: string; error: Error }
  | { kind: "finished" };

export interface CollectorProgress {
  /** Images received so far */
  completed: number;
  /** Number of sources in this collection */
  total: number;
  /** Entry name of the image that just arrived */
  name: string;
}

export interface CollectOptions {
  /**
   * Maximum number of fetches in flight. Unbounded when omitted: one task per
   * source starts immediately.
   */
  maxConcurrency?: number;
  /** Passed to every fetch; aborting it makes outstanding fetches fail */
  signal?: AbortSignal;
  /** Request options applied to every fetch */
  fetchOptions?: Omit<FetchOptions, "signal">;
  /** Called by the aggregator after each image is accepted */
  onProgress?: ProgressCallback<CollectorProgress>;
}
