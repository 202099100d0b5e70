import { InvalidReferenceError } from "../../utils/errors";
import { FileFetcher } from "./FileFetcher";
import { HttpFetcher } from "./HttpFetcher";
import type { ContentFetcher, FetchOptions, RawContent } from "./types";

/**
 * Routes each reference to the first registered fetcher that accepts it.
 * Defaults to HTTP(S) followed by `file://`.
 */
export class FetcherRegistry implements ContentFetcher {
  private readonly fetchers: ContentFetcher[];

  constructor(fetchers: ContentFetcher[] = [new HttpFetcher(), new FileFetcher()]) {
    this.fetchers = fetchers;
  }

  canFetch(source: string): boolean {
    return this.fetchers.some((fetcher) => fetcher.canFetch(source));
  }

  async fetch(source: string, options?: FetchOptions): Promise<RawContent> {
    if (!source) {
      throw new InvalidReferenceError(source);
    }
    const fetcher = this.fetchers.find((f) => f.canFetch(source));
    if (!fetcher) {
      throw new InvalidReferenceError(
        source,
        `Invalid URL: ${source}. Must be an HTTP/HTTPS URL or a file:// URL.`,
      );
    }
    return fetcher.fetch(source, options);
  }
}
