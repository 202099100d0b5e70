import * as cheerio from "cheerio";
import type { ScrapedPage } from "../types";
import { ParsingError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sanitizeTitle } from "../utils/string";
import { resolveSource } from "../utils/url";
import type { PageConfig } from "./PageConfig";
import { FetcherRegistry } from "./fetcher/FetcherRegistry";
import type { ContentFetcher, FetchOptions } from "./fetcher/types";

/**
 * Fetches a page and reads its title and image sources with the page's
 * configured selectors.
 */
export class PageScraper {
  private readonly fetcher: ContentFetcher;

  constructor(fetcher: ContentFetcher = new FetcherRegistry()) {
    this.fetcher = fetcher;
  }

  /**
   * @param url - Page to scrape; defaults to `page.url`
   * @throws {ParsingError} if the title selector yields no text
   */
  async scrape(page: PageConfig, url: string = page.url, options?: FetchOptions): Promise<ScrapedPage> {
    logger.info(`📡 Fetching ${url}...`);
    const raw = await this.fetcher.fetch(url, options);
    // Relative sources resolve against where the page ended up after redirects
    return this.parse(raw.content.toString("utf-8"), page, raw.finalUrl ?? raw.source);
  }

  /**
   * Extracts the title and image sources from HTML already in hand.
   */
  parse(html: string, page: PageConfig, url: string): ScrapedPage {
    const $ = cheerio.load(html);

    const title = sanitizeTitle($(page.titleSelector).text());
    if (!title) {
      throw new ParsingError(`no title found with selector "${page.titleSelector}" on ${url}`);
    }

    // Elements without a src keep their slot as "" so the download fails for them
    const imageSources = $(page.imageSelector)
      .toArray()
      .map((element) => resolveSource($(element).attr("src") ?? "", url));

    logger.debug(`Found ${imageSources.length} images on ${url} titled ${title}`);
    return { url, title, imageSources };
  }
}
