import axios, { type AxiosRequestConfig, type AxiosResponse, isAxiosError } from "axios";
import { FetchError, InvalidReferenceError, RedirectError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { ContentFetcher, FetchOptions, RawContent } from "./types";

/**
 * URL of the last request in a redirect chain. Node's http adapter records it on
 * the underlying response as `responseUrl`.
 */
function responseUrlOf(request: unknown): string | undefined {
  if (typeof request !== "object" || request === null || !("res" in request)) {
    return undefined;
  }
  const { res } = request;
  if (typeof res === "object" && res !== null && "responseUrl" in res) {
    return typeof res.responseUrl === "string" && res.responseUrl ? res.responseUrl : undefined;
  }
  return undefined;
}

/**
 * Fetches content from remote sources using HTTP/HTTPS.
 *
 * Each call is exactly one GET request. Transport errors and non-2xx responses
 * reject with a {@link FetchError}; nothing is retried.
 */
export class HttpFetcher implements ContentFetcher {
  canFetch(source: string): boolean {
    return source.startsWith("http://") || source.startsWith("https://");
  }

  async fetch(source: string, options?: FetchOptions): Promise<RawContent> {
    if (!source) {
      throw new InvalidReferenceError(source);
    }

    // Default to following redirects if not specified
    const followRedirects = options?.followRedirects ?? true;
    const config: AxiosRequestConfig = {
      responseType: "arraybuffer", // Images and HTML alike arrive as raw bytes
      headers: options?.headers,
      timeout: options?.timeout,
      signal: options?.signal,
      // Axios follows redirects by default, we need to explicitly disable it if needed
      maxRedirects: followRedirects ? 5 : 0,
    };

    let response: AxiosResponse<ArrayBuffer>;
    try {
      logger.debug(`GET ${source}`);
      response = await axios.get<ArrayBuffer>(source, config);
    } catch (error: unknown) {
      if (!isAxiosError(error)) {
        throw new FetchError(
          source,
          error instanceof Error ? error.message : String(error),
          undefined,
          error instanceof Error ? error : undefined,
        );
      }
      const status = error.response?.status;
      const location = error.response?.headers.location;

      // Handle redirect errors (status codes 301, 302, 303, 307, 308)
      if (
        !followRedirects &&
        status &&
        status >= 300 &&
        status < 400 &&
        typeof location === "string" &&
        location
      ) {
        throw new RedirectError(source, location, status);
      }

      const reason = status
        ? `HTTP ${status}`
        : `${error.code ?? "network error"}${error.message ? `: ${error.message}` : ""}`;
      throw new FetchError(source, reason, status, error);
    }

    const contentType = response.headers["content-type"];
    const contentEncoding = response.headers["content-encoding"];
    return {
      content: Buffer.from(response.data),
      mimeType:
        typeof contentType === "string" && contentType
          ? contentType
          : "application/octet-stream",
      source,
      finalUrl: responseUrlOf(response.request) ?? source,
      encoding: typeof contentEncoding === "string" ? contentEncoding : undefined,
    } satisfies RawContent;
  }
}
