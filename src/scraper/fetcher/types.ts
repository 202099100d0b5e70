/**
 * Raw bytes fetched from a source, with the metadata needed to interpret them.
 */
export interface RawContent {
  /** Full response body */
  content: Buffer;
  /** MIME type of the content */
  mimeType: string;
  /** Original source location */
  source: string;
  /** Location the content was served from once redirects were followed */
  finalUrl?: string;
  /** Character encoding if applicable */
  encoding?: string;
}

/**
 * Options for configuring content fetching behavior
 */
export interface FetchOptions {
  /** Additional headers for HTTP requests */
  headers?: Record<string, string>;
  /** Timeout in milliseconds; the transport default applies when omitted */
  timeout?: number;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
  /** Whether to follow HTTP redirects (3xx responses) */
  followRedirects?: boolean;
}

/**
 * Interface for fetching content from different sources
 */
export interface ContentFetcher {
  /**
   * Check if this fetcher can handle the given source
   */
  canFetch(source: string): boolean;

  /**
   * Fetch content from the source. A single attempt; failures are not retried.
   */
  fetch(source: string, options?: FetchOptions): Promise<RawContent>;
}
