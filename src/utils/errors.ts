class ScraperError extends Error {
  constructor(
    message: string,
    public readonly isRetryable: boolean = false,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Raised for an image or page reference that cannot be fetched at all, such as
 * an `<img>` without a `src` attribute. Never reaches the network.
 */
class InvalidReferenceError extends ScraperError {
  constructor(
    public readonly reference: string,
    reason = reference ? `Unsupported reference: ${reference}` : "Empty reference",
  ) {
    super(reason, false);
  }
}

class FetchError extends ScraperError {
  constructor(
    public readonly source: string,
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(`Failed to fetch ${source}: ${message}`, false, cause);
  }
}

class ParsingError extends ScraperError {
  constructor(message: string, cause?: Error) {
    super(`Failed to parse content: ${message}`, false, cause);
  }
}

class RedirectError extends ScraperError {
  constructor(
    public readonly originalUrl: string,
    public readonly redirectUrl: string,
    public readonly statusCode: number,
  ) {
    super(
      `Redirect detected from ${originalUrl} to ${redirectUrl} (status: ${statusCode})`,
      false,
    );
  }
}

export { ScraperError, InvalidReferenceError, FetchError, ParsingError, RedirectError };
