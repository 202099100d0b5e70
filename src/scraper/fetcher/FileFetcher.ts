import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { FetchError, InvalidReferenceError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { ContentFetcher, FetchOptions, RawContent } from "./types";

const MIME_TYPES: Record<string, string> = {
  ".html": "text/html",
  ".htm": "text/html",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".svg": "image/svg+xml",
  ".avif": "image/avif",
};

/**
 * Fetches content from local file system.
 */
export class FileFetcher implements ContentFetcher {
  canFetch(source: string): boolean {
    return source.startsWith("file://");
  }

  async fetch(source: string, _options?: FetchOptions): Promise<RawContent> {
    if (!source) {
      throw new InvalidReferenceError(source);
    }

    let filePath: string;
    try {
      filePath = fileURLToPath(source);
    } catch {
      throw new InvalidReferenceError(source, `Invalid file URL: ${source}`);
    }
    logger.debug(`Reading file: ${filePath}`);

    try {
      const content = await fs.readFile(filePath);
      const ext = path.extname(filePath).toLowerCase();

      return {
        content,
        mimeType: MIME_TYPES[ext] ?? "application/octet-stream",
        source,
      };
    } catch (error: unknown) {
      throw new FetchError(
        source,
        error instanceof Error ? error.message : String(error),
        undefined,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
