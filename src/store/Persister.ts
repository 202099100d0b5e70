import type { FileHandle } from "node:fs/promises";
import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_ARCHIVE_EXTENSION, DEFAULT_DOWNLOAD_DIR } from "../config";
import { logger } from "../utils/logger";
import { IncompleteWriteError, PersistError } from "./errors";

export interface PersisterOptions {
  /** Destination directory, relative to the working directory unless absolute */
  directory?: string;
  /** Appended to the title to form the file name */
  extension?: string;
}

/**
 * Writes finished archives to disk as `<directory>/<title><extension>`.
 *
 * Titles are used verbatim; callers sanitize them first.
 */
export class Persister {
  readonly directory: string;
  readonly extension: string;

  constructor(options: PersisterOptions = {}) {
    this.directory = options.directory ?? DEFAULT_DOWNLOAD_DIR;
    this.extension = options.extension ?? DEFAULT_ARCHIVE_EXTENSION;
  }

  pathFor(title: string): string {
    return path.join(this.directory, `${title}${this.extension}`);
  }

  /**
   * Creates the directory if needed and writes the archive, replacing any file
   * already stored under the same title.
   * @returns the number of bytes written
   */
  async persist(title: string, archive: Buffer): Promise<number> {
    if (!title) {
      throw new PersistError("Cannot persist an archive without a title");
    }

    logger.debug(`Create directory ${this.directory}`);
    try {
      await fs.mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw new PersistError(`Failed to create directory ${this.directory}`, error);
    }

    const target = this.pathFor(title);
    logger.debug(`Create ${target}`);
    let handle: FileHandle;
    try {
      handle = await fs.open(target, "w");
    } catch (error) {
      throw new PersistError(`Failed to create ${target}`, error);
    }

    try {
      logger.debug(`Write ${target}`);
      const { bytesWritten } = await handle.write(archive, 0, archive.length, 0);
      if (bytesWritten !== archive.length) {
        throw new IncompleteWriteError(target, archive.length, bytesWritten);
      }
      logger.info(`💾 Saved ${title} (${bytesWritten} bytes)`);
      return bytesWritten;
    } catch (error) {
      if (error instanceof PersistError) {
        throw error;
      }
      throw new PersistError(`Failed to write ${target}`, error);
    } finally {
      await handle.close();
    }
  }
}
