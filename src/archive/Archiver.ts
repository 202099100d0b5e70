import JSZip from "jszip";
import type { Image, ImageSet } from "../types";
import { logger } from "../utils/logger";
import { ArchiveError, DuplicateEntryError } from "./errors";

export type CompressionMethod = "STORE" | "DEFLATE";

export interface ArchiverOptions {
  /** @default "STORE" */
  compression?: CompressionMethod;
  /** Modification time written for every entry */
  entryDate?: Date;
}

/** Fixed entry timestamp; equal input always yields equal archive bytes. */
const DEFAULT_ENTRY_DATE = new Date(Date.UTC(2000, 0, 1));

/**
 * Packs downloaded images into a single in-memory ZIP archive.
 */
export class Archiver {
  private readonly compression: CompressionMethod;
  private readonly entryDate: Date;

  constructor(options: ArchiverOptions = {}) {
    this.compression = options.compression ?? "STORE";
    this.entryDate = options.entryDate ?? DEFAULT_ENTRY_DATE;
  }

  /**
   * Writes one entry per image, using `image.name` as the entry path.
   * @throws {DuplicateEntryError} if two images share a name
   * @throws {ArchiveError} if the archive cannot be generated
   */
  async archive(images: ImageSet): Promise<Buffer> {
    const zip = new JSZip();

    for (const image of images) {
      if (zip.file(image.name)) {
        throw new DuplicateEntryError(image.name);
      }
      zip.file(image.name, image.content, {
        binary: true,
        createFolders: false,
        date: this.entryDate,
      });
    }

    try {
      const archive = await zip.generateAsync({
        type: "nodebuffer",
        compression: this.compression,
        compressionOptions: this.compression === "DEFLATE" ? { level: 6 } : null,
      });
      logger.debug(`Archived ${images.length} entries (${archive.length} bytes)`);
      return archive;
    } catch (error) {
      throw new ArchiveError("Failed to generate archive", error);
    }
  }

  /**
   * Reads an archive produced by {@link archive} back into images, sorted by
   * entry name. Directory entries are skipped.
   */
  async read(archive: Buffer): Promise<Image[]> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(archive);
    } catch (error) {
      throw new ArchiveError("Failed to read archive", error);
    }

    const entries = Object.values(zip.files).filter((entry) => !entry.dir);
    const images = await Promise.all(
      entries.map(async (entry) => ({
        name: entry.name,
        content: await entry.async("nodebuffer"),
      })),
    );
    return images.sort((a, b) => a.name.localeCompare(b.name));
  }
}
