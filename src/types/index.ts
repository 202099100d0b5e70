/**
 * A downloaded image ready to be archived. `name` is the archive entry path,
 * `"<index>-<basename>"`, where `index` is the image's position on the page.
 */
export interface Image {
  name: string;
  content: Buffer;
}

/**
 * Every image collected for one page. Order carries no meaning; the position
 * on the page is encoded in each name.
 */
export type ImageSet = Image[];

/**
 * A finished archive for one page, handed to the persister.
 */
export interface PageResult {
  title: string;
  archive: Buffer;
}

/**
 * Outcome of a page pipeline once the archive is on disk.
 */
export interface PersistedArchive {
  title: string;
  path: string;
  bytesWritten: number;
  imageCount: number;
}

/**
 * Generic progress callback type
 */
export type ProgressCallback<T> = (progress: T) => void | Promise<void>;

/**
 * Title and image references read from one page.
 */
export interface ScrapedPage {
  url: string;
  /** Sanitized title, safe to use as a file name */
  title: string;
  /** Resolved `src` of every matched image, in document order; "" where missing */
  imageSources: string[];
}
