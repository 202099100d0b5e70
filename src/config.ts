/**
 * Default configuration values for the download pipeline
 */

/** Directory archives are written to, relative to the working directory */
export const DEFAULT_DOWNLOAD_DIR = "downloads";

/** Extension appended to the page title to form the archive file name */
export const DEFAULT_ARCHIVE_EXTENSION = ".zip";

/** Page list read by the interactive command */
export const DEFAULT_CONFIG_FILE = "pages.json";

/**
 * Maximum number of concurrent image downloads per page.
 * `undefined` starts every download at once.
 */
export const DEFAULT_MAX_CONCURRENCY: number | undefined = undefined;
