export { Archiver } from "./Archiver";
export type { ArchiverOptions, CompressionMethod } from "./Archiver";
export { ArchiveError, DuplicateEntryError } from "./errors";
