class ArchiveError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(cause ? `${message} caused by ${cause}` : message);
    this.name = this.constructor.name;

    const causeError =
      cause instanceof Error ? cause : cause ? new Error(String(cause)) : undefined;
    if (causeError?.stack) {
      this.stack = causeError.stack;
    }
  }
}

class DuplicateEntryError extends ArchiveError {
  constructor(public readonly entryName: string) {
    super(`Archive already contains an entry named "${entryName}"`);
  }
}

export { ArchiveError, DuplicateEntryError };
