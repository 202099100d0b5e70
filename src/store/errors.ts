class PersistError extends Error {
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

class IncompleteWriteError extends PersistError {
  constructor(
    public readonly path: string,
    public readonly expected: number,
    public readonly written: number,
  ) {
    super(`Incomplete write to ${path}: ${written} of ${expected} bytes`);
  }
}

export { PersistError, IncompleteWriteError };
