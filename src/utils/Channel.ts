interface PendingReceive<T> {
  resolve: (value: T) => void;
  reject: (reason: Error) => void;
}

/**
 * Unbounded FIFO hand-off between concurrent producers and a single consumer.
 *
 * Producers call {@link send}; the consumer awaits {@link receive}. Messages are
 * delivered exactly once, in the order they were sent.
 */
export class Channel<T> {
  private readonly buffer: T[] = [];
  private waiting: PendingReceive<T>[] = [];
  private closed = false;

  send(value: T): void {
    if (this.closed) {
      throw new Error("Cannot send on a closed channel");
    }
    const receiver = this.waiting.shift();
    if (receiver) {
      receiver.resolve(value);
      return;
    }
    this.buffer.push(value);
  }

  receive(): Promise<T> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      return Promise.resolve(value);
    }
    if (this.closed) {
      return Promise.reject(new Error("Channel is closed"));
    }
    return new Promise<T>((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  /**
   * Refuses further sends. Buffered messages can still be received; receivers
   * already waiting on an empty channel are rejected.
   */
  close(): void {
    this.closed = true;
    for (const receiver of this.waiting.splice(0)) {
      receiver.reject(new Error("Channel is closed"));
    }
  }

  get size(): number {
    return this.buffer.length;
  }
}
