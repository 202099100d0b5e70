/**
 * Completion barrier for a group of concurrent tasks.
 *
 * Each task is registered with {@link add} before it starts and reports with
 * {@link done} when it finishes. {@link wait} settles once the counter is back
 * at zero.
 */
export class WaitGroup {
  private count = 0;
  private waiters: Array<() => void> = [];

  add(delta = 1): void {
    if (this.count + delta < 0) {
      throw new Error("WaitGroup counter cannot go negative");
    }
    this.count += delta;
    if (this.count === 0) {
      this.release();
    }
  }

  done(): void {
    this.add(-1);
  }

  wait(): Promise<void> {
    if (this.count === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get pending(): number {
    return this.count;
  }

  private release(): void {
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }
}
