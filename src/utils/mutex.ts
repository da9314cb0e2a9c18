/**
 * Single-writer lock.
 *
 * Callers queue behind the previous holder's promise, so critical sections
 * run one at a time in arrival order. A rejected section releases the lock
 * and rethrows to its own caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Run `fn` once every earlier holder has finished. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /** True while a critical section is running or queued. */
  get isLocked(): boolean {
    return this.pending > 0;
  }
}
