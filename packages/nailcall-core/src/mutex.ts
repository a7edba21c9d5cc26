// FIFO async lock.
//
// Callers queue on a promise chain; each holder runs to completion (including
// its awaits) before the next one starts.

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Whether a holder is running or queued. */
  isLocked(): boolean {
    return this.pending > 0;
  }

  /**
   * Run `fn` while holding the lock. The lock is released when `fn` settles,
   * whether it resolves or throws.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => held);
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }
}
