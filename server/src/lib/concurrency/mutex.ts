/**
 * Mutex
 * FIFO async lock built on a promise chain.
 *
 * Critical sections that suspend (await) still exclude each other;
 * waiters are admitted in arrival order.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run fn while holding the lock. The lock is released when fn settles,
   * and fn's error (if any) is rethrown to the caller.
   */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const next = new Promise<void>(resolve => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }

  /**
   * True while a section is running or waiting
   */
  isLocked(): boolean {
    return this.pending > 0;
  }
}
