/**
 * Async mutex built on a promise chain.
 *
 * Tasks passed to runExclusive() run one at a time in call order; a task
 * that throws releases the lock for the next one.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.waiting++;
    try {
      await previous;
      return await task();
    } finally {
      this.waiting--;
      release();
    }
  }

  /** True while a task runs or waits (for diagnostics) */
  get isLocked(): boolean {
    return this.waiting > 0;
  }
}
