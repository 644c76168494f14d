/**
 * FIFO mutex serialising asynchronous critical sections. Waiters are released
 * in the order they called {@link AsyncMutex.runExclusive}.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** True while a critical section is running or waiting to run. */
  get locked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    this.holders += 1;
    const { previous, release } = this.enqueue();
    try {
      await previous;
      return await operation();
    } finally {
      this.holders -= 1;
      release();
    }
  }

  private enqueue(): { previous: Promise<void>; release: () => void } {
    let release!: () => void;
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => wait);
    return { previous, release };
  }
}
