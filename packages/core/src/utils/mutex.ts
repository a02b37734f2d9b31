/**
 * Promise-chained mutual exclusion. Callers run one at a time in arrival
 * order; a rejected task releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release!: () => void;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending += 1;

    try {
      await previous;
      return await task();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
