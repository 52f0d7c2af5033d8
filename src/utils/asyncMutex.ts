/**
 * Promise-chained mutex. Operations passed to {@link runExclusive} run one at a
 * time in call order, even when they await in between.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(operation: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    const release = this.enqueue();
    try {
      await previous;
      return await operation();
    } finally {
      release();
    }
  }

  private enqueue(): () => void {
    let release!: () => void;
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = this.tail.then(() => wait);
    return release;
  }
}
