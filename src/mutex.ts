/**
 * Async Mutex
 *
 * Serializes async critical sections by chaining them onto a tail promise.
 * Callers queue in arrival order; a rejected section releases the lock.
 */

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** True while a section holds the lock or is queued for it */
  get locked(): boolean {
    return this.waiting > 0;
  }

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
    let release: () => void = () => {};
    const wait = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.waiting++;
    this.tail = this.tail.then(() => wait);
    return () => {
      this.waiting--;
      release();
    };
  }
}
