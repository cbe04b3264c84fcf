/**
 * Counting semaphore around async tasks. Results keep the order of the
 * inputs no matter which task finishes first.
 */
export class WorkerPool {
  private active = 0;
  private peak = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /** Highest number of tasks that ran at the same time. */
  get maxInFlight(): number {
    return this.peak;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  map<T, R>(items: readonly T[], fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
    return Promise.all(items.map((item, index) => this.run(() => fn(item, index))));
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.enter();
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => {
        this.enter();
        resolve();
      });
    });
  }

  private enter(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }

  private release(): void {
    this.active--;
    this.waiting.shift()?.();
  }
}
