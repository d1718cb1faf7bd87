/**
 * Counting semaphore bounding how many records are processed at once.
 * Waiting tasks start in FIFO order; a finishing task hands its slot
 * straight to the next one.
 */
export class Semaphore {
  private active = 0;
  private readonly pending: Array<() => void> = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`Semaphore maxConcurrency must be >= 1 (got ${maxConcurrency})`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  /** Run `task` while holding a slot */
  async run<T>(task: () => Promise<T> | T): Promise<T> {
    await this.enter();
    try {
      return await task();
    } finally {
      this.leave();
    }
  }

  private enter(): Promise<void> {
    if (this.active < this.maxConcurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.pending.push(() => resolve());
    });
  }

  private leave(): void {
    const next = this.pending.shift();
    if (next) {
      // Slot passes to the waiter; the active count is unchanged
      next();
    } else {
      this.active--;
    }
  }
}
