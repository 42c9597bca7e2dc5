/**
 * AsyncSemaphore: counting semaphore bounding how many async operations
 * (file writes, renders) run at once. Waiters are served in FIFO order.
 */
export class AsyncSemaphore {
  private permits: number;
  private queue: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (maxPermits < 1) throw new Error('Semaphore must have at least 1 permit');
    this.permits = maxPermits;
  }

  /**
   * Acquire a permit. Waits if none available.
   */
  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  /**
   * Run a function while holding a permit.
   */
  async withPermit<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.queue.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.permits++;
      }
    };
  }
}
