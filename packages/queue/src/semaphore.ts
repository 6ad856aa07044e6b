import { setMaxListeners } from "node:events";

/**
 * Counting semaphore for bounding concurrent calls to a shared backend.
 * Waiters are served in FIFO order.
 */
export class Semaphore {
  private inUse = 0;
  private readonly queue: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError("Semaphore limit must be a positive integer");
    }
  }

  /**
   * Resolve with a release function once a permit is available. Releasing
   * twice is a no-op.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise((resolve, reject) => {
      const grant = (): void => {
        signal?.removeEventListener("abort", onAbort);
        this.inUse++;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      const onAbort = (): void => {
        const index = this.queue.indexOf(grant);
        if (index >= 0) {
          this.queue.splice(index, 1);
          reject(signal?.reason);
        }
      };

      if (this.inUse < this.limit) {
        grant();
        return;
      }

      if (signal) {
        // One listener per queued waiter; many documents may share a signal.
        setMaxListeners(0, signal);
        signal.addEventListener("abort", onAbort, { once: true });
      }
      this.queue.push(grant);
    });
  }

  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    this.inUse--;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}
