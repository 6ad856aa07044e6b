import { Channel } from "./channel.js";

export interface WorkerPoolOptions {
  concurrency: number;
  /** Once aborted, workers finish their current item and take no more. */
  signal?: AbortSignal;
}

export interface WorkerPoolResult<T> {
  /** Items never handed to a worker because the pool was stopped. */
  undispatched: T[];
}

/**
 * Fixed number of workers pulling from a shared channel. The handler owns
 * its errors: a rejection from `handle` rejects the whole run.
 */
export class WorkerPool<T> {
  readonly concurrency: number;
  private readonly signal?: AbortSignal;

  constructor(
    private readonly handle: (item: T) => Promise<void>,
    options: WorkerPoolOptions,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError("concurrency must be a positive integer");
    }
    this.concurrency = options.concurrency;
    this.signal = options.signal;
  }

  async run(source: Channel<T> | Iterable<T>): Promise<WorkerPoolResult<T>> {
    const channel = source instanceof Channel ? source : Channel.from(source);
    const undispatchedLate: T[] = [];

    const worker = async (): Promise<void> => {
      while (!this.signal?.aborted) {
        const next = await channel.next();
        if (next.done) return;
        if (this.signal?.aborted) {
          // Taken after the stop request: hand it back as undispatched.
          undispatchedLate.push(next.value);
          return;
        }
        await this.handle(next.value);
      }
    };

    await Promise.all(Array.from({ length: this.concurrency }, () => worker()));

    return { undispatched: [...undispatchedLate, ...channel.drain()] };
  }
}
