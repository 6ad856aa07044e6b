/**
 * Unbounded async FIFO. Producers `push` and `close`; any number of consumers
 * iterate concurrently, each item going to exactly one consumer.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ item: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  static from<T>(items: Iterable<T>): Channel<T> {
    const channel = new Channel<T>();
    for (const item of items) {
      channel.push(item);
    }
    channel.close();
    return channel;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error("Cannot push to a closed channel");
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.buffer.push({ item });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  /** Remove and return everything still buffered. */
  drain(): T[] {
    return this.buffer.splice(0).map((entry) => entry.item);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      return Promise.resolve({ value: entry.item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
