/**
 * Unbounded push/pull queue. Producers `push`, then `end` or `fail`; a single
 * consumer pulls with `next` or `for await`.
 */
export class AsyncEventQueue<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiter: {
    resolve: (result: IteratorResult<T, undefined>) => void;
    reject: (error: unknown) => void;
  } | null = null;
  private ended = false;
  private failure: { error: unknown } | null = null;

  get closed(): boolean {
    return this.ended || this.failure !== null;
  }

  push(item: T): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
  }

  end(): void {
    if (this.closed) {
      return;
    }
    this.ended = true;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /**
   * Ends the queue with an error. Items already buffered are still delivered
   * before the error is raised.
   */
  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.failure = { error };
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter.reject(error);
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
