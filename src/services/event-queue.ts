type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded, ordered, multi-producer/single-consumer queue.
 *
 * Producers `push`; a `false` return means the consumer is gone and the
 * producer should stop. The consumer either drains it through `next()` /
 * `for await`, or drops it with `close()`. `end()` marks the producer side
 * finished: buffered items are still delivered, then iteration completes.
 */
export class EventQueue<T extends object> implements AsyncIterableIterator<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closeListeners = new Set<() => void>();
  private ended = false;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  push(item: T): boolean {
    if (this.closed || this.ended) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed || this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  // Producer side: no more items will come
  end(): void {
    if (this.ended || this.closed) return;
    this.ended = true;
    this.flushWaiters();
  }

  // Consumer side: drop everything and tell producers to stop
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer = [];
    this.flushWaiters();
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) listener();
  }

  onClose(listener: () => void): () => void {
    if (this.closed) {
      listener();
      return () => {};
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  private flushWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter({ value: undefined, done: true });
  }
}
