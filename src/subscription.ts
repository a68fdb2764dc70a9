type Waiter<T> = (result: IteratorResult<T, undefined>) => void;

const DONE = { value: undefined, done: true } as const;

/**
 * A receive-only stream of values handed out to one subscriber.
 *
 * Values pushed by the producer are queued without bound, so pushing never
 * blocks and nothing is dropped while the subscription is open. Consume it
 * with `for await`; leaving the loop early unsubscribes.
 */
export class Subscription<T> implements AsyncIterableIterator<T> {
  private queue: { value: T }[] = [];
  private waiters: Waiter<T>[] = [];
  private ended = false;
  private closed = false;

  constructor(private onClose?: (subscription: Subscription<T>) => void) {}

  /** Number of values waiting to be read */
  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed || this.ended;
  }

  push(value: T): void {
    if (this.isClosed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.queue.push({ value });
    }
  }

  /** Producer side: no more values will come, but queued ones can still be read. */
  end(): void {
    if (this.isClosed) return;
    this.ended = true;
    this.releaseWaiters();
  }

  /** Consumer side: unsubscribe and discard whatever is still queued. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    this.releaseWaiters();
    this.onClose?.(this);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const item = this.queue.shift();
    if (item) {
      return Promise.resolve({ value: item.value, done: false });
    }
    if (this.isClosed) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  return(): Promise<IteratorResult<T, undefined>> {
    this.close();
    return Promise.resolve(DONE);
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  private releaseWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(DONE);
    }
  }
}
