// ── Subscription ────────────────────────────────────────────────────────────
// One per subscriber. Holds its own FIFO buffer so a slow consumer never
// blocks or reorders delivery to the others.

export class Subscription<T> implements AsyncIterable<T> {
  private readonly buffer: Array<{ readonly value: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  constructor(private readonly onClose: (subscription: Subscription<T>) => void) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of delivered values not yet consumed. */
  get pending(): number {
    return this.buffer.length;
  }

  /** Called by the bus. Values delivered after close() are dropped. */
  deliver(value: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
  }

  /** Resolve with the next value, waiting if none is buffered. */
  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item) {
      return Promise.resolve({ value: item.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Take the next buffered value without waiting. */
  tryNext(): T | undefined {
    return this.buffer.shift()?.value;
  }

  /** Take every buffered value. */
  drain(): T[] {
    return this.buffer.splice(0, this.buffer.length).map((item) => item.value);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose(this);
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}

// ── EventBus ────────────────────────────────────────────────────────────────

export interface SubscribeOptions<T> {
  /** Delivered to this subscriber only, before anything published later. */
  readonly seed?: T;
}

/**
 * Ordered multi-subscriber broadcast. Every open subscription observes
 * published values in publish order; a subscriber created before a publish
 * is guaranteed to receive it.
 */
export class EventBus<T> {
  private readonly subscriptions = new Set<Subscription<T>>();

  publish(value: T): void {
    for (const subscription of this.subscriptions) {
      subscription.deliver(value);
    }
  }

  subscribe(options: SubscribeOptions<T> = {}): Subscription<T> {
    const subscription = new Subscription<T>((s) => this.subscriptions.delete(s));
    if (options.seed !== undefined) {
      subscription.deliver(options.seed);
    }
    this.subscriptions.add(subscription);
    return subscription;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /** Close every subscription. Pending iterators finish. */
  closeAll(): void {
    for (const subscription of [...this.subscriptions]) {
      subscription.close();
    }
  }
}
