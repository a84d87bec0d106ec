/**
 * Bounded single-consumer async channel.
 *
 * `send` resolves once the item is queued and suspends while the queue is at
 * capacity, so a producer that awaits each send is throttled to the
 * consumer's pace. Receive listeners see each item as the consumer takes it.
 */

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: unknown) => void;
};

type Sender = {
  resolve: () => void;
  reject: (err: unknown) => void;
};

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly queue: Array<{ value: T }> = [];
  private readonly receivers: Waiter<T>[] = [];
  private readonly senders: Sender[] = [];
  private readonly listeners = new Set<(item: T) => void>();
  private closed = false;
  private failure: { error: unknown } | undefined;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Call `listener` with every item at the moment the consumer takes it.
   * Returns a function that removes the listener.
   */
  onReceive(listener: (item: T) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Queue an item, waiting for room when full.
   * Rejects with ChannelClosedError once the channel is closed.
   */
  async send(item: T): Promise<void> {
    while (true) {
      if (this.closed) {
        throw new ChannelClosedError();
      }

      const receiver = this.receivers.shift();
      if (receiver) {
        this.notify(item);
        receiver.resolve({ value: item, done: false });
        return;
      }

      if (this.queue.length < this.capacity) {
        this.queue.push({ value: item });
        return;
      }

      await new Promise<void>((resolve, reject) => {
        this.senders.push({ resolve, reject });
      });
    }
  }

  /**
   * Take the next item. Resolves `done` after close once the queue drains.
   */
  receive(): Promise<IteratorResult<T>> {
    const queued = this.queue.shift();
    if (queued) {
      this.notify(queued.value);
      this.wakeSender();
      return Promise.resolve({ value: queued.value, done: false });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /**
   * Stop accepting items. Queued items remain receivable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve({ value: undefined, done: true });
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  /**
   * Close with an error; the consumer sees it after draining queued items.
   */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(error);
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }

  private notify(item: T): void {
    for (const listener of this.listeners) {
      listener(item);
    }
  }

  private wakeSender(): void {
    const sender = this.senders.shift();
    sender?.resolve();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      }
    };
  }
}
