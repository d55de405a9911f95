export class QueueClosedError extends Error {
  constructor() {
    super('Queue is closed');
    this.name = 'QueueClosedError';
    Object.setPrototypeOf(this, QueueClosedError.prototype);
  }
}

type Entry<T> = { value: T };

/**
 * Bounded multi-producer / single-consumer channel. `push` suspends while the
 * buffer is full; `next` suspends while it is empty. After `close`, buffered
 * values are still delivered and then `next` reports `done`.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private readonly buffer: Entry<T>[] = [];
  private readonly takers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private readonly putters: Array<() => void> = [];
  private closed = false;

  constructor(private readonly capacity = 100) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(value: T): Promise<void> {
    for (;;) {
      if (this.closed) {
        throw new QueueClosedError();
      }

      const taker = this.takers.shift();
      if (taker) {
        taker({ value, done: false });
        return;
      }

      if (this.buffer.length < this.capacity) {
        this.buffer.push({ value });
        return;
      }

      await new Promise<void>((resolve) => {
        this.putters.push(resolve);
      });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      this.putters.shift()?.();
      return Promise.resolve({ value: entry.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const taker of this.takers.splice(0)) {
      taker({ value: undefined, done: true });
    }
    for (const putter of this.putters.splice(0)) {
      putter();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() };
  }
}
