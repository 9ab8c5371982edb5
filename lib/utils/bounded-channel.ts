/**
 * Bounded single-producer, single-consumer channel.
 *
 * `send` resolves once the value is buffered; when the buffer is full it waits
 * until the consumer takes something. A consumer that stops early (`return()`
 * on the iterator, e.g. `break` in `for await`) cancels the channel: pending
 * and later sends resolve to `false` and the buffer is dropped.
 */

interface PendingRead<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

export interface ChannelControl {
  readonly cancelled: boolean;
}

export class BoundedChannel<T extends object> implements AsyncIterable<T>, ChannelControl {
  private buffer: T[] = [];
  private closed = false;
  private isCancelled = false;
  private failure: { error: unknown } | null = null;
  private pendingRead: PendingRead<T> | null = null;
  private blockedWriters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get cancelled(): boolean {
    return this.isCancelled;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  async send(value: T): Promise<boolean> {
    while (!this.isCancelled && !this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.blockedWriters.push(resolve));
    }

    if (this.isCancelled || this.closed) {
      return false;
    }

    if (this.pendingRead) {
      const { resolve } = this.pendingRead;
      this.pendingRead = null;
      resolve({ value, done: false });
      return true;
    }

    this.buffer.push(value);
    return true;
  }

  /** Producer is done; the consumer drains what is buffered, then ends. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.settlePendingRead();
    this.wakeWriters();
  }

  /** Producer failed; the consumer drains the buffer, then receives `error`. */
  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.failure = { error };
    this.close();
  }

  /** Consumer is gone; drop the buffer and release the producer. */
  cancel(): void {
    this.isCancelled = true;
    this.buffer = [];
    this.settlePendingRead();
    this.wakeWriters();
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const value = this.buffer.shift();
    if (value !== undefined) {
      this.wakeWriters();
      return Promise.resolve({ value, done: false });
    }

    if (this.closed || this.isCancelled) {
      return this.finish();
    }

    return new Promise((resolve, reject) => {
      this.pendingRead = { resolve, reject };
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private finish(): Promise<IteratorResult<T, undefined>> {
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }
    return Promise.resolve({ value: undefined, done: true });
  }

  private settlePendingRead(): void {
    if (!this.pendingRead) {
      return;
    }
    const { resolve, reject } = this.pendingRead;
    this.pendingRead = null;
    this.finish().then(resolve, reject);
  }

  private wakeWriters(): void {
    const writers = this.blockedWriters;
    this.blockedWriters = [];
    for (const wake of writers) {
      wake();
    }
  }
}
