/**
 * Raised to a sender when the channel closed before its item was accepted.
 */
export class ChannelClosedError extends Error {
  constructor() {
    super("Channel closed");
    this.name = "ChannelClosedError";
  }
}

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface PendingReceive<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: Error) => void;
}

/**
 * Single-producer/single-consumer queue with a fixed capacity.
 *
 * `send` suspends while the buffer is full, so a producer never runs further
 * ahead of its consumer than `capacity` items. Closing with an error discards
 * buffered items and rejects the consumer's next read with that error.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private closed = false;
  private failure: Error | undefined;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }
    if (this.deliver(item)) {
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  /**
   * Non-suspending variant of {@link send}. Returns false when the item was not accepted.
   */
  trySend(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.deliver(item)) {
      return true;
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return true;
    }
    return false;
  }

  /**
   * Ends the stream. Without an error, items already buffered are still delivered.
   */
  close(error?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.failure = error;
    if (error) {
      this.buffer.splice(0, this.buffer.length);
    }
    for (const sender of this.senders.splice(0, this.senders.length)) {
      sender.reject(new ChannelClosedError());
    }
    for (const receiver of this.receivers.splice(0, this.receivers.length)) {
      if (error) {
        receiver.reject(error);
      } else {
        receiver.resolve({ value: undefined, done: true });
      }
    }
  }

  receive(): Promise<IteratorResult<T>> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.buffer.length > 0) {
      const [item] = this.buffer.splice(0, 1);
      this.admitWaitingSender();
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise<IteratorResult<T>>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
    };
  }

  private deliver(item: T): boolean {
    if (this.receivers.length === 0) {
      return false;
    }
    const [receiver] = this.receivers.splice(0, 1);
    receiver.resolve({ value: item, done: false });
    return true;
  }

  private admitWaitingSender(): void {
    if (this.senders.length === 0) {
      return;
    }
    const [sender] = this.senders.splice(0, 1);
    this.buffer.push(sender.item);
    sender.resolve();
  }
}
