type PendingReader<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbounded single-consumer queue bridging a push-style producer (a bus
 * callback) and an async-iterating consumer.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly readers: PendingReader<T>[] = [];
  private closed = false;

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the channel is closed; the value is dropped. */
  send(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const reader = this.readers.shift();
    if (reader) {
      reader({ value, done: false });
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** Buffered values are still delivered before the iterator finishes. */
  close() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const reader of this.readers.splice(0, this.readers.length)) {
      reader({ value: undefined, done: true });
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise(resolve => {
      this.readers.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive()
    };
  }
}
