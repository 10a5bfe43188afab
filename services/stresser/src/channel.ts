/**
 * Bounded FIFO between many producers and a single consumer. Producers never wait:
 * `trySend` reports `false` when the buffer is full. Iteration ends once the channel
 * is closed and every buffered item has been delivered.
 */
export class ResultChannel<T extends object> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private capacity: number;
  private closed = false;
  private waiter: (() => void) | null = null;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`channel capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  trySend(item: T): boolean {
    if (this.closed) {
      throw new Error('send on closed channel');
    }
    if (this.buffer.length >= this.capacity) {
      return false;
    }
    this.buffer.push(item);
    this.wake();
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.wake();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = this.buffer.shift();
      if (item !== undefined) {
        yield item;
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter();
    }
  }
}
