import { ChannelClosedError } from './errors.js';

type Waiter<T> = (res: IteratorResult<T, undefined>) => void;

/**
 * Bounded FIFO shared by many producers and consumers.
 * `send` never blocks; `close` seals it once; receivers drain what is left
 * and then see `done`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private sealed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`channel capacity must be an integer >= 0, got ${capacity}`);
    }
  }

  get closed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.items.length;
  }

  send(item: T): void {
    if (this.sealed) throw new ChannelClosedError('cannot send on a closed channel');
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: item, done: false });
      return;
    }
    if (this.items.length >= this.capacity) {
      throw new RangeError(`channel is full (capacity ${this.capacity})`);
    }
    this.items.push(item);
  }

  close(): void {
    if (this.sealed) throw new ChannelClosedError();
    this.sealed = true;
    // Anyone still waiting will never get an item
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (this.sealed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }
}
