/**
 * Fixed-capacity FIFO buffer. Once full, each push overwrites the oldest item.
 */
export class RingBuffer<T> {
  private readonly items: (T | undefined)[];
  private head = 0; // index of the oldest item
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  /**
   * Append an item, returning the evicted one when the buffer was full
   */
  push(item: T): T | undefined {
    if (this.length < this.capacity) {
      this.items[(this.head + this.length) % this.capacity] = item;
      this.length++;
      return undefined;
    }

    const evicted = this.items[this.head];
    this.items[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /**
   * Items oldest first
   */
  toArray(): T[] {
    return this.last(this.length);
  }

  /**
   * The newest `count` items, oldest first
   */
  last(count: number): T[] {
    const n = Math.max(0, Math.min(Math.floor(count), this.length));
    const result: T[] = [];
    for (let i = this.length - n; i < this.length; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }

  newest(): T | undefined {
    if (this.length === 0) {
      return undefined;
    }
    return this.items[(this.head + this.length - 1) % this.capacity];
  }

  *[Symbol.iterator](): IterableIterator<T> {
    yield* this.toArray();
  }

  clear(): void {
    this.items.fill(undefined);
    this.head = 0;
    this.length = 0;
  }
}
