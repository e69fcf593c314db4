/**
 * Fixed-capacity FIFO over a circular array.
 *
 * The backing array is allocated once; when full, a push overwrites the oldest
 * slot and advances the head.
 */
export class RingBuffer<T> {
  private readonly slots: (T | undefined)[];
  private head  = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  /** Appends `item`, returning the evicted oldest item when the buffer was full. */
  push(item: T): T | undefined {
    const index = (this.head + this.count) % this.capacity;
    const evicted = this.count === this.capacity ? this.slots[index] : undefined;
    this.slots[index] = item;

    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;  // drop oldest
    }
    return evicted;
  }

  /** Copy of the contents, oldest first. */
  toArray(): T[] {
    const items: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) items.push(item);
    }
    return items;
  }

  get size(): number {
    return this.count;
  }
}
