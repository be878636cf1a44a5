/**
 * Fixed-capacity ring buffer. `push` is O(1); once full, each push evicts the
 * oldest entry. Iteration and `toArray()` run oldest to newest.
 */
export class RingBuffer<T> {
  private readonly items: (T | undefined)[];
  private head = 0;   // index of the oldest entry
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get length(): number { return this.count; }

  push(item: T): void {
    const tail = (this.head + this.count) % this.capacity;
    this.items[tail] = item;
    if (this.count < this.capacity) {
      this.count++;
    } else {
      this.head = (this.head + 1) % this.capacity;
    }
  }

  toArray(): T[] {
    const out: T[] = [];
    for (const item of this) out.push(item);
    return out;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.count; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (item !== undefined) yield item;
    }
  }
}
