/**
 * Generic fixed-capacity circular buffer.
 * When full, `push` overwrites the oldest entry and returns it.
 */
export class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0; // next write position
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("RingBuffer capacity must be a positive integer");
    }
    this.buffer = new Array<T | undefined>(capacity);
  }

  /** Append an item; returns the evicted oldest item when the buffer was full. */
  push(item: T): T | undefined {
    let evicted: T | undefined;
    if (this.count === this.capacity) {
      evicted = this.buffer[this.head];
    } else {
      this.count++;
    }
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted;
  }

  /** Remove and return the oldest item. */
  shift(): T | undefined {
    if (this.count === 0) return undefined;
    const tail = (this.head - this.count + this.capacity) % this.capacity;
    const item = this.buffer[tail];
    this.buffer[tail] = undefined;
    this.count--;
    return item;
  }

  /** Return items in insertion order (oldest first). */
  toArray(): T[] {
    const result: T[] = [];
    const start = (this.head - this.count + this.capacity) % this.capacity;
    for (let i = 0; i < this.count; i++) {
      const item = this.buffer[(start + i) % this.capacity];
      if (item !== undefined) result.push(item);
    }
    return result;
  }

  get size(): number {
    return this.count;
  }

  get isFull(): boolean {
    return this.count === this.capacity;
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}
