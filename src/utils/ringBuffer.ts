/**
 * Fixed-capacity FIFO; pushing past capacity drops the oldest entry.
 */
export class RingBuffer<T> {
  private items: T[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`RingBuffer capacity must be a positive integer, got ${capacity}`);
    }
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this.items];
  }

  latest(count: number): T[] {
    return count <= 0 ? [] : this.items.slice(-count);
  }

  get size(): number {
    return this.items.length;
  }
}
