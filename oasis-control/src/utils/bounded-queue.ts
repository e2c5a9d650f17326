/**
 * FIFO with a fixed capacity. Pushing onto a full queue evicts the oldest
 * entry and hands it back to the caller.
 */
export class BoundedQueue<T> {
  private items: T[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  push(item: T): T | undefined {
    let dropped: T | undefined;
    if (this.items.length >= this.capacity) {
      dropped = this.items.shift();
    }
    this.items.push(item);
    return dropped;
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  clear(): number {
    const count = this.items.length;
    this.items = [];
    return count;
  }

  toArray(): T[] {
    return [...this.items];
  }
}
