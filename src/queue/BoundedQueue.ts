import { InvalidArgumentError, QueueEmptyError } from "../errors";

export function assertValidCapacity(capacity: number | undefined): void {
  if (capacity === undefined) return;
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new InvalidArgumentError(`Capacity must be a positive integer, got ${capacity}`);
  }
}

/**
 * FIFO item storage with an optional logical capacity.
 * Storage itself is unbounded; `capacity` only drives `push` and `isFull`.
 */
export class BoundedQueue<T> {
  private items: T[];
  readonly capacity: number | undefined;

  constructor(capacity?: number) {
    assertValidCapacity(capacity);
    this.capacity = capacity;
    this.items = [];
  }

  push(item: T): boolean {
    if (this.isFull) return false;
    this.items.push(item);
    return true;
  }

  /** Appends regardless of capacity. Used to refill a slot that was just freed. */
  forcePush(item: T): void {
    this.items.push(item);
  }

  /** Throws on an empty buffer so `undefined` items stay unambiguous. */
  dequeue(): T {
    if (this.isEmpty) throw new QueueEmptyError();
    return this.items.splice(0, 1)[0];
  }

  head(): T {
    if (this.isEmpty) throw new QueueEmptyError();
    return this.items[0];
  }

  clear(): T[] {
    const discarded = this.items;
    this.items = [];
    return discarded;
  }

  toArray(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  get isFull(): boolean {
    return this.capacity !== undefined && this.size >= this.capacity;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }
}
