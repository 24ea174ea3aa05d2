import { EventEmitter } from 'node:events';
import type { Logger } from 'pino';

import { BoundedQueue } from './BoundedQueue';
import { PendingRegistry } from './PendingRegistry';
import { QueueMetrics, QueueMetricsSnapshot } from '../metrics/metrics';
import { QueueCancelledError, QueueClosedError, isAbortError } from '../errors';
import { QueueEventMap } from '../types/QueueEvents';
import defaultLogger from '../utils/logger';

export type ItemHook<T> = (item: T) => void;

export interface QueueOptions<T> {
  /** Maximum number of buffered items. Unlimited when omitted. */
  capacity?: number;
  /** Used in log bindings and `getName()`. */
  name?: string;
  onAdd?: ItemHook<T>;
  onRemove?: ItemHook<T>;
  logger?: Logger;
}

interface DrainWaiter {
  promise: Promise<void>;
  resolve: () => void;
  reject: (error: Error) => void;
}

function createDrainWaiter(): DrainWaiter {
  let resolve: () => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * FIFO queue shared by any number of producers and consumers.
 *
 * - `add` suspends while the queue is at capacity.
 * - `take` suspends while the queue is empty.
 * - `wait` suspends until the queue has been drained.
 *
 * Every state change happens within a single synchronous turn of the event
 * loop, so suspended callers never observe a half-updated queue.
 */
class AsyncQueue<T> extends EventEmitter {
  private buffer: BoundedQueue<T>;
  private producers = new PendingRegistry<T, void>();
  private consumers = new PendingRegistry<void, T>();
  private drainWaiter: DrainWaiter | null = null;
  private closed: boolean = false;
  private metrics: QueueMetrics = new QueueMetrics();
  private log: Logger;
  private queueName: string;

  onAdd?: ItemHook<T>;
  onRemove?: ItemHook<T>;

  constructor(options: QueueOptions<T> = {}) {
    super();
    this.buffer = new BoundedQueue<T>(options.capacity);
    this.queueName = options.name ?? 'async-queue';
    this.onAdd = options.onAdd;
    this.onRemove = options.onRemove;
    this.log = (options.logger ?? defaultLogger).child({ queue: this.queueName });
  }

  get capacity(): number | undefined {
    return this.buffer.capacity;
  }

  get length(): number {
    return this.buffer.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isFull(): boolean {
    return this.buffer.isFull;
  }

  get isEmpty(): boolean {
    return this.buffer.isEmpty;
  }

  get pendingProducers(): number {
    return this.producers.size;
  }

  get pendingConsumers(): number {
    return this.consumers.size;
  }

  /**
   * Appends `item`, waiting for room when the queue is full.
   *
   * Rejects with `QueueTimeoutError` if no room was made within `timeoutMs`;
   * the item is then not enqueued. Rejects with `QueueCancelledError` on
   * `clear()` and `QueueClosedError` on `close()`.
   */
  async add(item: T, timeoutMs?: number): Promise<void> {
    if (this.closed) throw new QueueClosedError();

    if (this.buffer.push(item)) {
      this.metrics.incrementItemsAdded();
      this.metrics.updateQueueLength(this.buffer.size);
      const delivered = this.handOff();

      // Hooks and listeners only run once the queue is consistent again.
      this.notifyInserted(item);
      if (delivered) {
        this.notifyRemoved(delivered.item);
        this.checkDrain();
      }
      return;
    }

    this.metrics.incrementBlockedProducers();
    // The producer's item is placed by admitProducer() once a take frees a slot.
    await this.producers.register(item, {
      timeoutMs,
      operation: 'add',
      onTimeout: (ms) => this.recordTimeout('add', ms),
    });
  }

  /** Adds items one by one. Items added before a failure stay in the queue. */
  async addAll(items: Iterable<T>): Promise<void> {
    for (const item of items) {
      await this.add(item);
    }
  }

  /** Removes and returns the head item, waiting for one when the queue is empty. */
  async take(timeoutMs?: number): Promise<T> {
    if (this.closed) throw new QueueClosedError();

    if (!this.buffer.isEmpty) {
      const item = this.buffer.dequeue();
      this.metrics.incrementItemsRemoved();
      this.metrics.updateQueueLength(this.buffer.size);
      const admitted = this.admitProducer();

      this.notifyRemoved(item);
      if (admitted) this.notifyInserted(admitted.item);
      this.checkDrain();
      return item;
    }

    this.metrics.incrementBlockedConsumers();
    return this.consumers.register(undefined, {
      timeoutMs,
      operation: 'take',
      onTimeout: (ms) => this.recordTimeout('take', ms),
    });
  }

  peek(): T {
    if (this.closed) throw new QueueClosedError();
    return this.buffer.head();
  }

  toArray(): T[] {
    return this.buffer.toArray();
  }

  /** Empties the queue and rejects every pending operation with `QueueCancelledError`. */
  clear(): void {
    const discarded = this.buffer.clear();
    this.metrics.updateQueueLength(0);

    const aborted = this.abortPending(new QueueCancelledError());
    if (discarded.length > 0 || aborted > 0) {
      this.log.debug({ discarded: discarded.length, aborted }, 'queue cleared');
    }
    this.emitEvent('queue:cleared', { discarded: discarded.length });
  }

  /**
   * Closes the queue and rejects every pending operation with `QueueClosedError`.
   * Buffered items are kept until `clear()`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const aborted = this.abortPending(new QueueClosedError("Queue was closed"));
    this.log.debug({ remaining: this.buffer.size, aborted }, 'queue closed');
    this.emitEvent('queue:closed');
  }

  /** Resolves once the queue is empty. Concurrent callers share one promise. */
  wait(): Promise<void> {
    if (this.buffer.isEmpty) return Promise.resolve();
    if (this.closed) return Promise.reject(new QueueClosedError("Queue is closed and can no longer drain"));

    if (!this.drainWaiter) {
      this.drainWaiter = createDrainWaiter();
    }
    return this.drainWaiter.promise;
  }

  getName(): string {
    return this.queueName;
  }

  getMetrics(): QueueMetricsSnapshot {
    return this.metrics.getSnapshot();
  }

  getPrometheusMetrics(): string {
    return this.metrics.toPrometheusFormat();
  }

  resetMetrics(): void {
    this.metrics.reset();
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    const self = this;
    return {
      async next(): Promise<IteratorResult<T>> {
        try {
          const value = await self.take();
          return { value, done: false };
        } catch (error) {
          if (isAbortError(error)) return { value: undefined, done: true };
          throw error;
        }
      },
      [Symbol.asyncIterator]() {
        return this;
      }
    };
  }

  /** Passes the head item straight to the longest-waiting consumer. */
  private handOff(): { item: T } | null {
    if (this.buffer.isEmpty) return null;
    const consumer = this.consumers.shift();
    if (!consumer) return null;

    const item = this.buffer.dequeue();
    this.metrics.incrementItemsRemoved();
    this.metrics.incrementHandOffs();
    this.metrics.updateQueueLength(this.buffer.size);
    this.metrics.recordBlockedTime(Date.now() - consumer.registeredAt);
    consumer.resolve(item);
    return { item };
  }

  /** Refills the slot a take just freed with the longest-waiting producer's item. */
  private admitProducer(): { item: T } | null {
    if (this.buffer.isFull) return null;
    const producer = this.producers.shift();
    if (!producer) return null;

    this.buffer.forcePush(producer.payload);
    this.metrics.incrementItemsAdded();
    this.metrics.updateQueueLength(this.buffer.size);
    this.metrics.recordBlockedTime(Date.now() - producer.registeredAt);
    producer.resolve();
    return { item: producer.payload };
  }

  private checkDrain(): void {
    if (!this.buffer.isEmpty) return;

    const waiter = this.drainWaiter;
    this.drainWaiter = null;
    waiter?.resolve();
    this.emitEvent('queue:drained');
  }

  private abortPending(error: Error): number {
    let aborted = this.producers.rejectAll(error) + this.consumers.rejectAll(error);

    const waiter = this.drainWaiter;
    this.drainWaiter = null;
    if (waiter) {
      waiter.reject(error);
      aborted++;
    }

    this.metrics.addCancellations(aborted);
    return aborted;
  }

  private notifyInserted(item: T): void {
    this.runHook('onAdd', item);
    this.emitEvent('item:added', item);
    if (this.buffer.isFull) this.emitEvent('queue:full');
  }

  private notifyRemoved(item: T): void {
    this.runHook('onRemove', item);
    this.emitEvent('item:removed', item);
  }

  private recordTimeout(operation: 'add' | 'take', timeoutMs: number): void {
    this.metrics.incrementTimeouts();
    this.log.debug({ operation, timeoutMs }, 'queue operation timed out');
    this.emitEvent('operation:timeout', { operation, timeoutMs });
  }

  private emitEvent<K extends keyof QueueEventMap<T>>(
    event: K,
    ...args: [] | [QueueEventMap<T>[K]]
  ): void {
    this.emit(event, ...args);
  }

  // A throwing hook is logged only; the mutation it follows stands.
  private runHook(hook: 'onAdd' | 'onRemove', item: T): void {
    const fn = this[hook];
    if (!fn) return;
    try {
      fn(item);
    } catch (error) {
      this.log.error(
        { err: error instanceof Error ? error : new Error(String(error)), hook, length: this.buffer.size },
        'queue hook threw'
      );
    }
  }
};

export { AsyncQueue };
