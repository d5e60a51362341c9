interface Taker<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Bounded FIFO shared between a producer and a single consumer.
 *
 * Producers either offer (fail fast when full) or put (wait for room);
 * the consumer polls or takes with a timeout.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly capacity: number;
  private takers: Taker<T>[] = [];
  private putters: Array<() => void> = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  /**
   * Enqueue without waiting.
   * @returns false when the queue is full and the item was not added
   */
  offer(item: T): boolean {
    const taker = this.takers.shift();
    if (taker) {
      if (taker.timer) clearTimeout(taker.timer);
      taker.resolve(item);
      return true;
    }
    if (this.isFull()) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * Enqueue even when the queue is full
   */
  append(item: T): void {
    if (!this.offer(item)) {
      this.items.push(item);
    }
  }

  /**
   * Enqueue, waiting for room if the queue is full
   */
  async put(item: T): Promise<void> {
    while (!this.offer(item)) {
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
  }

  /**
   * Dequeue without waiting
   */
  poll(): T | undefined {
    if (this.items.length === 0) {
      return undefined;
    }
    const item = this.items.shift();
    this.putters.shift()?.();
    return item;
  }

  /**
   * Dequeue, waiting up to timeoutMs for an item
   * @returns undefined if nothing arrived in time
   */
  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.poll());
    }

    return new Promise<T | undefined>((resolve) => {
      const taker: Taker<T> = { resolve, timer: null };
      taker.timer = setTimeout(() => {
        this.takers = this.takers.filter((t) => t !== taker);
        resolve(undefined);
      }, timeoutMs);
      // An idle consumer must not keep the process alive
      taker.timer.unref();
      this.takers.push(taker);
    });
  }

  /**
   * Remove and return everything currently queued
   */
  drain(): T[] {
    const drained: T[] = [];
    let item = this.poll();
    while (item !== undefined) {
      drained.push(item);
      item = this.poll();
    }
    return drained;
  }
}
