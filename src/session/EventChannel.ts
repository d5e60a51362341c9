import { BoundedQueue } from './BoundedQueue';
import type { SessionEvent, SessionEventListener } from './types';

/**
 * Result side of the session: events queue up for polling until somebody
 * subscribes, after which they are delivered to subscribers directly.
 *
 * A publisher facing a full queue waits until the queue is consumed, a
 * subscriber arrives or the channel is closed. Once closed, events are queued
 * past capacity so the producer can always finish.
 */
export class EventChannel {
  private readonly queue: BoundedQueue<SessionEvent>;
  private listeners: Set<SessionEventListener> = new Set();
  private waiters: Array<() => void> = [];
  private closing: boolean = false;

  constructor(capacity: number) {
    this.queue = new BoundedQueue<SessionEvent>(capacity);
  }

  async publish(event: SessionEvent): Promise<void> {
    for (;;) {
      if (this.listeners.size > 0) {
        this.dispatch(event);
        return;
      }
      if (this.queue.offer(event)) {
        return;
      }
      if (this.closing) {
        this.queue.append(event);
        return;
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }
  }

  /**
   * Stop making publishers wait for room
   */
  close(): void {
    this.closing = true;
    this.wake();
  }

  poll(): SessionEvent | undefined {
    const event = this.queue.poll();
    if (event !== undefined) {
      this.wake();
    }
    return event;
  }

  drain(): SessionEvent[] {
    const events = this.queue.drain();
    if (events.length > 0) {
      this.wake();
    }
    return events;
  }

  get pending(): number {
    return this.queue.size;
  }

  subscribe(listener: SessionEventListener): () => void {
    this.listeners.add(listener);
    for (const event of this.queue.drain()) {
      this.dispatch(event);
    }
    // A waiting publisher now hands its event to the listener
    this.wake();
    return () => {
      this.listeners.delete(listener);
    };
  }

  private wake(): void {
    for (const resolve of this.waiters.splice(0)) {
      resolve();
    }
  }

  private dispatch(event: SessionEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('[EngineSession] Event listener threw:', error);
      }
    }
  }
}
