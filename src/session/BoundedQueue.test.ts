import { describe, expect, it } from 'vitest';
import { BoundedQueue } from './BoundedQueue';

describe('BoundedQueue', () => {
  it('is first in, first out', () => {
    const queue = new BoundedQueue<number>(3);
    queue.offer(1);
    queue.offer(2);
    queue.offer(3);
    expect(queue.drain()).toEqual([1, 2, 3]);
    expect(queue.poll()).toBeUndefined();
  });

  it('refuses offers beyond capacity', () => {
    const queue = new BoundedQueue<string>(2);
    expect(queue.offer('a')).toBe(true);
    expect(queue.offer('b')).toBe(true);
    expect(queue.offer('c')).toBe(false);
    expect(queue.isFull()).toBe(true);
    expect(queue.size).toBe(2);
  });

  it('take waits for the next item', async () => {
    const queue = new BoundedQueue<string>(1);
    const taken = queue.take(1000);
    queue.offer('late');
    await expect(taken).resolves.toBe('late');
    expect(queue.size).toBe(0);
  });

  it('take gives up after the timeout', async () => {
    const queue = new BoundedQueue<string>(1);
    await expect(queue.take(20)).resolves.toBeUndefined();
    // A timed-out taker must not swallow later items
    queue.offer('kept');
    expect(queue.poll()).toBe('kept');
  });

  it('put waits until the consumer makes room', async () => {
    const queue = new BoundedQueue<number>(1);
    queue.offer(1);
    let stored = false;
    const putting = queue.put(2).then(() => {
      stored = true;
    });

    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(stored).toBe(false);

    expect(queue.poll()).toBe(1);
    await putting;
    expect(stored).toBe(true);
    expect(queue.poll()).toBe(2);
  });

  it('appends past capacity on request', () => {
    const queue = new BoundedQueue<number>(1);
    queue.offer(1);
    queue.append(2);
    expect(queue.size).toBe(2);
    expect(queue.drain()).toEqual([1, 2]);
  });

  it('does not hold the process open while waiting', async () => {
    const queue = new BoundedQueue<string>(1);
    const timeouts = () => process.getActiveResourcesInfo().filter((type) => type === 'Timeout').length;

    const before = timeouts();
    const taken = queue.take(60000);
    expect(timeouts()).toBe(before);

    queue.offer('done');
    await expect(taken).resolves.toBe('done');
  });

  it('rejects a capacity below one', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError);
  });
});
