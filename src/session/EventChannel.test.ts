import { describe, expect, it } from 'vitest';
import { EventChannel } from './EventChannel';
import type { SessionEvent } from './types';

function disconnected(requestId: string): SessionEvent {
  return { type: 'disconnected', requestId };
}

describe('EventChannel', () => {
  it('makes a publisher wait while the queue is full', async () => {
    const channel = new EventChannel(1);
    await channel.publish(disconnected('a'));

    let stored = false;
    const publishing = channel.publish(disconnected('b')).then(() => {
      stored = true;
    });
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(stored).toBe(false);

    expect(channel.poll()?.requestId).toBe('a');
    await publishing;
    expect(channel.drain().map((event) => event.requestId)).toEqual(['b']);
  });

  it('gives the waiting event to a new subscriber before later ones', async () => {
    const channel = new EventChannel(1);
    const received: string[] = [];
    await channel.publish(disconnected('a'));
    const publishing = channel.publish(disconnected('b'));

    channel.subscribe((event) => received.push(event.requestId));
    await publishing;
    await channel.publish(disconnected('c'));

    expect(received).toEqual(['a', 'b', 'c']);
    expect(channel.pending).toBe(0);
  });

  it('queues past capacity once closed', async () => {
    const channel = new EventChannel(1);
    await channel.publish(disconnected('a'));
    const publishing = channel.publish(disconnected('b'));

    channel.close();
    await publishing;
    await channel.publish(disconnected('c'));

    expect(channel.drain().map((event) => event.requestId)).toEqual(['a', 'b', 'c']);
  });

  it('keeps delivering when a listener throws', async () => {
    const channel = new EventChannel(4);
    const received: string[] = [];
    channel.subscribe(() => {
      throw new Error('listener failure');
    });
    channel.subscribe((event) => received.push(event.requestId));

    await channel.publish(disconnected('a'));
    expect(received).toEqual(['a']);
  });
});
