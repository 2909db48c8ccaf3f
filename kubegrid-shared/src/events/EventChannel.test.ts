import { describe, it, expect } from 'vitest';
import { EventChannel } from './EventChannel';

describe('EventChannel', () => {
  it('delivers queued events in send order', async () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.send(2);
    expect(await channel.next()).toBe(1);
    expect(await channel.next()).toBe(2);
  });

  it('wakes a waiting consumer', async () => {
    const channel = new EventChannel<string>();
    const pending = channel.next();
    channel.send('tick');
    expect(await pending).toBe('tick');
  });

  it('drains without waiting', () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.send(2);
    channel.send(3);
    expect(channel.drain()).toEqual([1, 2, 3]);
    expect(channel.pending).toBe(0);
    expect(channel.drain()).toEqual([]);
  });

  it('resolves a waiting consumer with null on close', async () => {
    const channel = new EventChannel<number>();
    const pending = channel.next();
    channel.close();
    expect(await pending).toBeNull();
  });

  it('drops sends after close but keeps queued events readable', async () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.close();
    expect(channel.send(2)).toBe(false);
    expect(await channel.next()).toBe(1);
    expect(await channel.next()).toBeNull();
  });

  it('iterates until closed', async () => {
    const channel = new EventChannel<number>();
    channel.send(1);
    channel.send(2);
    setTimeout(() => {
      channel.send(3);
      channel.close();
    }, 0);
    const seen: number[] = [];
    for await (const n of channel) seen.push(n);
    expect(seen).toEqual([1, 2, 3]);
  });
});
