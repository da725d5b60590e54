import { describe, expect, it } from 'vitest';
import { Channel } from '../src/channel.js';
import { ChannelClosedError } from '../src/errors.js';

describe('Channel', () => {
  it('delivers items in FIFO order and ends after close', async () => {
    const ch = new Channel<number>(3);
    ch.send(1);
    ch.send(2);
    ch.send(3);
    ch.close();

    const seen: number[] = [];
    for await (const n of ch) seen.push(n);
    expect(seen).toEqual([1, 2, 3]);
  });

  it('hands an item straight to a waiting receiver', async () => {
    const ch = new Channel<string>(0);
    const pending = ch.receive();
    ch.send('a');
    await expect(pending).resolves.toEqual({ value: 'a', done: false });
    expect(ch.size).toBe(0);
  });

  it('releases waiting receivers with done when sealed', async () => {
    const ch = new Channel<string>(1);
    const a = ch.receive();
    const b = ch.receive();
    ch.close();
    await expect(a).resolves.toEqual({ value: undefined, done: true });
    await expect(b).resolves.toEqual({ value: undefined, done: true });
  });

  it('rejects sends past capacity', () => {
    const ch = new Channel<number>(1);
    ch.send(1);
    expect(() => ch.send(2)).toThrow(RangeError);
  });

  it('cannot be sealed twice or sent to once sealed', () => {
    const ch = new Channel<number>(1);
    ch.close();
    expect(ch.closed).toBe(true);
    expect(() => ch.close()).toThrow(ChannelClosedError);
    expect(() => ch.send(1)).toThrow(ChannelClosedError);
  });

  it('yields nothing on a second drain', async () => {
    const ch = new Channel<number>(2);
    ch.send(1);
    ch.send(2);
    ch.close();

    const first: number[] = [];
    for await (const n of ch) first.push(n);
    const second: number[] = [];
    for await (const n of ch) second.push(n);
    expect(first).toEqual([1, 2]);
    expect(second).toEqual([]);
  });

  it('rejects a negative capacity', () => {
    expect(() => new Channel<number>(-1)).toThrow(RangeError);
  });
});
