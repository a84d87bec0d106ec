import { describe, expect, test } from 'vitest';
import { BoundedChannel, ChannelClosedError } from '../../src/stream/channel';
import { collect } from '../utils/streams';

describe('BoundedChannel', () => {
  test('delivers items in order and ends after close', async () => {
    const channel = new BoundedChannel<number>(4);
    await channel.send(1);
    await channel.send(2);
    channel.close();
    expect(await collect(channel)).toEqual([1, 2]);
  });

  test('send suspends at capacity until the consumer takes an item', async () => {
    const channel = new BoundedChannel<string>(1);
    await channel.send('a');

    let secondQueued = false;
    const second = channel.send('b').then(() => {
      secondQueued = true;
    });
    await Promise.resolve();
    expect(secondQueued).toBe(false);
    expect(channel.size).toBe(1);

    expect(await channel.receive()).toEqual({ value: 'a', done: false });
    await second;
    expect(secondQueued).toBe(true);
    expect(await channel.receive()).toEqual({ value: 'b', done: false });
  });

  test('a waiting receiver gets the next item directly', async () => {
    const channel = new BoundedChannel<string>(1);
    const pending = channel.receive();
    await channel.send('x');
    expect(await pending).toEqual({ value: 'x', done: false });
  });

  test('close rejects blocked and later senders', async () => {
    const channel = new BoundedChannel<number>(1);
    await channel.send(1);
    const blocked = channel.send(2);
    channel.close();
    await expect(blocked).rejects.toThrow(ChannelClosedError);
    await expect(channel.send(3)).rejects.toThrow(ChannelClosedError);
    // Queued items survive the close
    expect(await channel.receive()).toEqual({ value: 1, done: false });
    expect(await channel.receive()).toEqual({ value: undefined, done: true });
  });

  test('fail surfaces the error after queued items drain', async () => {
    const channel = new BoundedChannel<number>(2);
    await channel.send(1);
    channel.fail(new Error('upstream broke'));
    expect(await channel.receive()).toEqual({ value: 1, done: false });
    await expect(channel.receive()).rejects.toThrow('upstream broke');
  });

  test('breaking out of iteration closes the channel', async () => {
    const channel = new BoundedChannel<number>(2);
    await channel.send(1);
    for await (const _item of channel) {
      break;
    }
    expect(channel.isClosed).toBe(true);
  });

  test('receive listeners fire as the consumer takes each item', async () => {
    const channel = new BoundedChannel<string>(2);
    const taken: string[] = [];
    const stop = channel.onReceive((item) => taken.push(item));

    await channel.send('queued');
    expect(taken).toEqual([]);
    await channel.receive();
    expect(taken).toEqual(['queued']);

    const waiting = channel.receive();
    await channel.send('handed-over');
    expect(taken).toEqual(['queued', 'handed-over']);
    expect(await waiting).toEqual({ value: 'handed-over', done: false });

    stop();
    await channel.send('unobserved');
    await channel.receive();
    expect(taken).toEqual(['queued', 'handed-over']);
  });

  test('rejects a non-positive capacity', () => {
    expect(() => new BoundedChannel(0)).toThrow(RangeError);
  });
});
