import { describe, expect, it } from 'vitest';

import { AsyncQueue, QueueClosedError } from '@/reposync/lib/async-queue';

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('AsyncQueue', () => {
  it('delivers buffered values after close and then reports done', async () => {
    const queue = new AsyncQueue<number>(4);
    await queue.push(1);
    await queue.push(2);
    queue.close();

    expect(await queue.next()).toEqual({ value: 1, done: false });
    expect(await queue.next()).toEqual({ value: 2, done: false });
    expect(await queue.next()).toEqual({ value: undefined, done: true });
  });

  it('suspends producers while the buffer is full', async () => {
    const queue = new AsyncQueue<string>(1);
    await queue.push('first');

    let delivered = false;
    const pending = queue.push('second').then(() => {
      delivered = true;
    });
    await tick();
    expect(delivered).toBe(false);

    expect(await queue.next()).toEqual({ value: 'first', done: false });
    await pending;
    expect(delivered).toBe(true);
    expect(await queue.next()).toEqual({ value: 'second', done: false });
  });

  it('hands a value straight to a waiting consumer', async () => {
    const queue = new AsyncQueue<string>(1);
    const waiting = queue.next();
    await queue.push('direct');

    expect(await waiting).toEqual({ value: 'direct', done: false });
    expect(queue.size).toBe(0);
  });

  it('wakes waiting consumers when closed', async () => {
    const queue = new AsyncQueue<number>();
    const waiting = queue.next();
    queue.close();

    expect(await waiting).toEqual({ value: undefined, done: true });
    expect(queue.isClosed).toBe(true);
  });

  it('rejects pushes after close', async () => {
    const queue = new AsyncQueue<number>();
    queue.close();

    await expect(queue.push(1)).rejects.toBeInstanceOf(QueueClosedError);
  });

  it('iterates until closed', async () => {
    const queue = new AsyncQueue<number>(2);
    const producer = (async () => {
      for (const value of [1, 2, 3, 4]) {
        await queue.push(value);
      }
      queue.close();
    })();

    const seen: number[] = [];
    for await (const value of queue) {
      seen.push(value);
    }
    await producer;

    expect(seen).toEqual([1, 2, 3, 4]);
  });

  it('refuses a capacity below one', () => {
    expect(() => new AsyncQueue<number>(0)).toThrow('Queue capacity must be a positive integer, got 0');
  });
});
