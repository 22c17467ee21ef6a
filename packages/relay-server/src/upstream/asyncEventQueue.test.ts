import { describe, expect, it } from 'vitest';

import { AsyncEventQueue } from './asyncEventQueue';

describe('AsyncEventQueue', () => {
  it('delivers buffered items before waiting', async () => {
    const queue = new AsyncEventQueue<string>();
    queue.push('a');
    queue.push('b');

    expect(await queue.next()).toEqual({ value: 'a', done: false });
    expect(await queue.next()).toEqual({ value: 'b', done: false });
  });

  it('resolves a waiting consumer when an item arrives', async () => {
    const queue = new AsyncEventQueue<number>();
    const pending = queue.next();
    queue.push(7);

    expect(await pending).toEqual({ value: 7, done: false });
  });

  it('ends iteration after buffered items are drained', async () => {
    const queue = new AsyncEventQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.end();
    queue.push(3);

    const seen: number[] = [];
    for await (const item of queue) {
      seen.push(item);
    }
    expect(seen).toEqual([1, 2]);
    expect(queue.closed).toBe(true);
  });

  it('wakes a waiting consumer on end', async () => {
    const queue = new AsyncEventQueue<number>();
    const pending = queue.next();
    queue.end();

    expect(await pending).toEqual({ value: undefined, done: true });
  });

  it('raises the failure after buffered items', async () => {
    const queue = new AsyncEventQueue<string>();
    queue.push('last');
    queue.fail(new Error('socket reset'));

    expect(await queue.next()).toEqual({ value: 'last', done: false });
    await expect(queue.next()).rejects.toThrow('socket reset');
  });

  it('rejects a waiting consumer on failure', async () => {
    const queue = new AsyncEventQueue<string>();
    const pending = queue.next();
    queue.fail(new Error('gone'));

    await expect(pending).rejects.toThrow('gone');
  });

  it('ignores end and fail once closed', async () => {
    const queue = new AsyncEventQueue<string>();
    queue.end();
    queue.fail(new Error('late'));

    expect(await queue.next()).toEqual({ value: undefined, done: true });
  });
});
