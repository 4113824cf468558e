import { describe, it, expect } from 'vitest';
import { AsyncQueue, QueueClosedError } from '../src/core/async-queue.js';

describe('AsyncQueue', () => {
  it('delivers items in arrival order', async () => {
    const queue = new AsyncQueue<string>();
    queue.enqueue('a');
    queue.enqueue('b');

    expect(await queue.dequeue()).toBe('a');
    expect(await queue.dequeue()).toBe('b');
    expect(queue.length).toBe(0);
  });

  it('hands an item straight to a waiting consumer', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.dequeue();
    queue.enqueue(42);

    await expect(pending).resolves.toBe(42);
    expect(queue.length).toBe(0);
  });

  it('rejects waiting consumers when closed', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.dequeue();
    queue.close();

    await expect(pending).rejects.toBeInstanceOf(QueueClosedError);
    expect(queue.isClosed).toBe(true);
  });

  it('refuses new items after close', () => {
    const queue = new AsyncQueue<number>();
    queue.close();
    expect(() => queue.enqueue(1)).toThrow(QueueClosedError);
  });

  it('ends async iteration when closed', async () => {
    const queue = new AsyncQueue<string>();
    const seen: string[] = [];
    const consumer = (async () => {
      for await (const item of queue) {
        seen.push(item);
      }
    })();

    queue.enqueue('x');
    queue.enqueue('y');
    await new Promise((resolve) => setTimeout(resolve, 0));
    queue.close();
    await consumer;

    expect(seen).toEqual(['x', 'y']);
  });
});
