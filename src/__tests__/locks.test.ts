import { describe, expect, it } from 'vitest';

import { KeyedMutex } from '@utils/locks.js';
import { DeadlineExceededError, withDeadline } from '@utils/timeout.js';

describe('KeyedMutex', () => {
  it('runs work for the same key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.withLock('whatsapp:1', async () => {
      order.push('first:start');
      await firstGate;
      order.push('first:end');
    });
    const second = mutex.withLock('whatsapp:1', async () => {
      order.push('second');
    });
    const other = mutex.withLock('whatsapp:2', async () => {
      order.push('other');
    });

    await other;
    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'other', 'first:end', 'second']);
    expect(mutex.size).toBe(0);
  });

  it('releases the key when the work throws', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.withLock('k', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(await mutex.withLock('k', async () => 'next')).toBe('next');
  });
});

describe('withDeadline', () => {
  it('returns the result when the work finishes in time', async () => {
    expect(await withDeadline(async () => 'done', 100)).toBe('done');
  });

  it('rejects and aborts the signal when time runs out', async () => {
    let aborted = false;

    await expect(
      withDeadline(
        (signal) =>
          new Promise<string>(() => {
            signal.addEventListener('abort', () => {
              aborted = true;
            });
          }),
        10,
      ),
    ).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(aborted).toBe(true);
  });
});
