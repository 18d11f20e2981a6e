import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../../src/memory/thread-lock.js';
import { deferred } from '../../helpers/index.js';

describe('KeyedMutex', () => {
  it('should run tasks for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const gate = deferred<void>();

    const first = mutex.runExclusive('t1', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive('t1', async () => {
      events.push('second:start');
    });

    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(events).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should not block tasks on different keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred<void>();

    const blocked = mutex.runExclusive('t1', () => gate.promise);
    const other = await mutex.runExclusive('t2', async () => 'done');

    expect(other).toBe('done');
    expect(mutex.isLocked('t1')).toBe(true);
    gate.resolve();
    await blocked;
  });

  it('should release the key when a task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('t1', async () => {
        throw new Error('task failed');
      })
    ).rejects.toThrow('task failed');

    await expect(mutex.runExclusive('t1', async () => 'next')).resolves.toBe('next');
  });

  it('should forget keys once their queue drains', async () => {
    const mutex = new KeyedMutex();
    await mutex.runExclusive('t1', async () => undefined);

    expect(mutex.isLocked('t1')).toBe(false);
    expect(mutex.size()).toBe(0);
  });
});
