import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../src/stores/KeyedMutex.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run tasks for the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex();
    const log: string[] = [];
    const gate = deferred();

    const first = mutex.run('a', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
    });
    const second = mutex.run('a', async () => {
      log.push('second');
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not make different keys wait on each other', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    let otherRan = false;

    const blocked = mutex.run('a', () => gate.promise);
    await mutex.run('b', async () => {
      otherRan = true;
    });

    expect(otherRan).toBe(true);
    expect(mutex.isLocked('a')).toBe(true);
    gate.resolve();
    await blocked;
  });

  it('should release the key once its queue drains', async () => {
    const mutex = new KeyedMutex();

    const running = mutex.run('a', async () => 'done');
    expect(mutex.isLocked('a')).toBe(true);

    await expect(running).resolves.toBe('done');
    expect(mutex.isLocked('a')).toBe(false);
    expect(mutex.activeKeys).toBe(0);
  });

  it('should keep the queue moving after a task fails', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.run('a', async () => {
      throw new Error('boom');
    });
    const next = mutex.run('a', () => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
    expect(mutex.isLocked('a')).toBe(false);
  });
});
