import { describe, expect, it } from 'vitest';
import { KeyedLock } from './orderLocks.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs tasks for one key one at a time, in arrival order', async () => {
    const lock = new KeyedLock<number>();
    const gate = deferred();
    const events: string[] = [];

    const first = lock.runExclusive(1, async () => {
      events.push('a:start');
      await gate.promise;
      events.push('a:end');
    });
    const second = lock.runExclusive(1, async () => {
      events.push('b');
    });
    const third = lock.runExclusive(1, async () => {
      events.push('c');
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(lock.isLocked(1)).toBe(true);
    expect(events).toEqual(['a:start']);

    gate.resolve();
    await Promise.all([first, second, third]);
    expect(events).toEqual(['a:start', 'a:end', 'b', 'c']);
    expect(lock.isLocked(1)).toBe(false);
  });

  it('does not block other keys', async () => {
    const lock = new KeyedLock<number>();
    const gate = deferred();
    const events: string[] = [];

    const slow = lock.runExclusive(1, async () => {
      await gate.promise;
      events.push('one');
    });
    await lock.runExclusive(2, async () => {
      events.push('two');
    });

    expect(events).toEqual(['two']);
    gate.resolve();
    await slow;
    expect(events).toEqual(['two', 'one']);
  });

  it('releases the key when the task throws', async () => {
    const lock = new KeyedLock<string>();
    await expect(
      lock.runExclusive('k', async () => {
        throw new Error('fail');
      }),
    ).rejects.toThrow('fail');

    expect(lock.isLocked('k')).toBe(false);
    expect(await lock.runExclusive('k', async () => 42)).toBe(42);
  });
});
