import { KeyedMutex } from './keyed-mutex.util';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run tasks on the same key one at a time in arrival order', async () => {
    const mutex = new KeyedMutex<string>();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(mutex.isLocked('a')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('a')).toBe(false);
  });

  it('should not block tasks on different keys', async () => {
    const mutex = new KeyedMutex<string>();
    const gate = deferred();

    const blocked = mutex.runExclusive('a', () => gate.promise);
    const free = await mutex.runExclusive('b', () => 'b done');

    expect(free).toBe('b done');
    gate.resolve();
    await blocked;
  });

  it('should release the lock when a task throws', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(mutex.runExclusive('a', () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive('a', () => 42)).resolves.toBe(42);
  });
});
