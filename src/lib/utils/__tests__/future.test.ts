import { describe, it, expect } from 'vitest';
import { Future } from '../future';

describe('Future', () => {
  it('resolves from outside the executor', async () => {
    const future = new Future<number>();
    future.resolve(42);
    await expect(future.promise).resolves.toBe(42);
  });

  it('keeps the first value when resolved twice', async () => {
    const future = new Future<string>();
    future.resolve('first');
    future.resolve('second');
    await expect(future.promise).resolves.toBe('first');
  });

  it('stays pending until resolved', async () => {
    const future = new Future<void>();
    let done = false;
    void future.promise.then(() => {
      done = true;
    });
    await Promise.resolve();
    expect(done).toBe(false);

    future.resolve();
    await future.promise;
    expect(done).toBe(true);
  });
});
