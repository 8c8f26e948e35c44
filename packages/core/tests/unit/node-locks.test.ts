/**
 * Unit tests for per-datanode locking
 * @module @strata/core/tests/unit/node-locks
 */

import { describe, it, expect } from 'vitest';

import { NodeLockManager } from '../../src';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('NodeLockManager', () => {
  it('should run tasks for the same id one at a time, in order', async () => {
    const locks = new NodeLockManager();
    const gate = deferred();
    const order: string[] = [];

    const first = locks.runExclusive('a', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = locks.runExclusive('a', async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(locks.isLocked('a')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.isLocked('a')).toBe(false);
  });

  it('should not block other ids', async () => {
    const locks = new NodeLockManager();
    const gate = deferred();

    const slow = locks.runExclusive('a', () => gate.promise);
    const fast = await locks.runExclusive('b', () => 'done');

    expect(fast).toBe('done');
    expect(locks.isLocked('a')).toBe(true);
    gate.resolve();
    await slow;
  });

  it('should be re-entrant within the holding context', async () => {
    const locks = new NodeLockManager();

    const result = await locks.runExclusive('a', async () => {
      expect(locks.isHeldByCurrentContext('a')).toBe(true);
      return locks.runExclusive('a', async () => 'nested');
    });

    expect(result).toBe('nested');
    expect(locks.isHeldByCurrentContext('a')).toBe(false);
  });

  it('should release the lock when a task throws', async () => {
    const locks = new NodeLockManager();

    await expect(
      locks.runExclusive('a', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(locks.runExclusive('a', () => 'after')).resolves.toBe('after');
    expect(locks.isLocked('a')).toBe(false);
  });
});
