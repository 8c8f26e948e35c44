/**
 * Per-datanode async mutual exclusion
 * @module @strata/core/services/node-locks
 */

import { AsyncLocalStorage } from 'node:async_hooks';

/**
 * Serialises tasks per datanode id.
 *
 * Tasks for the same id run one after another in arrival order; tasks for
 * different ids never wait on each other. A task that calls back into
 * `runExclusive` for an id it already holds runs immediately, so composed
 * operations can hold a node's lock across several steps.
 */
export class NodeLockManager {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly held = new AsyncLocalStorage<ReadonlySet<string>>();

  /**
   * Run `task` while holding the lock for `id`
   */
  async runExclusive<T>(id: string, task: () => Promise<T> | T): Promise<T> {
    const heldIds = this.held.getStore();
    if (heldIds?.has(id)) {
      return task();
    }

    const previous = this.tails.get(id) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(id, tail);

    await previous;
    try {
      const nextHeld = new Set(heldIds);
      nextHeld.add(id);
      return await this.held.run(nextHeld, async () => task());
    } finally {
      release();
      if (this.tails.get(id) === tail) {
        this.tails.delete(id);
      }
    }
  }

  /**
   * Whether a task currently holds or waits for the lock
   */
  isLocked(id: string): boolean {
    return this.tails.has(id);
  }

  /**
   * Whether the calling async context holds the lock for `id`
   */
  isHeldByCurrentContext(id: string): boolean {
    return this.held.getStore()?.has(id) ?? false;
  }
}
