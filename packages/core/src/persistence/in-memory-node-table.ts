/**
 * In-process node table
 * @module @strata/core/persistence/in-memory-node-table
 */

import type { DatanodeDetails, NodeTable, NodeTableEntry, NodeTableIterator } from '@strata/shared';

/**
 * NodeTable kept in a Map.
 *
 * Values are structured clones on the way in and out, so callers never share
 * objects with the table. Iteration walks an id-sorted snapshot taken when
 * `iterate()` is called.
 */
export class InMemoryNodeTable implements NodeTable {
  private readonly rows = new Map<string, DatanodeDetails>();
  private open = 0;

  constructor(initial: NodeTableEntry[] = []) {
    for (const entry of initial) {
      this.rows.set(entry.id, structuredClone(entry.details));
    }
  }

  async get(id: string): Promise<DatanodeDetails | undefined> {
    const details = this.rows.get(id);
    return details ? structuredClone(details) : undefined;
  }

  async put(id: string, details: DatanodeDetails): Promise<void> {
    this.rows.set(id, structuredClone(details));
  }

  async delete(id: string): Promise<void> {
    this.rows.delete(id);
  }

  iterate(): NodeTableIterator {
    const snapshot: NodeTableEntry[] = [...this.rows.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([id, details]) => ({ id, details: structuredClone(details) }));
    let position = 0;
    let closed = false;
    this.open++;

    return {
      next: async () => {
        if (closed) {
          throw new Error('Iterator is closed');
        }
        const entry = snapshot[position];
        if (entry) {
          position++;
        }
        return entry;
      },
      close: async () => {
        if (closed) return;
        closed = true;
        this.open--;
      },
    };
  }

  /**
   * Iterators handed out and not yet closed
   */
  get openIterators(): number {
    return this.open;
  }

  get size(): number {
    return this.rows.size;
  }

  clear(): void {
    this.rows.clear();
  }
}
