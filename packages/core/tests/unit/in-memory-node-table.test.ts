/**
 * Unit tests for the in-process node table
 * @module @strata/core/tests/unit/in-memory-node-table
 */

import { describe, it, expect } from 'vitest';

import { InMemoryNodeTable } from '../../src';
import { DN1, DN2, DN3, makeDetails } from '../fixtures/datanodes';

describe('InMemoryNodeTable', () => {
  it('should not share objects with callers', async () => {
    const table = new InMemoryNodeTable();
    const details = makeDetails(DN1);
    await table.put(DN1, details);

    details.hostName = 'changed';
    const stored = await table.get(DN1);
    expect(stored?.hostName).toBe('dn1.example.internal');

    if (stored) {
      stored.ports.push({ name: 'REST', value: 9880 });
    }
    expect((await table.get(DN1))?.ports).toHaveLength(2);
  });

  it('should iterate in id order', async () => {
    const table = new InMemoryNodeTable([
      { id: DN3, details: makeDetails(DN3) },
      { id: DN1, details: makeDetails(DN1) },
    ]);
    await table.put(DN2, makeDetails(DN2));

    const iterator = table.iterate();
    const ids: string[] = [];
    for (let entry = await iterator.next(); entry; entry = await iterator.next()) {
      ids.push(entry.id);
    }
    await iterator.close();

    expect(ids).toEqual([DN1, DN2, DN3]);
  });

  it('should iterate a snapshot', async () => {
    const table = new InMemoryNodeTable([{ id: DN1, details: makeDetails(DN1) }]);
    const iterator = table.iterate();
    await table.delete(DN1);

    expect((await iterator.next())?.id).toBe(DN1);
    expect(await iterator.next()).toBeUndefined();
    await iterator.close();
    expect(table.size).toBe(0);
  });

  it('should track open iterators and refuse reads after close', async () => {
    const table = new InMemoryNodeTable();
    const first = table.iterate();
    const second = table.iterate();
    expect(table.openIterators).toBe(2);

    await first.close();
    await first.close();
    expect(table.openIterators).toBe(1);
    await expect(first.next()).rejects.toThrow('Iterator is closed');

    await second.close();
    expect(table.openIterators).toBe(0);
  });
});
