/**
 * Unit tests for membership stores
 * @module @strata/core/tests/unit/stores
 */

import { describe, it, expect, beforeEach } from 'vitest';

import {
  CommandQueue,
  DatanodeRegistry,
  HeartbeatTracker,
  KnownNodeIndex,
  createDatanodeCommand,
  createDatanodeRecord,
} from '../../src';
import { EMPTY_DATANODE_DESCRIPTOR, isNodeNotFoundError } from '@strata/shared';
import { DN1, DN2, makeDetails } from '../fixtures/datanodes';

const LAYOUT = { softwareLayoutVersion: 8, metadataLayoutVersion: 8 };

describe('DatanodeRegistry', () => {
  let registry: DatanodeRegistry;

  beforeEach(() => {
    registry = new DatanodeRegistry();
    registry.upsert(createDatanodeRecord(makeDetails(DN1), LAYOUT, 1_000));
  });

  it('should create records that start healthy in the persisted state', () => {
    const record = registry.require(DN1);
    expect(record.status).toEqual({
      operationalState: 'IN_SERVICE',
      health: 'HEALTHY',
      opStateExpiryEpochSec: 0,
    });
    expect(record.lastHeartbeat).toBe(1_000);
    expect(record.storage).toEqual({ capacity: 0, used: 0, remaining: 0 });
  });

  it('should replace on upsert', () => {
    registry.upsert(createDatanodeRecord(makeDetails(DN1, { hostName: 'renamed' }), LAYOUT, 2_000));
    expect(registry.size).toBe(1);
    expect(registry.get(DN1)?.details.hostName).toBe('renamed');
  });

  it('should throw NodeNotFound for unknown ids', () => {
    expect(registry.get(DN2)).toBeUndefined();
    try {
      registry.remove(DN2);
      expect.unreachable('expected NodeError');
    } catch (error) {
      expect(isNodeNotFoundError(error)).toBe(true);
    }
    expect(() => registry.setOperationalState(DN2, 'IN_MAINTENANCE')).toThrow(
      `Datanode ${DN2} not found`,
    );
  });

  it('should update status and persisted details together', () => {
    const before = registry.require(DN1);
    const after = registry.setOperationalState(DN1, 'IN_MAINTENANCE', 1_800_000_000, 5_000);

    expect(after.status.operationalState).toBe('IN_MAINTENANCE');
    expect(after.status.opStateExpiryEpochSec).toBe(1_800_000_000);
    expect(after.details.persistedOpState).toBe('IN_MAINTENANCE');
    expect(after.details.persistedOpStateExpiryEpochSec).toBe(1_800_000_000);
    expect(after.updatedAt).toBe(5_000);
    // Earlier snapshots are untouched
    expect(before.status.operationalState).toBe('IN_SERVICE');
  });

  it('should keep the control plane state when details are refreshed', () => {
    registry.setOperationalState(DN1, 'DECOMMISSIONING');
    const record = registry.updateDetails(DN1, makeDetails(DN1, { version: '1.5.0' }));
    expect(record.details.version).toBe('1.5.0');
    expect(record.details.persistedOpState).toBe('DECOMMISSIONING');
  });

  it('should mark a heartbeat as healthy', () => {
    registry.setHealth(DN1, 'STALE');
    const record = registry.recordHeartbeat(DN1, 9_000);
    expect(record.status.health).toBe('HEALTHY');
    expect(record.lastHeartbeat).toBe(9_000);
  });

  it('should keep computed views current', () => {
    registry.upsert(createDatanodeRecord(makeDetails(DN2), LAYOUT, 1_000));
    expect(registry.nodeCount.value).toBe(2);

    registry.setHealth(DN2, 'DEAD');
    expect(registry.nodesByHealth.value.get('DEAD')?.map(r => r.details.uuid)).toEqual([DN2]);
    expect(registry.nodesByHealth.value.get('HEALTHY')?.length).toBe(1);

    registry.setOperationalState(DN1, 'DECOMMISSIONED');
    expect(registry.nodesByOperationalState.value.get('DECOMMISSIONED')?.length).toBe(1);

    registry.remove(DN2);
    expect(registry.nodeCount.value).toBe(1);
  });

  it('should count and find by address', () => {
    registry.upsert(createDatanodeRecord(makeDetails(DN2), LAYOUT, 1_000));
    registry.setHealth(DN2, 'STALE');

    expect(registry.count()).toBe(2);
    expect(registry.count({ health: 'HEALTHY' })).toBe(1);
    expect(registry.count({ health: 'STALE', operationalState: 'IN_SERVICE' })).toBe(1);
    expect(registry.findByAddress('10.0.0.2').map(r => r.details.uuid)).toEqual([DN2]);
    expect(registry.findByAddress('dn1.example.internal').map(r => r.details.uuid)).toEqual([DN1]);
    expect(registry.findByAddress('10.9.9.9')).toEqual([]);
  });
});

describe('CommandQueue', () => {
  let queue: CommandQueue;

  beforeEach(() => {
    queue = new CommandQueue();
  });

  it('should drain in FIFO order exactly once', () => {
    const first = createDatanodeCommand('closeContainerCommand', { containerId: 1 });
    const second = createDatanodeCommand('deleteBlocksCommand');
    queue.add(DN1, first);
    queue.add(DN1, second);

    expect(queue.drain(DN1)).toEqual([first, second]);
    expect(queue.drain(DN1)).toEqual([]);
  });

  it('should keep queues per datanode', () => {
    queue.add(DN1, createDatanodeCommand('closeContainerCommand'));
    queue.add(DN2, createDatanodeCommand('closeContainerCommand'));
    queue.add(DN2, createDatanodeCommand('deleteBlocksCommand'));

    expect(queue.count(DN1)).toBe(1);
    expect(queue.count(DN2, 'closeContainerCommand')).toBe(1);
    expect(queue.totalSize).toBe(3);
    expect(queue.purge(DN2)).toBe(2);
    expect(queue.totalSize).toBe(1);
  });

  it('should add reported counts to queued counts', () => {
    queue.add(DN1, createDatanodeCommand('deleteBlocksCommand'));
    queue.recordReportedCounts(DN1, { counts: { deleteBlocksCommand: 4 } });

    expect(queue.getReportedCount(DN1, 'deleteBlocksCommand')).toBe(4);
    expect(queue.getTotalPendingCount(DN1, 'deleteBlocksCommand')).toBe(5);
    expect(queue.getTotalPendingCount(DN1, 'closeContainerCommand')).toBe(0);

    queue.recordReportedCounts(DN1, { counts: {} });
    expect(queue.getReportedCount(DN1, 'deleteBlocksCommand')).toBe(0);
  });

  it('should leave the queue intact on peek', () => {
    queue.add(DN1, createDatanodeCommand('reregisterCommand'), 42);
    expect(queue.peek(DN1)).toHaveLength(1);
    expect(queue.peek(DN1)[0]?.enqueuedAt).toBe(42);
    expect(queue.count(DN1)).toBe(1);
  });
});

describe('KnownNodeIndex', () => {
  it('should return the empty descriptor for unknown ids', () => {
    const index = new KnownNodeIndex();
    expect(index.get(DN1)).toBe(EMPTY_DATANODE_DESCRIPTOR);
    expect(index.get(DN1).hostName).toBe('');
  });

  it('should record descriptive attributes', () => {
    const index = new KnownNodeIndex();
    index.record(makeDetails(DN1));
    expect(index.get(DN1)).toEqual({
      hostName: 'dn1.example.internal',
      ipAddress: '10.0.0.1',
      version: '1.4.0',
      setupTime: 1_700_000_000_000,
      revision: 'rev-1',
    });
    expect(index.delete(DN1)).toBe(true);
    expect(index.has(DN1)).toBe(false);
  });

  it('should put back a descriptor taken with peek', () => {
    const index = new KnownNodeIndex();
    expect(index.peek(DN1)).toBeUndefined();

    index.record(makeDetails(DN1));
    const before = index.peek(DN1);
    index.record(makeDetails(DN1, { version: '1.5.0' }));
    index.restore(DN1, before);
    expect(index.get(DN1).version).toBe('1.4.0');

    index.restore(DN1, undefined);
    expect(index.has(DN1)).toBe(false);
  });
});

describe('HeartbeatTracker', () => {
  it('should read 0 for unseen datanodes', () => {
    const tracker = new HeartbeatTracker();
    expect(tracker.get(DN1)).toBe(0);
    tracker.record(DN1, 1234);
    expect(tracker.get(DN1)).toBe(1234);
    tracker.delete(DN1);
    expect(tracker.get(DN1)).toBe(0);
  });
});
