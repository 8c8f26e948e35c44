/**
 * Unit tests for the membership service bootstrap
 * @module @strata/server/tests/unit/bootstrap
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { createMembershipService, parseMembershipMode, type MembershipRuntime } from '../../src/bootstrap.js';
import {
  InMemoryNodeTable,
  NodeManager,
  ObserverNodeManager,
  createDatanodeCommand,
} from '@strata/core';
import { ValidationError } from '@strata/shared';
import { DN1, makeDetails } from '../fixtures/supabase.js';

describe('createMembershipService', () => {
  let table: InMemoryNodeTable;
  let runtime: MembershipRuntime | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    table = new InMemoryNodeTable([{ id: DN1, details: makeDetails(DN1) }]);
    runtime = undefined;
  });

  afterEach(() => {
    runtime?.stop();
    vi.useRealTimers();
  });

  it('should start a primary that loads the node table and monitors heartbeats', async () => {
    runtime = await createMembershipService({ mode: 'primary', config: { clusterId: 'CID-test' }, table });

    expect(runtime.mode).toBe('primary');
    expect(runtime.loaded).toBe(1);
    expect(runtime.service.isNodeRegistered(DN1)).toBe(true);
    expect(runtime.service.getVersionResponse().version).toBe(1);
    expect(runtime.service).toBeInstanceOf(NodeManager);
    if (runtime.service instanceof NodeManager) {
      expect(runtime.service.isMonitoring()).toBe(true);
      runtime.stop();
      expect(runtime.service.isMonitoring()).toBe(false);
      runtime = undefined;
    }
  });

  it('should route commands published on its event bus', async () => {
    runtime = await createMembershipService({ mode: 'primary', config: { clusterId: 'CID-test' }, table });
    const command = createDatanodeCommand('closeContainerCommand', { containerId: 9 });

    runtime.eventBus.publish('datanode:command', { datanodeId: DN1, command });

    expect(await runtime.service.processHeartbeat(makeDetails(DN1))).toEqual([command]);
  });

  it('should read the mode and configuration from the environment', async () => {
    runtime = await createMembershipService({
      env: {
        MEMBERSHIP_MODE: 'observer',
        CLUSTER_ID: 'CID-env',
        OBSERVER_HEARTBEAT_INTERVAL: '10s',
      },
      table,
    });

    expect(runtime.mode).toBe('observer');
    expect(runtime.service).toBeInstanceOf(ObserverNodeManager);
    expect(runtime.config.clusterId).toBe('CID-env');
    expect(runtime.config.observerHeartbeatIntervalMs).toBe(10_000);
    expect(runtime.service.getVersionResponse()).toEqual({
      version: 0,
      clusterId: 'CID-env',
      softwareLayoutVersion: 8,
    });
    expect(runtime.loaded).toBe(1);
  });

  it('should reject an unknown mode', async () => {
    await expect(createMembershipService({ env: { MEMBERSHIP_MODE: 'replica' }, table })).rejects.toThrow(
      'Validation failed for field: MEMBERSHIP_MODE',
    );
  });

  it('should require Supabase credentials when no table is given', async () => {
    await expect(
      createMembershipService({ env: { SUPABASE_URL: 'http://supabase.test' } }),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('parseMembershipMode', () => {
  it('should default to primary', () => {
    expect(parseMembershipMode(undefined)).toBe('primary');
    expect(parseMembershipMode('  ')).toBe('primary');
  });

  it('should ignore case and surrounding space', () => {
    expect(parseMembershipMode(' Observer ')).toBe('observer');
  });
});
