/**
 * Unit tests for node manager configuration
 */

import { describe, it, expect } from 'vitest';

import {
  DEFAULT_NODE_MANAGER_CONFIG,
  createNodeManagerConfig,
  loadNodeManagerConfig,
  observerOutdatedThresholdMs,
} from '../../src/config';
import { ValidationError } from '../../src/errors';
import { parseDuration } from '../../src/utils';

describe('parseDuration', () => {
  it('should parse unit suffixes', () => {
    expect(parseDuration('500ms')).toBe(500);
    expect(parseDuration('30s')).toBe(30_000);
    expect(parseDuration('5m')).toBe(300_000);
    expect(parseDuration('1h')).toBe(3_600_000);
    expect(parseDuration('1.5s')).toBe(1_500);
  });

  it('should treat bare numbers as milliseconds', () => {
    expect(parseDuration('2500')).toBe(2_500);
  });

  it('should return undefined for anything else', () => {
    expect(parseDuration('soon')).toBeUndefined();
    expect(parseDuration('-5s')).toBeUndefined();
    expect(parseDuration('')).toBeUndefined();
  });
});

describe('loadNodeManagerConfig', () => {
  it('should return the defaults for an empty environment', () => {
    expect(loadNodeManagerConfig({})).toEqual(DEFAULT_NODE_MANAGER_CONFIG);
  });

  it('should read every variable', () => {
    const config = loadNodeManagerConfig({
      CLUSTER_ID: 'CID-test',
      HEARTBEAT_INTERVAL: '10s',
      STALE_NODE_INTERVAL: '20s',
      DEAD_NODE_INTERVAL: '40s',
      HEARTBEAT_CHECK_INTERVAL: '1s',
      OBSERVER_HEARTBEAT_INTERVAL: '15s',
      OBSERVER_STALE_MULTIPLIER: '2',
      PENDING_COMMANDS_ON_REREGISTER: 'discard',
      REGISTRATION_DURABILITY: 'strict',
    });

    expect(config).toEqual({
      clusterId: 'CID-test',
      heartbeatIntervalMs: 10_000,
      staleNodeIntervalMs: 20_000,
      deadNodeIntervalMs: 40_000,
      heartbeatCheckIntervalMs: 1_000,
      observerHeartbeatIntervalMs: 15_000,
      observerStaleMultiplier: 2,
      pendingCommandsOnReregister: 'discard',
      registrationDurability: 'strict',
    });
    expect(observerOutdatedThresholdMs(config)).toBe(30_000);
  });

  it('should report every malformed variable at once', () => {
    let caught: unknown;
    try {
      loadNodeManagerConfig({
        HEARTBEAT_INTERVAL: 'often',
        PENDING_COMMANDS_ON_REREGISTER: 'forget',
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message).toBe(
        'Validation failed for fields: heartbeatIntervalMs, pendingCommandsOnReregister',
      );
    }
  });

  it('should reject a stale interval that is not shorter than the dead interval', () => {
    expect(() =>
      loadNodeManagerConfig({ STALE_NODE_INTERVAL: '10m', DEAD_NODE_INTERVAL: '10m' }),
    ).toThrow('Validation failed for fields: staleNodeIntervalMs');
  });
});

describe('createNodeManagerConfig', () => {
  it('should apply overrides over the defaults', () => {
    const config = createNodeManagerConfig({ staleNodeIntervalMs: 20_000, deadNodeIntervalMs: 40_000 });
    expect(config.staleNodeIntervalMs).toBe(20_000);
    expect(config.heartbeatIntervalMs).toBe(30_000);
  });

  it('should reject non-positive durations and small multipliers', () => {
    try {
      createNodeManagerConfig({ heartbeatCheckIntervalMs: 0, observerStaleMultiplier: 0.5 });
      expect.unreachable('expected a validation error');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.getFieldErrors('heartbeatCheckIntervalMs')).toHaveLength(1);
        expect(error.hasFieldError('observerStaleMultiplier')).toBe(true);
      }
    }
  });
});
