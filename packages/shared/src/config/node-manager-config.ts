/**
 * Membership service configuration
 * @module @strata/shared/config/node-manager-config
 */

import { ValidationError, type ValidationErrorDetail } from '../errors/validation-error';
import type { DurabilityPolicy } from '../types/persistence';
import { parseDuration } from '../utils';

/**
 * What the observer does with commands already queued for a node it asks to re-register
 */
export type PendingCommandPolicy = 'retain' | 'discard';

/**
 * Node manager configuration
 */
export interface NodeManagerConfig {
  /** Cluster identifier returned in registration and version responses */
  clusterId: string;
  /** Interval at which datanodes are expected to heartbeat */
  heartbeatIntervalMs: number;
  /** Silence after which a node is STALE */
  staleNodeIntervalMs: number;
  /** Silence after which a node is DEAD */
  deadNodeIntervalMs: number;
  /** How often the health sweep runs */
  heartbeatCheckIntervalMs: number;
  /** Heartbeat interval the observer expects */
  observerHeartbeatIntervalMs: number;
  /** Missed observer intervals before a node is asked to re-register */
  observerStaleMultiplier: number;
  pendingCommandsOnReregister: PendingCommandPolicy;
  registrationDurability: DurabilityPolicy;
}

/**
 * Default node manager configuration
 */
export const DEFAULT_NODE_MANAGER_CONFIG: Readonly<NodeManagerConfig> = Object.freeze({
  clusterId: 'CID-local',
  heartbeatIntervalMs: 30_000,
  staleNodeIntervalMs: 300_000,
  deadNodeIntervalMs: 600_000,
  heartbeatCheckIntervalMs: 3_000,
  observerHeartbeatIntervalMs: 60_000,
  observerStaleMultiplier: 3,
  pendingCommandsOnReregister: 'retain',
  registrationDurability: 'best-effort',
});

const DURATION_FIELDS = [
  ['heartbeatIntervalMs', 'HEARTBEAT_INTERVAL'],
  ['staleNodeIntervalMs', 'STALE_NODE_INTERVAL'],
  ['deadNodeIntervalMs', 'DEAD_NODE_INTERVAL'],
  ['heartbeatCheckIntervalMs', 'HEARTBEAT_CHECK_INTERVAL'],
  ['observerHeartbeatIntervalMs', 'OBSERVER_HEARTBEAT_INTERVAL'],
] as const;

/**
 * Environment source (process.env shaped)
 */
export type ConfigEnv = Record<string, string | undefined>;

function isPendingCommandPolicy(value: string): value is PendingCommandPolicy {
  return value === 'retain' || value === 'discard';
}

function isDurabilityPolicy(value: string): value is DurabilityPolicy {
  return value === 'best-effort' || value === 'strict';
}

/**
 * Check a configuration for consistency.
 * @throws {ValidationError} listing every offending field
 */
export function validateNodeManagerConfig(config: NodeManagerConfig): void {
  const errors: ValidationErrorDetail[] = [];

  if (config.clusterId.trim().length === 0) {
    errors.push({ field: 'clusterId', message: 'Cluster id cannot be empty', rule: 'required' });
  }

  for (const [field] of DURATION_FIELDS) {
    const value = config[field];
    if (!Number.isFinite(value) || value <= 0) {
      errors.push({
        field,
        message: 'Must be a positive duration',
        rule: 'range',
        received: value,
      });
    }
  }

  if (config.staleNodeIntervalMs >= config.deadNodeIntervalMs) {
    errors.push({
      field: 'staleNodeIntervalMs',
      message: 'Stale interval must be shorter than the dead interval',
      rule: 'constraint',
      received: config.staleNodeIntervalMs,
    });
  }

  if (!Number.isFinite(config.observerStaleMultiplier) || config.observerStaleMultiplier < 1) {
    errors.push({
      field: 'observerStaleMultiplier',
      message: 'Multiplier must be at least 1',
      rule: 'range',
      received: config.observerStaleMultiplier,
    });
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors);
  }
}

/**
 * Build a configuration from defaults, overrides and validation
 */
export function createNodeManagerConfig(overrides: Partial<NodeManagerConfig> = {}): NodeManagerConfig {
  const config: NodeManagerConfig = { ...DEFAULT_NODE_MANAGER_CONFIG, ...overrides };
  validateNodeManagerConfig(config);
  return config;
}

/**
 * Load configuration from environment variables.
 * Unset variables fall back to the defaults; malformed ones are reported together.
 */
export function loadNodeManagerConfig(env: ConfigEnv = process.env): NodeManagerConfig {
  const config: NodeManagerConfig = { ...DEFAULT_NODE_MANAGER_CONFIG };
  const errors: ValidationErrorDetail[] = [];

  if (env.CLUSTER_ID !== undefined) {
    config.clusterId = env.CLUSTER_ID;
  }

  for (const [field, variable] of DURATION_FIELDS) {
    const raw = env[variable];
    if (raw === undefined) continue;
    const parsed = parseDuration(raw);
    if (parsed === undefined) {
      errors.push({
        field,
        message: `${variable} is not a duration`,
        rule: 'format',
        expected: 'e.g. 500ms, 30s, 5m, 1h',
        received: raw,
      });
    } else {
      config[field] = parsed;
    }
  }

  const multiplier = env.OBSERVER_STALE_MULTIPLIER;
  if (multiplier !== undefined) {
    const parsed = Number(multiplier);
    if (multiplier.trim() === '' || Number.isNaN(parsed)) {
      errors.push({
        field: 'observerStaleMultiplier',
        message: 'OBSERVER_STALE_MULTIPLIER is not a number',
        rule: 'format',
        received: multiplier,
      });
    } else {
      config.observerStaleMultiplier = parsed;
    }
  }

  const pending = env.PENDING_COMMANDS_ON_REREGISTER;
  if (pending !== undefined) {
    if (isPendingCommandPolicy(pending)) {
      config.pendingCommandsOnReregister = pending;
    } else {
      errors.push({
        field: 'pendingCommandsOnReregister',
        message: 'PENDING_COMMANDS_ON_REREGISTER must be retain or discard',
        rule: 'enum',
        received: pending,
      });
    }
  }

  const durability = env.REGISTRATION_DURABILITY;
  if (durability !== undefined) {
    if (isDurabilityPolicy(durability)) {
      config.registrationDurability = durability;
    } else {
      errors.push({
        field: 'registrationDurability',
        message: 'REGISTRATION_DURABILITY must be best-effort or strict',
        rule: 'enum',
        received: durability,
      });
    }
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors);
  }

  validateNodeManagerConfig(config);
  return config;
}

/**
 * Silence after which the observer asks a node to re-register
 */
export function observerOutdatedThresholdMs(config: NodeManagerConfig): number {
  return config.observerStaleMultiplier * config.observerHeartbeatIntervalMs;
}
