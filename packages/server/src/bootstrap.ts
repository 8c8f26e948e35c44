/**
 * Membership service bootstrap
 *
 * Wires a primary or observer membership service from configuration.
 * @module @strata/server/bootstrap
 */

import {
  NodeEventBus,
  createNodeManager,
  createObserverNodeManager,
  type ClusterContext,
  type MembershipService,
} from '@strata/core';
import {
  ValidationError,
  createNodeManagerConfig,
  createServiceLogger,
  loadNodeManagerConfig,
  type ConfigEnv,
  type NodeManagerConfig,
  type NodeTable,
} from '@strata/shared';
import { createSupabaseServiceClient, getSupabaseConfig } from './supabase/client.js';
import { createSupabaseNodeTable } from './supabase/node-table.js';

const logger = createServiceLogger({
  level: 'debug',
  service: 'strata-membership',
}, { component: 'bootstrap' });

const ENV_MEMBERSHIP_MODE = 'MEMBERSHIP_MODE';

// ============================================================================
// Types
// ============================================================================

/**
 * Role this process plays in the cluster
 */
export type MembershipMode = 'primary' | 'observer';

export interface MembershipServiceOptions {
  /** Defaults to MEMBERSHIP_MODE, then 'primary' */
  mode?: MembershipMode;
  /** Loaded from the environment when absent */
  config?: Partial<NodeManagerConfig>;
  /** Environment to read (default: process.env) */
  env?: ConfigEnv;
  /** Defaults to the Supabase node table */
  table?: NodeTable;
  eventBus?: NodeEventBus;
  clusterContext?: ClusterContext;
}

/**
 * A running membership service
 */
export interface MembershipRuntime {
  mode: MembershipMode;
  service: MembershipService;
  eventBus: NodeEventBus;
  config: NodeManagerConfig;
  /** Datanodes loaded from the node table at startup */
  loaded: number;
  stop(): void;
}

// ============================================================================
// Bootstrap
// ============================================================================

/**
 * Read the membership mode
 * @throws {ValidationError} for anything but primary or observer
 */
export function parseMembershipMode(value: string | undefined): MembershipMode {
  if (value === undefined || value.trim() === '') {
    return 'primary';
  }
  const mode = value.trim().toLowerCase();
  if (mode === 'primary' || mode === 'observer') {
    return mode;
  }
  throw ValidationError.field(
    ENV_MEMBERSHIP_MODE,
    `${ENV_MEMBERSHIP_MODE} must be primary or observer, got ${value}`,
    'INVALID_VALUE',
  );
}

/**
 * Build, load and start a membership service
 */
export async function createMembershipService(
  options: MembershipServiceOptions = {},
): Promise<MembershipRuntime> {
  const env = options.env ?? process.env;
  const mode = options.mode ?? parseMembershipMode(env[ENV_MEMBERSHIP_MODE]);
  const config = options.config ? createNodeManagerConfig(options.config) : loadNodeManagerConfig(env);
  const eventBus = options.eventBus ?? new NodeEventBus();
  const table = options.table ?? createSupabaseNodeTable({
    client: createSupabaseServiceClient(getSupabaseConfig(env)),
  });

  const shared = {
    config,
    table,
    eventBus,
    clusterContext: options.clusterContext,
  };

  let service: MembershipService;
  let loaded: number;
  if (mode === 'observer') {
    const observer = createObserverNodeManager(shared);
    loaded = await observer.initialize();
    service = observer;
  } else {
    const manager = createNodeManager(shared);
    loaded = await manager.loadExistingNodes();
    service = manager;
  }

  const detach = service.attach(eventBus);
  service.startHeartbeatMonitoring();

  logger.info('Membership service started', {
    mode,
    clusterId: config.clusterId,
    loaded,
  });

  return {
    mode,
    service,
    eventBus,
    config,
    loaded,
    stop: () => {
      detach();
      service.dispose();
      logger.info('Membership service stopped', { mode });
    },
  };
}
