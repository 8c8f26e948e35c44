/**
 * Configuration module
 * @module @strata/shared/config
 */

export type {
  NodeManagerConfig,
  PendingCommandPolicy,
  ConfigEnv,
} from './node-manager-config';

export {
  DEFAULT_NODE_MANAGER_CONFIG,
  createNodeManagerConfig,
  loadNodeManagerConfig,
  validateNodeManagerConfig,
  observerOutdatedThresholdMs,
} from './node-manager-config';
