/**
 * Services module - membership services
 * @module @strata/core/services
 */

// Node manager
export {
  NodeManager,
  createNodeManager,
  MEMBERSHIP_PROTOCOL_VERSION,
} from './node-manager';

export type {
  MembershipService,
  NodeManagerOptions,
  NodeCountFilter,
} from './node-manager';

// Observer
export {
  ObserverNodeManager,
  createObserverNodeManager,
  ALLOWED_COMMANDS,
} from './observer-node-manager';

export type { ObserverNodeManagerOptions } from './observer-node-manager';

// Heartbeats
export { HeartbeatProcessor } from './heartbeat-processor';

export type {
  HeartbeatProcessorOptions,
  HealthCheckResult,
  OpStateMode,
} from './heartbeat-processor';

// Registration
export { RegistrationCoordinator } from './registration-coordinator';

export type {
  RegistrationCoordinatorOptions,
  RegisterOptions,
} from './registration-coordinator';

// Layout versions
export {
  LayoutVersionCoordinator,
  LayoutVersionManager,
  MAX_LAYOUT_VERSION,
} from './layout-version-coordinator';

export type {
  LayoutCheckResult,
  FinalizeMode,
  LayoutVersionCoordinatorOptions,
} from './layout-version-coordinator';

// Topology
export { NetworkTopology } from './network-topology';
export type { TopologyNode } from './network-topology';

// Locks
export { NodeLockManager } from './node-locks';

// Cluster context
export { ClusterContext } from './cluster-context';
export type { ClusterErrorCode } from './cluster-context';

// Events
export { NodeEventBus, createNodeEventBus } from './event-bus';
export type { NodeEventMap, NodeEventType, NodeEventListener } from './event-bus';
