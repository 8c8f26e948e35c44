/**
 * Shared types for Strata
 * @module @strata/shared/types
 */

// Datanode types
export type {
  NodeOperationalState,
  NodeHealthState,
  PortName,
  DatanodePort,
  DatanodeDetails,
  NodeStatus,
  LayoutVersionReport,
  StorageUsage,
  DatanodeRecord,
  DatanodeDescriptor,
  DatanodeListItem,
} from './datanode';

export {
  ALL_OPERATIONAL_STATES,
  ALL_HEALTH_STATES,
  ALL_PORT_NAMES,
  DEFAULT_NETWORK_LOCATION,
  EMPTY_STORAGE_USAGE,
  EMPTY_DATANODE_DESCRIPTOR,
  isOperationalState,
  isPortName,
  isInService,
  isHealthyInService,
  getPort,
  toDescriptor,
} from './datanode';

// Command types
export type {
  DatanodeCommandType,
  DatanodeCommand,
  CommandForDatanode,
  QueuedCommand,
  RegistrationErrorCode,
  RegisteredResponse,
  VersionResponse,
} from './commands';

export { ALL_COMMAND_TYPES, isCommandType } from './commands';

// Report types
export type {
  StorageReport,
  NodeReport,
  PipelineReport,
  CommandQueueReport,
  HeartbeatReport,
} from './reports';

export { summarizeNodeReport } from './reports';

// Persistence types
export type {
  NodeTableEntry,
  NodeTableIterator,
  NodeTable,
  DurabilityPolicy,
} from './persistence';
