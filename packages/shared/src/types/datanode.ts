/**
 * Datanode type definitions
 * @module @strata/shared/types/datanode
 */

/**
 * Administrator-driven intent for a datanode
 * - IN_SERVICE: serving reads and writes
 * - DECOMMISSIONING: data is being moved off before retirement
 * - DECOMMISSIONED: retired, holds no data the cluster depends on
 * - ENTERING_MAINTENANCE: preparing for a maintenance window
 * - IN_MAINTENANCE: in a maintenance window
 */
export type NodeOperationalState =
  | 'IN_SERVICE'
  | 'DECOMMISSIONING'
  | 'DECOMMISSIONED'
  | 'ENTERING_MAINTENANCE'
  | 'IN_MAINTENANCE';

/**
 * Liveness classification derived from heartbeat recency
 */
export type NodeHealthState = 'HEALTHY' | 'STALE' | 'DEAD';

/**
 * Advertised port roles
 */
export type PortName =
  | 'STANDALONE'
  | 'RATIS'
  | 'RATIS_ADMIN'
  | 'RATIS_SERVER'
  | 'RATIS_DATASTREAM'
  | 'REST'
  | 'REPLICATION'
  | 'HTTP'
  | 'HTTPS'
  | 'CLIENT_RPC';

/**
 * A port a datanode advertises for one role
 */
export interface DatanodePort {
  name: PortName;
  value: number;
}

/**
 * Identity and descriptive attributes a datanode reports about itself
 */
export interface DatanodeDetails {
  /** Stable unique identifier (UUID), never changes after creation */
  uuid: string;
  hostName: string;
  ipAddress: string;
  ports: DatanodePort[];
  /** Absolute topology path, e.g. /dc1/rack7 */
  networkLocation: string;
  /** Operational state as persisted by the datanode */
  persistedOpState: NodeOperationalState;
  /** Epoch seconds after which the persisted state lapses (0 = never) */
  persistedOpStateExpiryEpochSec: number;
  /** Software version string */
  version: string;
  /** Epoch milliseconds the datanode was set up */
  setupTime: number;
  /** Build revision */
  revision: string;
}

/**
 * Status the control plane holds for a datanode
 */
export interface NodeStatus {
  operationalState: NodeOperationalState;
  health: NodeHealthState;
  opStateExpiryEpochSec: number;
}

/**
 * Software/metadata layout versions
 */
export interface LayoutVersionReport {
  softwareLayoutVersion: number;
  metadataLayoutVersion: number;
}

/**
 * Aggregated storage usage in bytes
 */
export interface StorageUsage {
  capacity: number;
  used: number;
  remaining: number;
}

/**
 * Authoritative registry record for one datanode.
 * `details.persistedOpState` mirrors `status.operationalState`; both are
 * written together by the registry.
 */
export interface DatanodeRecord {
  details: DatanodeDetails;
  status: NodeStatus;
  /** Epoch milliseconds of the last heartbeat (registration counts as one) */
  lastHeartbeat: number;
  layoutVersion: LayoutVersionReport;
  storage: StorageUsage;
  registeredAt: number;
  updatedAt: number;
}

/**
 * Descriptive attributes kept in the known-nodes index
 */
export interface DatanodeDescriptor {
  hostName: string;
  ipAddress: string;
  version: string;
  setupTime: number;
  revision: string;
}

/**
 * Datanode list item (for listing/diagnostics)
 */
export interface DatanodeListItem {
  uuid: string;
  hostName: string;
  ipAddress: string;
  networkLocation: string;
  operationalState: NodeOperationalState;
  health: NodeHealthState;
  lastHeartbeat: number;
  storage: StorageUsage;
}

/**
 * All operational states
 */
export const ALL_OPERATIONAL_STATES: readonly NodeOperationalState[] = [
  'IN_SERVICE',
  'DECOMMISSIONING',
  'DECOMMISSIONED',
  'ENTERING_MAINTENANCE',
  'IN_MAINTENANCE',
];

/**
 * All health states
 */
export const ALL_HEALTH_STATES: readonly NodeHealthState[] = ['HEALTHY', 'STALE', 'DEAD'];

/**
 * All port names
 */
export const ALL_PORT_NAMES: readonly PortName[] = [
  'STANDALONE',
  'RATIS',
  'RATIS_ADMIN',
  'RATIS_SERVER',
  'RATIS_DATASTREAM',
  'REST',
  'REPLICATION',
  'HTTP',
  'HTTPS',
  'CLIENT_RPC',
];

/**
 * Location used when a datanode does not declare one
 */
export const DEFAULT_NETWORK_LOCATION = '/default-rack';

/**
 * Empty storage usage
 */
export const EMPTY_STORAGE_USAGE: StorageUsage = Object.freeze({
  capacity: 0,
  used: 0,
  remaining: 0,
});

/**
 * Placeholder returned by descriptive lookups for unknown datanodes
 */
export const EMPTY_DATANODE_DESCRIPTOR: DatanodeDescriptor = Object.freeze({
  hostName: '',
  ipAddress: '',
  version: '',
  setupTime: 0,
  revision: '',
});

/**
 * Type guard for operational states
 */
export function isOperationalState(value: unknown): value is NodeOperationalState {
  return typeof value === 'string' && ALL_OPERATIONAL_STATES.some(state => state === value);
}

/**
 * Type guard for port names
 */
export function isPortName(value: unknown): value is PortName {
  return typeof value === 'string' && ALL_PORT_NAMES.some(name => name === value);
}

/**
 * Whether a datanode is expected to serve traffic
 */
export function isInService(status: NodeStatus): boolean {
  return status.operationalState === 'IN_SERVICE';
}

/**
 * Whether a datanode is healthy and in service
 */
export function isHealthyInService(status: NodeStatus): boolean {
  return status.health === 'HEALTHY' && isInService(status);
}

/**
 * Look up an advertised port by role
 */
export function getPort(details: DatanodeDetails, name: PortName): DatanodePort | undefined {
  return details.ports.find(port => port.name === name);
}

/**
 * Extract the descriptive attributes of a datanode
 */
export function toDescriptor(details: DatanodeDetails): DatanodeDescriptor {
  return {
    hostName: details.hostName,
    ipAddress: details.ipAddress,
    version: details.version,
    setupTime: details.setupTime,
    revision: details.revision,
  };
}
