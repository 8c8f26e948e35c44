/**
 * Datanode model: record factories, list projection and filters
 * @module @strata/core/models/datanode
 */

import type {
  DatanodeCommand,
  DatanodeCommandType,
  DatanodeDetails,
  DatanodeListItem,
  DatanodeRecord,
  LayoutVersionReport,
  NodeHealthState,
  NodeOperationalState,
  StorageUsage,
} from '@strata/shared';
import { DEFAULT_NETWORK_LOCATION, EMPTY_STORAGE_USAGE, generateUUID } from '@strata/shared';

/**
 * Datanode list filters
 */
export interface DatanodeListFilters {
  health?: NodeHealthState;
  operationalState?: NodeOperationalState;
}

/**
 * Copy details, filling in the default network location
 */
export function normalizeDetails(details: DatanodeDetails): DatanodeDetails {
  return {
    ...details,
    ports: details.ports.map(port => ({ ...port })),
    networkLocation: details.networkLocation || DEFAULT_NETWORK_LOCATION,
  };
}

/**
 * Create the registry record for a newly registered datanode.
 * The initial operational state is whatever the datanode persisted.
 */
export function createDatanodeRecord(
  details: DatanodeDetails,
  layoutVersion: LayoutVersionReport,
  now: number,
): DatanodeRecord {
  const normalized = normalizeDetails(details);
  return {
    details: normalized,
    status: {
      operationalState: normalized.persistedOpState,
      health: 'HEALTHY',
      opStateExpiryEpochSec: normalized.persistedOpStateExpiryEpochSec,
    },
    lastHeartbeat: now,
    layoutVersion: { ...layoutVersion },
    storage: { ...EMPTY_STORAGE_USAGE },
    registeredAt: now,
    updatedAt: now,
  };
}

/**
 * Create a command addressed to a datanode
 */
export function createDatanodeCommand(
  type: DatanodeCommandType,
  payload: Record<string, unknown> = {},
  now: number = Date.now(),
): DatanodeCommand {
  return {
    id: generateUUID(),
    type,
    payload,
    issuedAt: now,
  };
}

/**
 * Read-only view over a registry record
 */
export class DatanodeModel {
  constructor(private readonly record: DatanodeRecord) {}

  get data(): DatanodeRecord {
    return this.record;
  }

  get id(): string {
    return this.record.details.uuid;
  }

  get health(): NodeHealthState {
    return this.record.status.health;
  }

  get operationalState(): NodeOperationalState {
    return this.record.status.operationalState;
  }

  get storage(): StorageUsage {
    return this.record.storage;
  }

  /**
   * Milliseconds since the last heartbeat
   */
  elapsedSinceHeartbeat(now: number = Date.now()): number {
    return Math.max(0, now - this.record.lastHeartbeat);
  }

  isHealthy(): boolean {
    return this.record.status.health === 'HEALTHY';
  }

  /**
   * Healthy and in service: eligible for cluster-wide maintenance commands
   */
  isHealthyInService(): boolean {
    return this.isHealthy() && this.record.status.operationalState === 'IN_SERVICE';
  }

  /**
   * Whether the datanode answers to the given host name or IP address
   */
  matchesAddress(address: string): boolean {
    return this.record.details.hostName === address || this.record.details.ipAddress === address;
  }

  matches(filters: DatanodeListFilters): boolean {
    if (filters.health !== undefined && filters.health !== this.health) {
      return false;
    }
    if (filters.operationalState !== undefined && filters.operationalState !== this.operationalState) {
      return false;
    }
    return true;
  }

  toListItem(): DatanodeListItem {
    const { details, status } = this.record;
    return {
      uuid: details.uuid,
      hostName: details.hostName,
      ipAddress: details.ipAddress,
      networkLocation: details.networkLocation,
      operationalState: status.operationalState,
      health: status.health,
      lastHeartbeat: this.record.lastHeartbeat,
      storage: { ...this.record.storage },
    };
  }

  /**
   * Sort list items by host name, then uuid
   */
  static sortListItems(items: DatanodeListItem[]): DatanodeListItem[] {
    return [...items].sort(
      (a, b) => a.hostName.localeCompare(b.hostName) || a.uuid.localeCompare(b.uuid),
    );
  }
}
