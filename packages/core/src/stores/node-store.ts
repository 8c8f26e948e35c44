/**
 * Reactive datanode registry using Vue reactivity
 * @module @strata/core/stores/node-store
 */

import { computed, shallowReactive, type ComputedRef } from '@vue/reactivity';
import type {
  DatanodeDetails,
  DatanodeRecord,
  LayoutVersionReport,
  NodeHealthState,
  NodeOperationalState,
  StorageUsage,
} from '@strata/shared';
import { ALL_HEALTH_STATES, ALL_OPERATIONAL_STATES, NodeError } from '@strata/shared';
import { DatanodeModel, type DatanodeListFilters } from '../models/datanode';

/**
 * Authoritative in-memory map of datanode id to record.
 *
 * Records are replaced, never mutated in place, so a reader holding a record
 * sees a consistent snapshot. Per-node serialisation is the caller's job
 * (NodeLockManager); every method here is synchronous.
 */
export class DatanodeRegistry {
  private readonly records: Map<string, DatanodeRecord> = shallowReactive(new Map<string, DatanodeRecord>());

  // ============================================================================
  // Computed Properties
  // ============================================================================

  /**
   * Total datanode count
   */
  readonly nodeCount: ComputedRef<number> = computed(() => this.records.size);

  /**
   * Datanodes grouped by health
   */
  readonly nodesByHealth: ComputedRef<Map<NodeHealthState, DatanodeRecord[]>> = computed(() => {
    const grouped = new Map<NodeHealthState, DatanodeRecord[]>();
    for (const health of ALL_HEALTH_STATES) {
      grouped.set(health, []);
    }

    for (const record of this.records.values()) {
      grouped.get(record.status.health)?.push(record);
    }

    return grouped;
  });

  /**
   * Datanodes grouped by operational state
   */
  readonly nodesByOperationalState: ComputedRef<Map<NodeOperationalState, DatanodeRecord[]>> =
    computed(() => {
      const grouped = new Map<NodeOperationalState, DatanodeRecord[]>();
      for (const state of ALL_OPERATIONAL_STATES) {
        grouped.set(state, []);
      }

      for (const record of this.records.values()) {
        grouped.get(record.status.operationalState)?.push(record);
      }

      return grouped;
    });

  // ============================================================================
  // Queries
  // ============================================================================

  get size(): number {
    return this.records.size;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get(id: string): DatanodeRecord | undefined {
    return this.records.get(id);
  }

  /**
   * Get a record or throw NodeError.notFound
   */
  require(id: string): DatanodeRecord {
    const record = this.records.get(id);
    if (!record) {
      throw NodeError.notFound(id);
    }
    return record;
  }

  list(filters: DatanodeListFilters = {}): DatanodeRecord[] {
    return [...this.records.values()].filter(record => new DatanodeModel(record).matches(filters));
  }

  count(filters: DatanodeListFilters = {}): number {
    if (filters.health === undefined && filters.operationalState === undefined) {
      return this.records.size;
    }
    return this.list(filters).length;
  }

  /**
   * Datanodes answering to a host name or IP address
   */
  findByAddress(address: string): DatanodeRecord[] {
    return [...this.records.values()].filter(record => new DatanodeModel(record).matchesAddress(address));
  }

  // ============================================================================
  // Actions
  // ============================================================================

  /**
   * Insert or replace a record by id. Last write wins.
   */
  upsert(record: DatanodeRecord): DatanodeRecord {
    this.records.set(record.details.uuid, record);
    return record;
  }

  /**
   * Remove a record
   * @throws {NodeError} when the datanode is unknown
   */
  remove(id: string): DatanodeRecord {
    const record = this.require(id);
    this.records.delete(id);
    return record;
  }

  /**
   * Replace the descriptive details, keeping the status.
   * The control plane's operational state stays authoritative over the reported one.
   */
  updateDetails(id: string, details: DatanodeDetails, now: number = Date.now()): DatanodeRecord {
    const record = this.require(id);
    return this.replace(record, {
      details: {
        ...details,
        persistedOpState: record.status.operationalState,
        persistedOpStateExpiryEpochSec: record.status.opStateExpiryEpochSec,
      },
      updatedAt: now,
    });
  }

  /**
   * Set the operational state. Status and persisted details change together.
   */
  setOperationalState(
    id: string,
    state: NodeOperationalState,
    expiryEpochSec = 0,
    now: number = Date.now(),
  ): DatanodeRecord {
    const record = this.require(id);
    return this.replace(record, {
      details: {
        ...record.details,
        persistedOpState: state,
        persistedOpStateExpiryEpochSec: expiryEpochSec,
      },
      status: {
        ...record.status,
        operationalState: state,
        opStateExpiryEpochSec: expiryEpochSec,
      },
      updatedAt: now,
    });
  }

  /**
   * Record a heartbeat: the node is HEALTHY as of `now`
   */
  recordHeartbeat(id: string, now: number, layoutVersion?: LayoutVersionReport): DatanodeRecord {
    const record = this.require(id);
    return this.replace(record, {
      status: { ...record.status, health: 'HEALTHY' },
      lastHeartbeat: now,
      layoutVersion: layoutVersion ? { ...layoutVersion } : record.layoutVersion,
      updatedAt: now,
    });
  }

  setHealth(id: string, health: NodeHealthState, now: number = Date.now()): DatanodeRecord {
    const record = this.require(id);
    if (record.status.health === health) {
      return record;
    }
    return this.replace(record, {
      status: { ...record.status, health },
      updatedAt: now,
    });
  }

  updateStorage(id: string, storage: StorageUsage, now: number = Date.now()): DatanodeRecord {
    const record = this.require(id);
    return this.replace(record, {
      storage: { ...storage },
      updatedAt: now,
    });
  }

  clear(): void {
    this.records.clear();
  }

  private replace(record: DatanodeRecord, changes: Partial<DatanodeRecord>): DatanodeRecord {
    const updated: DatanodeRecord = { ...record, ...changes };
    this.records.set(updated.details.uuid, updated);
    return updated;
  }
}

/**
 * Create an empty registry
 */
export function createDatanodeRegistry(): DatanodeRegistry {
  return new DatanodeRegistry();
}
