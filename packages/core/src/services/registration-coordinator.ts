/**
 * Datanode registration and startup reconciliation
 * @module @strata/core/services/registration-coordinator
 */

import type {
  DatanodeDescriptor,
  DatanodeDetails,
  DatanodeRecord,
  DurabilityPolicy,
  LayoutVersionReport,
  NodeReport,
  NodeTable,
  PipelineReport,
  RegisteredResponse,
} from '@strata/shared';
import {
  PersistenceError,
  ValidationError,
  createServiceLogger,
  isTopologyError,
  summarizeNodeReport,
  toError,
  validateDatanodeDetails,
  type Logger,
} from '@strata/shared';
import { createDatanodeRecord, normalizeDetails } from '../models/datanode';
import type { CommandQueue } from '../stores/command-queue';
import type { KnownNodeIndex } from '../stores/known-node-index';
import type { DatanodeRegistry } from '../stores/node-store';
import type { ClusterContext } from './cluster-context';
import type { NodeEventBus } from './event-bus';
import type { LayoutVersionCoordinator } from './layout-version-coordinator';
import type { NetworkTopology } from './network-topology';
import type { NodeLockManager } from './node-locks';

const logger = createServiceLogger({
  level: 'debug',
  service: 'strata-membership',
}, { component: 'registration-coordinator' });

// ============================================================================
// Types
// ============================================================================

/**
 * Registration coordinator options
 */
export interface RegistrationCoordinatorOptions {
  registry: DatanodeRegistry;
  topology: NetworkTopology;
  knownNodes: KnownNodeIndex;
  commandQueue: CommandQueue;
  layoutCoordinator: LayoutVersionCoordinator;
  clusterContext: ClusterContext;
  eventBus: NodeEventBus;
  locks: NodeLockManager;
  table?: NodeTable;
  durability?: DurabilityPolicy;
  logger?: Logger;
}

/**
 * Per-call registration options
 */
export interface RegisterOptions {
  /** Write the details to the node table (default true) */
  persist?: boolean;
  now?: number;
}

// ============================================================================
// Registration Coordinator
// ============================================================================

export class RegistrationCoordinator {
  private readonly registry: DatanodeRegistry;
  private readonly topology: NetworkTopology;
  private readonly knownNodes: KnownNodeIndex;
  private readonly commandQueue: CommandQueue;
  private readonly layoutCoordinator: LayoutVersionCoordinator;
  private readonly clusterContext: ClusterContext;
  private readonly eventBus: NodeEventBus;
  private readonly locks: NodeLockManager;
  private readonly durability: DurabilityPolicy;
  private readonly logger: Logger;
  private table?: NodeTable;
  private readonly unsynced = new Set<string>();

  constructor(options: RegistrationCoordinatorOptions) {
    this.registry = options.registry;
    this.topology = options.topology;
    this.knownNodes = options.knownNodes;
    this.commandQueue = options.commandQueue;
    this.layoutCoordinator = options.layoutCoordinator;
    this.clusterContext = options.clusterContext;
    this.eventBus = options.eventBus;
    this.locks = options.locks;
    this.table = options.table;
    this.durability = options.durability ?? 'best-effort';
    this.logger = options.logger ?? logger;
  }

  getTable(): NodeTable | undefined {
    return this.table;
  }

  setTable(table: NodeTable | undefined): void {
    this.table = table;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register (or re-register) a datanode.
   * A topology conflict is reported in the response, never thrown.
   * @throws {ValidationError} for malformed details
   * @throws {PersistenceError} when a durable write fails under strict durability
   */
  async register(
    details: DatanodeDetails,
    nodeReport?: NodeReport,
    pipelineReport?: PipelineReport,
    layoutInfo?: LayoutVersionReport,
    options: RegisterOptions = {},
  ): Promise<RegisteredResponse> {
    const validation = validateDatanodeDetails(details);
    if (!validation.valid) {
      this.logger.withDatanode(details.uuid).warn('Datanode registration validation failed', {
        errorCount: validation.errors.length,
      });
      throw ValidationError.multiple(
        validation.errors.map(error => ({ field: error.field, message: error.message, rule: error.code })),
      );
    }

    const normalized = normalizeDetails(details);
    const id = normalized.uuid;
    const persist = options.persist ?? true;
    const log = this.logger.withDatanode(id);

    return this.locks.runExclusive<RegisteredResponse>(id, async () => {
      const now = options.now ?? Date.now();
      const previous = this.registry.get(id);
      const previousDescriptor = this.knownNodes.peek(id);
      const layout = layoutInfo ?? this.layoutCoordinator.manager.toReport();
      this.knownNodes.record(normalized);

      try {
        this.place(normalized, previous !== undefined, layout, now);
      } catch (error) {
        if (!isTopologyError(error)) {
          throw error;
        }
        log.error('Datanode placement rejected by network topology', error, {
          networkLocation: normalized.networkLocation,
        });
        this.clusterContext.updateHealthStatus(false);
        this.clusterContext.addError('INVALID_NETWORK_TOPOLOGY');
        return {
          errorCode: 'errorNodeNotPermitted',
          datanode: normalized,
          clusterId: this.clusterContext.getClusterId(),
        };
      }

      // The table gets the record the registry holds, not the reported details
      const stored = this.registry.require(id);
      if (persist) {
        try {
          await this.syncDetails(id, stored.details);
        } catch (error) {
          this.rollback(id, previous, previousDescriptor, log);
          throw error;
        }
      }

      if (nodeReport) {
        this.registry.updateStorage(id, summarizeNodeReport(nodeReport), now);
      }

      const finalize = this.layoutCoordinator.finalizeCommandFor(stored.details, layout, now);
      if (finalize) {
        this.commandQueue.add(id, finalize, now);
      }

      this.clusterContext.updateHealthStatus(true);
      this.clusterContext.removeError('INVALID_NETWORK_TOPOLOGY');

      if (pipelineReport) {
        this.eventBus.publish('datanode:pipeline-report', { datanodeId: id, report: pipelineReport });
      }
      this.eventBus.publish('datanode:registered', {
        datanodeId: id,
        details: stored.details,
        newNode: previous === undefined,
      });

      log.info(previous ? 'Datanode re-registered' : 'Datanode registered', {
        hostName: normalized.hostName,
        networkLocation: normalized.networkLocation,
      });

      return {
        errorCode: 'success',
        datanode: normalized,
        clusterId: this.clusterContext.getClusterId(),
        hostName: normalized.hostName,
        ipAddress: normalized.ipAddress,
      };
    });
  }

  /**
   * Put the datanode in the topology and the registry.
   * @throws {TopologyError} with both left as they were
   */
  private place(details: DatanodeDetails, known: boolean, layout: LayoutVersionReport, now: number): void {
    const id = details.uuid;
    if (known) {
      this.topology.update({ id, networkLocation: details.networkLocation });
      this.registry.updateDetails(id, details, now);
      this.registry.recordHeartbeat(id, now, layout);
    } else {
      this.topology.add({ id, networkLocation: details.networkLocation });
      this.registry.upsert(createDatanodeRecord(details, layout, now));
    }
  }

  /**
   * Undo `place` after a strict durable write failed
   */
  private rollback(
    id: string,
    previous: DatanodeRecord | undefined,
    previousDescriptor: DatanodeDescriptor | undefined,
    log: Logger,
  ): void {
    this.knownNodes.restore(id, previousDescriptor);
    if (!previous) {
      this.registry.remove(id);
      this.topology.remove(id);
      return;
    }

    this.registry.upsert(previous);
    try {
      this.topology.update({ id, networkLocation: previous.details.networkLocation });
    } catch (error) {
      log.error('Unable to restore datanode placement after a failed write', toError(error), {
        networkLocation: previous.details.networkLocation,
      });
    }
  }

  // ===========================================================================
  // Durability
  // ===========================================================================

  /**
   * Write a datanode's details to the node table under the durability policy.
   * Best-effort failures are logged and the id is remembered as unsynced.
   */
  async syncDetails(id: string, details: DatanodeDetails): Promise<void> {
    const table = this.table;
    if (!table) {
      return;
    }
    const log = this.logger.withDatanode(id);

    try {
      await table.put(id, details);
      this.unsynced.delete(id);
    } catch (cause) {
      const error = PersistenceError.wrap('put', id, cause);
      if (this.durability === 'strict') {
        log.error('Failed to persist datanode details', error);
        throw error;
      }
      log.error('Failed to persist datanode details, continuing in memory', error);
      this.unsynced.add(id);
    }
  }

  /**
   * Ids whose latest durable write failed
   */
  getUnsyncedNodeIds(): string[] {
    return [...this.unsynced].sort();
  }

  forgetNode(id: string): void {
    this.unsynced.delete(id);
  }

  // ===========================================================================
  // Startup Reconciliation
  // ===========================================================================

  /**
   * Register every datanode stored in the node table without writing it back.
   * Stops at the first failure; nodes loaded before it stay registered.
   * @returns number of datanodes loaded
   */
  async loadExistingNodes(): Promise<number> {
    const table = this.table;
    if (!table) {
      return 0;
    }

    let loaded = 0;
    const iterator = table.iterate();
    try {
      for (let entry = await iterator.next(); entry; entry = await iterator.next()) {
        const response = await this.register(
          entry.details,
          undefined,
          undefined,
          this.layoutCoordinator.pinnedReport(),
          { persist: false },
        );
        if (response.errorCode === 'success') {
          loaded++;
        }
        this.logger.withDatanode(entry.id).debug('Loaded datanode from node table', {
          result: response.errorCode,
        });
      }
      this.clusterContext.removeError('NODE_TABLE_LOAD_FAILED');
      this.logger.info('Loaded datanodes from node table', { count: loaded });
    } catch (error) {
      this.logger.error('Unable to load datanodes from node table', toError(error), { loaded });
      this.clusterContext.addError('NODE_TABLE_LOAD_FAILED');
    } finally {
      await this.closeIterator(iterator);
    }

    return loaded;
  }

  /**
   * Count the rows in the node table
   */
  async countPersistedNodes(): Promise<number> {
    const table = this.table;
    if (!table) {
      return 0;
    }

    let count = 0;
    const iterator = table.iterate();
    try {
      while (await iterator.next()) {
        count++;
      }
    } catch (error) {
      throw PersistenceError.wrap('iterate', undefined, error);
    } finally {
      await this.closeIterator(iterator);
    }
    return count;
  }

  private async closeIterator(iterator: { close(): Promise<void> }): Promise<void> {
    try {
      await iterator.close();
    } catch (error) {
      this.logger.warn('Failed to close node table iterator', {
        error: toError(error).message,
      });
    }
  }
}
