/**
 * Node manager service
 * Handles datanode registration, heartbeat processing, commands and health status
 * @module @strata/core/services/node-manager
 */

import type { ComputedRef } from '@vue/reactivity';
import type {
  CommandForDatanode,
  DatanodeCommand,
  DatanodeCommandType,
  DatanodeDescriptor,
  DatanodeDetails,
  DatanodeListItem,
  DatanodeRecord,
  HeartbeatReport,
  LayoutVersionReport,
  NodeHealthState,
  NodeManagerConfig,
  NodeOperationalState,
  NodeReport,
  NodeStatus,
  NodeTable,
  PipelineReport,
  RegisteredResponse,
  StorageUsage,
  VersionResponse,
} from '@strata/shared';
import {
  NodeError,
  PersistenceError,
  createNodeManagerConfig,
  createServiceLogger,
} from '@strata/shared';
import { DatanodeModel, createDatanodeCommand, type DatanodeListFilters } from '../models/datanode';
import { CommandQueue } from '../stores/command-queue';
import { KnownNodeIndex } from '../stores/known-node-index';
import { DatanodeRegistry } from '../stores/node-store';
import { ClusterContext } from './cluster-context';
import { NodeEventBus } from './event-bus';
import { HeartbeatProcessor, type HealthCheckResult, type OpStateMode } from './heartbeat-processor';
import {
  LayoutVersionCoordinator,
  LayoutVersionManager,
  type FinalizeMode,
} from './layout-version-coordinator';
import { NetworkTopology } from './network-topology';
import { NodeLockManager } from './node-locks';
import { RegistrationCoordinator } from './registration-coordinator';

/**
 * Logger for node manager operations
 */
const logger = createServiceLogger({
  level: 'debug',
  service: 'strata-membership',
}, { component: 'node-manager' });

/**
 * Protocol version advertised by the primary
 */
export const MEMBERSHIP_PROTOCOL_VERSION = 1;

// ============================================================================
// Types
// ============================================================================

/**
 * Operations shared by the primary node manager and the observer overlay
 */
export interface MembershipService {
  processHeartbeat(details: DatanodeDetails, report?: HeartbeatReport): Promise<DatanodeCommand[]>;
  register(
    details: DatanodeDetails,
    nodeReport?: NodeReport,
    pipelineReport?: PipelineReport,
    layoutInfo?: LayoutVersionReport,
  ): Promise<RegisteredResponse>;
  removeNode(datanodeId: string): Promise<void>;
  setNodeOperationalState(
    datanodeId: string,
    state: NodeOperationalState,
    expiryEpochSec?: number,
  ): Promise<void>;
  getNodeStatus(datanodeId: string): NodeStatus;
  isNodeRegistered(datanodeId: string): boolean;
  getLastHeartbeat(datanodeId: string): number;
  onCommand(command: CommandForDatanode): void;
  attach(bus: NodeEventBus): () => void;
  refreshAllHealthyDnUsageInfo(): number;
  getVersionResponse(): VersionResponse;
  getClusterContext(): ClusterContext;
  reinitialize(table: NodeTable): Promise<number>;
  startHeartbeatMonitoring(): void;
  stopHeartbeatMonitoring(): void;
  dispose(): void;
}

/**
 * Node manager options
 */
export interface NodeManagerOptions {
  /** Overrides applied over the default configuration */
  config?: Partial<NodeManagerConfig>;
  /** Durable node table; membership is memory-only without one */
  table?: NodeTable;
  eventBus?: NodeEventBus;
  clusterContext?: ClusterContext;
  layoutManager?: LayoutVersionManager;
  /** Whether finalize-required datanodes receive a finalize command (default: command) */
  finalizeMode?: FinalizeMode;
  /** How operational state differences are resolved (default: enforce) */
  opStateMode?: OpStateMode;
  /** Start the health sweep on construction */
  enableHeartbeatMonitoring?: boolean;
}

/**
 * Datanode count filter
 */
export type NodeCountFilter = DatanodeListFilters;

// ============================================================================
// Node Manager Service
// ============================================================================

/**
 * Node Manager Service
 * Composes the registry, command queue, topology and coordinators behind one facade
 */
export class NodeManager implements MembershipService {
  readonly config: NodeManagerConfig;
  private readonly registry = new DatanodeRegistry();
  private readonly commandQueue = new CommandQueue();
  private readonly knownNodes = new KnownNodeIndex();
  private readonly topology = new NetworkTopology();
  private readonly locks = new NodeLockManager();
  private readonly eventBus: NodeEventBus;
  private readonly clusterContext: ClusterContext;
  private readonly layoutCoordinator: LayoutVersionCoordinator;
  private readonly heartbeats: HeartbeatProcessor;
  private readonly registration: RegistrationCoordinator;
  private heartbeatCheckTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: NodeManagerOptions = {}) {
    this.config = createNodeManagerConfig(options.config);
    this.eventBus = options.eventBus ?? new NodeEventBus();
    this.clusterContext = options.clusterContext ?? new ClusterContext(this.config.clusterId);
    this.layoutCoordinator = new LayoutVersionCoordinator({
      manager: options.layoutManager,
      finalizeMode: options.finalizeMode,
    });

    this.heartbeats = new HeartbeatProcessor({
      registry: this.registry,
      commandQueue: this.commandQueue,
      layoutCoordinator: this.layoutCoordinator,
      locks: this.locks,
      eventBus: this.eventBus,
      staleNodeIntervalMs: this.config.staleNodeIntervalMs,
      deadNodeIntervalMs: this.config.deadNodeIntervalMs,
      opStateMode: options.opStateMode,
    });

    this.registration = new RegistrationCoordinator({
      registry: this.registry,
      topology: this.topology,
      knownNodes: this.knownNodes,
      commandQueue: this.commandQueue,
      layoutCoordinator: this.layoutCoordinator,
      clusterContext: this.clusterContext,
      eventBus: this.eventBus,
      locks: this.locks,
      table: options.table,
      durability: this.config.registrationDurability,
    });

    if (options.enableHeartbeatMonitoring) {
      this.startHeartbeatMonitoring();
    }
  }

  // ===========================================================================
  // Computed Properties (reactive)
  // ===========================================================================

  /**
   * Total number of datanodes
   */
  get totalNodes(): ComputedRef<number> {
    return this.registry.nodeCount;
  }

  /**
   * Datanodes grouped by health
   */
  get byHealth(): ComputedRef<Map<NodeHealthState, DatanodeRecord[]>> {
    return this.registry.nodesByHealth;
  }

  /**
   * Datanodes grouped by operational state
   */
  get byOperationalState(): ComputedRef<Map<NodeOperationalState, DatanodeRecord[]>> {
    return this.registry.nodesByOperationalState;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  /**
   * Register or re-register a datanode
   */
  register(
    details: DatanodeDetails,
    nodeReport?: NodeReport,
    pipelineReport?: PipelineReport,
    layoutInfo?: LayoutVersionReport,
  ): Promise<RegisteredResponse> {
    return this.registration.register(details, nodeReport, pipelineReport, layoutInfo);
  }

  /**
   * Register every datanode stored in the node table
   * @returns number of datanodes loaded
   */
  loadExistingNodes(): Promise<number> {
    return this.registration.loadExistingNodes();
  }

  /**
   * Switch to a new node table and load the datanodes it holds
   */
  reinitialize(table: NodeTable): Promise<number> {
    logger.info('Reinitializing from node table');
    this.registration.setTable(table);
    return this.registration.loadExistingNodes();
  }

  countPersistedNodes(): Promise<number> {
    return this.registration.countPersistedNodes();
  }

  getUnsyncedNodeIds(): string[] {
    return this.registration.getUnsyncedNodeIds();
  }

  // ===========================================================================
  // Heartbeat Processing
  // ===========================================================================

  /**
   * Process a heartbeat from a datanode
   * @returns commands to deliver in the heartbeat reply
   */
  processHeartbeat(details: DatanodeDetails, report?: HeartbeatReport): Promise<DatanodeCommand[]> {
    return this.heartbeats.process(details, report, Date.now());
  }

  /**
   * Reclassify every datanode's health by heartbeat recency
   */
  checkHeartbeats(now: number = Date.now()): HealthCheckResult {
    const result = this.heartbeats.evaluateHealth(now);
    if (result.stale.length > 0 || result.dead.length > 0) {
      logger.debug('Heartbeat check complete', {
        checked: result.checked,
        stale: result.stale.length,
        dead: result.dead.length,
      });
    }
    return result;
  }

  /**
   * Start automatic heartbeat monitoring
   */
  startHeartbeatMonitoring(): void {
    if (this.heartbeatCheckTimer) {
      return; // Already running
    }

    logger.info('Starting heartbeat monitoring', {
      intervalMs: this.config.heartbeatCheckIntervalMs,
      staleNodeIntervalMs: this.config.staleNodeIntervalMs,
      deadNodeIntervalMs: this.config.deadNodeIntervalMs,
    });

    this.heartbeatCheckTimer = setInterval(() => {
      this.checkHeartbeats();
    }, this.config.heartbeatCheckIntervalMs);
  }

  /**
   * Stop automatic heartbeat monitoring
   */
  stopHeartbeatMonitoring(): void {
    if (this.heartbeatCheckTimer) {
      clearInterval(this.heartbeatCheckTimer);
      this.heartbeatCheckTimer = null;
      logger.info('Stopped heartbeat monitoring');
    }
  }

  isMonitoring(): boolean {
    return this.heartbeatCheckTimer !== null;
  }

  getLastHeartbeat(datanodeId: string): number {
    return this.registry.get(datanodeId)?.lastHeartbeat ?? 0;
  }

  // ===========================================================================
  // Removal
  // ===========================================================================

  /**
   * Remove a datanode from the cluster.
   * The node table row goes first; if that fails nothing in memory changes.
   * @throws {NodeError} when the datanode is unknown
   * @throws {PersistenceError} when the durable delete fails
   */
  removeNode(datanodeId: string): Promise<void> {
    return this.locks.runExclusive(datanodeId, async () => {
      if (!this.registry.has(datanodeId)) {
        throw NodeError.notFound(datanodeId);
      }

      const table = this.registration.getTable();
      if (table) {
        try {
          await table.delete(datanodeId);
        } catch (cause) {
          const error = PersistenceError.wrap('delete', datanodeId, cause);
          logger.error('Failed to delete datanode from node table', error, { datanodeId });
          throw error;
        }
      }

      this.registry.remove(datanodeId);
      this.topology.remove(datanodeId);
      const dropped = this.commandQueue.purge(datanodeId);
      this.knownNodes.delete(datanodeId);
      this.registration.forgetNode(datanodeId);

      logger.info('Datanode removed', { datanodeId, droppedCommands: dropped });
      this.eventBus.publish('datanode:removed', { datanodeId });
    });
  }

  // ===========================================================================
  // Status Management
  // ===========================================================================

  /**
   * Set the control plane's operational state for a datanode
   * @throws {NodeError} when the datanode is unknown
   */
  setNodeOperationalState(
    datanodeId: string,
    state: NodeOperationalState,
    expiryEpochSec = 0,
  ): Promise<void> {
    return this.locks.runExclusive(datanodeId, async () => {
      const previous = this.registry.require(datanodeId).status.operationalState;
      const record = this.registry.setOperationalState(datanodeId, state, expiryEpochSec);
      logger.info('Datanode operational state changed', {
        datanodeId,
        previous,
        current: state,
        expiryEpochSec,
      });
      await this.registration.syncDetails(datanodeId, record.details);
    });
  }

  /**
   * @throws {NodeError} when the datanode is unknown
   */
  getNodeStatus(datanodeId: string): NodeStatus {
    return { ...this.registry.require(datanodeId).status };
  }

  getNode(datanodeId: string): DatanodeRecord | undefined {
    return this.registry.get(datanodeId);
  }

  isNodeRegistered(datanodeId: string): boolean {
    return this.registry.has(datanodeId);
  }

  /**
   * @throws {NodeError} when the datanode is unknown
   */
  getNodeStorage(datanodeId: string): StorageUsage {
    return { ...this.registry.require(datanodeId).storage };
  }

  // ===========================================================================
  // Descriptive Lookups
  // ===========================================================================

  /**
   * Descriptive attributes for any datanode ever seen; empty values when unknown
   */
  getDescriptor(datanodeId: string): DatanodeDescriptor {
    return this.knownNodes.get(datanodeId);
  }

  getHostName(datanodeId: string): string {
    return this.knownNodes.get(datanodeId).hostName;
  }

  getVersion(datanodeId: string): string {
    return this.knownNodes.get(datanodeId).version;
  }

  getSetupTime(datanodeId: string): number {
    return this.knownNodes.get(datanodeId).setupTime;
  }

  getRevision(datanodeId: string): string {
    return this.knownNodes.get(datanodeId).revision;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Queue a command for a datanode
   * @throws {NodeError} when the datanode is unknown
   */
  addDatanodeCommand(datanodeId: string, command: DatanodeCommand): void {
    if (!this.registry.has(datanodeId)) {
      throw NodeError.notFound(datanodeId);
    }
    this.commandQueue.add(datanodeId, command);
  }

  /**
   * Event handler for inbound commands. Commands for unknown datanodes are dropped.
   */
  onCommand(command: CommandForDatanode): void {
    if (!this.registry.has(command.datanodeId)) {
      logger.warn('Dropping command for unregistered datanode', {
        datanodeId: command.datanodeId,
        commandType: command.command.type,
      });
      return;
    }
    this.commandQueue.add(command.datanodeId, command.command);
  }

  /**
   * Route `datanode:command` events on a bus to this manager
   * @returns function that detaches the handler
   */
  attach(bus: NodeEventBus): () => void {
    return bus.subscribe('datanode:command', command => this.onCommand(command));
  }

  /**
   * Commands of one kind pending for a datanode: queued here plus reported as held by it
   */
  getCommandQueueCount(datanodeId: string, type: DatanodeCommandType): number {
    return this.commandQueue.getTotalPendingCount(datanodeId, type);
  }

  /**
   * Drop the commands queued for a datanode
   * @returns number of commands dropped
   */
  purgeCommands(datanodeId: string): number {
    return this.commandQueue.purge(datanodeId);
  }

  /**
   * Ask every healthy, in-service datanode to refresh its volume usage
   * @returns number of datanodes asked
   */
  refreshAllHealthyDnUsageInfo(): number {
    const now = Date.now();
    const targets = this.registry
      .list({ health: 'HEALTHY', operationalState: 'IN_SERVICE' })
      .map(record => record.details.uuid);

    for (const datanodeId of targets) {
      this.commandQueue.add(datanodeId, createDatanodeCommand('refreshVolumeUsageInfo', {}, now), now);
    }

    logger.debug('Queued volume usage refresh', { count: targets.length });
    return targets.length;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getNodeCount(filter: NodeCountFilter = {}): number {
    return this.registry.count(filter);
  }

  /**
   * Datanode ids answering to a host name or IP address
   */
  getNodesByAddress(address: string): string[] {
    return this.registry.findByAddress(address).map(record => record.details.uuid);
  }

  listNodes(filters: DatanodeListFilters = {}): DatanodeListItem[] {
    const items = this.registry.list(filters).map(record => new DatanodeModel(record).toListItem());
    return DatanodeModel.sortListItems(items);
  }

  getVersionResponse(): VersionResponse {
    return {
      version: MEMBERSHIP_PROTOCOL_VERSION,
      clusterId: this.config.clusterId,
      softwareLayoutVersion: this.layoutCoordinator.manager.getSoftwareLayoutVersion(),
    };
  }

  getClusterContext(): ClusterContext {
    return this.clusterContext;
  }

  getEventBus(): NodeEventBus {
    return this.eventBus;
  }

  getLayoutCoordinator(): LayoutVersionCoordinator {
    return this.layoutCoordinator;
  }

  getTopology(): NetworkTopology {
    return this.topology;
  }

  /**
   * Run a task while holding a datanode's lock. Re-entrant for the calling context.
   */
  withNodeLock<T>(datanodeId: string, task: () => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(datanodeId, task);
  }

  // ===========================================================================
  // Cleanup
  // ===========================================================================

  /**
   * Dispose of the node manager
   */
  dispose(): void {
    this.stopHeartbeatMonitoring();
    logger.info('NodeManager disposed');
  }
}

/**
 * Create a new node manager instance
 */
export function createNodeManager(options?: NodeManagerOptions): NodeManager {
  return new NodeManager(options);
}
