/**
 * Read-mostly node manager for an observer of the cluster
 * @module @strata/core/services/observer-node-manager
 */

import type {
  CommandForDatanode,
  DatanodeCommand,
  DatanodeCommandType,
  DatanodeDetails,
  HeartbeatReport,
  LayoutVersionReport,
  NodeManagerConfig,
  NodeOperationalState,
  NodeReport,
  NodeStatus,
  NodeTable,
  PendingCommandPolicy,
  PipelineReport,
  RegisteredResponse,
  VersionResponse,
} from '@strata/shared';
import { createNodeManagerConfig, createServiceLogger, observerOutdatedThresholdMs } from '@strata/shared';
import { createDatanodeCommand } from '../models/datanode';
import { HeartbeatTracker } from '../stores/heartbeat-tracker';
import type { ClusterContext } from './cluster-context';
import type { NodeEventBus } from './event-bus';
import type { LayoutVersionManager } from './layout-version-coordinator';
import { NodeManager, type MembershipService } from './node-manager';

const logger = createServiceLogger({
  level: 'debug',
  service: 'strata-membership',
}, { component: 'observer-node-manager' });

/**
 * Command kinds an observer may send to datanodes
 */
export const ALLOWED_COMMANDS: ReadonlySet<DatanodeCommandType> = new Set<DatanodeCommandType>([
  'reregisterCommand',
]);

/**
 * Observer node manager options
 */
export interface ObserverNodeManagerOptions {
  config?: Partial<NodeManagerConfig>;
  table?: NodeTable;
  eventBus?: NodeEventBus;
  clusterContext?: ClusterContext;
  layoutManager?: LayoutVersionManager;
  enableHeartbeatMonitoring?: boolean;
}

/**
 * Observer over the cluster's datanodes.
 *
 * Tracks membership like the primary but never drives the cluster: it only
 * ever tells a datanode to re-register, it adopts operational states rather
 * than enforcing them, and it records layout mismatches without acting on them.
 */
export class ObserverNodeManager implements MembershipService {
  private readonly inner: NodeManager;
  private readonly tracker = new HeartbeatTracker();
  private readonly outdatedThresholdMs: number;
  private readonly pendingCommandPolicy: PendingCommandPolicy;

  constructor(options: ObserverNodeManagerOptions = {}) {
    const config = createNodeManagerConfig(options.config);
    this.outdatedThresholdMs = observerOutdatedThresholdMs(config);
    this.pendingCommandPolicy = config.pendingCommandsOnReregister;
    this.inner = new NodeManager({
      config,
      table: options.table,
      eventBus: options.eventBus,
      clusterContext: options.clusterContext,
      layoutManager: options.layoutManager,
      finalizeMode: 'log-only',
      opStateMode: 'follow-reported',
      enableHeartbeatMonitoring: options.enableHeartbeatMonitoring,
    });
  }

  /**
   * The composed node manager
   */
  get nodes(): NodeManager {
    return this.inner;
  }

  get config(): NodeManagerConfig {
    return this.inner.config;
  }

  // ===========================================================================
  // Startup Reconciliation
  // ===========================================================================

  /**
   * Load the datanodes stored in the node table
   */
  initialize(): Promise<number> {
    return this.inner.loadExistingNodes();
  }

  reinitialize(table: NodeTable): Promise<number> {
    return this.inner.reinitialize(table);
  }

  // ===========================================================================
  // Heartbeat Processing
  // ===========================================================================

  /**
   * Process a heartbeat.
   * A datanode silent for longer than the outdated threshold (or never seen by
   * this observer) is told to re-register and nothing else.
   */
  processHeartbeat(details: DatanodeDetails, report?: HeartbeatReport): Promise<DatanodeCommand[]> {
    const id = details.uuid;

    return this.inner.withNodeLock(id, async () => {
      const now = Date.now();
      const elapsed = now - this.tracker.get(id);

      if (elapsed >= this.outdatedThresholdMs) {
        this.tracker.record(id, now);
        const discarded = this.pendingCommandPolicy === 'discard' ? this.inner.purgeCommands(id) : 0;
        logger.info('Datanode heartbeat is outdated, asking it to re-register', {
          datanodeId: id,
          elapsedMs: elapsed,
          thresholdMs: this.outdatedThresholdMs,
          discardedCommands: discarded,
        });
        return [createDatanodeCommand('reregisterCommand', {}, now)];
      }

      this.tracker.record(id, now);
      const commands = await this.inner.processHeartbeat(details, report);
      return commands.filter(command => ALLOWED_COMMANDS.has(command.type));
    });
  }

  /**
   * Last heartbeat this observer saw; 0 when never seen
   */
  getLastHeartbeat(datanodeId: string): number {
    return this.tracker.get(datanodeId);
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Forward allowed commands to the node manager; drop the rest
   */
  onCommand(command: CommandForDatanode): void {
    if (!ALLOWED_COMMANDS.has(command.command.type)) {
      logger.debug('Ignoring command the observer does not send', {
        datanodeId: command.datanodeId,
        commandType: command.command.type,
      });
      return;
    }
    this.inner.onCommand(command);
  }

  attach(bus: NodeEventBus): () => void {
    return bus.subscribe('datanode:command', command => this.onCommand(command));
  }

  /**
   * Observers never ask for usage refreshes
   */
  refreshAllHealthyDnUsageInfo(): number {
    return 0;
  }

  // ===========================================================================
  // Membership
  // ===========================================================================

  register(
    details: DatanodeDetails,
    nodeReport?: NodeReport,
    pipelineReport?: PipelineReport,
    layoutInfo?: LayoutVersionReport,
  ): Promise<RegisteredResponse> {
    return this.inner.register(details, nodeReport, pipelineReport, layoutInfo);
  }

  /**
   * Remove a datanode, then forget when it was last seen
   */
  removeNode(datanodeId: string): Promise<void> {
    return this.inner.withNodeLock(datanodeId, async () => {
      await this.inner.removeNode(datanodeId);
      this.tracker.delete(datanodeId);
    });
  }

  setNodeOperationalState(
    datanodeId: string,
    state: NodeOperationalState,
    expiryEpochSec?: number,
  ): Promise<void> {
    return this.inner.setNodeOperationalState(datanodeId, state, expiryEpochSec);
  }

  /**
   * Bring this observer's view of a datanode's operational state in line with the primary's
   * @returns whether the state changed
   * @throws {NodeError} when the datanode is unknown
   */
  reconcileOperationalState(
    datanodeId: string,
    primaryState: NodeOperationalState,
    expiryEpochSec = 0,
  ): Promise<boolean> {
    return this.inner.withNodeLock(datanodeId, async () => {
      const current = this.inner.getNodeStatus(datanodeId);
      if (current.operationalState === primaryState && current.opStateExpiryEpochSec === expiryEpochSec) {
        return false;
      }

      logger.info('Following operational state from the primary', {
        datanodeId,
        previous: current.operationalState,
        current: primaryState,
      });
      await this.inner.setNodeOperationalState(datanodeId, primaryState, expiryEpochSec);
      return true;
    });
  }

  getNodeStatus(datanodeId: string): NodeStatus {
    return this.inner.getNodeStatus(datanodeId);
  }

  isNodeRegistered(datanodeId: string): boolean {
    return this.inner.isNodeRegistered(datanodeId);
  }

  getVersionResponse(): VersionResponse {
    return { ...this.inner.getVersionResponse(), version: 0 };
  }

  getClusterContext(): ClusterContext {
    return this.inner.getClusterContext();
  }

  startHeartbeatMonitoring(): void {
    this.inner.startHeartbeatMonitoring();
  }

  stopHeartbeatMonitoring(): void {
    this.inner.stopHeartbeatMonitoring();
  }

  dispose(): void {
    this.inner.dispose();
    this.tracker.clear();
  }
}

/**
 * Create a new observer node manager
 */
export function createObserverNodeManager(options?: ObserverNodeManagerOptions): ObserverNodeManager {
  return new ObserverNodeManager(options);
}
