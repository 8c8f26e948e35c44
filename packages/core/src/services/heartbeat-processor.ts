/**
 * Heartbeat processing and node health evaluation
 * @module @strata/core/services/heartbeat-processor
 */

import type {
  DatanodeCommand,
  DatanodeDetails,
  HeartbeatReport,
  NodeHealthState,
} from '@strata/shared';
import { createServiceLogger, summarizeNodeReport, type Logger } from '@strata/shared';
import { createDatanodeCommand } from '../models/datanode';
import type { CommandQueue } from '../stores/command-queue';
import type { DatanodeRegistry } from '../stores/node-store';
import type { NodeEventBus } from './event-bus';
import type { LayoutVersionCoordinator } from './layout-version-coordinator';
import type { NodeLockManager } from './node-locks';

const logger = createServiceLogger({
  level: 'debug',
  service: 'strata-membership',
}, { component: 'heartbeat-processor' });

// ============================================================================
// Types
// ============================================================================

/**
 * How a difference between the control plane's operational state and the
 * state a datanode reports is resolved
 * - enforce: the datanode is told the control plane's state
 * - follow-reported: the registry adopts the datanode's state
 */
export type OpStateMode = 'enforce' | 'follow-reported';

/**
 * Heartbeat processor options
 */
export interface HeartbeatProcessorOptions {
  registry: DatanodeRegistry;
  commandQueue: CommandQueue;
  layoutCoordinator: LayoutVersionCoordinator;
  locks: NodeLockManager;
  eventBus: NodeEventBus;
  staleNodeIntervalMs: number;
  deadNodeIntervalMs: number;
  opStateMode?: OpStateMode;
  logger?: Logger;
}

/**
 * Health sweep result
 */
export interface HealthCheckResult {
  /** Number of nodes checked */
  checked: number;
  /** IDs of nodes that became STALE */
  stale: string[];
  /** IDs of nodes that became DEAD */
  dead: string[];
}

// ============================================================================
// Heartbeat Processor
// ============================================================================

export class HeartbeatProcessor {
  private readonly registry: DatanodeRegistry;
  private readonly commandQueue: CommandQueue;
  private readonly layoutCoordinator: LayoutVersionCoordinator;
  private readonly locks: NodeLockManager;
  private readonly eventBus: NodeEventBus;
  private readonly staleNodeIntervalMs: number;
  private readonly deadNodeIntervalMs: number;
  readonly opStateMode: OpStateMode;
  private readonly logger: Logger;

  constructor(options: HeartbeatProcessorOptions) {
    this.registry = options.registry;
    this.commandQueue = options.commandQueue;
    this.layoutCoordinator = options.layoutCoordinator;
    this.locks = options.locks;
    this.eventBus = options.eventBus;
    this.staleNodeIntervalMs = options.staleNodeIntervalMs;
    this.deadNodeIntervalMs = options.deadNodeIntervalMs;
    this.opStateMode = options.opStateMode ?? 'enforce';
    this.logger = options.logger ?? logger;
  }

  /**
   * Process one heartbeat and return the commands to deliver with the reply
   */
  async process(
    details: DatanodeDetails,
    report: HeartbeatReport = {},
    now: number = Date.now(),
  ): Promise<DatanodeCommand[]> {
    const id = details.uuid;

    const log = this.logger.withDatanode(id);

    return this.locks.runExclusive(id, () => {
      const record = this.registry.get(id);
      if (!record) {
        log.debug('Heartbeat from unregistered datanode, asking it to register', {
          hostName: details.hostName,
        });
        return [createDatanodeCommand('reregisterCommand', {}, now)];
      }

      const previousHealth = record.status.health;
      this.registry.recordHeartbeat(id, now, report.layoutVersion);
      if (previousHealth !== 'HEALTHY') {
        log.info('Datanode is healthy again', { previous: previousHealth });
        this.eventBus.publish('datanode:health-changed', {
          datanodeId: id,
          previous: previousHealth,
          current: 'HEALTHY',
        });
      }

      if (report.nodeReport) {
        this.registry.updateStorage(id, summarizeNodeReport(report.nodeReport), now);
      }

      if (report.layoutVersion) {
        const finalize = this.layoutCoordinator.finalizeCommandFor(record.details, report.layoutVersion, now);
        if (finalize) {
          this.commandQueue.add(id, finalize, now);
        }
      }

      if (report.commandQueueReport) {
        this.commandQueue.recordReportedCounts(id, report.commandQueueReport);
      }

      this.reconcileOperationalState(details, now, log);

      return this.commandQueue.drain(id);
    });
  }

  /**
   * Classify every node by heartbeat recency.
   * Only ever degrades health; a heartbeat is what makes a node HEALTHY.
   */
  evaluateHealth(now: number = Date.now()): HealthCheckResult {
    const result: HealthCheckResult = { checked: 0, stale: [], dead: [] };

    for (const record of this.registry.list()) {
      result.checked++;
      const id = record.details.uuid;
      const elapsed = now - record.lastHeartbeat;
      const target = this.healthFor(elapsed);
      const current = record.status.health;

      if (target === 'HEALTHY' || target === current) {
        continue;
      }

      this.registry.setHealth(id, target, now);
      if (target === 'DEAD') {
        const dropped = this.commandQueue.purge(id);
        result.dead.push(id);
        this.logger.withDatanode(id).warn('Datanode is dead', { elapsedMs: elapsed, droppedCommands: dropped });
      } else {
        result.stale.push(id);
        this.logger.withDatanode(id).info('Datanode is stale', { elapsedMs: elapsed });
      }

      this.eventBus.publish('datanode:health-changed', { datanodeId: id, previous: current, current: target });
    }

    return result;
  }

  private healthFor(elapsed: number): NodeHealthState {
    if (elapsed >= this.deadNodeIntervalMs) {
      return 'DEAD';
    }
    if (elapsed >= this.staleNodeIntervalMs) {
      return 'STALE';
    }
    return 'HEALTHY';
  }

  private reconcileOperationalState(details: DatanodeDetails, now: number, log: Logger): void {
    const id = details.uuid;
    const record = this.registry.require(id);
    const { operationalState, opStateExpiryEpochSec } = record.status;

    if (
      details.persistedOpState === operationalState &&
      details.persistedOpStateExpiryEpochSec === opStateExpiryEpochSec
    ) {
      return;
    }

    if (this.opStateMode === 'follow-reported') {
      log.info('Adopting operational state reported by datanode', {
        previous: operationalState,
        reported: details.persistedOpState,
      });
      this.registry.setOperationalState(id, details.persistedOpState, details.persistedOpStateExpiryEpochSec, now);
      return;
    }

    log.info('Datanode operational state differs, sending the control plane state', {
      reported: details.persistedOpState,
      expected: operationalState,
    });
    this.commandQueue.add(
      id,
      createDatanodeCommand(
        'setNodeOperationalStateCommand',
        { operationalState, opStateExpiryEpochSec },
        now,
      ),
      now,
    );
  }
}
