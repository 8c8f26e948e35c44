/**
 * Reports datanodes attach to registrations and heartbeats
 * @module @strata/shared/types/reports
 */

import type { DatanodeCommandType } from './commands';
import type { LayoutVersionReport, StorageUsage } from './datanode';

/**
 * Usage of a single storage volume
 */
export interface StorageReport {
  storageUuid: string;
  storageLocation: string;
  capacity: number;
  scmUsed: number;
  remaining: number;
  failed?: boolean;
}

/**
 * Storage state of a datanode
 */
export interface NodeReport {
  storageReports: StorageReport[];
}

/**
 * Pipelines a datanode currently participates in
 */
export interface PipelineReport {
  pipelineIds: string[];
}

/**
 * Commands a datanode still holds in its local queue, by kind
 */
export interface CommandQueueReport {
  counts: Partial<Record<DatanodeCommandType, number>>;
}

/**
 * Payload accompanying a heartbeat
 */
export interface HeartbeatReport {
  nodeReport?: NodeReport;
  layoutVersion?: LayoutVersionReport;
  commandQueueReport?: CommandQueueReport;
}

/**
 * Sum the usage of all healthy volumes in a node report
 */
export function summarizeNodeReport(report: NodeReport): StorageUsage {
  let capacity = 0;
  let used = 0;
  let remaining = 0;

  for (const storage of report.storageReports) {
    if (storage.failed) continue;
    capacity += storage.capacity;
    used += storage.scmUsed;
    remaining += storage.remaining;
  }

  return { capacity, used, remaining };
}
