/**
 * Per-datanode command queue
 * @module @strata/core/stores/command-queue
 */

import type {
  CommandQueueReport,
  DatanodeCommand,
  DatanodeCommandType,
  QueuedCommand,
} from '@strata/shared';

/**
 * FIFO of commands awaiting delivery, one queue per datanode.
 *
 * Commands leave the queue when a heartbeat drains it; a drained command is
 * never handed out twice. Alongside the queue, the counts a datanode reports
 * for commands it still holds locally are kept so callers can see the total
 * backlog of a given kind.
 */
export class CommandQueue {
  private readonly queues = new Map<string, QueuedCommand[]>();
  private readonly reportedCounts = new Map<string, Partial<Record<DatanodeCommandType, number>>>();

  /**
   * Queue a command for a datanode
   */
  add(datanodeId: string, command: DatanodeCommand, now: number = Date.now()): QueuedCommand {
    const entry: QueuedCommand = { datanodeId, command, enqueuedAt: now };
    const queue = this.queues.get(datanodeId);
    if (queue) {
      queue.push(entry);
    } else {
      this.queues.set(datanodeId, [entry]);
    }
    return entry;
  }

  /**
   * Remove and return everything queued for a datanode, oldest first
   */
  drain(datanodeId: string): DatanodeCommand[] {
    const queue = this.queues.get(datanodeId);
    if (!queue) {
      return [];
    }
    this.queues.delete(datanodeId);
    return queue.map(entry => entry.command);
  }

  /**
   * Queued commands without removing them
   */
  peek(datanodeId: string): readonly QueuedCommand[] {
    return this.queues.get(datanodeId) ?? [];
  }

  /**
   * Drop everything held for a datanode. Returns the number of queued commands dropped.
   */
  purge(datanodeId: string): number {
    const dropped = this.queues.get(datanodeId)?.length ?? 0;
    this.queues.delete(datanodeId);
    this.reportedCounts.delete(datanodeId);
    return dropped;
  }

  /**
   * Number of queued commands for a datanode, optionally of one kind
   */
  count(datanodeId: string, type?: DatanodeCommandType): number {
    const queue = this.queues.get(datanodeId);
    if (!queue) {
      return 0;
    }
    if (type === undefined) {
      return queue.length;
    }
    return queue.filter(entry => entry.command.type === type).length;
  }

  /**
   * Commands queued across all datanodes
   */
  get totalSize(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.length;
    }
    return total;
  }

  /**
   * Store the per-kind counts a datanode reported for its local queue.
   * A new report replaces the previous one.
   */
  recordReportedCounts(datanodeId: string, report: CommandQueueReport): void {
    this.reportedCounts.set(datanodeId, { ...report.counts });
  }

  getReportedCount(datanodeId: string, type: DatanodeCommandType): number {
    return this.reportedCounts.get(datanodeId)?.[type] ?? 0;
  }

  /**
   * Queued here plus still held by the datanode
   */
  getTotalPendingCount(datanodeId: string, type: DatanodeCommandType): number {
    return this.count(datanodeId, type) + this.getReportedCount(datanodeId, type);
  }

  clear(): void {
    this.queues.clear();
    this.reportedCounts.clear();
  }
}
