/**
 * Commands delivered to datanodes on heartbeat responses
 * @module @strata/shared/types/commands
 */

import type { DatanodeDetails } from './datanode';

/**
 * Command kinds the control plane can hand to a datanode
 */
export type DatanodeCommandType =
  | 'reregisterCommand'
  | 'closeContainerCommand'
  | 'deleteBlocksCommand'
  | 'deleteContainerCommand'
  | 'replicateContainerCommand'
  | 'reconstructECContainersCommand'
  | 'createPipelineCommand'
  | 'closePipelineCommand'
  | 'setNodeOperationalStateCommand'
  | 'finalizeNewLayoutVersionCommand'
  | 'refreshVolumeUsageInfo';

/**
 * A command for one datanode
 */
export interface DatanodeCommand {
  /** Unique command ID */
  id: string;
  type: DatanodeCommandType;
  payload: Record<string, unknown>;
  /** Epoch milliseconds the command was created */
  issuedAt: number;
}

/**
 * Command addressed to a datanode, as carried on the event bus
 */
export interface CommandForDatanode {
  datanodeId: string;
  command: DatanodeCommand;
}

/**
 * Command waiting in a datanode's queue
 */
export interface QueuedCommand {
  datanodeId: string;
  command: DatanodeCommand;
  /** Epoch milliseconds the command was queued */
  enqueuedAt: number;
}

/**
 * Registration outcome codes
 */
export type RegistrationErrorCode = 'success' | 'errorNodeNotPermitted';

/**
 * Acknowledgement returned to a registering datanode.
 * Callers must check `errorCode`; topology rejections are not thrown.
 */
export interface RegisteredResponse {
  errorCode: RegistrationErrorCode;
  datanode: DatanodeDetails;
  clusterId: string;
  hostName?: string;
  ipAddress?: string;
}

/**
 * Response to a datanode's version request
 */
export interface VersionResponse {
  version: number;
  clusterId: string;
  softwareLayoutVersion: number;
}

/**
 * All command types
 */
export const ALL_COMMAND_TYPES: readonly DatanodeCommandType[] = [
  'reregisterCommand',
  'closeContainerCommand',
  'deleteBlocksCommand',
  'deleteContainerCommand',
  'replicateContainerCommand',
  'reconstructECContainersCommand',
  'createPipelineCommand',
  'closePipelineCommand',
  'setNodeOperationalStateCommand',
  'finalizeNewLayoutVersionCommand',
  'refreshVolumeUsageInfo',
];

/**
 * Type guard for command types
 */
export function isCommandType(value: unknown): value is DatanodeCommandType {
  return typeof value === 'string' && ALL_COMMAND_TYPES.some(type => type === value);
}
