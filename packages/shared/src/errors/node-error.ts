/**
 * Datanode-specific error class
 * @module @strata/shared/errors/node-error
 */

import { StrataError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Datanode-specific error class
 */
export class NodeError extends StrataError {
  /** Datanode ID if available */
  public readonly datanodeId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NODE_NOT_FOUND,
    meta: ErrorMeta = {},
    datanodeId?: string,
  ) {
    super(message, code, {
      ...meta,
      resourceType: 'datanode',
      resourceId: datanodeId,
    });
    this.name = 'NodeError';
    this.datanodeId = datanodeId;
  }

  /**
   * Create for an unknown datanode
   */
  static notFound(datanodeId: string): NodeError {
    return new NodeError(
      `Datanode ${datanodeId} not found`,
      ErrorCode.NODE_NOT_FOUND,
      {},
      datanodeId,
    );
  }

  /**
   * Create for a registration the cluster refused
   */
  static notPermitted(datanodeId: string, reason: string): NodeError {
    return new NodeError(
      `Datanode ${datanodeId} is not permitted to register: ${reason}`,
      ErrorCode.NODE_NOT_PERMITTED,
      { reason },
      datanodeId,
    );
  }
}

/**
 * Check if an error is a NodeError
 */
export function isNodeError(error: unknown): error is NodeError {
  return error instanceof NodeError;
}

/**
 * Check if an error reports an unknown datanode
 */
export function isNodeNotFoundError(error: unknown): error is NodeError {
  return isNodeError(error) && error.code === ErrorCode.NODE_NOT_FOUND;
}
