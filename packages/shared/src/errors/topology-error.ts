/**
 * Network topology error class
 * @module @strata/shared/errors/topology-error
 */

import { StrataError, ErrorCode, type ErrorMeta } from './base-error';

/**
 * Raised when a datanode's declared location conflicts with the cluster topology
 */
export class TopologyError extends StrataError {
  /** Location that was rejected */
  public readonly networkLocation: string;

  constructor(message: string, networkLocation: string, meta: ErrorMeta = {}) {
    super(message, ErrorCode.INVALID_TOPOLOGY, {
      ...meta,
      networkLocation,
    });
    this.name = 'TopologyError';
    this.networkLocation = networkLocation;
  }

  /**
   * Create for a location that cannot hold the datanode
   */
  static invalidLocation(
    datanodeId: string,
    networkLocation: string,
    reason: string,
  ): TopologyError {
    return new TopologyError(
      `Failed to add ${datanodeId} at ${networkLocation}: ${reason}`,
      networkLocation,
      { resourceType: 'datanode', resourceId: datanodeId, reason },
    );
  }
}

/**
 * Check if an error is a TopologyError
 */
export function isTopologyError(error: unknown): error is TopologyError {
  return error instanceof TopologyError;
}
