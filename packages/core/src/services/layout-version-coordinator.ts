/**
 * Layout version bookkeeping between the control plane and datanodes
 * @module @strata/core/services/layout-version-coordinator
 */

import type { DatanodeCommand, DatanodeDetails, LayoutVersionReport } from '@strata/shared';
import { createServiceLogger, type Logger } from '@strata/shared';
import { createDatanodeCommand } from '../models/datanode';

const logger = createServiceLogger({
  level: 'debug',
  service: 'strata-membership',
}, { component: 'layout-version-coordinator' });

/**
 * Highest layout version this build understands
 */
export const MAX_LAYOUT_VERSION = 8;

/**
 * Outcome of comparing a datanode's layout with the control plane's
 * - node-ahead: the datanode runs newer software than the control plane
 * - finalize-required: the control plane is finalized and the datanode is not
 * - up-to-date: nothing to do
 */
export type LayoutCheckResult = 'node-ahead' | 'finalize-required' | 'up-to-date';

/**
 * Whether a finalize-required datanode is sent a finalize command
 * - command: queue finalizeNewLayoutVersionCommand
 * - log-only: record the mismatch and issue nothing
 */
export type FinalizeMode = 'command' | 'log-only';

/**
 * Control-plane layout versions
 */
export class LayoutVersionManager {
  private metadataLayoutVersion: number;

  constructor(
    private readonly softwareLayoutVersion: number = MAX_LAYOUT_VERSION,
    metadataLayoutVersion: number = softwareLayoutVersion,
  ) {
    this.metadataLayoutVersion = Math.min(metadataLayoutVersion, softwareLayoutVersion);
  }

  getSoftwareLayoutVersion(): number {
    return this.softwareLayoutVersion;
  }

  getMetadataLayoutVersion(): number {
    return this.metadataLayoutVersion;
  }

  isFinalized(): boolean {
    return this.metadataLayoutVersion === this.softwareLayoutVersion;
  }

  /**
   * Bring the metadata layout up to the software layout
   */
  finalize(): void {
    this.metadataLayoutVersion = this.softwareLayoutVersion;
  }

  toReport(): LayoutVersionReport {
    return {
      softwareLayoutVersion: this.softwareLayoutVersion,
      metadataLayoutVersion: this.metadataLayoutVersion,
    };
  }
}

/**
 * Layout version coordinator options
 */
export interface LayoutVersionCoordinatorOptions {
  manager?: LayoutVersionManager;
  finalizeMode?: FinalizeMode;
  logger?: Logger;
}

/**
 * Decides what a datanode's reported layout means for the cluster
 */
export class LayoutVersionCoordinator {
  readonly manager: LayoutVersionManager;
  readonly finalizeMode: FinalizeMode;
  private readonly logger: Logger;

  constructor(options: LayoutVersionCoordinatorOptions = {}) {
    this.manager = options.manager ?? new LayoutVersionManager();
    this.finalizeMode = options.finalizeMode ?? 'command';
    this.logger = options.logger ?? logger;
  }

  /**
   * Compare a datanode's reported layout with the control plane's
   */
  checkFinalizeNeeded(details: DatanodeDetails, reported: LayoutVersionReport): LayoutCheckResult {
    const scmSoftware = this.manager.getSoftwareLayoutVersion();
    const scmMetadata = this.manager.getMetadataLayoutVersion();

    if (reported.softwareLayoutVersion > scmSoftware) {
      this.logger.error('Datanode runs a newer software layout than the control plane', {
        datanodeId: details.uuid,
        hostName: details.hostName,
        datanodeSoftwareLayoutVersion: reported.softwareLayoutVersion,
        softwareLayoutVersion: scmSoftware,
      });
      return 'node-ahead';
    }

    if (scmMetadata === scmSoftware && reported.metadataLayoutVersion < scmMetadata) {
      this.logger.info('Datanode metadata layout is behind the finalized control plane', {
        datanodeId: details.uuid,
        hostName: details.hostName,
        datanodeMetadataLayoutVersion: reported.metadataLayoutVersion,
        metadataLayoutVersion: scmMetadata,
      });
      return 'finalize-required';
    }

    return 'up-to-date';
  }

  /**
   * The finalize command for a datanode, when one is due and this coordinator issues commands
   */
  finalizeCommandFor(
    details: DatanodeDetails,
    reported: LayoutVersionReport,
    now: number = Date.now(),
  ): DatanodeCommand | undefined {
    if (this.checkFinalizeNeeded(details, reported) !== 'finalize-required') {
      return undefined;
    }
    if (this.finalizeMode !== 'command') {
      return undefined;
    }

    return createDatanodeCommand(
      'finalizeNewLayoutVersionCommand',
      {
        finalizeNewLayoutVersion: true,
        softwareLayoutVersion: this.manager.getSoftwareLayoutVersion(),
        metadataLayoutVersion: this.manager.getMetadataLayoutVersion(),
      },
      now,
    );
  }

  /**
   * Layout report for nodes loaded from storage, pinned to the control plane's
   * software layout so they are neither ahead nor due a finalize
   */
  pinnedReport(): LayoutVersionReport {
    const software = this.manager.getSoftwareLayoutVersion();
    return {
      softwareLayoutVersion: software,
      metadataLayoutVersion: software,
    };
  }
}
