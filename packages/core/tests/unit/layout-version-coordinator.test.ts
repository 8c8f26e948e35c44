/**
 * Unit tests for layout version coordination
 * @module @strata/core/tests/unit/layout-version-coordinator
 */

import { describe, it, expect } from 'vitest';

import { LayoutVersionCoordinator, LayoutVersionManager, MAX_LAYOUT_VERSION } from '../../src';
import { DN1, makeDetails } from '../fixtures/datanodes';

const details = makeDetails(DN1);

describe('LayoutVersionManager', () => {
  it('should default to a finalized manager at the highest version', () => {
    const manager = new LayoutVersionManager();
    expect(manager.getSoftwareLayoutVersion()).toBe(MAX_LAYOUT_VERSION);
    expect(manager.isFinalized()).toBe(true);
  });

  it('should finalize a pre-finalized manager', () => {
    const manager = new LayoutVersionManager(5, 4);
    expect(manager.isFinalized()).toBe(false);
    manager.finalize();
    expect(manager.toReport()).toEqual({ softwareLayoutVersion: 5, metadataLayoutVersion: 5 });
  });
});

describe('LayoutVersionCoordinator', () => {
  it('should flag datanodes running newer software', () => {
    const coordinator = new LayoutVersionCoordinator({ manager: new LayoutVersionManager(5, 5) });
    expect(
      coordinator.checkFinalizeNeeded(details, { softwareLayoutVersion: 6, metadataLayoutVersion: 5 }),
    ).toBe('node-ahead');
    expect(
      coordinator.finalizeCommandFor(details, { softwareLayoutVersion: 6, metadataLayoutVersion: 5 }),
    ).toBeUndefined();
  });

  it('should require finalization when the control plane is finalized and the node is behind', () => {
    const coordinator = new LayoutVersionCoordinator({ manager: new LayoutVersionManager(5, 5) });
    const reported = { softwareLayoutVersion: 5, metadataLayoutVersion: 4 };

    expect(coordinator.checkFinalizeNeeded(details, reported)).toBe('finalize-required');

    const command = coordinator.finalizeCommandFor(details, reported, 7_000);
    expect(command?.type).toBe('finalizeNewLayoutVersionCommand');
    expect(command?.issuedAt).toBe(7_000);
    expect(command?.payload).toEqual({
      finalizeNewLayoutVersion: true,
      softwareLayoutVersion: 5,
      metadataLayoutVersion: 5,
    });
  });

  it('should not require finalization while the control plane itself is not finalized', () => {
    const coordinator = new LayoutVersionCoordinator({ manager: new LayoutVersionManager(5, 4) });
    expect(
      coordinator.checkFinalizeNeeded(details, { softwareLayoutVersion: 5, metadataLayoutVersion: 3 }),
    ).toBe('up-to-date');
  });

  it('should issue nothing in log-only mode', () => {
    const coordinator = new LayoutVersionCoordinator({
      manager: new LayoutVersionManager(5, 5),
      finalizeMode: 'log-only',
    });
    const reported = { softwareLayoutVersion: 5, metadataLayoutVersion: 4 };

    expect(coordinator.checkFinalizeNeeded(details, reported)).toBe('finalize-required');
    expect(coordinator.finalizeCommandFor(details, reported)).toBeUndefined();
  });

  it('should pin loaded nodes to the highest layout by default', () => {
    expect(new LayoutVersionCoordinator().pinnedReport()).toEqual({
      softwareLayoutVersion: MAX_LAYOUT_VERSION,
      metadataLayoutVersion: MAX_LAYOUT_VERSION,
    });
  });

  it('should pin loaded nodes to the control plane software layout', () => {
    const coordinator = new LayoutVersionCoordinator({ manager: new LayoutVersionManager(5, 4) });
    const pinned = coordinator.pinnedReport();

    expect(pinned).toEqual({ softwareLayoutVersion: 5, metadataLayoutVersion: 5 });
    expect(coordinator.checkFinalizeNeeded(details, pinned)).toBe('up-to-date');

    coordinator.manager.finalize();
    expect(coordinator.checkFinalizeNeeded(details, coordinator.pinnedReport())).toBe('up-to-date');
  });
});
