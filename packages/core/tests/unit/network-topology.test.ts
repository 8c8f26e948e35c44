/**
 * Unit tests for the network topology index
 * @module @strata/core/tests/unit/network-topology
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { NetworkTopology } from '../../src';
import { TopologyError } from '@strata/shared';

describe('NetworkTopology', () => {
  let topology: NetworkTopology;

  beforeEach(() => {
    topology = new NetworkTopology();
  });

  it('should place leaves and report their depth', () => {
    topology.add({ id: 'dn-a', networkLocation: '/dc1/rack1' });
    topology.add({ id: 'dn-b', networkLocation: '/dc1/rack2' });

    expect(topology.size).toBe(2);
    expect(topology.depth).toBe(3);
    expect(topology.getLocation('dn-b')).toBe('/dc1/rack2');
    expect(topology.getLeaves('/dc1')).toEqual(['dn-a', 'dn-b']);
    expect(topology.getLeaves('/dc1/rack1')).toEqual(['dn-a']);
  });

  it('should use the default rack for an empty location', () => {
    topology.add({ id: 'dn-a', networkLocation: '' });
    expect(topology.getLocation('dn-a')).toBe('/default-rack');
  });

  it('should treat re-adding at the same location as a no-op', () => {
    topology.add({ id: 'dn-a', networkLocation: '/rack1' });
    topology.add({ id: 'dn-a', networkLocation: '/rack1' });
    expect(topology.size).toBe(1);
  });

  it('should reject leaves at a different depth', () => {
    topology.add({ id: 'dn-a', networkLocation: '/rack1' });

    expect(() => topology.add({ id: 'dn-b', networkLocation: '/dc1/rack1' })).toThrow(
      'Failed to add dn-b at /dc1/rack1: leaves must all be at depth 2, got 3',
    );
    expect(topology.contains('dn-b')).toBe(false);
  });

  it('should reject a location under an existing datanode', () => {
    topology.add({ id: 'dn-a', networkLocation: '/dc1/rack1' });

    try {
      topology.add({ id: 'dn-c', networkLocation: '/dc1/rack1/dn-a' });
      expect.unreachable('expected TopologyError');
    } catch (error) {
      expect(error).toBeInstanceOf(TopologyError);
      if (error instanceof TopologyError) {
        expect(error.networkLocation).toBe('/dc1/rack1/dn-a');
        expect(error.message).toBe('Failed to add dn-c at /dc1/rack1/dn-a: location is under datanode dn-a');
      }
    }
  });

  it('should allow any depth again once empty', () => {
    topology.add({ id: 'dn-a', networkLocation: '/rack1' });
    topology.remove('dn-a');
    expect(topology.depth).toBe(0);

    topology.add({ id: 'dn-b', networkLocation: '/dc1/rack1' });
    expect(topology.depth).toBe(3);
  });

  it('should move a leaf on update', () => {
    topology.add({ id: 'dn-a', networkLocation: '/rack1' });
    topology.update({ id: 'dn-a', networkLocation: '/rack2' });
    expect(topology.getLocation('dn-a')).toBe('/rack2');
  });

  it('should keep the previous placement when an update fails', () => {
    topology.add({ id: 'dn-a', networkLocation: '/rack1' });
    topology.add({ id: 'dn-b', networkLocation: '/rack2' });

    expect(() => topology.update({ id: 'dn-a', networkLocation: '/dc1/rack1' })).toThrow(TopologyError);
    expect(topology.getLocation('dn-a')).toBe('/rack1');
  });
});
