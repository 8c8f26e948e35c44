/**
 * Network topology index of datanode placements
 * @module @strata/core/services/network-topology
 */

import { DEFAULT_NETWORK_LOCATION, TopologyError } from '@strata/shared';

/**
 * A datanode as the topology sees it
 */
export interface TopologyNode {
  id: string;
  networkLocation: string;
}

function segmentsOf(location: string): string[] {
  return location.split('/').filter(segment => segment.length > 0);
}

function leafPath(node: TopologyNode): string {
  return `${node.networkLocation}/${node.id}`;
}

function isWithin(path: string, scope: string): boolean {
  return path === scope || path.startsWith(`${scope}/`);
}

/**
 * Tree of locations with datanodes as leaves.
 *
 * Every leaf sits at the same depth: a rack path cannot also be the parent of
 * another rack, and nothing may be placed under a datanode.
 */
export class NetworkTopology {
  private readonly leaves = new Map<string, string>();

  /**
   * Depth of the leaves (location segments + 1), 0 while empty
   */
  get depth(): number {
    for (const location of this.leaves.values()) {
      return segmentsOf(location).length + 1;
    }
    return 0;
  }

  get size(): number {
    return this.leaves.size;
  }

  contains(id: string): boolean {
    return this.leaves.has(id);
  }

  getLocation(id: string): string | undefined {
    return this.leaves.get(id);
  }

  /**
   * Datanode ids placed at or under `scope`
   */
  getLeaves(scope: string = '/'): string[] {
    const ids: string[] = [];
    for (const [id, location] of this.leaves) {
      if (scope === '/' || isWithin(location, scope)) {
        ids.push(id);
      }
    }
    return ids.sort();
  }

  /**
   * Place a datanode.
   * @throws {TopologyError} when the location conflicts with existing leaves
   */
  add(node: TopologyNode): void {
    const location = node.networkLocation || DEFAULT_NETWORK_LOCATION;
    const existing = this.leaves.get(node.id);
    if (existing === location) {
      return;
    }
    if (existing !== undefined) {
      throw TopologyError.invalidLocation(node.id, location, `already placed at ${existing}`);
    }

    this.check({ id: node.id, networkLocation: location });
    this.leaves.set(node.id, location);
  }

  remove(id: string): boolean {
    return this.leaves.delete(id);
  }

  /**
   * Move a datanode to its current location. On failure the previous placement is kept.
   * @throws {TopologyError}
   */
  update(node: TopologyNode): void {
    const previous = this.leaves.get(node.id);
    const location = node.networkLocation || DEFAULT_NETWORK_LOCATION;
    if (previous === location) {
      return;
    }

    this.leaves.delete(node.id);
    try {
      this.add({ id: node.id, networkLocation: location });
    } catch (error) {
      if (previous !== undefined) {
        this.leaves.set(node.id, previous);
      }
      throw error;
    }
  }

  clear(): void {
    this.leaves.clear();
  }

  private check(node: TopologyNode): void {
    const location = node.networkLocation;
    if (!location.startsWith('/') || segmentsOf(location).length === 0) {
      throw TopologyError.invalidLocation(node.id, location, 'location must be an absolute path');
    }

    for (const [otherId, otherLocation] of this.leaves) {
      if (isWithin(location, leafPath({ id: otherId, networkLocation: otherLocation }))) {
        throw TopologyError.invalidLocation(
          node.id,
          location,
          `location is under datanode ${otherId}`,
        );
      }
    }

    const depth = this.depth;
    const newDepth = segmentsOf(location).length + 1;
    if (depth !== 0 && depth !== newDepth) {
      throw TopologyError.invalidLocation(
        node.id,
        location,
        `leaves must all be at depth ${depth}, got ${newDepth}`,
      );
    }
  }
}
