/**
 * Descriptive attributes of every datanode seen, keyed by id
 * @module @strata/core/stores/known-node-index
 */

import type { DatanodeDescriptor, DatanodeDetails } from '@strata/shared';
import { EMPTY_DATANODE_DESCRIPTOR, toDescriptor } from '@strata/shared';

export class KnownNodeIndex {
  private readonly descriptors = new Map<string, DatanodeDescriptor>();

  record(details: DatanodeDetails): void {
    this.descriptors.set(details.uuid, toDescriptor(details));
  }

  /**
   * Attributes for a datanode; the empty descriptor when never seen
   */
  get(id: string): DatanodeDescriptor {
    return this.descriptors.get(id) ?? EMPTY_DATANODE_DESCRIPTOR;
  }

  has(id: string): boolean {
    return this.descriptors.has(id);
  }

  /**
   * Put back a descriptor taken earlier with `peek`; undefined forgets the id
   */
  restore(id: string, descriptor: DatanodeDescriptor | undefined): void {
    if (descriptor) {
      this.descriptors.set(id, descriptor);
    } else {
      this.descriptors.delete(id);
    }
  }

  /**
   * The stored descriptor, without the empty fallback
   */
  peek(id: string): DatanodeDescriptor | undefined {
    return this.descriptors.get(id);
  }

  delete(id: string): boolean {
    return this.descriptors.delete(id);
  }

  get size(): number {
    return this.descriptors.size;
  }

  clear(): void {
    this.descriptors.clear();
  }
}
