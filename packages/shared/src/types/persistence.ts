/**
 * Durable node table contract
 * @module @strata/shared/types/persistence
 *
 * The node table is the source of truth only across a process restart.
 * In-flight membership state lives in memory.
 */

import type { DatanodeDetails } from './datanode';

/**
 * A stored datanode
 */
export interface NodeTableEntry {
  id: string;
  details: DatanodeDetails;
}

/**
 * Forward-only cursor over the node table, ordered by id.
 * Must be closed after use, including when iteration stops early.
 */
export interface NodeTableIterator {
  /** Next entry, or undefined when exhausted */
  next(): Promise<NodeTableEntry | undefined>;
  close(): Promise<void>;
}

/**
 * Key-value table of datanode details keyed by datanode id
 */
export interface NodeTable {
  get(id: string): Promise<DatanodeDetails | undefined>;
  put(id: string, details: DatanodeDetails): Promise<void>;
  delete(id: string): Promise<void>;
  iterate(): NodeTableIterator;
}

/**
 * How a durable write failure affects the operation that caused it
 * - best-effort: logged, the operation still succeeds in memory
 * - strict: the failure is raised to the caller
 */
export type DurabilityPolicy = 'best-effort' | 'strict';
