/**
 * Stores module - in-memory membership state
 * @module @strata/core/stores
 */

export { DatanodeRegistry, createDatanodeRegistry } from './node-store';
export { CommandQueue } from './command-queue';
export { KnownNodeIndex } from './known-node-index';
export { HeartbeatTracker } from './heartbeat-tracker';
