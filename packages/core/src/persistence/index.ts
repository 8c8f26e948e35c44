/**
 * Persistence module
 * @module @strata/core/persistence
 */

export { InMemoryNodeTable } from './in-memory-node-table';
