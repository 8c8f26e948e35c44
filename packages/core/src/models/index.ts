/**
 * Models module
 * @module @strata/core/models
 */

export {
  DatanodeModel,
  createDatanodeRecord,
  createDatanodeCommand,
  normalizeDetails,
} from './datanode';

export type { DatanodeListFilters } from './datanode';
