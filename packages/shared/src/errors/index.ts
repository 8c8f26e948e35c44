/**
 * Error classes for Strata
 * @module @strata/shared/errors
 */

// Base error
export {
  StrataError,
  ErrorCode,
  isStrataError,
  toError,
  wrapError,
} from './base-error';

export type { ErrorMeta } from './base-error';

// Validation errors
export {
  ValidationError,
  isValidationError,
} from './validation-error';

export type { ValidationErrorDetail } from './validation-error';

// Datanode errors
export {
  NodeError,
  isNodeError,
  isNodeNotFoundError,
} from './node-error';

// Topology errors
export {
  TopologyError,
  isTopologyError,
} from './topology-error';

// Persistence errors
export {
  PersistenceError,
  isPersistenceError,
} from './persistence-error';

export type { PersistenceOperation } from './persistence-error';
