/**
 * Validation module - re-exports all validators
 * @module @strata/shared/validation
 */

export type { FieldValidationError, ValidationResult } from './datanode-validation';

export {
  validateDatanodeUuid,
  validateHostName,
  validateIpAddress,
  validatePorts,
  validateNetworkLocation,
  validateOperationalState,
  validateDatanodeDetails,
} from './datanode-validation';
