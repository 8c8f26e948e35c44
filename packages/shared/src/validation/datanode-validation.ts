/**
 * Datanode registration validation
 * @module @strata/shared/validation/datanode-validation
 */

import { isIP } from 'node:net';
import { ALL_OPERATIONAL_STATES, isOperationalState, isPortName } from '../types/datanode';
import { isPlainObject, isValidUUID } from '../utils';

/**
 * Single field validation failure
 */
export interface FieldValidationError {
  field: string;
  message: string;
  code: string;
}

/**
 * Aggregate validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: FieldValidationError[];
}

/**
 * RFC 1123 host name: dot-separated labels of alphanumerics and hyphens,
 * each label 1-63 chars, not starting or ending with a hyphen.
 */
const HOST_NAME_PATTERN =
  /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

const MAX_HOST_NAME_LENGTH = 253;

/**
 * Absolute topology path: `/` followed by non-empty segments
 */
const NETWORK_LOCATION_PATTERN = /^(\/[^/\s]+)+$/;

const MIN_PORT = 1;
const MAX_PORT = 65535;

/**
 * Validate datanode UUID
 */
export function validateDatanodeUuid(uuid: unknown): FieldValidationError | null {
  if (uuid === undefined || uuid === null || uuid === '') {
    return {
      field: 'uuid',
      message: 'Datanode UUID is required',
      code: 'REQUIRED',
    };
  }

  if (typeof uuid !== 'string') {
    return {
      field: 'uuid',
      message: 'Datanode UUID must be a string',
      code: 'INVALID_TYPE',
    };
  }

  if (!isValidUUID(uuid)) {
    return {
      field: 'uuid',
      message: 'Datanode UUID must be a valid UUID',
      code: 'INVALID_FORMAT',
    };
  }

  return null;
}

/**
 * Validate host name
 */
export function validateHostName(hostName: unknown): FieldValidationError | null {
  if (hostName === undefined || hostName === null || hostName === '') {
    return {
      field: 'hostName',
      message: 'Host name is required',
      code: 'REQUIRED',
    };
  }

  if (typeof hostName !== 'string') {
    return {
      field: 'hostName',
      message: 'Host name must be a string',
      code: 'INVALID_TYPE',
    };
  }

  if (hostName.length > MAX_HOST_NAME_LENGTH) {
    return {
      field: 'hostName',
      message: `Host name cannot exceed ${MAX_HOST_NAME_LENGTH} characters`,
      code: 'TOO_LONG',
    };
  }

  if (!HOST_NAME_PATTERN.test(hostName)) {
    return {
      field: 'hostName',
      message: 'Host name must consist of dot-separated alphanumeric labels',
      code: 'INVALID_FORMAT',
    };
  }

  return null;
}

/**
 * Validate IPv4 or IPv6 address
 */
export function validateIpAddress(ipAddress: unknown): FieldValidationError | null {
  if (ipAddress === undefined || ipAddress === null || ipAddress === '') {
    return {
      field: 'ipAddress',
      message: 'IP address is required',
      code: 'REQUIRED',
    };
  }

  if (typeof ipAddress !== 'string') {
    return {
      field: 'ipAddress',
      message: 'IP address must be a string',
      code: 'INVALID_TYPE',
    };
  }

  if (isIP(ipAddress) === 0) {
    return {
      field: 'ipAddress',
      message: 'IP address must be a valid IPv4 or IPv6 address',
      code: 'INVALID_FORMAT',
    };
  }

  return null;
}

/**
 * Validate advertised ports
 */
export function validatePorts(ports: unknown): FieldValidationError | null {
  if (ports === undefined || ports === null) {
    return null; // A datanode may advertise nothing yet
  }

  if (!Array.isArray(ports)) {
    return {
      field: 'ports',
      message: 'Ports must be an array',
      code: 'INVALID_TYPE',
    };
  }

  const seen = new Set<string>();
  for (const [index, port] of ports.entries()) {
    if (!isPlainObject(port)) {
      return {
        field: `ports[${index}]`,
        message: 'Port must be an object with name and value',
        code: 'INVALID_TYPE',
      };
    }

    if (!isPortName(port.name)) {
      return {
        field: `ports[${index}].name`,
        message: `Unknown port name: ${String(port.name)}`,
        code: 'INVALID_VALUE',
      };
    }

    const value = port.value;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < MIN_PORT || value > MAX_PORT) {
      return {
        field: `ports[${index}].value`,
        message: `Port value must be an integer between ${MIN_PORT} and ${MAX_PORT}`,
        code: 'OUT_OF_RANGE',
      };
    }

    if (seen.has(port.name)) {
      return {
        field: `ports[${index}].name`,
        message: `Duplicate port name: ${port.name}`,
        code: 'DUPLICATE',
      };
    }
    seen.add(port.name);
  }

  return null;
}

/**
 * Validate network location
 */
export function validateNetworkLocation(location: unknown): FieldValidationError | null {
  if (location === undefined || location === null) {
    return null; // Defaults to /default-rack
  }

  if (typeof location !== 'string') {
    return {
      field: 'networkLocation',
      message: 'Network location must be a string',
      code: 'INVALID_TYPE',
    };
  }

  if (!NETWORK_LOCATION_PATTERN.test(location)) {
    return {
      field: 'networkLocation',
      message: 'Network location must be an absolute path such as /dc1/rack1',
      code: 'INVALID_FORMAT',
    };
  }

  return null;
}

/**
 * Validate operational state
 */
export function validateOperationalState(
  state: unknown,
  field = 'persistedOpState',
): FieldValidationError | null {
  if (state === undefined || state === null) {
    return {
      field,
      message: 'Operational state is required',
      code: 'REQUIRED',
    };
  }

  if (!isOperationalState(state)) {
    return {
      field,
      message: `Operational state must be one of: ${ALL_OPERATIONAL_STATES.join(', ')}`,
      code: 'INVALID_VALUE',
    };
  }

  return null;
}

/**
 * Validate a non-negative integer field
 */
function validateNonNegativeInteger(field: string, value: unknown): FieldValidationError | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return {
      field,
      message: `${field} must be a non-negative integer`,
      code: 'OUT_OF_RANGE',
    };
  }

  return null;
}

/**
 * Validate a full set of datanode details
 */
export function validateDatanodeDetails(input: unknown): ValidationResult {
  const errors: FieldValidationError[] = [];

  if (!isPlainObject(input)) {
    return {
      valid: false,
      errors: [{ field: 'input', message: 'Datanode details must be an object', code: 'INVALID_TYPE' }],
    };
  }

  const checks = [
    validateDatanodeUuid(input.uuid),
    validateHostName(input.hostName),
    validateIpAddress(input.ipAddress),
    validatePorts(input.ports),
    validateNetworkLocation(input.networkLocation),
    validateOperationalState(input.persistedOpState),
    validateNonNegativeInteger('persistedOpStateExpiryEpochSec', input.persistedOpStateExpiryEpochSec),
    validateNonNegativeInteger('setupTime', input.setupTime),
  ];

  for (const error of checks) {
    if (error) {
      errors.push(error);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

