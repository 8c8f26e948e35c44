/**
 * Unit tests for validation module
 */

import { describe, it, expect } from 'vitest';

import {
  validateDatanodeUuid,
  validateHostName,
  validateIpAddress,
  validatePorts,
  validateNetworkLocation,
  validateOperationalState,
  validateDatanodeDetails,
} from '../../src/validation';

const VALID_DETAILS = {
  uuid: '6f1c2a8e-3b4d-4e5f-8a9b-0c1d2e3f4a5b',
  hostName: 'dn1.example.internal',
  ipAddress: '10.0.0.11',
  ports: [
    { name: 'RATIS', value: 9858 },
    { name: 'STANDALONE', value: 9859 },
  ],
  networkLocation: '/dc1/rack1',
  persistedOpState: 'IN_SERVICE',
  persistedOpStateExpiryEpochSec: 0,
  version: '1.4.0',
  setupTime: 1_700_000_000_000,
  revision: 'abc123',
};

describe('Datanode Validation', () => {
  describe('validateDatanodeUuid', () => {
    it('should accept a UUID', () => {
      expect(validateDatanodeUuid(VALID_DETAILS.uuid)).toBeNull();
    });

    it('should require a value', () => {
      expect(validateDatanodeUuid(undefined)?.code).toBe('REQUIRED');
      expect(validateDatanodeUuid('')?.code).toBe('REQUIRED');
    });

    it('should reject non-strings and malformed ids', () => {
      expect(validateDatanodeUuid(42)?.code).toBe('INVALID_TYPE');
      expect(validateDatanodeUuid('not-a-uuid')?.code).toBe('INVALID_FORMAT');
    });
  });

  describe('validateHostName', () => {
    it('should accept single labels and dotted names', () => {
      expect(validateHostName('dn1')).toBeNull();
      expect(validateHostName('dn-1.rack.example.com')).toBeNull();
    });

    it('should reject labels starting with a hyphen', () => {
      expect(validateHostName('-dn1')?.code).toBe('INVALID_FORMAT');
    });

    it('should reject names longer than 253 characters', () => {
      const label = 'a'.repeat(63);
      const longName = [label, label, label, label].join('.');
      expect(longName.length).toBe(255);
      expect(validateHostName(longName)?.code).toBe('TOO_LONG');
    });
  });

  describe('validateIpAddress', () => {
    it('should accept IPv4 and IPv6', () => {
      expect(validateIpAddress('192.168.1.20')).toBeNull();
      expect(validateIpAddress('fe80::1')).toBeNull();
    });

    it('should reject malformed addresses', () => {
      expect(validateIpAddress('300.1.1.1')?.code).toBe('INVALID_FORMAT');
      expect(validateIpAddress('dn1.example.com')?.code).toBe('INVALID_FORMAT');
    });
  });

  describe('validatePorts', () => {
    it('should accept an absent or empty port list', () => {
      expect(validatePorts(undefined)).toBeNull();
      expect(validatePorts([])).toBeNull();
    });

    it('should reject unknown port names', () => {
      expect(validatePorts([{ name: 'FTP', value: 21 }])).toEqual({
        field: 'ports[0].name',
        message: 'Unknown port name: FTP',
        code: 'INVALID_VALUE',
      });
    });

    it('should reject out of range values', () => {
      expect(validatePorts([{ name: 'HTTP', value: 70000 }])?.field).toBe('ports[0].value');
      expect(validatePorts([{ name: 'HTTP', value: 0 }])?.code).toBe('OUT_OF_RANGE');
    });

    it('should reject duplicate names', () => {
      const result = validatePorts([
        { name: 'HTTP', value: 9880 },
        { name: 'HTTP', value: 9881 },
      ]);
      expect(result).toEqual({
        field: 'ports[1].name',
        message: 'Duplicate port name: HTTP',
        code: 'DUPLICATE',
      });
    });
  });

  describe('validateNetworkLocation', () => {
    it('should accept absolute paths', () => {
      expect(validateNetworkLocation('/default-rack')).toBeNull();
      expect(validateNetworkLocation('/dc1/rack7')).toBeNull();
    });

    it('should treat an absent location as the default', () => {
      expect(validateNetworkLocation(undefined)).toBeNull();
    });

    it('should reject relative and trailing-slash paths', () => {
      expect(validateNetworkLocation('rack1')?.code).toBe('INVALID_FORMAT');
      expect(validateNetworkLocation('/rack1/')?.code).toBe('INVALID_FORMAT');
      expect(validateNetworkLocation('/')?.code).toBe('INVALID_FORMAT');
    });
  });

  describe('validateOperationalState', () => {
    it('should accept known states', () => {
      expect(validateOperationalState('DECOMMISSIONING')).toBeNull();
    });

    it('should reject unknown states under the given field', () => {
      expect(validateOperationalState('RETIRED', 'state')).toEqual({
        field: 'state',
        message:
          'Operational state must be one of: IN_SERVICE, DECOMMISSIONING, DECOMMISSIONED, ENTERING_MAINTENANCE, IN_MAINTENANCE',
        code: 'INVALID_VALUE',
      });
    });
  });

  describe('validateDatanodeDetails', () => {
    it('should accept valid details', () => {
      expect(validateDatanodeDetails(VALID_DETAILS)).toEqual({ valid: true, errors: [] });
    });

    it('should reject non-objects', () => {
      const result = validateDatanodeDetails('dn1');
      expect(result.valid).toBe(false);
      expect(result.errors[0]?.field).toBe('input');
    });

    it('should collect every failing field', () => {
      const result = validateDatanodeDetails({
        ...VALID_DETAILS,
        uuid: 'bad',
        ipAddress: 'nowhere',
        setupTime: -1,
      });

      expect(result.valid).toBe(false);
      expect(result.errors.map(e => e.field)).toEqual(['uuid', 'ipAddress', 'setupTime']);
    });
  });
});
