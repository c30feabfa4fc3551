import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { configure, getConfig, resetConfig, validateConfig, getDefaultField, isDebugEnabled } from './config.js';
import type { CircuitIrConfig } from './config.js';
import { ErrorCode } from './errors.js';
import { BLS12_381_SCALAR_FIELD, BN254_SCALAR_FIELD } from './field/config.js';
import { catchCircuitIrError } from './test-utils/errors.js';

describe('Configuration', () => {
  const savedDebug = process.env['DEBUG'];
  const savedIrDebug = process.env['CIRCUIT_IR_DEBUG'];

  beforeEach(() => {
    resetConfig();
    delete process.env['DEBUG'];
    delete process.env['CIRCUIT_IR_DEBUG'];
  });

  afterEach(() => {
    resetConfig();
    if (savedDebug === undefined) {
      delete process.env['DEBUG'];
    } else {
      process.env['DEBUG'] = savedDebug;
    }
    if (savedIrDebug === undefined) {
      delete process.env['CIRCUIT_IR_DEBUG'];
    } else {
      process.env['CIRCUIT_IR_DEBUG'] = savedIrDebug;
    }
  });

  it('should start from the defaults', () => {
    expect(getConfig()).toEqual({
      field: 'bn254',
      validateMemoryBlocks: true,
      validateWitnessBounds: false,
      validateExpressions: false,
      debug: false,
    });
    expect(getDefaultField()).toBe(BN254_SCALAR_FIELD);
  });

  it('should merge options and reset them', () => {
    configure({ field: 'bls12_381', validateExpressions: true });
    expect(getConfig().field).toBe('bls12_381');
    expect(getConfig().validateExpressions).toBe(true);
    expect(getConfig().validateMemoryBlocks).toBe(true);
    expect(getDefaultField()).toBe(BLS12_381_SCALAR_FIELD);

    resetConfig();
    expect(getConfig().field).toBe('bn254');
  });

  it('should return a copy', () => {
    const config = getConfig();
    configure({ debug: true });
    expect(config.debug).toBe(false);
  });

  it('should reject an unknown field and leave the config unchanged', () => {
    // Options parsed from user-supplied JSON are not checked by the compiler
    const options: CircuitIrConfig = JSON.parse('{"field":"goldilocks"}');
    const error = catchCircuitIrError(() => configure(options));
    expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
    expect(error.details).toEqual({ option: 'field', value: 'goldilocks', validValues: ['bn254', 'bls12_381'] });
    expect(getConfig().field).toBe('bn254');
  });

  it('should accept every supported field', () => {
    expect(() => validateConfig({ field: 'bn254' })).not.toThrow();
    expect(() => validateConfig({ field: 'bls12_381' })).not.toThrow();
  });

  describe('isDebugEnabled', () => {
    it('should be off by default', () => {
      expect(isDebugEnabled()).toBe(false);
    });

    it('should follow the debug option', () => {
      configure({ debug: true });
      expect(isDebugEnabled()).toBe(true);
    });

    it('should follow DEBUG namespaces', () => {
      process.env['DEBUG'] = 'app,circuit-ir';
      expect(isDebugEnabled()).toBe(true);
      process.env['DEBUG'] = 'app';
      expect(isDebugEnabled()).toBe(false);
    });

    it.each(['1', 'true'])('should follow CIRCUIT_IR_DEBUG=%s', (value) => {
      process.env['CIRCUIT_IR_DEBUG'] = value;
      expect(isDebugEnabled()).toBe(true);
    });
  });
});
