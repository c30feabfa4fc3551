/**
 * Property-Based Tests for Field Element Serialization
 *
 * - Canonical bytes and hex round-trip for every reduced value
 * - Non-canonical encodings (wrong width, uppercase, out of range) are
 *   rejected rather than reduced
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { PROPERTY_TEST_CONFIG, arbitraryFieldElement } from '../test-utils/property-test-config.js';
import { BN254_SCALAR_FIELD, BLS12_381_SCALAR_FIELD } from './config.js';
import { createFieldElement, fieldElementsEqual } from './element.js';
import {
  fieldElementToBytes,
  fieldElementFromBytes,
  fieldElementToHex,
  fieldElementFromHex,
} from './serialization.js';
import { ErrorCode } from '../errors.js';
import { catchCircuitIrError } from '../test-utils/errors.js';

describe('Field Element Serialization', () => {
  describe.each([
    { name: 'BN254', field: BN254_SCALAR_FIELD },
    { name: 'BLS12-381', field: BLS12_381_SCALAR_FIELD },
  ])('$name scalar field', ({ field }) => {
    it('should round-trip through bytes', () => {
      fc.assert(
        fc.property(arbitraryFieldElement(field), (element) => {
          const recovered = fieldElementFromBytes(fieldElementToBytes(element), field);
          return fieldElementsEqual(element, recovered);
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should round-trip through hex', () => {
      fc.assert(
        fc.property(arbitraryFieldElement(field), (element) => {
          const recovered = fieldElementFromHex(fieldElementToHex(element), field);
          return fieldElementsEqual(element, recovered);
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should always produce byteSize bytes and twice as many hex characters', () => {
      fc.assert(
        fc.property(arbitraryFieldElement(field), (element) => {
          return (
            fieldElementToBytes(element).length === field.byteSize &&
            fieldElementToHex(element).length === field.byteSize * 2
          );
        }),
        PROPERTY_TEST_CONFIG
      );
    });

    it('should reject every value at or above the modulus', () => {
      fc.assert(
        fc.property(fc.bigInt({ min: 0n, max: 1000n }), (offset) => {
          const hex = (field.modulus + offset).toString(16).padStart(field.byteSize * 2, '0');
          expect(catchCircuitIrError(() => fieldElementFromHex(hex, field)).code).toBe(
            ErrorCode.NON_CANONICAL_FIELD_ELEMENT
          );
        }),
        PROPERTY_TEST_CONFIG
      );
    });
  });

  describe('Edge Cases', () => {
    const field = BN254_SCALAR_FIELD;

    it('should encode p - 1 as its full-width hex', () => {
      expect(fieldElementToHex(createFieldElement(-1n, field))).toBe(
        '30644e72e131a029b85045b68181585d2833e84879b9709143e1f593f0000000'
      );
    });

    it('should encode zero and one with leading zeros', () => {
      expect(fieldElementToHex(createFieldElement(0n, field))).toBe('0'.repeat(64));
      expect(fieldElementToHex(createFieldElement(1n, field))).toBe('0'.repeat(63) + '1');
    });

    it('should encode bytes big-endian', () => {
      const bytes = fieldElementToBytes(createFieldElement(0x0102n, field));
      expect(bytes[30]).toBe(0x01);
      expect(bytes[31]).toBe(0x02);
      expect(bytes.slice(0, 30).every((b) => b === 0)).toBe(true);
    });

    it('should reject uppercase hex', () => {
      expect(catchCircuitIrError(() => fieldElementFromHex('0'.repeat(63) + 'A', field)).code).toBe(
        ErrorCode.NON_CANONICAL_FIELD_ELEMENT
      );
    });

    it('should reject hex of the wrong width', () => {
      expect(catchCircuitIrError(() => fieldElementFromHex('01', field)).code).toBe(
        ErrorCode.NON_CANONICAL_FIELD_ELEMENT
      );
      expect(catchCircuitIrError(() => fieldElementFromHex('0'.repeat(66), field)).code).toBe(
        ErrorCode.NON_CANONICAL_FIELD_ELEMENT
      );
    });

    it('should reject a prefixed hex string', () => {
      expect(catchCircuitIrError(() => fieldElementFromHex('0x' + '0'.repeat(62), field)).code).toBe(
        ErrorCode.NON_CANONICAL_FIELD_ELEMENT
      );
    });

    it('should reject bytes of the wrong width', () => {
      expect(catchCircuitIrError(() => fieldElementFromBytes(new Uint8Array(31), field)).code).toBe(
        ErrorCode.NON_CANONICAL_FIELD_ELEMENT
      );
    });

    it('should reject the modulus itself as bytes', () => {
      const bytes = fieldElementToBytes({ value: field.modulus, field });
      expect(catchCircuitIrError(() => fieldElementFromBytes(bytes, field)).code).toBe(
        ErrorCode.NON_CANONICAL_FIELD_ELEMENT
      );
    });
  });
});
