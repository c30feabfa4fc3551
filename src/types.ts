/**
 * Core type definitions for circuit-ir
 *
 * The finite field types shared by every other module. Circuit-level types
 * live next to the code that builds them (native-types, brillig, opcodes,
 * circuit).
 *
 * @module types
 */

/**
 * Names of the supported prime fields
 */
export type FieldName = 'bn254' | 'bls12_381';

/**
 * Prime field parameters
 *
 * Only the values the canonical encoding depends on are kept here: the
 * modulus and the widths derived from it.
 *
 * @example
 * ```typescript
 * const field: FieldConfig = {
 *   name: 'bn254',
 *   modulus: 21888242871839275222246405745257275088548364400416034343698204186575808495617n,
 *   maxNumBits: 254,
 *   byteSize: 32,
 * };
 * ```
 */
export interface FieldConfig {
  /** Identifier of the field */
  readonly name: FieldName;
  /** The prime modulus p of the field F_p */
  readonly modulus: bigint;
  /** Bit length of the modulus */
  readonly maxNumBits: number;
  /** Width of the canonical big-endian encoding: ceil(maxNumBits / 8) */
  readonly byteSize: number;
}

/**
 * Field element
 *
 * `value` is always reduced: 0 <= value < field.modulus. Two elements are
 * equal when their fields and values are equal, which is exactly when their
 * canonical encodings are equal.
 *
 * @example
 * ```typescript
 * import { createFieldElement, getFieldElementValue } from 'circuit-ir';
 *
 * const minusOne = createFieldElement(-1n);
 * getFieldElementValue(minusOne); // p - 1
 * ```
 */
export interface FieldElement {
  /** Reduced value of the element */
  readonly value: bigint;
  /** The field this element belongs to */
  readonly field: FieldConfig;
}
