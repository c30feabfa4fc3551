/**
 * Field Configuration for the BN254 and BLS12-381 scalar fields
 *
 * Circuits are defined over the scalar field of a pairing-friendly curve.
 * BN254 is the default; BLS12-381 is selectable through `configure`.
 */

import type { FieldConfig, FieldName } from '../types.js';
import { invalidConfigError } from '../errors.js';

/**
 * Bit length of a positive modulus
 */
function bitLength(modulus: bigint): number {
  let bits = 0;
  let m = modulus;
  while (m > 0n) {
    bits++;
    m >>= 1n;
  }
  return bits;
}

function defineField(name: FieldName, modulus: bigint): FieldConfig {
  const maxNumBits = bitLength(modulus);
  return {
    name,
    modulus,
    maxNumBits,
    // Round up to nearest byte
    byteSize: Math.ceil(maxNumBits / 8),
  };
}

/**
 * BN254 scalar field configuration (curve order)
 *
 * Field modulus p = 21888242871839275222246405745257275088548364400416034343698204186575808495617
 */
export const BN254_SCALAR_FIELD: FieldConfig = defineField(
  'bn254',
  21888242871839275222246405745257275088548364400416034343698204186575808495617n
);

/**
 * BLS12-381 scalar field configuration (curve order)
 */
export const BLS12_381_SCALAR_FIELD: FieldConfig = defineField(
  'bls12_381',
  52435875175126190479447740508185965837690552500527637822603658699938581184513n
);

export const SUPPORTED_FIELDS: readonly FieldName[] = ['bn254', 'bls12_381'];

/**
 * Get field configuration by name
 */
export function getFieldConfig(name: FieldName): FieldConfig {
  switch (name) {
    case 'bn254':
      return BN254_SCALAR_FIELD;
    case 'bls12_381':
      return BLS12_381_SCALAR_FIELD;
    default:
      throw invalidConfigError('field', name, [...SUPPORTED_FIELDS]);
  }
}

/**
 * Largest number of bits a field element can occupy
 */
export function maxNumBits(field: FieldConfig = BN254_SCALAR_FIELD): number {
  return field.maxNumBits;
}
