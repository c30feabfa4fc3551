/**
 * Field Element Implementation
 *
 * Field elements are stored as reduced bigint values tagged with their
 * field. Arithmetic beyond what expression canonicalization needs is left to
 * the consuming prover.
 */

import type { FieldConfig, FieldElement } from '../types.js';
import { getDefaultField } from '../config.js';

/**
 * Create a field element from a bigint value
 *
 * The value is automatically reduced modulo the field modulus, so negative
 * inputs map to their additive inverse (-1n becomes p - 1).
 *
 * @param value - The bigint value (can be any size, will be reduced)
 * @param field - The field configuration, defaults to the configured field
 * @returns A new field element
 */
export function createFieldElement(value: bigint | number, field: FieldConfig = getDefaultField()): FieldElement {
  let reduced = BigInt(value) % field.modulus;
  if (reduced < 0n) {
    reduced += field.modulus;
  }

  return { value: reduced, field };
}

/**
 * Create the zero element for a field
 */
export function createZeroFieldElement(field: FieldConfig = getDefaultField()): FieldElement {
  return { value: 0n, field };
}

/**
 * Create the one element (multiplicative identity) for a field
 */
export function createOneFieldElement(field: FieldConfig = getDefaultField()): FieldElement {
  return { value: 1n, field };
}

/**
 * Get the bigint value of a field element
 */
export function getFieldElementValue(element: FieldElement): bigint {
  return element.value;
}

export function isZeroFieldElement(element: FieldElement): boolean {
  return element.value === 0n;
}

export function isOneFieldElement(element: FieldElement): boolean {
  return element.value === 1n;
}

/**
 * Check if two field elements are equal
 */
export function fieldElementsEqual(a: FieldElement, b: FieldElement): boolean {
  return a.field.modulus === b.field.modulus && a.value === b.value;
}

/**
 * Total order on field elements by their canonical value
 */
export function compareFieldElements(a: FieldElement, b: FieldElement): number {
  if (a.value === b.value) {
    return 0;
  }
  return a.value < b.value ? -1 : 1;
}
