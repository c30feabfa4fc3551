/**
 * Field Arithmetic Operations
 *
 * Addition, subtraction, negation and multiplication with plain modular
 * arithmetic. Both operands must belong to the same field.
 */

import type { FieldElement } from '../types.js';
import { fieldMismatchError } from '../errors.js';
import { createFieldElement } from './element.js';

function assertSameField(a: FieldElement, b: FieldElement): void {
  if (a.field.modulus !== b.field.modulus) {
    throw fieldMismatchError(a.field.name, b.field.name);
  }
}

/**
 * Field addition: (a + b) mod p
 *
 * @param a - First operand
 * @param b - Second operand
 * @returns The sum a + b in the field
 */
export function fieldAdd(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b);

  let sum = a.value + b.value;
  if (sum >= a.field.modulus) {
    sum -= a.field.modulus;
  }

  return { value: sum, field: a.field };
}

/**
 * Field subtraction: (a - b) mod p
 */
export function fieldSub(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b);

  let diff = a.value - b.value;
  if (diff < 0n) {
    diff += a.field.modulus;
  }

  return { value: diff, field: a.field };
}

/**
 * Field negation: -a mod p
 */
export function fieldNeg(a: FieldElement): FieldElement {
  if (a.value === 0n) {
    return a;
  }
  return { value: a.field.modulus - a.value, field: a.field };
}

/**
 * Field multiplication: (a * b) mod p
 */
export function fieldMul(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b);
  return createFieldElement(a.value * b.value, a.field);
}
