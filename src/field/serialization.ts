/**
 * Field Element Serialization
 *
 * The canonical encoding of a field element is its reduced value as a
 * fixed-width big-endian byte string of `field.byteSize` bytes. The wire
 * format embeds the lowercase hex form of those bytes.
 *
 * Decoding accepts only canonical encodings: the exact width, and a value
 * strictly below the modulus. Nothing is reduced on the way in.
 */

import type { FieldConfig, FieldElement } from '../types.js';
import { nonCanonicalFieldElementError } from '../errors.js';
import { getDefaultField } from '../config.js';

const HEX_PATTERN = /^[0-9a-f]*$/;

/**
 * Serialize a field element to its fixed-width big-endian bytes
 */
export function fieldElementToBytes(element: FieldElement): Uint8Array {
  const byteSize = element.field.byteSize;
  const bytes = new Uint8Array(byteSize);

  // Big-endian: MSB first
  let v = element.value;
  for (let i = byteSize - 1; i >= 0; i--) {
    bytes[i] = Number(v & 0xffn);
    v >>= 8n;
  }

  return bytes;
}

/**
 * Deserialize canonical big-endian bytes to a field element
 *
 * @param bytes - Exactly `field.byteSize` bytes
 * @param field - The field configuration
 * @returns The decoded field element
 * @throws CircuitIrError NON_CANONICAL_FIELD_ELEMENT on a width mismatch or a
 *   value at or above the modulus
 */
export function fieldElementFromBytes(
  bytes: Uint8Array,
  field: FieldConfig = getDefaultField()
): FieldElement {
  if (bytes.length !== field.byteSize) {
    throw nonCanonicalFieldElementError(
      Buffer.from(bytes).toString('hex'),
      `expected ${field.byteSize} bytes, got ${bytes.length}`,
      field.modulus.toString()
    );
  }

  let value = 0n;
  for (let i = 0; i < bytes.length; i++) {
    value = (value << 8n) | BigInt(bytes[i]!);
  }

  return checkedElement(value, field, Buffer.from(bytes).toString('hex'));
}

/**
 * Serialize a field element to lowercase hex, without prefix
 *
 * The result always has `2 * field.byteSize` characters.
 */
export function fieldElementToHex(element: FieldElement): string {
  return element.value.toString(16).padStart(element.field.byteSize * 2, '0');
}

/**
 * Deserialize the canonical hex form of a field element
 *
 * @param hex - Lowercase hex with exactly `2 * field.byteSize` characters
 * @param field - The field configuration
 * @throws CircuitIrError NON_CANONICAL_FIELD_ELEMENT for any other input
 */
export function fieldElementFromHex(hex: string, field: FieldConfig = getDefaultField()): FieldElement {
  const width = field.byteSize * 2;
  if (hex.length !== width) {
    throw nonCanonicalFieldElementError(
      hex,
      `expected ${width} hex characters, got ${hex.length}`,
      field.modulus.toString()
    );
  }
  if (!HEX_PATTERN.test(hex)) {
    throw nonCanonicalFieldElementError(hex, 'not lowercase hex', field.modulus.toString());
  }

  return checkedElement(BigInt('0x' + hex), field, hex);
}

function checkedElement(value: bigint, field: FieldConfig, encoded: string): FieldElement {
  // Validate that value is within field
  if (value >= field.modulus) {
    throw nonCanonicalFieldElementError(encoded, 'value exceeds modulus', field.modulus.toString());
  }
  return { value, field };
}
