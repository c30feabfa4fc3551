/**
 * circuit-ir
 *
 * Intermediate representation for arithmetic circuits and its canonical,
 * byte-exact wire format.
 *
 * This library provides:
 * - Witnesses, expressions and the opcode union (arithmetic, black-box calls,
 *   directives, Brillig programs, memory blocks)
 * - Canonical serialization and a deterministic gzip envelope
 * - Structural validation of decoded circuits
 * - Explicit foreign call state for Brillig programs
 *
 * Supported fields: BN254 (default), BLS12-381
 *
 * @example
 * ```typescript
 * import {
 *   createCircuit,
 *   createExpression,
 *   createFieldElement,
 *   arithmetic,
 *   encodeCircuit,
 *   decodeCircuit,
 * } from 'circuit-ir';
 *
 * const one = createFieldElement(1n);
 * const minusOne = createFieldElement(-1n);
 *
 * // w1 + w2 - w3 = 0
 * const sum = createExpression({
 *   linearCombinations: [[one, 1], [one, 2], [minusOne, 3]],
 * });
 *
 * const circuit = createCircuit({
 *   currentWitnessIndex: 4,
 *   opcodes: [arithmetic(sum)],
 *   privateParameters: [1, 2],
 *   returnValues: [3],
 * });
 *
 * const bytes = encodeCircuit(circuit);
 * const decoded = decodeCircuit(bytes);
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Configuration
// ============================================================================
export {
  configure,
  getConfig,
  resetConfig,
  validateConfig,
  type CircuitIrConfig,
} from './config.js';

// ============================================================================
// Core types and errors
// ============================================================================
export type { FieldName, FieldConfig, FieldElement } from './types.js';

export {
  ErrorCode,
  CircuitIrError,
  isCircuitIrError,
} from './errors.js';

// ============================================================================
// Data model
// ============================================================================
export * from './field/index.js';
export * from './native-types/index.js';
export * from './brillig/index.js';
export * from './opcodes/index.js';
export * from './circuit/index.js';

// ============================================================================
// Wire format and validation
// ============================================================================
export * from './serialization/index.js';

export {
  validateCircuit,
  circuitWitnesses,
  opcodeWitnesses,
  opcodeExpressions,
  type ValidationOptions,
} from './validation.js';
