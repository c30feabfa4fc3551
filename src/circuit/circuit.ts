/**
 * Circuit container
 *
 * The unit the compiler emits and the wire format carries. A circuit is a
 * value: built once, then only read, serialized and compared.
 */

import type { Opcode, OpcodeType } from '../opcodes/opcode.js';
import { WitnessSet, toWitness, type PublicInputs, type Witness } from '../native-types/witness.js';

export interface Circuit {
  /** Next unused witness slot */
  readonly currentWitnessIndex: number;
  readonly opcodes: readonly Opcode[];
  /** Secret inputs */
  readonly privateParameters: WitnessSet;
  /** Public inputs supplied by the caller */
  readonly publicParameters: PublicInputs;
  /** Public outputs */
  readonly returnValues: PublicInputs;
}

/**
 * Circuit parts as a producer has them; witness collections may be in any
 * order and contain duplicates
 */
export interface CircuitParts {
  currentWitnessIndex: number;
  opcodes?: readonly Opcode[];
  privateParameters?: Iterable<Witness>;
  publicParameters?: Iterable<Witness>;
  returnValues?: Iterable<Witness>;
}

function toWitnessSet(witnesses: Iterable<Witness> | undefined): WitnessSet {
  if (witnesses === undefined) {
    return WitnessSet.empty();
  }
  return witnesses instanceof WitnessSet ? witnesses : WitnessSet.from(witnesses);
}

/**
 * Build a circuit, normalizing its witness sets
 *
 * @example
 * ```typescript
 * const circuit = createCircuit({
 *   currentWitnessIndex: 4,
 *   opcodes: [arithmetic(sum)],
 *   privateParameters: [2, 1],
 *   returnValues: [3],
 * });
 * ```
 */
export function createCircuit(parts: CircuitParts): Circuit {
  return {
    currentWitnessIndex: toWitness(parts.currentWitnessIndex),
    opcodes: parts.opcodes ?? [],
    privateParameters: toWitnessSet(parts.privateParameters),
    publicParameters: toWitnessSet(parts.publicParameters),
    returnValues: toWitnessSet(parts.returnValues),
  };
}

/**
 * Every public witness: public parameters and return values together
 */
export function circuitPublicInputs(circuit: Circuit): PublicInputs {
  return circuit.publicParameters.union(circuit.returnValues);
}

/**
 * Number of opcodes of each type
 */
export function circuitOpcodeCounts(circuit: Circuit): Record<OpcodeType, number> {
  const counts: Record<OpcodeType, number> = {
    Arithmetic: 0,
    BlackBoxFuncCall: 0,
    Directive: 0,
    Brillig: 0,
    MemoryOp: 0,
    MemoryInit: 0,
  };
  for (const opcode of circuit.opcodes) {
    counts[opcode.type]++;
  }
  return counts;
}
