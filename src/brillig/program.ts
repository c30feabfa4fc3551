/**
 * Brillig program embedded in a circuit
 *
 * Binds circuit values to the program's registers (inputs), names the
 * witnesses the program's results are written to (outputs), and carries the
 * oracle answers collected so far (foreignCallResults).
 */

import { expressionWitnesses, type Expression } from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';
import type { BrilligOpcode, ForeignCallResult } from './types.js';

/**
 * Value loaded into an input register: one expression, or an array of them
 * written to the heap
 */
export type BrilligInputs =
  | { readonly type: 'Single'; readonly expression: Expression }
  | { readonly type: 'Array'; readonly expressions: readonly Expression[] };

/**
 * Witness (or witnesses) an output register is copied to
 */
export type BrilligOutputs =
  | { readonly type: 'Simple'; readonly witness: Witness }
  | { readonly type: 'Array'; readonly witnesses: readonly Witness[] };

export const BRILLIG_INPUTS_TAGS = {
  Single: 0,
  Array: 1,
} as const satisfies Record<BrilligInputs['type'], number>;

export const BRILLIG_OUTPUTS_TAGS = {
  Simple: 0,
  Array: 1,
} as const satisfies Record<BrilligOutputs['type'], number>;

export interface Brillig {
  readonly inputs: readonly BrilligInputs[];
  readonly outputs: readonly BrilligOutputs[];
  /** Oracle answers, in the order the program's foreign calls executed */
  readonly foreignCallResults: readonly ForeignCallResult[];
  readonly bytecode: readonly BrilligOpcode[];
  /** When present and zero, the program has no effect */
  readonly predicate?: Expression;
}

/**
 * Assemble a Brillig program with no foreign call results yet
 */
export function createBrillig(parts: {
  inputs: readonly BrilligInputs[];
  outputs: readonly BrilligOutputs[];
  bytecode: readonly BrilligOpcode[];
  predicate?: Expression;
}): Brillig {
  return {
    inputs: parts.inputs,
    outputs: parts.outputs,
    foreignCallResults: [],
    bytecode: parts.bytecode,
    ...(parts.predicate !== undefined ? { predicate: parts.predicate } : {}),
  };
}

/**
 * Every witness the program's inputs, outputs and predicate reference
 */
export function brilligWitnesses(program: Brillig): Witness[] {
  const witnesses: Witness[] = [];
  for (const input of program.inputs) {
    if (input.type === 'Single') {
      witnesses.push(...expressionWitnesses(input.expression));
    } else {
      for (const expression of input.expressions) {
        witnesses.push(...expressionWitnesses(expression));
      }
    }
  }
  for (const output of program.outputs) {
    if (output.type === 'Simple') {
      witnesses.push(output.witness);
    } else {
      witnesses.push(...output.witnesses);
    }
  }
  if (program.predicate !== undefined) {
    witnesses.push(...expressionWitnesses(program.predicate));
  }
  return witnesses;
}
