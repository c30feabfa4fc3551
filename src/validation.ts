/**
 * Structural Validation
 *
 * Checks that go beyond the wire format: witness bounds, memory block
 * initialization order, and canonical expressions. Decoding runs these with
 * the resolved options; producers can run them before encoding.
 */

import type { Circuit } from './circuit/circuit.js';
import type { Opcode } from './opcodes/opcode.js';
import type { Directive } from './opcodes/directives.js';
import { blackBoxInputs, blackBoxOutputs } from './opcodes/black-box.js';
import { brilligWitnesses } from './brillig/program.js';
import { expressionWitnesses, isCanonicalExpression, type Expression } from './native-types/expression.js';
import { WitnessSet, type Witness } from './native-types/witness.js';
import {
  nonCanonicalExpressionError,
  uninitializedMemoryBlockError,
  witnessOutOfRangeError,
} from './errors.js';

/**
 * Which structural checks to run
 */
export interface ValidationOptions {
  /** Every witness must be below currentWitnessIndex */
  validateWitnessBounds: boolean;
  /** Every MemoryOp must follow a MemoryInit of its block */
  validateMemoryBlocks: boolean;
  /** Every expression must be in canonical form */
  validateExpressions: boolean;
}

function directiveExpressions(directive: Directive): Expression[] {
  switch (directive.type) {
    case 'Quotient':
      return directive.predicate !== undefined
        ? [directive.a, directive.b, directive.predicate]
        : [directive.a, directive.b];
    case 'ToLeRadix':
      return [directive.a];
    case 'PermutationSort':
      return directive.inputs.flat();
  }
}

function directiveWitnesses(directive: Directive): Witness[] {
  const witnesses = directiveExpressions(directive).flatMap(expressionWitnesses);
  switch (directive.type) {
    case 'Quotient':
      witnesses.push(directive.q, directive.r);
      break;
    case 'ToLeRadix':
      witnesses.push(...directive.b);
      break;
    case 'PermutationSort':
      witnesses.push(...directive.bits);
      break;
  }
  return witnesses;
}

/**
 * Every expression an opcode carries, in wire order
 */
export function opcodeExpressions(opcode: Opcode): Expression[] {
  switch (opcode.type) {
    case 'Arithmetic':
      return [opcode.expression];
    case 'BlackBoxFuncCall':
    case 'MemoryInit':
      return [];
    case 'Directive':
      return directiveExpressions(opcode.directive);
    case 'Brillig': {
      const { inputs, predicate } = opcode.brillig;
      const expressions = inputs.flatMap((input) =>
        input.type === 'Single' ? [input.expression] : [...input.expressions]
      );
      if (predicate !== undefined) {
        expressions.push(predicate);
      }
      return expressions;
    }
    case 'MemoryOp': {
      const { op, predicate } = opcode;
      const expressions = op.kind === 'write' ? [op.index, op.value] : [op.index];
      if (predicate !== undefined) {
        expressions.push(predicate);
      }
      return expressions;
    }
  }
}

/**
 * Every witness an opcode reads or writes
 */
export function opcodeWitnesses(opcode: Opcode): Witness[] {
  switch (opcode.type) {
    case 'Arithmetic':
      return expressionWitnesses(opcode.expression);
    case 'BlackBoxFuncCall':
      return [...blackBoxInputs(opcode.call).map((input) => input.witness), ...blackBoxOutputs(opcode.call)];
    case 'Directive':
      return directiveWitnesses(opcode.directive);
    case 'Brillig':
      return brilligWitnesses(opcode.brillig);
    case 'MemoryOp': {
      const witnesses = opcodeExpressions(opcode).flatMap(expressionWitnesses);
      if (opcode.op.kind === 'read') {
        witnesses.push(opcode.op.destination);
      }
      return witnesses;
    }
    case 'MemoryInit':
      return [...opcode.init];
  }
}

/**
 * Every witness the circuit references, in opcodes, parameters or return
 * values
 */
export function circuitWitnesses(circuit: Circuit): WitnessSet {
  return WitnessSet.from([
    ...circuit.opcodes.flatMap(opcodeWitnesses),
    ...circuit.privateParameters,
    ...circuit.publicParameters,
    ...circuit.returnValues,
  ]);
}

function checkWitnessBounds(circuit: Circuit): void {
  const bound = circuit.currentWitnessIndex;
  const check = (witnesses: Iterable<Witness>, location: string): void => {
    for (const witness of witnesses) {
      if (witness >= bound) {
        throw witnessOutOfRangeError(witness, bound, location);
      }
    }
  };

  circuit.opcodes.forEach((opcode, i) => check(opcodeWitnesses(opcode), `opcodes[${i}]`));
  check(circuit.privateParameters, 'privateParameters');
  check(circuit.publicParameters, 'publicParameters');
  check(circuit.returnValues, 'returnValues');
}

function checkMemoryBlocks(circuit: Circuit): void {
  const initialized = new Set<number>();
  circuit.opcodes.forEach((opcode, i) => {
    if (opcode.type === 'MemoryInit') {
      initialized.add(opcode.blockId);
    } else if (opcode.type === 'MemoryOp' && !initialized.has(opcode.blockId)) {
      throw uninitializedMemoryBlockError(opcode.blockId, i);
    }
  });
}

function checkExpressions(circuit: Circuit): void {
  circuit.opcodes.forEach((opcode, i) => {
    opcodeExpressions(opcode).forEach((expression, j) => {
      if (!isCanonicalExpression(expression)) {
        throw nonCanonicalExpressionError(`opcodes[${i}].expressions[${j}]`);
      }
    });
  });
}

/**
 * Run the enabled structural checks, throwing on the first failure
 *
 * @throws CircuitIrError WITNESS_OUT_OF_RANGE, UNINITIALIZED_MEMORY_BLOCK or
 *   NON_CANONICAL_EXPRESSION
 */
export function validateCircuit(circuit: Circuit, options: ValidationOptions): void {
  if (options.validateMemoryBlocks) {
    checkMemoryBlocks(circuit);
  }
  if (options.validateWitnessBounds) {
    checkWitnessBounds(circuit);
  }
  if (options.validateExpressions) {
    checkExpressions(circuit);
  }
}
