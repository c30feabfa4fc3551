/**
 * Reference circuits and their pinned encodings
 *
 * Each builder constructs a circuit whose canonical payload is stored in
 * serialization/fixtures/golden.json, together with the gzip envelope
 * another encoder produced for it.
 */

import { readFileSync } from 'fs';
import { BN254_SCALAR_FIELD } from '../field/config.js';
import { createFieldElement } from '../field/element.js';
import type { FieldElement } from '../types.js';
import {
  createExpression,
  expressionFromConstant,
  expressionFromWitness,
  type Expression,
} from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';
import type { FunctionInput } from '../opcodes/black-box.js';
import { readAtMemIndex, writeToMemIndex } from '../opcodes/memory.js';
import { arithmetic, blackBoxFuncCall, brillig, memoryInit, memoryOp } from '../opcodes/opcode.js';
import { createBrillig } from '../brillig/program.js';
import { heapArray, registerIndex } from '../brillig/types.js';
import { createCircuit, type Circuit } from '../circuit/circuit.js';

export type GoldenCircuitName =
  | 'addition'
  | 'fixedBaseScalarMul'
  | 'pedersen'
  | 'schnorrVerify'
  | 'simpleBrilligForeignCall'
  | 'complexBrilligForeignCall'
  | 'memoryOp';

export interface GoldenFixtures {
  /** Canonical payload hex and base64 of the reference envelope, per circuit */
  circuits: Record<GoldenCircuitName, { payload: string; compressed: string }>;
  /** Base64 envelopes of circuits produced by a compiler front end */
  foreignEncoder: { inverter: string };
}

/**
 * Load golden.json from the serialization fixtures directory
 */
export function loadGoldenFixtures(): GoldenFixtures {
  const url = new URL('../serialization/fixtures/golden.json', import.meta.url);
  const parsed: GoldenFixtures = JSON.parse(readFileSync(url, 'utf-8'));
  return parsed;
}

const field = BN254_SCALAR_FIELD;

function fe(value: bigint | number): FieldElement {
  return createFieldElement(value, field);
}

function linear(...terms: [coefficient: bigint | number, witness: Witness][]): Expression {
  return createExpression(
    { linearCombinations: terms.map(([coefficient, witness]) => [fe(coefficient), witness] as const) },
    field
  );
}

function byteInputs(first: Witness, count: number): FunctionInput[] {
  return Array.from({ length: count }, (_, i) => ({ witness: first + i, numBits: 8 }));
}

function range(first: Witness, last: Witness): Witness[] {
  return Array.from({ length: last - first + 1 }, (_, i) => first + i);
}

/** w1 + w2 - w3 = 0 */
export function additionCircuit(): Circuit {
  return createCircuit({
    currentWitnessIndex: 4,
    opcodes: [arithmetic(linear([1, 1], [1, 2], [-1, 3]))],
    privateParameters: [1, 2],
    returnValues: [3],
  });
}

export function fixedBaseScalarMulCircuit(): Circuit {
  return createCircuit({
    currentWitnessIndex: 5,
    opcodes: [
      blackBoxFuncCall({
        name: 'FixedBaseScalarMul',
        low: { witness: 1, numBits: 128 },
        high: { witness: 2, numBits: 128 },
        outputs: [3, 4],
      }),
    ],
    privateParameters: [1, 2],
    returnValues: [3, 4],
  });
}

export function pedersenCircuit(): Circuit {
  return createCircuit({
    currentWitnessIndex: 4,
    opcodes: [
      blackBoxFuncCall({
        name: 'Pedersen',
        inputs: [{ witness: 1, numBits: field.maxNumBits }],
        domainSeparator: 0,
        outputs: [2, 3],
      }),
    ],
    privateParameters: [1],
    returnValues: [2, 3],
  });
}

/** 64 signature bytes in w3..w66, a 10-byte message in w67..w76 */
export function schnorrVerifyCircuit(): Circuit {
  return createCircuit({
    currentWitnessIndex: 100,
    opcodes: [
      blackBoxFuncCall({
        name: 'SchnorrVerify',
        publicKeyX: { witness: 1, numBits: field.maxNumBits },
        publicKeyY: { witness: 2, numBits: field.maxNumBits },
        signature: byteInputs(3, 64),
        message: byteInputs(67, 10),
        output: 77,
      }),
    ],
    privateParameters: range(1, 76),
    returnValues: [77],
  });
}

export function simpleBrilligForeignCallCircuit(): Circuit {
  const program = createBrillig({
    inputs: [{ type: 'Single', expression: expressionFromWitness(1, field) }],
    outputs: [{ type: 'Simple', witness: 2 }],
    bytecode: [
      { type: 'ForeignCall', function: 'invert', destinations: [registerIndex(0)], inputs: [registerIndex(0)] },
    ],
  });
  return createCircuit({
    currentWitnessIndex: 8,
    opcodes: [brillig(program)],
    privateParameters: [1, 2],
  });
}

export function complexBrilligForeignCallCircuit(): Circuit {
  const program = createBrillig({
    inputs: [
      {
        type: 'Array',
        expressions: [expressionFromWitness(1, field), expressionFromWitness(2, field), expressionFromWitness(3, field)],
      },
      { type: 'Single', expression: linear([1, 1], [1, 2], [1, 3]) },
    ],
    outputs: [
      { type: 'Array', witnesses: [4, 5, 6] },
      { type: 'Simple', witness: 7 },
      { type: 'Simple', witness: 8 },
    ],
    bytecode: [
      {
        type: 'ForeignCall',
        function: 'complex',
        destinations: [heapArray(0, 3), registerIndex(1), registerIndex(2)],
        inputs: [heapArray(0, 3), registerIndex(1)],
      },
    ],
  });
  return createCircuit({
    currentWitnessIndex: 8,
    opcodes: [brillig(program)],
    privateParameters: [1, 2, 3],
  });
}

/** Writes w3 to slot 1 of block 0, then reads slot 1 into w4 */
export function memoryOpCircuit(): Circuit {
  const one = expressionFromConstant(fe(1));
  return createCircuit({
    currentWitnessIndex: 5,
    opcodes: [
      memoryInit(0, [1, 2]),
      memoryOp(0, writeToMemIndex(one, expressionFromWitness(3, field))),
      memoryOp(0, readAtMemIndex(one, 4)),
    ],
    privateParameters: [1, 2, 3],
    returnValues: [4],
  });
}

export const GOLDEN_CIRCUITS: Record<GoldenCircuitName, () => Circuit> = {
  addition: additionCircuit,
  fixedBaseScalarMul: fixedBaseScalarMulCircuit,
  pedersen: pedersenCircuit,
  schnorrVerify: schnorrVerifyCircuit,
  simpleBrilligForeignCall: simpleBrilligForeignCallCircuit,
  complexBrilligForeignCall: complexBrilligForeignCallCircuit,
  memoryOp: memoryOpCircuit,
};

/**
 * The circuit a front end emits for `x != 0 ? 1 / x : 0` style inversion,
 * checked against the `inverter` envelope
 */
export function inverterCircuit(): Circuit {
  const program = createBrillig({
    inputs: [{ type: 'Single', expression: expressionFromWitness(3, field) }],
    outputs: [{ type: 'Simple', witness: 4 }],
    bytecode: [
      { type: 'JumpIfNot', condition: 0n, location: 3n },
      { type: 'Const', destination: 1n, value: fe(1) },
      { type: 'BinaryFieldOp', destination: 0n, op: 'Div', lhs: 1n, rhs: 0n },
      { type: 'Stop' },
    ],
    predicate: expressionFromConstant(fe(1)),
  });
  return createCircuit({
    currentWitnessIndex: 6,
    opcodes: [
      arithmetic(linear([1, 1], [-1, 2], [-1, 3])),
      brillig(program),
      arithmetic(createExpression({ mulTerms: [[fe(1), 3, 4]], linearCombinations: [[fe(1), 5]], qC: fe(-1) }, field)),
      arithmetic(createExpression({ mulTerms: [[fe(1), 3, 5]] }, field)),
      arithmetic(linear([-1, 5])),
    ],
    privateParameters: [1],
    publicParameters: [2],
  });
}
