/**
 * Property-based testing configuration and utilities
 *
 * This module provides configuration and fast-check arbitraries for every
 * part of the circuit model. All property tests should use these so that
 * generated circuits stay well-formed: canonical expressions, ascending
 * witness sets and memory blocks initialized before use.
 */

import * as fc from 'fast-check';
import type { FieldConfig, FieldElement } from '../types.js';
import { BN254_SCALAR_FIELD } from '../field/config.js';
import { createFieldElement } from '../field/element.js';
import { createExpression, type Expression, type LinearTerm, type MulTerm } from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';
import type { BlackBoxFuncCall, FunctionInput } from '../opcodes/black-box.js';
import type { Directive } from '../opcodes/directives.js';
import { readAtMemIndex, writeToMemIndex, type MemOp } from '../opcodes/memory.js';
import type { Opcode } from '../opcodes/opcode.js';
import { memoryInit } from '../opcodes/opcode.js';
import type { Brillig, BrilligInputs, BrilligOutputs } from '../brillig/program.js';
import {
  BINARY_FIELD_OPS,
  BINARY_INT_OPS,
  type BlackBoxOp,
  type BrilligOpcode,
  type ForeignCallOutput,
  type ForeignCallResult,
  type HeapArray,
  type HeapVector,
  type RegisterOrMemory,
} from '../brillig/types.js';
import { createCircuit, type Circuit } from '../circuit/circuit.js';

/**
 * Standard configuration for property-based tests
 * - Minimum 100 iterations per property test
 * - Seed logging for reproducibility
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for properties over whole circuits, which are slower to
 * generate
 */
export const FAST_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 25,
  verbose: false,
  seed: Date.now(),
};

/**
 * Arbitrary generator for field values in range [0, modulus)
 */
export function arbitraryFieldValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: modulus - 1n });
}

/**
 * Field elements biased towards the values circuits actually contain:
 * small constants and their negations
 */
export function arbitraryFieldElement(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<FieldElement> {
  return fc
    .oneof(
      arbitraryFieldValue(field.modulus),
      fc.bigInt({ min: -16n, max: 16n }).map((v) => (v < 0n ? field.modulus + v : v))
    )
    .map((value) => createFieldElement(value, field));
}

export function arbitraryWitness(max = 1000): fc.Arbitrary<Witness> {
  return fc.nat({ max });
}

export function arbitraryU32(): fc.Arbitrary<number> {
  return fc.integer({ min: 0, max: 0xffffffff });
}

/**
 * Register indices, labels and heap sizes over the full u64 range, biased
 * towards small values
 */
export function arbitraryU64(): fc.Arbitrary<bigint> {
  return fc.oneof(fc.bigInt({ min: 0n, max: 64n }), fc.bigUintN(64));
}

/**
 * Canonical expressions, built through createExpression
 */
export function arbitraryExpression(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<Expression> {
  const coefficient = arbitraryFieldElement(field);
  return fc
    .record({
      mulTerms: fc.array(
        fc.tuple(coefficient, arbitraryWitness(), arbitraryWitness()).map((t): MulTerm => t),
        { maxLength: 3 }
      ),
      linearCombinations: fc.array(
        fc.tuple(coefficient, arbitraryWitness()).map((t): LinearTerm => t),
        { maxLength: 4 }
      ),
      qC: coefficient,
    })
    .map((parts) => createExpression(parts, field));
}

export function arbitraryFunctionInput(): fc.Arbitrary<FunctionInput> {
  return fc.record({ witness: arbitraryWitness(), numBits: fc.nat({ max: 254 }) });
}

function inputs(maxLength = 4): fc.Arbitrary<FunctionInput[]> {
  return fc.array(arbitraryFunctionInput(), { maxLength });
}

function witnesses(maxLength = 4): fc.Arbitrary<Witness[]> {
  return fc.array(arbitraryWitness(), { maxLength });
}

function witnessPair(): fc.Arbitrary<readonly [Witness, Witness]> {
  return fc.tuple(arbitraryWitness(), arbitraryWitness());
}

/**
 * One arbitrary per black-box function
 */
export function arbitraryBlackBoxFuncCall(): fc.Arbitrary<BlackBoxFuncCall> {
  const fi = arbitraryFunctionInput();
  const w = arbitraryWitness();
  return fc.oneof(
    fc
      .record({ name: fc.constantFrom('AND' as const, 'XOR' as const), lhs: fi, rhs: fi, output: w })
      .map((call): BlackBoxFuncCall => call),
    fi.map((input): BlackBoxFuncCall => ({ name: 'RANGE', input })),
    fc
      .record({
        name: fc.constantFrom('SHA256' as const, 'Blake2s' as const, 'Keccak256' as const),
        inputs: inputs(),
        outputs: witnesses(),
      })
      .map((call): BlackBoxFuncCall => call),
    fc
      .record({ publicKeyX: fi, publicKeyY: fi, signature: inputs(), message: inputs(), output: w })
      .map((call): BlackBoxFuncCall => ({ name: 'SchnorrVerify', ...call })),
    fc
      .record({ inputs: inputs(), domainSeparator: arbitraryU32(), outputs: witnessPair() })
      .map((call): BlackBoxFuncCall => ({ name: 'Pedersen', ...call })),
    fc
      .record({ inputs: inputs(), output: w })
      .map((call): BlackBoxFuncCall => ({ name: 'HashToField128Security', ...call })),
    fc
      .record({
        name: fc.constantFrom('EcdsaSecp256k1' as const, 'EcdsaSecp256r1' as const),
        publicKeyX: inputs(),
        publicKeyY: inputs(),
        signature: inputs(),
        hashedMessage: inputs(),
        output: w,
      })
      .map((call): BlackBoxFuncCall => call),
    fc
      .record({ low: fi, high: fi, outputs: witnessPair() })
      .map((call): BlackBoxFuncCall => ({ name: 'FixedBaseScalarMul', ...call })),
    fc
      .record({ inputs: inputs(), varMessageSize: fi, outputs: witnesses() })
      .map((call): BlackBoxFuncCall => ({ name: 'Keccak256VariableLength', ...call })),
    fc
      .record({
        verificationKey: inputs(),
        proof: inputs(),
        publicInputs: inputs(),
        keyHash: fi,
        inputAggregationObject: fc.option(inputs(), { nil: undefined }),
        outputAggregationObject: witnesses(),
      })
      .map(({ inputAggregationObject, ...call }): BlackBoxFuncCall => ({
        name: 'RecursiveAggregation',
        ...call,
        ...(inputAggregationObject !== undefined ? { inputAggregationObject } : {}),
      }))
  );
}

export function arbitraryDirective(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<Directive> {
  const expression = arbitraryExpression(field);
  return fc.oneof(
    fc
      .record({
        a: expression,
        b: expression,
        q: arbitraryWitness(),
        r: arbitraryWitness(),
        predicate: fc.option(expression, { nil: undefined }),
      })
      .map(({ predicate, ...rest }): Directive => ({
        type: 'Quotient',
        ...rest,
        ...(predicate !== undefined ? { predicate } : {}),
      })),
    fc
      .record({ a: expression, b: witnesses(), radix: arbitraryU32() })
      .map((rest): Directive => ({ type: 'ToLeRadix', ...rest })),
    fc
      .record({
        inputs: fc.array(fc.array(expression, { maxLength: 2 }), { maxLength: 3 }),
        tuple: arbitraryU32(),
        bits: witnesses(),
        sortBy: fc.array(arbitraryU32(), { maxLength: 3 }),
      })
      .map((rest): Directive => ({ type: 'PermutationSort', ...rest }))
  );
}

function arbitraryHeapArray(): fc.Arbitrary<HeapArray> {
  return fc.record({ pointer: arbitraryU64(), size: arbitraryU64() });
}

function arbitraryHeapVector(): fc.Arbitrary<HeapVector> {
  return fc.record({ pointer: arbitraryU64(), size: arbitraryU64() });
}

export function arbitraryRegisterOrMemory(): fc.Arbitrary<RegisterOrMemory> {
  return fc.oneof(
    arbitraryU64().map((index): RegisterOrMemory => ({ type: 'RegisterIndex', index })),
    arbitraryHeapArray().map((array): RegisterOrMemory => ({ type: 'HeapArray', ...array })),
    arbitraryHeapVector().map((vector): RegisterOrMemory => ({ type: 'HeapVector', ...vector }))
  );
}

export function arbitraryBlackBoxOp(): fc.Arbitrary<BlackBoxOp> {
  const register = arbitraryU64();
  const array = arbitraryHeapArray();
  const vector = arbitraryHeapVector();
  return fc.oneof(
    fc
      .record({
        type: fc.constantFrom('Sha256' as const, 'Blake2s' as const, 'Keccak256' as const),
        message: vector,
        output: array,
      })
      .map((op): BlackBoxOp => op),
    fc
      .record({ message: vector, output: register })
      .map((op): BlackBoxOp => ({ type: 'HashToField128Security', ...op })),
    fc
      .record({
        type: fc.constantFrom('EcdsaSecp256k1' as const, 'EcdsaSecp256r1' as const),
        hashedMsg: vector,
        publicKeyX: array,
        publicKeyY: array,
        signature: array,
        result: register,
      })
      .map((op): BlackBoxOp => op),
    fc
      .record({ publicKeyX: register, publicKeyY: register, message: vector, signature: vector, result: register })
      .map((op): BlackBoxOp => ({ type: 'SchnorrVerify', ...op })),
    fc
      .record({ inputs: vector, domainSeparator: register, output: array })
      .map((op): BlackBoxOp => ({ type: 'Pedersen', ...op })),
    fc
      .record({ low: register, high: register, result: array })
      .map((op): BlackBoxOp => ({ type: 'FixedBaseScalarMul', ...op }))
  );
}

export function arbitraryBrilligOpcode(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<BrilligOpcode> {
  const register = arbitraryU64();
  return fc.oneof(
    fc
      .record({ destination: register, op: fc.constantFrom(...BINARY_FIELD_OPS), lhs: register, rhs: register })
      .map((op): BrilligOpcode => ({ type: 'BinaryFieldOp', ...op })),
    fc
      .record({
        destination: register,
        op: fc.constantFrom(...BINARY_INT_OPS),
        bitSize: arbitraryU32(),
        lhs: register,
        rhs: register,
      })
      .map((op): BrilligOpcode => ({ type: 'BinaryIntOp', ...op })),
    fc
      .record({ type: fc.constantFrom('JumpIfNot' as const, 'JumpIf' as const), condition: register, location: register })
      .map((op): BrilligOpcode => op),
    fc
      .record({ type: fc.constantFrom('Jump' as const, 'Call' as const), location: register })
      .map((op): BrilligOpcode => op),
    fc
      .record({ destination: register, value: arbitraryFieldElement(field) })
      .map((op): BrilligOpcode => ({ type: 'Const', ...op })),
    fc
      .record({
        function: fc.string({ maxLength: 12 }),
        destinations: fc.array(arbitraryRegisterOrMemory(), { maxLength: 3 }),
        inputs: fc.array(arbitraryRegisterOrMemory(), { maxLength: 3 }),
      })
      .map((op): BrilligOpcode => ({ type: 'ForeignCall', ...op })),
    fc
      .record({ destination: register, source: register })
      .map((op): BrilligOpcode => ({ type: 'Mov', ...op })),
    fc
      .record({ destination: register, sourcePointer: register })
      .map((op): BrilligOpcode => ({ type: 'Load', ...op })),
    fc
      .record({ destinationPointer: register, source: register })
      .map((op): BrilligOpcode => ({ type: 'Store', ...op })),
    arbitraryBlackBoxOp().map((op): BrilligOpcode => ({ type: 'BlackBox', op })),
    fc.constantFrom('Return' as const, 'Trap' as const, 'Stop' as const).map((type): BrilligOpcode => ({ type }))
  );
}

export function arbitraryForeignCallResult(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<ForeignCallResult> {
  const value = arbitraryFieldElement(field);
  const output: fc.Arbitrary<ForeignCallOutput> = fc.oneof(
    value.map((v): ForeignCallOutput => ({ type: 'Single', value: v })),
    fc.array(value, { maxLength: 3 }).map((values): ForeignCallOutput => ({ type: 'Array', values }))
  );
  return fc.array(output, { maxLength: 3 }).map((values) => ({ values }));
}

export function arbitraryBrillig(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<Brillig> {
  const expression = arbitraryExpression(field);
  const input: fc.Arbitrary<BrilligInputs> = fc.oneof(
    expression.map((e): BrilligInputs => ({ type: 'Single', expression: e })),
    fc.array(expression, { maxLength: 3 }).map((expressions): BrilligInputs => ({ type: 'Array', expressions }))
  );
  const output: fc.Arbitrary<BrilligOutputs> = fc.oneof(
    arbitraryWitness().map((witness): BrilligOutputs => ({ type: 'Simple', witness })),
    witnesses().map((ws): BrilligOutputs => ({ type: 'Array', witnesses: ws }))
  );
  return fc
    .record({
      inputs: fc.array(input, { maxLength: 3 }),
      outputs: fc.array(output, { maxLength: 3 }),
      foreignCallResults: fc.array(arbitraryForeignCallResult(field), { maxLength: 2 }),
      bytecode: fc.array(arbitraryBrilligOpcode(field), { maxLength: 6 }),
      predicate: fc.option(expression, { nil: undefined }),
    })
    .map(({ predicate, ...program }): Brillig => ({
      ...program,
      ...(predicate !== undefined ? { predicate } : {}),
    }));
}

export function arbitraryMemOp(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<MemOp> {
  const expression = arbitraryExpression(field);
  return fc.oneof(
    fc.tuple(expression, arbitraryWitness()).map(([index, destination]) => readAtMemIndex(index, destination)),
    fc.tuple(expression, expression).map(([index, value]) => writeToMemIndex(index, value))
  );
}

export function arbitraryOpcode(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<Opcode> {
  const blockId = fc.nat({ max: 4 });
  return fc.oneof(
    arbitraryExpression(field).map((expression): Opcode => ({ type: 'Arithmetic', expression })),
    arbitraryBlackBoxFuncCall().map((call): Opcode => ({ type: 'BlackBoxFuncCall', call })),
    arbitraryDirective(field).map((directive): Opcode => ({ type: 'Directive', directive })),
    arbitraryBrillig(field).map((brillig): Opcode => ({ type: 'Brillig', brillig })),
    fc
      .record({
        blockId,
        op: arbitraryMemOp(field),
        predicate: fc.option(arbitraryExpression(field), { nil: undefined }),
      })
      .map(({ predicate, ...rest }): Opcode => ({
        type: 'MemoryOp',
        ...rest,
        ...(predicate !== undefined ? { predicate } : {}),
      })),
    fc.record({ blockId, init: witnesses() }).map((rest): Opcode => ({ type: 'MemoryInit', ...rest }))
  );
}

/**
 * Well-formed circuits: every memory block used is initialized up front
 */
export function arbitraryCircuit(field: FieldConfig = BN254_SCALAR_FIELD): fc.Arbitrary<Circuit> {
  return fc
    .record({
      currentWitnessIndex: arbitraryWitness(2000),
      opcodes: fc.array(arbitraryOpcode(field), { maxLength: 6 }),
      privateParameters: witnesses(6),
      publicParameters: witnesses(6),
      returnValues: witnesses(6),
    })
    .map((parts) => {
      const blocks = new Set<number>();
      for (const opcode of parts.opcodes) {
        if (opcode.type === 'MemoryOp') {
          blocks.add(opcode.blockId);
        }
      }
      const inits = [...blocks].map((blockId) => memoryInit(blockId, []));
      return createCircuit({ ...parts, opcodes: [...inits, ...parts.opcodes] });
    });
}
