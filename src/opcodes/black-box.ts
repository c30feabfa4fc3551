/**
 * Black-box function calls
 *
 * Calls to cryptographic primitives the circuit cannot express with
 * arithmetic constraints. The catalogue is closed: a decoder rejects any
 * discriminant it does not know, since each variant's payload has its own
 * layout and cannot be skipped generically.
 */

import type { Witness } from '../native-types/witness.js';

/**
 * A witness operand together with the number of bits it must fit in
 */
export interface FunctionInput {
  readonly witness: Witness;
  readonly numBits: number;
}

export type BlackBoxFuncCall =
  | { readonly name: 'AND'; readonly lhs: FunctionInput; readonly rhs: FunctionInput; readonly output: Witness }
  | { readonly name: 'XOR'; readonly lhs: FunctionInput; readonly rhs: FunctionInput; readonly output: Witness }
  | { readonly name: 'RANGE'; readonly input: FunctionInput }
  | { readonly name: 'SHA256'; readonly inputs: readonly FunctionInput[]; readonly outputs: readonly Witness[] }
  | { readonly name: 'Blake2s'; readonly inputs: readonly FunctionInput[]; readonly outputs: readonly Witness[] }
  | {
      readonly name: 'SchnorrVerify';
      readonly publicKeyX: FunctionInput;
      readonly publicKeyY: FunctionInput;
      readonly signature: readonly FunctionInput[];
      readonly message: readonly FunctionInput[];
      readonly output: Witness;
    }
  | {
      readonly name: 'Pedersen';
      readonly inputs: readonly FunctionInput[];
      readonly domainSeparator: number;
      readonly outputs: readonly [Witness, Witness];
    }
  | { readonly name: 'HashToField128Security'; readonly inputs: readonly FunctionInput[]; readonly output: Witness }
  | {
      readonly name: 'EcdsaSecp256k1' | 'EcdsaSecp256r1';
      readonly publicKeyX: readonly FunctionInput[];
      readonly publicKeyY: readonly FunctionInput[];
      readonly signature: readonly FunctionInput[];
      readonly hashedMessage: readonly FunctionInput[];
      readonly output: Witness;
    }
  | {
      readonly name: 'FixedBaseScalarMul';
      readonly low: FunctionInput;
      readonly high: FunctionInput;
      readonly outputs: readonly [Witness, Witness];
    }
  | { readonly name: 'Keccak256'; readonly inputs: readonly FunctionInput[]; readonly outputs: readonly Witness[] }
  | {
      readonly name: 'Keccak256VariableLength';
      readonly inputs: readonly FunctionInput[];
      readonly varMessageSize: FunctionInput;
      readonly outputs: readonly Witness[];
    }
  | {
      readonly name: 'RecursiveAggregation';
      readonly verificationKey: readonly FunctionInput[];
      readonly proof: readonly FunctionInput[];
      readonly publicInputs: readonly FunctionInput[];
      readonly keyHash: FunctionInput;
      readonly inputAggregationObject?: readonly FunctionInput[];
      readonly outputAggregationObject: readonly Witness[];
    };

export type BlackBoxFuncName = BlackBoxFuncCall['name'];

/**
 * Wire discriminants. Assigned once, never reused: new primitives are
 * appended with the next free number.
 */
export const BLACK_BOX_FUNC_TAGS = {
  AND: 0,
  XOR: 1,
  RANGE: 2,
  SHA256: 3,
  Blake2s: 4,
  SchnorrVerify: 5,
  Pedersen: 6,
  HashToField128Security: 7,
  EcdsaSecp256k1: 8,
  EcdsaSecp256r1: 9,
  FixedBaseScalarMul: 10,
  Keccak256: 11,
  Keccak256VariableLength: 12,
  RecursiveAggregation: 13,
} as const satisfies Record<BlackBoxFuncName, number>;

const FUNCTION_NAMES: Record<BlackBoxFuncName, string> = {
  AND: 'and',
  XOR: 'xor',
  RANGE: 'range',
  SHA256: 'sha256',
  Blake2s: 'blake2s',
  SchnorrVerify: 'schnorr_verify',
  Pedersen: 'pedersen',
  HashToField128Security: 'hash_to_field_128_security',
  EcdsaSecp256k1: 'ecdsa_secp256k1',
  EcdsaSecp256r1: 'ecdsa_secp256r1',
  FixedBaseScalarMul: 'fixed_base_scalar_mul',
  Keccak256: 'keccak256',
  Keccak256VariableLength: 'keccak256',
  RecursiveAggregation: 'recursive_aggregation',
};

/**
 * Name of the primitive as front ends spell it (e.g. 'fixed_base_scalar_mul')
 */
export function blackBoxFuncName(call: BlackBoxFuncCall): string {
  return FUNCTION_NAMES[call.name];
}

/**
 * All typed operands of the call, in wire order
 */
export function blackBoxInputs(call: BlackBoxFuncCall): FunctionInput[] {
  switch (call.name) {
    case 'AND':
    case 'XOR':
      return [call.lhs, call.rhs];
    case 'RANGE':
      return [call.input];
    case 'SHA256':
    case 'Blake2s':
    case 'Keccak256':
    case 'Pedersen':
    case 'HashToField128Security':
      return [...call.inputs];
    case 'SchnorrVerify':
      return [call.publicKeyX, call.publicKeyY, ...call.signature, ...call.message];
    case 'EcdsaSecp256k1':
    case 'EcdsaSecp256r1':
      return [...call.publicKeyX, ...call.publicKeyY, ...call.signature, ...call.hashedMessage];
    case 'FixedBaseScalarMul':
      return [call.low, call.high];
    case 'Keccak256VariableLength':
      return [...call.inputs, call.varMessageSize];
    case 'RecursiveAggregation':
      return [
        ...call.verificationKey,
        ...call.proof,
        ...call.publicInputs,
        call.keyHash,
        ...(call.inputAggregationObject ?? []),
      ];
  }
}

/**
 * All witnesses the call writes, in wire order
 */
export function blackBoxOutputs(call: BlackBoxFuncCall): Witness[] {
  switch (call.name) {
    case 'AND':
    case 'XOR':
    case 'SchnorrVerify':
    case 'HashToField128Security':
    case 'EcdsaSecp256k1':
    case 'EcdsaSecp256r1':
      return [call.output];
    case 'RANGE':
      return [];
    case 'SHA256':
    case 'Blake2s':
    case 'Keccak256':
    case 'Keccak256VariableLength':
    case 'Pedersen':
    case 'FixedBaseScalarMul':
      return [...call.outputs];
    case 'RecursiveAggregation':
      return [...call.outputAggregationObject];
  }
}
