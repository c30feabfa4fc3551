/**
 * Brillig Bytecode Types
 *
 * Brillig is a small register machine that computes values outside the
 * arithmetic circuit. A program works on a flat register file plus a heap;
 * heap data is addressed through registers holding base pointers.
 *
 * Every union here is closed and its discriminants are fixed by their
 * position in the `*_TAGS` tables: entries are only ever appended.
 */

import type { FieldElement } from '../types.js';

/**
 * Index into the program's register file (a u64 on the wire)
 */
export type RegisterIndex = bigint;

/**
 * Bytecode position used as a jump target (a u64 on the wire)
 */
export type Label = bigint;

/**
 * A register value
 */
export type Value = FieldElement;

/**
 * Fixed-size heap array: the register at `pointer` holds its base address
 */
export interface HeapArray {
  readonly pointer: RegisterIndex;
  /** Element count (a u64 on the wire) */
  readonly size: bigint;
}

/**
 * Variable-size heap vector: `size` names the register holding its length
 */
export interface HeapVector {
  readonly pointer: RegisterIndex;
  readonly size: RegisterIndex;
}

export type RegisterOrMemory =
  | { readonly type: 'RegisterIndex'; readonly index: RegisterIndex }
  | ({ readonly type: 'HeapArray' } & HeapArray)
  | ({ readonly type: 'HeapVector' } & HeapVector);

export const REGISTER_OR_MEMORY_TAGS = {
  RegisterIndex: 0,
  HeapArray: 1,
  HeapVector: 2,
} as const satisfies Record<RegisterOrMemory['type'], number>;

export type BinaryFieldOp = 'Add' | 'Sub' | 'Mul' | 'Div' | 'Equals';

export const BINARY_FIELD_OPS: readonly BinaryFieldOp[] = ['Add', 'Sub', 'Mul', 'Div', 'Equals'];

export type BinaryIntOp =
  | 'Add'
  | 'Sub'
  | 'Mul'
  | 'SignedDiv'
  | 'UnsignedDiv'
  | 'Equals'
  | 'LessThan'
  | 'LessThanEquals'
  | 'And'
  | 'Or'
  | 'Xor'
  | 'Shl'
  | 'Shr';

export const BINARY_INT_OPS: readonly BinaryIntOp[] = [
  'Add',
  'Sub',
  'Mul',
  'SignedDiv',
  'UnsignedDiv',
  'Equals',
  'LessThan',
  'LessThanEquals',
  'And',
  'Or',
  'Xor',
  'Shl',
  'Shr',
];

/**
 * Cryptographic primitives callable from inside Brillig
 */
export type BlackBoxOp =
  | { readonly type: 'Sha256'; readonly message: HeapVector; readonly output: HeapArray }
  | { readonly type: 'Blake2s'; readonly message: HeapVector; readonly output: HeapArray }
  | { readonly type: 'Keccak256'; readonly message: HeapVector; readonly output: HeapArray }
  | { readonly type: 'HashToField128Security'; readonly message: HeapVector; readonly output: RegisterIndex }
  | {
      readonly type: 'EcdsaSecp256k1' | 'EcdsaSecp256r1';
      readonly hashedMsg: HeapVector;
      readonly publicKeyX: HeapArray;
      readonly publicKeyY: HeapArray;
      readonly signature: HeapArray;
      readonly result: RegisterIndex;
    }
  | {
      readonly type: 'SchnorrVerify';
      readonly publicKeyX: RegisterIndex;
      readonly publicKeyY: RegisterIndex;
      readonly message: HeapVector;
      readonly signature: HeapVector;
      readonly result: RegisterIndex;
    }
  | {
      readonly type: 'Pedersen';
      readonly inputs: HeapVector;
      readonly domainSeparator: RegisterIndex;
      readonly output: HeapArray;
    }
  | {
      readonly type: 'FixedBaseScalarMul';
      readonly low: RegisterIndex;
      readonly high: RegisterIndex;
      readonly result: HeapArray;
    };

export const BLACK_BOX_OP_TAGS = {
  Sha256: 0,
  Blake2s: 1,
  Keccak256: 2,
  HashToField128Security: 3,
  EcdsaSecp256k1: 4,
  EcdsaSecp256r1: 5,
  SchnorrVerify: 6,
  Pedersen: 7,
  FixedBaseScalarMul: 8,
} as const satisfies Record<BlackBoxOp['type'], number>;

/**
 * A single Brillig instruction
 */
export type BrilligOpcode =
  | {
      readonly type: 'BinaryFieldOp';
      readonly destination: RegisterIndex;
      readonly op: BinaryFieldOp;
      readonly lhs: RegisterIndex;
      readonly rhs: RegisterIndex;
    }
  | {
      readonly type: 'BinaryIntOp';
      readonly destination: RegisterIndex;
      readonly op: BinaryIntOp;
      readonly bitSize: number;
      readonly lhs: RegisterIndex;
      readonly rhs: RegisterIndex;
    }
  | { readonly type: 'JumpIfNot'; readonly condition: RegisterIndex; readonly location: Label }
  | { readonly type: 'JumpIf'; readonly condition: RegisterIndex; readonly location: Label }
  | { readonly type: 'Jump'; readonly location: Label }
  | { readonly type: 'Call'; readonly location: Label }
  | { readonly type: 'Const'; readonly destination: RegisterIndex; readonly value: Value }
  | { readonly type: 'Return' }
  | {
      readonly type: 'ForeignCall';
      /** Name the external resolver dispatches on */
      readonly function: string;
      readonly destinations: readonly RegisterOrMemory[];
      readonly inputs: readonly RegisterOrMemory[];
    }
  | { readonly type: 'Mov'; readonly destination: RegisterIndex; readonly source: RegisterIndex }
  | { readonly type: 'Load'; readonly destination: RegisterIndex; readonly sourcePointer: RegisterIndex }
  | { readonly type: 'Store'; readonly destinationPointer: RegisterIndex; readonly source: RegisterIndex }
  | { readonly type: 'BlackBox'; readonly op: BlackBoxOp }
  | { readonly type: 'Trap' }
  | { readonly type: 'Stop' };

export const BRILLIG_OPCODE_TAGS = {
  BinaryFieldOp: 0,
  BinaryIntOp: 1,
  JumpIfNot: 2,
  JumpIf: 3,
  Jump: 4,
  Call: 5,
  Const: 6,
  Return: 7,
  ForeignCall: 8,
  Mov: 9,
  Load: 10,
  Store: 11,
  BlackBox: 12,
  Trap: 13,
  Stop: 14,
} as const satisfies Record<BrilligOpcode['type'], number>;

/**
 * One value returned by a foreign call
 */
export type ForeignCallOutput =
  | { readonly type: 'Single'; readonly value: Value }
  | { readonly type: 'Array'; readonly values: readonly Value[] };

export const FOREIGN_CALL_OUTPUT_TAGS = {
  Single: 0,
  Array: 1,
} as const satisfies Record<ForeignCallOutput['type'], number>;

/**
 * Answer to one foreign call, one output per destination
 */
export interface ForeignCallResult {
  readonly values: readonly ForeignCallOutput[];
}

/**
 * Helpers for the common register-only descriptors; plain numbers are
 * accepted for convenience
 */
export function registerIndex(index: RegisterIndex | number): RegisterOrMemory {
  return { type: 'RegisterIndex', index: BigInt(index) };
}

export function heapArray(pointer: RegisterIndex | number, size: bigint | number): RegisterOrMemory {
  return { type: 'HeapArray', pointer: BigInt(pointer), size: BigInt(size) };
}

export function heapVector(pointer: RegisterIndex | number, size: RegisterIndex | number): RegisterOrMemory {
  return { type: 'HeapVector', pointer: BigInt(pointer), size: BigInt(size) };
}
