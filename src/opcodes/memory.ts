/**
 * Memory blocks
 *
 * A block is a logical RAM bank scoped to one circuit. MemoryInit gives it
 * its initial contents; MemoryOp reads from or writes to it. Index and value
 * are full expressions because addresses may depend on other witnesses.
 */

import type { Expression } from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';

/**
 * Identifier of a memory block (a u32 on the wire)
 */
export type BlockId = number;

export type MemOp =
  | { readonly kind: 'read'; readonly index: Expression; readonly destination: Witness }
  | { readonly kind: 'write'; readonly index: Expression; readonly value: Expression };

/**
 * Constant written as the operation expression of each kind
 */
export const MEM_OP_CODES = {
  read: 0n,
  write: 1n,
} as const satisfies Record<MemOp['kind'], bigint>;

/**
 * Read the block at `index` into `destination`
 */
export function readAtMemIndex(index: Expression, destination: Witness): MemOp {
  return { kind: 'read', index, destination };
}

/**
 * Write `value` into the block at `index`
 */
export function writeToMemIndex(index: Expression, value: Expression): MemOp {
  return { kind: 'write', index, value };
}
