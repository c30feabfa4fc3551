/**
 * Top-level opcode union
 *
 * Discriminants are append-only across format versions: bytes written by an
 * older encoder always decode, while an older decoder rejects the newer tags.
 */

import type { Expression } from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';
import type { Brillig } from '../brillig/program.js';
import type { BlackBoxFuncCall } from './black-box.js';
import type { Directive } from './directives.js';
import type { BlockId, MemOp } from './memory.js';

export type Opcode =
  | { readonly type: 'Arithmetic'; readonly expression: Expression }
  | { readonly type: 'BlackBoxFuncCall'; readonly call: BlackBoxFuncCall }
  | { readonly type: 'Directive'; readonly directive: Directive }
  | { readonly type: 'Brillig'; readonly brillig: Brillig }
  | {
      readonly type: 'MemoryOp';
      readonly blockId: BlockId;
      readonly op: MemOp;
      /** When present and zero, the operation is skipped */
      readonly predicate?: Expression;
    }
  | { readonly type: 'MemoryInit'; readonly blockId: BlockId; readonly init: readonly Witness[] };

export type OpcodeType = Opcode['type'];

export const OPCODE_TAGS = {
  Arithmetic: 0,
  BlackBoxFuncCall: 1,
  Directive: 2,
  Brillig: 3,
  MemoryOp: 4,
  MemoryInit: 5,
} as const satisfies Record<OpcodeType, number>;

export function arithmetic(expression: Expression): Opcode {
  return { type: 'Arithmetic', expression };
}

export function blackBoxFuncCall(call: BlackBoxFuncCall): Opcode {
  return { type: 'BlackBoxFuncCall', call };
}

export function brillig(program: Brillig): Opcode {
  return { type: 'Brillig', brillig: program };
}

export function memoryInit(blockId: BlockId, init: readonly Witness[]): Opcode {
  return { type: 'MemoryInit', blockId, init };
}

export function memoryOp(blockId: BlockId, op: MemOp, predicate?: Expression): Opcode {
  return {
    type: 'MemoryOp',
    blockId,
    op,
    ...(predicate !== undefined ? { predicate } : {}),
  };
}
