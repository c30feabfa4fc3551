/**
 * Directives
 *
 * Solver hints that compute witness values without constraining them. They
 * occupy opcode tag 2 and stay decodable so older byte streams keep loading.
 */

import type { Expression } from '../native-types/expression.js';
import type { Witness } from '../native-types/witness.js';

export type Directive =
  | {
      /** q = a / b and r = a % b, as integers */
      readonly type: 'Quotient';
      readonly a: Expression;
      readonly b: Expression;
      readonly q: Witness;
      readonly r: Witness;
      readonly predicate?: Expression;
    }
  | {
      /** Little-endian decomposition of `a` into `b.length` digits */
      readonly type: 'ToLeRadix';
      readonly a: Expression;
      readonly b: readonly Witness[];
      readonly radix: number;
    }
  | {
      /** Control bits of the switching network sorting `inputs` */
      readonly type: 'PermutationSort';
      readonly inputs: readonly (readonly Expression[])[];
      readonly tuple: number;
      readonly bits: readonly Witness[];
      readonly sortBy: readonly number[];
    };

export const DIRECTIVE_TAGS = {
  Quotient: 0,
  ToLeRadix: 1,
  PermutationSort: 2,
} as const satisfies Record<Directive['type'], number>;
