/**
 * Foreign call suspension state
 *
 * A solver that reaches a ForeignCall instruction cannot continue until an
 * external resolver answers. Rather than pausing a coroutine, the state of
 * that wait is an ordinary value: the Brillig program plus the answers it has
 * collected so far. Re-running the program consumes those answers strictly in
 * the order its foreign calls execute; when they run out, the solver reports
 * the pending call and the caller resumes it by appending an answer.
 */

import { foreignCallOrderError } from '../errors.js';
import type { Brillig } from './program.js';
import type {
  ForeignCallOutput,
  ForeignCallResult,
  RegisterOrMemory,
  Value,
} from './types.js';

/**
 * A ForeignCall instruction and its position in the bytecode
 */
export interface ForeignCallSite {
  readonly position: number;
  readonly function: string;
  readonly destinations: readonly RegisterOrMemory[];
  readonly inputs: readonly RegisterOrMemory[];
}

/**
 * What a suspended solver hands to the resolver: the call name and the
 * input values read from the call's registers and heap
 */
export interface ForeignCallWaitInfo {
  readonly function: string;
  readonly inputs: readonly ForeignCallOutput[];
}

export type ForeignCallStatus =
  | { readonly status: 'resolved'; readonly callIndex: number; readonly result: ForeignCallResult }
  | { readonly status: 'pending'; readonly callIndex: number; readonly request: ForeignCallWaitInfo };

/**
 * List the program's ForeignCall instructions in bytecode order
 */
export function foreignCallSites(program: Brillig): ForeignCallSite[] {
  const sites: ForeignCallSite[] = [];
  program.bytecode.forEach((opcode, position) => {
    if (opcode.type === 'ForeignCall') {
      sites.push({
        position,
        function: opcode.function,
        destinations: opcode.destinations,
        inputs: opcode.inputs,
      });
    }
  });
  return sites;
}

/**
 * Return a copy of the program with one more foreign call answer
 *
 * The input program is left unchanged.
 */
export function resolveForeignCall(program: Brillig, result: ForeignCallResult): Brillig {
  return { ...program, foreignCallResults: [...program.foreignCallResults, result] };
}

export function singleOutput(value: Value): ForeignCallOutput {
  return { type: 'Single', value };
}

export function arrayOutput(values: readonly Value[]): ForeignCallOutput {
  return { type: 'Array', values };
}

/**
 * Hands out a program's stored foreign call answers in call order
 *
 * @example
 * ```typescript
 * const cursor = new ForeignCallCursor(program);
 * // ...executing, the solver reaches a foreign call:
 * const status = cursor.next({ function: 'invert', inputs: [singleOutput(x)] });
 * if (status.status === 'pending') {
 *   // suspend: hand status.request to the resolver, later
 *   program = cursor.resume({ values: [singleOutput(inverse)] });
 * }
 * ```
 */
export class ForeignCallCursor {
  private current: Brillig;
  private consumed = 0;
  private pending: ForeignCallWaitInfo | undefined;

  constructor(program: Brillig) {
    this.current = program;
  }

  /**
   * The program including every answer supplied through `resume`
   */
  get program(): Brillig {
    return this.current;
  }

  /**
   * Number of foreign calls answered so far in this run
   */
  get callIndex(): number {
    return this.consumed;
  }

  get isPending(): boolean {
    return this.pending !== undefined;
  }

  /**
   * Request the answer to the next foreign call the solver encountered
   *
   * @throws CircuitIrError FOREIGN_CALL_ORDER if an earlier call is still pending
   */
  next(request: ForeignCallWaitInfo): ForeignCallStatus {
    if (this.pending !== undefined) {
      throw foreignCallOrderError(`call '${this.pending.function}' is still pending`, this.consumed);
    }

    const callIndex = this.consumed;
    const result = this.current.foreignCallResults[callIndex];
    if (result !== undefined) {
      this.consumed++;
      return { status: 'resolved', callIndex, result };
    }

    this.pending = request;
    return { status: 'pending', callIndex, request };
  }

  /**
   * Answer the pending call
   *
   * @returns The program with the answer appended
   * @throws CircuitIrError FOREIGN_CALL_ORDER if no call is pending
   */
  resume(result: ForeignCallResult): Brillig {
    if (this.pending === undefined) {
      throw foreignCallOrderError('no foreign call is pending', this.consumed);
    }
    this.current = resolveForeignCall(this.current, result);
    this.pending = undefined;
    this.consumed++;
    return this.current;
  }
}
