/**
 * Witness indices and canonically ordered witness sets
 */

import { integerOutOfRangeError } from '../errors.js';

/**
 * Index into the solver's flat witness vector (a u32 on the wire)
 */
export type Witness = number;

const MAX_U32 = 0xffffffff;

/**
 * Check that a number is usable as a witness index
 */
export function isWitness(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_U32;
}

/**
 * Return the value as a witness, throwing INTEGER_OUT_OF_RANGE otherwise
 */
export function toWitness(value: number): Witness {
  if (!isWitness(value)) {
    throw integerOutOfRangeError(value, 'u32');
  }
  return value;
}

export function compareWitnesses(a: Witness, b: Witness): number {
  return a - b;
}

/**
 * Ascending, duplicate-free set of witnesses
 *
 * Iteration order depends only on the members, never on the order they were
 * inserted in, so two sets with the same members serialize identically.
 *
 * @example
 * ```typescript
 * const set = WitnessSet.from([3, 1, 2, 1]);
 * set.toArray(); // [1, 2, 3]
 * ```
 */
export class WitnessSet implements Iterable<Witness> {
  private readonly members: readonly Witness[];

  private constructor(sortedUnique: readonly Witness[]) {
    this.members = sortedUnique;
  }

  /**
   * Build a set from witnesses in any order, with or without duplicates
   */
  static from(witnesses: Iterable<Witness>): WitnessSet {
    const sorted = Array.from(witnesses, toWitness).sort(compareWitnesses);
    const unique: Witness[] = [];
    for (const witness of sorted) {
      if (unique.length === 0 || unique[unique.length - 1] !== witness) {
        unique.push(witness);
      }
    }
    return new WitnessSet(unique);
  }

  static empty(): WitnessSet {
    return new WitnessSet([]);
  }

  get size(): number {
    return this.members.length;
  }

  has(witness: Witness): boolean {
    // Binary search over the sorted members
    let lo = 0;
    let hi = this.members.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const current = this.members[mid]!;
      if (current === witness) {
        return true;
      }
      if (current < witness) {
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return false;
  }

  /**
   * Union of this set and another
   */
  union(other: WitnessSet): WitnessSet {
    return WitnessSet.from([...this.members, ...other.members]);
  }

  equals(other: WitnessSet): boolean {
    if (this.members.length !== other.members.length) {
      return false;
    }
    return this.members.every((witness, i) => other.members[i] === witness);
  }

  toArray(): Witness[] {
    return [...this.members];
  }

  [Symbol.iterator](): Iterator<Witness> {
    return this.members[Symbol.iterator]();
  }
}

/**
 * The public interface of a circuit: a canonically ordered witness set
 */
export type PublicInputs = WitnessSet;
