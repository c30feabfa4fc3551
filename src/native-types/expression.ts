/**
 * Expression: a sparse quadratic polynomial over witnesses
 *
 * An expression represents the constraint
 *
 *   sum(q_m * w_a * w_b) + sum(q_l * w) + q_c = 0
 *
 * Producers build expressions through `createExpression`, which puts them in
 * canonical form: each multiplication pair ordered (w_a <= w_b), duplicate
 * terms merged by field addition, zero coefficients dropped, and terms sorted
 * by witness. The serializer writes terms in the order they are stored, so
 * only canonical expressions are guaranteed to produce canonical bytes.
 */

import type { FieldConfig, FieldElement } from '../types.js';
import { getDefaultField } from '../config.js';
import {
  createFieldElement,
  createZeroFieldElement,
  createOneFieldElement,
  isZeroFieldElement,
  isOneFieldElement,
} from '../field/element.js';
import { fieldAdd, fieldMul, fieldNeg } from '../field/operations.js';
import { compareWitnesses, type Witness } from './witness.js';

/**
 * Multiplication term: coefficient * w_a * w_b
 */
export type MulTerm = readonly [coefficient: FieldElement, wA: Witness, wB: Witness];

/**
 * Linear term: coefficient * w
 */
export type LinearTerm = readonly [coefficient: FieldElement, witness: Witness];

export interface Expression {
  readonly mulTerms: readonly MulTerm[];
  readonly linearCombinations: readonly LinearTerm[];
  /** Constant term */
  readonly qC: FieldElement;
}

/**
 * Terms of an expression in any order, possibly with duplicates
 */
export interface ExpressionParts {
  mulTerms?: readonly MulTerm[];
  linearCombinations?: readonly LinearTerm[];
  qC?: FieldElement;
}

function compareMulTerms(a: MulTerm, b: MulTerm): number {
  return compareWitnesses(a[1], b[1]) || compareWitnesses(a[2], b[2]);
}

function compareLinearTerms(a: LinearTerm, b: LinearTerm): number {
  return compareWitnesses(a[1], b[1]);
}

/**
 * Build an expression in canonical form
 *
 * @example
 * ```typescript
 * const one = createOneFieldElement();
 * // w2 + w1 + w1  ->  2*w1 + w2
 * createExpression({ linearCombinations: [[one, 2], [one, 1], [one, 1]] });
 * ```
 */
export function createExpression(parts: ExpressionParts, field: FieldConfig = getDefaultField()): Expression {
  const mulTotals = new Map<string, MulTerm>();
  for (const [coefficient, wA, wB] of parts.mulTerms ?? []) {
    const lo = Math.min(wA, wB);
    const hi = Math.max(wA, wB);
    const key = `${lo}:${hi}`;
    const previous = mulTotals.get(key);
    mulTotals.set(key, [previous ? fieldAdd(previous[0], coefficient) : coefficient, lo, hi]);
  }

  const linearTotals = new Map<Witness, LinearTerm>();
  for (const [coefficient, witness] of parts.linearCombinations ?? []) {
    const previous = linearTotals.get(witness);
    linearTotals.set(witness, [previous ? fieldAdd(previous[0], coefficient) : coefficient, witness]);
  }

  return {
    mulTerms: [...mulTotals.values()].filter((t) => !isZeroFieldElement(t[0])).sort(compareMulTerms),
    linearCombinations: [...linearTotals.values()]
      .filter((t) => !isZeroFieldElement(t[0]))
      .sort(compareLinearTerms),
    qC: parts.qC ?? createZeroFieldElement(field),
  };
}

export function zeroExpression(field: FieldConfig = getDefaultField()): Expression {
  return { mulTerms: [], linearCombinations: [], qC: createZeroFieldElement(field) };
}

/**
 * The expression `1 * w`
 */
export function expressionFromWitness(witness: Witness, field: FieldConfig = getDefaultField()): Expression {
  return {
    mulTerms: [],
    linearCombinations: [[createOneFieldElement(field), witness]],
    qC: createZeroFieldElement(field),
  };
}

/**
 * The constant expression `c`
 */
export function expressionFromConstant(constant: FieldElement | bigint | number): Expression {
  const qC = typeof constant === 'object' ? constant : createFieldElement(constant);
  return { mulTerms: [], linearCombinations: [], qC };
}

export function isConstantExpression(expression: Expression): boolean {
  return expression.mulTerms.length === 0 && expression.linearCombinations.length === 0;
}

/**
 * The constant value of an expression with no terms, or undefined
 */
export function expressionToConstant(expression: Expression): FieldElement | undefined {
  return isConstantExpression(expression) ? expression.qC : undefined;
}

/**
 * Whether the expression has no multiplication terms
 */
export function isLinearExpression(expression: Expression): boolean {
  return expression.mulTerms.length === 0;
}

/**
 * The witness `w` if the expression is exactly `1 * w`, otherwise undefined
 */
export function expressionToWitness(expression: Expression): Witness | undefined {
  const [term] = expression.linearCombinations;
  if (
    term === undefined ||
    expression.linearCombinations.length !== 1 ||
    expression.mulTerms.length !== 0 ||
    !isZeroFieldElement(expression.qC) ||
    !isOneFieldElement(term[0])
  ) {
    return undefined;
  }
  return term[1];
}

/**
 * Whether the expression is already in the form `createExpression` produces
 */
export function isCanonicalExpression(expression: Expression): boolean {
  const { mulTerms, linearCombinations } = expression;
  for (let i = 0; i < mulTerms.length; i++) {
    const term = mulTerms[i]!;
    if (term[1] > term[2] || isZeroFieldElement(term[0])) {
      return false;
    }
    if (i > 0 && compareMulTerms(mulTerms[i - 1]!, term) >= 0) {
      return false;
    }
  }
  for (let i = 0; i < linearCombinations.length; i++) {
    const term = linearCombinations[i]!;
    if (isZeroFieldElement(term[0])) {
      return false;
    }
    if (i > 0 && compareLinearTerms(linearCombinations[i - 1]!, term) >= 0) {
      return false;
    }
  }
  return true;
}

/**
 * Every witness the expression references, in term order
 */
export function expressionWitnesses(expression: Expression): Witness[] {
  const witnesses: Witness[] = [];
  for (const [, wA, wB] of expression.mulTerms) {
    witnesses.push(wA, wB);
  }
  for (const [, witness] of expression.linearCombinations) {
    witnesses.push(witness);
  }
  return witnesses;
}

export function addExpressions(a: Expression, b: Expression): Expression {
  return createExpression(
    {
      mulTerms: [...a.mulTerms, ...b.mulTerms],
      linearCombinations: [...a.linearCombinations, ...b.linearCombinations],
      qC: fieldAdd(a.qC, b.qC),
    },
    a.qC.field
  );
}

/**
 * Multiply every coefficient, and the constant, by `factor`
 */
export function scaleExpression(expression: Expression, factor: FieldElement): Expression {
  return createExpression(
    {
      mulTerms: expression.mulTerms.map(([c, wA, wB]): MulTerm => [fieldMul(c, factor), wA, wB]),
      linearCombinations: expression.linearCombinations.map(([c, w]): LinearTerm => [fieldMul(c, factor), w]),
      qC: fieldMul(expression.qC, factor),
    },
    expression.qC.field
  );
}

export function negateExpression(expression: Expression): Expression {
  return {
    mulTerms: expression.mulTerms.map(([c, wA, wB]): MulTerm => [fieldNeg(c), wA, wB]),
    linearCombinations: expression.linearCombinations.map(([c, w]): LinearTerm => [fieldNeg(c), w]),
    qC: fieldNeg(expression.qC),
  };
}

export function subtractExpressions(a: Expression, b: Expression): Expression {
  return addExpressions(a, negateExpression(b));
}
