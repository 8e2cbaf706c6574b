/**
 * Native predicates.
 *
 * A predicate is the store-side form of a condition: attribute paths and
 * encoded operands, ready to be rendered into the store's expression grammar.
 */

import type { AttributeValue } from '../types/key.js';

/**
 * Comparison operators.
 */
export const Operator = {
  EQ: 'EQ',
  NE: 'NE',
  LT: 'LT',
  LTE: 'LTE',
  GT: 'GT',
  GTE: 'GTE',
  IN: 'IN',
  CONTAINS: 'CONTAINS',
  BEGINS_WITH: 'BEGINS_WITH',
  EXISTS: 'EXISTS',
  NOT_EXISTS: 'NOT_EXISTS',
  BETWEEN: 'BETWEEN',
} as const;

export type Operator = (typeof Operator)[keyof typeof Operator];

/**
 * Fixed operand count of each operator.
 *
 * IN takes a single operand: the list of candidate values.
 */
export const OPERATOR_ARITY: Readonly<Record<Operator, number>> = {
  EQ: 1,
  NE: 1,
  LT: 1,
  LTE: 1,
  GT: 1,
  GTE: 1,
  IN: 1,
  CONTAINS: 1,
  BEGINS_WITH: 1,
  EXISTS: 0,
  NOT_EXISTS: 0,
  BETWEEN: 2,
};

/**
 * Operators allowed in a key condition.
 */
export const KEY_OPERATORS: ReadonlySet<Operator> = new Set<Operator>([
  Operator.EQ,
  Operator.LT,
  Operator.LTE,
  Operator.GT,
  Operator.GTE,
  Operator.BETWEEN,
  Operator.BEGINS_WITH,
]);

/**
 * Comparison on a single attribute path with encoded operands.
 *
 * For IN, `operands` holds every candidate value.
 */
export interface PredicateComparison {
  readonly kind: 'comparison';
  readonly path: readonly string[];
  readonly operator: Operator;
  readonly operands: readonly AttributeValue[];
}

/**
 * Conjunction or disjunction of predicates.
 */
export interface PredicateJunction {
  readonly kind: 'and' | 'or';
  readonly children: readonly Predicate[];
}

export type Predicate = PredicateComparison | PredicateJunction;

/**
 * Joins predicates with AND, collapsing a single predicate to itself.
 */
export function conjunction(predicates: readonly Predicate[]): Predicate | null {
  if (predicates.length === 0) {
    return null;
  }
  if (predicates.length === 1) {
    return predicates[0];
  }
  return { kind: 'and', children: predicates };
}
