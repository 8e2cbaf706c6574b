/**
 * Condition AST.
 *
 * Conditions are built from attribute comparisons and joined with `and`/`or`.
 * They carry no store knowledge until projected: `toKeyPredicate()` for use as
 * a key condition, `toFilterPredicate()` for use as a filter or write guard.
 *
 * @example
 * ```typescript
 * const condition = userId.eq('u1').and(email.beginsWith('admin@')).and(visits.gt(3));
 * condition.children.length; // 3
 * ```
 */

import type { Attribute } from '../attributes/attribute.js';
import { type Codec, isEmpty } from '../attributes/codecs.js';
import {
  EncodingError,
  ExpressionError,
  InvalidArityError,
  MultipleKeyLookupError,
} from '../error/categories.js';
import type { AttributeValue } from '../types/key.js';
import {
  KEY_OPERATORS,
  OPERATOR_ARITY,
  Operator,
  type PredicateComparison,
  type PredicateJunction,
} from './predicate.js';

export { Operator } from './predicate.js';

/**
 * Any condition node.
 */
export type Condition = Comparison | AndCondition | OrCondition;

const OPERATOR_SYMBOLS: Readonly<Record<Operator, string>> = {
  EQ: '==',
  NE: '!=',
  LT: '<',
  LTE: '<=',
  GT: '>',
  GTE: '>=',
  IN: 'in',
  CONTAINS: 'contains',
  BEGINS_WITH: 'begins with',
  EXISTS: 'exists',
  NOT_EXISTS: 'not exists',
  BETWEEN: 'between',
};

/**
 * Type guard for condition nodes.
 */
export function isCondition(value: unknown): value is Condition {
  return value instanceof Comparison || value instanceof AndCondition || value instanceof OrCondition;
}

function assertCondition(value: unknown): asserts value is Condition {
  if (!isCondition(value)) {
    throw new TypeError(`Cannot combine a condition with ${value === null ? 'null' : typeof value}`);
  }
}

function childrenFor(kind: 'and' | 'or', condition: Condition): readonly Condition[] {
  return condition.kind === kind ? condition.children : [condition];
}

function joinAnd(left: Condition, right: Condition): AndCondition {
  assertCondition(right);
  return new AndCondition([...childrenFor('and', left), ...childrenFor('and', right)]);
}

function joinOr(left: Condition, right: Condition): OrCondition {
  assertCondition(right);
  return new OrCondition([...childrenFor('or', left), ...childrenFor('or', right)]);
}

function formatOperand(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Set) {
    return `{${[...value].map(formatOperand).join(', ')}}`;
  }
  if (Array.isArray(value)) {
    return `[${value.map(formatOperand).join(', ')}]`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}

// ============================================================================
// Comparison
// ============================================================================

/**
 * Comparison of one attribute against a fixed number of operands.
 */
export class Comparison {
  readonly kind = 'comparison' as const;
  readonly attribute: Attribute<unknown>;
  readonly operator: Operator;
  readonly operands: readonly unknown[];

  /**
   * @throws {InvalidArityError} If the operand count does not match the operator
   * @throws {ExpressionError} If an IN operand is not a non-empty list
   */
  constructor(attribute: Attribute<unknown>, operator: Operator, operands: readonly unknown[]) {
    const expected = OPERATOR_ARITY[operator];
    if (operands.length !== expected) {
      throw new InvalidArityError(operator, expected, operands.length);
    }

    this.attribute = attribute;
    this.operator = operator;
    this.operands = Object.freeze([...operands]);

    if (operator === Operator.IN) {
      const values = operands[0];
      if (!Array.isArray(values) || values.length === 0) {
        throw new ExpressionError('IN requires a non-empty list of values', this.describe());
      }
    }
  }

  and(other: Condition): AndCondition {
    return joinAnd(this, other);
  }

  or(other: Condition): OrCondition {
    return joinOr(this, other);
  }

  /**
   * Projects this comparison into a key condition.
   *
   * @throws {MultipleKeyLookupError} For IN, which key conditions cannot express
   * @throws {ExpressionError} For any other operator outside the key-condition grammar
   */
  toKeyPredicate(): PredicateComparison {
    if (!KEY_OPERATORS.has(this.operator)) {
      if (this.operator === Operator.IN) {
        throw new MultipleKeyLookupError(this.attribute.name);
      }
      throw new ExpressionError(
        `Operator ${this.operator} cannot be used in a key condition`,
        this.describe()
      );
    }
    return this.toPredicate();
  }

  toFilterPredicate(): PredicateComparison {
    return this.toPredicate();
  }

  describe(): string {
    const name = this.attribute.name;
    switch (this.operator) {
      case Operator.BETWEEN:
        return `${formatOperand(this.operands[0])} <= ${name} <= ${formatOperand(this.operands[1])}`;
      case Operator.EXISTS:
      case Operator.NOT_EXISTS:
        return `${OPERATOR_SYMBOLS[this.operator]}(${name})`;
      default:
        return `${name} ${OPERATOR_SYMBOLS[this.operator]} ${formatOperand(this.operands[0])}`;
    }
  }

  toString(): string {
    return this.describe();
  }

  private toPredicate(): PredicateComparison {
    return {
      kind: 'comparison',
      path: this.attribute.path,
      operator: this.operator,
      operands: this.encodeOperands(),
    };
  }

  private encodeOperands(): AttributeValue[] {
    const codec = this.attribute.codec;
    switch (this.operator) {
      case Operator.EXISTS:
      case Operator.NOT_EXISTS:
        return [];
      case Operator.IN: {
        const values = this.operands[0];
        return Array.isArray(values) ? values.map((value) => this.encodeOperand(value, codec)) : [];
      }
      case Operator.BEGINS_WITH: {
        const prefix = this.operands[0];
        if (typeof prefix !== 'string' || prefix.length === 0) {
          throw new EncodingError(`begins with on "${this.attribute.name}" requires a non-empty string prefix`);
        }
        return [prefix];
      }
      case Operator.CONTAINS:
        return [this.encodeOperand(this.operands[0], codec.element ?? codec)];
      default:
        return this.operands.map((value) => this.encodeOperand(value, codec));
    }
  }

  private encodeOperand(value: unknown, codec: Codec<unknown>): AttributeValue {
    const encoded = isEmpty(value) ? undefined : codec.encode(value);
    if (encoded === undefined) {
      throw new EncodingError(`Cannot compare "${this.attribute.name}" against an empty value`, {
        attribute: this.attribute.name,
      });
    }
    return encoded;
  }
}

// ============================================================================
// Junctions
// ============================================================================

/**
 * Conjunction of conditions. Repeated `and` keeps a single flat node.
 *
 * Conditions are immutable: `a.and(b)` returns a new node holding the
 * children of both sides, never `a` itself, so `a` can be reused.
 */
export class AndCondition {
  readonly kind = 'and' as const;
  readonly children: readonly Condition[];

  constructor(children: readonly Condition[]) {
    children.forEach(assertCondition);
    this.children = Object.freeze([...children]);
  }

  and(other: Condition): AndCondition {
    return joinAnd(this, other);
  }

  or(other: Condition): OrCondition {
    return joinOr(this, other);
  }

  toKeyPredicate(): PredicateJunction {
    return { kind: 'and', children: this.children.map((child) => child.toKeyPredicate()) };
  }

  toFilterPredicate(): PredicateJunction {
    return { kind: 'and', children: this.children.map((child) => child.toFilterPredicate()) };
  }

  describe(): string {
    return this.children.map((child) => `(${child.describe()})`).join(' & ');
  }

  toString(): string {
    return this.describe();
  }
}

/**
 * Disjunction of conditions. Repeated `or` keeps a single flat node.
 * Like {@link AndCondition}, `a.or(b)` returns a new node and leaves `a` as it was.
 */
export class OrCondition {
  readonly kind = 'or' as const;
  readonly children: readonly Condition[];

  constructor(children: readonly Condition[]) {
    children.forEach(assertCondition);
    this.children = Object.freeze([...children]);
  }

  and(other: Condition): AndCondition {
    return joinAnd(this, other);
  }

  or(other: Condition): OrCondition {
    return joinOr(this, other);
  }

  toKeyPredicate(): PredicateJunction {
    return { kind: 'or', children: this.children.map((child) => child.toKeyPredicate()) };
  }

  toFilterPredicate(): PredicateJunction {
    return { kind: 'or', children: this.children.map((child) => child.toFilterPredicate()) };
  }

  describe(): string {
    return this.children.map((child) => `(${child.describe()})`).join(' | ');
  }

  toString(): string {
    return this.describe();
  }
}
