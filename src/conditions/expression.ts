/**
 * Expression rendering.
 *
 * Renders native predicates into the store's condition-expression grammar,
 * substituting every attribute name and value with a placeholder.
 */

import { ExpressionError } from '../error/categories.js';
import type { AttributeValue } from '../types/key.js';
import { Operator, type Predicate, type PredicateComparison } from './predicate.js';

/**
 * Expression attribute maps as the document client takes them.
 */
export interface ExpressionAttributeMaps {
  ExpressionAttributeNames?: Record<string, string>;
  ExpressionAttributeValues?: Record<string, AttributeValue>;
}

/**
 * Placeholder tables shared by every expression of a single request.
 *
 * @example
 * ```typescript
 * const context = new ExpressionContext();
 * const keyCondition = renderPredicate(condition.toKeyPredicate(), context);
 * // keyCondition: '#n0 = :v0'
 * // context.names: { '#n0': 'user_id' }, context.values: { ':v0': 'u1' }
 * ```
 */
export class ExpressionContext {
  readonly names: Record<string, string> = {};
  readonly values: Record<string, AttributeValue> = {};
  private readonly nameIndex = new Map<string, string>();
  private valueCount = 0;

  /**
   * Placeholder for an attribute path, one name placeholder per segment.
   */
  name(path: readonly string[]): string {
    return path.map((segment) => this.segment(segment)).join('.');
  }

  /**
   * Placeholder for an operand. Every call binds a fresh placeholder.
   */
  value(value: AttributeValue): string {
    const placeholder = `:v${this.valueCount++}`;
    this.values[placeholder] = value;
    return placeholder;
  }

  get hasNames(): boolean {
    return this.nameIndex.size > 0;
  }

  get hasValues(): boolean {
    return this.valueCount > 0;
  }

  /**
   * Placeholder maps for a request, merged with any extra entries.
   * Empty maps are left out; the store rejects them.
   */
  attributeMaps(
    extraNames: Record<string, string> = {},
    extraValues: Record<string, AttributeValue> = {}
  ): ExpressionAttributeMaps {
    const names = { ...extraNames, ...this.names };
    const values = { ...extraValues, ...this.values };
    return {
      ExpressionAttributeNames: Object.keys(names).length > 0 ? names : undefined,
      ExpressionAttributeValues: Object.keys(values).length > 0 ? values : undefined,
    };
  }

  private segment(segment: string): string {
    let placeholder = this.nameIndex.get(segment);
    if (placeholder === undefined) {
      placeholder = `#n${this.nameIndex.size}`;
      this.nameIndex.set(segment, placeholder);
      this.names[placeholder] = segment;
    }
    return placeholder;
  }
}

const INFIX: Partial<Record<Operator, string>> = {
  EQ: '=',
  NE: '<>',
  LT: '<',
  LTE: '<=',
  GT: '>',
  GTE: '>=',
};

function renderComparison(predicate: PredicateComparison, context: ExpressionContext): string {
  const name = context.name(predicate.path);
  const [first, second] = predicate.operands;

  const infix = INFIX[predicate.operator];
  if (infix !== undefined) {
    return `${name} ${infix} ${context.value(first)}`;
  }

  switch (predicate.operator) {
    case Operator.IN:
      return `${name} IN (${predicate.operands.map((operand) => context.value(operand)).join(', ')})`;
    case Operator.CONTAINS:
      return `contains(${name}, ${context.value(first)})`;
    case Operator.BEGINS_WITH:
      return `begins_with(${name}, ${context.value(first)})`;
    case Operator.EXISTS:
      return `attribute_exists(${name})`;
    case Operator.NOT_EXISTS:
      return `attribute_not_exists(${name})`;
    case Operator.BETWEEN:
      return `${name} BETWEEN ${context.value(first)} AND ${context.value(second)}`;
    default:
      throw new ExpressionError(`Unsupported operator ${predicate.operator}`);
  }
}

/**
 * Renders a predicate, registering its names and values in `context`.
 *
 * Nested junctions are parenthesized; comparisons never are.
 */
export function renderPredicate(predicate: Predicate, context: ExpressionContext): string {
  if (predicate.kind === 'comparison') {
    return renderComparison(predicate, context);
  }

  const separator = predicate.kind === 'and' ? ' AND ' : ' OR ';
  return predicate.children
    .map((child) => {
      const rendered = renderPredicate(child, context);
      return child.kind === 'comparison' ? rendered : `(${rendered})`;
    })
    .join(separator);
}
