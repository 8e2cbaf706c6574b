/**
 * Key classifier.
 *
 * Splits a condition into the comparisons that bind primary key attributes and
 * the remainder that can only be evaluated as a filter.
 */

import { AndCondition, type Comparison, type Condition, Operator } from '../conditions/condition.js';
import { ExpressionError } from '../error/categories.js';
import { type KeySpec, isKeyAttribute, keyAttributes } from '../schema/schema.js';

/**
 * Which key attributes must be bound with EQ.
 *
 * - `NONE`: any operator is accepted on both keys
 * - `HASH_ONLY`: the hash key must use EQ
 * - `RANGE_ONLY`: the range key must use EQ
 * - `BOTH`: both keys must use EQ
 */
export type KeyStrictness = 'NONE' | 'HASH_ONLY' | 'RANGE_ONLY' | 'BOTH';

function isKeyComparison(keySpec: KeySpec, condition: Condition): condition is Comparison {
  return condition.kind === 'comparison' && !condition.attribute.isNested && isKeyAttribute(keySpec, condition.attribute);
}

/**
 * Comparisons eligible to bind a key: the condition itself, or the direct
 * comparison children of a top-level AND. Nothing under an OR is eligible.
 */
function eligibleComparisons(condition: Condition): Condition[] {
  switch (condition.kind) {
    case 'comparison':
      return [condition];
    case 'and':
      return [...condition.children];
    case 'or':
      return [];
  }
}

function coveredBy(strictness: KeyStrictness, keySpec: KeySpec): string[] {
  switch (strictness) {
    case 'NONE':
      return [];
    case 'HASH_ONLY':
      return [keySpec.hash.name];
    case 'RANGE_ONLY':
      return keySpec.range === undefined ? [] : [keySpec.range.name];
    case 'BOTH':
      return keyAttributes(keySpec).map((key) => key.name);
  }
}

/**
 * Extracts the key-bearing comparisons of a condition.
 *
 * @param condition - Condition to classify (null yields null)
 * @param keySpec - Primary key definition
 * @param strictness - Key attributes that must be bound with EQ
 * @param allRequired - Require a comparison on every key attribute
 * @returns Key comparisons in condition order, or null if there are none
 * @throws {ExpressionError} If a key attribute is repeated, a covered key does
 * not use EQ, a required key is missing, or the range key appears without the
 * hash key
 *
 * @example
 * ```typescript
 * classifyKey(userId.eq('u1').and(email.eq('e1')), contacts.keySpec, 'BOTH', true);
 * // [userId EQ 'u1', email EQ 'e1']
 * ```
 */
export function classifyKey(
  condition: Condition | null,
  keySpec: KeySpec,
  strictness: KeyStrictness = 'NONE',
  allRequired: boolean = false
): Comparison[] | null {
  if (condition === null) {
    return null;
  }

  const comparisons = eligibleComparisons(condition).filter((child): child is Comparison =>
    isKeyComparison(keySpec, child)
  );
  const expression = condition.describe();

  const seen = new Set<string>();
  for (const comparison of comparisons) {
    if (seen.has(comparison.attribute.name)) {
      throw new ExpressionError('Cannot repeat keys in the same expression', expression);
    }
    seen.add(comparison.attribute.name);
  }

  const covered = coveredBy(strictness, keySpec);
  for (const comparison of comparisons) {
    if (covered.includes(comparison.attribute.name) && comparison.operator !== Operator.EQ) {
      const role = comparison.attribute.name === keySpec.hash.name ? 'hash' : 'range';
      throw new ExpressionError(
        `An equality expression was required for the ${role} key "${comparison.attribute.name}"`,
        expression
      );
    }
  }

  if (allRequired && comparisons.length !== keyAttributes(keySpec).length) {
    throw new ExpressionError(
      keySpec.range === undefined
        ? 'A condition on the hash key attribute must be specified'
        : 'Conditions on both hash and range key must be specified joined with an AND',
      expression
    );
  }

  if (comparisons.length === 0) {
    return null;
  }

  if (!seen.has(keySpec.hash.name)) {
    throw new ExpressionError(
      `The range key "${keySpec.range?.name ?? ''}" cannot be used without the hash key "${keySpec.hash.name}"`,
      expression
    );
  }

  return comparisons;
}

/**
 * The part of a condition that is not a key comparison, for use as a filter.
 *
 * A top-level OR is kept whole; key comparisons inside it are not removable.
 */
export function filterRemainder(condition: Condition | null, keySpec: KeySpec): Condition | null {
  if (condition === null) {
    return null;
  }

  switch (condition.kind) {
    case 'comparison':
      return isKeyComparison(keySpec, condition) ? null : condition;
    case 'or':
      return condition;
    case 'and': {
      const remaining = condition.children.filter((child) => !isKeyComparison(keySpec, child));
      if (remaining.length === 0) {
        return null;
      }
      return remaining.length === 1 ? remaining[0] : new AndCondition(remaining);
    }
  }
}
