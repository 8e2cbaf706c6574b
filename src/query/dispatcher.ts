/**
 * Query dispatcher.
 *
 * Chooses the cheapest store operation that satisfies a lookup strategy and
 * builds its native predicates. Every classification and encoding error is
 * raised here, before anything reaches the transport.
 */

import type { Comparison, Condition } from '../conditions/condition.js';
import type { Predicate } from '../conditions/predicate.js';
import { MultipleKeyLookupError, ValidationError } from '../error/categories.js';
import type { Schema } from '../schema/schema.js';
import { type KeyValues, uniqueKeys } from '../types/key.js';
import { classifyKey, filterRemainder } from './classifier.js';
import { type ExactKey, type LookupStrategy, resolveExact } from './strategy.js';

export interface GetPlan {
  readonly operation: 'Get';
  readonly key: KeyValues;
}

export interface BatchGetPlan {
  readonly operation: 'BatchGet';
  readonly keys: readonly KeyValues[];
}

export interface QueryPlan {
  readonly operation: 'Query';
  readonly keyCondition: Predicate;
  readonly filter: Predicate | null;
}

export interface ScanPlan {
  readonly operation: 'Scan';
  readonly filter: Predicate | null;
}

export type DispatchPlan = GetPlan | BatchGetPlan | QueryPlan | ScanPlan;

function scan(condition: Condition): ScanPlan {
  return { operation: 'Scan', filter: condition.toFilterPredicate() };
}

function keyCondition(comparisons: readonly Comparison[]): Predicate {
  const predicates = comparisons.map((comparison) => comparison.toKeyPredicate());
  const [first] = predicates;
  return predicates.length === 1 ? first : { kind: 'and', children: predicates };
}

/**
 * Plans a multi-item lookup for a condition.
 */
function planCondition(condition: Condition, schema: Schema<object>): DispatchPlan {
  const keySpec = schema.keySpec;
  const comparisons = classifyKey(condition, keySpec);
  if (comparisons === null) {
    return scan(condition);
  }

  let keyPredicate: Predicate;
  try {
    keyPredicate = keyCondition(comparisons);
  } catch (error) {
    if (!(error instanceof MultipleKeyLookupError)) {
      throw error;
    }
    // IN has no key-condition form: batch get when it names whole keys, scan otherwise
    const [hashIn] = comparisons;
    if (
      keySpec.range === undefined &&
      condition.kind === 'comparison' &&
      hashIn.attribute.name === keySpec.hash.name
    ) {
      const name = keySpec.hash.name;
      const keys = hashIn.toFilterPredicate().operands.map((value): KeyValues => ({ [name]: value }));
      return { operation: 'BatchGet', keys: uniqueKeys(keys) };
    }
    return scan(condition);
  }

  // a query needs the hash key bound with EQ
  classifyKey(condition, keySpec, 'HASH_ONLY');

  const remainder = filterRemainder(condition, keySpec);
  return {
    operation: 'Query',
    keyCondition: keyPredicate,
    filter: remainder === null ? null : remainder.toFilterPredicate(),
  };
}

/**
 * Plans a multi-item lookup.
 *
 * | Strategy | Operation |
 * |---|---|
 * | points | BatchGet |
 * | single point | Get |
 * | condition without key comparisons | Scan, whole condition as filter |
 * | IN on the hash key of a hash-only table | BatchGet over the IN values |
 * | other condition using IN on a key | Scan, whole condition as filter |
 * | hash key EQ, optional range comparison | Query, non-key remainder as filter |
 *
 * @throws {ExpressionError} If the condition misuses key attributes
 * @throws {ValidationError} If a point cannot be resolved or carries a non-key condition
 * @throws {EncodingError} If an operand cannot be encoded
 */
export function planLookup(strategy: LookupStrategy, schema: Schema<object>): DispatchPlan {
  switch (strategy.kind) {
    case 'points': {
      const keys = strategy.items.map((item) => {
        const exact = resolveExact(item, schema);
        if (exact.remainder !== null) {
          throw new ValidationError(
            `A lookup cannot carry a non-key condition: ${exact.remainder.describe()}`
          );
        }
        return exact.key;
      });
      return { operation: 'BatchGet', keys: uniqueKeys(keys) };
    }
    case 'hashKey':
    case 'compositeKey':
    case 'record':
      return { operation: 'Get', key: resolveExact(strategy, schema).key };
    case 'comparison':
    case 'and':
    case 'or':
      return planCondition(strategy, schema);
  }
}

/**
 * Plans a single-item operation: the strategy must resolve to one complete
 * primary key. The non-key part of a condition is returned as `remainder`.
 */
export function planSingle(strategy: LookupStrategy, schema: Schema<object>): GetPlan & ExactKey {
  const exact = resolveExact(strategy, schema);
  return { operation: 'Get', key: exact.key, remainder: exact.remainder };
}
