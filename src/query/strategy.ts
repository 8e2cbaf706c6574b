/**
 * Lookup strategies.
 *
 * A lookup strategy describes which items a call targets: one point lookup,
 * a list of point lookups, or a condition to search with.
 */

import type { Comparison, Condition } from '../conditions/condition.js';
import { ValidationError } from '../error/categories.js';
import type { Schema } from '../schema/schema.js';
import type { KeyValues } from '../types/key.js';
import { classifyKey, filterRemainder } from './classifier.js';

/**
 * Lookup by hash key value, for tables without a range key.
 */
export interface HashKeyLookup {
  readonly kind: 'hashKey';
  readonly value: unknown;
}

/**
 * Lookup by hash and range key values.
 */
export interface CompositeKeyLookup {
  readonly kind: 'compositeKey';
  readonly hash: unknown;
  readonly range: unknown;
}

/**
 * Lookup by the key fields of a record.
 */
export interface RecordLookup {
  readonly kind: 'record';
  readonly record: object;
}

export type PointLookup = HashKeyLookup | CompositeKeyLookup | RecordLookup;

/**
 * Several items, each a point lookup or an exact-key condition.
 */
export interface PointsLookup {
  readonly kind: 'points';
  readonly items: readonly (PointLookup | Condition)[];
}

export type LookupStrategy = PointLookup | PointsLookup | Condition;

/**
 * A fully resolved primary key plus any non-key part of the strategy.
 */
export interface ExactKey {
  key: KeyValues;
  remainder: Condition | null;
}

export function byHashKey(value: unknown): HashKeyLookup {
  return { kind: 'hashKey', value };
}

export function byKey(hash: unknown, range: unknown): CompositeKeyLookup {
  return { kind: 'compositeKey', hash, range };
}

export function byRecord(record: object): RecordLookup {
  return { kind: 'record', record };
}

export function points(items: readonly (PointLookup | Condition)[]): PointsLookup {
  return { kind: 'points', items: [...items] };
}

/**
 * Points lookup over hash key values.
 *
 * @example
 * ```typescript
 * const users = await table.getMany(keysIn(['u1', 'u2', 'u3'])).toArray();
 * ```
 */
export function keysIn(values: readonly unknown[]): PointsLookup {
  return points(values.map(byHashKey));
}

/**
 * Resolves a point lookup to an encoded primary key.
 *
 * @throws {ValidationError} If the lookup does not match the table's key shape
 * or a key value is empty
 */
export function resolvePoint(point: PointLookup, schema: Schema<object>): KeyValues {
  const { hash, range } = schema.keySpec;

  switch (point.kind) {
    case 'hashKey': {
      if (range !== undefined) {
        throw new ValidationError(
          `Table "${schema.tableName}" has a composite key; a hash key value alone cannot identify an item`
        );
      }
      return schema.keyValues({ [hash.name]: point.value });
    }
    case 'compositeKey': {
      if (range === undefined) {
        throw new ValidationError(`Table "${schema.tableName}" has no range key`);
      }
      return schema.keyValues({ [hash.name]: point.hash, [range.name]: point.range });
    }
    case 'record':
      return schema.keyValues(point.record);
  }
}

function keyFromComparisons(comparisons: readonly Comparison[]): KeyValues {
  const key: KeyValues = {};
  for (const comparison of comparisons) {
    const encoded = comparison.attribute.encode(comparison.operands[0]);
    if (encoded === undefined) {
      throw new ValidationError(`Key attribute "${comparison.attribute.name}" must be set`);
    }
    key[comparison.attribute.name] = encoded;
  }
  return key;
}

/**
 * Resolves a single-item strategy to its primary key.
 *
 * A condition must bind every key attribute with EQ; its non-key part is
 * returned as `remainder`.
 *
 * @throws {ValidationError} For a points strategy or an unresolvable point
 * @throws {ExpressionError} If a condition does not bind the full key with EQ
 */
export function resolveExact(strategy: LookupStrategy, schema: Schema<object>): ExactKey {
  switch (strategy.kind) {
    case 'points':
      throw new ValidationError('A single-item operation cannot take several lookups');
    case 'hashKey':
    case 'compositeKey':
    case 'record':
      return { key: resolvePoint(strategy, schema), remainder: null };
    case 'comparison':
    case 'and':
    case 'or': {
      const comparisons = classifyKey(strategy, schema.keySpec, 'BOTH', true) ?? [];
      return {
        key: keyFromComparisons(comparisons),
        remainder: filterRemainder(strategy, schema.keySpec),
      };
    }
  }
}
