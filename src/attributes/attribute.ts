/**
 * Attribute references.
 *
 * An Attribute names a schema field and composes it with a codec. It is the
 * entry point of the condition and update algebra: comparison builders return
 * Condition nodes, mutation builders return Update nodes.
 */

import { SchemaError, ValidationError } from '../error/categories.js';
import { Comparison, Operator } from '../conditions/condition.js';
import type { Update } from '../updates/update.js';
import type { AttributeValue, PrimitiveKind } from '../types/key.js';
import { type Codec, isEmpty } from './codecs.js';

/**
 * Element type of a list or set value.
 */
export type ElementOf<T> = T extends readonly (infer E)[] ? E : T extends Set<infer E> ? E : T;

/**
 * Options for declaring an attribute.
 */
export interface AttributeOptions<T> {
  /** Marks the attribute as the table's hash (partition) key */
  hashKey?: boolean;
  /** Marks the attribute as the table's range (sort) key */
  rangeKey?: boolean;
  /** Rejects empty values. Key attributes are always required */
  required?: boolean;
  /** Produces the value used when a record omits the attribute */
  default?: () => T;
}

/**
 * Reference to a (possibly nested) schema attribute.
 *
 * @example
 * ```typescript
 * const userId = new Attribute('user_id', stringCodec(), { hashKey: true });
 * const visits = new Attribute('visits', numberCodec());
 *
 * const condition = userId.eq('u1').and(visits.gte(10));
 * const updates = [visits.increment()];
 * ```
 */
export class Attribute<T> {
  /** Path segments from the top-level attribute down */
  readonly path: readonly string[];
  readonly codec: Codec<T>;
  readonly isHashKey: boolean;
  readonly isRangeKey: boolean;
  readonly required: boolean;
  private readonly defaultFactory?: () => T;

  constructor(path: string | readonly string[], codec: Codec<T>, options: AttributeOptions<T> = {}) {
    this.path = typeof path === 'string' ? [path] : [...path];
    if (this.path.length === 0 || this.path.some((segment) => segment.length === 0)) {
      throw new SchemaError('Attribute names must be non-empty strings');
    }

    if (options.hashKey && options.rangeKey) {
      throw new SchemaError(`Attribute "${this.name}" cannot be both hash key and range key`);
    }

    this.codec = codec;
    this.isHashKey = options.hashKey ?? false;
    this.isRangeKey = options.rangeKey ?? false;
    this.required = (options.required ?? false) || this.isHashKey || this.isRangeKey;
    this.defaultFactory = options.default;
  }

  /**
   * Dotted attribute name (e.g. `profile.city` for a nested attribute).
   */
  get name(): string {
    return this.path.join('.');
  }

  get primitiveKind(): PrimitiveKind {
    return this.codec.primitiveKind;
  }

  get isNested(): boolean {
    return this.path.length > 1;
  }

  /**
   * References an attribute nested inside this (map) attribute.
   */
  child<C>(name: string, codec: Codec<C>, options: Omit<AttributeOptions<C>, 'hashKey' | 'rangeKey'> = {}): Attribute<C> {
    return new Attribute<C>([...this.path, name], codec, options);
  }

  /**
   * Default value for records that omit this attribute.
   */
  default(): T | undefined {
    return this.defaultFactory?.();
  }

  /**
   * Encodes a logical value, enforcing the required flag.
   *
   * @returns The store primitive, or `undefined` when the value is empty
   * @throws {ValidationError} If the value is empty and the attribute is required
   * @throws {EncodingError} If the codec rejects the value
   */
  encode(value: T | null | undefined): AttributeValue | undefined {
    const encoded = isEmpty(value) ? undefined : this.codec.encode(value);
    if (encoded === undefined && this.required) {
      throw new ValidationError(`Attribute "${this.name}" is required and cannot be empty`, {
        attribute: this.name,
      });
    }
    return encoded;
  }

  decode(primitive: AttributeValue): T {
    return this.codec.decode(primitive);
  }

  toString(): string {
    return this.name;
  }

  // ==========================================================================
  // Conditions
  // ==========================================================================

  eq(value: T): Comparison {
    return new Comparison(this, Operator.EQ, [value]);
  }

  ne(value: T): Comparison {
    return new Comparison(this, Operator.NE, [value]);
  }

  lt(value: T): Comparison {
    return new Comparison(this, Operator.LT, [value]);
  }

  lte(value: T): Comparison {
    return new Comparison(this, Operator.LTE, [value]);
  }

  gt(value: T): Comparison {
    return new Comparison(this, Operator.GT, [value]);
  }

  gte(value: T): Comparison {
    return new Comparison(this, Operator.GTE, [value]);
  }

  /**
   * Attribute equals one of the given values.
   */
  in(values: readonly T[]): Comparison {
    return new Comparison(this, Operator.IN, [values]);
  }

  /**
   * String attribute contains a substring, or list/set attribute contains an element.
   */
  contains(value: ElementOf<T>): Comparison {
    return new Comparison(this, Operator.CONTAINS, [value]);
  }

  beginsWith(prefix: string): Comparison {
    return new Comparison(this, Operator.BEGINS_WITH, [prefix]);
  }

  exists(): Comparison {
    return new Comparison(this, Operator.EXISTS, []);
  }

  notExists(): Comparison {
    return new Comparison(this, Operator.NOT_EXISTS, []);
  }

  /**
   * Attribute is greater than or equal to `low` and less than or equal to `high`.
   */
  between(low: T, high: T): Comparison {
    return new Comparison(this, Operator.BETWEEN, [low, high]);
  }

  // ==========================================================================
  // Updates
  // ==========================================================================

  /**
   * Sets the attribute. Setting an empty value removes it.
   */
  set(value: T | null | undefined): Update {
    return { kind: 'set', attribute: this, value, ifNotExists: false };
  }

  /**
   * Sets the attribute only if the stored item does not have it yet.
   */
  setIfNotExists(value: T | null | undefined): Update {
    return { kind: 'set', attribute: this, value, ifNotExists: true };
  }

  remove(): Update {
    return { kind: 'remove', attribute: this };
  }

  /**
   * Atomically adds `delta` to a numeric attribute.
   */
  add(this: Attribute<number>, delta: number | undefined): Update {
    return { kind: 'add', attribute: this, delta };
  }

  subtract(this: Attribute<number>, delta: number): Update {
    return { kind: 'add', attribute: this, delta: -delta };
  }

  increment(this: Attribute<number>): Update {
    return { kind: 'add', attribute: this, delta: 1 };
  }

  decrement(this: Attribute<number>): Update {
    return { kind: 'add', attribute: this, delta: -1 };
  }

  /**
   * Appends values to the end of a list attribute.
   */
  append<E>(this: Attribute<E[]>, ...values: E[]): Update {
    return { kind: 'listExtend', attribute: this, values, append: true };
  }

  /**
   * Prepends values to the start of a list attribute.
   */
  prepend<E>(this: Attribute<E[]>, ...values: E[]): Update {
    return { kind: 'listExtend', attribute: this, values, append: false };
  }
}
