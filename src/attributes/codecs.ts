/**
 * Attribute codecs.
 *
 * A codec converts between the logical value an application works with and the
 * primitive the document client stores. There is one codec per primitive
 * family; attributes are built by composing a name with a codec.
 */

import { EncodingError } from '../error/categories.js';
import type { AttributeValue, AttributeValueMap, PrimitiveKind } from '../types/key.js';

/**
 * Conversion between logical values of type T and store primitives.
 */
export interface Codec<T> {
  /** Primitive family of encoded values */
  readonly primitiveKind: PrimitiveKind;
  /** Codec of individual elements, for list and set codecs */
  readonly element?: Codec<unknown>;
  /**
   * Converts a logical value to a store primitive.
   *
   * Returns `undefined` for an empty value (nothing to store).
   * @throws {EncodingError} If the value has the wrong type
   */
  encode(value: T): AttributeValue | undefined;
  /**
   * Converts a store primitive back to a logical value.
   * @throws {EncodingError} If the primitive has the wrong type
   */
  decode(primitive: AttributeValue): T;
}

/**
 * Extracts the logical value type of a codec.
 */
export type CodecValue<C> = C extends Codec<infer T> ? T : never;

/**
 * Determines if a value is empty.
 *
 * A value is considered empty if it is `null`, `undefined` or the empty string.
 */
export function isEmpty(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || value === '';
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) {
    return 'binary';
  }
  if (value instanceof Set) {
    return 'set';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  return value === null ? 'null' : typeof value;
}

function mismatch(kind: PrimitiveKind, value: unknown): EncodingError {
  return new EncodingError(`Cannot convert ${describeValue(value)} value to ${kind}`, { primitiveKind: kind });
}

function isPlainMap(value: unknown): value is AttributeValueMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Set) &&
    !(value instanceof Uint8Array) &&
    !(value instanceof Date)
  );
}

// ============================================================================
// Scalar Codecs
// ============================================================================

/**
 * String codec (S). The empty string is treated as empty.
 */
export function stringCodec(): Codec<string> {
  return {
    primitiveKind: 'S',
    encode(value: string): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (typeof value !== 'string') {
        throw mismatch('S', value);
      }
      return value;
    },
    decode(primitive: AttributeValue): string {
      if (typeof primitive !== 'string') {
        throw mismatch('S', primitive);
      }
      return primitive;
    },
  };
}

/**
 * Number codec (N). Only finite numbers are accepted.
 */
export function numberCodec(): Codec<number> {
  return {
    primitiveKind: 'N',
    encode(value: number): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw mismatch('N', value);
      }
      return value;
    },
    decode(primitive: AttributeValue): number {
      if (typeof primitive === 'number') {
        return primitive;
      }
      // wrapped numbers arrive as numeric strings
      if (typeof primitive === 'string' && primitive.trim() !== '' && Number.isFinite(Number(primitive))) {
        return Number(primitive);
      }
      throw mismatch('N', primitive);
    },
  };
}

/**
 * Boolean codec (BOOL).
 */
export function booleanCodec(): Codec<boolean> {
  return {
    primitiveKind: 'BOOL',
    encode(value: boolean): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (typeof value !== 'boolean') {
        throw mismatch('BOOL', value);
      }
      return value;
    },
    decode(primitive: AttributeValue): boolean {
      if (typeof primitive !== 'boolean') {
        throw mismatch('BOOL', primitive);
      }
      return primitive;
    },
  };
}

/**
 * Binary codec (B).
 */
export function binaryCodec(): Codec<Uint8Array> {
  return {
    primitiveKind: 'B',
    encode(value: Uint8Array): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (!(value instanceof Uint8Array)) {
        throw mismatch('B', value);
      }
      return value;
    },
    decode(primitive: AttributeValue): Uint8Array {
      if (!(primitive instanceof Uint8Array)) {
        throw mismatch('B', primitive);
      }
      return primitive;
    },
  };
}

/**
 * Date-time codec, stored as an ISO-8601 string (S).
 */
export function datetimeCodec(): Codec<Date> {
  return {
    primitiveKind: 'S',
    encode(value: Date): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        throw mismatch('S', value);
      }
      return value.toISOString();
    },
    decode(primitive: AttributeValue): Date {
      if (typeof primitive !== 'string') {
        throw mismatch('S', primitive);
      }
      const date = new Date(primitive);
      if (Number.isNaN(date.getTime())) {
        throw new EncodingError(`Invalid date-time value: ${primitive}`);
      }
      return date;
    },
  };
}

// ============================================================================
// Set Codecs
// ============================================================================

/**
 * String set codec (SS). An empty set is treated as empty; the store rejects
 * empty sets.
 */
export function stringSetCodec(): Codec<Set<string>> {
  const element = stringCodec();
  return {
    primitiveKind: 'SS',
    element,
    encode(value: Set<string>): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (!(value instanceof Set)) {
        throw mismatch('SS', value);
      }
      if (value.size === 0) {
        return undefined;
      }
      const encoded = new Set<string>();
      for (const member of value) {
        if (typeof member !== 'string') {
          throw mismatch('S', member);
        }
        encoded.add(member);
      }
      return encoded;
    },
    decode(primitive: AttributeValue): Set<string> {
      if (!(primitive instanceof Set)) {
        throw mismatch('SS', primitive);
      }
      const decoded = new Set<string>();
      for (const member of primitive) {
        decoded.add(element.decode(member));
      }
      return decoded;
    },
  };
}

/**
 * Number set codec (NS).
 */
export function numberSetCodec(): Codec<Set<number>> {
  const element = numberCodec();
  return {
    primitiveKind: 'NS',
    element,
    encode(value: Set<number>): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (!(value instanceof Set)) {
        throw mismatch('NS', value);
      }
      if (value.size === 0) {
        return undefined;
      }
      const encoded = new Set<number>();
      for (const member of value) {
        if (typeof member !== 'number' || !Number.isFinite(member)) {
          throw mismatch('N', member);
        }
        encoded.add(member);
      }
      return encoded;
    },
    decode(primitive: AttributeValue): Set<number> {
      if (!(primitive instanceof Set)) {
        throw mismatch('NS', primitive);
      }
      const decoded = new Set<number>();
      for (const member of primitive) {
        decoded.add(element.decode(member));
      }
      return decoded;
    },
  };
}

// ============================================================================
// Compound Codecs
// ============================================================================

/**
 * List codec (L) whose elements use the given codec.
 *
 * @example
 * ```typescript
 * const tags = listCodec(stringCodec());
 * tags.encode(['a', 'b']); // ['a', 'b']
 * ```
 */
export function listCodec<E>(element: Codec<E>): Codec<E[]> {
  return {
    primitiveKind: 'L',
    element,
    encode(value: E[]): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (!Array.isArray(value)) {
        throw mismatch('L', value);
      }
      return value.map((member) => {
        const encoded = element.encode(member);
        if (encoded === undefined) {
          throw new EncodingError('List elements cannot be empty');
        }
        return encoded;
      });
    },
    decode(primitive: AttributeValue): E[] {
      if (!Array.isArray(primitive)) {
        throw mismatch('L', primitive);
      }
      return primitive.map((member) => element.decode(member));
    },
  };
}

/**
 * Map codec (M). Values are passed through; nested values must already be
 * store primitives.
 */
export function mapCodec(): Codec<AttributeValueMap> {
  return {
    primitiveKind: 'M',
    encode(value: AttributeValueMap): AttributeValue | undefined {
      if (isEmpty(value)) {
        return undefined;
      }
      if (!isPlainMap(value)) {
        throw mismatch('M', value);
      }
      return value;
    },
    decode(primitive: AttributeValue): AttributeValueMap {
      if (!isPlainMap(primitive)) {
        throw mismatch('M', primitive);
      }
      return primitive;
    },
  };
}
