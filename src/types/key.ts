/**
 * Attribute value and key types.
 *
 * Defines the store primitives exchanged with the document client and the
 * key structures built from them.
 */

// ============================================================================
// Attribute Value Types
// ============================================================================

/**
 * Store attribute value - any primitive the document client can marshal.
 *
 * Represents any valid attribute value including:
 * - Primitive types: string, number, boolean, null
 * - Binary data: Uint8Array
 * - Sets: Set<string>, Set<number>
 * - Complex types: arrays and nested objects
 */
export type AttributeValue =
  | string
  | number
  | Uint8Array
  | boolean
  | null
  | AttributeValueSet
  | AttributeValueArray
  | AttributeValueMap;

/**
 * Set attribute value types.
 */
export type AttributeValueSet = Set<string> | Set<number>;

/**
 * Array attribute value type.
 */
// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface AttributeValueArray extends Array<AttributeValue> {}

/**
 * Map attribute value type (nested object).
 */
export interface AttributeValueMap {
  [key: string]: AttributeValue;
}

/**
 * Primitive family of an attribute, using the store's type descriptors.
 */
export type PrimitiveKind = 'S' | 'N' | 'B' | 'BOOL' | 'SS' | 'NS' | 'L' | 'M';

/**
 * Primitive kinds a primary key attribute may use.
 */
export const KEY_PRIMITIVE_KINDS: readonly PrimitiveKind[] = ['S', 'N', 'B'];

// ============================================================================
// Key Types
// ============================================================================

/**
 * Encoded primary key, keyed by attribute name.
 *
 * @example
 * ```typescript
 * const key: KeyValues = { user_id: 'u1', email: 'e1@example.com' };
 * ```
 */
export type KeyValues = Record<string, AttributeValue>;

/**
 * Serializes a key to a stable string, for use as a map key.
 *
 * Attribute names are sorted so that two maps holding the same key compare
 * equal regardless of insertion order.
 */
export function keyFingerprint(key: KeyValues): string {
  const names = Object.keys(key).sort();
  return JSON.stringify(names.map((name) => [name, fingerprintValue(key[name])]));
}

/**
 * Drops repeated keys, keeping the first occurrence. Batch requests reject
 * a key that appears twice.
 */
export function uniqueKeys(keys: readonly KeyValues[]): KeyValues[] {
  const seen = new Set<string>();
  return keys.filter((key) => {
    const fingerprint = keyFingerprint(key);
    if (seen.has(fingerprint)) {
      return false;
    }
    seen.add(fingerprint);
    return true;
  });
}

function fingerprintValue(value: AttributeValue): unknown {
  if (value instanceof Uint8Array) {
    return { B: Array.from(value) };
  }
  return value;
}
