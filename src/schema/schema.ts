/**
 * Table schema.
 *
 * Binds a set of top-level attributes to a table, validates the primary key
 * definition and converts records to and from stored items.
 */

import type { Attribute } from '../attributes/attribute.js';
import { SchemaError, ValidationError } from '../error/categories.js';
import type { DocumentRecord, Item } from '../types/item.js';
import { KEY_PRIMITIVE_KINDS, type KeyValues } from '../types/key.js';

/**
 * Primary key definition: a hash key and an optional range key.
 */
export interface KeySpec {
  readonly hash: Attribute<unknown>;
  readonly range?: Attribute<unknown>;
}

/**
 * Key attributes of a key spec, hash first.
 */
export function keyAttributes(keySpec: KeySpec): Attribute<unknown>[] {
  return keySpec.range === undefined ? [keySpec.hash] : [keySpec.hash, keySpec.range];
}

/**
 * Returns true if the attribute is one of the key spec's key attributes.
 */
export function isKeyAttribute(keySpec: KeySpec, attribute: Attribute<unknown>): boolean {
  return keyAttributes(keySpec).some((key) => key.name === attribute.name);
}

function fieldsOf(record: object): Map<string, unknown> {
  return new Map(Object.entries(record));
}

/**
 * Schema of a table holding records of type T.
 *
 * @example
 * ```typescript
 * interface Contact {
 *   user_id: string;
 *   email: string;
 *   name?: string;
 * }
 *
 * const userId = stringAttribute('user_id', { hashKey: true });
 * const email = stringAttribute('email', { rangeKey: true });
 * const name = stringAttribute('name');
 *
 * const contacts = new Schema<Contact>('contacts', [userId, email, name]);
 * ```
 */
export class Schema<T extends object = DocumentRecord> {
  readonly tableName: string;
  readonly keySpec: KeySpec;
  private readonly attributesByName: ReadonlyMap<string, Attribute<unknown>>;

  /**
   * @throws {SchemaError} If the table name is empty, an attribute is nested or
   * repeated, the hash key is missing or repeated, the range key is repeated,
   * or a key attribute is not a string, number or binary attribute
   */
  constructor(tableName: string, attributes: readonly Attribute<unknown>[]) {
    if (tableName.trim() === '') {
      throw new SchemaError('Table name cannot be empty');
    }
    this.tableName = tableName;

    const byName = new Map<string, Attribute<unknown>>();
    for (const attribute of attributes) {
      if (attribute.isNested) {
        throw new SchemaError(`Schema attributes must be top-level, got "${attribute.name}"`);
      }
      if (byName.has(attribute.name)) {
        throw new SchemaError(`Attribute "${attribute.name}" is defined more than once`);
      }
      byName.set(attribute.name, attribute);
    }
    this.attributesByName = byName;

    const hashKeys = attributes.filter((attribute) => attribute.isHashKey);
    const rangeKeys = attributes.filter((attribute) => attribute.isRangeKey);
    if (hashKeys.length !== 1) {
      throw new SchemaError(`Table "${tableName}" must define exactly one hash key, found ${hashKeys.length}`);
    }
    if (rangeKeys.length > 1) {
      throw new SchemaError(`Table "${tableName}" can define at most one range key, found ${rangeKeys.length}`);
    }

    const [hash] = hashKeys;
    const [range] = rangeKeys;
    this.keySpec = range === undefined ? { hash } : { hash, range };

    for (const key of keyAttributes(this.keySpec)) {
      if (!KEY_PRIMITIVE_KINDS.includes(key.primitiveKind)) {
        throw new SchemaError(`Invalid key type ${key.primitiveKind} for key attribute "${key.name}"`, {
          attribute: key.name,
        });
      }
    }
  }

  get attributes(): Attribute<unknown>[] {
    return [...this.attributesByName.values()];
  }

  get keyNames(): string[] {
    return keyAttributes(this.keySpec).map((key) => key.name);
  }

  /**
   * Looks up an attribute by name.
   *
   * @throws {SchemaError} If the schema has no such attribute
   */
  attribute(name: string): Attribute<unknown> {
    const attribute = this.attributesByName.get(name);
    if (attribute === undefined) {
      throw new SchemaError(`Table "${this.tableName}" has no attribute "${name}"`);
    }
    return attribute;
  }

  hasAttribute(name: string): boolean {
    return this.attributesByName.has(name);
  }

  /**
   * Encodes a record into a stored item.
   *
   * Missing values take the attribute default; empty values are dropped.
   *
   * @throws {ValidationError} If the record has an unknown field or a required
   * attribute (including every key attribute) is empty
   * @throws {EncodingError} If a value cannot be encoded
   */
  encodeRecord(record: T | DocumentRecord): Item {
    const fields = fieldsOf(record);
    for (const name of fields.keys()) {
      if (!this.attributesByName.has(name)) {
        throw new ValidationError(`Unknown attribute "${name}" for table "${this.tableName}"`, {
          attribute: name,
        });
      }
    }

    const item: Item = {};
    for (const attribute of this.attributesByName.values()) {
      const value = fields.has(attribute.name) ? fields.get(attribute.name) : attribute.default();
      const encoded = attribute.encode(value);
      if (encoded !== undefined) {
        item[attribute.name] = encoded;
      }
    }
    return item;
  }

  /**
   * Decodes a stored item into a record.
   *
   * Attributes the schema does not know are passed through unchanged.
   */
  decodeRecord(item: Item): T {
    const record: DocumentRecord = {};
    for (const [name, primitive] of Object.entries(item)) {
      const attribute = this.attributesByName.get(name);
      record[name] = attribute === undefined ? primitive : attribute.decode(primitive);
    }
    return record as T;
  }

  /**
   * Encodes the primary key of a record.
   *
   * @throws {ValidationError} If a key attribute is missing or empty
   */
  keyValues(record: T | DocumentRecord): KeyValues {
    const fields = fieldsOf(record);
    const key: KeyValues = {};
    for (const attribute of keyAttributes(this.keySpec)) {
      const encoded = attribute.encode(fields.get(attribute.name));
      if (encoded === undefined) {
        throw new ValidationError(`Key attribute "${attribute.name}" must be set`, { attribute: attribute.name });
      }
      key[attribute.name] = encoded;
    }
    return key;
  }

  /**
   * Extracts the (already encoded) primary key of a stored item.
   *
   * @throws {ValidationError} If a key attribute is missing from the item
   */
  keyOfItem(item: Item): KeyValues {
    const key: KeyValues = {};
    for (const name of this.keyNames) {
      if (!(name in item)) {
        throw new ValidationError(`Stored item is missing key attribute "${name}"`, { attribute: name });
      }
      key[name] = item[name];
    }
    return key;
  }
}
