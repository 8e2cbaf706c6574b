/**
 * Attribute factories, one per codec.
 *
 * @example
 * ```typescript
 * const userId = stringAttribute('user_id', { hashKey: true });
 * const createdAt = datetimeAttribute('created_at', { rangeKey: true });
 * const tags = listAttribute('tags', stringCodec());
 * ```
 */

import type { AttributeValueMap } from '../types/key.js';
import { Attribute, type AttributeOptions } from './attribute.js';
import {
  type Codec,
  binaryCodec,
  booleanCodec,
  datetimeCodec,
  listCodec,
  mapCodec,
  numberCodec,
  numberSetCodec,
  stringCodec,
  stringSetCodec,
} from './codecs.js';

export function stringAttribute(name: string, options?: AttributeOptions<string>): Attribute<string> {
  return new Attribute(name, stringCodec(), options);
}

export function numberAttribute(name: string, options?: AttributeOptions<number>): Attribute<number> {
  return new Attribute(name, numberCodec(), options);
}

export function booleanAttribute(name: string, options?: AttributeOptions<boolean>): Attribute<boolean> {
  return new Attribute(name, booleanCodec(), options);
}

export function binaryAttribute(name: string, options?: AttributeOptions<Uint8Array>): Attribute<Uint8Array> {
  return new Attribute(name, binaryCodec(), options);
}

export function datetimeAttribute(name: string, options?: AttributeOptions<Date>): Attribute<Date> {
  return new Attribute(name, datetimeCodec(), options);
}

export function stringSetAttribute(
  name: string,
  options?: AttributeOptions<Set<string>>
): Attribute<Set<string>> {
  return new Attribute(name, stringSetCodec(), options);
}

export function numberSetAttribute(
  name: string,
  options?: AttributeOptions<Set<number>>
): Attribute<Set<number>> {
  return new Attribute(name, numberSetCodec(), options);
}

export function listAttribute<E>(name: string, element: Codec<E>, options?: AttributeOptions<E[]>): Attribute<E[]> {
  return new Attribute(name, listCodec(element), options);
}

export function mapAttribute(
  name: string,
  options?: AttributeOptions<AttributeValueMap>
): Attribute<AttributeValueMap> {
  return new Attribute(name, mapCodec(), options);
}
