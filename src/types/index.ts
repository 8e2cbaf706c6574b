/**
 * Core types.
 */

export type {
  AttributeValue,
  AttributeValueSet,
  AttributeValueArray,
  AttributeValueMap,
  PrimitiveKind,
  KeyValues,
} from './key.js';
export { KEY_PRIMITIVE_KINDS, keyFingerprint, uniqueKeys } from './key.js';

export type { Item, DocumentRecord } from './item.js';

export { BatchResult } from './results.js';

export type { GetOneOptions, GetManyOptions, OverwritePolicy, SaveOptions } from './options.js';
