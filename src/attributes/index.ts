/**
 * Attributes and codecs.
 */

export { Attribute, type AttributeOptions, type ElementOf } from './attribute.js';

export {
  type Codec,
  type CodecValue,
  isEmpty,
  stringCodec,
  numberCodec,
  booleanCodec,
  binaryCodec,
  datetimeCodec,
  stringSetCodec,
  numberSetCodec,
  listCodec,
  mapCodec,
} from './codecs.js';

export {
  stringAttribute,
  numberAttribute,
  booleanAttribute,
  binaryAttribute,
  datetimeAttribute,
  stringSetAttribute,
  numberSetAttribute,
  listAttribute,
  mapAttribute,
} from './factories.js';
