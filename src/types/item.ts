/**
 * Item and record types.
 */

import type { AttributeValue } from './key.js';

/**
 * Stored item - attribute names mapped to encoded store primitives.
 *
 * This is what travels through the transport.
 */
export type Item = Record<string, AttributeValue>;

/**
 * Decoded record - attribute names mapped to logical values.
 *
 * This is what callers read and write.
 */
export type DocumentRecord = Record<string, unknown>;
