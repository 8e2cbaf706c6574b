/**
 * Update AST.
 *
 * Update nodes are produced by the mutation builders on `Attribute` and
 * compiled into a single update expression by `compileUpdates`.
 */

import type { Attribute } from '../attributes/attribute.js';

/**
 * Set an attribute, optionally only when it is not yet present.
 */
export interface SetUpdate {
  readonly kind: 'set';
  readonly attribute: Attribute<unknown>;
  readonly value: unknown;
  readonly ifNotExists: boolean;
}

/**
 * Remove an attribute from the item.
 */
export interface RemoveUpdate {
  readonly kind: 'remove';
  readonly attribute: Attribute<unknown>;
}

/**
 * Atomically add a (possibly negative) delta to a number attribute.
 */
export interface AddUpdate {
  readonly kind: 'add';
  readonly attribute: Attribute<unknown>;
  readonly delta: number | undefined;
}

/**
 * Append or prepend values to a list attribute.
 */
export interface ListExtendUpdate {
  readonly kind: 'listExtend';
  readonly attribute: Attribute<unknown>;
  readonly values: readonly unknown[];
  readonly append: boolean;
}

export type Update = SetUpdate | RemoveUpdate | AddUpdate | ListExtendUpdate;
