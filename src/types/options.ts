/**
 * Operation option types.
 */

import type { Condition } from '../conditions/condition.js';

// ============================================================================
// Read Operation Options
// ============================================================================

/**
 * Options for single-item reads.
 */
export interface GetOneOptions {
  /** Whether to use strongly consistent reads (defaults to the table setting) */
  consistentRead?: boolean;
}

/**
 * Options for multi-item reads (batch get, query, scan).
 */
export interface GetManyOptions {
  /** Maximum number of records to produce */
  limit?: number;
  /** Sort query results by descending range key */
  descending?: boolean;
  /** Whether to use strongly consistent reads (defaults to the table setting) */
  consistentRead?: boolean;
}

// ============================================================================
// Write Operation Options
// ============================================================================

/**
 * Overwrite policy for saves.
 *
 * - `true`: replace any existing item unconditionally
 * - `false`: fail if an item with the same primary key exists
 * - Condition: replace only if the existing item satisfies the condition
 */
export type OverwritePolicy = boolean | Condition;

/**
 * Options for save operations.
 */
export interface SaveOptions {
  /** Overwrite policy (default `true`) */
  overwrite?: OverwritePolicy;
}
