/**
 * Result types for bulk operations.
 */

/**
 * Outcome of a bulk operation.
 *
 * Accumulates what succeeded and what failed, in input order. The arrays are
 * frozen on construction: a BatchResult handed to a caller never changes.
 *
 * @example
 * ```typescript
 * const result = await contacts.saveMany(records, { overwrite: false });
 * console.log(`${result.successCount} saved, ${result.failCount} already existed`);
 * ```
 */
export class BatchResult<S, F = S> {
  readonly succeeded: readonly S[];
  readonly failed: readonly F[];

  constructor(succeeded: readonly S[] = [], failed: readonly F[] = []) {
    this.succeeded = Object.freeze([...succeeded]);
    this.failed = Object.freeze([...failed]);
  }

  get successCount(): number {
    return this.succeeded.length;
  }

  get failCount(): number {
    return this.failed.length;
  }
}
