/**
 * Batch limits and chunking.
 */

/**
 * Maximum number of keys in a single batch get request.
 */
export const MAX_BATCH_GET_KEYS = 100;

/**
 * Maximum number of put/delete requests in a single batch write request.
 */
export const MAX_BATCH_WRITE_REQUESTS = 25;

/**
 * Splits a list into consecutive chunks of at most `size` elements.
 *
 * @example
 * ```typescript
 * chunk([1, 2, 3, 4, 5], 2);
 * // [[1, 2], [3, 4], [5]]
 * ```
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Resolves after `ms` milliseconds (immediately for 0).
 */
export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return;
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Upper bound on a single backoff delay.
 */
export const MAX_BACKOFF_MS = 20_000;

/**
 * Exponential backoff delay for a 0-indexed retry attempt, capped at `maxMs`.
 */
export function backoffDelay(baseMs: number, attempt: number, maxMs: number = MAX_BACKOFF_MS): number {
  return Math.min(baseMs * Math.pow(2, attempt), maxMs);
}
