/**
 * Error mapping for failures surfaced by the transport.
 */

import { DynaQueryError } from './error.js';
import { ConditionalCheckFailedError } from './categories.js';

/**
 * Error codes the AWS SDK uses for a failed write guard
 */
const CONDITIONAL_CHECK_CODES = new Set(['ConditionalCheckFailedException', 'ConditionalCheckFailed']);

/**
 * Extracts the error code from an SDK error, falling back to its name
 */
function errorCode(error: Error): string {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error.name;
}

/**
 * Returns true when the error signals an unmet write guard.
 */
export function isConditionalCheckFailure(error: unknown): boolean {
  if (error instanceof ConditionalCheckFailedError) {
    return true;
  }
  return error instanceof Error && CONDITIONAL_CHECK_CODES.has(errorCode(error));
}

/**
 * Maps a transport failure to the error callers should see.
 *
 * Only a failed guard is reclassified, as ConditionalCheckFailedError;
 * every other error is returned unchanged so that it propagates as-is.
 */
export function mapTransportError(error: unknown): unknown {
  if (error instanceof DynaQueryError) {
    return error;
  }

  if (error instanceof Error && isConditionalCheckFailure(error)) {
    return new ConditionalCheckFailedError(error.message, error);
  }

  return error;
}
