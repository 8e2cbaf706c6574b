/**
 * Batch mode: point lookups through batch get rounds.
 */

import { MAX_BATCH_GET_KEYS, backoffDelay, sleep } from '../batch/chunker.js';
import type { Logger } from '../observability/logging.js';
import type { Transport } from '../transport/transport.js';
import type { KeyValues } from '../types/key.js';
import type { ItemSource } from './result-iterator.js';

export interface BatchSourceOptions {
  transport: Transport;
  tableName: string;
  keys: readonly KeyValues[];
  consistentRead: boolean;
  limit?: number;
  /** Base delay before re-sending unprocessed keys; 0 disables the backoff */
  backoffBaseMs: number;
  logger: Logger;
}

/**
 * Item source that fetches keys in chunks of at most 100.
 *
 * Unprocessed keys go back to the front of the remaining keys. A round is
 * empty when it returns no items yet leaves keys unprocessed; an empty round
 * is only retried if the round before it was not empty. After two empty rounds
 * in a row the source stops and records every remaining key as unresolved.
 * The backoff grows only across rounds that return nothing.
 */
export function batchSource(options: BatchSourceOptions): ItemSource {
  const { transport, tableName, consistentRead, limit, backoffBaseMs, logger } = options;

  return async function* (state) {
    let remaining = [...options.keys];
    let previousRoundEmpty = false;
    let retry = 0;
    let found = 0;

    while (remaining.length > 0) {
      const keys = remaining.slice(0, MAX_BATCH_GET_KEYS);
      const rest = remaining.slice(MAX_BATCH_GET_KEYS);

      const { items, unprocessedKeys } = await transport.batchGet({ tableName, keys, consistentRead });

      for (const item of items) {
        yield item;
        found++;
        if (limit !== undefined && found >= limit) {
          return;
        }
      }

      remaining = [...unprocessedKeys, ...rest];
      if (unprocessedKeys.length === 0) {
        previousRoundEmpty = false;
        retry = 0;
        continue;
      }

      const roundEmpty = items.length === 0;
      if (roundEmpty && previousRoundEmpty) {
        state.unresolvedKeys = remaining;
        logger.error('Batch get gave up on unprocessed keys', {
          tableName,
          unresolved: remaining.length,
        });
        return;
      }
      previousRoundEmpty = roundEmpty;
      if (!roundEmpty) {
        retry = 0;
      }

      const delay = backoffDelay(backoffBaseMs, retry++);
      logger.warn('Batch get left keys unprocessed', {
        tableName,
        unprocessed: unprocessedKeys.length,
        delayMs: delay,
      });
      await sleep(delay);
    }
  };
}
