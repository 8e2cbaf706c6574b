/**
 * BatchGetItem round trip.
 *
 * A single request only; the retry policy for unprocessed keys belongs to the
 * result iterator that drives these rounds.
 */

import { BatchGetCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { Item } from '../types/item.js';
import type { KeyValues } from '../types/key.js';
import { MAX_BATCH_GET_KEYS } from './chunker.js';

export interface BatchGetRound {
  items: Item[];
  unprocessedKeys: KeyValues[];
}

/**
 * Fetches up to 100 keys in one request.
 *
 * @example
 * ```typescript
 * const { items, unprocessedKeys } = await batchGetRound(
 *   docClient,
 *   'contacts',
 *   [{ user_id: 'u1', email: 'e1' }, { user_id: 'u2', email: 'e2' }],
 *   true
 * );
 * ```
 */
export async function batchGetRound(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  keys: readonly KeyValues[],
  consistentRead: boolean
): Promise<BatchGetRound> {
  if (keys.length === 0) {
    return { items: [], unprocessedKeys: [] };
  }
  if (keys.length > MAX_BATCH_GET_KEYS) {
    throw new RangeError(`Cannot batch get more than ${MAX_BATCH_GET_KEYS} keys, got ${keys.length}`);
  }

  const response = await docClient.send(
    new BatchGetCommand({
      RequestItems: {
        [tableName]: {
          Keys: [...keys],
          ConsistentRead: consistentRead,
        },
      },
    })
  );

  const items: Item[] = response.Responses?.[tableName] ?? [];
  const unprocessedKeys: KeyValues[] = response.UnprocessedKeys?.[tableName]?.Keys ?? [];
  return { items, unprocessedKeys };
}
