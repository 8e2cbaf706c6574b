/**
 * GetItem operation.
 */

import { GetCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { GetRequest } from '../transport/transport.js';
import type { Item } from '../types/item.js';

/**
 * Retrieves a single item by its full primary key.
 *
 * @returns The item, or undefined if no item has that key
 *
 * @example
 * ```typescript
 * const item = await getItem(docClient, {
 *   tableName: 'contacts',
 *   key: { user_id: 'u1', email: 'e1@example.com' },
 *   consistentRead: true,
 * });
 * ```
 */
export async function getItem(docClient: DynamoDBDocumentClient, request: GetRequest): Promise<Item | undefined> {
  const response = await docClient.send(
    new GetCommand({
      TableName: request.tableName,
      Key: request.key,
      ConsistentRead: request.consistentRead,
    })
  );

  return response.Item;
}
