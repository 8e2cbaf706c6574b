/**
 * PutItem operation.
 */

import { PutCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ExpressionContext, renderPredicate } from '../conditions/expression.js';
import type { PutRequest } from '../transport/transport.js';
import type { Item } from '../types/item.js';

/**
 * Creates an item or replaces the item with the same primary key.
 *
 * With a condition, the write only happens if the stored item satisfies it.
 *
 * @returns The replaced item, if there was one
 *
 * @example
 * ```typescript
 * // only create: fail if an item with this key exists
 * await putItem(docClient, {
 *   tableName: 'contacts',
 *   item: { user_id: 'u1', email: 'e1@example.com', name: 'Ada' },
 *   condition: { kind: 'comparison', path: ['user_id'], operator: 'NOT_EXISTS', operands: [] },
 * });
 * ```
 */
export async function putItem(docClient: DynamoDBDocumentClient, request: PutRequest): Promise<Item | undefined> {
  const context = new ExpressionContext();
  const conditionExpression = request.condition ? renderPredicate(request.condition, context) : undefined;

  const response = await docClient.send(
    new PutCommand({
      TableName: request.tableName,
      Item: request.item,
      ConditionExpression: conditionExpression,
      ...context.attributeMaps(),
      ReturnValues: 'ALL_OLD',
    })
  );

  return response.Attributes;
}
