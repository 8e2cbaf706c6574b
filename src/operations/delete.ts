/**
 * DeleteItem operation.
 */

import { DeleteCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ExpressionContext, renderPredicate } from '../conditions/expression.js';
import type { DeleteRequest } from '../transport/transport.js';
import type { Item } from '../types/item.js';

/**
 * Deletes a single item by its primary key, optionally guarded by a condition.
 *
 * @returns The deleted item, or undefined if no item had that key
 */
export async function deleteItem(
  docClient: DynamoDBDocumentClient,
  request: DeleteRequest
): Promise<Item | undefined> {
  const context = new ExpressionContext();
  const conditionExpression = request.condition ? renderPredicate(request.condition, context) : undefined;

  const response = await docClient.send(
    new DeleteCommand({
      TableName: request.tableName,
      Key: request.key,
      ConditionExpression: conditionExpression,
      ...context.attributeMaps(),
      ReturnValues: 'ALL_OLD',
    })
  );

  return response.Attributes;
}
