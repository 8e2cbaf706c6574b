/**
 * UpdateItem operation.
 */

import { UpdateCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ExpressionContext, renderPredicate } from '../conditions/expression.js';
import { DynaQueryError } from '../error/error.js';
import type { UpdateRequest } from '../transport/transport.js';
import type { Item } from '../types/item.js';

/**
 * Applies a compiled update expression to the item with the given key.
 *
 * The compiled update's placeholders (`#uN`, `:uN`) and the guard's
 * placeholders (`#nN`, `:vN`) share one pair of attribute maps.
 *
 * @returns The item as it is after the update
 * @throws {ConditionalCheckFailedError} If the guard condition is not met
 *
 * @example
 * ```typescript
 * const compiled = compileUpdates([visits.increment()]);
 * const updated = await updateItem(docClient, {
 *   tableName: 'contacts',
 *   key: { user_id: 'u1', email: 'e1@example.com' },
 *   update: compiled,
 * });
 * ```
 */
export async function updateItem(
  docClient: DynamoDBDocumentClient,
  request: UpdateRequest
): Promise<Item> {
  const context = new ExpressionContext();
  const conditionExpression = request.condition ? renderPredicate(request.condition, context) : undefined;

  const response = await docClient.send(
    new UpdateCommand({
      TableName: request.tableName,
      Key: request.key,
      UpdateExpression: request.update.expression,
      ConditionExpression: conditionExpression,
      ...context.attributeMaps(request.update.names, request.update.values),
      ReturnValues: 'ALL_NEW',
    })
  );

  if (response.Attributes === undefined) {
    throw new DynaQueryError({
      code: 'UnexpectedResponse',
      message: `UpdateItem on ${request.tableName} returned no attributes`,
    });
  }
  return response.Attributes;
}
