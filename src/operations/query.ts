/**
 * Query operation.
 */

import { QueryCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ExpressionContext, renderPredicate } from '../conditions/expression.js';
import type { PageResponse, QueryRequest } from '../transport/transport.js';

/**
 * Fetches one page of items matching a key condition.
 *
 * The key condition and the filter share one expression context, so their
 * placeholders never collide.
 *
 * @example
 * ```typescript
 * const page = await queryPage(docClient, {
 *   tableName: 'contacts',
 *   keyCondition: userId.eq('u1').toKeyPredicate(),
 *   filter: null,
 *   forward: true,
 *   consistentRead: true,
 * });
 * // page.cursor is set when more pages remain
 * ```
 */
export async function queryPage(docClient: DynamoDBDocumentClient, request: QueryRequest): Promise<PageResponse> {
  const context = new ExpressionContext();
  const keyConditionExpression = renderPredicate(request.keyCondition, context);
  const filterExpression = request.filter ? renderPredicate(request.filter, context) : undefined;

  const response = await docClient.send(
    new QueryCommand({
      TableName: request.tableName,
      KeyConditionExpression: keyConditionExpression,
      FilterExpression: filterExpression,
      ...context.attributeMaps(),
      ExclusiveStartKey: request.cursor,
      Limit: request.limit,
      ScanIndexForward: request.forward,
      ConsistentRead: request.consistentRead,
    })
  );

  return {
    items: response.Items ?? [],
    cursor: response.LastEvaluatedKey,
  };
}
