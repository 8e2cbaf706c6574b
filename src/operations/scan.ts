/**
 * Scan operation.
 */

import { ScanCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { ExpressionContext, renderPredicate } from '../conditions/expression.js';
import type { PageResponse, ScanRequest } from '../transport/transport.js';

/**
 * Fetches one page of a full table scan, optionally filtered.
 *
 * Scans read every item in the table; the filter only reduces what is returned.
 */
export async function scanPage(docClient: DynamoDBDocumentClient, request: ScanRequest): Promise<PageResponse> {
  const context = new ExpressionContext();
  const filterExpression = request.filter ? renderPredicate(request.filter, context) : undefined;

  const response = await docClient.send(
    new ScanCommand({
      TableName: request.tableName,
      FilterExpression: filterExpression,
      ...context.attributeMaps(),
      ExclusiveStartKey: request.cursor,
      Limit: request.limit,
      ConsistentRead: request.consistentRead,
    })
  );

  return {
    items: response.Items ?? [],
    cursor: response.LastEvaluatedKey,
  };
}
