/**
 * BatchWriteItem with chunking and unprocessed-item retry.
 */

import { BatchWriteCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type { Logger } from '../observability/logging.js';
import type { Item } from '../types/item.js';
import type { KeyValues } from '../types/key.js';
import { MAX_BATCH_WRITE_REQUESTS, backoffDelay, chunk, sleep } from './chunker.js';

/**
 * A put or a delete inside a batch write.
 */
export type WriteRequest = { type: 'put'; item: Item } | { type: 'delete'; key: KeyValues };

export interface BatchWriteOptions {
  /** Retries of unprocessed requests per chunk */
  maxRetries: number;
  /** Base delay for exponential backoff between retries (milliseconds) */
  backoffBaseMs: number;
  logger: Logger;
}

type AwsWriteRequest = {
  PutRequest?: { Item: Record<string, unknown> };
  DeleteRequest?: { Key: Record<string, unknown> };
};

function toAwsWriteRequest(request: WriteRequest): AwsWriteRequest {
  return request.type === 'put' ? { PutRequest: { Item: request.item } } : { DeleteRequest: { Key: request.key } };
}

/**
 * Sends one batch write of at most 25 requests.
 *
 * @returns The requests the store left unprocessed
 */
export async function batchWriteRound(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  requests: readonly WriteRequest[]
): Promise<WriteRequest[]> {
  if (requests.length === 0) {
    return [];
  }
  if (requests.length > MAX_BATCH_WRITE_REQUESTS) {
    throw new RangeError(
      `Cannot batch write more than ${MAX_BATCH_WRITE_REQUESTS} requests, got ${requests.length}`
    );
  }

  const response = await docClient.send(
    new BatchWriteCommand({
      RequestItems: {
        [tableName]: requests.map(toAwsWriteRequest),
      },
    })
  );

  const unprocessed: WriteRequest[] = [];
  for (const request of response.UnprocessedItems?.[tableName] ?? []) {
    if (request.PutRequest?.Item !== undefined) {
      unprocessed.push({ type: 'put', item: request.PutRequest.Item });
    } else if (request.DeleteRequest?.Key !== undefined) {
      unprocessed.push({ type: 'delete', key: request.DeleteRequest.Key });
    }
  }
  return unprocessed;
}

/**
 * Writes any number of requests in chunks of 25, re-sending unprocessed
 * requests with exponential backoff.
 *
 * @returns Requests still unprocessed after `maxRetries` retries of their chunk
 *
 * @example
 * ```typescript
 * const left = await batchWriteWithRetry(docClient, 'contacts', requests, {
 *   maxRetries: 3,
 *   backoffBaseMs: 50,
 *   logger,
 * });
 * ```
 */
export async function batchWriteWithRetry(
  docClient: DynamoDBDocumentClient,
  tableName: string,
  requests: readonly WriteRequest[],
  options: BatchWriteOptions
): Promise<WriteRequest[]> {
  const { maxRetries, backoffBaseMs, logger } = options;
  const failed: WriteRequest[] = [];

  for (const requestChunk of chunk(requests, MAX_BATCH_WRITE_REQUESTS)) {
    let remaining: WriteRequest[] = requestChunk;
    let attempt = 0;

    while (remaining.length > 0 && attempt <= maxRetries) {
      if (attempt > 0) {
        const delay = backoffDelay(backoffBaseMs, attempt - 1);
        logger.warn('Retrying unprocessed batch write requests', {
          tableName,
          unprocessed: remaining.length,
          attempt,
          maxRetries,
          delayMs: delay,
        });
        await sleep(delay);
      }

      remaining = await batchWriteRound(docClient, tableName, remaining);
      attempt++;
    }

    if (remaining.length > 0) {
      logger.error('Batch write requests left unprocessed after retries', {
        tableName,
        unprocessed: remaining.length,
        maxRetries,
      });
      failed.push(...remaining);
    }
  }

  return failed;
}
