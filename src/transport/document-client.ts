/**
 * Transport over the AWS SDK document client.
 */

import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { batchGetRound } from '../batch/get.js';
import { type WriteRequest, batchWriteWithRetry } from '../batch/write.js';
import { DEFAULT_BATCH_CONFIG } from '../config/defaults.js';
import { ConditionalCheckFailedError } from '../error/categories.js';
import { mapTransportError } from '../error/mapper.js';
import { type Logger, NoopLogger, logError } from '../observability/logging.js';
import { deleteItem } from '../operations/delete.js';
import { getItem } from '../operations/get.js';
import { putItem } from '../operations/put.js';
import { queryPage } from '../operations/query.js';
import { scanPage } from '../operations/scan.js';
import { updateItem } from '../operations/update.js';
import type { Item } from '../types/item.js';
import type { KeyValues } from '../types/key.js';
import type {
  BatchGetRequest,
  BatchGetResponse,
  BatchWriteRequest,
  BatchWriteResponse,
  DeleteRequest,
  GetRequest,
  PageResponse,
  PutRequest,
  QueryRequest,
  ScanRequest,
  Transport,
  UpdateRequest,
} from './transport.js';

export interface DocumentClientTransportOptions {
  logger?: Logger;
  /** Retries of unprocessed batch write requests per chunk */
  maxWriteRetries?: number;
  /** Base delay for exponential backoff between batch write retries (milliseconds) */
  backoffBaseMs?: number;
}

/**
 * Transport that executes requests with a DynamoDBDocumentClient.
 *
 * SDK guard failures surface as ConditionalCheckFailedError; every other
 * error is logged and re-thrown unchanged. Nothing is retried here apart from
 * unprocessed batch write requests.
 *
 * @example
 * ```typescript
 * const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({ region: 'us-east-1' }));
 * const transport = new DocumentClientTransport(docClient, { logger: new ConsoleLogger('debug') });
 * ```
 */
export class DocumentClientTransport implements Transport {
  private readonly logger: Logger;
  private readonly maxWriteRetries: number;
  private readonly backoffBaseMs: number;

  constructor(
    private readonly docClient: DynamoDBDocumentClient,
    options: DocumentClientTransportOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.maxWriteRetries = options.maxWriteRetries ?? DEFAULT_BATCH_CONFIG.maxWriteRetries;
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BATCH_CONFIG.backoffBaseMs;
  }

  get(request: GetRequest): Promise<Item | undefined> {
    return this.execute('GetItem', request.tableName, () => getItem(this.docClient, request));
  }

  batchGet(request: BatchGetRequest): Promise<BatchGetResponse> {
    return this.execute('BatchGetItem', request.tableName, () =>
      batchGetRound(this.docClient, request.tableName, request.keys, request.consistentRead)
    );
  }

  put(request: PutRequest): Promise<Item | undefined> {
    return this.execute('PutItem', request.tableName, () => putItem(this.docClient, request));
  }

  delete(request: DeleteRequest): Promise<Item | undefined> {
    return this.execute('DeleteItem', request.tableName, () => deleteItem(this.docClient, request));
  }

  query(request: QueryRequest): Promise<PageResponse> {
    return this.execute('Query', request.tableName, () => queryPage(this.docClient, request));
  }

  scan(request: ScanRequest): Promise<PageResponse> {
    return this.execute('Scan', request.tableName, () => scanPage(this.docClient, request));
  }

  update(request: UpdateRequest): Promise<Item> {
    return this.execute('UpdateItem', request.tableName, () => updateItem(this.docClient, request));
  }

  async batchWrite(request: BatchWriteRequest): Promise<BatchWriteResponse> {
    const requests: WriteRequest[] = [
      ...request.puts.map((item): WriteRequest => ({ type: 'put', item })),
      ...request.deletes.map((key): WriteRequest => ({ type: 'delete', key })),
    ];

    const unprocessed = await this.execute('BatchWriteItem', request.tableName, () =>
      batchWriteWithRetry(this.docClient, request.tableName, requests, {
        maxRetries: this.maxWriteRetries,
        backoffBaseMs: this.backoffBaseMs,
        logger: this.logger,
      })
    );

    const unprocessedPuts: Item[] = [];
    const unprocessedDeletes: KeyValues[] = [];
    for (const writeRequest of unprocessed) {
      if (writeRequest.type === 'put') {
        unprocessedPuts.push(writeRequest.item);
      } else {
        unprocessedDeletes.push(writeRequest.key);
      }
    }
    return { unprocessedPuts, unprocessedDeletes };
  }

  private async execute<R>(operation: string, tableName: string, send: () => Promise<R>): Promise<R> {
    this.logger.trace(`${operation} request`, { operation, tableName });
    try {
      return await send();
    } catch (error) {
      const mapped = mapTransportError(error);
      if (mapped instanceof ConditionalCheckFailedError) {
        this.logger.debug(`${operation} guard not met`, { operation, tableName });
      } else if (mapped instanceof Error) {
        logError(this.logger, operation, tableName, mapped);
      }
      throw mapped;
    }
  }
}
