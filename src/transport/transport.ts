/**
 * Transport capability.
 *
 * The engine talks to the store only through this interface. Requests carry
 * the (prefixed) table name, encoded keys and items, and native predicates.
 * A write whose guard is not met fails with ConditionalCheckFailedError; any
 * other failure propagates unchanged.
 */

import type { Predicate } from '../conditions/predicate.js';
import type { CompiledUpdate } from '../updates/compiler.js';
import type { Item } from '../types/item.js';
import type { KeyValues } from '../types/key.js';

export interface GetRequest {
  tableName: string;
  key: KeyValues;
  consistentRead: boolean;
}

export interface BatchGetRequest {
  tableName: string;
  /** At most 100 keys */
  keys: readonly KeyValues[];
  consistentRead: boolean;
}

export interface BatchGetResponse {
  items: Item[];
  /** Keys the store declined to process in this round trip */
  unprocessedKeys: KeyValues[];
}

export interface PutRequest {
  tableName: string;
  item: Item;
  condition?: Predicate | null;
}

export interface DeleteRequest {
  tableName: string;
  key: KeyValues;
  condition?: Predicate | null;
}

export interface BatchWriteRequest {
  tableName: string;
  puts: readonly Item[];
  deletes: readonly KeyValues[];
}

export interface BatchWriteResponse {
  /** Puts still unprocessed after the transport's own retries */
  unprocessedPuts: Item[];
  /** Deletes still unprocessed after the transport's own retries */
  unprocessedDeletes: KeyValues[];
}

export interface QueryRequest {
  tableName: string;
  keyCondition: Predicate;
  filter: Predicate | null;
  cursor?: KeyValues;
  limit?: number;
  /** Ascending range key order when true */
  forward: boolean;
  consistentRead: boolean;
}

export interface ScanRequest {
  tableName: string;
  filter: Predicate | null;
  cursor?: KeyValues;
  limit?: number;
  consistentRead: boolean;
}

export interface PageResponse {
  items: Item[];
  /** Continuation cursor; absent on the last page */
  cursor?: KeyValues;
}

export interface UpdateRequest {
  tableName: string;
  key: KeyValues;
  update: CompiledUpdate;
  condition?: Predicate | null;
}

/**
 * Store operations consumed by the engine.
 */
export interface Transport {
  get(request: GetRequest): Promise<Item | undefined>;
  batchGet(request: BatchGetRequest): Promise<BatchGetResponse>;
  /** Resolves to the replaced item, if there was one */
  put(request: PutRequest): Promise<Item | undefined>;
  /** Resolves to the deleted item, if there was one */
  delete(request: DeleteRequest): Promise<Item | undefined>;
  batchWrite(request: BatchWriteRequest): Promise<BatchWriteResponse>;
  query(request: QueryRequest): Promise<PageResponse>;
  scan(request: ScanRequest): Promise<PageResponse>;
  /** Resolves to the item as it is after the update */
  update(request: UpdateRequest): Promise<Item>;
}
