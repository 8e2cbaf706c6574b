/**
 * Store transport.
 */

export type {
  Transport,
  GetRequest,
  BatchGetRequest,
  BatchGetResponse,
  PutRequest,
  DeleteRequest,
  BatchWriteRequest,
  BatchWriteResponse,
  QueryRequest,
  ScanRequest,
  PageResponse,
  UpdateRequest,
} from './transport.js';

export { DocumentClientTransport, type DocumentClientTransportOptions } from './document-client.js';
