/**
 * Batch read and write round trips.
 */

export { batchGetRound, type BatchGetRound } from './get.js';
export { batchWriteRound, batchWriteWithRetry, type WriteRequest, type BatchWriteOptions } from './write.js';
export { chunk, sleep, backoffDelay, MAX_BACKOFF_MS, MAX_BATCH_GET_KEYS, MAX_BATCH_WRITE_REQUESTS } from './chunker.js';
