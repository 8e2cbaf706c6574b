/**
 * Result iteration.
 */

export { ResultIterator, type IterationState, type ItemSource } from './result-iterator.js';
export { batchSource, type BatchSourceOptions } from './batch.js';
export { paginatedSource, singleSource, type PageFetcher } from './paginated.js';
