/**
 * Key classification and query dispatch.
 */

export { classifyKey, filterRemainder, type KeyStrictness } from './classifier.js';

export {
  byHashKey,
  byKey,
  byRecord,
  points,
  keysIn,
  resolvePoint,
  resolveExact,
  type HashKeyLookup,
  type CompositeKeyLookup,
  type RecordLookup,
  type PointLookup,
  type PointsLookup,
  type LookupStrategy,
  type ExactKey,
} from './strategy.js';

export {
  planLookup,
  planSingle,
  type DispatchPlan,
  type GetPlan,
  type BatchGetPlan,
  type QueryPlan,
  type ScanPlan,
} from './dispatcher.js';
