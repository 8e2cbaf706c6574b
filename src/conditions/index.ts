/**
 * Condition algebra and predicate rendering.
 */

export {
  Comparison,
  AndCondition,
  OrCondition,
  isCondition,
  Operator,
  type Condition,
} from './condition.js';

export {
  OPERATOR_ARITY,
  KEY_OPERATORS,
  conjunction,
  type Predicate,
  type PredicateComparison,
  type PredicateJunction,
} from './predicate.js';

export { ExpressionContext, renderPredicate, type ExpressionAttributeMaps } from './expression.js';
