/**
 * Error Handling
 *
 * Error classes and error handling utilities for dynaquery.
 */

export { DynaQueryError } from './error.js';
export type { DynaQueryErrorOptions, ErrorCode } from './error.js';

// Error categories
export {
  ConfigurationError,
  SchemaError,
  ExpressionError,
  InvalidArityError,
  MultipleKeyLookupError,
  ValidationError,
  EncodingError,
  ConditionalCheckFailedError,
} from './categories.js';

// Error mapping
export { mapTransportError, isConditionalCheckFailure } from './mapper.js';
