import { DynaQueryError, type ErrorCode } from './error.js';

/**
 * Error thrown when the client is misconfigured
 * (e.g., invalid region, endpoint, or table prefix)
 */
export class ConfigurationError extends DynaQueryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ConfigurationError',
      message,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a schema consistency check fails
 * (missing or repeated key attributes, unsupported key types)
 */
export class SchemaError extends DynaQueryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'SchemaError',
      message,
      details,
    });
    this.name = 'SchemaError';
  }
}

/**
 * Error thrown when a condition or update expression is structurally invalid.
 *
 * The offending expression, when known, is rendered into the message and kept
 * in `details.expression`.
 */
export class ExpressionError extends DynaQueryError {
  constructor(message: string, expression?: string, code: ErrorCode = 'ExpressionError') {
    super({
      code,
      message: expression === undefined ? message : `Invalid expression ${expression}. ${message}`,
      details: expression === undefined ? undefined : { expression },
    });
    this.name = 'ExpressionError';
  }
}

/**
 * Error for a comparison built with the wrong number of operands
 */
export class InvalidArityError extends ExpressionError {
  constructor(operator: string, expected: number, received: number) {
    super(
      `Operator ${operator} takes ${expected} operand(s), received ${received}`,
      undefined,
      'InvalidArity'
    );
    this.name = 'InvalidArityError';
  }
}

/**
 * Raised when an IN comparison is projected into a key condition.
 *
 * The key-condition grammar has no IN; the dispatcher catches this and
 * reroutes the lookup to a batch get or a scan.
 */
export class MultipleKeyLookupError extends ExpressionError {
  constructor(attribute: string) {
    super(`IN cannot be used in a key condition on "${attribute}"`, undefined, 'MultipleKeyLookup');
    this.name = 'MultipleKeyLookupError';
  }
}

/**
 * Error thrown when caller input fails validation
 */
export class ValidationError extends DynaQueryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ValidationError',
      message,
      details,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a value cannot be converted to a store primitive
 */
export class EncodingError extends DynaQueryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'EncodingError',
      message,
      details,
    });
    this.name = 'EncodingError';
  }
}

/**
 * Error thrown when a write's guard condition is not met
 */
export class ConditionalCheckFailedError extends DynaQueryError {
  constructor(message: string = 'The conditional request failed', cause?: Error) {
    super({
      code: 'ConditionalCheckFailed',
      message,
      cause,
    });
    this.name = 'ConditionalCheckFailedError';
  }
}
