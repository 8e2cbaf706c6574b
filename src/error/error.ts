/**
 * Codes carried by dynaquery errors.
 */
export type ErrorCode =
  | 'ConfigurationError'
  | 'SchemaError'
  | 'ExpressionError'
  | 'InvalidArity'
  | 'MultipleKeyLookup'
  | 'ValidationError'
  | 'EncodingError'
  | 'ConditionalCheckFailed'
  | 'UnexpectedResponse';

export interface DynaQueryErrorOptions {
  code: ErrorCode;
  message: string;
  /** Store failure this error was mapped from */
  cause?: Error;
  details?: Record<string, unknown>;
}

/**
 * Base error class for all dynaquery errors.
 *
 * Errors raised while building or planning a request never reach the store.
 * ConditionalCheckFailed is mapped from a store failure and keeps it as
 * `cause`; UnexpectedResponse flags a reply missing what was asked for.
 * Other store failures propagate unchanged.
 */
export class DynaQueryError extends Error {
  public readonly code: ErrorCode;

  /**
   * Offending expression, attribute or field, where there is one
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: DynaQueryErrorOptions) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DynaQueryError';
    this.code = options.code;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.name : undefined,
    };
  }
}
