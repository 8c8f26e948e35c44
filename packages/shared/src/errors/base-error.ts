/**
 * Base error class with error codes
 * @module @strata/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  NOT_IMPLEMENTED = 1002,
  TIMEOUT = 1003,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,
  CONSTRAINT_VIOLATION = 2005,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,
  ALREADY_EXISTS = 5001,
  CONFLICT = 5002,

  // Node errors (7xxx)
  NODE_NOT_FOUND = 7000,
  NODE_NOT_PERMITTED = 7001,
  NODE_REGISTRATION_FAILED = 7002,

  // Cluster errors (10xxx)
  CLUSTER_UNHEALTHY = 10000,

  // Topology errors (11xxx)
  INVALID_TOPOLOGY = 11000,

  // Persistence errors (12xxx)
  PERSISTENCE_FAILURE = 12000,
  PERSISTENCE_UNAVAILABLE = 12001,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource type involved */
  resourceType?: string;
  /** Resource ID involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all Strata errors
 */
export class StrataError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'StrataError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Set correlation ID for tracing
   */
  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  /**
   * Check if this error is retryable
   */
  isRetryable(): boolean {
    return [
      ErrorCode.TIMEOUT,
      ErrorCode.INTERNAL,
      ErrorCode.PERSISTENCE_UNAVAILABLE,
    ].includes(this.code);
  }
}

/**
 * Check if an error is a StrataError
 */
export function isStrataError(error: unknown): error is StrataError {
  return error instanceof StrataError;
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an unknown error as a StrataError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): StrataError {
  if (isStrataError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new StrataError(error.message, code, {}, error);
  }

  return new StrataError(String(error), code);
}
