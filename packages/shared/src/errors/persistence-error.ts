/**
 * Node table persistence error class
 * @module @strata/shared/errors/persistence-error
 */

import { StrataError, ErrorCode, toError } from './base-error';

/**
 * Node table operation that failed
 */
export type PersistenceOperation = 'get' | 'put' | 'delete' | 'iterate' | 'close';

/**
 * Raised when a durable node table operation fails
 */
export class PersistenceError extends StrataError {
  public readonly operation: PersistenceOperation;
  /** Key involved, when the operation addresses a single row */
  public readonly key?: string;

  constructor(
    message: string,
    operation: PersistenceOperation,
    key?: string,
    cause?: Error,
  ) {
    super(message, ErrorCode.PERSISTENCE_FAILURE, { operation, key }, cause);
    this.name = 'PersistenceError';
    this.operation = operation;
    this.key = key;
  }

  /**
   * Wrap a failure raised by the underlying store
   */
  static wrap(operation: PersistenceOperation, key: string | undefined, cause: unknown): PersistenceError {
    if (cause instanceof PersistenceError) {
      return cause;
    }
    const error = toError(cause);
    const target = key ? ` for ${key}` : '';
    return new PersistenceError(
      `Node table ${operation}${target} failed: ${error.message}`,
      operation,
      key,
      error,
    );
  }
}

/**
 * Check if an error is a PersistenceError
 */
export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}
