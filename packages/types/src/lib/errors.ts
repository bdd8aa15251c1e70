/**
 * @fileoverview Error classes raised by the absence API
 *
 * Every error carries a stable `code` so callers can branch without parsing
 * messages. Errors raised by caller-supplied callbacks are never wrapped in
 * one of these.
 *
 * @module @absential/types/errors
 */

/**
 * Base error for the absence API
 */
export class AbsenceError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AbsenceError';
    this.code = code;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Attempt to perform an operation the target object does not allow
 * (serializing an absence marker, adapting a non-record)
 */
export class OperationValidityError extends AbsenceError {
  public readonly operation: string;

  constructor(operation: string) {
    super(`Operation '${operation}' is not valid on this object.`, 'OPERATION_INVALID');
    this.name = 'OperationValidityError';
    this.operation = operation;
  }
}

/**
 * A value was required but the absence sentinel was found
 */
export class AbsentValueError extends AbsenceError {
  constructor(message = 'Expected a value but found absent', code = 'ABSENT_VALUE') {
    super(message, code);
    this.name = 'AbsentValueError';
  }
}

/**
 * `extract()` was called on an empty cell
 */
export class EmptyCellError extends AbsentValueError {
  constructor() {
    super('Cannot extract from empty cell', 'EMPTY_CELL');
    this.name = 'EmptyCellError';
  }
}

/**
 * Type guard for errors raised by this package family
 */
export function isAbsenceError(error: unknown): error is AbsenceError {
  return error instanceof AbsenceError && error.isOperational;
}
