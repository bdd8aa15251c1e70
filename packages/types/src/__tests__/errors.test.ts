import { describe, it, expect } from 'vitest';
import {
  AbsenceError,
  AbsentValueError,
  EmptyCellError,
  OperationValidityError,
  isAbsenceError,
} from '../lib/errors.js';

describe('AbsenceError', () => {
  it('should create error with correct properties', () => {
    const error = new AbsenceError('Test error', 'TEST_CODE');

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.name).toBe('AbsenceError');
    expect(error.isOperational).toBe(true);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('OperationValidityError', () => {
  it('should name the operation in its message', () => {
    const error = new OperationValidityError('pickle');

    expect(error.message).toBe("Operation 'pickle' is not valid on this object.");
    expect(error.operation).toBe('pickle');
  });

  it('should have OPERATION_INVALID code', () => {
    const error = new OperationValidityError('toJSON');

    expect(error.code).toBe('OPERATION_INVALID');
    expect(error.name).toBe('OperationValidityError');
    expect(error).toBeInstanceOf(AbsenceError);
  });
});

describe('AbsentValueError', () => {
  it('should have a default message and code', () => {
    const error = new AbsentValueError();

    expect(error.message).toBe('Expected a value but found absent');
    expect(error.code).toBe('ABSENT_VALUE');
  });
});

describe('EmptyCellError', () => {
  it('should be an AbsentValueError with EMPTY_CELL code', () => {
    const error = new EmptyCellError();

    expect(error).toBeInstanceOf(AbsentValueError);
    expect(error.code).toBe('EMPTY_CELL');
    expect(error.name).toBe('EmptyCellError');
    expect(error.message).toBe('Cannot extract from empty cell');
  });
});

describe('isAbsenceError', () => {
  it('should identify package errors', () => {
    expect(isAbsenceError(new EmptyCellError())).toBe(true);
    expect(isAbsenceError(new OperationValidityError('toJSON'))).toBe(true);
  });

  it('should reject other errors and values', () => {
    expect(isAbsenceError(new Error('plain'))).toBe(false);
    expect(isAbsenceError('EMPTY_CELL')).toBe(false);
  });
});
