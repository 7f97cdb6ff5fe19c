/**
 * Tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  ComputationFaultError,
  ConfidenceError,
  ConfigurationError,
  getErrorCode,
  isRecoverable,
  MalformedInputError,
  normalizeError,
  ValidationError,
} from '../../src/core/errors.js';

describe('ConfidenceError', () => {
  it('should default code and recoverability', () => {
    const error = new ConfidenceError('failed');

    expect(error.code).toBe('CONFIDENCE_ERROR');
    expect(error.recoverable).toBe(false);
    expect(error.context).toEqual({});
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to JSON', () => {
    const error = new ConfidenceError('failed', { code: 'X', context: { a: 1 } });
    const json = error.toJSON();

    expect(json.name).toBe('ConfidenceError');
    expect(json.message).toBe('failed');
    expect(json.code).toBe('X');
    expect(json.context).toEqual({ a: 1 });
    expect(json.timestamp).toBe(error.timestamp.toISOString());
  });

  it('should merge additional context', () => {
    const error = new ConfidenceError('failed', { context: { a: 1 } }).withContext({ b: 2 });

    expect(error.context).toEqual({ a: 1, b: 2 });
  });

  it('should keep the cause', () => {
    const cause = new Error('root');

    expect(new ConfidenceError('failed', { cause }).cause).toBe(cause);
  });
});

describe('subclasses', () => {
  it('should tag malformed input', () => {
    const error = new MalformedInputError('bad', ['steps: Required']);

    expect(error.name).toBe('MalformedInputError');
    expect(error.code).toBe('MALFORMED_INPUT');
    expect(error.recoverable).toBe(true);
    expect(error.context.issues).toEqual(['steps: Required']);
  });

  it('should tag computation faults with the dimension', () => {
    const error = new ComputationFaultError('NaN', 'coherence');

    expect(error.code).toBe('COMPUTATION_FAULT');
    expect(error.dimension).toBe('coherence');
    expect(error.context).toEqual({ dimension: 'coherence' });
  });

  it('should tag configuration and validation errors', () => {
    expect(new ConfigurationError('x').code).toBe('CONFIG_ERROR');

    const validation = new ValidationError('x', 'userRating');
    expect(validation.code).toBe('VALIDATION_ERROR');
    expect(validation.context.field).toBe('userRating');
  });
});

describe('normalizeError', () => {
  it('should pass ConfidenceErrors through', () => {
    const error = new ConfigurationError('x');

    expect(normalizeError(error)).toBe(error);
  });

  it('should wrap native errors with the default code', () => {
    const cause = new TypeError('oops');
    const error = normalizeError(cause, 'COMPUTATION_FAULT');

    expect(error.message).toBe('oops');
    expect(error.code).toBe('COMPUTATION_FAULT');
    expect(error.cause).toBe(cause);
  });

  it('should wrap strings and unknown values', () => {
    expect(normalizeError('text').message).toBe('text');
    expect(normalizeError('text').code).toBe('UNKNOWN_ERROR');

    const error = normalizeError(42);
    expect(error.message).toBe('Unknown error');
    expect(error.context.originalError).toBe(42);
  });
});

describe('helpers', () => {
  it('should report recoverability', () => {
    expect(isRecoverable(new MalformedInputError('x'))).toBe(true);
    expect(isRecoverable(new ConfigurationError('x'))).toBe(false);
    expect(isRecoverable(new Error('x'))).toBe(false);
  });

  it('should extract error codes', () => {
    expect(getErrorCode(new ValidationError('x'))).toBe('VALIDATION_ERROR');
    expect(getErrorCode(new RangeError('x'))).toBe('RangeError');
    expect(getErrorCode('x')).toBe('UNKNOWN_ERROR');
  });
});
