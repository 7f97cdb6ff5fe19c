/**
 * chain-confidence - Error Hierarchy
 */

/**
 * Error options for ConfidenceError
 */
export interface ConfidenceErrorOptions {
  code?: string;
  recoverable?: boolean;
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  recoverable: boolean;
  context: Record<string, unknown>;
  timestamp: string;
  stack?: string;
}

/**
 * Base error class for the scoring engine
 */
export class ConfidenceError extends Error {
  code: string;
  recoverable: boolean;
  context: Record<string, unknown>;
  timestamp: Date;

  constructor(message: string, options: ConfidenceErrorOptions = {}) {
    super(message);
    this.name = 'ConfidenceError';
    this.code = options.code ?? 'CONFIDENCE_ERROR';
    this.recoverable = options.recoverable ?? false;
    this.context = options.context ?? {};
    this.timestamp = new Date();

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Create error with additional context
   */
  withContext(context: Record<string, unknown>): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}

/**
 * A chain that does not match the expected shape
 */
export class MalformedInputError extends ConfidenceError {
  issues: string[];

  constructor(message: string, issues: string[] = [], options: ConfidenceErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'MALFORMED_INPUT',
      recoverable: true,
      ...options,
    });
    this.name = 'MalformedInputError';
    this.issues = issues;
    this.context.issues = issues;
  }
}

/**
 * Arithmetic or logic fault while scoring
 */
export class ComputationFaultError extends ConfidenceError {
  dimension?: string;

  constructor(message: string, dimension?: string, options: ConfidenceErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'COMPUTATION_FAULT',
      recoverable: true,
      ...options,
    });
    this.name = 'ComputationFaultError';
    this.dimension = dimension;
    if (dimension) {
      this.context.dimension = dimension;
    }
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ConfidenceError {
  constructor(message: string, options: ConfidenceErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'CONFIG_ERROR',
      recoverable: false,
      ...options,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Validation errors
 */
export class ValidationError extends ConfidenceError {
  field?: string;

  constructor(message: string, field?: string, options: ConfidenceErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'VALIDATION_ERROR',
      recoverable: false,
      ...options,
    });
    this.name = 'ValidationError';
    this.field = field;
    if (field) {
      this.context.field = field;
    }
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Normalize any error source to ConfidenceError
 */
export function normalizeError(source: unknown, defaultCode = 'UNKNOWN_ERROR'): ConfidenceError {
  if (source instanceof ConfidenceError) {
    return source;
  }

  if (source instanceof Error) {
    return new ConfidenceError(source.message, {
      code: defaultCode,
      cause: source,
    });
  }

  if (typeof source === 'string') {
    return new ConfidenceError(source, { code: defaultCode });
  }

  return new ConfidenceError('Unknown error', {
    code: defaultCode,
    context: { originalError: source },
  });
}

/**
 * Check if error is recoverable
 */
export function isRecoverable(error: unknown): boolean {
  if (error instanceof ConfidenceError) {
    return error.recoverable;
  }
  return false;
}

/**
 * Get error code
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof ConfidenceError) {
    return error.code;
  }
  if (error instanceof Error) {
    return error.name;
  }
  return 'UNKNOWN_ERROR';
}
