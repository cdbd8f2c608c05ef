/**
 * Core error handling system for Lemma
 *
 * Every failure in Lemma is a caller contract violation, surfaced
 * synchronously before anything is computed. Errors carry:
 * - A structured error code for categorization
 * - Context for debugging
 * - A proper stack trace
 */

/**
 * Error codes for the error categories Lemma raises
 */
export enum ErrorCode {
  // Input errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_BUDGET = 'INVALID_BUDGET',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for Lemma with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new LemmaError(
 *   ErrorCode.INVALID_INPUT,
 *   'Null distribution must sum to 1',
 *   { sum: 0.8, tolerance: 0.01 }
 * );
 * ```
 */
export class LemmaError extends Error {
  /**
   * Create a new LemmaError
   *
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LemmaError';

    // Ensure proper stack trace in V8 engines (Node.js/Chrome)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a formatted string representation of the error
   * Includes code, message, and context for debugging
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  /**
   * Check if this error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if this error is in a category of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Malformed distributions, outcome counts, regions or options.
 */
export class InvalidInputError extends LemmaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_INPUT, message, context);
    this.name = 'InvalidInputError';
  }
}

/**
 * A size budget no region can satisfy (negative or not a number).
 */
export class InvalidBudgetError extends LemmaError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_BUDGET, message, context);
    this.name = 'InvalidBudgetError';
  }
}

/**
 * Type guard to check if an error is a LemmaError
 */
export function isLemmaError(error: unknown): error is LemmaError {
  return error instanceof LemmaError;
}

/**
 * Helper function to wrap unknown errors as LemmaError
 * Useful for catch blocks where the error type is unknown
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): LemmaError {
  if (isLemmaError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new LemmaError(code, message, context);
}
