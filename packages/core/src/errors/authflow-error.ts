/**
 * AuthflowError - Error class for failures raised by the adapter itself
 */

import {
  type ErrorCategory,
  type ErrorCode,
  getErrorCategory,
  getErrorInfo,
} from './error-codes.js';

/**
 * Options for creating an AuthflowError
 */
export interface AuthflowErrorOptions {
  /** The error code */
  code: ErrorCode;
  /** Custom message (overrides default) */
  message?: string;
  /** Custom suggestion (overrides default) */
  suggestion?: string;
  /** Additional context information */
  context?: Record<string, unknown>;
}

/**
 * Serialized format of an AuthflowError
 */
export interface SerializedAuthflowError {
  name: string;
  code: string;
  message: string;
  suggestion?: string;
  category: ErrorCategory;
  context: Record<string, unknown>;
  stack?: string;
}

/**
 * Structured error for contract breaches detected by Authflow.
 *
 * Failures reported by the wrapped auth client are never wrapped in this
 * class; subscribers receive those values untouched. AuthflowError only
 * covers conditions the adapter detects on its own, such as a released
 * auth context.
 *
 * @example
 * ```typescript
 * rxAuth.signInAnonymously().subscribe({
 *   error: (error) => {
 *     if (AuthflowError.isCode(error, 'AUTHFLOW_C100')) {
 *       console.log('Auth client is gone');
 *     }
 *   },
 * });
 * ```
 */
export class AuthflowError extends Error {
  /** Unique error code */
  readonly code: ErrorCode;

  /** Helpful suggestion for resolving the error */
  readonly suggestion?: string;

  /** Error category for grouping */
  readonly category: ErrorCategory;

  /** Additional context information */
  readonly context: Record<string, unknown>;

  constructor(options: AuthflowErrorOptions) {
    const errorInfo = getErrorInfo(options.code);
    const message = options.message ?? errorInfo.message;

    super(message);

    this.name = 'AuthflowError';
    this.code = options.code;
    this.suggestion = options.suggestion ?? errorInfo.suggestion;
    this.category = getErrorCategory(options.code);
    this.context = options.context ?? {};

    // Maintain proper stack trace for V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AuthflowError);
    }
  }

  /**
   * Check if an error is an AuthflowError
   */
  static isAuthflowError(error: unknown): error is AuthflowError {
    return error instanceof AuthflowError;
  }

  /**
   * Check if an error matches a specific code
   */
  static isCode(error: unknown, code: ErrorCode): boolean {
    return AuthflowError.isAuthflowError(error) && error.code === code;
  }

  /**
   * Check if an error matches a specific category
   */
  static isCategory(error: unknown, category: ErrorCategory): boolean {
    return AuthflowError.isAuthflowError(error) && error.category === category;
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines = [`[${this.code}] ${this.message}`];

    if (Object.keys(this.context).length > 0) {
      lines.push(`Context: ${JSON.stringify(this.context)}`);
    }

    if (this.suggestion) {
      lines.push(`Suggestion: ${this.suggestion}`);
    }

    return lines.join('\n');
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): SerializedAuthflowError {
    const result: SerializedAuthflowError = {
      name: this.name,
      code: this.code,
      message: this.message,
      category: this.category,
      context: this.context,
    };

    if (this.suggestion) {
      result.suggestion = this.suggestion;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    return result;
  }

  /**
   * Override toString for better console output
   */
  override toString(): string {
    return this.format();
  }
}

/**
 * Auth context has been released before an operation could use it
 */
export class ContextUnavailableError extends AuthflowError {
  /** Name of the operation that found no context */
  readonly operation: string;

  constructor(operation: string) {
    super({
      code: 'AUTHFLOW_C100',
      message: `Auth context unavailable for "${operation}"`,
      context: { operation },
    });

    this.name = 'ContextUnavailableError';
    this.operation = operation;
  }
}

/**
 * Auth client callback fired with neither an error nor a result
 */
export class MissingResultError extends AuthflowError {
  /** Name of the operation whose callback was empty */
  readonly operation: string;

  constructor(operation: string) {
    super({
      code: 'AUTHFLOW_C101',
      message: `Auth client returned no result for "${operation}"`,
      context: { operation },
    });

    this.name = 'MissingResultError';
    this.operation = operation;
  }
}

