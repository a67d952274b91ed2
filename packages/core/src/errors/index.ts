/**
 * Authflow Error System
 *
 * Structured errors for conditions the adapter detects itself:
 * - Unique error codes (AUTHFLOW_C100, AUTHFLOW_C101, ...)
 * - Suggestions for resolution
 * - Error categorization
 *
 * @example
 * ```typescript
 * import { AuthflowError } from '@authflow/core';
 *
 * try {
 *   await firstValueFrom(rxAuth.applyActionCode(code));
 * } catch (error) {
 *   if (AuthflowError.isCategory(error, 'context')) {
 *     console.log(error.format());
 *   } else {
 *     // an error reported by the auth client, untouched
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  AuthflowError,
  ContextUnavailableError,
  MissingResultError,
  type AuthflowErrorOptions,
  type SerializedAuthflowError,
} from './authflow-error.js';
