/**
 * Authflow Error Codes
 *
 * Error codes are structured as AUTHFLOW_[CATEGORY][NUMBER]:
 * - C: Auth context errors (C100-C199)
 *
 * Errors produced by the wrapped auth client never receive one of these
 * codes; they are forwarded exactly as the client reported them.
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Auth context errors (C100-C199)
  AUTHFLOW_C100: {
    code: 'AUTHFLOW_C100',
    message: 'Auth context unavailable',
    category: 'context',
    suggestion:
      'The auth client was released before the operation was subscribed to. Keep a reference to the client for as long as its observables are in use.',
  },
  AUTHFLOW_C101: {
    code: 'AUTHFLOW_C101',
    message: 'Missing operation result',
    category: 'context',
    suggestion:
      'The auth client invoked its callback without an error or a result. Check that the client implements the callback contract.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = (typeof ERROR_CODES)[ErrorCode]['category'];

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return ERROR_CODES[code].category;
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
