/**
 * Machine-readable error codes, grouped by category prefix.
 */
export enum ErrorCode {
  // Not found (404)
  NOT_FOUND_RESOURCE = 'NOT_FOUND.RESOURCE',
  NOT_FOUND_CATEGORY = 'NOT_FOUND.CATEGORY',

  // Conflict (409)
  CONFLICT_DUPLICATE_RESOURCE = 'CONFLICT.DUPLICATE_RESOURCE',
  CONFLICT_CATEGORY_EXISTS = 'CONFLICT.CATEGORY_EXISTS',

  // Validation (400)
  VALIDATION_INVALID_INPUT = 'VALIDATION.INVALID_INPUT',

  // Access (401 / 403 / 429)
  AUTH_UNAUTHORIZED = 'AUTH.UNAUTHORIZED',
  FORBIDDEN_INSUFFICIENT_PERMISSIONS = 'FORBIDDEN.INSUFFICIENT_PERMISSIONS',
  TOO_MANY_REQUESTS = 'RATE_LIMIT.TOO_MANY_REQUESTS',

  // Internal (5xx)
  INTERNAL_SERVER_ERROR = 'INTERNAL.SERVER_ERROR',
  INTERNAL_UNEXPECTED_ERROR = 'INTERNAL.UNEXPECTED_ERROR',
  SERVICE_UNAVAILABLE = 'INTERNAL.SERVICE_UNAVAILABLE'
}
