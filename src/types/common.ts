/**
 * Common Types
 *
 * Shared types used across modules: Result and remote API errors.
 */

// Result Types
export type ApiErrorType =
  | 'rate_limit'
  | 'auth'
  | 'not_found'
  | 'network'
  | 'invalid_response'

export interface ApiError {
  readonly type: ApiErrorType
  readonly message: string
  /** Seconds the service asked us to wait (HTTP Retry-After) */
  readonly retryAfter?: number | undefined
}

export type Result<T, E = ApiError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }
