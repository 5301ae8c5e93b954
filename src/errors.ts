/**
 * Errors
 *
 * Failures that end a run. Per-message failures are values, not exceptions
 * (see ExtractionError in types/extraction).
 */

export type RetrievalErrorKind = 'auth_failure' | 'channel_not_found' | 'network_error'

/**
 * The channel could not be read. Fatal: no report is produced.
 */
export class RetrievalError extends Error {
  readonly kind: RetrievalErrorKind

  constructor(kind: RetrievalErrorKind, message: string) {
    super(message)
    this.name = 'RetrievalError'
    this.kind = kind
  }
}

/**
 * The run was aborted before it finished. Partial results are discarded.
 */
export class RunCancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message)
    this.name = 'RunCancelledError'
  }
}

/**
 * Required settings are missing or invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
