/**
 * Report Types
 *
 * Per-message outcomes and the aggregate run report.
 */

import type { ExtractionResult } from './extraction'
import type { RawMessage, ResolvedUser } from './message'

export type ErrorKind = 'service_error' | 'unparsable_response' | 'rate_limit_exhausted'

export const ERROR_KINDS: readonly ErrorKind[] = [
  'service_error',
  'unparsable_response',
  'rate_limit_exhausted'
]

export type ProcessedRecord =
  | {
      readonly status: 'success'
      readonly raw: RawMessage
      readonly user: ResolvedUser
      readonly extraction: ExtractionResult
    }
  | {
      readonly status: 'failure'
      readonly raw: RawMessage
      readonly user: ResolvedUser
      readonly error: ErrorKind
    }

/**
 * Outcome of one run. `total === succeeded + failed === records.length`,
 * and records are in retrieval order.
 */
export interface RunReport {
  readonly total: number
  readonly succeeded: number
  readonly failed: number
  readonly records: readonly ProcessedRecord[]
}

export type OutputFormat = 'json' | 'csv'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv']
