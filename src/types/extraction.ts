/**
 * Extraction Types
 *
 * Types for progress/next-steps extraction and the completion service boundary.
 */

import type { Result } from './common'

export type LLMProvider = 'openai' | 'anthropic' | 'openrouter'

/**
 * Progress and next steps pulled from one message.
 * A null field means the message did not state it.
 */
export interface ExtractionResult {
  readonly progress: string | null
  readonly nextSteps: string | null
  /** 0-1 estimate of how cleanly the response was parsed */
  readonly confidence: number
}

export type ExtractionErrorReason = 'rate_limited' | 'service_error' | 'unparsable_response'

export interface ExtractionError {
  readonly reason: ExtractionErrorReason
  readonly message: string
  readonly retryAfter?: number | undefined
}

export type ExtractionOutcome = Result<ExtractionResult, ExtractionError>

export interface ExtractionPrompt {
  readonly system: string
  readonly user: string
}

/**
 * Text-completion boundary. Implementations must report HTTP 429 as `rate_limit`.
 */
export interface CompletionService {
  complete(prompt: ExtractionPrompt, signal?: AbortSignal): Promise<Result<string>>
}

export interface ProviderConfig {
  readonly provider: LLMProvider
  readonly apiKey: string
  readonly model?: string | undefined
}

export type ConfidenceBand = 'high' | 'medium' | 'low'

/**
 * Thresholds for the confidence heuristic.
 *
 * Both sections present and at least `minSectionLength` characters gives `high`;
 * one section (or two short ones) gives `medium`; a recognised response with
 * nothing in it gives `low`.
 */
export interface ConfidenceConfig {
  readonly high: number
  readonly medium: number
  readonly low: number
  readonly minSectionLength: number
}
