/**
 * Classifier Module
 *
 * Use AI to split a channel message into the progress it reports
 * and the next steps it announces.
 */

import type {
  ApiError,
  CompletionService,
  ConfidenceConfig,
  ExtractionError,
  ExtractionOutcome,
  RawMessage
} from '../types'
import { DEFAULT_CONFIDENCE, scoreConfidence } from './confidence'
import { buildExtractionPrompt } from './prompt'
import { parseExtractionResponse } from './response-parser'

export { confidenceBand, DEFAULT_CONFIDENCE, scoreConfidence } from './confidence'
export {
  DEFAULT_MODELS,
  getRequiredApiKeyEnvVar,
  isValidProvider,
  VALID_PROVIDERS
} from './models'
export { buildExtractionPrompt, SYSTEM_PROMPT } from './prompt'
export { callProvider, createProviderService } from './providers'
export {
  cleanSection,
  type ParsedSections,
  type ParseFailure,
  parseExtractionResponse
} from './response-parser'

export interface ExtractionClientConfig {
  readonly confidence?: ConfidenceConfig | undefined
}

/**
 * Anything that can classify one message. The pipeline depends on this, not on HTTP.
 */
export interface MessageExtractor {
  extract(message: RawMessage, signal?: AbortSignal): Promise<ExtractionOutcome>
}

function toExtractionError(error: ApiError): ExtractionError {
  if (error.type === 'rate_limit') {
    return { reason: 'rate_limited', message: error.message, retryAfter: error.retryAfter }
  }
  return { reason: 'service_error', message: error.message }
}

/**
 * Extract progress and next steps from one message.
 *
 * Makes exactly one service call. Rate limiting is reported, not retried;
 * the caller owns the retry policy.
 */
export async function extractMessage(
  message: RawMessage,
  service: CompletionService,
  config: ExtractionClientConfig = {},
  signal?: AbortSignal
): Promise<ExtractionOutcome> {
  const prompt = buildExtractionPrompt(message)
  const response = await service.complete(prompt, signal)

  if (!response.ok) {
    return { ok: false, error: toExtractionError(response.error) }
  }

  const parsed = parseExtractionResponse(response.value)
  if (!parsed.ok) {
    return {
      ok: false,
      error: { reason: 'unparsable_response', message: parsed.error.message }
    }
  }

  const { progress, nextSteps } = parsed.value
  return {
    ok: true,
    value: {
      progress,
      nextSteps,
      confidence: scoreConfidence(parsed.value, config.confidence ?? DEFAULT_CONFIDENCE)
    }
  }
}

/**
 * Bind a completion service and config into a reusable extractor.
 */
export function createExtractionClient(
  service: CompletionService,
  config: ExtractionClientConfig = {}
): MessageExtractor {
  return {
    extract: (message, signal) => extractMessage(message, service, config, signal)
  }
}
