/**
 * AI Provider API Clients
 *
 * HTTP clients for Anthropic, OpenAI, and OpenRouter APIs.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { CompletionService, ExtractionPrompt, ProviderConfig, Result } from '../types'
import { DEFAULT_MODELS } from './models'

/** Extraction answers are two short sections */
const MAX_OUTPUT_TOKENS = 500
const TEMPERATURE = 0.3

interface AnthropicResponse {
  content: Array<{ type: string; text: string }>
}

interface OpenAIResponse {
  choices: Array<{ message: { content: string | null } }>
}

/**
 * Call Anthropic Claude API.
 */
async function callAnthropic(
  prompt: ExtractionPrompt,
  config: ProviderConfig,
  signal?: AbortSignal
): Promise<Result<string>> {
  const model = config.model ?? DEFAULT_MODELS.anthropic

  try {
    const response = await httpFetch('https://api.anthropic.com/v1/messages', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': config.apiKey,
        'anthropic-version': '2023-06-01'
      },
      body: JSON.stringify({
        model,
        max_tokens: MAX_OUTPUT_TOKENS,
        temperature: TEMPERATURE,
        system: prompt.system,
        messages: [{ role: 'user', content: prompt.user }]
      }),
      signal: signal ?? null
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as AnthropicResponse
    const text = data.content[0]?.text
    return text ? { ok: true, value: text } : emptyResponseError()
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Call OpenAI-compatible API (OpenAI or OpenRouter).
 */
async function callOpenAICompatible(
  url: string,
  prompt: ExtractionPrompt,
  config: ProviderConfig,
  defaultModel: string,
  signal?: AbortSignal
): Promise<Result<string>> {
  const model = config.model ?? defaultModel

  try {
    const response = await httpFetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${config.apiKey}` },
      body: JSON.stringify({
        model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user }
        ],
        temperature: TEMPERATURE,
        max_tokens: MAX_OUTPUT_TOKENS
      }),
      signal: signal ?? null
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as OpenAIResponse
    const text = data.choices[0]?.message?.content
    return text ? { ok: true, value: text } : emptyResponseError()
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Call a single AI provider.
 */
export async function callProvider(
  prompt: ExtractionPrompt,
  config: ProviderConfig,
  signal?: AbortSignal
): Promise<Result<string>> {
  switch (config.provider) {
    case 'anthropic':
      return callAnthropic(prompt, config, signal)
    case 'openai':
      return callOpenAICompatible(
        'https://api.openai.com/v1/chat/completions',
        prompt,
        config,
        DEFAULT_MODELS.openai,
        signal
      )
    case 'openrouter':
      return callOpenAICompatible(
        'https://openrouter.ai/api/v1/chat/completions',
        prompt,
        config,
        DEFAULT_MODELS.openrouter,
        signal
      )
  }
}

/**
 * Completion service backed by one of the HTTP providers.
 */
export function createProviderService(config: ProviderConfig): CompletionService {
  return {
    complete: (prompt, signal) => callProvider(prompt, config, signal)
  }
}
