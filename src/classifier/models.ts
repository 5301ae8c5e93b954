/**
 * Model Defaults
 *
 * Default models and API-key environment variables for each provider.
 */

import type { LLMProvider } from '../types'

/** Default models for each provider. */
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-haiku-4-5',
  openrouter: 'google/gemini-2.5-flash'
}

export const VALID_PROVIDERS: readonly LLMProvider[] = ['openai', 'anthropic', 'openrouter']

export function isValidProvider(value: string): value is LLMProvider {
  return VALID_PROVIDERS.some((p) => p === value)
}

/**
 * Get the API key environment variable for a provider.
 */
export function getRequiredApiKeyEnvVar(provider: LLMProvider): string {
  switch (provider) {
    case 'openrouter':
      return 'OPENROUTER_API_KEY'
    case 'anthropic':
      return 'ANTHROPIC_API_KEY'
    case 'openai':
      return 'OPENAI_API_KEY'
  }
}
