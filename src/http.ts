/**
 * HTTP Utilities
 *
 * Typed fetch wrapper and uniform error mapping for the Slack and LLM clients.
 */

import type { Result } from './types'

function isCI(): boolean {
  return process.env.CI === 'true'
}

function isTestMode(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'
}

/**
 * Tests must never reach a real service. In CI test runs every request is refused.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a real HTTP request is attempted from a CI test run.
 */
export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(`HTTP request to ${url} blocked: running tests in CI. Mock the service instead.`)
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws BlockedHttpRequestError when tests run in CI
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(url, init)
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined
  const seconds = Number.parseInt(value, 10)
  return Number.isNaN(seconds) ? undefined : seconds
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: parseRetryAfter(response.headers.get('retry-after'))
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  if (response.status === 404) {
    return { ok: false, error: { type: 'not_found', message: `Not found: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}
