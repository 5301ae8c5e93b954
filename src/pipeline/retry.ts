/**
 * Retry State Machine
 *
 * Per-message attempt tracking for rate-limited extraction calls:
 *
 *   pending → attempting → succeeded
 *                        → rate_limited_retry(n) → attempting
 *                        → failed
 *
 * Pure transitions; the orchestrator performs the calls and the sleeps.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { ErrorKind, ExtractionOutcome, ExtractionResult } from '../types'

export interface RetryPolicy {
  /** Attempts made for a message that stays rate-limited (default 3) */
  readonly maxRetries: number
  /** Delay before the second attempt; doubles after that (default 1000) */
  readonly baseDelayMs: number
  /** Upper bound for any single backoff, including server-requested ones (default 30000) */
  readonly maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000
}

export type RetryState =
  | { readonly phase: 'pending' }
  | { readonly phase: 'attempting'; readonly attempt: number }
  | {
      readonly phase: 'rate_limited_retry'
      readonly attempt: number
      readonly delayMs: number
      readonly message: string
    }
  | { readonly phase: 'succeeded'; readonly attempt: number; readonly result: ExtractionResult }
  | { readonly phase: 'failed'; readonly attempt: number; readonly error: ErrorKind }

export type RetryEvent =
  | { readonly type: 'start' }
  | { readonly type: 'outcome'; readonly outcome: ExtractionOutcome }
  | { readonly type: 'backoff_elapsed' }

/**
 * Sleep for `ms`, waking early (by rejecting) when the signal aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : {})
}

/**
 * Backoff before attempt `attempt + 1`.
 * A server-requested wait longer than the exponential delay wins; both are capped.
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  retryAfterSeconds?: number
): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1)
  const requested = retryAfterSeconds !== undefined ? retryAfterSeconds * 1000 : 0
  return Math.min(policy.maxDelayMs, Math.max(exponential, requested))
}

export function nextRetryState(
  state: RetryState,
  event: RetryEvent,
  policy: RetryPolicy
): RetryState {
  if (state.phase === 'pending' && event.type === 'start') {
    return { phase: 'attempting', attempt: 1 }
  }

  if (state.phase === 'attempting' && event.type === 'outcome') {
    const { outcome } = event
    if (outcome.ok) {
      return { phase: 'succeeded', attempt: state.attempt, result: outcome.value }
    }

    const { reason, message, retryAfter } = outcome.error
    if (reason !== 'rate_limited') {
      return { phase: 'failed', attempt: state.attempt, error: reason }
    }
    const budget = Number.isFinite(policy.maxRetries) ? Math.max(1, policy.maxRetries) : 1
    if (state.attempt >= budget) {
      return { phase: 'failed', attempt: state.attempt, error: 'rate_limit_exhausted' }
    }
    return {
      phase: 'rate_limited_retry',
      attempt: state.attempt,
      delayMs: backoffDelay(state.attempt, policy, retryAfter),
      message
    }
  }

  if (state.phase === 'rate_limited_retry' && event.type === 'backoff_elapsed') {
    return { phase: 'attempting', attempt: state.attempt + 1 }
  }

  throw new Error(`Invalid retry transition: ${state.phase} + ${event.type}`)
}
