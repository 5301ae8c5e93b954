/**
 * Pipeline Module
 *
 * One run: retrieve messages, resolve their authors, extract each message
 * through a bounded worker pool with per-message retry, and assemble the
 * run report in retrieval order.
 */

import { type MessageRetriever, placeholderUser } from '../channel'
import type { MessageExtractor } from '../classifier'
import { RunCancelledError } from '../errors'
import type {
  ExtractionOutcome,
  MessageFilter,
  ProcessedRecord,
  RawMessage,
  ResolvedUser,
  RunReport
} from '../types'
import { raceAbort, throwIfCancelled } from './abort'
import {
  DEFAULT_RETRY_POLICY,
  defaultSleep,
  nextRetryState,
  type RetryPolicy,
  type RetryState,
  type SleepFn
} from './retry'
import { runWorkerPool } from './worker-pool'

export { raceAbort, throwIfCancelled } from './abort'
export {
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  defaultSleep,
  nextRetryState,
  type RetryEvent,
  type RetryPolicy,
  type RetryState,
  type SleepFn
} from './retry'
export { runWorkerPool, type WorkerPoolOptions, type WorkerPoolResult } from './worker-pool'

export interface PipelinePolicy extends RetryPolicy {
  /** Messages extracted at the same time (default 1, sequential) */
  readonly concurrency: number
}

export const DEFAULT_PIPELINE_POLICY: PipelinePolicy = {
  ...DEFAULT_RETRY_POLICY,
  concurrency: 1
}

export interface PipelineDeps {
  readonly retriever: MessageRetriever
  readonly extractor: MessageExtractor
  /** Backoff sleep; replaced in tests */
  readonly sleep?: SleepFn | undefined
}

interface MessageCompleteInfo {
  readonly record: ProcessedRecord
  readonly index: number
  readonly completed: number
  readonly total: number
}

interface RetryInfo {
  readonly message: RawMessage
  readonly index: number
  /** Attempt that was rate limited (1-based) */
  readonly attempt: number
  readonly delayMs: number
  readonly reason: string
}

export interface PipelineOptions {
  readonly signal?: AbortSignal | undefined
  /** Called once retrieval finishes, before any extraction */
  readonly onRetrieved?: ((count: number) => void) | undefined
  readonly onMessageComplete?: ((info: MessageCompleteInfo) => void) | undefined
  readonly onRetry?: ((info: RetryInfo) => void) | undefined
}

async function resolveAuthors(
  retriever: MessageRetriever,
  messages: readonly RawMessage[],
  signal: AbortSignal | undefined
): Promise<Map<string, ResolvedUser>> {
  const ids = [...new Set(messages.map((m) => m.authorId))]
  const users = await raceAbort(
    Promise.all(ids.map((id) => retriever.resolveUser(id))),
    signal
  )
  return new Map(users.map((user) => [user.id, user]))
}

/**
 * Call the extractor once. A throwing extractor counts as a service error for
 * this message only; an abort rejects with RunCancelledError.
 */
async function attemptExtraction(
  extractor: MessageExtractor,
  message: RawMessage,
  signal: AbortSignal | undefined
): Promise<ExtractionOutcome> {
  try {
    return await raceAbort(extractor.extract(message, signal), signal)
  } catch (error) {
    if (error instanceof RunCancelledError || signal?.aborted) {
      throw new RunCancelledError()
    }
    return {
      ok: false,
      error: {
        reason: 'service_error',
        message: error instanceof Error ? error.message : String(error)
      }
    }
  }
}

async function backoff(sleep: SleepFn, ms: number, signal: AbortSignal | undefined) {
  try {
    await sleep(ms, signal)
  } catch (error) {
    if (signal?.aborted) throw new RunCancelledError()
    throw error
  }
  throwIfCancelled(signal)
}

function wholeAtLeast(value: number | undefined, min: number, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value >= min ? value : fallback
}

function delayOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback
}

/**
 * Fill in defaults. Values that are not usable (NaN, fractions, below the
 * minimum) fall back to the default for that field.
 */
export function resolvePipelinePolicy(policy: Partial<PipelinePolicy> = {}): PipelinePolicy {
  const defaults = DEFAULT_PIPELINE_POLICY
  return {
    concurrency: wholeAtLeast(policy.concurrency, 1, defaults.concurrency),
    maxRetries: wholeAtLeast(policy.maxRetries, 1, defaults.maxRetries),
    baseDelayMs: delayOr(policy.baseDelayMs, defaults.baseDelayMs),
    maxDelayMs: delayOr(policy.maxDelayMs, defaults.maxDelayMs)
  }
}

function summarize(records: readonly ProcessedRecord[]): RunReport {
  const succeeded = records.filter((r) => r.status === 'success').length
  return {
    total: records.length,
    succeeded,
    failed: records.length - succeeded,
    records
  }
}

/**
 * Run the pipeline once.
 *
 * @throws RetrievalError when the channel cannot be read
 * @throws RunCancelledError when the signal aborts before the report is complete
 */
export async function runPipeline(
  deps: PipelineDeps,
  filter: MessageFilter = {},
  policy: Partial<PipelinePolicy> = {},
  options: PipelineOptions = {}
): Promise<RunReport> {
  const { retriever, extractor } = deps
  const sleep = deps.sleep ?? defaultSleep
  const resolved = resolvePipelinePolicy(policy)
  const { signal } = options

  throwIfCancelled(signal)
  const messages = await raceAbort(retriever.fetch(filter), signal)
  options.onRetrieved?.(messages.length)

  const users = await resolveAuthors(retriever, messages, signal)

  const processMessage = async (message: RawMessage, index: number): Promise<ProcessedRecord> => {
    const user = users.get(message.authorId) ?? placeholderUser(message.authorId)
    let state: RetryState = nextRetryState({ phase: 'pending' }, { type: 'start' }, resolved)

    for (;;) {
      switch (state.phase) {
        case 'pending':
          state = nextRetryState(state, { type: 'start' }, resolved)
          break
        case 'attempting': {
          const outcome = await attemptExtraction(extractor, message, signal)
          state = nextRetryState(state, { type: 'outcome', outcome }, resolved)
          break
        }
        case 'rate_limited_retry':
          options.onRetry?.({
            message,
            index,
            attempt: state.attempt,
            delayMs: state.delayMs,
            reason: state.message
          })
          await backoff(sleep, state.delayMs, signal)
          state = nextRetryState(state, { type: 'backoff_elapsed' }, resolved)
          break
        case 'succeeded':
          return { status: 'success', raw: message, user, extraction: state.result }
        case 'failed':
          return { status: 'failure', raw: message, user, error: state.error }
      }
    }
  }

  const pool = await runWorkerPool(messages, processMessage, {
    concurrency: resolved.concurrency,
    signal,
    onProgress: ({ result, index, completed, total }) =>
      options.onMessageComplete?.({ record: result, index, completed, total })
  })

  throwIfCancelled(signal)
  const failure = pool.errors[0]
  if (failure) {
    throw failure.error
  }

  return summarize(pool.successes)
}
