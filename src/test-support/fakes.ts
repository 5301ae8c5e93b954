/**
 * In-process stand-ins for the Slack and completion services.
 */

import { vi } from 'vitest'
import type {
  ApiError,
  ChannelPage,
  ChannelSource,
  CompletionService,
  ConnectionInfo,
  ExtractionPrompt,
  HistoryRequest,
  RawMessage,
  Result
} from '../types'

export interface FakeChannelOptions {
  /** Page N is reached with cursor "page-N" */
  pages?: RawMessage[][]
  historyError?: ApiError
  users?: Record<string, string>
  connection?: Result<ConnectionInfo>
  /** Cursor returned after every page, regardless of position */
  stuckCursor?: string
}

export function createFakeChannelSource(options: FakeChannelOptions = {}) {
  const pages = options.pages ?? []
  const requests: HistoryRequest[] = []

  const fetchHistory = vi.fn(async (request: HistoryRequest): Promise<Result<ChannelPage>> => {
    requests.push(request)
    if (options.historyError) return { ok: false, error: options.historyError }

    const index = request.cursor ? Number(request.cursor.replace('page-', '')) : 0
    const nextCursor =
      options.stuckCursor ?? (index + 1 < pages.length ? `page-${index + 1}` : null)
    return { ok: true, value: { messages: pages[index] ?? [], nextCursor } }
  })
  const lookupUser = vi.fn(
    async (userId: string): Promise<Result<string | null>> => ({
      ok: true,
      value: options.users?.[userId] ?? null
    })
  )
  const testConnection = vi.fn(
    async (): Promise<Result<ConnectionInfo>> =>
      options.connection ?? { ok: true, value: { user: 'digest-bot', team: 'Test Team' } }
  )

  const source: ChannelSource = { fetchHistory, lookupUser, testConnection }
  return { source, requests, fetchHistory, lookupUser, testConnection }
}

/**
 * Completion service answering from a function of the prompt's user text.
 */
export function createFakeCompletionService(
  reply: (userPrompt: string) => Result<string> | string
) {
  const prompts: ExtractionPrompt[] = []
  const complete = vi.fn(async (prompt: ExtractionPrompt): Promise<Result<string>> => {
    prompts.push(prompt)
    const answer = reply(prompt.user)
    return typeof answer === 'string' ? { ok: true, value: answer } : answer
  })

  const service: CompletionService = { complete }
  return { service, prompts, complete }
}

/**
 * Logger that records every line instead of printing.
 */
export function createTestLogger() {
  const lines: string[] = []
  const record = (prefix: string) =>
    vi.fn((msg: string) => {
      lines.push(`${prefix}${msg}`)
    })

  const logger = {
    log: record(''),
    verbose: record('[debug] '),
    success: record('✓ '),
    warn: record('⚠ '),
    error: record('✗ '),
    progress: vi.fn()
  }
  return { logger, lines }
}
