/**
 * Slack Channel Source
 *
 * Reads channel history and user profiles through the Slack Web API.
 * Bot messages and system events (joins, topic changes) are skipped.
 */

import { handleHttpError, handleNetworkError, httpFetch } from '../http'
import type {
  ApiError,
  ChannelPage,
  ChannelSource,
  ConnectionInfo,
  HistoryRequest,
  RawMessage,
  Result
} from '../types'

const SLACK_API_URL = 'https://slack.com/api'

export interface SlackConfig {
  readonly token: string
  readonly apiUrl?: string | undefined
}

interface SlackMessage {
  type?: string
  user?: string
  text?: string
  ts: string
  thread_ts?: string
  bot_id?: string
  subtype?: string
}

interface SlackEnvelope {
  ok: boolean
  error?: string
}

interface SlackHistoryResponse extends SlackEnvelope {
  messages?: SlackMessage[]
  has_more?: boolean
  response_metadata?: { next_cursor?: string }
}

interface SlackUserResponse extends SlackEnvelope {
  user?: {
    name?: string
    real_name?: string
    profile?: { display_name?: string; real_name?: string }
  }
}

interface SlackAuthResponse extends SlackEnvelope {
  user?: string
  team?: string
}

const AUTH_ERRORS = new Set([
  'invalid_auth',
  'not_authed',
  'account_inactive',
  'token_revoked',
  'token_expired',
  'missing_scope',
  'no_permission',
  'not_in_channel'
])

const NOT_FOUND_ERRORS = new Set(['channel_not_found', 'user_not_found'])

/**
 * Slack answers HTTP 200 with `ok: false` for most failures.
 */
export function mapSlackError(code: string | undefined): ApiError {
  const error = code ?? 'unknown_error'
  if (AUTH_ERRORS.has(error)) {
    return { type: 'auth', message: `Slack authentication failed: ${error}` }
  }
  if (NOT_FOUND_ERRORS.has(error)) {
    return { type: 'not_found', message: `Slack resource not found: ${error}` }
  }
  if (error === 'ratelimited') {
    return { type: 'rate_limit', message: 'Slack rate limit reached' }
  }
  return { type: 'network', message: `Slack API error: ${error}` }
}

/**
 * Convert a Slack "1712345678.000200" timestamp to a Date.
 */
export function slackTsToDate(ts: string): Date {
  return new Date(Math.round(Number.parseFloat(ts) * 1000))
}

/**
 * Human messages only: bots and subtyped system messages are dropped.
 */
function toRawMessage(msg: SlackMessage, channelId: string): RawMessage | null {
  if (msg.bot_id || msg.subtype || !msg.user) {
    return null
  }
  return {
    authorId: msg.user,
    timestamp: slackTsToDate(msg.ts),
    text: msg.text ?? '',
    channelId,
    threadTs: msg.thread_ts ?? null
  }
}

export class SlackChannelSource implements ChannelSource {
  private readonly token: string
  private readonly apiUrl: string

  constructor(config: SlackConfig) {
    this.token = config.token
    this.apiUrl = config.apiUrl ?? SLACK_API_URL
  }

  private async call<T extends SlackEnvelope>(
    method: string,
    params: Record<string, string>
  ): Promise<Result<T>> {
    const query = new URLSearchParams(params).toString()
    const url = `${this.apiUrl}/${method}${query ? `?${query}` : ''}`

    try {
      const response = await httpFetch(url, {
        method: 'GET',
        headers: { Authorization: `Bearer ${this.token}` }
      })

      if (!response.ok) return handleHttpError(response)

      const data = (await response.json()) as T
      if (!data.ok) {
        return { ok: false, error: mapSlackError(data.error) }
      }
      return { ok: true, value: data }
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  async fetchHistory(request: HistoryRequest): Promise<Result<ChannelPage>> {
    const params: Record<string, string> = {
      channel: request.channelId,
      limit: String(request.pageSize)
    }
    if (request.cursor) {
      params.cursor = request.cursor
    }

    const result = await this.call<SlackHistoryResponse>('conversations.history', params)
    if (!result.ok) return result

    const batch: unknown = result.value.messages ?? []
    if (!Array.isArray(batch)) {
      return {
        ok: false,
        error: { type: 'invalid_response', message: 'Slack history response has no message list' }
      }
    }

    const messages: RawMessage[] = []
    for (const msg of result.value.messages ?? []) {
      const raw = toRawMessage(msg, request.channelId)
      if (raw) messages.push(raw)
    }

    const nextCursor = result.value.response_metadata?.next_cursor
    return {
      ok: true,
      value: {
        messages,
        nextCursor: result.value.has_more && nextCursor ? nextCursor : null
      }
    }
  }

  async lookupUser(userId: string): Promise<Result<string | null>> {
    const result = await this.call<SlackUserResponse>('users.info', { user: userId })
    if (!result.ok) {
      return result.error.type === 'not_found' ? { ok: true, value: null } : result
    }

    const user = result.value.user
    const name = user?.profile?.display_name || user?.real_name || user?.name
    return { ok: true, value: name || null }
  }

  async testConnection(): Promise<Result<ConnectionInfo>> {
    const result = await this.call<SlackAuthResponse>('auth.test', {})
    if (!result.ok) return result

    return {
      ok: true,
      value: { user: result.value.user ?? 'unknown', team: result.value.team ?? 'unknown' }
    }
  }
}
