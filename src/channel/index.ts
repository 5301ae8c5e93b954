/**
 * Channel Module
 *
 * Retrieval adapter over a ChannelSource: pages the history, applies the
 * author filter and message cap, and resolves author ids to display names.
 */

import { RetrievalError } from '../errors'
import type {
  ApiError,
  ChannelPage,
  ChannelSource,
  ChannelUserSummary,
  MessageFilter,
  RawMessage,
  ResolvedUser,
  Result
} from '../types'

export { mapSlackError, type SlackConfig, SlackChannelSource, slackTsToDate } from './slack'

export const DEFAULT_PAGE_SIZE = 200

interface UserLookupFailure {
  readonly userId: string
  readonly reason: string
}

export interface RetrievalConfig {
  readonly channelId: string
  /** Messages requested per history page (default 200) */
  readonly pageSize?: number | undefined
  /** Called when a user could not be resolved and a placeholder name was used */
  readonly onUserLookupFailed?: ((info: UserLookupFailure) => void) | undefined
}

/**
 * What the pipeline needs from retrieval.
 */
export interface MessageRetriever {
  fetch(filter?: MessageFilter): Promise<RawMessage[]>
  resolveUser(userId: string): Promise<ResolvedUser>
}

export function placeholderUser(userId: string): ResolvedUser {
  return { id: userId, displayName: `user_${userId}` }
}

function toRetrievalError(error: ApiError): RetrievalError {
  switch (error.type) {
    case 'auth':
      return new RetrievalError('auth_failure', error.message)
    case 'not_found':
      return new RetrievalError('channel_not_found', error.message)
    default:
      return new RetrievalError('network_error', error.message)
  }
}

export class RetrievalAdapter implements MessageRetriever {
  private readonly source: ChannelSource
  private readonly channelId: string
  private readonly pageSize: number
  private readonly onUserLookupFailed: ((info: UserLookupFailure) => void) | undefined
  /**
   * One entry per user id; the promise is stored before the lookup starts.
   * Cleared by each fetch, so names are looked up again on every run.
   */
  private readonly users = new Map<string, Promise<ResolvedUser>>()

  constructor(source: ChannelSource, config: RetrievalConfig) {
    this.source = source
    this.channelId = config.channelId
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE
    this.onUserLookupFailed = config.onUserLookupFailed
  }

  /**
   * Retrieve messages newest first.
   *
   * The author filter is applied client-side, so `limit` counts matching
   * messages. A positive limit stops paging as soon as it is reached.
   * Starts a new run: user names resolved by an earlier fetch are forgotten.
   *
   * @throws RetrievalError when the channel cannot be read
   */
  async fetch(filter: MessageFilter = {}): Promise<RawMessage[]> {
    if (!this.channelId.trim()) {
      throw new RetrievalError('channel_not_found', 'No channel id configured')
    }

    this.users.clear()

    const limit = filter.limit && filter.limit > 0 ? filter.limit : Number.POSITIVE_INFINITY
    const collected: RawMessage[] = []
    const seenCursors = new Set<string>()
    let cursor: string | null = null

    do {
      const page = await this.fetchPage(cursor)
      if (!page.ok) {
        throw toRetrievalError(page.error)
      }

      for (const message of page.value.messages) {
        if (filter.authorId && message.authorId !== filter.authorId) continue
        collected.push(message)
        if (collected.length >= limit) {
          return collected
        }
      }

      cursor = page.value.nextCursor
      if (cursor !== null) {
        if (seenCursors.has(cursor)) {
          throw new RetrievalError('network_error', `Channel history repeated cursor ${cursor}`)
        }
        seenCursors.add(cursor)
      }
    } while (cursor !== null)

    return collected
  }

  /**
   * Resolve an author id, looking it up at most once per adapter.
   * Never rejects: failures fall back to a placeholder name.
   */
  resolveUser(userId: string): Promise<ResolvedUser> {
    const cached = this.users.get(userId)
    if (cached) return cached

    const pending = this.lookupUser(userId)
    this.users.set(userId, pending)
    return pending
  }

  /**
   * Distinct authors in the channel, most active first.
   */
  async listUsers(limit?: number): Promise<ChannelUserSummary[]> {
    const messages = await this.fetch({ limit })
    const counts = new Map<string, number>()
    for (const message of messages) {
      counts.set(message.authorId, (counts.get(message.authorId) ?? 0) + 1)
    }

    const summaries = await Promise.all(
      [...counts].map(async ([userId, messageCount]) => ({
        user: await this.resolveUser(userId),
        messageCount
      }))
    )
    return summaries.sort((a, b) => b.messageCount - a.messageCount)
  }

  private async fetchPage(cursor: string | null): Promise<Result<ChannelPage>> {
    try {
      return await this.source.fetchHistory({
        channelId: this.channelId,
        cursor,
        pageSize: this.pageSize
      })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new RetrievalError('network_error', `Channel history request failed: ${reason}`)
    }
  }

  private async lookupUser(userId: string): Promise<ResolvedUser> {
    let reason: string
    try {
      const result = await this.source.lookupUser(userId)
      if (result.ok && result.value) {
        return { id: userId, displayName: result.value }
      }
      reason = result.ok ? 'user not found' : result.error.message
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error)
    }

    this.onUserLookupFailed?.({ userId, reason })
    return placeholderUser(userId)
  }
}
