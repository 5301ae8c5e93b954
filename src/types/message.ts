/**
 * Message Types
 *
 * Channel messages as retrieved, and the channel source boundary.
 */

import type { Result } from './common'

/**
 * A single message retrieved from the channel. Never mutated after retrieval.
 */
export interface RawMessage {
  readonly authorId: string
  readonly timestamp: Date
  readonly text: string
  readonly channelId: string
  /** Parent thread timestamp when the message is a thread reply */
  readonly threadTs: string | null
}

export interface ResolvedUser {
  readonly id: string
  readonly displayName: string
}

export interface HistoryRequest {
  readonly channelId: string
  /** null for the first page */
  readonly cursor: string | null
  readonly pageSize: number
}

/**
 * One page of channel history. Messages without an author
 * (bots, system events) have already been dropped by the source.
 */
export interface ChannelPage {
  readonly messages: readonly RawMessage[]
  /** null when the history is exhausted */
  readonly nextCursor: string | null
}

export interface ConnectionInfo {
  readonly user: string
  readonly team: string
}

/**
 * Paged history and user lookup for one chat system.
 */
export interface ChannelSource {
  fetchHistory(request: HistoryRequest): Promise<Result<ChannelPage>>
  /** Resolves to null when the user does not exist */
  lookupUser(userId: string): Promise<Result<string | null>>
  testConnection(): Promise<Result<ConnectionInfo>>
}

export interface MessageFilter {
  /** Only keep messages by this author */
  readonly authorId?: string | undefined
  /** Stop after this many matching messages (0 or absent = no cap) */
  readonly limit?: number | undefined
}

export interface ChannelUserSummary {
  readonly user: ResolvedUser
  readonly messageCount: number
}
