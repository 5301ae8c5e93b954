/**
 * List Users Command
 *
 * Show who posts in the channel, most active first.
 */

import type { ChannelUserSummary } from '../../types'
import type { Settings } from '../config'
import { type CommandServices, createRetriever } from '../helpers'
import type { Logger } from '../logger'

export function formatUserRows(users: readonly ChannelUserSummary[]): string[] {
  const width = Math.max(0, ...users.map((u) => u.user.displayName.length))
  return users.map(({ user, messageCount }) => {
    const noun = messageCount === 1 ? 'message' : 'messages'
    return `  ${user.displayName.padEnd(width)}  ${user.id}  ${messageCount} ${noun}`
  })
}

export async function cmdListUsers(
  settings: Settings,
  logger: Logger,
  services: CommandServices = {}
): Promise<ChannelUserSummary[]> {
  const retriever = createRetriever(settings, logger, services)
  const users = await retriever.listUsers(settings.maxMessages)

  if (users.length === 0) {
    logger.log('\nNo messages found in the channel.')
    return users
  }

  const scanned = users.reduce((sum, u) => sum + u.messageCount, 0)
  logger.log(`\n👥 ${users.length} users in the last ${scanned} messages:\n`)
  for (const row of formatUserRows(users)) {
    logger.log(row)
  }
  return users
}
