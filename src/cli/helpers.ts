/**
 * CLI Helpers
 *
 * Shared setup for CLI commands.
 */

import { RetrievalAdapter, SlackChannelSource } from '../channel'
import { createProviderService } from '../classifier'
import type { SleepFn } from '../pipeline'
import type { ChannelSource, CompletionService } from '../types'
import type { CLIArgs } from './args'
import {
  getConfigPath,
  loadConfig,
  requireProvider,
  requireSlack,
  resolveSettings,
  type Settings
} from './config'
import type { Logger } from './logger'

/**
 * Collaborators a command may be given instead of the real services.
 */
export interface CommandServices {
  readonly source?: ChannelSource | undefined
  readonly completion?: CompletionService | undefined
  readonly sleep?: SleepFn | undefined
  readonly signal?: AbortSignal | undefined
  /** Clock for report file names */
  readonly now?: Date | undefined
}

/**
 * Resolve settings for this invocation from flags, environment and config file.
 */
export async function loadSettings(
  args: CLIArgs,
  env: Readonly<Record<string, string | undefined>> = process.env
): Promise<Settings> {
  const configPath = getConfigPath(args.configFile, env)
  const fileConfig = await loadConfig(configPath)
  return resolveSettings(
    env,
    fileConfig,
    {
      limit: args.limit,
      format: args.format,
      outputDir: args.outputDir,
      concurrency: args.concurrency,
      maxRetries: args.maxRetries,
      verbose: args.verbose
    },
    configPath
  )
}

/**
 * Retrieval adapter for the configured channel; lookup failures become warnings.
 */
export function createRetriever(
  settings: Settings,
  logger: Logger,
  services: CommandServices
): RetrievalAdapter {
  const slack = requireSlack(settings)
  const source = services.source ?? new SlackChannelSource({ token: slack.token })
  return new RetrievalAdapter(source, {
    channelId: slack.channelId,
    pageSize: settings.pageSize,
    onUserLookupFailed: ({ userId, reason }) =>
      logger.warn(`Could not resolve user ${userId} (${reason}); using user_${userId}`)
  })
}

/**
 * The configured provider, unless a completion service was supplied.
 */
export function createCompletionService(
  settings: Settings,
  services: CommandServices
): CompletionService {
  return services.completion ?? createProviderService(requireProvider(settings))
}
