/**
 * Run Command
 *
 * Fetch channel messages, extract progress and next steps from each one,
 * write the report and print a summary.
 */

import { createExtractionClient } from '../../classifier'
import { writeReport } from '../../export'
import { VERSION } from '../../index'
import { runPipeline } from '../../pipeline'
import type { RunReport } from '../../types'
import type { CLIArgs } from '../args'
import type { Settings } from '../config'
import { DEFAULT_PREVIEW_COUNT, printRecords, printSummary } from '../display'
import { type CommandServices, createCompletionService, createRetriever } from '../helpers'
import type { Logger } from '../logger'

export interface RunCommandResult {
  readonly report: RunReport
  /** Where the report was written */
  readonly path: string
}

/**
 * Execute the run command.
 *
 * @throws RetrievalError when the channel cannot be read
 * @throws RunCancelledError when the signal aborts; no report is written
 */
export async function cmdRun(
  args: CLIArgs,
  settings: Settings,
  logger: Logger,
  services: CommandServices = {}
): Promise<RunCommandResult> {
  const retriever = createRetriever(settings, logger, services)
  const extractor = createExtractionClient(createCompletionService(settings, services))
  const limit = settings.maxMessages

  logger.log(`\nprogress-digest run v${VERSION}`)
  logger.log(
    `\n📥 Fetching ${limit > 0 ? `up to ${limit}` : 'all'} messages` +
      (args.user ? ` from ${args.user}` : '')
  )

  const report = await runPipeline(
    { retriever, extractor, sleep: services.sleep },
    { authorId: args.user, limit },
    { concurrency: settings.concurrency, maxRetries: settings.maxRetries },
    {
      signal: services.signal,
      onRetrieved: (count) => {
        logger.log(`   Found ${count} messages`)
        if (count > 0) {
          logger.log(`\n🤖 Extracting with ${settings.provider} (${settings.model})`)
        }
      },
      onMessageComplete: ({ completed, total }) =>
        logger.progress(`${completed}/${total}`, completed, total),
      onRetry: ({ index, attempt, delayMs, reason }) =>
        logger.verbose(
          `Message ${index + 1}: ${reason}; retrying (attempt ${attempt + 1}) in ${delayMs}ms`
        )
    }
  )

  if (report.total === 0) {
    logger.warn('No messages found; writing an empty report')
  }

  const path = await writeReport(report, {
    format: settings.outputFormat,
    outputDir: settings.outputDir,
    now: services.now,
    channelId: settings.channelId ?? undefined
  })
  logger.success(`Saved ${report.total} records to ${path}`)

  printSummary(report, logger)
  if (args.show) {
    printRecords(report, logger, DEFAULT_PREVIEW_COUNT)
  }

  return { report, path }
}
