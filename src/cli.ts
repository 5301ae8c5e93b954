#!/usr/bin/env node
/**
 * Progress Digest CLI
 *
 * Local orchestrator for the core library.
 * Handles settings, cancellation, progress reporting and exit codes.
 *
 * @license AGPL-3.0
 */

import { parseCliArgs } from './cli/args'
import { cmdListUsers } from './cli/commands/list-users'
import { cmdRun } from './cli/commands/run'
import { cmdShowConfig } from './cli/commands/show-config'
import { cmdTestConnectivity } from './cli/commands/test-connectivity'
import type { LogLevel } from './cli/config'
import { loadSettings } from './cli/helpers'
import { createLogger, type Logger } from './cli/logger'
import { RunCancelledError } from './errors'

/** Conventional exit status for a process stopped by SIGINT */
const EXIT_CANCELLED = 130

function loggerForLevel(quiet: boolean, level: LogLevel): Logger {
  return createLogger(quiet || level === 'warn' || level === 'error', level === 'debug')
}

async function main(): Promise<void> {
  const args = parseCliArgs()
  let logger = createLogger(args.quiet, args.verbose)

  const controller = new AbortController()
  process.once('SIGINT', () => {
    logger.warn('Interrupted; cancelling run...')
    controller.abort()
  })

  try {
    const settings = await loadSettings(args)
    logger = loggerForLevel(args.quiet, settings.logLevel)

    switch (args.command) {
      case 'run':
        await cmdRun(args, settings, logger, { signal: controller.signal })
        break

      case 'list-users':
        await cmdListUsers(settings, logger)
        break

      case 'test-connectivity': {
        const result = await cmdTestConnectivity(settings, logger, { signal: controller.signal })
        if (!result.slack || !result.extraction) {
          process.exit(1)
        }
        break
      }

      case 'show-config':
        cmdShowConfig(settings, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'progress-digest --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    if (error instanceof RunCancelledError) {
      logger.error('Run cancelled; no report written')
      process.exit(EXIT_CANCELLED)
    }
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
