/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import { VERSION } from '../index'

export type CommandName = 'run' | 'list-users' | 'test-connectivity' | 'show-config' | 'help'

const COMMANDS: readonly CommandName[] = ['run', 'list-users', 'test-connectivity', 'show-config']

export interface CLIArgs {
  command: CommandName
  /** Only process messages by this Slack user id */
  user: string | undefined
  /** Message cap; undefined falls back to MAX_MESSAGES */
  limit: number | undefined
  /** Output format as typed; validated when settings are resolved */
  format: string | undefined
  outputDir: string | undefined
  concurrency: number | undefined
  maxRetries: number | undefined
  /** Print the first records after a run */
  show: boolean
  quiet: boolean
  verbose: boolean
  configFile: string | undefined
}

const DESCRIPTION = `Summarize progress updates posted in a Slack channel.

Each message is sent to a language model that splits it into the progress it
reports and the next steps it announces. Results are written as JSON or CSV.

Examples:
  $ progress-digest run --limit 50
  $ progress-digest run --user U012AB3CD --format csv
  $ progress-digest list-users
  $ progress-digest test-connectivity`

function createProgram(): Command {
  const program = new Command()
    .name('progress-digest')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--config-file <path>', 'Config file path (or set PROGRESS_DIGEST_CONFIG)')

  // ============ RUN ============
  program
    .command('run')
    .description('Fetch messages, extract progress and next steps, and write a report')
    .option('-u, --user <id>', 'Only process messages from this Slack user id')
    .option('-l, --limit <num>', 'Max messages to process (default: MAX_MESSAGES or 100)')
    .option('-f, --format <format>', 'Output format: json or csv (default: OUTPUT_FORMAT)')
    .option('-o, --output-dir <dir>', 'Output directory (default: OUTPUT_DIR or ./output)')
    .option('-c, --concurrency <num>', 'Messages extracted in parallel (default: 1)')
    .option('--max-retries <num>', 'Attempts per rate-limited message (default: 3)')
    .option('--no-show', 'Do not print the first records after the run')

  // ============ LIST-USERS ============
  program
    .command('list-users')
    .description('List the authors in the channel with their message counts')
    .option('-l, --limit <num>', 'Max messages to scan (default: MAX_MESSAGES or 100)')

  // ============ TEST-CONNECTIVITY ============
  program
    .command('test-connectivity')
    .description('Check the Slack token and run one sample extraction')

  // ============ SHOW-CONFIG ============
  program.command('show-config').description('Show resolved settings (secrets masked)')

  return program
}

function parseCommandName(name: string): CommandName {
  return COMMANDS.find((c) => c === name) ?? 'help'
}

/**
 * Integers are parsed here; range checks happen when settings are resolved.
 */
function parseInteger(value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined
  const text = String(value).trim()
  return /^-?\d+$/.test(text) ? Number.parseInt(text, 10) : Number.NaN
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function buildCLIArgs(commandName: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: parseCommandName(commandName),
    user: optionalString(opts.user),
    limit: parseInteger(opts.limit),
    format: optionalString(opts.format),
    outputDir: optionalString(opts.outputDir),
    concurrency: parseInteger(opts.concurrency),
    maxRetries: parseInteger(opts.maxRetries),
    show: opts.show !== false,
    quiet: opts.quiet === true,
    verbose: opts.verbose === true,
    configFile: optionalString(opts.configFile)
  }
}

function attachActions(program: Command, capture: (args: CLIArgs) => void): void {
  // optsWithGlobals() includes global options from the parent program
  for (const cmd of program.commands) {
    cmd.action(() => {
      capture(buildCLIArgs(cmd.name(), cmd.optsWithGlobals()))
    })
  }
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program = createProgram()

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  program.parse()

  if (!result) {
    program.help()
  }

  return result ?? buildCLIArgs('help', {})
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    program.configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
  }

  let result: CLIArgs | null = null
  attachActions(program, (args) => {
    result = args
  })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help, version and usage errors
    if (exitOnHelp) throw error
  }

  return result ?? buildCLIArgs('help', {})
}
