/**
 * CLI Configuration
 *
 * Resolves run settings from flags, environment variables and an optional
 * JSON config file at ~/.config/progress-digest/config.json (XDG standard).
 * A custom config file location comes from --config-file or PROGRESS_DIGEST_CONFIG.
 *
 * Precedence: command-line flags > environment > config file > defaults.
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { DEFAULT_MODELS, getRequiredApiKeyEnvVar, isValidProvider } from '../classifier'
import { ConfigError } from '../errors'
import {
  type LLMProvider,
  OUTPUT_FORMATS,
  type OutputFormat,
  type ProviderConfig
} from '../types'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

type Env = Readonly<Record<string, string | undefined>>

/**
 * Settings persisted in the config file. Secrets are never read from it.
 */
export interface FileConfig {
  channelId?: string | undefined
  provider?: string | undefined
  model?: string | undefined
  logLevel?: string | undefined
  outputFormat?: string | undefined
  maxMessages?: number | undefined
  outputDir?: string | undefined
  /** History page size (default 200) */
  pageSize?: number | undefined
  /** Extraction workers (default 1) */
  concurrency?: number | undefined
  /** Attempts for a rate-limited message (default 3) */
  maxRetries?: number | undefined
}

const STRING_KEYS = [
  'channelId',
  'provider',
  'model',
  'logLevel',
  'outputFormat',
  'outputDir'
] as const
const NUMBER_KEYS = ['maxMessages', 'pageSize', 'concurrency', 'maxRetries'] as const

/**
 * Values given on the command line. Undefined means "not given".
 */
export interface SettingsOverrides {
  readonly limit?: number | undefined
  readonly format?: string | undefined
  readonly outputDir?: string | undefined
  readonly concurrency?: number | undefined
  readonly maxRetries?: number | undefined
  readonly verbose?: boolean | undefined
}

/**
 * Fully resolved, immutable settings for one invocation.
 * Missing credentials are null; commands that need them call requireSlack/requireProvider.
 */
export interface Settings {
  readonly slackToken: string | null
  readonly channelId: string | null
  readonly provider: LLMProvider
  readonly apiKey: string | null
  readonly model: string
  readonly logLevel: LogLevel
  readonly outputFormat: OutputFormat
  readonly maxMessages: number
  readonly outputDir: string
  readonly pageSize: number
  readonly concurrency: number
  readonly maxRetries: number
  readonly configPath: string
}

export const DEFAULT_SETTINGS = {
  provider: 'openai',
  logLevel: 'info',
  outputFormat: 'json',
  maxMessages: 100,
  outputDir: 'output',
  pageSize: 200,
  concurrency: 1,
  maxRetries: 3
} as const satisfies Partial<Settings>

/**
 * Get XDG config directory path for progress-digest.
 * Uses ~/.config/progress-digest on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'progress-digest')
}

/**
 * Get the config file path.
 * Priority: configFile arg > PROGRESS_DIGEST_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string, env: Env = process.env): string {
  if (configFile) {
    return configFile
  }
  if (env.PROGRESS_DIGEST_CONFIG) {
    return env.PROGRESS_DIGEST_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Keep the known keys of a parsed config file, checking their types.
 */
export function parseFileConfig(data: unknown, path = 'config file'): FileConfig {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ConfigError(`Invalid ${path}: expected a JSON object`)
  }

  const config: FileConfig = {}
  for (const [key, value] of Object.entries(data)) {
    if (value === null || value === undefined) continue

    const stringKey = STRING_KEYS.find((k) => k === key)
    if (stringKey) {
      if (typeof value !== 'string') {
        throw new ConfigError(`Invalid ${path}: ${key} must be a string`)
      }
      config[stringKey] = value
      continue
    }

    const numberKey = NUMBER_KEYS.find((k) => k === key)
    if (numberKey) {
      if (typeof value !== 'number') {
        throw new ConfigError(`Invalid ${path}: ${key} must be a number`)
      }
      config[numberKey] = value
    }
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist.
 *
 * @throws ConfigError when the file exists but is not valid config JSON
 */
export async function loadConfig(configFile?: string): Promise<FileConfig | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }

  const content = await readFile(path, 'utf-8')
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid config file ${path}: ${reason}`)
  }
  return parseFileConfig(data, `config file ${path}`)
}

/**
 * Read an integer from an env var, ignoring an inline `# comment`.
 */
export function parseIntegerSetting(name: string, raw: string): number {
  const cleaned = (raw.split('#')[0] ?? '').trim()
  const value = Number(cleaned)
  if (!cleaned || !Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`)
  }
  return value
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function requireAtLeast(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer of at least ${min}, got ${value}`)
  }
  return value
}

function parseProvider(value: string): LLMProvider {
  const normalized = value.toLowerCase()
  if (!isValidProvider(normalized)) {
    throw new ConfigError(
      `Unknown LLM provider "${value}" (expected openai, anthropic or openrouter)`
    )
  }
  return normalized
}

function parseLogLevel(value: string): LogLevel {
  const normalized = value.toLowerCase()
  const level = LOG_LEVELS.find((l) => l === normalized)
  if (!level) {
    throw new ConfigError(`Unknown log level "${value}" (expected debug, info, warn or error)`)
  }
  return level
}

function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.toLowerCase()
  const format = OUTPUT_FORMATS.find((f) => f === normalized)
  if (!format) {
    throw new ConfigError(`Unsupported output format "${value}" (expected json or csv)`)
  }
  return format
}

/**
 * Merge flags, environment and config file into settings.
 *
 * @throws ConfigError for values that are present but invalid
 */
export function resolveSettings(
  env: Env,
  file: FileConfig | null,
  overrides: SettingsOverrides = {},
  configPath: string = getConfigPath(undefined, env)
): Settings {
  const fileConfig: FileConfig = file ?? {}

  const provider = parseProvider(
    nonEmpty(env.LLM_PROVIDER) ?? fileConfig.provider ?? DEFAULT_SETTINGS.provider
  )
  const model =
    nonEmpty(env.LLM_MODEL) ??
    (provider === 'openai' ? nonEmpty(env.OPENAI_MODEL) : undefined) ??
    fileConfig.model ??
    DEFAULT_MODELS[provider]

  const envMaxMessages = nonEmpty(env.MAX_MESSAGES)
  const maxMessages =
    overrides.limit ??
    (envMaxMessages !== undefined
      ? parseIntegerSetting('MAX_MESSAGES', envMaxMessages)
      : undefined) ??
    fileConfig.maxMessages ??
    DEFAULT_SETTINGS.maxMessages

  const logLevel = overrides.verbose
    ? 'debug'
    : parseLogLevel(nonEmpty(env.LOG_LEVEL) ?? fileConfig.logLevel ?? DEFAULT_SETTINGS.logLevel)

  return {
    slackToken: nonEmpty(env.SLACK_BOT_TOKEN) ?? null,
    channelId: nonEmpty(env.SLACK_CHANNEL_ID) ?? fileConfig.channelId ?? null,
    provider,
    apiKey: nonEmpty(env[getRequiredApiKeyEnvVar(provider)]) ?? null,
    model,
    logLevel,
    outputFormat: parseOutputFormat(
      overrides.format ??
        nonEmpty(env.OUTPUT_FORMAT) ??
        fileConfig.outputFormat ??
        DEFAULT_SETTINGS.outputFormat
    ),
    maxMessages: requireAtLeast('Message limit', maxMessages, 0),
    outputDir:
      overrides.outputDir ??
      nonEmpty(env.OUTPUT_DIR) ??
      fileConfig.outputDir ??
      DEFAULT_SETTINGS.outputDir,
    pageSize: requireAtLeast('pageSize', fileConfig.pageSize ?? DEFAULT_SETTINGS.pageSize, 1),
    concurrency: requireAtLeast(
      'Concurrency',
      overrides.concurrency ?? fileConfig.concurrency ?? DEFAULT_SETTINGS.concurrency,
      1
    ),
    maxRetries: requireAtLeast(
      'Max retries',
      overrides.maxRetries ?? fileConfig.maxRetries ?? DEFAULT_SETTINGS.maxRetries,
      1
    ),
    configPath
  }
}

/**
 * @throws ConfigError when the Slack token or channel is missing
 */
export function requireSlack(settings: Settings): { token: string; channelId: string } {
  const missing: string[] = []
  if (!settings.slackToken) missing.push('SLACK_BOT_TOKEN')
  if (!settings.channelId) missing.push('SLACK_CHANNEL_ID')
  if (!settings.slackToken || !settings.channelId) {
    throw new ConfigError(`Missing required settings: ${missing.join(', ')}`)
  }
  return { token: settings.slackToken, channelId: settings.channelId }
}

/**
 * @throws ConfigError when the chosen provider has no API key
 */
export function requireProvider(settings: Settings): ProviderConfig {
  if (!settings.apiKey) {
    const envVar = getRequiredApiKeyEnvVar(settings.provider)
    throw new ConfigError(`Missing required settings: ${envVar} (provider: ${settings.provider})`)
  }
  return { provider: settings.provider, apiKey: settings.apiKey, model: settings.model }
}

/**
 * Show only the ends of a secret.
 */
export function maskSecret(value: string | null): string {
  if (!value) return '(not set)'
  if (value.length <= 8) return '****'
  return `${value.slice(0, 4)}...${value.slice(-4)}`
}

/**
 * Settings as display rows, secrets masked.
 */
export function describeSettings(settings: Settings): Array<[string, string]> {
  return [
    ['Config file', settings.configPath],
    ['Slack token', maskSecret(settings.slackToken)],
    ['Channel', settings.channelId ?? '(not set)'],
    ['LLM provider', settings.provider],
    ['API key', maskSecret(settings.apiKey)],
    ['Model', settings.model],
    ['Log level', settings.logLevel],
    ['Output format', settings.outputFormat],
    ['Output dir', settings.outputDir],
    ['Max messages', String(settings.maxMessages)],
    ['Page size', String(settings.pageSize)],
    ['Concurrency', String(settings.concurrency)],
    ['Max retries', String(settings.maxRetries)]
  ]
}
