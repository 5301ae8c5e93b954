/**
 * Progress Digest Core Library
 *
 * Read a Slack channel, extract the progress and next steps each message
 * reports, and turn the results into JSON or CSV reports.
 *
 * The library does no console output. Progress, retries and lookup failures
 * are reported through callbacks; settings are passed in, never read from the
 * environment.
 *
 * @license AGPL-3.0
 */

// Channel module
export {
  DEFAULT_PAGE_SIZE,
  type MessageRetriever,
  mapSlackError,
  placeholderUser,
  RetrievalAdapter,
  type RetrievalConfig,
  type SlackConfig,
  SlackChannelSource,
  slackTsToDate
} from './channel/index'
// Classifier module
export {
  buildExtractionPrompt,
  callProvider,
  confidenceBand,
  createExtractionClient,
  createProviderService,
  DEFAULT_CONFIDENCE,
  DEFAULT_MODELS,
  type ExtractionClientConfig,
  extractMessage,
  getRequiredApiKeyEnvVar,
  isValidProvider,
  type MessageExtractor,
  parseExtractionResponse,
  SYSTEM_PROMPT,
  scoreConfidence
} from './classifier/index'
// Errors
export { ConfigError, RetrievalError, type RetrievalErrorKind, RunCancelledError } from './errors'
// Export module
export {
  CSV_COLUMNS,
  escapeCSV,
  type ExportMetadata,
  type ExportOptions,
  exportToCSV,
  exportToJSON,
  formatReport,
  parseJSON,
  reportFileName,
  type WriteReportOptions,
  writeReport
} from './export/index'
// HTTP helpers
export { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from './http'
// Pipeline module
export {
  backoffDelay,
  DEFAULT_PIPELINE_POLICY,
  DEFAULT_RETRY_POLICY,
  nextRetryState,
  type PipelineDeps,
  type PipelineOptions,
  type PipelinePolicy,
  type RetryEvent,
  type RetryPolicy,
  type RetryState,
  resolvePipelinePolicy,
  runPipeline,
  runWorkerPool,
  type SleepFn
} from './pipeline/index'
// Types
export * from './types/index'

export const VERSION = '0.1.0'
