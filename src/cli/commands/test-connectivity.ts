/**
 * Test Connectivity Command
 *
 * Check the Slack token, then run one extraction of a fixed sample message.
 * The extraction check is skipped when Slack fails. A reply missing a section
 * still counts as connected and is only reported as a warning.
 */

import { SlackChannelSource } from '../../channel'
import { createExtractionClient } from '../../classifier'
import type { RawMessage } from '../../types'
import { requireSlack, type Settings } from '../config'
import { type CommandServices, createCompletionService } from '../helpers'
import type { Logger } from '../logger'

export const SAMPLE_MESSAGE_TEXT =
  'I completed the project setup yesterday. Next, I need to implement the API endpoints.'

export interface ConnectivityResult {
  readonly slack: boolean
  /** The provider answered and the reply parsed; false when skipped */
  readonly extraction: boolean
  /** The sample reply had both progress and next steps */
  readonly bothSections: boolean
}

function sampleMessage(channelId: string): RawMessage {
  return {
    authorId: 'sample',
    timestamp: new Date(),
    text: SAMPLE_MESSAGE_TEXT,
    channelId,
    threadTs: null
  }
}

export async function cmdTestConnectivity(
  settings: Settings,
  logger: Logger,
  services: CommandServices = {}
): Promise<ConnectivityResult> {
  const slackSettings = requireSlack(settings)
  const source = services.source ?? new SlackChannelSource({ token: slackSettings.token })

  logger.log('\n🔌 Slack')
  const connection = await source.testConnection()
  if (!connection.ok) {
    logger.error(`Slack connection failed: ${connection.error.message}`)
    return { slack: false, extraction: false, bothSections: false }
  }
  logger.success(`Connected as ${connection.value.user} (${connection.value.team})`)

  logger.log(`\n🤖 ${settings.provider} (${settings.model})`)
  const extractor = createExtractionClient(createCompletionService(settings, services))
  const outcome = await extractor.extract(sampleMessage(slackSettings.channelId), services.signal)

  if (!outcome.ok) {
    logger.error(`Extraction failed (${outcome.error.reason}): ${outcome.error.message}`)
    return { slack: true, extraction: false, bothSections: false }
  }

  const { progress, nextSteps, confidence } = outcome.value
  logger.log(`   Progress: ${progress ?? 'None identified'}`)
  logger.log(`   Next Steps: ${nextSteps ?? 'None identified'}`)
  logger.log(`   Confidence: ${confidence.toFixed(2)}`)

  const bothSections = progress !== null && nextSteps !== null
  if (bothSections) {
    logger.success('Extraction returned both sections')
  } else {
    logger.warn('Provider connected, but the sample extraction may need prompt tuning')
  }
  logger.success('All checks passed')

  return { slack: true, extraction: true, bothSections }
}
