/**
 * Report Display
 *
 * Console summary of a run and a preview of its first records.
 */

import { formatConfidence } from '../export'
import type { ProcessedRecord, RunReport } from '../types'
import type { Logger } from './logger'

const RULE = '='.repeat(50)
const THIN_RULE = '-'.repeat(50)

export const DEFAULT_PREVIEW_COUNT = 5

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text
  return `${text.slice(0, maxLength - 3)}...`
}

export function successRate(report: RunReport): string {
  if (report.total === 0) return '0.0%'
  return `${((report.succeeded / report.total) * 100).toFixed(1)}%`
}

export function formatSummary(report: RunReport): string[] {
  return [
    RULE,
    'RUN SUMMARY',
    RULE,
    `Total messages:  ${report.total}`,
    `Succeeded:       ${report.succeeded}`,
    `Failed:          ${report.failed}`,
    `Success rate:    ${successRate(report)}`,
    RULE
  ]
}

export function formatRecord(record: ProcessedRecord, position: number): string[] {
  const lines = [
    THIN_RULE,
    `Message ${position} - ${record.user.displayName} (${record.raw.timestamp.toISOString()})`,
    THIN_RULE,
    `Original: ${truncate(record.raw.text.replace(/\s+/g, ' '), 300)}`
  ]

  if (record.status === 'failure') {
    lines.push(`Failed: ${record.error}`)
    return lines
  }

  const { progress, nextSteps, confidence } = record.extraction
  lines.push(
    `Progress: ${progress ?? 'None identified'}`,
    `Next Steps: ${nextSteps ?? 'None identified'}`,
    `Confidence: ${formatConfidence(confidence)}`
  )
  return lines
}

export function printSummary(report: RunReport, logger: Logger): void {
  logger.log('')
  for (const line of formatSummary(report)) logger.log(line)
}

export function printRecords(
  report: RunReport,
  logger: Logger,
  limit: number = DEFAULT_PREVIEW_COUNT
): void {
  report.records.slice(0, limit).forEach((record, i) => {
    logger.log('')
    for (const line of formatRecord(record, i + 1)) logger.log(line)
  })

  const remaining = report.records.length - limit
  if (remaining > 0) {
    logger.log(`\n... and ${remaining} more messages`)
  }
}
