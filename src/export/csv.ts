/**
 * CSV Export
 *
 * Export a run report as one row per processed message.
 */

import type { RunReport } from '../types'
import { formatConfidence } from './utils'

export const CSV_COLUMNS = [
  'author_display_name',
  'timestamp',
  'text',
  'progress',
  'next_steps',
  'confidence',
  'error'
] as const

/**
 * Escape a value for CSV (handle quotes and commas).
 */
export function escapeCSV(value: string | number | undefined | null): string {
  if (value === undefined || value === null) {
    return ''
  }

  const str = String(value)

  // If contains comma, newline, or quote, wrap in quotes
  if (str.includes(',') || str.includes('\n') || str.includes('"') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Export a report to CSV.
 *
 * Failed rows leave the extraction columns and confidence empty and carry the
 * error kind; successful rows leave `error` empty.
 */
export function exportToCSV(report: RunReport): string {
  const rows: string[] = []

  rows.push(CSV_COLUMNS.map(escapeCSV).join(','))

  for (const record of report.records) {
    const extraction = record.status === 'success' ? record.extraction : null
    const row = [
      record.user.displayName,
      record.raw.timestamp.toISOString(),
      record.raw.text,
      extraction?.progress,
      extraction?.nextSteps,
      extraction ? formatConfidence(extraction.confidence) : null,
      record.status === 'failure' ? record.error : null
    ]

    rows.push(row.map(escapeCSV).join(','))
  }

  return rows.join('\n')
}
