/**
 * Export Module
 *
 * Generate report files in the supported formats.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { OutputFormat, RunReport } from '../types'
import { exportToCSV } from './csv'
import { type ExportOptions, exportToJSON } from './json'
import { formatFileTimestamp } from './utils'

export { CSV_COLUMNS, escapeCSV, exportToCSV } from './csv'
export {
  type ExportMetadata,
  type ExportOptions,
  exportToJSON,
  type ParsedExport,
  parseJSON
} from './json'
export { formatConfidence, formatFileTimestamp } from './utils'

export interface WriteReportOptions {
  readonly format: OutputFormat
  readonly outputDir: string
  /** Clock for the file name and metadata (default now) */
  readonly now?: Date | undefined
  readonly channelId?: string | undefined
}

export function reportFileName(format: OutputFormat, now: Date): string {
  return `progress_report_${formatFileTimestamp(now)}.${format}`
}

export function formatReport(
  report: RunReport,
  format: OutputFormat,
  metadata: ExportOptions = {}
): string {
  switch (format) {
    case 'json':
      return exportToJSON(report, metadata)
    case 'csv':
      return exportToCSV(report)
  }
}

/**
 * Write the report into `outputDir`, creating it if needed.
 *
 * @returns Path of the written file
 */
export async function writeReport(report: RunReport, options: WriteReportOptions): Promise<string> {
  const now = options.now ?? new Date()
  const path = join(options.outputDir, reportFileName(options.format, now))

  await mkdir(options.outputDir, { recursive: true })
  await writeFile(
    path,
    formatReport(report, options.format, { generatedAt: now, channelId: options.channelId })
  )
  return path
}
