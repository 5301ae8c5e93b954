/**
 * Report fixtures shared by the export and display tests.
 */

import type { ErrorKind, ExtractionResult, ProcessedRecord, RawMessage, RunReport } from '../types'

export function createMessage(overrides: Partial<RawMessage> = {}): RawMessage {
  return {
    authorId: 'U100',
    timestamp: new Date('2025-03-10T09:15:00.000Z'),
    text: 'Finished the billing migration',
    channelId: 'C200',
    threadTs: null,
    ...overrides
  }
}

export function successRecord(
  extraction: ExtractionResult,
  raw: RawMessage = createMessage(),
  displayName = 'Ada'
): ProcessedRecord {
  return { status: 'success', raw, user: { id: raw.authorId, displayName }, extraction }
}

export function failureRecord(
  error: ErrorKind,
  raw: RawMessage = createMessage(),
  displayName = 'Ada'
): ProcessedRecord {
  return { status: 'failure', raw, user: { id: raw.authorId, displayName }, error }
}

export function createReport(records: ProcessedRecord[]): RunReport {
  const succeeded = records.filter((r) => r.status === 'success').length
  return { total: records.length, succeeded, failed: records.length - succeeded, records }
}
