/**
 * JSON Export
 *
 * Export a run report to JSON with metadata, and read it back.
 */

import { ERROR_KINDS, type ErrorKind, type ProcessedRecord, type RunReport } from '../types'

export interface ExportMetadata {
  readonly version: string
  readonly generatedAt: Date
  readonly channelId: string | null
  readonly total: number
  readonly succeeded: number
  readonly failed: number
}

/**
 * One flat record per message. Every key is always present; failures have
 * null extraction fields and a non-null `error`.
 */
interface JsonRecord {
  status: 'success' | 'failure'
  authorId: string
  authorDisplayName: string
  timestamp: string
  text: string
  channelId: string
  threadTs: string | null
  progress: string | null
  nextSteps: string | null
  confidence: number | null
  error: ErrorKind | null
}

interface JsonExport {
  metadata: Omit<ExportMetadata, 'generatedAt'> & { generatedAt: string }
  records: JsonRecord[]
}

/** Metadata the caller may supply; counts always come from the report */
export interface ExportOptions {
  readonly version?: string | undefined
  readonly generatedAt?: Date | undefined
  readonly channelId?: string | null | undefined
}

export interface ParsedExport {
  readonly metadata: ExportMetadata
  readonly report: RunReport
}

function toJsonRecord(record: ProcessedRecord): JsonRecord {
  const { raw, user } = record
  const base = {
    status: record.status,
    authorId: raw.authorId,
    authorDisplayName: user.displayName,
    timestamp: raw.timestamp.toISOString(),
    text: raw.text,
    channelId: raw.channelId,
    threadTs: raw.threadTs
  }

  if (record.status === 'success') {
    return {
      ...base,
      progress: record.extraction.progress,
      nextSteps: record.extraction.nextSteps,
      confidence: record.extraction.confidence,
      error: null
    }
  }
  return { ...base, progress: null, nextSteps: null, confidence: null, error: record.error }
}

/**
 * Export a report to JSON.
 */
export function exportToJSON(
  report: RunReport,
  metadata: ExportOptions = {}
): string {
  const exportData: JsonExport = {
    metadata: {
      version: metadata.version ?? '1.0.0',
      generatedAt: (metadata.generatedAt ?? new Date()).toISOString(),
      channelId: metadata.channelId ?? null,
      total: report.total,
      succeeded: report.succeeded,
      failed: report.failed
    },
    records: report.records.map(toJsonRecord)
  }

  return JSON.stringify(exportData, null, 2)
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === 'string'
}

function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value)
}

function readDate(value: unknown, field: string): Date {
  const date = typeof value === 'string' ? new Date(value) : null
  if (!date || Number.isNaN(date.getTime())) {
    throw new Error(`Invalid report JSON: ${field} is not a timestamp`)
  }
  return date
}

function fromJsonRecord(value: unknown, index: number): ProcessedRecord {
  const where = `records[${index}]`
  if (!isObject(value)) {
    throw new Error(`Invalid report JSON: ${where} is not an object`)
  }

  const { authorId, authorDisplayName, text, channelId, threadTs } = value
  if (
    typeof authorId !== 'string' ||
    typeof authorDisplayName !== 'string' ||
    typeof text !== 'string' ||
    typeof channelId !== 'string' ||
    !isNullableString(threadTs)
  ) {
    throw new Error(`Invalid report JSON: ${where} is missing message fields`)
  }

  const raw = {
    authorId,
    timestamp: readDate(value.timestamp, `${where}.timestamp`),
    text,
    channelId,
    threadTs
  }
  const user = { id: authorId, displayName: authorDisplayName }

  if (value.status === 'failure') {
    if (!isErrorKind(value.error)) {
      throw new Error(`Invalid report JSON: ${where}.error is not a known error kind`)
    }
    return { status: 'failure', raw, user, error: value.error }
  }

  const { progress, nextSteps, confidence } = value
  if (
    value.status !== 'success' ||
    !isNullableString(progress) ||
    !isNullableString(nextSteps) ||
    typeof confidence !== 'number'
  ) {
    throw new Error(`Invalid report JSON: ${where} is not a valid record`)
  }
  return { status: 'success', raw, user, extraction: { progress, nextSteps, confidence } }
}

/**
 * Parse a JSON export back into metadata and a report.
 *
 * @throws Error when the document is not a report export
 */
export function parseJSON(json: string): ParsedExport {
  const data: unknown = JSON.parse(json)
  if (!isObject(data) || !isObject(data.metadata) || !Array.isArray(data.records)) {
    throw new Error('Invalid report JSON: expected metadata and records')
  }

  const records = data.records.map(fromJsonRecord)
  const succeeded = records.filter((r) => r.status === 'success').length
  const { version, channelId } = data.metadata

  return {
    metadata: {
      version: typeof version === 'string' ? version : '1.0.0',
      generatedAt: readDate(data.metadata.generatedAt, 'metadata.generatedAt'),
      channelId: typeof channelId === 'string' ? channelId : null,
      total: records.length,
      succeeded,
      failed: records.length - succeeded
    },
    report: {
      total: records.length,
      succeeded,
      failed: records.length - succeeded,
      records
    }
  }
}
