import { describe, expect, it } from 'vitest'
import { createMessage, createReport, failureRecord, successRecord } from '../test-support'
import { exportToJSON, parseJSON } from './json'

const GENERATED_AT = new Date('2025-03-11T08:00:00.000Z')

describe('JSON Export', () => {
  describe('exportToJSON', () => {
    it('writes metadata with the report counts', () => {
      const report = createReport([
        successRecord({ progress: 'Done', nextSteps: null, confidence: 0.6 }),
        failureRecord('service_error')
      ])

      const parsed = JSON.parse(
        exportToJSON(report, { generatedAt: GENERATED_AT, channelId: 'C200' })
      )

      expect(parsed.metadata).toEqual({
        version: '1.0.0',
        generatedAt: '2025-03-11T08:00:00.000Z',
        channelId: 'C200',
        total: 2,
        succeeded: 1,
        failed: 1
      })
    })

    it('writes every field of a successful record', () => {
      const report = createReport([
        successRecord(
          { progress: 'Billing migrated', nextSteps: 'Remove old tables', confidence: 0.9 },
          createMessage({ threadTs: '1741598100.000200' })
        )
      ])

      const parsed = JSON.parse(exportToJSON(report))

      expect(parsed.records).toEqual([
        {
          status: 'success',
          authorId: 'U100',
          authorDisplayName: 'Ada',
          timestamp: '2025-03-10T09:15:00.000Z',
          text: 'Finished the billing migration',
          channelId: 'C200',
          threadTs: '1741598100.000200',
          progress: 'Billing migrated',
          nextSteps: 'Remove old tables',
          confidence: 0.9,
          error: null
        }
      ])
    })

    it('writes failures with null extraction fields', () => {
      const parsed = JSON.parse(exportToJSON(createReport([failureRecord('rate_limit_exhausted')])))

      expect(parsed.records[0]).toMatchObject({
        status: 'failure',
        progress: null,
        nextSteps: null,
        confidence: null,
        error: 'rate_limit_exhausted'
      })
    })
  })

  describe('parseJSON', () => {
    it('reads back the report it was written from', () => {
      const report = createReport([
        successRecord({ progress: 'Billing migrated', nextSteps: null, confidence: 0.6 }),
        failureRecord('unparsable_response', createMessage({ authorId: 'U7', text: 'hmm' }), 'Grace'),
        successRecord(
          { progress: null, nextSteps: null, confidence: 0.2 },
          createMessage({ threadTs: '1741598100.000200', text: 'lunch?' })
        )
      ])

      const { metadata, report: restored } = parseJSON(
        exportToJSON(report, { generatedAt: GENERATED_AT, channelId: 'C200' })
      )

      expect(restored).toEqual(report)
      expect(metadata.generatedAt).toEqual(GENERATED_AT)
      expect(metadata.channelId).toBe('C200')
    })

    it('rejects documents that are not report exports', () => {
      expect(() => parseJSON('[]')).toThrow('Invalid report JSON: expected metadata and records')
      expect(() => parseJSON('{"metadata":{},"records":[42]}')).toThrow(
        'Invalid report JSON: records[0] is not an object'
      )
    })

    it('rejects unknown error kinds', () => {
      const json = exportToJSON(createReport([failureRecord('service_error')])).replace(
        '"service_error"',
        '"timeout"'
      )

      expect(() => parseJSON(json)).toThrow(
        'Invalid report JSON: records[0].error is not a known error kind'
      )
    })
  })
})
