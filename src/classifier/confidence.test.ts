import { describe, expect, it } from 'vitest'
import { confidenceBand, DEFAULT_CONFIDENCE, scoreConfidence } from './confidence'

describe('Confidence Heuristic', () => {
  it('is high when both sections are present and long enough', () => {
    const sections = { progress: 'Finished the login page', nextSteps: 'Write signup tests' }

    expect(confidenceBand(sections)).toBe('high')
    expect(scoreConfidence(sections)).toBe(0.9)
  })

  it('is medium when only one section is present', () => {
    expect(confidenceBand({ progress: 'Finished the login page', nextSteps: null })).toBe('medium')
    expect(confidenceBand({ progress: null, nextSteps: 'Write signup tests' })).toBe('medium')
    expect(scoreConfidence({ progress: null, nextSteps: 'Write signup tests' })).toBe(0.6)
  })

  it('is medium when both sections are shorter than the minimum', () => {
    expect(confidenceBand({ progress: 'Done', nextSteps: 'Ship' })).toBe('medium')
  })

  it('is low when nothing was extracted', () => {
    expect(confidenceBand({ progress: null, nextSteps: null })).toBe('low')
    expect(scoreConfidence({ progress: null, nextSteps: null })).toBe(0.2)
  })

  it('honours custom thresholds', () => {
    const config = { ...DEFAULT_CONFIDENCE, high: 0.95, minSectionLength: 3 }

    expect(scoreConfidence({ progress: 'Done', nextSteps: 'Ship' }, config)).toBe(0.95)
  })

  it('clamps configured scores into [0, 1]', () => {
    const config = { ...DEFAULT_CONFIDENCE, low: -0.5 }

    expect(scoreConfidence({ progress: null, nextSteps: null }, config)).toBe(0)
  })
})
