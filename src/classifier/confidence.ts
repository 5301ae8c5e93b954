/**
 * Confidence Heuristic
 *
 * Scores how much of a response could be used, from the parsed sections alone.
 */

import type { ConfidenceBand, ConfidenceConfig } from '../types'
import type { ParsedSections } from './response-parser'

export const DEFAULT_CONFIDENCE: ConfidenceConfig = {
  high: 0.9,
  medium: 0.6,
  low: 0.2,
  minSectionLength: 10
}

export function confidenceBand(
  sections: Pick<ParsedSections, 'progress' | 'nextSteps'>,
  config: ConfidenceConfig = DEFAULT_CONFIDENCE
): ConfidenceBand {
  const filled = [sections.progress, sections.nextSteps].filter(
    (s): s is string => s !== null && s.length > 0
  )
  if (filled.length === 0) return 'low'
  if (filled.length === 2 && filled.every((s) => s.length >= config.minSectionLength)) {
    return 'high'
  }
  return 'medium'
}

export function scoreConfidence(
  sections: Pick<ParsedSections, 'progress' | 'nextSteps'>,
  config: ConfidenceConfig = DEFAULT_CONFIDENCE
): number {
  const score = config[confidenceBand(sections, config)]
  return Math.max(0, Math.min(1, score))
}
