/**
 * Response Parser
 *
 * Parses the model's free-text answer into progress and next-steps sections.
 * Pure: no IO, never throws.
 */

import type { Result } from '../types'

export interface ParsedSections {
  readonly progress: string | null
  readonly nextSteps: string | null
  /** Which section labels were located, regardless of their content */
  readonly found: { readonly progress: boolean; readonly nextSteps: boolean }
}

export interface ParseFailure {
  readonly message: string
}

type SectionName = 'progress' | 'nextSteps'

/**
 * A section label at the start of a line, optionally decorated with Markdown
 * (`## Progress`, `**Next steps:**`, `- PROGRESS -`). The label must be followed
 * by a colon, a spaced dash, or end the line, so prose such as "Progress was slow" is not a label.
 */
const LABEL_PATTERN = /^(?:[#>*_\s-])*(progress|next[\s_-]*steps?)(?:[*_\s])*(?::|[-–](?=\s)|$)(.*)$/i

/** Section content that means "nothing stated" */
const EMPTY_MARKERS = new Set(['', 'none', 'n/a', 'na', 'null', 'nothing', '-', 'not mentioned'])

function toSectionName(label: string): SectionName {
  return label.toLowerCase().startsWith('progress') ? 'progress' : 'nextSteps'
}

/**
 * Normalize section text. Placeholder answers become null.
 */
export function cleanSection(raw: string): string | null {
  const text = raw
    .replace(/^[*_\s]+/, '')
    .replace(/[*_\s]+$/, '')
    .replace(/[ \t]+\n/g, '\n')
    .trim()
  const marker = text.toLowerCase().replace(/[.!]+$/, '')
  return EMPTY_MARKERS.has(marker) ? null : text
}

function parseLabelledSections(response: string): ParsedSections | null {
  const collected: Record<SectionName, string[] | null> = { progress: null, nextSteps: null }
  let current: SectionName | null = null

  for (const line of response.split(/\r?\n/)) {
    const match = line.match(LABEL_PATTERN)
    if (match?.[1] !== undefined) {
      current = toSectionName(match[1])
      const lines = collected[current] ?? []
      lines.push(match[2] ?? '')
      collected[current] = lines
      continue
    }
    // Text before the first label is preamble
    if (current) {
      collected[current]?.push(line)
    }
  }

  if (!collected.progress && !collected.nextSteps) {
    return null
  }

  return {
    progress: collected.progress ? cleanSection(collected.progress.join('\n')) : null,
    nextSteps: collected.nextSteps ? cleanSection(collected.nextSteps.join('\n')) : null,
    found: { progress: collected.progress !== null, nextSteps: collected.nextSteps !== null }
  }
}

function extractJsonObject(response: string): string | null {
  // Might be wrapped in ```json```
  const fenced = response.match(/```(?:json)?\s*([\s\S]*?)\s*```/)
  if (fenced?.[1]) {
    return fenced[1]
  }
  const objectMatch = response.match(/\{[\s\S]*\}/)
  return objectMatch ? objectMatch[0] : null
}

function parseField(val: unknown): string | null {
  return typeof val === 'string' ? cleanSection(val) : null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * JSON answers of the form {"progress": ..., "next_steps": ...}.
 */
function parseJsonSections(response: string): ParsedSections | null {
  const json = extractJsonObject(response)
  if (!json) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch {
    return null
  }
  if (!isRecord(parsed)) return null

  const hasProgress = 'progress' in parsed
  const nextStepsKey = 'next_steps' in parsed ? 'next_steps' : 'nextSteps'
  const hasNextSteps = nextStepsKey in parsed
  if (!hasProgress && !hasNextSteps) return null

  return {
    progress: parseField(parsed.progress),
    nextSteps: parseField(parsed[nextStepsKey]),
    found: { progress: hasProgress, nextSteps: hasNextSteps }
  }
}

/**
 * Parse a completion into sections.
 * A missing section is null; only a response with no recognisable structure fails.
 */
export function parseExtractionResponse(response: string): Result<ParsedSections, ParseFailure> {
  if (!response.trim()) {
    return { ok: false, error: { message: 'Response is empty' } }
  }

  const sections = parseLabelledSections(response) ?? parseJsonSections(response)
  if (!sections) {
    return {
      ok: false,
      error: { message: 'Response contains no PROGRESS or NEXT STEPS section' }
    }
  }
  return { ok: true, value: sections }
}
