/**
 * Extraction Prompt
 *
 * Prompt asking the model to split a status message into completed work
 * and intended future work, as two labelled sections.
 */

import type { ExtractionPrompt, RawMessage } from '../types'

export const PROGRESS_LABEL = 'PROGRESS'
export const NEXT_STEPS_LABEL = 'NEXT STEPS'
export const NONE_MARKER = 'NONE'

export const SYSTEM_PROMPT = `You analyze workplace chat messages and separate what the author has already done from what they intend to do next.

PROGRESS = work the author reports as completed or under way (accomplishments, finished tasks, results).
NEXT STEPS = work the author plans, intends or commits to doing in the future.

Rules:
- Use only what the message states. Do not invent details.
- Be concise: one or two sentences per section, in the author's own terms.
- If the message states no progress, write ${NONE_MARKER} for that section.
- If the message states no next steps, write ${NONE_MARKER} for that section.

Answer with exactly these two sections and nothing else:

${PROGRESS_LABEL}: <completed work, or ${NONE_MARKER}>
${NEXT_STEPS_LABEL}: <planned work, or ${NONE_MARKER}>`

/**
 * Build the prompt for one message. The same message always yields the same prompt.
 */
export function buildExtractionPrompt(message: Pick<RawMessage, 'text'>): ExtractionPrompt {
  return {
    system: SYSTEM_PROMPT,
    user: `Analyze the following message and extract its progress and next steps.

Message:
"""
${message.text.trim()}
"""`
  }
}
