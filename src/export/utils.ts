/**
 * Export Utilities
 *
 * Shared helpers for all export formats.
 */

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * Format a local time as YYYYMMDD_HHMMSS for report file names.
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${day}_${time}`
}

/**
 * Confidence with two decimals, as shown to people.
 */
export function formatConfidence(confidence: number): string {
  return confidence.toFixed(2)
}
