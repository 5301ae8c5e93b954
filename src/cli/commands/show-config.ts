/**
 * Show Config Command
 *
 * Print the resolved settings with secrets masked.
 */

import { describeSettings, type Settings } from '../config'
import type { Logger } from '../logger'

export function cmdShowConfig(settings: Settings, logger: Logger): void {
  const rows = describeSettings(settings)
  const width = Math.max(...rows.map(([label]) => label.length))

  logger.log('\n⚙️  Settings\n')
  for (const [label, value] of rows) {
    logger.log(`  ${label.padEnd(width)}  ${value}`)
  }
}
