/**
 * CLI Logger
 *
 * Progress reporting and logging utilities for the CLI.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  progress: (msg: string, current: number, total: number) => void
}

export function createLogger(quiet: boolean, verbose: boolean): Logger {
  return {
    log: (msg: string) => {
      if (!quiet) console.log(msg)
    },
    verbose: (msg: string) => {
      if (verbose) console.log(`  [debug] ${msg}`)
    },
    success: (msg: string) => {
      if (!quiet) console.log(`  ✓ ${msg}`)
    },
    warn: (msg: string) => {
      console.warn(`  ⚠ ${msg}`)
    },
    error: (msg: string) => {
      console.error(`  ✗ ${msg}`)
    },
    progress: (msg: string, current: number, total: number) => {
      if (!quiet && total > 0) {
        const pct = Math.round((current / total) * 100)
        const filled = Math.round(pct / 2.5)
        const bar = '█'.repeat(filled) + '░'.repeat(40 - filled)
        process.stdout.write(`\r  [${bar}] ${pct}% ${msg}`)
        if (current === total) {
          process.stdout.write('\n')
        }
      }
    }
  }
}
