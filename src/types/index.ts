/**
 * Types Index
 *
 * Re-exports all types from domain-specific files.
 */

export * from './common'
export * from './extraction'
export * from './message'
export * from './report'
