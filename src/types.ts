/**
 * Core types for the progress-digest library
 *
 * Re-exports all types from domain-specific files in types/.
 */

export * from './types/index'
