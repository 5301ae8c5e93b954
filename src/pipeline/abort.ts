/**
 * Cancellation helpers
 */

import { RunCancelledError } from '../errors'

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunCancelledError()
  }
}

/**
 * Settle with `promise`, or reject with RunCancelledError as soon as the signal aborts.
 * The abandoned promise keeps running; its outcome is ignored.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return promise

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new RunCancelledError())
    if (signal.aborted) {
      onAbort()
    } else {
      signal.addEventListener('abort', onAbort, { once: true })
    }
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}
