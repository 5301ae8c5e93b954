/**
 * Worker Pool
 *
 * N workers pull tasks from a shared queue. Results are placed by original
 * index, so completion order never leaks out. The first failing task stops
 * every worker from claiming more.
 */

const DEFAULT_CONCURRENCY = 5

interface WorkerProgressInfo<R> {
  /** Task index (0-based) */
  readonly index: number
  readonly total: number
  /** Number of completed tasks so far */
  readonly completed: number
  readonly result: R
}

export interface WorkerPoolOptions<R> {
  /** Number of concurrent workers (default 5) */
  readonly concurrency?: number | undefined
  /** Workers stop claiming tasks once this aborts; in-flight tasks are not interrupted */
  readonly signal?: AbortSignal | undefined
  /** Called after each task completes successfully */
  readonly onProgress?: ((info: WorkerProgressInfo<R>) => void) | undefined
}

export interface WorkerPoolResult<R> {
  /** Completed results, in original order */
  readonly successes: R[]
  readonly errors: ReadonlyArray<{ readonly index: number; readonly error: Error }>
}

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: (task: T, index: number) => Promise<R>,
  options: WorkerPoolOptions<R> = {}
): Promise<WorkerPoolResult<R>> {
  const requested = options.concurrency ?? DEFAULT_CONCURRENCY
  const concurrency = Number.isInteger(requested) && requested > 0 ? requested : 1
  const results: Array<{ result: R } | undefined> = new Array(tasks.length)
  const errors: Array<{ index: number; error: Error }> = []

  let nextIndex = 0
  let completed = 0

  async function worker(): Promise<void> {
    while (errors.length === 0 && !options.signal?.aborted) {
      // Claim next task; no await between read and increment
      const index = nextIndex++
      if (index >= tasks.length) return

      const task = tasks[index]
      if (task === undefined) return

      try {
        const result = await processor(task, index)
        results[index] = { result }
        completed++
        options.onProgress?.({ index, total: tasks.length, completed, result })
      } catch (e) {
        errors.push({ index, error: e instanceof Error ? e : new Error(String(e)) })
      }
    }
  }

  const workerCount = Math.min(concurrency, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  const successes: R[] = []
  for (const entry of results) {
    if (entry) successes.push(entry.result)
  }
  return { successes, errors }
}
