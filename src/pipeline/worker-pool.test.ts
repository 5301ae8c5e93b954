import { describe, expect, it, vi } from 'vitest'
import { runWorkerPool } from './worker-pool'

const tick = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms))

describe('runWorkerPool', () => {
  it('returns an empty result for no tasks', async () => {
    const processor = vi.fn(async (n: number) => n)

    const result = await runWorkerPool([], processor)

    expect(result).toEqual({ successes: [], errors: [] })
    expect(processor).not.toHaveBeenCalled()
  })

  it('keeps the original order when tasks finish out of order', async () => {
    const delays = [20, 0, 10, 5]

    const result = await runWorkerPool(
      delays,
      async (ms, index) => {
        await tick(ms)
        return `task-${index}`
      },
      { concurrency: 4 }
    )

    expect(result.successes).toEqual(['task-0', 'task-1', 'task-2', 'task-3'])
  })

  it('never runs more than `concurrency` tasks at once', async () => {
    let running = 0
    let peak = 0

    await runWorkerPool(
      [1, 2, 3, 4, 5, 6, 7],
      async () => {
        running++
        peak = Math.max(peak, running)
        await tick(2)
        running--
      },
      { concurrency: 2 }
    )

    expect(peak).toBe(2)
  })

  it('runs every task with one worker when concurrency is not a positive integer', async () => {
    for (const concurrency of [Number.NaN, 0, -3, 1.5]) {
      const processor = vi.fn(async (n: number) => n * 2)

      const result = await runWorkerPool([1, 2, 3], processor, { concurrency })

      expect(result.successes).toEqual([2, 4, 6])
    }
  })

  it('reports progress for each completed task', async () => {
    const onProgress = vi.fn()

    await runWorkerPool(['a', 'b'], async (s) => s.toUpperCase(), { concurrency: 1, onProgress })

    expect(onProgress).toHaveBeenCalledTimes(2)
    expect(onProgress).toHaveBeenLastCalledWith({ index: 1, total: 2, completed: 2, result: 'B' })
  })

  it('stops claiming tasks after the first failure', async () => {
    const processor = vi.fn(async (n: number) => {
      if (n === 1) throw new Error('stop')
      return n
    })

    const result = await runWorkerPool([0, 1, 2, 3], processor, { concurrency: 1 })

    expect(processor).toHaveBeenCalledTimes(2)
    expect(result).toEqual({ successes: [0], errors: [{ index: 1, error: new Error('stop') }] })
  })

  it('wraps non-Error rejections', async () => {
    const result = await runWorkerPool([1], async () => {
      throw 'plain string'
    })

    expect(result.errors).toEqual([{ index: 0, error: new Error('plain string') }])
  })

  it('stops claiming tasks once the signal aborts', async () => {
    const controller = new AbortController()
    const processor = vi.fn(async (n: number) => n)

    const result = await runWorkerPool([0, 1, 2, 3], processor, {
      concurrency: 1,
      signal: controller.signal,
      onProgress: ({ completed }) => {
        if (completed === 1) controller.abort()
      }
    })

    expect(processor).toHaveBeenCalledTimes(1)
    expect(result.successes).toEqual([0])
  })
})
