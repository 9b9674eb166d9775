import { describe, it, expect, vi } from 'vitest'
import { RetriesExhaustedError, withRetry } from '../retry.js'
import { createFakeTime } from '../../testing/fake-time.js'

describe('withRetry', () => {
  it('returns the first success', async () => {
    const time = createFakeTime()
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce('ok')
    const onRetry = vi.fn()

    const result = await withRetry(fn, { retries: 1, delayMs: 250 }, { sleep: time.sleep, onRetry })

    expect(result).toBe('ok')
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2])
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error))
    expect(time.sleeps).toEqual([250])
  })

  it('gives up after the configured retries with the last error attached', async () => {
    const time = createFakeTime()
    const last = new Error('second failure')
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValueOnce(new Error('first failure')).mockRejectedValueOnce(last)

    const error = await withRetry(fn, { retries: 1, delayMs: 0 }, { sleep: time.sleep }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(RetriesExhaustedError)
    expect(error).toMatchObject({ attempts: 2, lastError: last })
    expect(fn).toHaveBeenCalledTimes(2)
    expect(time.sleeps).toEqual([])
  })

  it('does not retry with zero retries', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('nope'))

    await expect(withRetry(fn, { retries: 0, delayMs: 100 })).rejects.toBeInstanceOf(RetriesExhaustedError)
    expect(fn).toHaveBeenCalledTimes(1)
  })
})
