import { describe, it, expect, vi } from 'vitest'
import { silentLogger } from '@shelfcrawl/logger'
import { waitForStabilization } from '../stabilization.js'
import type { GrowthSource } from '../types.js'
import { createFakeTime } from '../../testing/fake-time.js'

function sequenceSource(samples: number[]) {
  let index = 0
  const grow = vi.fn(async () => undefined)
  const source: GrowthSource = {
    grow,
    sample: async () => {
      const value = samples[Math.min(index, samples.length - 1)] ?? 0
      index++
      return value
    },
  }
  return { source, grow }
}

describe('waitForStabilization', () => {
  it('stops once the last three samples are equal', async () => {
    const time = createFakeTime()
    const { source, grow } = sequenceSource([10, 20, 42, 42, 42])

    const result = await waitForStabilization(source, {}, { sleep: time.sleep, logger: silentLogger })

    expect(result).toEqual({ size: 42, rounds: 4, waitedMs: 14_000, reason: 'plateau' })
    expect(grow).toHaveBeenCalledTimes(12)
    // initial delay, then per round: three step waits and one settle wait
    expect(time.sleeps.slice(0, 6)).toEqual([3000, 500, 500, 500, 2000, 500])
  })

  it('needs a full ring of post-scroll samples before trusting a list that never grew', async () => {
    const time = createFakeTime()
    const { source, grow } = sequenceSource([42])

    const result = await waitForStabilization(source, {}, { sleep: time.sleep, logger: silentLogger })

    expect(result).toEqual({ size: 42, rounds: 3, waitedMs: 10_500, reason: 'plateau' })
    expect(grow).toHaveBeenCalledTimes(9)
  })

  it('reports the initial sample when the budget allows no round', async () => {
    const { source, grow } = sequenceSource([7])

    const result = await waitForStabilization(source, { maxWaitMs: 0 }, { sleep: async () => undefined, logger: silentLogger })

    expect(result).toEqual({ size: 7, rounds: 0, waitedMs: 0, reason: 'timeout' })
    expect(grow).not.toHaveBeenCalled()
  })

  it('returns the last size when the wait budget runs out', async () => {
    const time = createFakeTime()
    let size = 0
    const source: GrowthSource = {
      grow: async () => {
        size += 5
      },
      sample: async () => size,
    }

    const result = await waitForStabilization(source, { maxWaitMs: 10_000 }, { sleep: time.sleep, logger: silentLogger })

    expect(result).toEqual({ size: 45, rounds: 3, waitedMs: 10_500, reason: 'timeout' })
  })

  it('always returns by the default budget for a list that never settles', async () => {
    const time = createFakeTime()
    let size = 0
    const source: GrowthSource = {
      grow: async () => {
        size++
      },
      sample: async () => size,
    }

    const result = await waitForStabilization(source, {}, { sleep: time.sleep, logger: silentLogger })

    expect(result.reason).toBe('timeout')
    expect(result.rounds).toBe(86)
    expect(result.waitedMs).toBe(301_000)
  })

  it('propagates sampling failures', async () => {
    const source: GrowthSource = {
      grow: async () => undefined,
      sample: async () => {
        throw new Error('page crashed')
      },
    }

    await expect(waitForStabilization(source, {}, { sleep: async () => undefined, logger: silentLogger })).rejects.toThrow(
      'page crashed'
    )
  })
})
