/**
 * Stabilization detector for lazily loaded lists
 *
 * Keeps triggering growth until the last `ringSize` post-round samples are
 * equal (the list stopped growing) or the accumulated wait reaches `maxWaitMs`. Reaching the
 * budget is a normal outcome, reported as reason 'timeout'.
 */

import type { ILogger } from '@shelfcrawl/logger'
import { loggers } from '../config/logger.js'
import type { GrowthSource, Sleep, StabilizationConfig, StabilizationResult } from './types.js'
import { DEFAULT_STABILIZATION_CONFIG, realSleep } from './types.js'

export interface StabilizationDeps {
  sleep?: Sleep
  logger?: ILogger
}

export async function waitForStabilization(
  source: GrowthSource,
  config: Partial<StabilizationConfig> = {},
  deps: StabilizationDeps = {}
): Promise<StabilizationResult> {
  const cfg = { ...DEFAULT_STABILIZATION_CONFIG, ...config }
  const sleep = deps.sleep ?? realSleep
  const log = deps.logger ?? loggers.browser

  if (!Number.isInteger(cfg.ringSize) || cfg.ringSize < 1) {
    throw new RangeError(`ringSize must be a positive integer, got ${cfg.ringSize}`)
  }

  await sleep(cfg.initialDelayMs)

  let size = await source.sample()
  // Only samples taken after a round of growth count towards the plateau
  const ring: number[] = []
  let waitedMs = 0
  let rounds = 0

  const plateaued = (): boolean => ring.length === cfg.ringSize && ring.every(sample => sample === size)

  while (!plateaued() && waitedMs < cfg.maxWaitMs) {
    for (let i = 0; i < cfg.triggersPerRound; i++) {
      await source.grow()
      await sleep(cfg.stepDelayMs)
      waitedMs += cfg.stepDelayMs
    }

    await sleep(cfg.settleDelayMs)
    waitedMs += cfg.settleDelayMs

    size = await source.sample()
    ring.push(size)
    if (ring.length > cfg.ringSize) ring.shift()
    rounds++

    log.debug('Stabilization round', { round: rounds, size, waitedMs })
  }

  const reason = plateaued() ? 'plateau' : 'timeout'
  if (reason === 'timeout') {
    log.warn('List still growing at wait budget', { size, rounds, waitedMs, maxWaitMs: cfg.maxWaitMs })
  }

  return { size, rounds, waitedMs, reason }
}
