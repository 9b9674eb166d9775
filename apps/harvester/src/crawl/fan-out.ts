/**
 * Ordered, bounded fan-out
 *
 * Maps a worker over every input with at most `concurrency` units in flight.
 * Every unit runs to completion; failures are captured per slot instead of
 * rejecting the whole batch. Outcomes come back in input order regardless of
 * completion order.
 */

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

export interface FanOutOptions {
  /** Units in flight at once; at least 1 */
  concurrency: number
}

export async function fanOut<I, O>(
  inputs: readonly I[],
  worker: (input: I, index: number) => Promise<O>,
  options: FanOutOptions
): Promise<Array<Outcome<O>>> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`)
  }

  const outcomes: Array<Outcome<O>> = new Array<Outcome<O>>(inputs.length)
  const queue = inputs.map((input, index) => ({ input, index }))

  const lane = async (): Promise<void> => {
    for (let item = queue.shift(); item; item = queue.shift()) {
      const { input, index } = item
      try {
        outcomes[index] = { ok: true, value: await worker(input, index) }
      } catch (error) {
        outcomes[index] = { ok: false, error }
      }
    }
  }

  const lanes = Math.min(options.concurrency, inputs.length)
  await Promise.all(Array.from({ length: lanes }, () => lane()))
  return outcomes
}

/** `[[a, b], [c]]` → `[a, b, c]` */
export function flatten<T>(groups: ReadonlyArray<readonly T[]>): T[] {
  const flat: T[] = []
  for (const group of groups) {
    for (const item of group) flat.push(item)
  }
  return flat
}
