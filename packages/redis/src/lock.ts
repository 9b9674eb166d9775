import { randomUUID } from 'node:crypto'

const RELEASE_LUA = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`

export const DEFAULT_LOCK_TTL_MS = 120_000

/** The subset of ioredis commands the lock needs */
export interface LockCommands {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<'OK' | null>
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>
}

export interface RedisLockHandle {
  key: string
  token: string
}

/**
 * Acquire a lock with an owner token and TTL.
 * Returns null if the lock is already held.
 */
export async function acquireRedisLock(
  redis: LockCommands,
  key: string,
  ttlMs = DEFAULT_LOCK_TTL_MS
): Promise<RedisLockHandle | null> {
  const token = randomUUID()
  const result = await redis.set(key, token, 'PX', ttlMs, 'NX')
  return result === 'OK' ? { key, token } : null
}

/**
 * Release a lock only if the token still owns it.
 */
export async function releaseRedisLock(redis: LockCommands, handle: RedisLockHandle): Promise<boolean> {
  const result = await redis.eval(RELEASE_LUA, 1, handle.key, handle.token)
  return Number(result) === 1
}
