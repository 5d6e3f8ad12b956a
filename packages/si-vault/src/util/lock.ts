import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import lockfile from 'proper-lockfile'
import { VaultError } from '../errors.js'

const LOCK_RETRIES = { retries: 5, minTimeout: 100, maxTimeout: 1000 }

async function releaseAfterFailure(release: () => Promise<void>, original: unknown): Promise<never> {
  try {
    await release()
  } catch (releaseErr) {
    throw new AggregateError([original, releaseErr], 'lock release failed after error')
  }
  throw original
}

/**
 * Run `fn` while holding an advisory lock on `<target>.lock`. The target
 * itself need not exist.
 */
export async function withFileLock<T>(target: string, fn: () => Promise<T>): Promise<T> {
  await fs.mkdir(path.dirname(target), { recursive: true, mode: 0o700 })

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(target, {
      realpath: false,
      retries: LOCK_RETRIES,
      lockfilePath: `${target}.lock`,
    })
  } catch (err) {
    throw new VaultError(
      `failed to acquire lock for ${target}: ${err instanceof Error ? err.message : String(err)}`,
      { kind: 'conflict', hint: 'another si process holds the lock; retry shortly', cause: err },
    )
  }

  let result: T
  try {
    result = await fn()
  } catch (err) {
    return releaseAfterFailure(release, err)
  }
  await release()
  return result
}
