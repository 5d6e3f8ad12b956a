/**
 * Crash-safe file replacement: temp file in the same directory, fsync,
 * rename over the target, fsync the directory.
 *
 * @packageDocumentation
 */

import * as crypto from 'node:crypto'
import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { ConflictError, VaultError, isErrnoError } from '../errors.js'

/** Options for {@link atomicWriteFile}. */
export interface AtomicWriteOptions {
  /** Mode for a newly created file. Existing files keep their mode. */
  mode?: number | undefined
  /** Mode for directories created on the way. */
  dirMode?: number | undefined
  /**
   * Content hash observed when the file was read (`null` when it did not
   * exist). The write fails with {@link ConflictError} if the file changed
   * since.
   */
  expectedHash?: string | null | undefined
}

/** SHA-256 hex digest of file contents. */
export function contentHash(content: string | Uint8Array): string {
  return crypto.createHash('sha256').update(content).digest('hex')
}

/** Hash of the file's current contents, or `null` when it does not exist. */
export async function currentHash(filePath: string): Promise<string | null> {
  try {
    return contentHash(await fs.readFile(filePath))
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return null
    }
    throw err
  }
}

function tempPathFor(targetPath: string): string {
  const suffix = crypto.randomBytes(8).toString('hex')
  return path.join(path.dirname(targetPath), `.${path.basename(targetPath)}.tmp-${suffix}`)
}

async function fsyncDirectory(dir: string): Promise<void> {
  const handle = await fs.open(dir, 'r')
  try {
    await handle.sync()
  } catch (err) {
    // Some filesystems refuse fsync on directories.
    if (!isErrnoError(err, 'EINVAL') && !isErrnoError(err, 'EISDIR')) {
      throw err
    }
  } finally {
    await handle.close()
  }
}

async function existingMode(targetPath: string): Promise<number | undefined> {
  try {
    const stat = await fs.stat(targetPath)
    return stat.mode & 0o777
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return undefined
    }
    throw err
  }
}

async function discardTemp(tmpPath: string, original: unknown): Promise<never> {
  try {
    await fs.rm(tmpPath, { force: true })
  } catch (cleanupErr) {
    throw new AggregateError([original, cleanupErr], `failed to remove temp file ${tmpPath}`)
  }
  throw original
}

/**
 * Replace `targetPath` atomically. Readers see either the old or the new
 * contents; on failure the temp file is removed and the target is intact.
 *
 * @throws {@link ConflictError} when `expectedHash` no longer matches.
 */
export async function atomicWriteFile(
  targetPath: string,
  content: string | Uint8Array,
  options?: AtomicWriteOptions,
): Promise<void> {
  const dir = path.dirname(targetPath)
  await fs.mkdir(dir, { recursive: true, mode: options?.dirMode ?? 0o700 })
  const mode = (await existingMode(targetPath)) ?? options?.mode ?? 0o644

  const tmpPath = tempPathFor(targetPath)
  try {
    const handle = await fs.open(tmpPath, 'wx', mode)
    try {
      await handle.writeFile(content)
      await handle.chmod(mode)
      await handle.sync()
    } finally {
      await handle.close()
    }

    if (options?.expectedHash !== undefined) {
      const observed = await currentHash(targetPath)
      if (observed !== options.expectedHash) {
        throw new ConflictError(targetPath)
      }
    }

    await fs.rename(tmpPath, targetPath)
  } catch (err) {
    return discardTemp(tmpPath, err)
  }
  await fsyncDirectory(dir)
}

/**
 * Resolve the path a vault file write should go to. Writing through a
 * symlink is refused unless `allowSymlink` is set, in which case the link
 * target is returned.
 */
export async function resolveWriteTarget(filePath: string, allowSymlink: boolean): Promise<string> {
  let stat: Stats
  try {
    stat = await fs.lstat(filePath)
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return filePath
    }
    throw err
  }
  if (!stat.isSymbolicLink()) {
    return filePath
  }
  if (!allowSymlink) {
    throw new VaultError(`refusing to write vault file through symlink: ${filePath}`, {
      hint: 'set SI_VAULT_ALLOW_SYMLINK_ENV_FILE=1 to override',
    })
  }
  const resolved = await fs.realpath(filePath)
  const target = await fs.stat(resolved)
  if (target.isDirectory()) {
    throw new VaultError(`vault file symlink resolves to a directory: ${resolved}`)
  }
  return resolved
}
