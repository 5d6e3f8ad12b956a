/**
 * File-backed identity store.
 *
 * @remarks
 * The identity lives in an age key file (default `~/.si/vault/keys/age.key`)
 * with mode 0600 inside a 0700 directory. Rotation moves the current key to
 * `age.key.previous` before writing the new one. Key files that are
 * symlinks or readable by group or others are refused unless
 * `SI_VAULT_ALLOW_INSECURE_KEY_FILE` is set.
 */

import type { Stats } from 'node:fs'
import * as fs from 'node:fs/promises'
import { VaultError, isErrnoError } from '../errors.js'
import { atomicWriteFile } from '../util/atomic-write.js'
import { withFileLock } from '../util/lock.js'
import { isWindows } from '../util/platform.js'
import { parseIdentity, renderIdentityFile } from './identity.js'
import type { IdentitySource, VaultIdentity } from './identity.js'
import type { IdentityStore } from './types.js'

/** Options for {@link FileIdentityStore}. */
export interface FileIdentityStoreOptions {
  keyFile: string
  previousKeyFile: string
  /** Skip the symlink and permission checks. */
  allowInsecure?: boolean | undefined
  clock?: (() => Date) | undefined
}

/**
 * Read and parse an identity file, enforcing owner-only permissions.
 *
 * @returns `undefined` when the file does not exist.
 * @internal
 */
export async function readIdentityFile(
  filePath: string,
  source: IdentitySource,
  allowInsecure: boolean,
): Promise<VaultIdentity | undefined> {
  let stat: Stats
  try {
    stat = await fs.lstat(filePath)
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return undefined
    }
    throw err
  }

  if (!allowInsecure) {
    if (stat.isSymbolicLink()) {
      throw new VaultError(`refusing to read identity through symlink: ${filePath}`, {
        kind: 'identity-unavailable',
        hint: 'set SI_VAULT_ALLOW_INSECURE_KEY_FILE=1 to override',
      })
    }
    if (!isWindows() && (stat.mode & 0o077) !== 0) {
      const mode = (stat.mode & 0o777).toString(8).padStart(3, '0')
      throw new VaultError(`identity file ${filePath} has insecure permissions ${mode}`, {
        kind: 'identity-unavailable',
        hint: `chmod 600 ${filePath} (or set SI_VAULT_ALLOW_INSECURE_KEY_FILE=1)`,
      })
    }
  }

  const text = await fs.readFile(filePath, 'utf8')
  return parseIdentity(text, source, filePath)
}

/**
 * {@link IdentityStore} over the local key file.
 * @internal
 */
export class FileIdentityStore implements IdentityStore {
  readonly backend = 'file'
  readonly #keyFile: string
  readonly #previousKeyFile: string
  readonly #allowInsecure: boolean
  readonly #clock: () => Date

  constructor(options: FileIdentityStoreOptions) {
    this.#keyFile = options.keyFile
    this.#previousKeyFile = options.previousKeyFile
    this.#allowInsecure = options.allowInsecure ?? false
    this.#clock = options.clock ?? (() => new Date())
  }

  get location(): string {
    return this.#keyFile
  }

  async load(): Promise<VaultIdentity | undefined> {
    return readIdentityFile(this.#keyFile, 'file', this.#allowInsecure)
  }

  async loadPrevious(): Promise<VaultIdentity | undefined> {
    return readIdentityFile(this.#previousKeyFile, 'file-previous', this.#allowInsecure)
  }

  async save(identity: VaultIdentity): Promise<void> {
    await withFileLock(this.#keyFile, async () => {
      await this.#write(this.#keyFile, identity)
    })
  }

  async rotate(next: VaultIdentity): Promise<VaultIdentity | undefined> {
    return withFileLock(this.#keyFile, async () => {
      const previous = await this.load()
      if (previous !== undefined) {
        await this.#write(this.#previousKeyFile, previous)
      }
      await this.#write(this.#keyFile, next)
      return previous
    })
  }

  async #write(filePath: string, identity: VaultIdentity): Promise<void> {
    await atomicWriteFile(filePath, renderIdentityFile(identity, this.#clock()), {
      mode: 0o600,
      dirMode: 0o700,
    })
    await fs.chmod(filePath, 0o600)
  }
}
