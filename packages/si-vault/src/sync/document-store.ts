/**
 * Read-transform-write access to a vault document.
 *
 * @remarks
 * Local files are updated under an advisory lock with an atomic replace and
 * a content-hash conflict check; a conflict is retried once. In strict sun
 * mode the document lives only in the `vault-backup` object and no vault
 * bytes touch the filesystem.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { DotenvDocument } from '../dotenv/document.js'
import { ConflictError, isErrnoError } from '../errors.js'
import type { Target } from '../types.js'
import { atomicWriteFile, contentHash, resolveWriteTarget } from '../util/atomic-write.js'
import { withFileLock } from '../util/lock.js'
import type { SyncBackend } from './backend.js'

/** What a transform decided. */
export interface Mutation<T> {
  /** Write the (mutated) document back. */
  changed: boolean
  value: T
}

/**
 * Transform applied to the current document. `exists` is `false` when the
 * document was absent and `doc` is empty. It may run twice when the first
 * write hits a conflict.
 */
export type Transform<T> = (doc: DotenvDocument, exists: boolean) => Promise<Mutation<T>>

/** Storage of one vault document. */
export interface DocumentStore {
  readonly target: Target
  /** The current document, or `undefined` when absent. */
  read(): Promise<DotenvDocument | undefined>
  /** Apply `transform` and persist the result when it reports a change. */
  update<T>(transform: Transform<T>): Promise<T>
}

/** Options for {@link LocalDocumentStore}. */
export interface LocalDocumentStoreOptions {
  /** Allow writing through a symlinked vault file. */
  allowSymlink?: boolean | undefined
  /** Runs before every write, e.g. the git index guard. */
  beforeWrite?: ((filePath: string) => Promise<void>) | undefined
}

const VAULT_FILE_MODE = 0o600

async function readIfExists(filePath: string): Promise<Buffer | undefined> {
  try {
    return await fs.readFile(filePath)
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return undefined
    }
    throw err
  }
}

/**
 * {@link DocumentStore} over a local dotenv file.
 * @internal
 */
export class LocalDocumentStore implements DocumentStore {
  readonly target: Target
  readonly #allowSymlink: boolean
  readonly #beforeWrite: ((filePath: string) => Promise<void>) | undefined

  constructor(target: Target, options?: LocalDocumentStoreOptions) {
    this.target = target
    this.#allowSymlink = options?.allowSymlink ?? false
    this.#beforeWrite = options?.beforeWrite
  }

  async read(): Promise<DotenvDocument | undefined> {
    const bytes = await readIfExists(this.target.path)
    return bytes === undefined ? undefined : DotenvDocument.parse(bytes.toString('utf8'))
  }

  async update<T>(transform: Transform<T>): Promise<T> {
    const filePath = await resolveWriteTarget(this.target.path, this.#allowSymlink)
    return withFileLock(filePath, async () => {
      try {
        return await this.#attempt(filePath, transform)
      } catch (err) {
        if (!(err instanceof ConflictError)) {
          throw err
        }
        return this.#attempt(filePath, transform)
      }
    })
  }

  async #attempt<T>(filePath: string, transform: Transform<T>): Promise<T> {
    const bytes = await readIfExists(filePath)
    const doc = DotenvDocument.parse(bytes?.toString('utf8') ?? '')
    const mutation = await transform(doc, bytes !== undefined)
    if (!mutation.changed) {
      return mutation.value
    }
    await this.#beforeWrite?.(filePath)
    await atomicWriteFile(filePath, doc.emit(), {
      mode: VAULT_FILE_MODE,
      dirMode: 0o700,
      expectedHash: bytes === undefined ? null : contentHash(bytes),
    })
    return mutation.value
  }
}

/**
 * {@link DocumentStore} over the sun `vault-backup` object of a scope.
 * @internal
 */
export class SunDocumentStore implements DocumentStore {
  readonly target: Target
  readonly #backend: SyncBackend

  constructor(target: Target, backend: SyncBackend) {
    this.target = target
    this.#backend = backend
  }

  async read(): Promise<DotenvDocument | undefined> {
    return this.#backend.getBackup(this.target.path)
  }

  async update<T>(transform: Transform<T>): Promise<T> {
    const current = await this.read()
    const doc = current ?? new DotenvDocument()
    const mutation = await transform(doc, current !== undefined)
    if (mutation.changed) {
      await this.#backend.putBackup(this.target.path, doc, { path: this.target.scope, source: 'write' })
    }
    return mutation.value
  }
}

/** File name recorded in backup metadata for a local target. */
export function backupName(target: Target): string {
  return target.backend === 'local' ? path.basename(target.path) : target.scope
}
