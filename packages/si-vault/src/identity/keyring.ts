/**
 * Candidate identities for decryption, in precedence order:
 * `SI_VAULT_IDENTITY`, `SI_VAULT_PRIVATE_KEY`, `SI_VAULT_IDENTITY_FILE`,
 * then the configured backend (current, then previous).
 *
 * Environment candidates are parsed eagerly; the backend is consulted only
 * when no environment candidate opens a value, and at most once.
 */

import * as path from 'node:path'
import { decryptWith } from '../cipher/age.js'
import { DecryptFailedError, IdentityUnavailableError } from '../errors.js'
import { expandHome } from '../paths.js'
import { readIdentityFile } from './file-store.js'
import { parseIdentity } from './identity.js'
import type { VaultIdentity } from './identity.js'
import type { IdentityStore } from './types.js'

/** Mutable environment view; loading from sun exports `SI_VAULT_IDENTITY`. */
export type MutableEnv = Record<string, string | undefined>

/** Options for {@link Keyring.create}. */
export interface KeyringOptions {
  env: MutableEnv
  store: IdentityStore
  cwd: string
  homeDir: string
  allowInsecureKeyFile: boolean
}

function envValue(env: MutableEnv, name: string): string | undefined {
  const value = env[name]?.trim()
  return value !== undefined && value.length > 0 ? value : undefined
}

/** Result of a successful decryption. */
export interface Opened {
  plaintext: string
  identity: VaultIdentity
}

/**
 * Ordered identity candidates with lazy backend loading.
 * @internal
 */
export class Keyring {
  readonly #fromEnv: VaultIdentity[]
  readonly #store: IdentityStore
  readonly #env: MutableEnv
  #fromBackend: Promise<VaultIdentity[]> | undefined

  private constructor(fromEnv: VaultIdentity[], store: IdentityStore, env: MutableEnv) {
    this.#fromEnv = fromEnv
    this.#store = store
    this.#env = env
  }

  /**
   * Parse environment-provided identities.
   *
   * @throws {@link IdentityUnavailableError} when an identity variable is
   * set but invalid, or `SI_VAULT_IDENTITY_FILE` does not exist.
   */
  static async create(options: KeyringOptions): Promise<Keyring> {
    const { env } = options
    const fromEnv: VaultIdentity[] = []

    const inline = envValue(env, 'SI_VAULT_IDENTITY')
    if (inline !== undefined) {
      fromEnv.push(await parseIdentity(inline, 'env', 'SI_VAULT_IDENTITY'))
    }
    const privateKey = envValue(env, 'SI_VAULT_PRIVATE_KEY')
    if (privateKey !== undefined) {
      fromEnv.push(await parseIdentity(privateKey, 'env-private-key', 'SI_VAULT_PRIVATE_KEY'))
    }
    const identityFile = envValue(env, 'SI_VAULT_IDENTITY_FILE')
    if (identityFile !== undefined) {
      const resolved = path.resolve(options.cwd, expandHome(identityFile, options.homeDir))
      const loaded = await readIdentityFile(resolved, 'env-file', options.allowInsecureKeyFile)
      if (loaded === undefined) {
        throw new IdentityUnavailableError(`SI_VAULT_IDENTITY_FILE not found: ${resolved}`)
      }
      fromEnv.push(loaded)
    }

    return new Keyring(dedupe(fromEnv), options.store, env)
  }

  /** Backend the keyring falls back to. */
  get store(): IdentityStore {
    return this.#store
  }

  /** Backend identities (current, then previous), loaded once. */
  async backendIdentities(): Promise<VaultIdentity[]> {
    this.#fromBackend ??= this.#loadBackend()
    return this.#fromBackend
  }

  /** Every candidate in precedence order, without duplicates. */
  async all(): Promise<VaultIdentity[]> {
    return dedupe([...this.#fromEnv, ...(await this.backendIdentities())])
  }

  /** The highest-precedence identity, if any. */
  async primary(): Promise<VaultIdentity | undefined> {
    return this.#fromEnv[0] ?? (await this.backendIdentities())[0]
  }

  /**
   * The highest-precedence identity.
   *
   * @throws {@link IdentityUnavailableError} when there is none.
   */
  async require(): Promise<VaultIdentity> {
    const identity = await this.primary()
    if (identity === undefined) {
      throw new IdentityUnavailableError(`no vault identity available (checked environment and ${this.#store.location})`)
    }
    return identity
  }

  /**
   * Decrypt with the first candidate that opens the value.
   *
   * @throws {@link DecryptFailedError} listing every fingerprint tried.
   */
  async decrypt(wrapped: string, key?: string): Promise<Opened> {
    if (this.#fromEnv.length > 0) {
      try {
        return await decryptWith(wrapped, this.#fromEnv, key)
      } catch (err) {
        if (!(err instanceof DecryptFailedError)) {
          throw err
        }
      }
    }
    return decryptWith(wrapped, await this.all(), key)
  }

  async #loadBackend(): Promise<VaultIdentity[]> {
    const current = await this.#store.load()
    const previous = await this.#store.loadPrevious()
    if (current !== undefined && this.#store.backend === 'sun' && envValue(this.#env, 'SI_VAULT_IDENTITY') === undefined) {
      this.#env['SI_VAULT_IDENTITY'] = current.secret
    }
    return [current, previous].filter((i): i is VaultIdentity => i !== undefined)
  }
}

function dedupe(identities: VaultIdentity[]): VaultIdentity[] {
  const seen = new Set<string>()
  return identities.filter((identity) => {
    if (seen.has(identity.recipient)) {
      return false
    }
    seen.add(identity.recipient)
    return true
  })
}
