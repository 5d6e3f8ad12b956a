/**
 * Sync backends: where full-vault backups and the shared identity go.
 *
 * @remarks
 * `off` keeps everything local. `git` leaves versioning to the operator's
 * commits. `sun` stores the vault as a `vault-backup` object per scope and
 * the identity as an `identity` object. Every backup runs the plaintext-leak
 * guard before the backend is touched.
 *
 * @packageDocumentation
 */

import { scanDotenvEncryption } from '../dotenv/scan.js'
import { DotenvDocument } from '../dotenv/document.js'
import { BackendUnavailableError, PlaintextLeakGuardError } from '../errors.js'
import type { VaultIdentity } from '../identity/identity.js'
import { SunIdentityStore } from '../identity/sun-store.js'
import type { SyncMode } from '../types.js'
import type { SunObjectClient } from './sun-client.js'

/** Object kind holding vault backups, one object per scope. */
export const VAULT_BACKUP_KIND = 'vault-backup'

/** Context attached to a backup. */
export interface BackupMetadata {
  /** File name (not path) the backup came from, or the scope in strict sun mode. */
  path: string
  /** Operation that triggered the backup, e.g. `set`. */
  source: string
}

/** Pluggable sink for vault backups and the identity. */
export interface SyncBackend {
  readonly mode: SyncMode
  /**
   * Store a full-vault backup.
   *
   * @throws {@link PlaintextLeakGuardError} before contacting anything when a
   * plaintext value remains.
   */
  putBackup(scope: string, doc: DotenvDocument, metadata: BackupMetadata): Promise<void>
  /** The stored backup for `scope`, if any. */
  getBackup(scope: string): Promise<DotenvDocument | undefined>
  putIdentity(identity: VaultIdentity): Promise<void>
  getIdentity(): Promise<VaultIdentity | undefined>
}

/**
 * Refuse to back up a document that still holds plaintext values.
 *
 * @throws {@link PlaintextLeakGuardError}
 */
export function assertNoPlaintext(doc: DotenvDocument): void {
  const { plaintext } = scanDotenvEncryption(doc)
  if (plaintext.length > 0) {
    throw new PlaintextLeakGuardError([...plaintext].sort())
  }
}

/** Local-only mode: backups are checked and dropped. */
export class OffSyncBackend implements SyncBackend {
  readonly mode: SyncMode = 'off'

  async putBackup(_scope: string, doc: DotenvDocument): Promise<void> {
    assertNoPlaintext(doc)
  }

  async getBackup(): Promise<DotenvDocument | undefined> {
    return undefined
  }

  async putIdentity(): Promise<void> {
    // Identities stay in the configured key backend.
  }

  async getIdentity(): Promise<VaultIdentity | undefined> {
    return undefined
  }
}

/** The operator commits the vault file; only the guard applies. */
export class GitSyncBackend extends OffSyncBackend {
  override readonly mode: SyncMode = 'git'
}

/** Backups and identity in the sun object service. */
export class SunSyncBackend implements SyncBackend {
  readonly mode: SyncMode = 'sun'
  readonly #client: SunObjectClient | undefined
  readonly #identities: SunIdentityStore

  constructor(client: SunObjectClient | undefined) {
    this.#client = client
    this.#identities = new SunIdentityStore(client)
  }

  async putBackup(scope: string, doc: DotenvDocument, metadata: BackupMetadata): Promise<void> {
    assertNoPlaintext(doc)
    await this.#requireClient().putObject({
      kind: VAULT_BACKUP_KIND,
      name: scope,
      bytes: new Uint8Array(Buffer.from(doc.emit(), 'utf8')),
      contentType: 'text/plain',
      metadata: { path: metadata.path, source: metadata.source },
    })
  }

  async getBackup(scope: string): Promise<DotenvDocument | undefined> {
    const object = await this.#requireClient().getObject(VAULT_BACKUP_KIND, scope)
    if (object === undefined) {
      return undefined
    }
    return DotenvDocument.parse(Buffer.from(object.bytes).toString('utf8'))
  }

  async putIdentity(identity: VaultIdentity): Promise<void> {
    await this.#identities.save(identity)
  }

  async getIdentity(): Promise<VaultIdentity | undefined> {
    return this.#identities.load()
  }

  #requireClient(): SunObjectClient {
    if (this.#client === undefined) {
      throw new BackendUnavailableError(
        'sun is not configured (set sun.base_url and sun.token in ~/.si/sun/settings.toml)',
        'not-configured',
      )
    }
    return this.#client
  }
}

/** Backend for a sync mode. */
export function createSyncBackend(mode: SyncMode, client: SunObjectClient | undefined): SyncBackend {
  switch (mode) {
    case 'off':
      return new OffSyncBackend()
    case 'git':
      return new GitSyncBackend()
    case 'sun':
      return new SunSyncBackend(client)
  }
}

/**
 * Sun-mode hydration: make sure `SI_VAULT_IDENTITY` is populated from the
 * sun identity. Never writes vault bytes anywhere.
 *
 * @returns the identity now in the environment, or `undefined` when sun
 * holds none.
 */
export async function hydrateFromSun(
  backend: SyncBackend,
  env: Record<string, string | undefined>,
): Promise<VaultIdentity | undefined> {
  const identity = await backend.getIdentity()
  if (identity !== undefined) {
    env['SI_VAULT_IDENTITY'] = identity.secret
  }
  return identity
}
