/**
 * Types for the identity layer.
 */

import type { KeyBackend } from '../types.js'
import type { VaultIdentity } from './identity.js'

/**
 * Persistence for the current identity and the one retained by the last
 * rotation.
 * @internal
 */
export interface IdentityStore {
  readonly backend: KeyBackend
  /** Human-readable location, e.g. a file path or `sun:identity/default`. */
  readonly location: string
  /** The current identity, or `undefined` when none is stored. */
  load(): Promise<VaultIdentity | undefined>
  /** The identity retained by the last rotation, if any. */
  loadPrevious(): Promise<VaultIdentity | undefined>
  /** Store `identity` as current. */
  save(identity: VaultIdentity): Promise<void>
  /**
   * Make `next` current. The existing identity is retained as previous
   * and returned.
   */
  rotate(next: VaultIdentity): Promise<VaultIdentity | undefined>
}
