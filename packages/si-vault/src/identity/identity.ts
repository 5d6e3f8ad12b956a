/**
 * age X25519 identities and their derived recipient and fingerprint.
 *
 * @packageDocumentation
 */

import * as crypto from 'node:crypto'
import { generateIdentity as generateAgeIdentity, identityToRecipient } from 'age-encryption'
import { IdentityUnavailableError } from '../errors.js'

/** Where an identity was loaded from. */
export type IdentitySource =
  | 'env'
  | 'env-private-key'
  | 'env-file'
  | 'file'
  | 'file-previous'
  | 'sun'
  | 'sun-previous'
  | 'generated'

/** A loaded age identity. `secret` never leaves the process except to sun. */
export interface VaultIdentity {
  /** `AGE-SECRET-KEY-1...` string. */
  secret: string
  /** `age1...` public recipient. */
  recipient: string
  /** First 16 hex characters of SHA-256 over the recipient. */
  fingerprint: string
  source: IdentitySource
}

const SECRET_KEY_PATTERN = /^AGE-SECRET-KEY-1[0-9A-Z]+$/
const RECIPIENT_PATTERN = /^age1[0-9a-z]+$/

/** Short, stable hash of a recipient for display and audit records. */
export function fingerprintOf(recipient: string): string {
  return crypto.createHash('sha256').update(recipient.trim()).digest('hex').slice(0, 16)
}

/** Whether `value` looks like an age X25519 recipient. */
export function isRecipient(value: string): boolean {
  return RECIPIENT_PATTERN.test(value.trim())
}

/** Generate a fresh identity. */
export async function generateIdentity(): Promise<VaultIdentity> {
  const secret = await generateAgeIdentity()
  const recipient = await identityToRecipient(secret)
  return { secret, recipient, fingerprint: fingerprintOf(recipient), source: 'generated' }
}

/**
 * Parse identity text. Accepts a bare secret key or an age key file (comment
 * lines are skipped; the first secret key line wins).
 *
 * @param label - Names the input in error messages, e.g. `SI_VAULT_IDENTITY`.
 * @throws {@link IdentityUnavailableError} when no valid key is found.
 */
export async function parseIdentity(
  text: string,
  source: IdentitySource,
  label: string,
): Promise<VaultIdentity> {
  const line = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.length > 0 && !l.startsWith('#'))
  if (line === undefined || !SECRET_KEY_PATTERN.test(line)) {
    throw new IdentityUnavailableError(`${label} invalid: expected an AGE-SECRET-KEY-1 identity`)
  }
  let recipient: string
  try {
    recipient = await identityToRecipient(line)
  } catch (err) {
    throw new IdentityUnavailableError(`${label} invalid: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    })
  }
  return { secret: line, recipient, fingerprint: fingerprintOf(recipient), source }
}

/** Render an identity in age key file format. */
export function renderIdentityFile(identity: VaultIdentity, createdAt: Date): string {
  return (
    `# created: ${createdAt.toISOString()}\n` +
    `# public key: ${identity.recipient}\n` +
    `${identity.secret}\n`
  )
}
