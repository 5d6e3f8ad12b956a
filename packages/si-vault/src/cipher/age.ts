/**
 * Value-level age encryption.
 *
 * @remarks
 * Each value is its own age message with one X25519 stanza per vault
 * recipient.
 * Decryption tries every candidate identity in order and reports the
 * fingerprints it tried when none opens the value.
 *
 * @packageDocumentation
 */

import { Decrypter, Encrypter } from 'age-encryption'
import { DecryptFailedError, VaultError } from '../errors.js'
import type { VaultIdentity } from '../identity/identity.js'
import { decodeCiphertext, encodeCiphertext, validateCiphertext } from './encoding.js'

/**
 * Encrypt `plaintext` to one or more recipients in the current encoding.
 *
 * @throws {@link VaultError} when a recipient is not a valid age recipient.
 */
export async function encryptValue(plaintext: string, recipients: string | readonly string[]): Promise<string> {
  const encrypter = new Encrypter()
  for (const recipient of typeof recipients === 'string' ? [recipients] : recipients) {
    try {
      encrypter.addRecipient(recipient)
    } catch (err) {
      throw new VaultError(`invalid recipient ${recipient}`, { kind: 'bad-input', cause: err })
    }
  }
  const bytes = await encrypter.encrypt(plaintext)
  return encodeCiphertext(bytes)
}

/**
 * Decrypt a wrapped value with the first identity that opens it and report
 * which one did.
 *
 * @param key - Key name, used only in error messages.
 * @throws {@link DecryptFailedError} when no identity opens the value.
 */
export async function decryptWith(
  wrapped: string,
  identities: readonly VaultIdentity[],
  key?: string,
): Promise<{ plaintext: string; identity: VaultIdentity }> {
  let bytes: Uint8Array
  try {
    validateCiphertext(wrapped)
    bytes = decodeCiphertext(wrapped).bytes
  } catch (err) {
    const subject = key !== undefined ? ` for ${key}` : ''
    const detail = err instanceof Error ? err.message : String(err)
    throw new VaultError(`cannot decode ciphertext${subject}: ${detail}`, {
      kind: 'decrypt-failed',
      cause: err,
    })
  }

  const failures: unknown[] = []
  for (const identity of identities) {
    const decrypter = new Decrypter()
    decrypter.addIdentity(identity.secret)
    try {
      return { plaintext: await decrypter.decrypt(bytes, 'text'), identity }
    } catch (err) {
      failures.push(err)
    }
  }
  throw new DecryptFailedError(
    key,
    identities.map((i) => i.fingerprint),
    failures.length > 0 ? { cause: new AggregateError(failures, 'all identities failed') } : undefined,
  )
}

/**
 * Decrypt a wrapped value with the first identity that opens it.
 *
 * @throws {@link DecryptFailedError} when no identity opens the value.
 */
export async function decryptValue(
  wrapped: string,
  identities: readonly VaultIdentity[],
  key?: string,
): Promise<string> {
  return (await decryptWith(wrapped, identities, key)).plaintext
}

/** Decrypt and re-encrypt a value with a fresh ephemeral key. */
export async function reencryptValue(
  wrapped: string,
  identities: readonly VaultIdentity[],
  recipients: string | readonly string[],
  key?: string,
): Promise<string> {
  const plain = await decryptValue(wrapped, identities, key)
  return encryptValue(plain, recipients)
}
