/**
 * Wrapped-value encodings.
 *
 * @remarks
 * | Prefix       | Payload                                         | Written |
 * |--------------|-------------------------------------------------|---------|
 * | `v1:`        | base64 of the complete age message              | never   |
 * | `v2-legacy:` | base64 of the message minus the constant lead   | never   |
 * | `v2:`        | same as `v2-legacy:`, URL-safe and unpadded     | always  |
 *
 * The constant lead is the age magic line plus the start of the X25519
 * stanza. Decoding accepts both base64 alphabets, with or without padding.
 *
 * @packageDocumentation
 */

import { VaultError } from '../errors.js'

/** Name of a ciphertext encoding. */
export type CiphertextEncoding = 'v1' | 'v2-legacy' | 'v2'

/** Prefix written in front of each encoding's payload. */
export const CIPHERTEXT_PREFIXES = {
  v1: 'v1:',
  'v2-legacy': 'v2-legacy:',
  v2: 'v2:',
} as const satisfies Record<CiphertextEncoding, string>

/** Encoding produced by every write. */
export const CURRENT_ENCODING: CiphertextEncoding = 'v2'

/** First line of every age message. */
export const AGE_MAGIC_LINE = 'age-encryption.org/v1\n'

const COMPACT_LEAD = AGE_MAGIC_LINE + '-> X25519 '
const MAC_LINE_MARKER = '\n--- '

// Longest prefix first so `v2-legacy:` is not read as `v2:`.
const PREFIX_ORDER: readonly CiphertextEncoding[] = ['v2-legacy', 'v2', 'v1']

const BASE64_PAYLOAD = /^[A-Za-z0-9+/_-]+={0,2}$/

/** A wrapped value split into its encoding and payload. */
export interface WrappedParts {
  encoding: CiphertextEncoding
  payload: string
}

/** Split a value into prefix and payload, if it carries a known prefix. */
export function splitWrapped(value: string): WrappedParts | undefined {
  const trimmed = value.trim()
  for (const encoding of PREFIX_ORDER) {
    const prefix = CIPHERTEXT_PREFIXES[encoding]
    if (trimmed.startsWith(prefix)) {
      return { encoding, payload: trimmed.slice(prefix.length) }
    }
  }
  return undefined
}

type Decoded =
  | { ok: true; encoding: CiphertextEncoding; bytes: Uint8Array }
  | { ok: false; reason: string }

function decodeBase64(payload: string): Uint8Array | string {
  const trimmed = payload.trim()
  if (trimmed.length === 0) {
    return 'invalid ciphertext payload: empty'
  }
  if (!BASE64_PAYLOAD.test(trimmed)) {
    return 'invalid ciphertext payload: not base64'
  }
  const urlSafe = /[-_]/.test(trimmed)
  const standard = /[+/]/.test(trimmed)
  if (urlSafe && standard) {
    return 'invalid ciphertext payload: mixed base64 alphabets'
  }
  const body = trimmed.replace(/=+$/, '')
  if (body.length % 4 === 1) {
    return 'invalid ciphertext payload: truncated base64'
  }
  if (trimmed.length !== body.length && trimmed.length % 4 !== 0) {
    return 'invalid ciphertext payload: bad padding'
  }
  return new Uint8Array(Buffer.from(body, urlSafe ? 'base64url' : 'base64'))
}

function startsWithBytes(bytes: Uint8Array, lead: string): boolean {
  return Buffer.from(bytes.subarray(0, lead.length)).toString('latin1') === lead
}

function tryDecode(value: string): Decoded {
  const parts = splitWrapped(value)
  if (parts === undefined) {
    return { ok: false, reason: 'value is not v2:, v2-legacy: or v1: ciphertext' }
  }
  const raw = decodeBase64(parts.payload)
  if (typeof raw === 'string') {
    return { ok: false, reason: raw }
  }
  if (parts.encoding === 'v1' || startsWithBytes(raw, AGE_MAGIC_LINE)) {
    return { ok: true, encoding: parts.encoding, bytes: raw }
  }
  const lead = Buffer.from(COMPACT_LEAD, 'latin1')
  return { ok: true, encoding: parts.encoding, bytes: new Uint8Array(Buffer.concat([lead, raw])) }
}

/**
 * Why a value is not a well-formed wrapped age message, or `undefined` when
 * it is one.
 */
export function ciphertextProblem(value: string): string | undefined {
  const decoded = tryDecode(value)
  if (!decoded.ok) {
    return decoded.reason
  }
  const text = Buffer.from(decoded.bytes).toString('latin1')
  if (!text.startsWith(AGE_MAGIC_LINE)) {
    return 'invalid ciphertext payload: not age format'
  }
  if (!text.includes(MAC_LINE_MARKER)) {
    return 'invalid ciphertext payload: missing age MAC line'
  }
  return undefined
}

/**
 * Whether a plain value is wrapped ciphertext: a known prefix whose payload
 * decodes to an age message with a MAC line. Anything else, `v2:token`
 * included, is plaintext.
 */
export function isEncrypted(value: string): boolean {
  return ciphertextProblem(value) === undefined
}

/**
 * Decode a wrapped value into the complete age message bytes.
 *
 * @throws {@link VaultError} (kind `decrypt-failed`) for unknown prefixes or
 * invalid payloads.
 */
export function decodeCiphertext(value: string): { encoding: CiphertextEncoding; bytes: Uint8Array } {
  const decoded = tryDecode(value)
  if (!decoded.ok) {
    throw new VaultError(decoded.reason, { kind: 'decrypt-failed' })
  }
  return { encoding: decoded.encoding, bytes: decoded.bytes }
}

/** Wrap a complete age message in the current encoding. */
export function encodeCiphertext(bytes: Uint8Array): string {
  if (!startsWithBytes(bytes, COMPACT_LEAD)) {
    throw new VaultError('age output does not start with an X25519 stanza')
  }
  const body = Buffer.from(bytes.subarray(COMPACT_LEAD.length)).toString('base64url')
  return CIPHERTEXT_PREFIXES[CURRENT_ENCODING] + body
}

/**
 * Check that a wrapped value decodes to an age message with a MAC line.
 *
 * @throws {@link VaultError} (kind `decrypt-failed`) when it does not.
 */
export function validateCiphertext(value: string): void {
  const problem = ciphertextProblem(value)
  if (problem !== undefined) {
    throw new VaultError(problem, { kind: 'decrypt-failed' })
  }
}
