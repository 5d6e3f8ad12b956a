import type { DotenvDocument } from './document.js'

/** Classification of every meaningful line of a document. */
export interface EncryptionScan {
  /** Keys whose effective value is wrapped ciphertext. */
  encrypted: string[]
  /** Keys whose effective value is plaintext (empty values included). */
  plaintext: string[]
  /** Zero-based indexes of malformed lines. */
  malformed: number[]
}

/**
 * Classify the document's keys as encrypted or plaintext, following
 * last-wins, and list malformed lines. Never decrypts.
 */
export function scanDotenvEncryption(doc: DotenvDocument): EncryptionScan {
  const scan: EncryptionScan = { encrypted: [], plaintext: [], malformed: [] }
  for (const entry of doc.entries()) {
    if (entry.kind === 'malformed') {
      scan.malformed.push(entry.line)
    }
  }
  for (const entry of doc.effectiveEntries()) {
    if (entry.encrypted) {
      scan.encrypted.push(entry.key)
    } else {
      scan.plaintext.push(entry.key)
    }
  }
  return scan
}
