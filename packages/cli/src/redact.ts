import { Transform } from 'node:stream'
import type { TransformCallback } from 'node:stream'

/** Secrets shorter than this are not redacted; they would mangle ordinary output. */
export const MIN_REDACT_LENGTH = 4

/**
 * A Transform stream that replaces every occurrence of any of the given
 * secret values with a replacement string in the piped output.
 *
 * Handles secrets that may be split across chunk boundaries by buffering
 * up to `longest secret - 1` characters from the end of each chunk.
 *
 * @internal
 */
export class RedactingStream extends Transform {
  readonly #secrets: string[]
  readonly #replacement: string
  readonly #bufferSize: number
  #tail: string

  constructor(secrets: string | Iterable<string>, replacement = '[REDACTED]') {
    super()
    const list = typeof secrets === 'string' ? [secrets] : [...secrets]
    // Longest first, so a secret containing another is replaced whole.
    this.#secrets = [...new Set(list.filter((s) => s.length >= MIN_REDACT_LENGTH))].sort(
      (a, b) => b.length - a.length,
    )
    this.#replacement = replacement
    this.#bufferSize = Math.max(0, (this.#secrets[0]?.length ?? 0) - 1)
    this.#tail = ''
  }

  override _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    if (this.#secrets.length === 0) {
      this.push(chunk)
      callback()
      return
    }

    const redacted = this.#redact(this.#tail + chunk.toString('utf8'))
    if (redacted.length > this.#bufferSize) {
      this.#tail = redacted.slice(redacted.length - this.#bufferSize)
      this.push(redacted.slice(0, redacted.length - this.#bufferSize))
    } else {
      this.#tail = redacted
    }

    callback()
  }

  override _flush(callback: TransformCallback): void {
    if (this.#tail.length > 0) {
      this.push(this.#tail)
      this.#tail = ''
    }
    callback()
  }

  #redact(text: string): string {
    let out = text
    for (const secret of this.#secrets) {
      out = out.replaceAll(secret, this.#replacement)
    }
    return out
  }
}
