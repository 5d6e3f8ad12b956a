/**
 * Append-only JSONL audit log.
 *
 * @remarks
 * One JSON object per line, appended with `O_APPEND` so concurrent writers
 * interleave at line boundaries. The file is created 0600 inside a 0700
 * directory. Entries carry key names, scopes, fingerprints and result
 * categories; never values.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import type { AuditEntry, AuditFields, AuditResult, VaultLogger } from '../types.js'

/** Fields that must never reach the audit log. */
const FORBIDDEN_FIELDS = new Set(['value', 'plaintext', 'ciphertext', 'secret'])

function scrub(event: AuditFields): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [field, value] of Object.entries(event)) {
    if (FORBIDDEN_FIELDS.has(field) || value === undefined) continue
    out[field] = value
  }
  return out
}

/**
 * Map an error onto an audit result category.
 * @internal
 */
export function auditResultFor(err: unknown): AuditResult {
  if (typeof err === 'object' && err !== null && 'kind' in err && typeof err.kind === 'string') {
    return `error:${err.kind}`
  }
  return 'error'
}

/**
 * Audit log writer.
 * @internal
 */
export class AuditLog {
  readonly #filePath: string
  readonly #clock: () => Date
  readonly #log: VaultLogger

  constructor(filePath: string, log: VaultLogger, clock: () => Date = () => new Date()) {
    this.#filePath = filePath
    this.#log = log
    this.#clock = clock
  }

  get filePath(): string {
    return this.#filePath
  }

  /**
   * Append one entry. Failures are reported through the logger and never
   * propagate.
   */
  async record(event: AuditFields): Promise<void> {
    const entry: AuditEntry = { ts: this.#clock().toISOString(), ...event }
    const line = JSON.stringify(scrub(entry)) + '\n'
    try {
      await fs.mkdir(path.dirname(this.#filePath), { recursive: true, mode: 0o700 })
      await fs.writeFile(this.#filePath, line, { flag: 'a', mode: 0o600 })
    } catch (err) {
      this.#log.warn(`audit log write failed (${this.#filePath}): ${err instanceof Error ? err.message : String(err)}`)
    }
  }
}
