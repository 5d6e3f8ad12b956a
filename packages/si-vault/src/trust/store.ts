/**
 * Trust-on-first-use records binding vault files to their recipient.
 *
 * @remarks
 * Stored as JSON (`{ schema_version, entries: { <path>: record } }`) at
 * `~/.si/vault/trust.json`, mode 0600. The first read of a file records its
 * recipient; later reads either match (`ok`) or report `changed`. A changed
 * recipient is only recorded when the caller explicitly replaces it.
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { TrustMismatchError, VaultError, isErrnoError } from '../errors.js'
import { fingerprintOf } from '../identity/identity.js'
import type { TrustRecord, TrustState } from '../types.js'
import { atomicWriteFile } from '../util/atomic-write.js'
import { withFileLock } from '../util/lock.js'

const SCHEMA_VERSION = 1

/** Outcome of {@link TrustStore.check}. */
export interface TrustCheck {
  state: TrustState
  /** The stored record, if any. */
  record: TrustRecord | undefined
}

interface StoredRecord {
  recipient: string
  fingerprint: string
  first_seen: string
  last_seen: string
}

function isStoredRecord(value: unknown): value is StoredRecord {
  if (typeof value !== 'object' || value === null) return false
  return (
    'recipient' in value &&
    typeof value.recipient === 'string' &&
    'fingerprint' in value &&
    typeof value.fingerprint === 'string' &&
    'first_seen' in value &&
    typeof value.first_seen === 'string' &&
    'last_seen' in value &&
    typeof value.last_seen === 'string'
  )
}

function toRecord(key: string, stored: StoredRecord): TrustRecord {
  return {
    path: key,
    recipient: stored.recipient,
    fingerprint: stored.fingerprint,
    firstSeen: stored.first_seen,
    lastSeen: stored.last_seen,
  }
}

function later(a: string, b: string): string {
  return Date.parse(b) > Date.parse(a) ? b : a
}

/**
 * Canonical trust key of a local vault file: its real path when it exists,
 * otherwise the resolved absolute path.
 */
export async function canonicalTrustPath(filePath: string): Promise<string> {
  const absolute = path.resolve(filePath)
  try {
    return await fs.realpath(absolute)
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return absolute
    }
    throw err
  }
}

/**
 * JSON-file trust store.
 * @internal
 */
export class TrustStore {
  readonly #filePath: string
  readonly #clock: () => Date

  constructor(filePath: string, clock: () => Date = () => new Date()) {
    this.#filePath = filePath
    this.#clock = clock
  }

  get filePath(): string {
    return this.#filePath
  }

  /** Every stored record, keyed by trust path. */
  async load(): Promise<Map<string, TrustRecord>> {
    let text: string
    try {
      text = await fs.readFile(this.#filePath, 'utf8')
    } catch (err) {
      if (isErrnoError(err, 'ENOENT')) {
        return new Map()
      }
      throw err
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (err) {
      throw new VaultError(`parse trust store ${this.#filePath}: invalid JSON`, { cause: err })
    }
    const records = new Map<string, TrustRecord>()
    if (typeof parsed !== 'object' || parsed === null || !('entries' in parsed)) {
      return records
    }
    const entries: unknown = parsed.entries
    if (typeof entries !== 'object' || entries === null) {
      return records
    }
    for (const [key, value] of Object.entries(entries)) {
      if (isStoredRecord(value)) {
        records.set(key, toRecord(key, value))
      }
    }
    return records
  }

  /** The record for `key`, if any. */
  async status(key: string): Promise<TrustRecord | undefined> {
    return (await this.load()).get(key)
  }

  /** Compare `recipient` against the stored record without writing. */
  async check(key: string, recipient: string): Promise<TrustCheck> {
    const record = await this.status(key)
    if (record === undefined) {
      return { state: 'first-seen', record }
    }
    return { state: record.recipient === recipient ? 'ok' : 'changed', record }
  }

  /**
   * Record a successful read of `key` with `recipient`. A new record is
   * created on first sight; a matching record has `lastSeen` advanced.
   *
   * @throws {@link TrustMismatchError} when the stored recipient differs and
   * `replace` is not set.
   */
  async record(key: string, recipient: string, options?: { replace?: boolean }): Promise<TrustRecord> {
    return withFileLock(this.#filePath, async () => {
      const records = await this.load()
      const now = this.#clock().toISOString()
      const existing = records.get(key)

      let next: TrustRecord
      if (existing !== undefined && existing.recipient === recipient) {
        next = { ...existing, lastSeen: later(existing.lastSeen, now) }
      } else if (existing !== undefined && options?.replace !== true) {
        throw new TrustMismatchError(key, existing.recipient, recipient)
      } else {
        next = { path: key, recipient, fingerprint: fingerprintOf(recipient), firstSeen: now, lastSeen: now }
      }

      records.set(key, next)
      await this.#save(records)
      return next
    })
  }

  /**
   * Drop the record for `key`.
   *
   * @returns whether a record existed.
   */
  async forget(key: string): Promise<boolean> {
    return withFileLock(this.#filePath, async () => {
      const records = await this.load()
      if (!records.delete(key)) {
        return false
      }
      await this.#save(records)
      return true
    })
  }

  async #save(records: Map<string, TrustRecord>): Promise<void> {
    const entries: Record<string, StoredRecord> = {}
    for (const key of [...records.keys()].sort()) {
      const record = records.get(key)
      if (record === undefined) continue
      entries[key] = {
        recipient: record.recipient,
        fingerprint: record.fingerprint,
        first_seen: record.firstSeen,
        last_seen: record.lastSeen,
      }
    }
    const body = JSON.stringify({ schema_version: SCHEMA_VERSION, entries }, null, 2) + '\n'
    await atomicWriteFile(this.#filePath, body, { mode: 0o600, dirMode: 0o700 })
  }
}
