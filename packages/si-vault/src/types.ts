/**
 * Shared types and interfaces for si-vault.
 */

/** Sync backend mode. */
export type SyncMode = 'off' | 'git' | 'sun'

/** Where the identity is persisted. */
export type KeyBackend = 'file' | 'sun'

/** Storage a target resolves to. */
export type TargetBackend = 'local' | 'sun'

/** A resolved vault location. */
export interface Target {
  /** Logical scope name (e.g. `default`, `paas-prod`). */
  scope: string
  /**
   * Absolute file path for `local` targets; the sun object name for `sun`
   * targets.
   */
  path: string
  backend: TargetBackend
  /** Whether the target came from an explicit `--file`. */
  explicit: boolean
}

/** Result of comparing a file's recipient with the trust store. */
export type TrustState = 'ok' | 'first-seen' | 'changed'

/** Recorded binding between a vault file and its recipient. */
export interface TrustRecord {
  /** Canonical absolute path, or `sun:<scope>` for sun targets. */
  path: string
  recipient: string
  fingerprint: string
  /** ISO-8601 timestamp of the first successful read. */
  firstSeen: string
  /** ISO-8601 timestamp of the latest matching read. Never decreases. */
  lastSeen: string
}

/** Outcome category recorded in the audit log. */
export type AuditResult = 'ok' | 'error' | `error:${string}`

/** Fields of an audit entry supplied by the operation. */
export interface AuditFields {
  op: string
  scope: string
  key?: string | undefined
  encrypted: boolean
  /** Storage the operation ran against: `local`, `sun`. */
  source: string
  /** Fingerprint of the identity used, or `''` when none was needed. */
  identity_fingerprint: string
  result: AuditResult
  [extra: string]: unknown
}

/** One audit log line. Never carries plaintext or ciphertext. */
export interface AuditEntry extends AuditFields {
  ts: string
}

/** A stored object in the sun service. */
export interface SunObject {
  kind: SunObjectKind
  name: string
  bytes: Uint8Array
  contentType: string
  metadata: Record<string, string>
}

/** Object kinds the vault reads and writes. */
export type SunObjectKind = 'identity' | 'vault-backup'

/** Diagnostic sink. Library code never writes to the process streams. */
export interface VaultLogger {
  warn(message: string): void
  info(message: string): void
}
