/**
 * Error hierarchy for si-vault.
 *
 * Every failure a vault command can surface maps onto exactly one
 * {@link VaultErrorKind}. Low-level errors (fs, base64, age) are wrapped once
 * with context and attached as `cause`.
 *
 * @packageDocumentation
 */

/** Closed set of error categories surfaced to users and the audit log. */
export type VaultErrorKind =
  | 'bad-input'
  | 'not-initialized'
  | 'identity-unavailable'
  | 'decrypt-failed'
  | 'trust-mismatch'
  | 'plaintext-leak-guard'
  | 'backend-unavailable'
  | 'conflict'
  | 'settings'
  | 'operational'

/** Base error for all si-vault errors. */
export class VaultError extends Error {
  /** Category used for exit codes and audit `result` fields. */
  readonly kind: VaultErrorKind

  /** Remediation hint printed after the message, if any. */
  readonly hint: string | undefined

  constructor(
    message: string,
    options?: { kind?: VaultErrorKind; hint?: string | undefined; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'VaultError'
    this.kind = options?.kind ?? 'operational'
    this.hint = options?.hint
  }
}

// --- Caller mistakes ---

/**
 * Thrown for invalid key names, malformed flag combinations and unknown
 * scopes. The CLI exits with status 2 for this kind.
 */
export class BadInputError extends VaultError {
  constructor(message: string, hint?: string) {
    super(message, { kind: 'bad-input', hint })
    this.name = 'BadInputError'
  }
}

/**
 * Thrown when a command needs a vault header (recipient line) and the file
 * has none.
 */
export class NotInitializedError extends VaultError {
  /** The vault file or sun object the command was run against. */
  readonly path: string

  constructor(message: string, path: string) {
    super(message, { kind: 'not-initialized', hint: 'run `si vault init` first' })
    this.name = 'NotInitializedError'
    this.path = path
  }
}

// --- Identity and decryption ---

/**
 * Thrown when no identity is available from the environment, the key file or
 * the sun service.
 */
export class IdentityUnavailableError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, {
      kind: 'identity-unavailable',
      hint: 'run `si vault keygen` or set SI_VAULT_IDENTITY',
      cause: options?.cause,
    })
    this.name = 'IdentityUnavailableError'
  }
}

/**
 * Thrown when a wrapped value is present but none of the candidate
 * identities can open it. Never carries ciphertext bytes.
 */
export class DecryptFailedError extends VaultError {
  /** Key whose value failed to decrypt, when known. */
  readonly key: string | undefined

  /** Fingerprints of every identity that was tried. */
  readonly triedFingerprints: string[]

  constructor(key: string | undefined, triedFingerprints: string[], options?: { cause?: unknown }) {
    const subject = key !== undefined ? `value of ${key}` : 'value'
    const tried =
      triedFingerprints.length > 0 ? triedFingerprints.join(', ') : 'no identities available'
    super(`cannot decrypt ${subject} (tried: ${tried})`, {
      kind: 'decrypt-failed',
      hint:
        triedFingerprints.length > 0
          ? 'the value was encrypted to a different recipient; load the matching identity'
          : 'run `si vault keygen` or set SI_VAULT_IDENTITY',
      cause: options?.cause,
    })
    this.name = 'DecryptFailedError'
    this.key = key
    this.triedFingerprints = triedFingerprints
  }
}

// --- Trust ---

/**
 * Thrown when the recipient recorded in a vault file differs from the one
 * stored in the trust store and the caller did not force the operation.
 */
export class TrustMismatchError extends VaultError {
  /** Trust store key of the vault file. */
  readonly path: string

  /** Recipient previously recorded for this file. */
  readonly recordedRecipient: string

  /** Recipient currently found in the file header. */
  readonly currentRecipient: string

  constructor(path: string, recordedRecipient: string, currentRecipient: string) {
    super(
      `vault recipient changed for ${path}: recorded ${recordedRecipient}, found ${currentRecipient}`,
      {
        kind: 'trust-mismatch',
        hint: 'inspect with `si vault trust status`, then re-run with --force or `si vault trust accept`',
      },
    )
    this.name = 'TrustMismatchError'
    this.path = path
    this.recordedRecipient = recordedRecipient
    this.currentRecipient = currentRecipient
  }
}

// --- Sync ---

/**
 * Thrown when a backup is attempted while plaintext values remain. The
 * backend is not contacted.
 */
export class PlaintextLeakGuardError extends VaultError {
  /** Keys whose values are still plaintext. */
  readonly keys: string[]

  constructor(keys: string[]) {
    super(`refusing to back up vault with plaintext values: ${keys.join(', ')}`, {
      kind: 'plaintext-leak-guard',
      hint: 'run `si vault encrypt` first',
    })
    this.name = 'PlaintextLeakGuardError'
    this.keys = keys
  }
}

/**
 * Thrown when the sun service cannot be reached or answers with an error.
 * Fatal in strict sun mode, reported as a warning otherwise.
 */
export class BackendUnavailableError extends VaultError {
  /**
   * Machine-readable reason (e.g. `'not-configured'`, `'http-503'`,
   * `'network'`, `'timeout'`).
   */
  readonly reason: string

  constructor(message: string, reason: string, options?: { cause?: unknown }) {
    super(message, {
      kind: 'backend-unavailable',
      hint: 'check ~/.si/sun/settings.toml (base_url, token) and connectivity',
      cause: options?.cause,
    })
    this.name = 'BackendUnavailableError'
    this.reason = reason
  }
}

// --- Infrastructure ---

/**
 * Thrown when the vault file changed between read and rename.
 */
export class ConflictError extends VaultError {
  /** The vault file that changed underneath the command. */
  readonly path: string

  constructor(path: string) {
    super(`vault file changed during update: ${path}`, {
      kind: 'conflict',
      hint: 'another si process wrote the file; re-run the command',
    })
    this.name = 'ConflictError'
    this.path = path
  }
}

/**
 * Thrown when a settings module exists but cannot be read or parsed.
 */
export class SettingsError extends VaultError {
  /** Settings module name (e.g. `'vault'`, `'sun'`). */
  readonly module: string

  /** Absolute path of the module file. */
  readonly path: string

  constructor(message: string, module: string, path: string, options?: { cause?: unknown }) {
    super(message, { kind: 'settings', cause: options?.cause })
    this.name = 'SettingsError'
    this.module = module
    this.path = path
  }
}

/**
 * Wrap a low-level error once with operation context. Vault errors pass
 * through untouched.
 */
export function wrapError(err: unknown, context: string, hint?: string): VaultError {
  if (err instanceof VaultError) {
    return err
  }
  const detail = err instanceof Error ? err.message : String(err)
  return new VaultError(`${context}: ${detail}`, { hint, cause: err })
}

/** Narrow an unknown error to a Node.js errno error carrying `code`. */
export function isErrnoError(err: unknown, code?: string): err is NodeJS.ErrnoException {
  if (!(err instanceof Error) || !('code' in err)) {
    return false
  }
  return code === undefined || err.code === code
}
