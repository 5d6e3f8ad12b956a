/**
 * Vault — the operations behind `si vault …`, wired over an explicit
 * {@link VaultContext}.
 *
 * @remarks
 * Every operation resolves its target once, runs trust checks before
 * touching values, commits all mutations with a single write and appends
 * one audit entry whatever the outcome.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { AuditLog, auditResultFor } from './audit/log.js'
import { encryptValue } from './cipher/age.js'
import { createContext, envFlag } from './context.js'
import type { CreateContextOptions, VaultContext } from './context.js'
import { DotenvDocument } from './dotenv/document.js'
import { formatDocument } from './dotenv/format.js'
import {
  addRecipient,
  documentRecipient,
  ensureHeader,
  readRecipients,
  removeRecipient,
  replaceRecipient,
  trustSubject,
} from './dotenv/header.js'
import { scanDotenvEncryption } from './dotenv/scan.js'
import { renderValue, validateKeyName } from './dotenv/value.js'
import {
  BackendUnavailableError,
  BadInputError,
  IdentityUnavailableError,
  NotInitializedError,
  TrustMismatchError,
  VaultError,
  isErrnoError,
  wrapError,
} from './errors.js'
import { FileIdentityStore } from './identity/file-store.js'
import { fingerprintOf, generateIdentity, isRecipient } from './identity/identity.js'
import type { IdentitySource, VaultIdentity } from './identity/identity.js'
import { Keyring } from './identity/keyring.js'
import { SunIdentityStore } from './identity/sun-store.js'
import type { IdentityStore } from './identity/types.js'
import { stagedDotenvFiles, walkDotenvFiles } from './scope/discover.js'
import { resolveTarget, scopeForFile } from './scope/resolver.js'
import { effectiveKeyBackend, isStrictSun } from './settings.js'
import { VAULT_BACKUP_KIND, createSyncBackend, hydrateFromSun } from './sync/backend.js'
import type { SyncBackend } from './sync/backend.js'
import { LocalDocumentStore, SunDocumentStore, backupName } from './sync/document-store.js'
import type { DocumentStore } from './sync/document-store.js'
import { findGitRoot, refuseHiddenGitIndexEdits } from './sync/git-guard.js'
import { TrustStore, canonicalTrustPath } from './trust/store.js'
import type {
  AuditResult,
  KeyBackend,
  SyncMode,
  Target,
  TrustRecord,
  TrustState,
} from './types.js'

// --- Options ---

/** Target selection shared by every file command. */
export interface TargetOptions {
  scope?: string | undefined
  file?: string | undefined
}

/** Options of commands that rewrite the vault. */
export interface WriteOptions extends TargetOptions {
  /** Proceed despite a changed recipient. */
  force?: boolean | undefined
}

export interface SetOptions extends WriteOptions {
  /** Append a new key to this `# [section]` block. */
  section?: string | undefined
}

export interface RevealOptions extends TargetOptions {
  reveal?: boolean | undefined
}

export interface EncryptOptions extends WriteOptions {
  reencrypt?: boolean | undefined
}

export interface DecryptOptions extends WriteOptions {
  /** Return the decrypted document without touching storage. */
  stdout?: boolean | undefined
  /** Write the decrypted values back. */
  yes?: boolean | undefined
  /** Limit decryption to these keys. */
  keys?: string[] | undefined
}

export interface FmtOptions extends WriteOptions {
  /** Also format sibling `.env*` files. */
  all?: boolean | undefined
  /** Report without writing. */
  check?: boolean | undefined
  sort?: boolean | undefined
}

export interface CheckOptions {
  /** Files to check, relative to the working directory. */
  files?: string[] | undefined
  /** Check the `.env*` files staged in git. */
  staged?: boolean | undefined
  /** Check every `.env*` file under the repository root. */
  all?: boolean | undefined
  /** Also check files whose name contains `example`. */
  includeExamples?: boolean | undefined
}

export interface RunOptions extends TargetOptions {
  allowPlaintext?: boolean | undefined
  /** Command name, recorded in the audit log. */
  command?: string | undefined
  argCount?: number | undefined
}

// --- Results ---

export interface InitResult {
  target: Target
  recipient: string
  fingerprint: string
  /** The file or sun object was created or its header stamped. */
  changed: boolean
  keyCreated: boolean
  keyBackend: KeyBackend
  trust: TrustState
}

export interface StatusResult {
  target: Target
  exists: boolean
  recipient: string | undefined
  syncBackend: SyncMode
  keyBackend: KeyBackend
  identity: {
    available: boolean
    fingerprint?: string | undefined
    source?: IdentitySource | undefined
    /** Whether the active identity's recipient matches the header. */
    matchesRecipient?: boolean | undefined
  }
  trust: TrustState | 'unavailable'
  counts: { plaintext: number; encrypted: number; malformed: number }
}

export interface KeygenResult {
  keyBackend: KeyBackend
  location: string
  recipient: string
  fingerprint: string
  created: boolean
  rotated: boolean
  previousRecipient?: string | undefined
}

export interface SetResult {
  target: Target
  key: string
  encrypted: boolean
}

export interface GetResult {
  target: Target
  key: string
  encrypted: boolean
  /** Plain value; only present when revealed. */
  value?: string | undefined
}

export interface UnsetResult {
  target: Target
  key: string
  removed: boolean
}

export interface DumpEntry {
  key: string
  encrypted: boolean
  value?: string | undefined
}

export interface DumpResult {
  target: Target
  entries: DumpEntry[]
  decryptedCount: number
}

export interface EncryptResult {
  target: Target
  recipient: string
  encrypted: string[]
  reencrypted: string[]
  recipientChanged: boolean
}

export interface DecryptResult {
  target: Target
  decrypted: string[]
  /** The decrypted document (`--stdout`). */
  document?: string | undefined
  written: boolean
}

export interface FmtFileResult {
  target: Target
  changed: boolean
}

export interface FmtResult {
  files: FmtFileResult[]
  changed: boolean
}

export interface RecipientsListResult {
  target: Target
  recipients: string[]
  /** Fingerprint of the declared recipient set. */
  fingerprint: string | undefined
}

export interface RecipientChangeResult {
  target: Target
  recipient: string
  changed: boolean
  recipients: string[]
}

export interface CheckFinding {
  path: string
  /** Keys with plaintext values, sorted. */
  plaintext: string[]
}

export interface CheckResult {
  /** Files that existed and were checked. */
  checked: string[]
  findings: CheckFinding[]
}

export interface TrustStatusResult {
  target: Target
  key: string
  state: TrustState | 'unavailable'
  record: TrustRecord | undefined
  currentRecipient: string | undefined
  currentFingerprint: string | undefined
}

export interface TrustAcceptResult {
  target: Target
  record: TrustRecord
  previous: TrustRecord | undefined
}

export interface TrustForgetResult {
  target: Target
  removed: boolean
}

export interface RunEnvResult {
  target: Target
  /** Values to merge into the child environment. */
  env: Record<string, string>
  plaintextKeys: string[]
  decryptedCount: number
}

export interface HydrateResult {
  recipient: string
  fingerprint: string
}

export interface SyncPushResult {
  target: Target
  mode: SyncMode
  pushed: boolean
}

interface AuditSubject {
  scope: string
  source: string
}

interface AuditDraft {
  key?: string | undefined
  encrypted: boolean
  identity_fingerprint: string
  extra: Record<string, unknown>
}

const ENV_FILE_PATTERN = /^\.env(?:\.[A-Za-z0-9_.-]+)?$/

const IO_HINT = 'check that the vault path is a readable file and that ~/.si is writable'

function subjectOf(target: Target): AuditSubject {
  return { scope: target.scope, source: target.backend }
}

/** `vault get failed (scope default, key A)`. Never includes values. */
function failureContext(op: string, scope: string, key?: string): string {
  return `vault ${op} failed (scope ${scope}${key === undefined ? '' : `, key ${key}`})`
}

/** Human label of a target for messages. */
export function describeTarget(target: Target): string {
  return target.backend === 'sun' ? `sun:${VAULT_BACKUP_KIND}/${target.path}` : target.path
}

/**
 * The secret vault.
 *
 * @public
 */
export class Vault {
  readonly #ctx: VaultContext
  readonly #trust: TrustStore
  readonly #audit: AuditLog
  readonly #backend: SyncBackend
  #keyring: Promise<Keyring> | undefined

  constructor(ctx: VaultContext) {
    this.#ctx = ctx
    this.#trust = new TrustStore(ctx.paths.trustStore, ctx.clock)
    this.#audit = new AuditLog(ctx.paths.auditLog, ctx.log, ctx.clock)
    this.#backend = createSyncBackend(ctx.settings.vault.syncBackend, ctx.sun)
  }

  /**
   * Load settings and open a vault for one invocation.
   *
   * @throws {@link SettingsError} when a settings module is invalid.
   */
  static async open(options?: CreateContextOptions): Promise<Vault> {
    return new Vault(await createContext(options))
  }

  get context(): VaultContext {
    return this.#ctx
  }

  /** Resolve the target the given options select. */
  async resolve(options: TargetOptions, allowMissing = false): Promise<Target> {
    return resolveTarget(this.#ctx, { scope: options.scope, file: options.file, allowMissing })
  }

  // --- Lifecycle ---

  /**
   * Create the vault if absent and stamp its header with the active
   * recipient, generating an identity when none exists. Idempotent.
   */
  async init(options: WriteOptions = {}): Promise<InitResult> {
    const target = await this.resolve(options, true)
    return this.#audited('init', subjectOf(target), undefined, async (draft) => {
      const { identity, created } = await this.#ensureIdentity()
      draft.identity_fingerprint = identity.fingerprint

      const { doc, changed } = await this.#store(target).update(async (doc, exists) => {
        await this.#verifyTrust(target, doc, 'write', options.force)
        const stamped = ensureHeader(doc, identity.recipient)
        return { changed: stamped || !exists, value: { doc, changed: stamped || !exists } }
      })

      const recipient = documentRecipient(doc) ?? identity.recipient
      if (recipient !== identity.recipient) {
        this.#ctx.log.warn(
          `vault recipient ${recipient} does not match the active identity ${identity.recipient}`,
        )
      }
      const trust = await this.#recordTrust(target, doc)
      if (changed) {
        await this.#autoBackup('init', target, doc)
      }
      draft.extra = { key_created: created }
      return {
        target,
        recipient,
        fingerprint: fingerprintOf(recipient),
        changed,
        keyCreated: created,
        keyBackend: this.#identityStore().backend,
        trust,
      }
    })
  }

  /** Report the vault's state. Never decrypts. */
  async status(options: TargetOptions = {}): Promise<StatusResult> {
    const target = await this.resolve(options, true)
    return this.#audited('status', subjectOf(target), undefined, async (draft) => {
      const doc = await this.#store(target).read()
      const recipients = doc === undefined ? [] : readRecipients(doc)
      const subject = doc === undefined ? undefined : trustSubject(doc)
      const scan = doc === undefined ? undefined : scanDotenvEncryption(doc)

      const identity = await this.#probeIdentity()
      draft.identity_fingerprint = identity?.fingerprint ?? ''

      let trust: TrustState | 'unavailable' = 'unavailable'
      if (subject !== undefined) {
        trust = (await this.#trust.check(await this.#trustKey(target), subject)).state
      }

      return {
        target,
        exists: doc !== undefined,
        recipient: recipients[0],
        syncBackend: this.#ctx.settings.vault.syncBackend,
        keyBackend: this.#identityStore().backend,
        identity: {
          available: identity !== undefined,
          fingerprint: identity?.fingerprint,
          source: identity?.source,
          matchesRecipient:
            identity === undefined || recipients.length === 0 ? undefined : recipients.includes(identity.recipient),
        },
        trust,
        counts: {
          plaintext: scan?.plaintext.length ?? 0,
          encrypted: scan?.encrypted.length ?? 0,
          malformed: scan?.malformed.length ?? 0,
        },
      }
    })
  }

  /**
   * Create the identity, or replace it with `rotate`. Rotation retains the
   * previous identity so existing values stay readable.
   */
  async keygen(options: { rotate?: boolean | undefined } = {}): Promise<KeygenResult> {
    const store = this.#identityStore()
    const op = options.rotate === true ? 'rotate' : 'keygen'
    return this.#audited(op, { scope: 'identity', source: store.backend }, undefined, async (draft) => {
      const existing = await store.load()
      if (existing !== undefined && options.rotate !== true) {
        draft.identity_fingerprint = existing.fingerprint
        return {
          keyBackend: store.backend,
          location: store.location,
          recipient: existing.recipient,
          fingerprint: existing.fingerprint,
          created: false,
          rotated: false,
        }
      }

      const next = await generateIdentity()
      const previous = existing === undefined ? undefined : await store.rotate(next)
      if (existing === undefined) {
        await store.save(next)
      }
      this.#keyring = undefined
      draft.identity_fingerprint = next.fingerprint

      if (previous !== undefined) {
        draft.extra = { previous_fingerprint: previous.fingerprint }
        this.#ctx.log.warn(
          `rotated vault identity: values encrypted to ${previous.recipient} stay readable only while the ` +
            `previous identity is retained; run \`si vault encrypt --reencrypt\` to move them to ${next.recipient}`,
        )
      }
      return {
        keyBackend: store.backend,
        location: store.location,
        recipient: next.recipient,
        fingerprint: next.fingerprint,
        created: true,
        rotated: previous !== undefined,
        previousRecipient: previous?.recipient,
      }
    })
  }

  // --- Values ---

  /** Set `key`, encrypting it to every recipient the vault declares. */
  async set(key: string, value: string, options: SetOptions = {}): Promise<SetResult> {
    validateKeyName(key)
    const target = await this.resolve(options, true)
    return this.#audited('set', subjectOf(target), key, async (draft) => {
      const { doc, encrypted } = await this.#store(target).update(async (doc) => {
        await this.#verifyTrust(target, doc, 'write', options.force)
        const recipients = readRecipients(doc)
        const encrypted = recipients.length > 0
        const rendered = encrypted ? await encryptValue(value, recipients) : renderValue(value)
        const changed = doc.upsert(key, rendered, { section: options.section })
        return { changed, value: { doc, encrypted } }
      })
      draft.encrypted = encrypted
      if (!encrypted) {
        this.#ctx.log.warn(`${key} stored as plaintext: the vault has no recipient (run \`si vault init\`)`)
      }
      await this.#recordTrust(target, doc)
      await this.#autoBackup('set', target, doc)
      return { target, key, encrypted }
    })
  }

  /** Look up `key`; decrypt it only with `reveal`. */
  async get(key: string, options: RevealOptions = {}): Promise<GetResult> {
    validateKeyName(key)
    const target = await this.resolve(options)
    const op = options.reveal === true ? 'reveal' : 'get'
    return this.#audited(op, subjectOf(target), key, async (draft) => {
      const doc = await this.#readExisting(target)
      const entry = doc.effectiveEntries().find((e) => e.key === key)
      if (entry === undefined) {
        throw new VaultError(`key not found: ${key}`)
      }
      draft.encrypted = entry.encrypted
      if (options.reveal !== true) {
        await this.#recordTrust(target, doc)
        return { target, key, encrypted: entry.encrypted }
      }

      await this.#verifyTrust(target, doc, 'read')
      let value = entry.value
      if (entry.encrypted) {
        const opened = await (await this.#openKeyring()).decrypt(entry.value, key)
        draft.identity_fingerprint = opened.identity.fingerprint
        value = opened.plaintext
      }
      await this.#recordTrust(target, doc)
      return { target, key, encrypted: entry.encrypted, value }
    })
  }

  /** Remove every assignment of `key`. */
  async unset(key: string, options: WriteOptions = {}): Promise<UnsetResult> {
    validateKeyName(key)
    const target = await this.resolve(options)
    return this.#audited('unset', subjectOf(target), key, async () => {
      const { doc, removed } = await this.#store(target).update(async (doc) => {
        await this.#verifyTrust(target, doc, 'write', options.force)
        const changed = doc.unset(key)
        return { changed, value: { doc, removed: changed } }
      })
      if (removed) {
        await this.#recordTrust(target, doc)
        await this.#autoBackup('unset', target, doc)
      }
      return { target, key, removed }
    })
  }

  /** List effective keys; with `reveal`, decrypt every value. */
  async dump(options: RevealOptions = {}): Promise<DumpResult> {
    const target = await this.resolve(options)
    return this.#audited('dump', subjectOf(target), undefined, async (draft) => {
      const doc = await this.#readExisting(target)
      const effective = doc.effectiveEntries()
      if (options.reveal !== true) {
        draft.extra = { decrypted_count: 0 }
        await this.#recordTrust(target, doc)
        return {
          target,
          entries: effective.map((e) => ({ key: e.key, encrypted: e.encrypted })),
          decryptedCount: 0,
        }
      }

      await this.#verifyTrust(target, doc, 'read')
      const keyring = await this.#openKeyring()
      const entries: DumpEntry[] = []
      let decryptedCount = 0
      try {
        for (const entry of effective) {
          if (!entry.encrypted) {
            entries.push({ key: entry.key, encrypted: false, value: entry.value })
            continue
          }
          const opened = await keyring.decrypt(entry.value, entry.key)
          draft.identity_fingerprint = opened.identity.fingerprint
          decryptedCount++
          entries.push({ key: entry.key, encrypted: true, value: opened.plaintext })
        }
      } finally {
        draft.extra = { decrypted_count: decryptedCount }
      }
      await this.#recordTrust(target, doc)
      return { target, entries, decryptedCount }
    })
  }

  // --- Whole-document transforms ---

  /**
   * Encrypt every plaintext value in place to the declared recipients. With
   * `reencrypt`, also re-wrap every encrypted value in the current encoding;
   * when the active identity is not declared, it takes the place of the
   * first recipient.
   */
  async encrypt(options: EncryptOptions = {}): Promise<EncryptResult> {
    const target = await this.resolve(options)
    const reencrypt = options.reencrypt === true
    return this.#audited(reencrypt ? 'reencrypt' : 'encrypt', subjectOf(target), undefined, async (draft) => {
      const keyring = reencrypt ? await this.#openKeyring() : undefined
      const result = await this.#store(target).update(async (doc) => {
        await this.#verifyTrust(target, doc, 'write', options.force)
        let recipients = readRecipients(doc)
        let recipient = recipients[0]
        if (recipient === undefined) {
          throw new NotInitializedError(`vault has no recipient: ${describeTarget(target)}`, target.path)
        }

        let recipientChanged = false
        if (keyring !== undefined) {
          const primary = await keyring.require()
          draft.identity_fingerprint = primary.fingerprint
          if (!recipients.includes(primary.recipient)) {
            replaceRecipient(doc, primary.recipient)
            for (const other of recipients.slice(1)) {
              addRecipient(doc, other)
            }
            recipients = readRecipients(doc)
            recipient = primary.recipient
            recipientChanged = true
          }
        }

        const encrypted: string[] = []
        const reencrypted: string[] = []
        for (const entry of doc.entries()) {
          if (entry.kind !== 'assignment') continue
          if (!entry.encrypted) {
            doc.replaceValueAt(entry.line, await encryptValue(entry.value, recipients))
            encrypted.push(entry.key)
          } else if (keyring !== undefined) {
            const opened = await keyring.decrypt(entry.value, entry.key)
            doc.replaceValueAt(entry.line, await encryptValue(opened.plaintext, recipients))
            reencrypted.push(entry.key)
          }
        }
        return {
          changed: recipientChanged || encrypted.length > 0 || reencrypted.length > 0,
          value: { doc, recipient, encrypted, reencrypted, recipientChanged },
        }
      })

      draft.encrypted = true
      draft.extra = {
        encrypted_count: result.encrypted.length,
        reencrypted_count: result.reencrypted.length,
        recipient_changed: result.recipientChanged,
      }
      await this.#recordTrust(target, result.doc, result.recipientChanged)
      if (result.encrypted.length > 0 || result.reencrypted.length > 0 || result.recipientChanged) {
        await this.#autoBackup(reencrypt ? 'reencrypt' : 'encrypt', target, result.doc)
      }
      return {
        target,
        recipient: result.recipient,
        encrypted: result.encrypted,
        reencrypted: result.reencrypted,
        recipientChanged: result.recipientChanged,
      }
    })
  }

  /**
   * Decrypt values: `stdout` returns the decrypted document without touching
   * storage; `yes` writes it back. The recipient header is kept either way.
   */
  async decrypt(options: DecryptOptions): Promise<DecryptResult> {
    if ((options.stdout === true) === (options.yes === true)) {
      throw new BadInputError('decrypt requires exactly one of --stdout or --yes')
    }
    const selected = options.keys !== undefined && options.keys.length > 0 ? new Set(options.keys) : undefined
    for (const key of selected ?? []) {
      validateKeyName(key)
    }
    const target = await this.resolve(options)

    return this.#audited('decrypt', subjectOf(target), undefined, async (draft) => {
      const keyring = await this.#openKeyring()
      const decryptInPlace = async (doc: DotenvDocument): Promise<string[]> => {
        const decrypted: string[] = []
        const present = new Set<string>()
        for (const entry of doc.entries()) {
          if (entry.kind !== 'assignment') continue
          present.add(entry.key)
          if (!entry.encrypted || (selected !== undefined && !selected.has(entry.key))) continue
          const opened = await keyring.decrypt(entry.value, entry.key)
          draft.identity_fingerprint = opened.identity.fingerprint
          doc.replaceValueAt(entry.line, renderValue(opened.plaintext))
          decrypted.push(entry.key)
        }
        const missing = [...(selected ?? [])].filter((k) => !present.has(k))
        if (missing.length > 0) {
          throw new BadInputError(`key not found: ${missing.join(', ')}`)
        }
        return decrypted
      }

      if (options.stdout === true) {
        const doc = await this.#readExisting(target)
        await this.#verifyTrust(target, doc, 'read')
        const copy = doc.clone()
        const decrypted = await decryptInPlace(copy)
        draft.extra = { decrypted_count: decrypted.length, mode: 'stdout' }
        await this.#recordTrust(target, doc)
        return { target, decrypted, document: copy.emit(), written: false }
      }

      if (this.#ctx.interactive && options.force !== true) {
        const ok = await this.#ctx.confirm(`Write decrypted values to ${describeTarget(target)}?`)
        if (!ok) {
          throw new VaultError('decrypt cancelled')
        }
      }
      const { doc, decrypted } = await this.#store(target).update(async (doc) => {
        await this.#verifyTrust(target, doc, 'write', options.force)
        const decrypted = await decryptInPlace(doc)
        return { changed: decrypted.length > 0, value: { doc, decrypted } }
      })
      draft.extra = { decrypted_count: decrypted.length, mode: 'write' }
      await this.#recordTrust(target, doc)
      if (decrypted.length > 0) {
        await this.#autoBackup('decrypt', target, doc)
      }
      return { target, decrypted, written: decrypted.length > 0 }
    })
  }

  /** Canonicalise formatting; `check` reports without writing. */
  async fmt(options: FmtOptions = {}): Promise<FmtResult> {
    const primary = await this.resolve(options)
    const targets = options.all === true ? await this.#siblingTargets(primary) : [primary]
    const formatOptions = { sort: options.sort === true }

    const files: FmtFileResult[] = []
    for (const target of targets) {
      const changed = await this.#audited(options.check === true ? 'fmt-check' : 'fmt', subjectOf(target), undefined, async () => {
        if (options.check === true) {
          return formatDocument(await this.#readExisting(target), formatOptions).changed
        }
        const { doc, changed } = await this.#store(target).update(async (doc) => {
          await this.#verifyTrust(target, doc, 'write', options.force)
          const formatted = formatDocument(doc, formatOptions)
          doc.lines = formatted.document.lines
          doc.defaultNewline = formatted.document.defaultNewline
          return { changed: formatted.changed, value: { doc, changed: formatted.changed } }
        })
        if (changed) {
          await this.#autoBackup('fmt', target, doc)
        }
        return changed
      })
      files.push({ target, changed })
    }
    return { files, changed: files.some((f) => f.changed) }
  }

  // --- Recipients ---

  /** Recipients the vault header declares. Never decrypts. */
  async recipientsList(options: TargetOptions = {}): Promise<RecipientsListResult> {
    const target = await this.resolve(options)
    return this.#audited('recipients-list', subjectOf(target), undefined, async () => {
      const doc = await this.#readExisting(target)
      const subject = trustSubject(doc)
      return {
        target,
        recipients: readRecipients(doc),
        fingerprint: subject === undefined ? undefined : fingerprintOf(subject),
      }
    })
  }

  /**
   * Declare another recipient. Values written from now on are encrypted to
   * it as well; existing values need `encrypt --reencrypt`.
   */
  async recipientsAdd(recipient: string, options: WriteOptions = {}): Promise<RecipientChangeResult> {
    const candidate = recipient.trim()
    if (!isRecipient(candidate)) {
      throw new BadInputError(`invalid recipient: ${recipient}`)
    }
    const target = await this.resolve(options, true)
    return this.#audited('recipients-add', subjectOf(target), undefined, async () => {
      const { doc, changed } = await this.#store(target).update(async (doc) => {
        await this.#verifyTrust(target, doc, 'write', options.force)
        const changed = addRecipient(doc, candidate)
        return { changed, value: { doc, changed } }
      })
      if (changed) {
        await this.#recordTrust(target, doc, true)
        await this.#autoBackup('recipients-add', target, doc)
        if (scanDotenvEncryption(doc).encrypted.length > 0) {
          this.#ctx.log.warn(
            `existing values are not readable by ${candidate} yet; run \`si vault encrypt --reencrypt\``,
          )
        }
      }
      return { target, recipient: candidate, changed, recipients: readRecipients(doc) }
    })
  }

  /**
   * Drop a declared recipient. The last recipient cannot be removed; use
   * `decrypt --yes` to leave the vault instead.
   */
  async recipientsRemove(recipient: string, options: WriteOptions = {}): Promise<RecipientChangeResult> {
    const candidate = recipient.trim()
    const target = await this.resolve(options)
    return this.#audited('recipients-remove', subjectOf(target), undefined, async () => {
      const { doc, changed } = await this.#store(target).update(async (doc, exists) => {
        if (!exists) {
          throw new NotInitializedError(`vault not found: ${describeTarget(target)}`, target.path)
        }
        await this.#verifyTrust(target, doc, 'write', options.force)
        const declared = readRecipients(doc)
        if (declared.includes(candidate) && declared.length === 1) {
          throw new BadInputError(
            'cannot remove the last recipient',
            'decrypt the vault with `si vault decrypt --yes` instead',
          )
        }
        const changed = removeRecipient(doc, candidate)
        return { changed, value: { doc, changed } }
      })
      if (changed) {
        await this.#recordTrust(target, doc, true)
        await this.#autoBackup('recipients-remove', target, doc)
        if (scanDotenvEncryption(doc).encrypted.length > 0) {
          this.#ctx.log.warn(
            `existing values stay readable by ${candidate} until \`si vault encrypt --reencrypt\` re-wraps them`,
          )
        }
      }
      return { target, recipient: candidate, changed, recipients: readRecipients(doc) }
    })
  }

  // --- Plaintext check ---

  /**
   * Find plaintext values in dotenv files, for pre-commit use. Files that do
   * not exist are skipped. Never decrypts.
   */
  async check(options: CheckOptions = {}): Promise<CheckResult> {
    return this.#audited('check', { scope: 'check', source: 'local' }, undefined, async (draft) => {
      const checked: string[] = []
      const findings: CheckFinding[] = []
      for (const file of await this.#checkCandidates(options)) {
        let text: string
        try {
          text = await fs.readFile(file, 'utf8')
        } catch (err) {
          if (isErrnoError(err, 'ENOENT')) {
            continue
          }
          throw err
        }
        checked.push(file)
        const plaintext = scanDotenvEncryption(DotenvDocument.parse(text)).plaintext.sort()
        if (plaintext.length > 0) {
          findings.push({ path: file, plaintext })
        }
      }
      draft.extra = { files_count: checked.length, findings_count: findings.length }
      return { checked, findings }
    })
  }

  // --- Trust ---

  /** Trust record and the file's current recipient set. Never mutates. */
  async trustStatus(options: TargetOptions = {}): Promise<TrustStatusResult> {
    const target = await this.resolve(options, true)
    return this.#audited('trust-status', subjectOf(target), undefined, async () => {
      const key = await this.#trustKey(target)
      const doc = await this.#store(target).read()
      const currentRecipient = doc === undefined ? undefined : trustSubject(doc)
      const record = await this.#trust.status(key)
      let state: TrustState | 'unavailable' = 'unavailable'
      if (currentRecipient !== undefined) {
        state = (await this.#trust.check(key, currentRecipient)).state
      }
      return {
        target,
        key,
        state,
        record,
        currentRecipient,
        currentFingerprint: currentRecipient === undefined ? undefined : fingerprintOf(currentRecipient),
      }
    })
  }

  /** Record the file's current recipient as trusted, replacing any record. */
  async trustAccept(options: WriteOptions = {}): Promise<TrustAcceptResult> {
    const target = await this.resolve(options)
    return this.#audited('trust-accept', subjectOf(target), undefined, async () => {
      const doc = await this.#readExisting(target)
      const recipient = trustSubject(doc)
      if (recipient === undefined) {
        throw new NotInitializedError(`vault has no recipient: ${describeTarget(target)}`, target.path)
      }
      if (options.force !== true) {
        if (!this.#ctx.interactive) {
          throw new BadInputError('non-interactive: pass --yes to accept trust')
        }
        const ok = await this.#ctx.confirm(
          `Accept vault trust for ${describeTarget(target)} with recipient ${recipient} (${fingerprintOf(recipient)})?`,
        )
        if (!ok) {
          throw new VaultError('trust accept cancelled')
        }
      }
      const key = await this.#trustKey(target)
      const previous = await this.#trust.status(key)
      const record = await this.#trust.record(key, recipient, { replace: true })
      return { target, record, previous }
    })
  }

  /** Remove the trust record for the target. */
  async trustForget(options: TargetOptions = {}): Promise<TrustForgetResult> {
    const target = await this.resolve(options, true)
    return this.#audited('trust-forget', subjectOf(target), undefined, async () => {
      const removed = await this.#trust.forget(await this.#trustKey(target))
      return { target, removed }
    })
  }

  // --- Consumers ---

  /**
   * Decrypt every value for injection into a child environment. Plaintext
   * values are refused unless `allowPlaintext`.
   */
  async runEnv(options: RunOptions = {}): Promise<RunEnvResult> {
    const target = await this.resolve(options)
    return this.#audited('run', subjectOf(target), undefined, async (draft) => {
      const doc = await this.#readExisting(target)
      await this.#verifyTrust(target, doc, 'read')
      const effective = doc.effectiveEntries()
      const plaintextKeys = effective.filter((e) => !e.encrypted).map((e) => e.key).sort()
      draft.extra = {
        cmd0: options.command,
        args_len: options.argCount,
        keys_count: effective.length,
        plain_count: plaintextKeys.length,
      }
      if (plaintextKeys.length > 0) {
        if (options.allowPlaintext !== true) {
          throw new VaultError(`vault file contains plaintext keys: ${plaintextKeys.join(', ')}`, {
            kind: 'plaintext-leak-guard',
            hint: 'run `si vault encrypt` or pass --allow-plaintext',
          })
        }
        this.#ctx.log.warn(`vault file contains plaintext keys (allowed): ${plaintextKeys.join(', ')}`)
      }

      const keyring = await this.#openKeyring()
      const env: Record<string, string> = {}
      let decryptedCount = 0
      for (const entry of effective) {
        if (!entry.encrypted) {
          env[entry.key] = entry.value
          continue
        }
        const opened = await keyring.decrypt(entry.value, entry.key)
        draft.identity_fingerprint = opened.identity.fingerprint
        env[entry.key] = opened.plaintext
        decryptedCount++
      }
      draft.extra['decrypt_count'] = decryptedCount
      await this.#recordTrust(target, doc)
      return { target, env, plaintextKeys, decryptedCount }
    })
  }

  // --- Sync ---

  /**
   * Populate `SI_VAULT_IDENTITY` from the sun identity. Never writes vault
   * bytes.
   */
  async hydrate(): Promise<HydrateResult> {
    if (this.#ctx.settings.vault.syncBackend !== 'sun') {
      throw new BadInputError('hydrate requires vault.sync_backend = "sun"')
    }
    return this.#audited('hydrate', { scope: 'identity', source: 'sun' }, undefined, async (draft) => {
      const identity = await hydrateFromSun(this.#backend, this.#ctx.env)
      if (identity === undefined) {
        throw new IdentityUnavailableError('no identity stored in sun (run `si vault keygen`)')
      }
      this.#keyring = undefined
      draft.identity_fingerprint = identity.fingerprint
      return { recipient: identity.recipient, fingerprint: identity.fingerprint }
    })
  }

  /** Explicitly back up the vault to the configured sync backend. */
  async syncPush(options: TargetOptions = {}): Promise<SyncPushResult> {
    const mode = this.#ctx.settings.vault.syncBackend
    if (mode === 'off') {
      throw new BadInputError('vault sync backend is off (set vault.sync_backend to "sun")')
    }
    const target = await this.resolve(options)
    return this.#audited('sync-push', subjectOf(target), undefined, async () => {
      const doc = await this.#readExisting(target)
      if (target.backend === 'sun') {
        // Strict sun mode: the object already is the vault.
        return { target, mode, pushed: false }
      }
      await this.#backend.putBackup(target.scope, doc, { path: backupName(target), source: 'sync-push' })
      return { target, mode, pushed: mode === 'sun' }
    })
  }

  // --- Internals ---

  #identityStore(): IdentityStore {
    if (effectiveKeyBackend(this.#ctx.settings) === 'sun') {
      return new SunIdentityStore(this.#ctx.sun)
    }
    return new FileIdentityStore({
      keyFile: this.#ctx.paths.keyFile,
      previousKeyFile: this.#ctx.paths.previousKeyFile,
      allowInsecure: envFlag(this.#ctx, 'SI_VAULT_ALLOW_INSECURE_KEY_FILE'),
      clock: this.#ctx.clock,
    })
  }

  async #openKeyring(): Promise<Keyring> {
    this.#keyring ??= Keyring.create({
      env: this.#ctx.env,
      store: this.#identityStore(),
      cwd: this.#ctx.cwd,
      homeDir: this.#ctx.homeDir,
      allowInsecureKeyFile: envFlag(this.#ctx, 'SI_VAULT_ALLOW_INSECURE_KEY_FILE'),
    })
    return this.#keyring
  }

  async #ensureIdentity(): Promise<{ identity: VaultIdentity; created: boolean }> {
    const keyring = await this.#openKeyring()
    const existing = await keyring.primary()
    if (existing !== undefined) {
      return { identity: existing, created: false }
    }
    const identity = await generateIdentity()
    await keyring.store.save(identity)
    this.#keyring = undefined
    return { identity, created: true }
  }

  /** Active identity for status; backend failures degrade outside strict sun mode. */
  async #probeIdentity(): Promise<VaultIdentity | undefined> {
    try {
      return await (await this.#openKeyring()).primary()
    } catch (err) {
      if (err instanceof BackendUnavailableError && isStrictSun(this.#ctx.settings)) {
        throw err
      }
      if (!(err instanceof VaultError)) {
        throw err
      }
      this.#ctx.log.warn(`identity unavailable: ${err.message}`)
      return undefined
    }
  }

  #store(target: Target): DocumentStore {
    if (target.backend === 'sun') {
      return new SunDocumentStore(target, this.#backend)
    }
    return new LocalDocumentStore(target, {
      allowSymlink: envFlag(this.#ctx, 'SI_VAULT_ALLOW_SYMLINK_ENV_FILE'),
      beforeWrite: this.#ctx.settings.vault.syncBackend === 'git' ? refuseHiddenGitIndexEdits : undefined,
    })
  }

  async #readExisting(target: Target): Promise<DotenvDocument> {
    const doc = await this.#store(target).read()
    if (doc === undefined) {
      throw new NotInitializedError(`vault not found: ${describeTarget(target)}`, target.path)
    }
    return doc
  }

  async #siblingTargets(primary: Target): Promise<Target[]> {
    if (primary.backend !== 'local') {
      throw new BadInputError('fmt --all works on local vault files only')
    }
    const dir = path.dirname(primary.path)
    const dirents = await fs.readdir(dir, { withFileTypes: true }).catch((err: unknown) => {
      throw wrapError(err, failureContext('fmt', primary.scope), IO_HINT)
    })
    const names = dirents
      .filter((d) => d.isFile() && ENV_FILE_PATTERN.test(d.name) && !d.name.endsWith('.lock'))
      .map((d) => d.name)
      .sort()
    const targets = names.map<Target>((name) => ({
      scope: name === path.basename(primary.path) ? primary.scope : scopeForFile(name),
      path: path.join(dir, name),
      backend: 'local',
      explicit: true,
    }))
    return targets.some((t) => t.path === primary.path) ? targets : [primary, ...targets]
  }

  /** Files `check` looks at, de-duplicated, in discovery order. */
  async #checkCandidates(options: CheckOptions): Promise<string[]> {
    const includeExamples = options.includeExamples === true
    const files = (options.files ?? []).map((file) => path.resolve(this.#ctx.cwd, file))
    if (options.staged === true) {
      files.push(...(await stagedDotenvFiles(this.#ctx.cwd, includeExamples)))
    }
    if (options.all === true) {
      const root = (await findGitRoot(this.#ctx.cwd)) ?? this.#ctx.cwd
      files.push(...(await walkDotenvFiles(root, includeExamples)))
    }
    if (files.length === 0 && options.staged !== true && options.all !== true) {
      const target = await this.resolve({}, true)
      if (target.backend !== 'local') {
        throw new BadInputError('check works on local vault files only')
      }
      files.push(target.path)
    }
    return [...new Set(files)]
  }

  async #trustKey(target: Target): Promise<string> {
    return target.backend === 'sun' ? `sun:${target.scope}` : canonicalTrustPath(target.path)
  }

  /**
   * Compare the document's recipient set with the trust store. Reads only warn
   * on a change; writes refuse unless forced, and ask first when interactive.
   */
  async #verifyTrust(
    target: Target,
    doc: DotenvDocument,
    mode: 'read' | 'write',
    force?: boolean,
  ): Promise<TrustState | undefined> {
    const recipient = trustSubject(doc)
    if (recipient === undefined) {
      return undefined
    }
    const key = await this.#trustKey(target)
    const { state, record } = await this.#trust.check(key, recipient)
    if (state !== 'changed' || record === undefined) {
      return state
    }
    const mismatch = new TrustMismatchError(key, record.recipient, recipient)
    if (mode === 'read') {
      this.#ctx.log.warn(mismatch.message)
      return state
    }
    if (force !== true) {
      throw mismatch
    }
    if (this.#ctx.interactive && !(await this.#ctx.confirm(`${mismatch.message}. Continue?`))) {
      throw mismatch
    }
    this.#ctx.log.warn(`${mismatch.message} (continuing with --force)`)
    return state
  }

  /**
   * Record a successful read or write. A changed recipient is left for
   * `trust accept` unless `replace` is set.
   */
  async #recordTrust(target: Target, doc: DotenvDocument, replace = false): Promise<TrustState> {
    const recipient = trustSubject(doc)
    if (recipient === undefined) {
      return 'first-seen'
    }
    const key = await this.#trustKey(target)
    const { state } = await this.#trust.check(key, recipient)
    if (state === 'changed' && !replace) {
      return state
    }
    await this.#trust.record(key, recipient, { replace })
    return state
  }

  /** Non-strict sun mode: back up local writes, degrading to a warning. */
  async #autoBackup(op: string, target: Target, doc: DotenvDocument): Promise<void> {
    if (target.backend !== 'local' || this.#backend.mode !== 'sun') {
      return
    }
    try {
      await this.#backend.putBackup(target.scope, doc, { path: backupName(target), source: op })
      this.#ctx.log.info(`sun vault auto-backup complete (${op})`)
    } catch (err) {
      if (!(err instanceof VaultError)) {
        throw err
      }
      this.#ctx.log.warn(`sun vault auto-backup skipped (${op}): ${err.message}`)
    }
  }

  async #audited<T>(
    op: string,
    subject: AuditSubject,
    key: string | undefined,
    fn: (draft: AuditDraft) => Promise<T>,
  ): Promise<T> {
    const draft: AuditDraft = { key, encrypted: false, identity_fingerprint: '', extra: {} }
    let value: T
    try {
      value = await fn(draft)
    } catch (err) {
      const wrapped = wrapError(err, failureContext(op, subject.scope, draft.key), IO_HINT)
      await this.#writeAudit(op, subject, draft, auditResultFor(wrapped))
      throw wrapped
    }
    await this.#writeAudit(op, subject, draft, 'ok')
    return value
  }

  async #writeAudit(op: string, subject: AuditSubject, draft: AuditDraft, result: AuditResult): Promise<void> {
    await this.#audit.record({
      ...draft.extra,
      op,
      scope: subject.scope,
      key: draft.key,
      encrypted: draft.encrypted,
      source: subject.source,
      identity_fingerprint: draft.identity_fingerprint,
      result,
    })
  }
}
