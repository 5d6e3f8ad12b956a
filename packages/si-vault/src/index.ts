/**
 * si-vault — age-encrypted, dotenv-compatible secret vault with identity,
 * trust, audit and sync backends.
 *
 * @packageDocumentation
 */

export {
  VaultError,
  BadInputError,
  NotInitializedError,
  IdentityUnavailableError,
  DecryptFailedError,
  TrustMismatchError,
  PlaintextLeakGuardError,
  BackendUnavailableError,
  ConflictError,
  SettingsError,
  wrapError,
} from './errors.js'
export type { VaultErrorKind } from './errors.js'

export type {
  AuditEntry,
  AuditFields,
  AuditResult,
  KeyBackend,
  SunObject,
  SunObjectKind,
  SyncMode,
  Target,
  TargetBackend,
  TrustRecord,
  TrustState,
  VaultLogger,
} from './types.js'

export { Vault, describeTarget } from './vault.js'
export type {
  CheckFinding,
  CheckOptions,
  CheckResult,
  DecryptOptions,
  DecryptResult,
  DumpEntry,
  DumpResult,
  EncryptOptions,
  EncryptResult,
  FmtFileResult,
  FmtOptions,
  FmtResult,
  GetResult,
  HydrateResult,
  InitResult,
  KeygenResult,
  RecipientChangeResult,
  RecipientsListResult,
  RevealOptions,
  RunEnvResult,
  RunOptions,
  SetOptions,
  SetResult,
  StatusResult,
  SyncPushResult,
  TargetOptions,
  TrustAcceptResult,
  TrustForgetResult,
  TrustStatusResult,
  UnsetResult,
  WriteOptions,
} from './vault.js'

export { createContext, silentLogger } from './context.js'
export type { CreateContextOptions, VaultContext } from './context.js'

export { loadSettings, settingsRoot, settingsModulePath, isStrictSun, effectiveKeyBackend } from './settings.js'
export type { EnvSource, Settings, SunSettings, VaultSettings } from './settings.js'
export { resolvePaths, expandHome } from './paths.js'
export type { VaultPaths } from './paths.js'

export * from './dotenv/index.js'
export * from './cipher/index.js'

export { fingerprintOf, generateIdentity, isRecipient, parseIdentity } from './identity/identity.js'
export type { IdentitySource, VaultIdentity } from './identity/identity.js'
export { Keyring } from './identity/keyring.js'
export type { MutableEnv } from './identity/keyring.js'

export { normalizeScope, resolveTarget, scopeForFile } from './scope/resolver.js'
export { isDotenvCandidate } from './scope/discover.js'

export { SunHttpClient, retryDelayMs, shouldRetryStatus } from './sync/sun-client.js'
export type { SunHttpClientOptions, SunObjectClient } from './sync/sun-client.js'
export { VAULT_BACKUP_KIND, assertNoPlaintext, createSyncBackend, hydrateFromSun } from './sync/backend.js'
export type { BackupMetadata, SyncBackend } from './sync/backend.js'
