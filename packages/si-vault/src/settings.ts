/**
 * TOML settings modules under the settings root.
 *
 * @remarks
 * Each module lives at `<root>/<module>/settings.toml`, where the root is
 * `$SI_SETTINGS_HOME/.si` or `$HOME/.si`. A missing module yields defaults;
 * a module that exists but cannot be read or parsed raises
 * {@link SettingsError}.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { parse as parseToml } from 'smol-toml'
import { SettingsError, isErrnoError } from './errors.js'
import type { KeyBackend, SyncMode } from './types.js'

/** `[vault]` module. */
export interface VaultSettings {
  defaultScope: string
  syncBackend: SyncMode
  strictSun: boolean
  keyBackend?: KeyBackend | undefined
  keyFile?: string | undefined
  trustStore?: string | undefined
  auditLog?: string | undefined
  /** Scope name to vault file path. */
  scopes: Record<string, string>
}

/** `[sun]` module. */
export interface SunSettings {
  baseUrl?: string | undefined
  token?: string | undefined
  account?: string | undefined
  timeoutSeconds: number
}

/** All settings modules the vault reads. */
export interface Settings {
  /** Settings root, e.g. `~/.si`. */
  root: string
  vault: VaultSettings
  sun: SunSettings
}

/** Environment view used for settings resolution. */
export type EnvSource = Readonly<Record<string, string | undefined>>

const SYNC_MODES: readonly SyncMode[] = ['off', 'git', 'sun']
const KEY_BACKENDS: readonly KeyBackend[] = ['file', 'sun']
const DEFAULT_SUN_TIMEOUT_SECONDS = 15

class SettingsShapeError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string')
}

function optionalString(table: Record<string, unknown>, key: string, prefix: string): string | undefined {
  const value = table[key]
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string') {
    throw new SettingsShapeError(`${prefix}.${key} must be a string`)
  }
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function oneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  label: string,
): T | undefined {
  if (value === undefined) {
    return undefined
  }
  const normalized = value.toLowerCase()
  const match = allowed.find((a) => a === normalized)
  if (match === undefined) {
    throw new SettingsShapeError(`${label} must be one of ${allowed.join(', ')} (got ${JSON.stringify(value)})`)
  }
  return match
}

/** Resolve the settings root from the environment. */
export function settingsRoot(env: EnvSource, homeDir: string): string {
  const override = env['SI_SETTINGS_HOME']?.trim()
  const base = override !== undefined && override.length > 0 ? override : homeDir
  return path.join(base, '.si')
}

/** Path of a settings module file. */
export function settingsModulePath(root: string, module: string): string {
  return path.join(root, module, 'settings.toml')
}

async function readModule(root: string, module: string): Promise<Record<string, unknown> | undefined> {
  const file = settingsModulePath(root, module)
  let text: string
  try {
    text = await fs.readFile(file, 'utf8')
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return undefined
    }
    const reason = err instanceof Error ? err.message : String(err)
    throw new SettingsError(`read settings module ${module} (${file}): ${reason}`, module, file, { cause: err })
  }
  try {
    return parseToml(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message.split('\n')[0] ?? err.message : String(err)
    throw new SettingsError(`parse settings module ${module} (${file}): ${reason}`, module, file, { cause: err })
  }
}

function vaultSettingsFrom(doc: Record<string, unknown> | undefined): VaultSettings {
  const table = doc?.['vault']
  const settings: VaultSettings = { defaultScope: 'default', syncBackend: 'off', strictSun: true, scopes: {} }
  if (table === undefined) {
    return settings
  }
  if (!isRecord(table)) {
    throw new SettingsShapeError('[vault] must be a table')
  }

  settings.defaultScope = optionalString(table, 'default_scope', 'vault') ?? 'default'
  settings.syncBackend = oneOf(optionalString(table, 'sync_backend', 'vault'), SYNC_MODES, 'vault.sync_backend') ?? 'off'
  const strict = table['strict_sun']
  if (strict !== undefined) {
    if (typeof strict !== 'boolean') {
      throw new SettingsShapeError('vault.strict_sun must be a boolean')
    }
    settings.strictSun = strict
  }
  settings.keyBackend = oneOf(optionalString(table, 'key_backend', 'vault'), KEY_BACKENDS, 'vault.key_backend')
  settings.keyFile = optionalString(table, 'key_file', 'vault')
  settings.trustStore = optionalString(table, 'trust_store', 'vault')
  settings.auditLog = optionalString(table, 'audit_log', 'vault')

  const scopes = table['scopes']
  if (scopes !== undefined) {
    if (!isStringRecord(scopes)) {
      throw new SettingsShapeError('[vault.scopes] must map scope names to paths')
    }
    settings.scopes = { ...scopes }
  }
  return settings
}

function sunSettingsFrom(doc: Record<string, unknown> | undefined): SunSettings {
  const table = doc?.['sun']
  const settings: SunSettings = { timeoutSeconds: DEFAULT_SUN_TIMEOUT_SECONDS }
  if (table === undefined) {
    return settings
  }
  if (!isRecord(table)) {
    throw new SettingsShapeError('[sun] must be a table')
  }
  settings.baseUrl = optionalString(table, 'base_url', 'sun')
  settings.token = optionalString(table, 'token', 'sun')
  settings.account = optionalString(table, 'account', 'sun')
  const timeout = table['timeout_seconds']
  if (timeout !== undefined) {
    if (typeof timeout !== 'number' || !Number.isFinite(timeout) || timeout <= 0) {
      throw new SettingsShapeError('sun.timeout_seconds must be a positive number')
    }
    settings.timeoutSeconds = timeout
  }
  return settings
}

async function loadModule<T>(
  root: string,
  module: string,
  build: (doc: Record<string, unknown> | undefined) => T,
): Promise<T> {
  const doc = await readModule(root, module)
  try {
    return build(doc)
  } catch (err) {
    if (err instanceof SettingsShapeError) {
      const file = settingsModulePath(root, module)
      throw new SettingsError(`parse settings module ${module} (${file}): ${err.message}`, module, file, {
        cause: err,
      })
    }
    throw err
  }
}

function envValue(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim()
  return value !== undefined && value.length > 0 ? value : undefined
}

/**
 * Load the `vault` and `sun` modules and apply environment overrides.
 *
 * @throws {@link SettingsError} when a module exists but is invalid.
 */
export async function loadSettings(env: EnvSource, homeDir: string): Promise<Settings> {
  const root = settingsRoot(env, homeDir)
  const vault = await loadModule(root, 'vault', vaultSettingsFrom)
  const sun = await loadModule(root, 'sun', sunSettingsFrom)

  try {
    const syncOverride = oneOf(envValue(env, 'SI_VAULT_SYNC_BACKEND'), SYNC_MODES, 'SI_VAULT_SYNC_BACKEND')
    const keyOverride = oneOf(envValue(env, 'SI_VAULT_KEY_BACKEND'), KEY_BACKENDS, 'SI_VAULT_KEY_BACKEND')
    vault.syncBackend = syncOverride ?? vault.syncBackend
    vault.keyBackend = keyOverride ?? vault.keyBackend
  } catch (err) {
    if (err instanceof SettingsShapeError) {
      throw new SettingsError(`invalid environment override: ${err.message}`, 'env', root, { cause: err })
    }
    throw err
  }
  vault.keyFile = envValue(env, 'SI_VAULT_KEY_FILE') ?? vault.keyFile
  vault.trustStore = envValue(env, 'SI_VAULT_TRUST_STORE') ?? vault.trustStore
  vault.auditLog = envValue(env, 'SI_VAULT_AUDIT_LOG') ?? vault.auditLog
  sun.baseUrl = envValue(env, 'SI_SUN_BASE_URL') ?? sun.baseUrl
  sun.token = envValue(env, 'SI_SUN_TOKEN') ?? sun.token

  return { root, vault, sun }
}

/** Whether the vault runs in strict sun mode. */
export function isStrictSun(settings: Settings): boolean {
  return settings.vault.syncBackend === 'sun' && settings.vault.strictSun
}

/** Effective identity backend: strict sun forces `sun`. */
export function effectiveKeyBackend(settings: Settings): KeyBackend {
  if (isStrictSun(settings)) {
    return 'sun'
  }
  return settings.vault.keyBackend ?? 'file'
}
