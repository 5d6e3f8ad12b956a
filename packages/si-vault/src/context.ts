/**
 * Explicit per-invocation context: settings, environment, clock, terminal
 * capabilities, logger and sun client.
 */

import * as os from 'node:os'
import type { MutableEnv } from './identity/keyring.js'
import { resolvePaths } from './paths.js'
import type { VaultPaths } from './paths.js'
import { effectiveKeyBackend, loadSettings } from './settings.js'
import type { Settings } from './settings.js'
import { SunHttpClient } from './sync/sun-client.js'
import type { SunObjectClient } from './sync/sun-client.js'
import type { VaultLogger } from './types.js'

/** Everything a vault operation may depend on. */
export interface VaultContext {
  settings: Settings
  paths: VaultPaths
  /** Process environment view; sun hydration writes `SI_VAULT_IDENTITY` here. */
  env: MutableEnv
  cwd: string
  homeDir: string
  clock: () => Date
  /** Whether stdin and stdout are terminals. */
  interactive: boolean
  /** Ask the operator a yes/no question. Only called when `interactive`. */
  confirm: (question: string) => Promise<boolean>
  /** Sun client, when sun is configured and in use. */
  sun: SunObjectClient | undefined
  log: VaultLogger
}

/** Options for {@link createContext}. Everything defaults to the process. */
export interface CreateContextOptions {
  env?: MutableEnv | undefined
  cwd?: string | undefined
  homeDir?: string | undefined
  clock?: (() => Date) | undefined
  interactive?: boolean | undefined
  confirm?: ((question: string) => Promise<boolean>) | undefined
  log?: VaultLogger | undefined
  /** Use this client instead of building one from `[sun]` settings. */
  sun?: SunObjectClient | undefined
  /** `fetch` for the sun HTTP client. */
  fetch?: typeof fetch | undefined
}

/** Logger that drops everything. */
export const silentLogger: VaultLogger = {
  warn: () => undefined,
  info: () => undefined,
}

function isTruthy(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase()
  return normalized === '1' || normalized === 'true' || normalized === 'yes'
}

function usesSun(settings: Settings): boolean {
  return settings.vault.syncBackend === 'sun' || effectiveKeyBackend(settings) === 'sun'
}

function sunClientFrom(settings: Settings, env: MutableEnv, fetchImpl: typeof fetch | undefined): SunObjectClient | undefined {
  const { baseUrl, token, timeoutSeconds } = settings.sun
  if (baseUrl === undefined || token === undefined) {
    return undefined
  }
  return new SunHttpClient({
    baseUrl,
    token,
    timeoutMs: timeoutSeconds * 1000,
    allowInsecureHttp: isTruthy(env['SI_SUN_ALLOW_INSECURE_HTTP']),
    fetch: fetchImpl,
  })
}

/**
 * Load settings and build the context for one command.
 *
 * @throws {@link SettingsError} when a settings module is invalid.
 */
export async function createContext(options?: CreateContextOptions): Promise<VaultContext> {
  const env = options?.env ?? process.env
  const homeDir = options?.homeDir ?? os.homedir()
  const cwd = options?.cwd ?? process.cwd()
  const settings = await loadSettings(env, homeDir)

  let sun = options?.sun
  if (sun === undefined && usesSun(settings)) {
    sun = sunClientFrom(settings, env, options?.fetch)
  }

  return {
    settings,
    paths: resolvePaths(settings, homeDir, cwd),
    env,
    cwd,
    homeDir,
    clock: options?.clock ?? (() => new Date()),
    interactive: options?.interactive ?? false,
    confirm: options?.confirm ?? (async () => false),
    sun,
    log: options?.log ?? silentLogger,
  }
}

/** Whether `SI_VAULT_ALLOW_*`-style flags are switched on. */
export function envFlag(ctx: VaultContext, name: string): boolean {
  return isTruthy(ctx.env[name])
}
