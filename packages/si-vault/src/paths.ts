import * as path from 'node:path'
import type { Settings } from './settings.js'

/** Persisted state locations. */
export interface VaultPaths {
  /** `~/.si/vault` */
  vaultDir: string
  keyFile: string
  /** Identity retained by the last rotation. */
  previousKeyFile: string
  trustStore: string
  auditLog: string
}

/** Expand a leading `~/` against `homeDir`. */
export function expandHome(p: string, homeDir: string): string {
  if (p === '~') {
    return homeDir
  }
  if (p.startsWith('~/')) {
    return path.join(homeDir, p.slice(2))
  }
  return p
}

/** Resolve state file locations from settings (already env-overridden). */
export function resolvePaths(settings: Settings, homeDir: string, cwd: string): VaultPaths {
  const vaultDir = path.join(settings.root, 'vault')
  const resolve = (configured: string | undefined, fallback: string): string =>
    configured === undefined ? fallback : path.resolve(cwd, expandHome(configured, homeDir))
  const keyFile = resolve(settings.vault.keyFile, path.join(vaultDir, 'keys', 'age.key'))
  return {
    vaultDir,
    keyFile,
    previousKeyFile: `${keyFile}.previous`,
    trustStore: resolve(settings.vault.trustStore, path.join(vaultDir, 'trust.json')),
    auditLog: resolve(settings.vault.auditLog, path.join(vaultDir, 'audit.log')),
  }
}
