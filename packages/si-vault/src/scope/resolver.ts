/**
 * Scope and target resolution.
 *
 * @remarks
 * The only place where user-facing scope names turn into storage
 * locations. Resolution order: `--file`, then `--scope` through
 * `[vault.scopes]`, then `SI_VAULT_SCOPE`, then `vault.default_scope`. In
 * strict sun mode the target is always a sun object named by the scope.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { BadInputError, NotInitializedError, isErrnoError } from '../errors.js'
import { expandHome } from '../paths.js'
import { isStrictSun } from '../settings.js'
import type { EnvSource, Settings } from '../settings.js'
import type { Target } from '../types.js'

/** What the resolver needs from the vault context. */
export interface ResolveContext {
  settings: Settings
  env: EnvSource
  cwd: string
  homeDir: string
}

/** Resolution request, usually straight from `--scope` and `--file`. */
export interface ResolveRequest {
  scope?: string | undefined
  file?: string | undefined
  /** Accept a local target that does not exist yet. */
  allowMissing?: boolean | undefined
}

const DEFAULT_SCOPE = 'default'

/**
 * Canonical scope name: lower-case, with runs of characters outside
 * `[a-z0-9._-]` collapsed to `-`.
 *
 * @throws {@link BadInputError} when nothing usable remains.
 */
export function normalizeScope(scope: string): string {
  const normalized = scope
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^[-.]+|[-.]+$/g, '')
  if (normalized.length === 0) {
    throw new BadInputError(`invalid vault scope ${JSON.stringify(scope)}`)
  }
  return normalized
}

/** Scope name implied by a vault file name: `.env` → `default`, `.env.prod` → `prod`. */
export function scopeForFile(filePath: string): string {
  const base = path.basename(filePath)
  if (base === '.env') {
    return DEFAULT_SCOPE
  }
  if (base.startsWith('.env.')) {
    return normalizeScope(base.slice('.env.'.length))
  }
  return normalizeScope(base)
}

function envValue(env: EnvSource, name: string): string | undefined {
  const value = env[name]?.trim()
  return value !== undefined && value.length > 0 ? value : undefined
}

function requestedScope(ctx: ResolveContext, request: ResolveRequest): string {
  const flag = request.scope?.trim()
  if (flag !== undefined && flag.length > 0) {
    return flag
  }
  return envValue(ctx.env, 'SI_VAULT_SCOPE') ?? ctx.settings.vault.defaultScope
}

function mappedPath(ctx: ResolveContext, scope: string): string | undefined {
  const scopes = ctx.settings.vault.scopes
  const configured = scopes[scope] ?? scopes[normalizeScope(scope)]
  if (configured === undefined) {
    return undefined
  }
  return path.resolve(ctx.cwd, expandHome(configured, ctx.homeDir))
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath)
    return true
  } catch (err) {
    if (isErrnoError(err, 'ENOENT')) {
      return false
    }
    throw err
  }
}

/**
 * Resolve the vault target for a command.
 *
 * @throws {@link BadInputError} for an unmapped named scope in local mode.
 * @throws {@link NotInitializedError} when the local file is missing and
 * `allowMissing` is not set.
 */
export async function resolveTarget(ctx: ResolveContext, request: ResolveRequest = {}): Promise<Target> {
  const file = request.file?.trim()
  const explicit = file !== undefined && file.length > 0

  if (isStrictSun(ctx.settings)) {
    const scope = explicit ? scopeForFile(file) : normalizeScope(requestedScope(ctx, request))
    return { scope, path: scope, backend: 'sun', explicit }
  }

  let target: Target
  if (explicit) {
    const resolved = path.resolve(ctx.cwd, expandHome(file, ctx.homeDir))
    target = { scope: scopeForFile(resolved), path: resolved, backend: 'local', explicit: true }
  } else {
    const scope = requestedScope(ctx, request)
    const mapped = mappedPath(ctx, scope)
    if (mapped !== undefined) {
      target = { scope: normalizeScope(scope), path: mapped, backend: 'local', explicit: false }
    } else if (normalizeScope(scope) === DEFAULT_SCOPE) {
      target = { scope: DEFAULT_SCOPE, path: path.join(ctx.cwd, '.env'), backend: 'local', explicit: false }
    } else {
      throw new BadInputError(
        `unknown vault scope ${JSON.stringify(scope)}`,
        'map it under [vault.scopes] in ~/.si/vault/settings.toml or pass --file',
      )
    }
  }

  if (request.allowMissing !== true && !(await exists(target.path))) {
    throw new NotInitializedError(`vault file not found: ${target.path}`, target.path)
  }
  return target
}
