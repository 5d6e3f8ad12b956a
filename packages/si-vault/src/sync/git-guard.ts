import * as path from 'node:path'
import { VaultError, isErrnoError } from '../errors.js'
import { execCommandFull } from '../util/exec.js'

/** Index flags of a tracked file. */
export interface GitIndexFlags {
  tracked: boolean
  assumeUnchanged: boolean
  skipWorktree: boolean
}

const UNTRACKED: GitIndexFlags = { tracked: false, assumeUnchanged: false, skipWorktree: false }
export const GIT_TIMEOUT_MS = 10_000

/**
 * Parse one line of `git ls-files -v`. The tag letter is `S` for
 * skip-worktree, `s` for skip-worktree plus assume-unchanged, and any other
 * lower-case letter for assume-unchanged.
 */
export function parseLsFilesLine(line: string): GitIndexFlags | undefined {
  const tag = line.trim().charAt(0)
  if (tag === '') {
    return undefined
  }
  if (tag === 'S') {
    return { tracked: true, assumeUnchanged: false, skipWorktree: true }
  }
  if (tag === 's') {
    return { tracked: true, assumeUnchanged: true, skipWorktree: true }
  }
  const lower = tag !== tag.toUpperCase() && tag === tag.toLowerCase()
  return { tracked: true, assumeUnchanged: lower, skipWorktree: false }
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

/** Top level of the git work tree containing `dir`, if any. */
export async function findGitRoot(dir: string): Promise<string | undefined> {
  try {
    const result = await execCommandFull('git', ['rev-parse', '--show-toplevel'], { cwd: dir, timeoutMs: GIT_TIMEOUT_MS })
    const root = result.stdout.trim()
    return result.exitCode === 0 && root.length > 0 ? root : undefined
  } catch (err) {
    // No git binary, or the directory does not exist yet.
    if (isErrnoError(err, 'ENOENT')) {
      return undefined
    }
    throw err
  }
}

/** Index flags of `filePath`; untracked when it is outside a repository. */
export async function gitIndexFlags(filePath: string): Promise<{ root: string; relPath: string; flags: GitIndexFlags }> {
  const absolute = path.resolve(filePath)
  const root = await findGitRoot(path.dirname(absolute))
  if (root === undefined) {
    return { root: '', relPath: '', flags: UNTRACKED }
  }
  const relPath = path.relative(root, absolute).split(path.sep).join('/')
  if (relPath.length === 0 || relPath.startsWith('../') || path.isAbsolute(relPath)) {
    return { root, relPath: '', flags: UNTRACKED }
  }
  const result = await execCommandFull('git', ['ls-files', '-v', '--', relPath], { cwd: root, timeoutMs: GIT_TIMEOUT_MS })
  if (result.exitCode !== 0) {
    throw new VaultError(`git ls-files failed for ${relPath}: ${result.stderr.trim()}`)
  }
  for (const line of result.stdout.split(/\r?\n/)) {
    const flags = parseLsFilesLine(line)
    if (flags !== undefined) {
      return { root, relPath, flags }
    }
  }
  return { root, relPath, flags: UNTRACKED }
}

/**
 * Refuse to write a tracked vault file whose updates git would hide
 * (skip-worktree or assume-unchanged).
 */
export async function refuseHiddenGitIndexEdits(filePath: string): Promise<void> {
  const { root, relPath, flags } = await gitIndexFlags(filePath)
  if (!flags.tracked || (!flags.skipWorktree && !flags.assumeUnchanged)) {
    return
  }
  const modes: string[] = []
  const fixes: string[] = []
  if (flags.skipWorktree) {
    modes.push('skip-worktree')
    fixes.push(`git -C ${shellQuote(root)} update-index --no-skip-worktree -- ${shellQuote(relPath)}`)
  }
  if (flags.assumeUnchanged) {
    modes.push('assume-unchanged')
    fixes.push(`git -C ${shellQuote(root)} update-index --no-assume-unchanged -- ${shellQuote(relPath)}`)
  }
  throw new VaultError(
    `refusing to write ${filePath}: git index flag(s) hide file updates (${modes.join(', ')})`,
    { hint: `clear the flag(s) first: ${fixes.join('; ')}` },
  )
}
