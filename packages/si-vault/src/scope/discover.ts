/**
 * Dotenv file discovery for `si vault check`.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { BadInputError, VaultError } from '../errors.js'
import { GIT_TIMEOUT_MS, findGitRoot } from '../sync/git-guard.js'
import { execCommandFull } from '../util/exec.js'

const SKIPPED_DIRS = new Set(['.git', 'node_modules', 'vendor'])

/**
 * Whether `file` is worth checking: its name starts with `.env`, it is not a
 * lock file, and unless `includeExamples` its name does not mention
 * `example`.
 */
export function isDotenvCandidate(file: string, includeExamples: boolean): boolean {
  const name = path.basename(file)
  if (!name.startsWith('.env') || name.endsWith('.lock')) {
    return false
  }
  return includeExamples || !name.toLowerCase().includes('example')
}

/** Every candidate under `root`, sorted, skipping VCS and dependency directories. */
export async function walkDotenvFiles(root: string, includeExamples: boolean): Promise<string[]> {
  const found: string[] = []
  const visit = async (dir: string): Promise<void> => {
    const dirents = await fs.readdir(dir, { withFileTypes: true })
    for (const dirent of dirents) {
      const full = path.join(dir, dirent.name)
      if (dirent.isDirectory()) {
        if (!SKIPPED_DIRS.has(dirent.name)) {
          await visit(full)
        }
      } else if (dirent.isFile() && isDotenvCandidate(full, includeExamples)) {
        found.push(full)
      }
    }
  }
  await visit(root)
  return found.sort()
}

/** Candidates added, copied or modified in the git index. */
export async function stagedDotenvFiles(cwd: string, includeExamples: boolean): Promise<string[]> {
  const root = await findGitRoot(cwd)
  if (root === undefined) {
    throw new BadInputError('--staged needs a git repository')
  }
  const result = await execCommandFull('git', ['diff', '--cached', '--name-only', '--diff-filter=ACM'], {
    cwd: root,
    timeoutMs: GIT_TIMEOUT_MS,
  })
  if (result.exitCode !== 0) {
    throw new VaultError(`git diff --cached failed: ${result.stderr.trim()}`)
  }
  return result.stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => path.join(root, line))
    .filter((file) => isDotenvCandidate(file, includeExamples))
}
