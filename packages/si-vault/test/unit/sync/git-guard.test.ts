import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { describe, it, expect } from 'vitest'
import { gitIndexFlags, parseLsFilesLine, refuseHiddenGitIndexEdits } from '../../../src/sync/git-guard.js'
import { makeTempDir } from '../../helpers/env.js'

describe('parseLsFilesLine', () => {
  it('should ignore empty lines', () => {
    expect(parseLsFilesLine('')).toBeUndefined()
    expect(parseLsFilesLine('   ')).toBeUndefined()
  })

  it('should read plain tracked files', () => {
    expect(parseLsFilesLine('H .env')).toEqual({ tracked: true, assumeUnchanged: false, skipWorktree: false })
  })

  it('should read skip-worktree', () => {
    expect(parseLsFilesLine('S .env')).toEqual({ tracked: true, assumeUnchanged: false, skipWorktree: true })
  })

  it('should read skip-worktree combined with assume-unchanged', () => {
    expect(parseLsFilesLine('s .env')).toEqual({ tracked: true, assumeUnchanged: true, skipWorktree: true })
  })

  it('should read assume-unchanged from any lower-case tag', () => {
    expect(parseLsFilesLine('h .env')).toEqual({ tracked: true, assumeUnchanged: true, skipWorktree: false })
  })
})

// ---------------------------------------------------------------------------

describe('gitIndexFlags', () => {
  it('should treat files outside a repository as untracked', async () => {
    const dir = await makeTempDir()
    try {
      const file = path.join(dir, '.env')
      const result = await gitIndexFlags(file)
      expect(result.flags).toEqual({ tracked: false, assumeUnchanged: false, skipWorktree: false })
      await expect(refuseHiddenGitIndexEdits(file)).resolves.toBeUndefined()
    } finally {
      await fs.rm(dir, { recursive: true, force: true })
    }
  })
})
