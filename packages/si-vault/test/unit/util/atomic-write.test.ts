import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ConflictError } from '../../../src/errors.js'
import { atomicWriteFile, contentHash, resolveWriteTarget } from '../../../src/util/atomic-write.js'
import { withFileLock } from '../../../src/util/lock.js'
import { makeTempDir } from '../../helpers/env.js'

let dir: string

beforeEach(async () => {
  dir = await makeTempDir()
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

describe('atomicWriteFile', () => {
  it('should create parent directories and the file', async () => {
    const target = path.join(dir, 'a', 'b', '.env')
    await atomicWriteFile(target, 'A=1\n', { mode: 0o600 })
    expect(await fs.readFile(target, 'utf8')).toBe('A=1\n')
  })

  it.skipIf(process.platform === 'win32')('should keep the mode of an existing file', async () => {
    const target = path.join(dir, '.env')
    await fs.writeFile(target, 'old\n')
    await fs.chmod(target, 0o640)
    await atomicWriteFile(target, 'new\n', { mode: 0o600 })
    expect((await fs.stat(target)).mode & 0o777).toBe(0o640)
  })

  it('should refuse to replace a file that changed since it was read', async () => {
    const target = path.join(dir, '.env')
    await fs.writeFile(target, 'A=1\n')
    const observed = contentHash('A=1\n')
    await fs.writeFile(target, 'A=2\n')

    await expect(atomicWriteFile(target, 'A=3\n', { expectedHash: observed })).rejects.toBeInstanceOf(ConflictError)
    expect(await fs.readFile(target, 'utf8')).toBe('A=2\n')
    expect((await fs.readdir(dir)).filter((f) => f.includes('.tmp-'))).toEqual([])
  })

  it('should treat a null expected hash as "must not exist"', async () => {
    const target = path.join(dir, '.env')
    await fs.writeFile(target, 'A=1\n')
    await expect(atomicWriteFile(target, 'A=3\n', { expectedHash: null })).rejects.toThrow(
      `vault file changed during update: ${target}`,
    )
  })
})

// ---------------------------------------------------------------------------

describe('resolveWriteTarget', () => {
  it('should return missing and regular paths unchanged', async () => {
    const target = path.join(dir, '.env')
    expect(await resolveWriteTarget(target, false)).toBe(target)
    await fs.writeFile(target, '')
    expect(await resolveWriteTarget(target, false)).toBe(target)
  })

  it.skipIf(process.platform === 'win32')('should refuse symlinks unless allowed', async () => {
    const real = path.join(dir, 'real.env')
    const link = path.join(dir, '.env')
    await fs.writeFile(real, '')
    await fs.symlink(real, link)
    await expect(resolveWriteTarget(link, false)).rejects.toThrow(
      `refusing to write vault file through symlink: ${link}`,
    )
    expect(await resolveWriteTarget(link, true)).toBe(real)
  })
})

// ---------------------------------------------------------------------------

describe('withFileLock', () => {
  it('should serialise concurrent critical sections', async () => {
    const target = path.join(dir, '.env')
    const events: string[] = []
    const section = (name: string) =>
      withFileLock(target, async () => {
        events.push(`${name}:start`)
        await new Promise((resolve) => setTimeout(resolve, 20))
        events.push(`${name}:end`)
      })

    await Promise.all([section('a'), section('b')])
    expect(events[1]).toBe(`${events[0]?.split(':')[0] ?? ''}:end`)
    expect(events).toHaveLength(4)
  })

  it('should release the lock when the section throws', async () => {
    const target = path.join(dir, '.env')
    await expect(
      withFileLock(target, () => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom')
    expect(await withFileLock(target, () => Promise.resolve('again'))).toBe('again')
  })
})
