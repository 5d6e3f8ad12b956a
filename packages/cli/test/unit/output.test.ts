import { describe, it, expect, vi, beforeEach } from 'vitest'
import { parseArgs } from 'node:util'
import { BadInputError, NotInitializedError, VaultError } from 'si-vault'
import { exitCodeFor, formatError, isParseArgsError, printFields } from '../../src/output.js'

describe('formatError', () => {
  it('should format Error instances with name and message', () => {
    expect(formatError(new Error('something broke'))).toBe('Error: something broke')
  })

  it('should append the remediation hint of vault errors', () => {
    const err = new NotInitializedError('vault has no recipient: /srv/app/.env', '/srv/app/.env')
    expect(formatError(err)).toBe(`NotInitializedError: vault has no recipient: /srv/app/.env\nhint: ${err.hint ?? ''}`)
  })

  it('should omit the hint line when there is none', () => {
    expect(formatError(new VaultError('key not found: A'))).toBe('VaultError: key not found: A')
  })

  it('should stringify non-Error values', () => {
    expect(formatError('string error')).toBe('string error')
    expect(formatError(42)).toBe('42')
  })
})

// ---------------------------------------------------------------------------

describe('exitCodeFor', () => {
  it('should use 2 for misuse', () => {
    expect(exitCodeFor(new BadInputError('bad'))).toBe(2)
  })

  it('should use 2 for unknown flags', () => {
    const err = (() => {
      try {
        parseArgs({ args: ['--nope'], options: {}, strict: true })
      } catch (e) {
        return e
      }
      return undefined
    })()
    expect(isParseArgsError(err)).toBe(true)
    expect(exitCodeFor(err)).toBe(2)
  })

  it('should use 1 for everything else', () => {
    expect(exitCodeFor(new VaultError('x'))).toBe(1)
    expect(exitCodeFor(new Error('x'))).toBe(1)
  })
})

// ---------------------------------------------------------------------------

describe('printFields', () => {
  let stdout: string

  beforeEach(() => {
    stdout = ''
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout += String(chunk)
      return true
    })
  })

  it('should align values after the longest label', () => {
    printFields([
      ['file', '/srv/app/.env'],
      ['recipient', 'age1abc'],
    ])
    // eslint-disable-next-line no-control-regex
    expect(stdout.replace(/\x1b\[\d+m/g, '')).toBe('file:      /srv/app/.env\nrecipient: age1abc\n')
  })
})
