import * as fs from 'node:fs/promises'
import { Readable } from 'node:stream'
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { generateIdentity } from 'si-vault'
import { TestVault } from 'si-vault-test-helpers'
import { vaultCommand } from '../../../src/commands/vault.js'
import type { CliRuntime } from '../../../src/context.js'

function plain(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[\d+m/g, '')
}

describe('vaultCommand', () => {
  let tv: TestVault
  let stdout: string
  let stderr: string

  beforeEach(async () => {
    tv = await TestVault.create()
    stdout = ''
    stderr = ''
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout += String(chunk)
      return true
    })
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr += String(chunk)
      return true
    })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await tv.cleanup()
  })

  function run(...args: string[]): Promise<number> {
    return vaultCommand(args, tv.runtime)
  }

  function runWith(runtime: CliRuntime, ...args: string[]): Promise<number> {
    return vaultCommand(args, runtime)
  }

  /** Run and return parsed JSON stdout. */
  async function json(...args: string[]): Promise<unknown> {
    stdout = ''
    await run(...args, '--json')
    return JSON.parse(stdout)
  }

  async function quiet(...args: string[]): Promise<void> {
    expect(await run(...args)).toBe(0)
    stdout = ''
    stderr = ''
  }

  describe('dispatch', () => {
    it('should print help with no subcommand', async () => {
      expect(await run()).toBe(0)
      expect(stdout).toContain('Usage: si vault <command>')
    })

    it('should exit 2 for an unknown subcommand', async () => {
      expect(await run('bogus')).toBe(2)
      expect(stderr).toBe('Unknown vault command: bogus\n')
    })

    it('should exit 2 for an unknown flag', async () => {
      expect(await run('status', '--bogus')).toBe(2)
      expect(stderr).toContain('--bogus')
    })
  })

  // ---------------------------------------------------------------------------

  describe('init and status', () => {
    it('should initialise the vault and report the key', async () => {
      expect(await run('init')).toBe(0)
      expect(plain(stdout)).toContain(`file:      ${tv.envFile}\n`)
      expect(plain(stdout)).toContain('key:       created (backend=file)\n')
      expect(await tv.readEnvFile()).toMatch(/^# si-vault:version 1\n# si-vault:recipient age1\w+\n\n$/)
    })

    it('should emit the JSON payload shape', async () => {
      await quiet('init')
      expect(await json('status')).toMatchObject({
        ok: true,
        command: 'vault status',
        context: { scope: 'default', backend: 'local', location: tv.envFile },
        mode: 'off',
        exists: true,
        trust: 'ok',
        counts: { plaintext: 0, encrypted: 0, malformed: 0 },
      })
    })

    it('should report keygen without a target context', async () => {
      const payload = await json('keygen')
      expect(payload).toMatchObject({ ok: true, command: 'vault keygen', mode: 'off', created: true, rotated: false })
      expect(payload).not.toHaveProperty('context')
    })
  })

  // ---------------------------------------------------------------------------

  describe('values', () => {
    beforeEach(async () => {
      await quiet('init')
    })

    it('should set, describe and reveal a value', async () => {
      await quiet('set', 'API_KEY', 'test-secret')
      expect(await run('get', 'API_KEY')).toBe(0)
      expect(stdout).toBe('encrypted\n')
      stdout = ''
      expect(await run('get', 'API_KEY', '--reveal')).toBe(0)
      expect(stdout).toBe('test-secret\n')
    })

    it('should read the value from stdin without trailing newlines', async () => {
      const stdin = Readable.from(['line one\nline two\n\n'])
      expect(await runWith({ ...tv.runtime, stdin }, 'set', 'MULTI', '--stdin')).toBe(0)
      stdout = ''
      await run('get', 'MULTI', '--reveal')
      expect(stdout).toBe('line one\nline two\n')
    })

    it('should exit 2 when the value is missing', async () => {
      expect(await run('set', 'API_KEY')).toBe(2)
      expect(stderr).toContain('BadInputError: value required (use --stdin for multiline or safer input)\n')
    })

    it('should exit 2 for an invalid key name', async () => {
      expect(await run('set', '1BAD', 'x')).toBe(2)
      expect(stderr).toContain('BadInputError: invalid key name "1BAD"')
    })

    it('should exit 1 for a missing key and report JSON errors', async () => {
      stdout = ''
      expect(await run('get', 'NOPE', '--json')).toBe(1)
      expect(stderr).toBe('VaultError: key not found: NOPE\n')
      expect(JSON.parse(stdout)).toEqual({
        ok: false,
        command: 'vault get',
        error: { name: 'VaultError', kind: 'operational', message: 'key not found: NOPE' },
      })
    })

    it('should list and reveal keys with dump', async () => {
      await quiet('set', 'A', 'one')
      await quiet('set', 'B', 'two words')
      expect(await run('dump')).toBe(0)
      expect(plain(stdout)).toBe('A\t(encrypted; use --reveal)\nB\t(encrypted; use --reveal)\n')
      stdout = ''
      expect(await run('dump', '--reveal')).toBe(0)
      expect(stdout).toBe('A=one\nB="two words"\n')
    })

    it('should remove keys with unset', async () => {
      await quiet('set', 'A', 'one')
      expect(await run('unset', 'A')).toBe(0)
      expect(plain(stdout)).toContain('unset: A\n')
      stdout = ''
      await run('dump')
      expect(stdout).toBe('')
    })
  })

  // ---------------------------------------------------------------------------

  describe('encrypt and decrypt', () => {
    beforeEach(async () => {
      await quiet('init')
      await quiet('set', 'A', 'one')
    })

    it('should encrypt appended plaintext', async () => {
      await fs.appendFile(tv.envFile, 'PLAIN=x\n')
      expect(await run('encrypt')).toBe(0)
      expect(plain(stdout)).toContain('encrypted: 1\n')
      stdout = ''
      await run('get', 'PLAIN')
      expect(stdout).toBe('encrypted\n')
    })

    it('should require --stdout or --yes', async () => {
      expect(await run('decrypt')).toBe(2)
      expect(stderr).toContain('decrypt requires exactly one of --stdout or --yes')
    })

    it('should print the decrypted document and leave the file alone', async () => {
      const before = await tv.readEnvFile()
      expect(await run('decrypt', '--stdout')).toBe(0)
      expect(stdout).toBe(before?.replace(/A=v2:\S+/, 'A=one'))
      expect(await tv.readEnvFile()).toBe(before)
    })

    it('should write decrypted values back with --yes', async () => {
      expect(await run('decrypt', '--yes')).toBe(0)
      expect(plain(stdout)).toContain('decrypted: 1\n')
      expect((await tv.readEnvFile())?.endsWith('\nA=one\n')).toBe(true)
    })
  })

  // ---------------------------------------------------------------------------

  describe('fmt', () => {
    it('should exit 1 from --check until the file is formatted', async () => {
      await fs.writeFile(tv.envFile, 'A = 1\n')
      expect(await run('fmt', '--check')).toBe(1)
      expect(stdout).toBe(`needs formatting: ${tv.envFile}\n`)
      expect(await tv.readEnvFile()).toBe('A = 1\n')

      stdout = ''
      expect(await run('fmt')).toBe(0)
      expect(stdout).toBe(`formatted: ${tv.envFile}\n`)
      expect(await tv.readEnvFile()).toBe('A=1\n')

      stdout = ''
      expect(await run('fmt', '--check')).toBe(0)
      expect(stdout).toBe(`ok: ${tv.envFile}\n`)
    })
  })

  // ---------------------------------------------------------------------------

  describe('trust', () => {
    let original: string
    let other: string

    beforeEach(async () => {
      await quiet('init')
      const text = (await tv.readEnvFile()) ?? ''
      original = /recipient (\S+)/.exec(text)?.[1] ?? ''
      other = (await generateIdentity()).recipient
      await fs.writeFile(tv.envFile, text.replace(original, other))
    })

    it('should show the recipient change', async () => {
      expect(await run('trust', 'status')).toBe(0)
      expect(plain(stdout)).toContain('trust:      changed\n')
      expect(stdout.endsWith(`- ${original}\n+ ${other}\n`)).toBe(true)
    })

    it('should refuse writes until the change is accepted', async () => {
      expect(await run('set', 'A', 'one')).toBe(1)
      expect(stderr).toContain(`TrustMismatchError: vault recipient changed for ${tv.envFile}`)

      stderr = ''
      expect(await run('trust', 'accept')).toBe(2)
      expect(stderr).toContain('non-interactive: pass --yes to accept trust')

      expect(await run('trust', 'accept', '--yes')).toBe(0)
      expect(await run('set', 'A', 'one')).toBe(0)
    })

    it('should forget the record', async () => {
      expect(await run('trust', 'forget')).toBe(0)
      expect(stdout).toBe(`trust: removed for ${tv.envFile}\n`)
    })

    it('should exit 2 for an unknown action', async () => {
      expect(await run('trust', 'bless')).toBe(2)
      expect(stderr).toContain('unknown trust action: bless')
    })
  })

  // ---------------------------------------------------------------------------

  describe('recipients', () => {
    let owner: string

    beforeEach(async () => {
      await quiet('init')
      owner = /recipient (\S+)/.exec((await tv.readEnvFile()) ?? '')?.[1] ?? ''
    })

    it('should list the header recipients', async () => {
      expect(await run('recipients', 'list')).toBe(0)
      const lines = plain(stdout).split('\n')
      expect(lines[0]).toBe(`file:     ${tv.envFile}`)
      expect(lines[1]).toMatch(/^trust fp: [0-9a-f]{16}$/)
      expect(lines.slice(2)).toEqual([owner, ''])
    })

    it('should add and remove a recipient', async () => {
      const teammate = (await generateIdentity()).recipient
      expect(await run('recipients', 'add', teammate)).toBe(0)
      expect(plain(stdout)).toBe(`file:      ${tv.envFile}\nrecipient: added\n`)
      expect(await tv.readEnvFile()).toBe(
        `# si-vault:version 1\n# si-vault:recipient ${owner}\n# si-vault:recipient ${teammate}\n\n`,
      )

      stdout = ''
      expect(await run('recipients', 'add', teammate)).toBe(0)
      expect(plain(stdout)).toContain('recipient: already present\n')

      stdout = ''
      expect(await run('recipients', 'remove', teammate)).toBe(0)
      expect(plain(stdout)).toContain('recipient: removed\n')
      expect(await tv.readEnvFile()).toBe(`# si-vault:version 1\n# si-vault:recipient ${owner}\n\n`)
    })

    it('should exit 2 for a malformed recipient or the last one', async () => {
      expect(await run('recipients', 'add', 'not-a-recipient')).toBe(2)
      expect(stderr).toContain('BadInputError: invalid recipient: not-a-recipient\n')

      stderr = ''
      expect(await run('recipients', 'remove', owner)).toBe(2)
      expect(stderr).toBe(
        'BadInputError: cannot remove the last recipient\nhint: decrypt the vault with `si vault decrypt --yes` instead\n',
      )
    })

    it('should exit 2 without an action or recipient', async () => {
      expect(await run('recipients')).toBe(2)
      expect(stderr).toContain('usage: si vault recipients <list|add|remove>')
      stderr = ''
      expect(await run('recipients', 'add')).toBe(2)
      expect(stderr).toContain('usage: si vault recipients add <age1...>')
    })
  })

  // ---------------------------------------------------------------------------

  describe('check', () => {
    it('should exit 1 and name the plaintext keys', async () => {
      await fs.writeFile(tv.envFile, 'B=x\nA=y\n')
      expect(await run('check')).toBe(1)
      expect(stderr).toBe(
        '[si vault] plaintext values detected:\n  - .env: A, B\n\nFix:\n  si vault encrypt --file .env\n',
      )
    })

    it('should pass an encrypted vault', async () => {
      await quiet('init')
      await quiet('set', 'A', 'one')
      expect(await run('check')).toBe(0)
      expect(stdout).toBe('ok: 1 file checked\n')
    })

    it('should report findings as JSON', async () => {
      await fs.writeFile(tv.envFile, 'A=y\n')
      expect(await json('check')).toEqual({
        ok: true,
        command: 'vault check',
        mode: 'off',
        checked: ['.env'],
        findings: [{ file: '.env', plaintext_keys: ['A'] }],
      })
    })
  })

  // ---------------------------------------------------------------------------

  describe('run', () => {
    const node = process.execPath

    beforeEach(async () => {
      await quiet('init')
      await quiet('set', 'API_KEY', 'test-secret')
    })

    it('should pass values to the child and redact its output', async () => {
      const code = await run('run', '--', node, '-e', "process.stdout.write('key=' + process.env.API_KEY)")
      expect(code).toBe(0)
      expect(stdout).toBe('key=[REDACTED]')
    })

    it('should leave output alone with --no-redact', async () => {
      await run('run', '--no-redact', '--', node, '-e', "process.stdout.write('key=' + process.env.API_KEY)")
      expect(stdout).toBe('key=test-secret')
    })

    it("should exit with the child's exit code", async () => {
      expect(await run('run', '--', node, '-e', 'process.exit(3)')).toBe(3)
    })

    it('should refuse plaintext values unless allowed', async () => {
      await fs.appendFile(tv.envFile, 'P=plain-value\n')
      expect(await run('run', '--', node, '-e', '')).toBe(1)
      expect(stderr).toContain('vault file contains plaintext keys: P')

      stderr = ''
      expect(await run('run', '--allow-plaintext', '--', node, '-e', '')).toBe(0)
      expect(stderr).toBe('warning: vault file contains plaintext keys (allowed): P\n')
    })

    it('should exit 2 without a command', async () => {
      expect(await run('run', 'echo')).toBe(2)
      expect(stderr).toContain('must provide command after --')
    })
  })

  // ---------------------------------------------------------------------------

  describe('sync', () => {
    it('should refuse sync push and hydrate when sync is off', async () => {
      await quiet('init')
      expect(await run('sync', 'push')).toBe(2)
      expect(await run('hydrate')).toBe(2)
      expect(stderr).toContain('hydrate requires vault.sync_backend = "sun"')
    })

    it('should keep the vault in sun in strict mode', async () => {
      await tv.cleanup()
      tv = await TestVault.create({ syncBackend: 'sun' })
      expect(await run('init')).toBe(0)
      expect(await run('set', 'API_KEY', 'test-secret')).toBe(0)
      expect(await tv.readEnvFile()).toBeUndefined()
      expect(tv.sun.text('vault-backup', 'default')).toMatch(/\nAPI_KEY=v2:/)

      stdout = ''
      expect(await run('hydrate')).toBe(0)
      expect(plain(stdout)).toContain('identity:    sun\n')
      expect(tv.env['SI_VAULT_IDENTITY']).toMatch(/^AGE-SECRET-KEY-1/)
    })
  })
})
