import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { BackendUnavailableError } from 'si-vault'
import { InMemorySunStore, TestVault } from '../../src/index.js'

describe('InMemorySunStore', () => {
  let store: InMemorySunStore

  beforeEach(() => {
    store = new InMemorySunStore()
  })

  it('should return undefined for absent objects', async () => {
    expect(await store.getObject('identity', 'default')).toBeUndefined()
  })

  it('should store objects and record calls', async () => {
    await store.putObject({
      kind: 'vault-backup',
      name: 'default',
      bytes: new Uint8Array(Buffer.from('A=v2:YWJj\n')),
      contentType: 'text/plain',
      metadata: { path: '.env', source: 'set' },
    })
    expect(store.text('vault-backup', 'default')).toBe('A=v2:YWJj\n')
    expect((await store.getObject('vault-backup', 'default'))?.metadata).toEqual({ path: '.env', source: 'set' })
    expect(store.calls).toEqual([
      { method: 'put', kind: 'vault-backup', name: 'default' },
      { method: 'get', kind: 'vault-backup', name: 'default' },
    ])
  })

  it('should seed without recording a call', () => {
    store.seed('identity', 'default', 'x')
    expect(store.size).toBe(1)
    expect(store.calls).toEqual([])
  })

  it('should fail every call while offline', async () => {
    store.goOffline()
    const err = await store.getObject('identity', 'default').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(BackendUnavailableError)
    expect(err).toMatchObject({ reason: 'network', message: 'sun: GET identity/default failed: offline' })
    store.goOnline()
    expect(await store.getObject('identity', 'default')).toBeUndefined()
  })

  it('should clear objects and calls', async () => {
    store.seed('identity', 'default', 'x')
    await store.getObject('identity', 'default')
    store.clear()
    expect(store.size).toBe(0)
    expect(store.calls).toEqual([])
  })
})

// ---------------------------------------------------------------------------

describe('TestVault', () => {
  let tv: TestVault

  afterEach(async () => {
    await tv.cleanup()
  })

  it('should create an isolated home and project', async () => {
    tv = await TestVault.create()
    expect(tv.env['SI_SETTINGS_HOME']).toBe(tv.home)
    expect(tv.envFile).toBe(path.join(tv.home, 'project', '.env'))
    expect(await tv.readEnvFile()).toBeUndefined()
    expect(tv.runtime).toMatchObject({ cwd: tv.project, homeDir: tv.home, interactive: false })
  })

  it('should run vault operations against the project', async () => {
    tv = await TestVault.create()
    const vault = await tv.open()
    const { recipient } = await vault.init()
    await vault.set('API_KEY', 'test-secret')
    expect(await tv.readEnvFile()).toMatch(
      new RegExp(`^# si-vault:version 1\\n# si-vault:recipient ${recipient}\\n\\nAPI_KEY=v2:[A-Za-z0-9_-]+\\n$`),
    )
    expect((await (await tv.open()).get('API_KEY', { reveal: true })).value).toBe('test-secret')
  })

  it('should write sync settings', async () => {
    tv = await TestVault.create({ syncBackend: 'sun', strictSun: false })
    const settings = await fs.readFile(path.join(tv.home, '.si', 'vault', 'settings.toml'), 'utf8')
    expect(settings).toBe('sync_backend = "sun"\nstrict_sun = false\n')
    expect((await tv.context()).settings.vault).toMatchObject({ syncBackend: 'sun', strictSun: false })
  })

  it('should route backups to the in-memory sun store', async () => {
    tv = await TestVault.create({ syncBackend: 'sun', strictSun: false })
    const vault = await tv.open()
    await vault.init()
    expect(tv.sun.text('vault-backup', 'default')).toBe(await tv.readEnvFile())
    expect(tv.infos).toEqual(['sun vault auto-backup complete (init)'])
  })
})
