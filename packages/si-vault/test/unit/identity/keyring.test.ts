import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest'
import { encryptValue } from '../../../src/cipher/age.js'
import { DecryptFailedError, IdentityUnavailableError } from '../../../src/errors.js'
import { FileIdentityStore } from '../../../src/identity/file-store.js'
import { fingerprintOf, generateIdentity, parseIdentity, renderIdentityFile } from '../../../src/identity/identity.js'
import type { VaultIdentity } from '../../../src/identity/identity.js'
import { Keyring } from '../../../src/identity/keyring.js'
import type { MutableEnv } from '../../../src/identity/keyring.js'
import { SunIdentityStore } from '../../../src/identity/sun-store.js'
import type { IdentityStore } from '../../../src/identity/types.js'
import { makeTempDir } from '../../helpers/env.js'
import { MemorySunClient } from '../../helpers/sun.js'

let envIdentity: VaultIdentity
let fileIdentity: VaultIdentity

beforeAll(async () => {
  envIdentity = await generateIdentity()
  fileIdentity = await generateIdentity()
})

let dir: string
let store: FileIdentityStore

beforeEach(async () => {
  dir = await makeTempDir()
  const keyFile = path.join(dir, 'keys', 'age.key')
  store = new FileIdentityStore({ keyFile, previousKeyFile: `${keyFile}.previous` })
})

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true })
})

function keyring(env: MutableEnv, identityStore: IdentityStore = store): Promise<Keyring> {
  return Keyring.create({ env, store: identityStore, cwd: dir, homeDir: dir, allowInsecureKeyFile: false })
}

describe('identity parsing', () => {
  it('should derive recipient and fingerprint', async () => {
    const parsed = await parseIdentity(`# comment\n${envIdentity.secret}\n`, 'env', 'test')
    expect(parsed.recipient).toBe(envIdentity.recipient)
    expect(parsed.fingerprint).toBe(fingerprintOf(envIdentity.recipient))
    expect(parsed.fingerprint).toMatch(/^[0-9a-f]{16}$/)
  })

  it('should reject text without a secret key', async () => {
    await expect(parseIdentity('age1notasecret', 'env', 'SI_VAULT_IDENTITY')).rejects.toThrow(
      'SI_VAULT_IDENTITY invalid: expected an AGE-SECRET-KEY-1 identity',
    )
  })

  it('should render an age key file', () => {
    const text = renderIdentityFile(envIdentity, new Date('2026-01-01T00:00:00.000Z'))
    expect(text).toBe(
      `# created: 2026-01-01T00:00:00.000Z\n# public key: ${envIdentity.recipient}\n${envIdentity.secret}\n`,
    )
  })
})

// ---------------------------------------------------------------------------

describe('Keyring precedence', () => {
  it('should prefer SI_VAULT_IDENTITY over the key file', async () => {
    await store.save(fileIdentity)
    const ring = await keyring({ SI_VAULT_IDENTITY: envIdentity.secret })
    const primary = await ring.primary()
    expect(primary?.recipient).toBe(envIdentity.recipient)
    expect(primary?.source).toBe('env')
    expect((await ring.all()).map((i) => i.source)).toEqual(['env', 'file'])
  })

  it('should read SI_VAULT_IDENTITY_FILE relative to the working directory', async () => {
    await fs.writeFile(path.join(dir, 'id.key'), renderIdentityFile(envIdentity, new Date()), { mode: 0o600 })
    const ring = await keyring({ SI_VAULT_IDENTITY_FILE: 'id.key' })
    expect((await ring.primary())?.source).toBe('env-file')
  })

  it('should fail when SI_VAULT_IDENTITY_FILE is missing', async () => {
    await expect(keyring({ SI_VAULT_IDENTITY_FILE: 'missing.key' })).rejects.toThrow(
      `SI_VAULT_IDENTITY_FILE not found: ${path.join(dir, 'missing.key')}`,
    )
  })

  it('should drop duplicate recipients', async () => {
    await store.save(envIdentity)
    const ring = await keyring({ SI_VAULT_IDENTITY: envIdentity.secret, SI_VAULT_PRIVATE_KEY: envIdentity.secret })
    expect((await ring.all()).map((i) => i.source)).toEqual(['env'])
  })

  it('should report where it looked when nothing is available', async () => {
    const ring = await keyring({})
    await expect(ring.require()).rejects.toThrow(IdentityUnavailableError)
    await expect(ring.require()).rejects.toThrow(
      `no vault identity available (checked environment and ${store.location})`,
    )
  })
})

// ---------------------------------------------------------------------------

describe('Keyring.decrypt', () => {
  it('should fall back to the previous key file after rotation', async () => {
    await store.save(fileIdentity)
    const wrapped = await encryptValue('old secret', fileIdentity.recipient)
    const next = await generateIdentity()
    const previous = await store.rotate(next)
    expect(previous?.recipient).toBe(fileIdentity.recipient)

    const opened = await (await keyring({})).decrypt(wrapped, 'K')
    expect(opened.plaintext).toBe('old secret')
    expect(opened.identity.source).toBe('file-previous')
  })

  it('should try environment identities before the backend', async () => {
    await store.save(fileIdentity)
    const wrapped = await encryptValue('v', fileIdentity.recipient)
    const opened = await (await keyring({ SI_VAULT_IDENTITY: envIdentity.secret })).decrypt(wrapped)
    expect(opened.identity.source).toBe('file')
  })

  it('should list every fingerprint tried on failure', async () => {
    await store.save(fileIdentity)
    const stranger = await generateIdentity()
    const wrapped = await encryptValue('v', stranger.recipient)
    const err = await (await keyring({ SI_VAULT_IDENTITY: envIdentity.secret }))
      .decrypt(wrapped, 'K')
      .catch((e: unknown) => e)
    expect(err).toBeInstanceOf(DecryptFailedError)
    expect(err).toMatchObject({ triedFingerprints: [envIdentity.fingerprint, fileIdentity.fingerprint] })
  })
})

// ---------------------------------------------------------------------------

describe('FileIdentityStore', () => {
  it('should write the key file owner-only', async () => {
    await store.save(fileIdentity)
    const stat = await fs.stat(store.location)
    if (process.platform !== 'win32') {
      expect(stat.mode & 0o777).toBe(0o600)
    }
    expect((await store.load())?.recipient).toBe(fileIdentity.recipient)
  })

  it.skipIf(process.platform === 'win32')('should refuse a group-readable key file', async () => {
    await store.save(fileIdentity)
    await fs.chmod(store.location, 0o644)
    await expect(store.load()).rejects.toThrow(
      `identity file ${store.location} has insecure permissions 644`,
    )
    const relaxed = new FileIdentityStore({
      keyFile: store.location,
      previousKeyFile: `${store.location}.previous`,
      allowInsecure: true,
    })
    expect((await relaxed.load())?.recipient).toBe(fileIdentity.recipient)
  })

  it('should return undefined when no key file exists', async () => {
    expect(await store.load()).toBeUndefined()
    expect(await store.loadPrevious()).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------

describe('SunIdentityStore', () => {
  it('should export the loaded identity as SI_VAULT_IDENTITY', async () => {
    const client = new MemorySunClient()
    client.seed('identity', 'default', fileIdentity.secret)
    const env: MutableEnv = {}
    const ring = await keyring(env, new SunIdentityStore(client))
    expect((await ring.primary())?.source).toBe('sun')
    expect(env['SI_VAULT_IDENTITY']).toBe(fileIdentity.secret)
  })
})
