import { BackendUnavailableError } from '../errors.js'
import type { SunObjectClient } from '../sync/sun-client.js'
import { parseIdentity } from './identity.js'
import type { IdentitySource, VaultIdentity } from './identity.js'
import type { IdentityStore } from './types.js'

const IDENTITY_KIND = 'identity'
const CURRENT_NAME = 'default'
const PREVIOUS_NAME = 'default.previous'

/**
 * {@link IdentityStore} over the sun object service (kind `identity`). The
 * payload is the bare age secret key string.
 * @internal
 */
export class SunIdentityStore implements IdentityStore {
  readonly backend = 'sun'
  readonly location = `sun:${IDENTITY_KIND}/${CURRENT_NAME}`
  readonly #client: SunObjectClient | undefined

  constructor(client: SunObjectClient | undefined) {
    this.#client = client
  }

  async load(): Promise<VaultIdentity | undefined> {
    return this.#get(CURRENT_NAME, 'sun')
  }

  async loadPrevious(): Promise<VaultIdentity | undefined> {
    return this.#get(PREVIOUS_NAME, 'sun-previous')
  }

  async save(identity: VaultIdentity): Promise<void> {
    await this.#put(CURRENT_NAME, identity)
  }

  async rotate(next: VaultIdentity): Promise<VaultIdentity | undefined> {
    const previous = await this.load()
    if (previous !== undefined) {
      await this.#put(PREVIOUS_NAME, previous)
    }
    await this.#put(CURRENT_NAME, next)
    return previous
  }

  #requireClient(): SunObjectClient {
    if (this.#client === undefined) {
      throw new BackendUnavailableError(
        'sun is not configured (set sun.base_url and sun.token in ~/.si/sun/settings.toml)',
        'not-configured',
      )
    }
    return this.#client
  }

  async #get(name: string, source: IdentitySource): Promise<VaultIdentity | undefined> {
    const object = await this.#requireClient().getObject(IDENTITY_KIND, name)
    if (object === undefined) {
      return undefined
    }
    const text = Buffer.from(object.bytes).toString('utf8')
    return parseIdentity(text, source, `sun ${IDENTITY_KIND}/${name}`)
  }

  async #put(name: string, identity: VaultIdentity): Promise<void> {
    await this.#requireClient().putObject({
      kind: IDENTITY_KIND,
      name,
      bytes: new Uint8Array(Buffer.from(identity.secret, 'utf8')),
      contentType: 'text/plain',
      metadata: { recipient: identity.recipient, fingerprint: identity.fingerprint },
    })
  }
}
