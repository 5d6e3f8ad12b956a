/**
 * In-memory sun object service for testing.
 */

import { BackendUnavailableError } from 'si-vault'
import type { SunObject, SunObjectClient, SunObjectKind } from 'si-vault'

/**
 * One recorded call against an {@link InMemorySunStore}.
 * @public
 */
export interface SunStoreCall {
  method: 'get' | 'put'
  kind: SunObjectKind
  name: string
}

/**
 * A fully in-memory `SunObjectClient`.
 *
 * @remarks
 * Objects live in a `Map` keyed by `kind/name`. Every call is recorded in
 * {@link InMemorySunStore.calls}; {@link InMemorySunStore.goOffline} makes
 * every later call fail the way an unreachable service does.
 *
 * @public
 */
export class InMemorySunStore implements SunObjectClient {
  readonly #objects = new Map<string, SunObject>()
  readonly calls: SunStoreCall[] = []
  #offline = false

  /** @public */
  getObject(kind: SunObjectKind, name: string): Promise<SunObject | undefined> {
    this.calls.push({ method: 'get', kind, name })
    if (this.#offline) {
      return Promise.reject(this.#unreachable('GET', kind, name))
    }
    return Promise.resolve(this.#objects.get(`${kind}/${name}`))
  }

  /** @public */
  putObject(object: SunObject): Promise<void> {
    this.calls.push({ method: 'put', kind: object.kind, name: object.name })
    if (this.#offline) {
      return Promise.reject(this.#unreachable('PUT', object.kind, object.name))
    }
    this.#objects.set(`${object.kind}/${object.name}`, object)
    return Promise.resolve()
  }

  /**
   * Stored payload as UTF-8 text, if present.
   * @public
   */
  text(kind: SunObjectKind, name: string): string | undefined {
    const object = this.#objects.get(`${kind}/${name}`)
    return object === undefined ? undefined : Buffer.from(object.bytes).toString('utf8')
  }

  /**
   * Store a text object directly, without recording a call.
   * @public
   */
  seed(kind: SunObjectKind, name: string, text: string, metadata: Record<string, string> = {}): void {
    this.#objects.set(`${kind}/${name}`, {
      kind,
      name,
      bytes: new Uint8Array(Buffer.from(text, 'utf8')),
      contentType: 'text/plain',
      metadata,
    })
  }

  /**
   * Fail every later call with a network `BackendUnavailableError`.
   * @public
   */
  goOffline(): void {
    this.#offline = true
  }

  /** @public */
  goOnline(): void {
    this.#offline = false
  }

  /**
   * Remove all objects and forget recorded calls.
   * @public
   */
  clear(): void {
    this.#objects.clear()
    this.calls.length = 0
  }

  /**
   * The number of objects currently stored.
   * @public
   */
  get size(): number {
    return this.#objects.size
  }

  #unreachable(method: string, kind: SunObjectKind, name: string): BackendUnavailableError {
    return new BackendUnavailableError(`sun: ${method} ${kind}/${name} failed: offline`, 'network')
  }
}
