/**
 * HTTP client for the sun object service.
 *
 * @remarks
 * Objects are addressed by kind and name:
 * `GET|PUT {base_url}/objects/{kind}/{name}` with bearer auth and JSON
 * bodies carrying the payload as base64. A 404 means the object is absent.
 * Network errors, timeouts and 408/425/429/5xx answers are retried at most
 * twice with capped exponential backoff; `Retry-After` is honoured.
 *
 * @packageDocumentation
 */

import { setTimeout as sleepFor } from 'node:timers/promises'
import { BackendUnavailableError } from '../errors.js'
import type { SunObject, SunObjectKind } from '../types.js'

/** Minimal object store interface the vault needs from sun. */
export interface SunObjectClient {
  /** Fetch an object; `undefined` when it does not exist. */
  getObject(kind: SunObjectKind, name: string): Promise<SunObject | undefined>
  /** Create or replace an object. */
  putObject(object: SunObject): Promise<void>
}

/** Options for {@link SunHttpClient}. */
export interface SunHttpClientOptions {
  baseUrl: string
  token: string
  /** Per-request deadline. Defaults to 15 seconds. */
  timeoutMs?: number | undefined
  /** Permit `http://` for non-local hosts. */
  allowInsecureHttp?: boolean | undefined
  fetch?: typeof fetch | undefined
  sleep?: ((ms: number) => Promise<void>) | undefined
}

const MAX_ATTEMPTS = 3
const RETRY_BASE_DELAY_MS = 200
const RETRY_MAX_DELAY_MS = 2000
const DEFAULT_TIMEOUT_MS = 15_000
const LOCAL_HOSTS = new Set(['localhost', '127.0.0.1', '::1', '[::1]'])

interface WireObject {
  kind?: string
  name?: string
  content_type?: string
  payload_base64: string
  metadata?: Record<string, string>
}

function isWireObject(value: unknown): value is WireObject {
  if (typeof value !== 'object' || value === null) return false
  if (!('payload_base64' in value) || typeof value.payload_base64 !== 'string') return false
  if ('content_type' in value && typeof value.content_type !== 'string') return false
  if ('metadata' in value && value.metadata !== undefined && value.metadata !== null) {
    const metadata: unknown = value.metadata
    if (typeof metadata !== 'object' || metadata === null) return false
    if (!Object.values(metadata).every((v) => typeof v === 'string')) return false
  }
  return true
}

function errorMessageFrom(body: string, status: number): string {
  try {
    const parsed: unknown = JSON.parse(body)
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
      return `sun: ${parsed.error} (status ${String(status)})`
    }
  } catch (err) {
    if (!(err instanceof SyntaxError)) {
      throw err
    }
  }
  const trimmed = body.trim()
  return `sun: ${trimmed.length > 0 ? trimmed : 'request failed'} (status ${String(status)})`
}

/** Whether an HTTP status is worth retrying. */
export function shouldRetryStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || (status >= 500 && status <= 599)
}

/** Backoff before the next attempt (1-based), honouring `Retry-After`. */
export function retryDelayMs(attempt: number, retryAfter: string | null, now: Date = new Date()): number {
  const header = retryAfter?.trim() ?? ''
  if (header.length > 0) {
    if (/^\d+$/.test(header)) {
      return Math.min(Number(header) * 1000, RETRY_MAX_DELAY_MS)
    }
    const at = Date.parse(header)
    if (!Number.isNaN(at)) {
      return Math.min(Math.max(at - now.getTime(), 0), RETRY_MAX_DELAY_MS)
    }
  }
  return Math.min(RETRY_BASE_DELAY_MS * 2 ** (Math.max(attempt, 1) - 1), RETRY_MAX_DELAY_MS)
}

/**
 * `fetch`-based {@link SunObjectClient}.
 *
 * @public
 */
export class SunHttpClient implements SunObjectClient {
  readonly #baseUrl: string
  readonly #token: string
  readonly #timeoutMs: number
  readonly #fetch: typeof fetch
  readonly #sleep: (ms: number) => Promise<void>

  /**
   * @throws {@link BackendUnavailableError} (reason `not-configured`) for a
   * missing or unusable base URL or token.
   */
  constructor(options: SunHttpClientOptions) {
    const baseUrl = options.baseUrl.trim().replace(/\/+$/, '')
    if (baseUrl.length === 0) {
      throw new BackendUnavailableError(
        'sun base url is required (set sun.base_url or SI_SUN_BASE_URL)',
        'not-configured',
      )
    }
    let parsed: URL
    try {
      parsed = new URL(baseUrl)
    } catch (err) {
      throw new BackendUnavailableError(`invalid sun base url ${JSON.stringify(baseUrl)}`, 'not-configured', {
        cause: err,
      })
    }
    if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
      throw new BackendUnavailableError(`unsupported sun base url scheme ${parsed.protocol}`, 'not-configured')
    }
    if (parsed.protocol === 'http:' && !LOCAL_HOSTS.has(parsed.hostname) && options.allowInsecureHttp !== true) {
      throw new BackendUnavailableError(
        'sun base url must use https for non-local hosts (set SI_SUN_ALLOW_INSECURE_HTTP=1 to override)',
        'not-configured',
      )
    }
    const token = options.token.trim()
    if (token.length === 0) {
      throw new BackendUnavailableError('sun token is required (set sun.token or SI_SUN_TOKEN)', 'not-configured')
    }

    this.#baseUrl = baseUrl
    this.#token = token
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.#fetch = options.fetch ?? fetch
    this.#sleep = options.sleep ?? ((ms) => sleepFor(ms))
  }

  async getObject(kind: SunObjectKind, name: string): Promise<SunObject | undefined> {
    const response = await this.#request('GET', kind, name)
    if (response === undefined) {
      return undefined
    }
    const text = await response.text()
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (err) {
      throw new BackendUnavailableError(`sun: invalid response for ${kind}/${name}`, 'bad-response', { cause: err })
    }
    if (!isWireObject(parsed)) {
      throw new BackendUnavailableError(`sun: invalid response for ${kind}/${name}`, 'bad-response')
    }
    return {
      kind,
      name,
      bytes: new Uint8Array(Buffer.from(parsed.payload_base64, 'base64')),
      contentType: parsed.content_type ?? 'application/octet-stream',
      metadata: parsed.metadata ?? {},
    }
  }

  async putObject(object: SunObject): Promise<void> {
    const body = JSON.stringify({
      content_type: object.contentType,
      payload_base64: Buffer.from(object.bytes).toString('base64'),
      metadata: object.metadata,
    })
    const response = await this.#request('PUT', object.kind, object.name, body)
    if (response === undefined) {
      throw new BackendUnavailableError(`sun: PUT ${object.kind}/${object.name} returned 404`, 'http-404')
    }
    await response.body?.cancel()
  }

  async #request(
    method: 'GET' | 'PUT',
    kind: SunObjectKind,
    name: string,
    body?: string,
  ): Promise<Response | undefined> {
    const url = `${this.#baseUrl}/objects/${encodeURIComponent(kind)}/${encodeURIComponent(name)}`
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.#token}`,
      Accept: 'application/json',
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    let lastError: BackendUnavailableError | undefined
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let response: Response
      try {
        response = await this.#fetch(url, {
          method,
          headers,
          ...(body !== undefined ? { body } : {}),
          signal: AbortSignal.timeout(this.#timeoutMs),
        })
      } catch (err) {
        const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
        lastError = new BackendUnavailableError(
          `sun: ${method} ${kind}/${name} ${timedOut ? 'timed out' : 'failed'}: ${err instanceof Error ? err.message : String(err)}`,
          timedOut ? 'timeout' : 'network',
          { cause: err },
        )
        if (attempt < MAX_ATTEMPTS) {
          await this.#sleep(retryDelayMs(attempt, null))
          continue
        }
        throw lastError
      }

      if (response.status === 404) {
        await response.body?.cancel()
        return undefined
      }
      if (response.ok) {
        return response
      }

      const text = await response.text()
      lastError = new BackendUnavailableError(errorMessageFrom(text, response.status), `http-${String(response.status)}`)
      if (attempt < MAX_ATTEMPTS && shouldRetryStatus(response.status)) {
        await this.#sleep(retryDelayMs(attempt, response.headers.get('retry-after')))
        continue
      }
      throw lastError
    }
    throw lastError ?? new BackendUnavailableError(`sun: ${method} ${kind}/${name} failed`, 'network')
  }
}
