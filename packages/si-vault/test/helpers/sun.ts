/**
 * Shared test helpers for the sun object service.
 */

import type { SunObjectClient } from '../../src/sync/sun-client.js'
import type { SunObject, SunObjectKind } from '../../src/types.js'

/** Call log entry of {@link MemorySunClient}. */
export interface SunCall {
  method: 'get' | 'put'
  kind: SunObjectKind
  name: string
}

/**
 * In-memory `SunObjectClient`. Starts empty; `fail` makes every call throw
 * the given error.
 */
export class MemorySunClient implements SunObjectClient {
  readonly objects = new Map<string, SunObject>()
  readonly calls: SunCall[] = []
  fail: Error | undefined

  async getObject(kind: SunObjectKind, name: string): Promise<SunObject | undefined> {
    this.calls.push({ method: 'get', kind, name })
    if (this.fail !== undefined) {
      throw this.fail
    }
    return this.objects.get(`${kind}/${name}`)
  }

  async putObject(object: SunObject): Promise<void> {
    this.calls.push({ method: 'put', kind: object.kind, name: object.name })
    if (this.fail !== undefined) {
      throw this.fail
    }
    this.objects.set(`${object.kind}/${object.name}`, object)
  }

  /** Stored payload as text, if present. */
  text(kind: SunObjectKind, name: string): string | undefined {
    const object = this.objects.get(`${kind}/${name}`)
    return object === undefined ? undefined : Buffer.from(object.bytes).toString('utf8')
  }

  /** Seed an object with a text payload. */
  seed(kind: SunObjectKind, name: string, text: string, metadata: Record<string, string> = {}): void {
    this.objects.set(`${kind}/${name}`, {
      kind,
      name,
      bytes: new Uint8Array(Buffer.from(text, 'utf8')),
      contentType: 'text/plain',
      metadata,
    })
  }
}
