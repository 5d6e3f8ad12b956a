import { describe, it, expect } from 'vitest'
import { RedactingStream } from '../../src/redact.js'

function collectStream(stream: RedactingStream, chunks: Buffer[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const result: Buffer[] = []
    stream.on('data', (chunk: Buffer) => { result.push(chunk) })
    stream.on('end', () => { resolve(Buffer.concat(result).toString('utf8')) })
    stream.on('error', reject)
    for (const chunk of chunks) {
      stream.write(chunk)
    }
    stream.end()
  })
}

describe('RedactingStream', () => {
  it('should redact a secret in a single chunk', async () => {
    const stream = new RedactingStream('test-secret')
    const result = await collectStream(stream, [Buffer.from('The key is test-secret here')])
    expect(result).toBe('The key is [REDACTED] here')
  })

  it('should redact a secret split across two chunks', async () => {
    const stream = new RedactingStream('test-secret')
    const result = await collectStream(stream, [
      Buffer.from('The key is test-se'),
      Buffer.from('cret here'),
    ])
    expect(result).toBe('The key is [REDACTED] here')
  })

  it('should redact every vault value', async () => {
    const stream = new RedactingStream(['first-value', 'second-value'])
    const result = await collectStream(stream, [Buffer.from('a=first-value b=second-value')])
    expect(result).toBe('a=[REDACTED] b=[REDACTED]')
  })

  it('should replace the longer of two overlapping secrets whole', async () => {
    const stream = new RedactingStream(['pass', 'password-1'])
    const result = await collectStream(stream, [Buffer.from('password-1 pass')])
    expect(result).toBe('[REDACTED] [REDACTED]')
  })

  it('should not redact values shorter than four characters', async () => {
    const stream = new RedactingStream(['1', 'on', 'abcd'])
    const result = await collectStream(stream, [Buffer.from('1 on abcd')])
    expect(result).toBe('1 on [REDACTED]')
  })

  it('should pass through unchanged when there is nothing to redact', async () => {
    const stream = new RedactingStream([])
    const result = await collectStream(stream, [Buffer.from('hello '), Buffer.from('world')])
    expect(result).toBe('hello world')
  })

  it('should use a custom replacement string', async () => {
    const stream = new RedactingStream('secret', '***')
    const result = await collectStream(stream, [Buffer.from('my secret value')])
    expect(result).toBe('my *** value')
  })

  it('should handle a secret at the very end of output', async () => {
    const stream = new RedactingStream('ending')
    const result = await collectStream(stream, [Buffer.from('the ending')])
    expect(result).toBe('the [REDACTED]')
  })
})
