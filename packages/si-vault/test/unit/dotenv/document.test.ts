import { describe, it, expect } from 'vitest'
import { DotenvDocument } from '../../../src/dotenv/document.js'
import { BadInputError } from '../../../src/errors.js'
import { SEALED_A } from '../../helpers/ciphertext.js'

const DIVIDER = '# ' + '-'.repeat(78)

describe('DotenvDocument.parse / emit', () => {
  it('should reproduce CRLF input, comments and malformed lines byte for byte', () => {
    const text = "# c\r\nexport A=1 # note\r\nnot valid\r\n\r\nB='x'"
    expect(DotenvDocument.parse(text).emit()).toBe(text)
  })

  it('should pick the first line ending as the default for appended lines', () => {
    expect(DotenvDocument.parse('A=1\r\nB=2\n').defaultNewline).toBe('\r\n')
    expect(DotenvDocument.parse('A=1').defaultNewline).toBe('\n')
  })

  it('should treat empty input as an empty document', () => {
    const doc = DotenvDocument.parse('')
    expect(doc.lines).toEqual([])
    expect(doc.emit()).toBe('')
  })
})

// ---------------------------------------------------------------------------

describe('DotenvDocument.lookup', () => {
  it('should return the last assignment of a key', () => {
    expect(DotenvDocument.parse('A=1\nA=2\n').lookup('A')).toBe('2')
  })

  it('should return the raw token including quotes', () => {
    expect(DotenvDocument.parse('A="x y" # c\n').lookup('A')).toBe('"x y"')
  })

  it('should return undefined for absent keys', () => {
    expect(DotenvDocument.parse('A=1\n').lookup('B')).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------

describe('DotenvDocument.entries', () => {
  it('should report malformed lines with a reason', () => {
    const doc = DotenvDocument.parse("NOT VALID\nA='x\n")
    expect(doc.entries()).toEqual([
      { kind: 'malformed', line: 0, text: 'NOT VALID', reason: 'not a KEY=value line' },
      { kind: 'malformed', line: 1, text: "A='x", reason: 'unterminated single quote' },
    ])
  })

  it('should decode values and flag exported and encrypted entries', () => {
    const doc = DotenvDocument.parse(`export A="a b"\nB=${SEALED_A} # sealed\n`)
    expect(doc.entries()).toEqual([
      {
        kind: 'assignment',
        line: 0,
        key: 'A',
        rawValue: '"a b"',
        value: 'a b',
        encrypted: false,
        comment: '',
        exported: true,
      },
      {
        kind: 'assignment',
        line: 1,
        key: 'B',
        rawValue: SEALED_A,
        value: SEALED_A,
        encrypted: true,
        comment: ' # sealed',
        exported: false,
      },
    ])
  })

  it('should keep the final occurrence of each key in effectiveEntries', () => {
    const effective = DotenvDocument.parse('A=1\nB=2\nA=3\n').effectiveEntries()
    expect(effective.map((e) => [e.key, e.value])).toEqual([
      ['B', '2'],
      ['A', '3'],
    ])
  })
})

// ---------------------------------------------------------------------------

describe('DotenvDocument.upsert', () => {
  it('should rewrite an existing key in place and keep its comment', () => {
    const doc = DotenvDocument.parse('A=1 # note\nB=2\n')
    expect(doc.upsert('A', '3')).toBe(true)
    expect(doc.emit()).toBe('A=3 # note\nB=2\n')
  })

  it('should report no change when the value is already set', () => {
    const doc = DotenvDocument.parse('A=1\n')
    expect(doc.upsert('A', '1')).toBe(false)
  })

  it('should keep the export prefix of an existing line', () => {
    const doc = DotenvDocument.parse('export A=1\n')
    doc.upsert('A', '2')
    expect(doc.emit()).toBe('export A=2\n')
  })

  it('should terminate a final line before appending', () => {
    const doc = DotenvDocument.parse('A=1')
    doc.upsert('B', '2')
    expect(doc.emit()).toBe('A=1\nB=2\n')
  })

  it('should append with CRLF in a CRLF document', () => {
    const doc = DotenvDocument.parse('A=1\r\n')
    doc.upsert('B', '2')
    expect(doc.emit()).toBe('A=1\r\nB=2\r\n')
  })

  it('should create a missing section at the end of the file', () => {
    const doc = DotenvDocument.parse('A=1\n')
    doc.upsert('B', '2', { section: 'Prod' })
    expect(doc.emit()).toBe(`A=1\n\n${DIVIDER}\n# [prod]\nB=2\n`)
  })

  it('should append to the end of an existing section', () => {
    const doc = DotenvDocument.parse('# [prod]\nX=1\n\n# [dev]\nY=2\n')
    doc.upsert('Z', '3', { section: 'prod' })
    expect(doc.emit()).toBe('# [prod]\nX=1\nZ=3\n\n# [dev]\nY=2\n')
  })

  it('should reject invalid key names', () => {
    const doc = new DotenvDocument()
    expect(() => doc.upsert('1BAD', 'x')).toThrow(BadInputError)
  })
})

// ---------------------------------------------------------------------------

describe('DotenvDocument.unset', () => {
  it('should remove every occurrence and nothing else', () => {
    const doc = DotenvDocument.parse('# c\nA=1\nB=2\nA=3\n')
    expect(doc.unset('A')).toBe(true)
    expect(doc.emit()).toBe('# c\nB=2\n')
  })

  it('should report no change for an absent key', () => {
    const doc = DotenvDocument.parse('A=1\n')
    expect(doc.unset('B')).toBe(false)
    expect(doc.emit()).toBe('A=1\n')
  })
})

// ---------------------------------------------------------------------------

describe('DotenvDocument.replaceValueAt', () => {
  it('should replace the value and keep spacing and comment', () => {
    const doc = DotenvDocument.parse('# c\nA = 1 # keep\n')
    expect(doc.replaceValueAt(1, 'v2:abc')).toBe(true)
    expect(doc.emit()).toBe('# c\nA = v2:abc # keep\n')
  })

  it('should refuse lines that are not assignments', () => {
    const doc = DotenvDocument.parse('# c\nA=1\n')
    expect(doc.replaceValueAt(0, 'x')).toBe(false)
    expect(doc.replaceValueAt(5, 'x')).toBe(false)
  })
})
