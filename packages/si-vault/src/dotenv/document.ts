/**
 * Line-preserving dotenv document model.
 *
 * @remarks
 * A document is an ordered list of raw lines, each carrying its own line
 * ending. `emit()` writes the lines back exactly as read, so
 * `DotenvDocument.parse(text).emit() === text` holds for every input. Only
 * assignment lines are ever rewritten in place; comments and blank lines
 * keep their position.
 *
 * @packageDocumentation
 */

import { isEncrypted } from '../cipher/encoding.js'
import { parseAssignment, renderAssignment, renderPreservingLayout } from './assignment.js'
import type { Assignment } from './assignment.js'
import { parseValue, validateKeyName } from './value.js'

/** Line terminator; `''` only for a final line without newline. */
export type LineEnding = '\n' | '\r\n' | ''

/** One physical line of a dotenv file. */
export interface RawLine {
  text: string
  nl: LineEnding
}

/** A well-formed `KEY=value` line. */
export interface AssignmentEntry {
  kind: 'assignment'
  /** Zero-based line index. */
  line: number
  key: string
  /** Value token as written, quotes included, trimmed. */
  rawValue: string
  /** Plain value after quote and escape processing. */
  value: string
  encrypted: boolean
  /** Trailing comment as written, or `''`. */
  comment: string
  exported: boolean
}

/** A non-blank, non-comment line that does not parse as an assignment. */
export interface MalformedEntry {
  kind: 'malformed'
  line: number
  text: string
  reason: string
}

/** Derived view of one meaningful line. */
export type DotenvEntry = AssignmentEntry | MalformedEntry

/** Options for {@link DotenvDocument.upsert}. */
export interface UpsertOptions {
  /** Trailing comment (with its leading whitespace) for the line. */
  comment?: string | undefined
  /** Append new keys at the end of this `# [section]` block. */
  section?: string | undefined
}

const DIVIDER_LINE = '# ' + '-'.repeat(78)

function commentBody(text: string): string | undefined {
  const trimmed = text.trim()
  if (!trimmed.startsWith('#')) {
    return undefined
  }
  return trimmed.slice(1).trim()
}

/** Whether a line is a `# ----------` divider. */
export function isDividerLine(text: string): boolean {
  const body = commentBody(text)
  return body !== undefined && body.length >= 10 && /^-+$/.test(body)
}

/** Section name of a `# [name]` line, lower-cased. */
export function sectionName(text: string): string | undefined {
  const body = commentBody(text)
  if (body?.startsWith('[') !== true || !body.endsWith(']')) {
    return undefined
  }
  const inner = body.slice(1, -1).trim().toLowerCase()
  return inner.length > 0 ? inner : undefined
}

function splitLines(text: string): RawLine[] {
  const lines: RawLine[] = []
  let start = 0
  while (start < text.length) {
    const idx = text.indexOf('\n', start)
    if (idx < 0) {
      lines.push({ text: text.slice(start), nl: '' })
      break
    }
    let line = text.slice(start, idx)
    let nl: LineEnding = '\n'
    if (line.endsWith('\r')) {
      line = line.slice(0, -1)
      nl = '\r\n'
    }
    lines.push({ text: line, nl })
    start = idx + 1
  }
  return lines
}

/**
 * Ordered dotenv lines plus the line ending used for appended lines.
 *
 * @public
 */
export class DotenvDocument {
  lines: RawLine[]
  defaultNewline: '\n' | '\r\n'

  constructor(lines: RawLine[] = [], defaultNewline: '\n' | '\r\n' = '\n') {
    this.lines = lines
    this.defaultNewline = defaultNewline
  }

  /** Parse file contents. Never fails; malformed lines are kept verbatim. */
  static parse(text: string): DotenvDocument {
    const lines = splitLines(text)
    const firstEnding = lines.find((l) => l.nl !== '')?.nl
    return new DotenvDocument(lines, firstEnding === '\r\n' ? '\r\n' : '\n')
  }

  /** Serialise the document, byte-for-byte for untouched lines. */
  emit(): string {
    return this.lines.map((l) => l.text + l.nl).join('')
  }

  clone(): DotenvDocument {
    return new DotenvDocument(
      this.lines.map((l) => ({ ...l })),
      this.defaultNewline,
    )
  }

  /** Raw value token of the last assignment of `key`, or `undefined`. */
  lookup(key: string): string | undefined {
    const found = this.#lastAssignment(key.trim())
    return found?.assignment.valueRaw.trim()
  }

  /**
   * Every assignment and malformed line, in file order. Blank lines and
   * comments are omitted.
   */
  entries(): DotenvEntry[] {
    const out: DotenvEntry[] = []
    this.lines.forEach((line, index) => {
      const trimmed = line.text.trim()
      if (trimmed.length === 0 || trimmed.startsWith('#')) {
        return
      }
      const assignment = parseAssignment(line.text)
      if (assignment === undefined) {
        out.push({ kind: 'malformed', line: index, text: line.text, reason: 'not a KEY=value line' })
        return
      }
      const parsed = parseValue(assignment.valueRaw)
      if (!parsed.ok) {
        out.push({ kind: 'malformed', line: index, text: line.text, reason: parsed.reason })
        return
      }
      out.push({
        kind: 'assignment',
        line: index,
        key: assignment.key,
        rawValue: assignment.valueRaw.trim(),
        value: parsed.value,
        encrypted: isEncrypted(parsed.value),
        comment: assignment.comment,
        exported: assignment.exported,
      })
    })
    return out
  }

  /**
   * Effective assignment per key (dotenv last-wins), in order of each key's
   * final occurrence.
   */
  effectiveEntries(): AssignmentEntry[] {
    const byKey = new Map<string, AssignmentEntry>()
    for (const entry of this.entries()) {
      if (entry.kind === 'assignment') {
        byKey.delete(entry.key)
        byKey.set(entry.key, entry)
      }
    }
    return [...byKey.values()]
  }

  /**
   * Set `key` to an already-rendered value. An existing key is rewritten in
   * place (its last occurrence); a new key is appended.
   *
   * @returns whether the document changed.
   */
  upsert(key: string, renderedValue: string, options?: UpsertOptions): boolean {
    validateKeyName(key)
    const existing = this.#lastAssignment(key)
    if (existing !== undefined) {
      const text = renderPreservingLayout(existing.assignment, renderedValue, options?.comment)
      const line = this.lines[existing.index]
      if (line === undefined || line.text === text) {
        return false
      }
      line.text = text
      return true
    }

    const text = renderAssignment(key, renderedValue, { comment: options?.comment ?? '' })
    const section = options?.section?.trim().toLowerCase()
    if (section !== undefined && section.length > 0) {
      this.#insertInSection(section, text)
      return true
    }
    this.#ensureAppendable()
    this.lines.push({ text, nl: this.defaultNewline })
    return true
  }

  /**
   * Remove every assignment of `key`, leaving surrounding lines untouched.
   *
   * @returns whether the document changed.
   */
  unset(key: string): boolean {
    validateKeyName(key)
    const before = this.lines.length
    this.lines = this.lines.filter((line) => parseAssignment(line.text)?.key !== key)
    return this.lines.length !== before
  }

  /**
   * Replace the value of the assignment on line `index`, keeping its layout.
   *
   * @returns whether the line changed; `false` also when the line is not an
   * assignment.
   */
  replaceValueAt(index: number, renderedValue: string): boolean {
    const line = this.lines[index]
    const assignment = line === undefined ? undefined : parseAssignment(line.text)
    if (line === undefined || assignment === undefined) {
      return false
    }
    const text = renderPreservingLayout(assignment, renderedValue)
    if (text === line.text) {
      return false
    }
    line.text = text
    return true
  }

  /** Give the last line a terminator so another line can follow it. */
  ensureLineEnding(index: number): void {
    const line = this.lines[index]
    if (line?.nl === '') {
      line.nl = this.defaultNewline
    }
  }

  #ensureAppendable(): void {
    this.ensureLineEnding(this.lines.length - 1)
  }

  #lastAssignment(key: string): { index: number; assignment: Assignment } | undefined {
    let found: { index: number; assignment: Assignment } | undefined
    this.lines.forEach((line, index) => {
      const assignment = parseAssignment(line.text)
      if (assignment?.key === key) {
        found = { index, assignment }
      }
    })
    return found
  }

  #insertInSection(section: string, text: string): void {
    const start = this.lines.findIndex((l) => sectionName(l.text) === section)
    if (start < 0) {
      this.#ensureAppendable()
      const last = this.lines.at(-1)
      if (last !== undefined && last.text.trim().length > 0) {
        this.lines.push({ text: '', nl: this.defaultNewline })
      }
      this.lines.push(
        { text: DIVIDER_LINE, nl: this.defaultNewline },
        { text: `# [${section}]`, nl: this.defaultNewline },
        { text, nl: this.defaultNewline },
      )
      return
    }

    let end = this.lines.length
    for (let i = start + 1; i < this.lines.length; i++) {
      const line = this.lines[i]
      if (line !== undefined && sectionName(line.text) !== undefined) {
        end = i
        // A divider right above the next section header belongs to it.
        let j = i - 1
        while (j > start && this.lines[j]?.text.trim() === '') {
          j--
        }
        if (j > start && isDividerLine(this.lines[j]?.text ?? '')) {
          end = j
        }
        break
      }
    }

    let insertAt = end
    while (insertAt > start + 1 && this.lines[insertAt - 1]?.text.trim() === '') {
      insertAt--
    }
    this.ensureLineEnding(insertAt - 1)
    this.lines.splice(insertAt, 0, { text, nl: this.defaultNewline })
  }
}
