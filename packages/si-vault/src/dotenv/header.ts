/**
 * Reserved `# si-vault:` metadata lines at the top of a vault file.
 *
 * @remarks
 * The header is a version line followed by the recipient line:
 *
 * ```
 * # si-vault:version 1
 * # si-vault:recipient age1...
 * ```
 *
 * The older `# si-vault:v1` and `# si-vault:v2` version lines are recognised
 * on read and left untouched unless the file is formatted.
 *
 * @packageDocumentation
 */

import type { DotenvDocument, RawLine } from './document.js'

/** Canonical version line written by `init` and `fmt`. */
export const HEADER_VERSION_LINE = '# si-vault:version 1'

/** Prefix of the recipient line. */
export const RECIPIENT_LINE_PREFIX = '# si-vault:recipient '

const METADATA_PREFIX = 'si-vault:'

function metadataBody(text: string): string | undefined {
  const trimmed = text.trim()
  if (!trimmed.startsWith('#')) {
    return undefined
  }
  const body = trimmed.slice(1).trim()
  return body.startsWith(METADATA_PREFIX) ? body : undefined
}

/** Whether the line is a current or legacy version line. */
export function isVersionLine(text: string): boolean {
  const body = metadataBody(text)
  return body !== undefined && /^si-vault:(?:version\s+\d+|v\d+)$/.test(body)
}

/** Recipient declared by a `# si-vault:recipient` line. */
export function parseRecipientLine(text: string): string | undefined {
  const body = metadataBody(text)
  if (body?.startsWith('si-vault:recipient') !== true) {
    return undefined
  }
  const rest = body.slice('si-vault:recipient'.length).trim()
  return rest.length > 0 ? rest : undefined
}

/** Whether the line is reserved vault metadata. */
export function isHeaderLine(text: string): boolean {
  return isVersionLine(text) || parseRecipientLine(text) !== undefined
}

/** Recipients declared anywhere in the document, in order, de-duplicated. */
export function readRecipients(doc: DotenvDocument): string[] {
  const seen = new Set<string>()
  for (const line of doc.lines) {
    const recipient = parseRecipientLine(line.text)
    if (recipient !== undefined) {
      seen.add(recipient)
    }
  }
  return [...seen]
}

/** The document's recipient (the first declared), if any. */
export function documentRecipient(doc: DotenvDocument): string | undefined {
  return readRecipients(doc)[0]
}

/** Whether the document carries a version or recipient line. */
export function hasHeader(doc: DotenvDocument): boolean {
  return doc.lines.some((l) => isHeaderLine(l.text))
}

function headerBlockEnd(lines: readonly RawLine[]): number {
  let end = 0
  while (end < lines.length && isHeaderLine(lines[end]?.text ?? '')) {
    end++
  }
  return end
}

/**
 * Stamp the header for `recipient` unless the document already declares a
 * recipient. A document without header gets the version line, the
 * recipient line and one blank separator line prepended.
 *
 * @returns whether the document changed.
 */
export function ensureHeader(doc: DotenvDocument, recipient: string): boolean {
  const nl = doc.defaultNewline
  if (documentRecipient(doc) !== undefined) {
    return false
  }

  const blockEnd = headerBlockEnd(doc.lines)
  if (blockEnd > 0) {
    // Version line present without recipient.
    doc.ensureLineEnding(blockEnd - 1)
    doc.lines.splice(blockEnd, 0, { text: RECIPIENT_LINE_PREFIX + recipient, nl })
    const next = doc.lines[blockEnd + 1]
    if (next === undefined) {
      doc.lines.push({ text: '', nl })
    } else if (next.text.trim().length > 0) {
      doc.lines.splice(blockEnd + 1, 0, { text: '', nl })
    }
    return true
  }

  doc.lines.unshift(
    { text: HEADER_VERSION_LINE, nl },
    { text: RECIPIENT_LINE_PREFIX + recipient, nl },
    { text: '', nl },
  )
  return true
}

/**
 * Point the header at `recipient`: the first recipient line is rewritten and
 * any further recipient lines are dropped. Adds a header when missing.
 *
 * @returns whether the document changed.
 */
export function replaceRecipient(doc: DotenvDocument, recipient: string): boolean {
  const first = doc.lines.findIndex((l) => parseRecipientLine(l.text) !== undefined)
  if (first < 0) {
    return ensureHeader(doc, recipient)
  }
  const before = doc.emit()
  const text = RECIPIENT_LINE_PREFIX + recipient
  doc.lines = doc.lines.filter(
    (line, index) => index === first || parseRecipientLine(line.text) === undefined,
  )
  const line = doc.lines[first]
  if (line !== undefined) {
    line.text = text
  }
  return doc.emit() !== before
}

/**
 * Declare `recipient` after the last recipient line, or stamp a header when
 * the document has none.
 *
 * @returns whether the document changed.
 */
export function addRecipient(doc: DotenvDocument, recipient: string): boolean {
  if (readRecipients(doc).includes(recipient)) {
    return false
  }
  let last = -1
  doc.lines.forEach((line, index) => {
    if (parseRecipientLine(line.text) !== undefined) {
      last = index
    }
  })
  if (last < 0) {
    return ensureHeader(doc, recipient)
  }
  doc.ensureLineEnding(last)
  doc.lines.splice(last + 1, 0, { text: RECIPIENT_LINE_PREFIX + recipient, nl: doc.defaultNewline })
  return true
}

/**
 * Drop every line declaring `recipient`.
 *
 * @returns whether the document changed.
 */
export function removeRecipient(doc: DotenvDocument, recipient: string): boolean {
  const before = doc.lines.length
  doc.lines = doc.lines.filter((line) => parseRecipientLine(line.text) !== recipient)
  return doc.lines.length !== before
}

/**
 * The declared recipient set as one trust-store subject: recipients joined
 * with `,` in header order. A single-recipient vault's subject is its
 * recipient.
 */
export function trustSubject(doc: DotenvDocument): string | undefined {
  const recipients = readRecipients(doc)
  return recipients.length > 0 ? recipients.join(',') : undefined
}
