import { parseAssignment, renderAssignment } from './assignment.js'
import { DotenvDocument, isDividerLine, sectionName } from './document.js'
import type { RawLine } from './document.js'
import { HEADER_VERSION_LINE, RECIPIENT_LINE_PREFIX, isHeaderLine, readRecipients } from './header.js'
import { parseValue, renderValue } from './value.js'

/** Options for {@link formatDocument}. */
export interface FormatOptions {
  /** Sort keys inside each contiguous run of assignments. */
  sort?: boolean | undefined
}

/** Result of {@link formatDocument}. */
export interface FormatResult {
  document: DotenvDocument
  changed: boolean
}

function normalizeCommentLine(text: string): string {
  const body = text.trim().slice(1).trim()
  return body.length === 0 ? '#' : `# ${body}`
}

function normalizeInlineComment(comment: string): string {
  const body = comment.trim().replace(/^#/, '').trim()
  return body.length === 0 ? '' : ` # ${body}`
}

function canonicalValue(valueRaw: string): string {
  const parsed = parseValue(valueRaw)
  // Values that do not parse are kept as written.
  return parsed.ok ? renderValue(parsed.value) : valueRaw.trim()
}

function sortAssignmentRuns(lines: RawLine[]): void {
  let i = 0
  while (i < lines.length) {
    if (parseAssignment(lines[i]?.text ?? '') === undefined) {
      i++
      continue
    }
    let j = i
    while (j < lines.length && parseAssignment(lines[j]?.text ?? '') !== undefined) {
      j++
    }
    const run = lines.slice(i, j)
    // Stable sort keeps duplicate keys in their last-wins order.
    run.sort((a, b) => {
      const ka = parseAssignment(a.text)?.key ?? ''
      const kb = parseAssignment(b.text)?.key ?? ''
      return ka < kb ? -1 : ka > kb ? 1 : 0
    })
    lines.splice(i, run.length, ...run)
    i = j
  }
}

/**
 * Produce the canonical form of a vault document.
 *
 * @remarks
 * The header (when present) moves to the top in canonical form, followed by
 * one blank line. Runs of blank lines collapse to one, comment and
 * inline-comment spacing is normalised, values are re-rendered with
 * canonical quoting and the file ends with a newline. Section markers and
 * dividers are kept as written. Ciphertext values are never re-encoded.
 */
export function formatDocument(input: DotenvDocument, options?: FormatOptions): FormatResult {
  const nl = input.defaultNewline
  const out: RawLine[] = []
  const lastText = (): string | undefined => out.at(-1)?.text
  const pushBlankSeparator = (): void => {
    const last = lastText()
    if (last !== undefined && last.trim().length > 0) {
      out.push({ text: '', nl })
    }
  }

  const recipients = readRecipients(input)
  const headed = input.lines.some((l) => isHeaderLine(l.text))
  if (headed) {
    out.push({ text: HEADER_VERSION_LINE, nl })
    for (const recipient of recipients) {
      out.push({ text: RECIPIENT_LINE_PREFIX + recipient, nl })
    }
    out.push({ text: '', nl })
  }

  let pendingBlank = false
  for (const line of input.lines) {
    const text = line.text
    const trimmed = text.trim()
    if (trimmed.length === 0) {
      pendingBlank = true
      continue
    }
    if (isHeaderLine(text)) {
      continue
    }

    if (sectionName(text) !== undefined) {
      const last = lastText()
      if (last !== undefined && !isDividerLine(last)) {
        pushBlankSeparator()
      }
      out.push({ text: text.trimEnd(), nl })
      pendingBlank = false
      continue
    }

    if (pendingBlank) {
      pushBlankSeparator()
      pendingBlank = false
    }

    if (isDividerLine(text)) {
      out.push({ text: text.trimEnd(), nl })
      continue
    }

    const assignment = parseAssignment(text)
    if (assignment !== undefined) {
      out.push({
        text: renderAssignment(assignment.key, canonicalValue(assignment.valueRaw), {
          exported: assignment.exported,
          comment: normalizeInlineComment(assignment.comment),
        }),
        nl,
      })
      continue
    }
    if (trimmed.startsWith('#')) {
      out.push({ text: normalizeCommentLine(text), nl })
      continue
    }
    out.push({ text: text.trimEnd(), nl })
  }

  if (options?.sort === true) {
    sortAssignmentRuns(out)
  }

  const document = new DotenvDocument(out, nl)
  return { document, changed: document.emit() !== input.emit() }
}
