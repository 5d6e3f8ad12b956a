import { isValidKeyName } from './value.js'

/**
 * Layout-preserving decomposition of one `KEY=value # comment` line.
 *
 * @internal
 */
export interface Assignment {
  /** Whitespace before the key (or before `export`). */
  leading: string
  /** Whether the line starts with `export `. */
  exported: boolean
  /** Everything left of the first `=`, verbatim. */
  left: string
  key: string
  /** Value token including quotes and surrounding whitespace. */
  valueRaw: string
  /** Whitespace between `=` and the value token. */
  valueLeading: string
  /** Trailing comment including the whitespace before `#`, or `''`. */
  comment: string
}

function isBlank(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t'
}

function leadingWhitespace(s: string): string {
  let i = 0
  while (i < s.length && isBlank(s[i])) {
    i++
  }
  return s.slice(0, i)
}

function commentAfterQuote(right: string, close: number): [string, string] {
  const rest = right.slice(close + 1)
  const ws = leadingWhitespace(rest)
  if (rest.charAt(ws.length) === '#') {
    return [right.slice(0, close + 1), rest]
  }
  return [right, '']
}

/**
 * Split the text right of `=` into the value token and its trailing comment.
 * Inside single quotes `#` is literal; in unquoted values a comment starts at
 * a `#` preceded by whitespace.
 *
 * @internal
 */
export function splitValueAndComment(right: string): [value: string, comment: string] {
  if (right.length === 0) {
    return ['', '']
  }
  const start = leadingWhitespace(right).length
  if (start >= right.length) {
    return [right, '']
  }

  const first = right.charAt(start)
  if (first === '#') {
    return ['', right]
  }

  if (first === "'") {
    const close = right.indexOf("'", start + 1)
    return close < 0 ? [right, ''] : commentAfterQuote(right, close)
  }

  if (first === '"') {
    let escaped = false
    for (let i = start + 1; i < right.length; i++) {
      const ch = right.charAt(i)
      if (escaped) {
        escaped = false
        continue
      }
      if (ch === '\\') {
        escaped = true
        continue
      }
      if (ch === '"') {
        return commentAfterQuote(right, i)
      }
    }
    return [right, '']
  }

  for (let i = start + 1; i < right.length; i++) {
    if (right.charAt(i) === '#' && isBlank(right[i - 1])) {
      let cstart = i - 1
      while (cstart > start && isBlank(right[cstart - 1])) {
        cstart--
      }
      return [right.slice(0, cstart), right.slice(cstart)]
    }
  }
  return [right, '']
}

/**
 * Parse a line as an assignment. Returns `undefined` for blanks, comments and
 * lines whose left side is not a valid key.
 *
 * @internal
 */
export function parseAssignment(line: string): Assignment | undefined {
  if (line.trim().length === 0) {
    return undefined
  }
  if (line.trimStart().startsWith('#')) {
    return undefined
  }
  const eq = line.indexOf('=')
  if (eq < 0) {
    return undefined
  }
  const left = line.slice(0, eq)
  const right = line.slice(eq + 1)

  let keyPart = left.trim()
  let exported = false
  if (/^export[ \t]/.test(keyPart)) {
    exported = true
    keyPart = keyPart.slice('export'.length).trim()
  }
  if (!isValidKeyName(keyPart)) {
    return undefined
  }

  const [valueRaw, comment] = splitValueAndComment(right)
  return {
    leading: leadingWhitespace(left),
    exported,
    left,
    key: keyPart,
    valueRaw,
    valueLeading: leadingWhitespace(valueRaw),
    comment,
  }
}

/**
 * Render a fresh assignment line.
 *
 * @internal
 */
export function renderAssignment(
  key: string,
  value: string,
  options?: { leading?: string; exported?: boolean; comment?: string },
): string {
  const prefix = options?.exported === true ? 'export ' : ''
  return `${options?.leading ?? ''}${prefix}${key}=${value.trim()}${options?.comment ?? ''}`
}

/**
 * Re-render an existing assignment with a new value, keeping the key side,
 * the spacing after `=` and the trailing comment as authored.
 *
 * @internal
 */
export function renderPreservingLayout(existing: Assignment, value: string, comment?: string): string {
  return `${existing.left}=${existing.valueLeading}${value.trim()}${comment ?? existing.comment}`
}
