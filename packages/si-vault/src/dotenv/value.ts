/**
 * Value normalisation and canonical rendering for dotenv assignments.
 *
 * @packageDocumentation
 */

import { BadInputError } from '../errors.js'

const KEY_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/

// eslint-disable-next-line no-control-regex
const UNQUOTED_SAFE = /^[^\s"'`\\#$\u0000-\u001f\u007f]+$/

const DOUBLE_QUOTE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  '"': '"',
  $: '$',
}

/** Outcome of parsing a raw value token. */
export type ParsedValue =
  | { ok: true; value: string; quote: 'none' | 'single' | 'double' }
  | { ok: false; reason: string }

/** Whether `key` matches the identifier rule `[A-Za-z_][A-Za-z0-9_]*`. */
export function isValidKeyName(key: string): boolean {
  return KEY_NAME_PATTERN.test(key)
}

/**
 * Reject anything that is not a valid key name. Called before any write.
 *
 * @throws {@link BadInputError} for empty or non-identifier keys.
 */
export function validateKeyName(key: string): void {
  if (key.length === 0) {
    throw new BadInputError('key name is required')
  }
  if (!isValidKeyName(key)) {
    throw new BadInputError(
      `invalid key name ${JSON.stringify(key)}`,
      'key names must match [A-Za-z_][A-Za-z0-9_]*',
    )
  }
}

/**
 * Parse a raw value token (as it appears after `=`, without any trailing
 * comment) into its plain value.
 */
export function parseValue(raw: string): ParsedValue {
  const token = raw.trim()
  if (token.length === 0) {
    return { ok: true, value: '', quote: 'none' }
  }

  const open = token[0]
  if (open === "'") {
    const close = token.indexOf("'", 1)
    if (close < 0) {
      return { ok: false, reason: 'unterminated single quote' }
    }
    if (close !== token.length - 1) {
      return { ok: false, reason: 'unexpected characters after closing quote' }
    }
    return { ok: true, value: token.slice(1, close), quote: 'single' }
  }

  if (open === '"') {
    let out = ''
    for (let i = 1; i < token.length; i++) {
      const ch = token.charAt(i)
      if (ch === '\\' && i + 1 < token.length) {
        const next = token.charAt(i + 1)
        const mapped = DOUBLE_QUOTE_ESCAPES[next]
        // Unknown escapes keep their backslash.
        out += mapped ?? ch + next
        i++
        continue
      }
      if (ch === '"') {
        if (i !== token.length - 1) {
          return { ok: false, reason: 'unexpected characters after closing quote' }
        }
        return { ok: true, value: out, quote: 'double' }
      }
      out += ch
    }
    return { ok: false, reason: 'unterminated double quote' }
  }

  return { ok: true, value: token, quote: 'none' }
}

/**
 * Normalise a raw value token into its plain value.
 *
 * @throws {@link BadInputError} when the token has an unterminated quote.
 */
export function normalizeValue(raw: string): string {
  const parsed = parseValue(raw)
  if (!parsed.ok) {
    throw new BadInputError(`malformed value: ${parsed.reason}`)
  }
  return parsed.value
}

function escapeDoubleQuoted(plain: string): string {
  let out = ''
  for (const ch of plain) {
    switch (ch) {
      case '\\':
        out += '\\\\'
        break
      case '"':
        out += '\\"'
        break
      case '$':
        out += '\\$'
        break
      case '\n':
        out += '\\n'
        break
      case '\r':
        out += '\\r'
        break
      case '\t':
        out += '\\t'
        break
      default:
        out += ch
    }
  }
  return out
}

/**
 * Render a plain value in its canonical form: unquoted when safe, else
 * double-quoted when no escapes are needed, else single-quoted, else
 * double-quoted with escapes.
 */
export function renderValue(plain: string): string {
  if (plain.length === 0 || UNQUOTED_SAFE.test(plain)) {
    return plain
  }
  if (!CONTROL_CHARS.test(plain) && !/["\\$]/.test(plain)) {
    return `"${plain}"`
  }
  if (!CONTROL_CHARS.test(plain) && !plain.includes("'")) {
    return `'${plain}'`
  }
  return `"${escapeDoubleQuoted(plain)}"`
}
