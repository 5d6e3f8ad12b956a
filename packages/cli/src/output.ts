/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import { BadInputError, VaultError } from 'si-vault'

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Wrap text in ANSI dim if stdout is a TTY. */
export function dim(text: string): string {
  return isTTY() ? `\x1b[2m${text}\x1b[22m` : text
}

/** Format an error for display on stderr, with its remediation hint. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    const message = `${err.name}: ${err.message}`
    if (err instanceof VaultError && err.hint !== undefined) {
      return `${message}\nhint: ${err.hint}`
    }
    return message
  }
  return String(err)
}

/** `2` for misuse, `1` for every other failure. */
export function exitCodeFor(err: unknown): number {
  return err instanceof BadInputError || isParseArgsError(err) ? 2 : 1
}

/** Errors thrown by `util.parseArgs` for unknown or malformed flags. */
export function isParseArgsError(err: unknown): err is TypeError {
  return (
    err instanceof TypeError &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('ERR_PARSE_ARGS')
  )
}

/**
 * Print aligned `label: value` lines to stdout.
 *
 * @example
 * ```
 * file:      /srv/app/.env
 * recipient: age1...
 * ```
 */
export function printFields(fields: [label: string, value: string][]): void {
  const width = Math.max(0, ...fields.map(([label]) => label.length + 1))
  for (const [label, value] of fields) {
    process.stdout.write(`${bold(`${label}:`.padEnd(width))} ${value}\n`)
  }
}

/** Write one JSON document to stdout. */
export function writeJson(payload: Record<string, unknown>): void {
  process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
}
