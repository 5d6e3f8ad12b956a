/**
 * Flags and result reporting shared by the `si vault` subcommands.
 *
 * @internal
 */

import { describeTarget } from 'si-vault'
import type { Target, TargetOptions, VaultContext } from 'si-vault'
import { writeJson } from '../../output.js'
import type { CliRuntime } from '../../context.js'

/** A `si vault` subcommand: parsed args in, exit code out. */
export type VaultSubcommand = (args: string[], runtime: CliRuntime) => Promise<number>

/** `--scope`, `--file` and `--json`, accepted by every file command. */
export const TARGET_FLAGS = {
  scope: { type: 'string' },
  file: { type: 'string' },
  json: { type: 'boolean', default: false },
} as const

/** `--force`: proceed despite a changed recipient. */
export const FORCE_FLAG = {
  force: { type: 'boolean', default: false },
} as const

export function targetOptions(values: { scope?: string | undefined; file?: string | undefined }): TargetOptions {
  return { scope: values.scope, file: values.file }
}

/** The `context` block of a JSON payload. */
export function targetContext(target: Target): Record<string, unknown> {
  return {
    scope: target.scope,
    backend: target.backend,
    location: describeTarget(target),
  }
}

/**
 * Write a success payload `{ok, command, context, mode, …}` in JSON mode,
 * or run the human printer.
 */
export function report(
  options: { json: boolean | undefined; command: string; ctx: VaultContext; target?: Target | undefined },
  payload: Record<string, unknown>,
  human: () => void,
): void {
  if (options.json !== true) {
    human()
    return
  }
  writeJson({
    ok: true,
    command: options.command,
    context: options.target === undefined ? undefined : targetContext(options.target),
    mode: options.ctx.settings.vault.syncBackend,
    ...payload,
  })
}

/** `1 value` / `2 values`. */
export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}
