/**
 * Per-invocation wiring between the CLI and the vault library: terminal
 * detection, the stderr logger, the confirmation prompt and settings
 * failures.
 *
 * @internal
 */

import { SettingsError, Vault, VaultError, createContext } from 'si-vault'
import type { MutableEnv, SunObjectClient, VaultContext, VaultLogger } from 'si-vault'
import { promptConfirm } from './confirm.js'

/** Process-level inputs, overridable for tests. */
export interface CliRuntime {
  env?: MutableEnv | undefined
  cwd?: string | undefined
  homeDir?: string | undefined
  interactive?: boolean | undefined
  confirm?: ((question: string) => Promise<boolean>) | undefined
  /** Source of `set --stdin` values. */
  stdin?: AsyncIterable<unknown> | undefined
  sun?: SunObjectClient | undefined
}

/** Diagnostics on stderr; results stay on stdout. */
export const stderrLogger: VaultLogger = {
  warn: (message) => {
    process.stderr.write(`warning: ${message}\n`)
  },
  info: (message) => {
    process.stderr.write(`${message}\n`)
  },
}

function isInteractive(): boolean {
  return (process.stdin.isTTY ?? false) && (process.stdout.isTTY ?? false)
}

/**
 * Load settings and open the vault for one command.
 *
 * @throws {@link VaultError} `vault settings load failed: …` when a settings
 * module cannot be parsed.
 */
export async function openVault(runtime: CliRuntime): Promise<{ vault: Vault; ctx: VaultContext }> {
  let ctx: VaultContext
  try {
    ctx = await createContext({
      env: runtime.env,
      cwd: runtime.cwd,
      homeDir: runtime.homeDir,
      interactive: runtime.interactive ?? isInteractive(),
      confirm: runtime.confirm ?? promptConfirm,
      log: stderrLogger,
      sun: runtime.sun,
    })
  } catch (err) {
    if (err instanceof SettingsError) {
      throw new VaultError(`vault settings load failed: ${err.message}`, { kind: 'settings', cause: err })
    }
    throw err
  }
  return { vault: new Vault(ctx), ctx }
}

/** Read all of `source` as UTF-8 text. */
export async function readAllText(source: AsyncIterable<unknown>): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of source) {
    if (chunk instanceof Buffer) {
      chunks.push(chunk)
    } else if (typeof chunk === 'string') {
      chunks.push(Buffer.from(chunk))
    } else {
      chunks.push(Buffer.from(String(chunk)))
    }
  }
  return Buffer.concat(chunks).toString('utf8')
}
