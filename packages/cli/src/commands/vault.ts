/**
 * The `si vault` verb family.
 *
 * Each subcommand is lazy-loaded via dynamic import(); only the requested
 * subcommand's module is evaluated. Errors from any subcommand are mapped
 * here onto one stderr message (plus hint) and an exit code: `2` for misuse,
 * `1` for operational failures.
 *
 * @internal
 */

import type { CliRuntime } from '../context.js'
import { exitCodeFor, formatError, writeJson } from '../output.js'
import type { VaultSubcommand } from './vault/shared.js'

const SUBCOMMANDS: Record<string, () => Promise<VaultSubcommand>> = {
  init: async () => (await import('./vault/init.js')).initCommand,
  status: async () => (await import('./vault/status.js')).statusCommand,
  keygen: async () => (await import('./vault/keygen.js')).keygenCommand,
  set: async () => (await import('./vault/set.js')).setCommand,
  get: async () => (await import('./vault/get.js')).getCommand,
  unset: async () => (await import('./vault/unset.js')).unsetCommand,
  dump: async () => (await import('./vault/dump.js')).dumpCommand,
  encrypt: async () => (await import('./vault/encrypt.js')).encryptCommand,
  decrypt: async () => (await import('./vault/decrypt.js')).decryptCommand,
  fmt: async () => (await import('./vault/fmt.js')).fmtCommand,
  trust: async () => (await import('./vault/trust.js')).trustCommand,
  recipients: async () => (await import('./vault/recipients.js')).recipientsCommand,
  check: async () => (await import('./vault/check.js')).checkCommand,
  run: async () => (await import('./vault/run.js')).runCommand,
  hydrate: async () => (await import('./vault/hydrate.js')).hydrateCommand,
  sync: async () => (await import('./vault/sync.js')).syncCommand,
}

export function printVaultHelp(): void {
  process.stdout.write(
    'Usage: si vault <command> [options]\n\n' +
      'Commands:\n' +
      '  init                     Create the vault file and register trust\n' +
      '  status                   Show file, identity and trust state\n' +
      '  keygen [--rotate]        Create (or rotate) the vault identity\n' +
      '  set KEY VALUE [--stdin]  Set a value, encrypting it\n' +
      '  get KEY [--reveal]       Show whether a value is encrypted, or reveal it\n' +
      '  unset KEY                Remove a key\n' +
      '  dump [--reveal]          List keys, or print decrypted K=V lines\n' +
      '  encrypt [--reencrypt]    Encrypt plaintext values in place\n' +
      '  decrypt --stdout|--yes   Print or write back decrypted values\n' +
      '  fmt [--all] [--check]    Normalise quoting and whitespace\n' +
      '  trust status|accept|forget\n' +
      '                           Inspect or update the recorded recipient\n' +
      '  recipients list|add|remove [AGE1...]\n' +
      '                           Manage the recipients values are encrypted to\n' +
      '  check [--staged] [--all] Fail when dotenv files hold plaintext values\n' +
      '  run -- CMD ARGS          Run a command with decrypted values in its env\n' +
      '  hydrate                  Load the sun identity into this process\n' +
      '  sync push                Back up the vault to the sync backend\n\n' +
      'Common options: --scope <name>, --file <path>, --json, --force\n',
  )
}

export async function vaultCommand(args: string[], runtime: CliRuntime = {}): Promise<number> {
  const [subcommand, ...rest] = args
  if (subcommand === undefined || subcommand === '--help' || subcommand === '-h') {
    printVaultHelp()
    return 0
  }

  const load = SUBCOMMANDS[subcommand]
  if (load === undefined) {
    process.stderr.write(`Unknown vault command: ${subcommand}\n`)
    printVaultHelp()
    return 2
  }

  try {
    const run = await load()
    return await run(rest, runtime)
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    if (rest.includes('--json')) {
      writeJson({ ok: false, command: `vault ${subcommand}`, error: errorPayload(err) })
    }
    return exitCodeFor(err)
  }
}

function errorPayload(err: unknown): Record<string, unknown> {
  if (!(err instanceof Error)) {
    return { message: String(err) }
  }
  return {
    name: err.name,
    kind: 'kind' in err && typeof err.kind === 'string' ? err.kind : undefined,
    message: err.message,
    hint: 'hint' in err && typeof err.hint === 'string' ? err.hint : undefined,
  }
}
