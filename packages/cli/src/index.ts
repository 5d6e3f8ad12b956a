/**
 * Programmatic entry to the `si` CLI commands.
 *
 * @packageDocumentation
 */

export { vaultCommand, printVaultHelp } from './commands/vault.js'
export { openVault, stderrLogger } from './context.js'
export type { CliRuntime } from './context.js'
export { RedactingStream, MIN_REDACT_LENGTH } from './redact.js'
export { exitCodeFor, formatError } from './output.js'
export { PROVIDER_VERBS } from './verbs.js'
