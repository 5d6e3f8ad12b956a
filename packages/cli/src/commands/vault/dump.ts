import { parseArgs } from 'node:util'
import { renderValue } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { dim } from '../../output.js'
import { TARGET_FLAGS, report, targetOptions } from './shared.js'

/** `si vault dump [--reveal]`: list keys, or print `K=V` lines when revealed. */
export async function dumpCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({
    args,
    options: { ...TARGET_FLAGS, reveal: { type: 'boolean', default: false } },
    strict: true,
  })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.dump({ ...targetOptions(values), reveal: values.reveal })

  report(
    { json: values.json, command: 'vault dump', ctx, target: result.target },
    { entries: result.entries, decrypted_count: result.decryptedCount },
    () => {
      for (const entry of result.entries) {
        if (entry.value !== undefined) {
          process.stdout.write(`${entry.key}=${renderValue(entry.value)}\n`)
        } else {
          process.stdout.write(`${entry.key}\t${dim(`(${entry.encrypted ? 'encrypted' : 'plaintext'}; use --reveal)`)}\n`)
        }
      }
    },
  )
  return 0
}
