import { parseArgs } from 'node:util'
import { describeTarget } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { FORCE_FLAG, TARGET_FLAGS, report, targetOptions } from './shared.js'

/**
 * `si vault decrypt [--stdout | --yes] [KEY...]`. `--stdout` prints the
 * decrypted document; `--yes` writes it back, asking first on a terminal.
 */
export async function decryptCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...TARGET_FLAGS,
      ...FORCE_FLAG,
      stdout: { type: 'boolean', default: false },
      yes: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.decrypt({
    ...targetOptions(values),
    force: values.force,
    stdout: values.stdout,
    yes: values.yes,
    keys: positionals,
  })

  if (result.document !== undefined && !values.json) {
    process.stdout.write(result.document)
    return 0
  }
  report(
    { json: values.json, command: 'vault decrypt', ctx, target: result.target },
    { decrypted: result.decrypted, written: result.written, document: result.document },
    () => {
      printFields([
        ['file', describeTarget(result.target)],
        ['decrypted', String(result.decrypted.length)],
      ])
    },
  )
  return 0
}
