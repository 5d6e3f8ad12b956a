import { parseArgs } from 'node:util'
import { BadInputError } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { TARGET_FLAGS, report, targetOptions } from './shared.js'

/**
 * `si vault get KEY [--reveal]`. Prints `encrypted` or `plaintext`; with
 * `--reveal`, the value itself followed by one newline.
 */
export async function getCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: { ...TARGET_FLAGS, reveal: { type: 'boolean', default: false } },
    allowPositionals: true,
    strict: true,
  })
  const [key, ...extra] = positionals
  if (key === undefined || extra.length > 0) {
    throw new BadInputError('usage: si vault get <KEY> [--reveal] [--scope <name>] [--file <path>]')
  }

  const { vault, ctx } = await openVault(runtime)
  const result = await vault.get(key, { ...targetOptions(values), reveal: values.reveal })

  report(
    { json: values.json, command: 'vault get', ctx, target: result.target },
    { key: result.key, encrypted: result.encrypted, value: result.value },
    () => {
      if (result.value !== undefined) {
        process.stdout.write(`${result.value}\n`)
        return
      }
      process.stdout.write(`${result.encrypted ? 'encrypted' : 'plaintext'}\n`)
    },
  )
  return 0
}
