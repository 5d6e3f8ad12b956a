import { parseArgs } from 'node:util'
import { BadInputError, describeTarget } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { FORCE_FLAG, TARGET_FLAGS, report, targetOptions } from './shared.js'

/** `si vault unset KEY` */
export async function unsetCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: { ...TARGET_FLAGS, ...FORCE_FLAG },
    allowPositionals: true,
    strict: true,
  })
  const [key, ...extra] = positionals
  if (key === undefined || extra.length > 0) {
    throw new BadInputError('usage: si vault unset <KEY> [--scope <name>] [--file <path>]')
  }

  const { vault, ctx } = await openVault(runtime)
  const result = await vault.unset(key, { ...targetOptions(values), force: values.force })

  report(
    { json: values.json, command: 'vault unset', ctx, target: result.target },
    { key: result.key, removed: result.removed },
    () => {
      printFields([
        ['file', describeTarget(result.target)],
        [result.removed ? 'unset' : 'not set', result.key],
      ])
    },
  )
  return 0
}
