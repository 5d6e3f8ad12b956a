import { parseArgs } from 'node:util'
import { BadInputError, describeTarget } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { TARGET_FLAGS, report, targetOptions } from './shared.js'

/** `si vault sync push`: explicit backup to the configured sync backend. */
export async function syncCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const [action, ...rest] = args
  if (action !== 'push') {
    throw new BadInputError(
      action === undefined ? 'usage: si vault sync push' : `unknown sync action: ${action}`,
      'usage: si vault sync push [--scope <name>] [--file <path>]',
    )
  }

  const { values } = parseArgs({ args: rest, options: TARGET_FLAGS, strict: true })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.syncPush(targetOptions(values))

  report(
    { json: values.json, command: 'vault sync push', ctx, target: result.target },
    { pushed: result.pushed },
    () => {
      printFields([
        ['mode', result.mode],
        ['file', describeTarget(result.target)],
        ['pushed', result.pushed ? 'yes' : 'no'],
      ])
    },
  )
  return 0
}
