import { parseArgs } from 'node:util'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { report } from './shared.js'

/**
 * `si vault hydrate`: load the sun identity into `SI_VAULT_IDENTITY` of
 * this process. Never writes vault bytes or key files.
 */
export async function hydrateCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({ args, options: { json: { type: 'boolean', default: false } }, strict: true })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.hydrate()

  report(
    { json: values.json, command: 'vault hydrate', ctx },
    { recipient: result.recipient, fingerprint: result.fingerprint },
    () => {
      printFields([
        ['identity', 'sun'],
        ['recipient', result.recipient],
        ['fingerprint', result.fingerprint],
      ])
    },
  )
  return 0
}
