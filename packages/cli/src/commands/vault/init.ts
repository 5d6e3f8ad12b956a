import { parseArgs } from 'node:util'
import { describeTarget } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { FORCE_FLAG, TARGET_FLAGS, report, targetOptions } from './shared.js'

/** `si vault init`: create or stamp the vault file and register trust. */
export async function initCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({ args, options: { ...TARGET_FLAGS, ...FORCE_FLAG }, strict: true })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.init({ ...targetOptions(values), force: values.force })

  report(
    { json: values.json, command: 'vault init', ctx, target: result.target },
    {
      recipient: result.recipient,
      fingerprint: result.fingerprint,
      changed: result.changed,
      key_created: result.keyCreated,
      key_backend: result.keyBackend,
      trust: result.trust,
    },
    () => {
      printFields([
        ['file', describeTarget(result.target)],
        ['recipient', result.recipient],
        ['trust fp', result.fingerprint],
        ['header', result.changed ? 'written' : 'unchanged'],
        ['key', `${result.keyCreated ? 'created' : 'ok'} (backend=${result.keyBackend})`],
      ])
    },
  )
  return 0
}
