import { parseArgs } from 'node:util'
import { describeTarget } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { FORCE_FLAG, TARGET_FLAGS, report, targetOptions } from './shared.js'

/** `si vault encrypt [--reencrypt]` */
export async function encryptCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({
    args,
    options: { ...TARGET_FLAGS, ...FORCE_FLAG, reencrypt: { type: 'boolean', default: false } },
    strict: true,
  })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.encrypt({ ...targetOptions(values), force: values.force, reencrypt: values.reencrypt })

  report(
    { json: values.json, command: 'vault encrypt', ctx, target: result.target },
    {
      recipient: result.recipient,
      encrypted: result.encrypted,
      reencrypted: result.reencrypted,
      recipient_changed: result.recipientChanged,
    },
    () => {
      const fields: [string, string][] = [
        ['file', describeTarget(result.target)],
        ['encrypted', String(result.encrypted.length)],
      ]
      if (values.reencrypt) {
        fields.push(['reencrypted', String(result.reencrypted.length)])
      }
      if (result.recipientChanged) {
        fields.push(['recipient', result.recipient])
      }
      printFields(fields)
    },
  )
  return 0
}
