import { parseArgs } from 'node:util'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { report } from './shared.js'

/** `si vault keygen [--rotate]` */
export async function keygenCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      rotate: { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    strict: true,
  })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.keygen({ rotate: values.rotate })

  report(
    { json: values.json, command: 'vault keygen', ctx },
    {
      key_backend: result.keyBackend,
      location: result.location,
      recipient: result.recipient,
      fingerprint: result.fingerprint,
      created: result.created,
      rotated: result.rotated,
      previous_recipient: result.previousRecipient,
    },
    () => {
      const fields: [string, string][] = [
        ['key backend', result.keyBackend],
        ['location', result.location],
        ['recipient', result.recipient],
        ['fingerprint', result.fingerprint],
        ['key', result.rotated ? 'rotated' : result.created ? 'created' : 'existing'],
      ]
      if (result.previousRecipient !== undefined) {
        fields.push(['previous', result.previousRecipient])
      }
      printFields(fields)
    },
  )
  return 0
}
