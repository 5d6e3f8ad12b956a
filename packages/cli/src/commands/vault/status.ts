import { parseArgs } from 'node:util'
import { describeTarget } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { TARGET_FLAGS, report, targetOptions } from './shared.js'

/** `si vault status`: file, identity and trust state. Never decrypts. */
export async function statusCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({ args, options: TARGET_FLAGS, strict: true })
  const { vault, ctx } = await openVault(runtime)
  const status = await vault.status(targetOptions(values))

  report(
    { json: values.json, command: 'vault status', ctx, target: status.target },
    {
      exists: status.exists,
      recipient: status.recipient,
      sync_backend: status.syncBackend,
      key_backend: status.keyBackend,
      identity: status.identity,
      trust: status.trust,
      counts: status.counts,
    },
    () => {
      const identity = status.identity.available
        ? `${status.identity.fingerprint ?? ''} (${status.identity.source ?? 'unknown'}${
            status.identity.matchesRecipient === false ? ', does not match recipient' : ''
          })`
        : 'unavailable'
      printFields([
        ['file', describeTarget(status.target)],
        ['exists', status.exists ? 'yes' : 'no'],
        ['recipient', status.recipient ?? '(none)'],
        ['sync backend', status.syncBackend],
        ['key backend', status.keyBackend],
        ['identity', identity],
        ['trust', status.trust],
        ['encrypted', String(status.counts.encrypted)],
        ['plaintext', String(status.counts.plaintext)],
        ['malformed', String(status.counts.malformed)],
      ])
    },
  )
  return 0
}
