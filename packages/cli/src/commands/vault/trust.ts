import { parseArgs } from 'node:util'
import { BadInputError, describeTarget, fingerprintOf } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { TARGET_FLAGS, report, targetOptions } from './shared.js'

const USAGE = 'usage: si vault trust <status|accept|forget> [--scope <name>] [--file <path>]'

/** `si vault trust status|accept|forget` */
export async function trustCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const [action, ...rest] = args
  switch (action) {
    case 'status':
      return trustStatus(rest, runtime)
    case 'accept':
      return trustAccept(rest, runtime)
    case 'forget':
      return trustForget(rest, runtime)
    default:
      throw new BadInputError(action === undefined ? USAGE : `unknown trust action: ${action}`, USAGE)
  }
}

async function trustStatus(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({ args, options: TARGET_FLAGS, strict: true })
  const { vault, ctx } = await openVault(runtime)
  const status = await vault.trustStatus(targetOptions(values))

  report(
    { json: values.json, command: 'vault trust status', ctx, target: status.target },
    {
      key: status.key,
      state: status.state,
      record: status.record,
      current_recipient: status.currentRecipient,
      current_fingerprint: status.currentFingerprint,
    },
    () => {
      printFields([
        ['file', describeTarget(status.target)],
        ['current fp', status.currentFingerprint ?? '(unavailable)'],
        ['stored fp', status.record?.fingerprint ?? '(none)'],
        ['trust', status.state],
      ])
      if (status.state === 'changed' && status.record !== undefined && status.currentRecipient !== undefined) {
        process.stdout.write(`- ${status.record.recipient}\n+ ${status.currentRecipient}\n`)
      }
    },
  )
  return 0
}

async function trustAccept(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({
    args,
    options: { ...TARGET_FLAGS, yes: { type: 'boolean', default: false } },
    strict: true,
  })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.trustAccept({ ...targetOptions(values), force: values.yes })

  report(
    { json: values.json, command: 'vault trust accept', ctx, target: result.target },
    { record: result.record, previous: result.previous },
    () => {
      const fields: [string, string][] = [
        ['trusted', describeTarget(result.target)],
        ['fingerprint', result.record.fingerprint],
      ]
      if (result.previous !== undefined && result.previous.recipient !== result.record.recipient) {
        fields.push(['replaced', fingerprintOf(result.previous.recipient)])
      }
      printFields(fields)
    },
  )
  return 0
}

async function trustForget(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({ args, options: TARGET_FLAGS, strict: true })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.trustForget(targetOptions(values))

  report(
    { json: values.json, command: 'vault trust forget', ctx, target: result.target },
    { removed: result.removed },
    () => {
      const location = describeTarget(result.target)
      process.stdout.write(result.removed ? `trust: removed for ${location}\n` : `trust: no entry for ${location}\n`)
    },
  )
  return 0
}
