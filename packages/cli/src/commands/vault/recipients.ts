import { parseArgs } from 'node:util'
import { BadInputError, describeTarget } from 'si-vault'
import type { RecipientChangeResult, VaultContext } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { FORCE_FLAG, TARGET_FLAGS, report, targetOptions } from './shared.js'

const USAGE = 'usage: si vault recipients <list|add|remove> [<age1...>] [--scope <name>] [--file <path>]'

/** `si vault recipients list|add|remove` */
export async function recipientsCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const [action, ...rest] = args
  switch (action) {
    case 'list':
      return recipientsList(rest, runtime)
    case 'add':
    case 'remove':
      return recipientsChange(action, rest, runtime)
    default:
      throw new BadInputError(action === undefined ? USAGE : `unknown recipients action: ${action}`, USAGE)
  }
}

async function recipientsList(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({ args, options: TARGET_FLAGS, strict: true })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.recipientsList(targetOptions(values))

  report(
    { json: values.json, command: 'vault recipients list', ctx, target: result.target },
    { recipients: result.recipients, fingerprint: result.fingerprint },
    () => {
      printFields([
        ['file', describeTarget(result.target)],
        ['trust fp', result.fingerprint ?? '(none)'],
      ])
      for (const recipient of result.recipients) {
        process.stdout.write(`${recipient}\n`)
      }
    },
  )
  return 0
}

async function recipientsChange(action: 'add' | 'remove', args: string[], runtime: CliRuntime): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: { ...TARGET_FLAGS, ...FORCE_FLAG },
    allowPositionals: true,
    strict: true,
  })
  const [recipient, ...extra] = positionals
  if (recipient === undefined || extra.length > 0) {
    throw new BadInputError(`usage: si vault recipients ${action} <age1...>`, USAGE)
  }
  const { vault, ctx } = await openVault(runtime)
  const options = { ...targetOptions(values), force: values.force }
  const result =
    action === 'add' ? await vault.recipientsAdd(recipient, options) : await vault.recipientsRemove(recipient, options)

  printChange(action, result, values.json, ctx)
  return 0
}

function printChange(
  action: 'add' | 'remove',
  result: RecipientChangeResult,
  json: boolean | undefined,
  ctx: VaultContext,
): void {
  report(
    { json, command: `vault recipients ${action}`, ctx, target: result.target },
    { recipient: result.recipient, changed: result.changed, recipients: result.recipients },
    () => {
      let state: string
      if (action === 'add') {
        state = result.changed ? 'added' : 'already present'
      } else {
        state = result.changed ? 'removed' : 'not present'
      }
      printFields([
        ['file', describeTarget(result.target)],
        ['recipient', state],
      ])
    },
  )
}
