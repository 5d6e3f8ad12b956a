import { parseArgs } from 'node:util'
import { BadInputError, describeTarget } from 'si-vault'
import { openVault, readAllText } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { printFields } from '../../output.js'
import { FORCE_FLAG, TARGET_FLAGS, report, targetOptions } from './shared.js'

const USAGE = 'usage: si vault set <KEY> <VALUE> [--stdin] [--section <name>] [--scope <name>] [--file <path>]'

/**
 * `si vault set KEY VALUE`. With `--stdin` the value is read from standard
 * input, minus trailing line breaks, which keeps it out of shell history.
 */
export async function setCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...TARGET_FLAGS,
      ...FORCE_FLAG,
      stdin: { type: 'boolean', default: false },
      section: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  })

  const [key, inline, ...extra] = positionals
  if (key === undefined || extra.length > 0 || (values.stdin && inline !== undefined)) {
    throw new BadInputError(USAGE)
  }
  let value: string
  if (values.stdin) {
    value = (await readAllText(runtime.stdin ?? process.stdin)).replace(/[\r\n]+$/, '')
  } else if (inline !== undefined) {
    value = inline
  } else {
    throw new BadInputError('value required (use --stdin for multiline or safer input)', USAGE)
  }

  const { vault, ctx } = await openVault(runtime)
  const result = await vault.set(key, value, {
    ...targetOptions(values),
    force: values.force,
    section: values.section,
  })

  report(
    { json: values.json, command: 'vault set', ctx, target: result.target },
    { key: result.key, encrypted: result.encrypted },
    () => {
      printFields([
        ['file', describeTarget(result.target)],
        ['set', `${result.key} (${result.encrypted ? 'encrypted' : 'plaintext'})`],
      ])
    },
  )
  return 0
}
