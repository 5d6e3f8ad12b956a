import { parseArgs } from 'node:util'
import { describeTarget } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { report, FORCE_FLAG, TARGET_FLAGS, targetOptions } from './shared.js'

/** `si vault fmt [--all] [--check] [--sort]`. `--check` exits 1 when a file would change. */
export async function fmtCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...TARGET_FLAGS,
      ...FORCE_FLAG,
      all: { type: 'boolean', default: false },
      check: { type: 'boolean', default: false },
      sort: { type: 'boolean', default: false },
    },
    strict: true,
  })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.fmt({
    ...targetOptions(values),
    force: values.force,
    all: values.all,
    check: values.check,
    sort: values.sort,
  })

  report(
    { json: values.json, command: 'vault fmt', ctx, target: result.files[0]?.target },
    {
      check: values.check,
      changed: result.changed,
      files: result.files.map((f) => ({ location: describeTarget(f.target), changed: f.changed })),
    },
    () => {
      for (const file of result.files) {
        const state = !file.changed ? 'ok' : values.check ? 'needs formatting' : 'formatted'
        process.stdout.write(`${state}: ${describeTarget(file.target)}\n`)
      }
    },
  )
  return values.check && result.changed ? 1 : 0
}
