import * as path from 'node:path'
import { parseArgs } from 'node:util'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { report, plural } from './shared.js'

/**
 * `si vault check [--file <path>]... [--staged] [--all] [--include-examples]`.
 * Exits 1 when any checked file holds plaintext values, so it can guard a
 * pre-commit hook.
 */
export async function checkCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      file: { type: 'string', short: 'f', multiple: true },
      staged: { type: 'boolean', default: false },
      all: { type: 'boolean', default: false },
      'include-examples': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    strict: true,
  })
  const { vault, ctx } = await openVault(runtime)
  const result = await vault.check({
    files: values.file,
    staged: values.staged,
    all: values.all,
    includeExamples: values['include-examples'],
  })
  const shown = (file: string): string => path.relative(ctx.cwd, file) || file

  report(
    { json: values.json, command: 'vault check', ctx },
    {
      checked: result.checked.map(shown),
      findings: result.findings.map((f) => ({ file: shown(f.path), plaintext_keys: f.plaintext })),
    },
    () => {
      if (result.findings.length === 0) {
        process.stdout.write(`ok: ${plural(result.checked.length, 'file')} checked\n`)
        return
      }
      let out = '[si vault] plaintext values detected:\n'
      for (const finding of result.findings) {
        out += `  - ${shown(finding.path)}: ${finding.plaintext.join(', ')}\n`
      }
      out += '\nFix:\n'
      for (const finding of result.findings) {
        out += `  si vault encrypt --file ${shown(finding.path)}\n`
      }
      process.stderr.write(out)
    },
  )
  return result.findings.length > 0 ? 1 : 0
}
