#!/usr/bin/env node
/**
 * CLI entry point for `si`.
 *
 * Each verb family is lazy-loaded via dynamic import(). This build carries
 * the `vault` family; the provider verbs answer "not available in this
 * build".
 *
 * argv layout: [node, script, verb, ...verbArgs]
 *
 * @internal
 */

import { PROVIDER_VERBS } from './verbs.js'

const verb = process.argv[2]
const verbArgs = process.argv.slice(3)

function printHelp(): void {
  process.stdout.write(
    'Usage: si <command> [options]\n\n' +
      'Commands:\n' +
      '  vault        Encrypted dotenv vault (run `si vault --help`)\n\n' +
      `Not available in this build: ${PROVIDER_VERBS.join(', ')}\n`,
  )
}

async function main(): Promise<number> {
  if (verb === undefined || verb === '--help' || verb === '-h' || verb === 'help') {
    printHelp()
    return 0
  }

  if (verb === 'vault') {
    const { vaultCommand } = await import('./commands/vault.js')
    return vaultCommand(verbArgs)
  }
  if (PROVIDER_VERBS.includes(verb)) {
    process.stderr.write(`si ${verb}: not available in this build\n`)
    return 1
  }
  process.stderr.write(`Unknown command: ${verb}\n`)
  printHelp()
  return 2
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
