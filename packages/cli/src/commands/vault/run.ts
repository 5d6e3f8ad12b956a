/**
 * `si vault run -- CMD ARGS` — decrypt the vault and run a command with its
 * values merged into the environment.
 *
 * The child's stdout and stderr pass through a {@link RedactingStream} over
 * every vault value unless `--no-redact` is given. Values reach the child
 * through its environment only; nothing is printed.
 *
 * @internal
 */

import { spawn } from 'node:child_process'
import { finished } from 'node:stream/promises'
import { parseArgs } from 'node:util'
import { BadInputError } from 'si-vault'
import { openVault } from '../../context.js'
import type { CliRuntime } from '../../context.js'
import { RedactingStream } from '../../redact.js'

const USAGE = 'usage: si vault run [--allow-plaintext] [--no-redact] [--scope <name>] [--file <path>] -- <command...>'

export async function runCommand(args: string[], runtime: CliRuntime): Promise<number> {
  const dashDashIdx = args.indexOf('--')
  if (dashDashIdx === -1) {
    throw new BadInputError('must provide command after --', USAGE)
  }
  const command = args.slice(dashDashIdx + 1)
  const commandName = command[0]
  if (commandName === undefined) {
    throw new BadInputError('no command provided after --', USAGE)
  }

  const { values } = parseArgs({
    args: args.slice(0, dashDashIdx),
    options: {
      scope: { type: 'string' },
      file: { type: 'string' },
      'allow-plaintext': { type: 'boolean', default: false },
      'no-redact': { type: 'boolean', default: false },
    },
    strict: true,
  })

  const { vault } = await openVault(runtime)
  const { env } = await vault.runEnv({
    scope: values.scope,
    file: values.file,
    allowPlaintext: values['allow-plaintext'],
    command: commandName,
    argCount: command.length - 1,
  })

  const child = spawn(commandName, command.slice(1), {
    env: { ...(runtime.env ?? process.env), ...env },
    cwd: runtime.cwd,
    stdio: ['inherit', 'pipe', 'pipe'],
  })

  const exited = new Promise<number>((resolve, reject) => {
    child.on('error', (err) => {
      reject(err)
    })
    child.on('close', (code) => {
      resolve(code ?? 1)
    })
  })

  if (values['no-redact']) {
    child.stdout.pipe(process.stdout, { end: false })
    child.stderr.pipe(process.stderr, { end: false })
    return exited
  }

  const secrets = Object.values(env)
  const stdoutRedactor = new RedactingStream(secrets)
  const stderrRedactor = new RedactingStream(secrets)
  child.stdout.pipe(stdoutRedactor).pipe(process.stdout, { end: false })
  child.stderr.pipe(stderrRedactor).pipe(process.stderr, { end: false })

  const [code] = await Promise.all([exited, finished(stdoutRedactor), finished(stderrRedactor)])
  return code
}
