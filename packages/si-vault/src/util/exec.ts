/**
 * Spawn wrapper for the external `git` queries the git sync mode makes.
 */

import { spawn } from 'node:child_process'

/** Options for command execution. */
export interface ExecCommandOptions {
  /** Working directory for the child. */
  cwd?: string | undefined
  /** Timeout in milliseconds */
  timeoutMs?: number | undefined
}

/** Result of a command execution. */
export interface ExecCommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

/**
 * Execute a command and return the full result. A missing executable
 * rejects with the spawn error (`code: 'ENOENT'`).
 */
export function execCommandFull(
  command: string,
  args: string[],
  options?: ExecCommandOptions,
): Promise<ExecCommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options?.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    })
    let stdout = ''
    let stderr = ''
    let timer: NodeJS.Timeout | undefined

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString()
    })

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    if (options?.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        proc.kill('SIGTERM')
        reject(new Error(`Command timed out after ${String(options.timeoutMs)}ms`))
      }, options.timeoutMs)
    }

    proc.on('close', (code) => {
      clearTimeout(timer)
      resolve({ stdout, stderr, exitCode: code ?? 1 })
    })

    proc.on('error', (error) => {
      clearTimeout(timer)
      reject(error)
    })
  })
}
