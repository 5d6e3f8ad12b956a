import * as readline from 'node:readline'

/**
 * Ask a yes/no question on the terminal. The prompt goes to stderr so that
 * stdout stays clean for piped output.
 *
 * @returns `true` only for an explicit `y` or `yes`.
 * @internal
 */
export async function promptConfirm(question: string): Promise<boolean> {
  const answer = await readLine(`${question} [y/N] `)
  const normalized = answer.trim().toLowerCase()
  return normalized === 'y' || normalized === 'yes'
}

function readLine(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stderr,
    })
    rl.question(prompt, (answer) => {
      rl.close()
      resolve(answer)
    })
  })
}
