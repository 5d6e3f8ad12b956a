/**
 * Hermetic vault environments for consumer tests.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { Vault, createContext } from 'si-vault'
import type { MutableEnv, SyncMode, VaultContext, VaultLogger } from 'si-vault'
import { InMemorySunStore } from './in-memory-sun.js'

/**
 * Options for creating a {@link TestVault}.
 * @public
 */
export interface TestVaultOptions {
  /** `vault.sync_backend`; `off` when omitted. */
  syncBackend?: SyncMode | undefined
  /** `vault.strict_sun`; only written when set. */
  strictSun?: boolean | undefined
  /** Extra environment variables. */
  env?: Record<string, string> | undefined
}

/**
 * Inputs a CLI invocation takes instead of the real process.
 * @public
 */
export interface TestRuntime {
  env: MutableEnv
  cwd: string
  homeDir: string
  interactive: boolean
  sun: InMemorySunStore
}

/**
 * A temporary home and project directory with their own settings, identity,
 * trust store and in-memory sun service.
 *
 * @remarks
 * Nothing touches the real `~/.si`: `SI_SETTINGS_HOME` points at the
 * temporary home, and the project directory is the working directory of
 * every context.
 *
 * @example
 * ```ts
 * const tv = await TestVault.create()
 * const vault = await tv.open()
 * await vault.init()
 * await vault.set('API_KEY', 'test-secret')
 * await tv.cleanup()
 * ```
 *
 * @public
 */
export class TestVault {
  readonly home: string
  /** `<home>/project`, the working directory. */
  readonly project: string
  readonly env: MutableEnv
  readonly sun: InMemorySunStore
  /** Warnings logged by vault operations. */
  readonly warnings: string[] = []
  readonly infos: string[] = []
  readonly #logger: VaultLogger

  private constructor(home: string, env: MutableEnv) {
    this.home = home
    this.project = path.join(home, 'project')
    this.env = env
    this.sun = new InMemorySunStore()
    this.#logger = {
      warn: (message) => {
        this.warnings.push(message)
      },
      info: (message) => {
        this.infos.push(message)
      },
    }
  }

  /**
   * Create the directories and settings.
   * @public
   */
  static async create(options?: TestVaultOptions): Promise<TestVault> {
    const home = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'si-test-vault-')))
    const tv = new TestVault(home, { ...options?.env, SI_SETTINGS_HOME: home })
    await fs.mkdir(tv.project, { recursive: true })

    const lines: string[] = []
    if (options?.syncBackend !== undefined) {
      lines.push(`sync_backend = "${options.syncBackend}"`)
    }
    if (options?.strictSun !== undefined) {
      lines.push(`strict_sun = ${String(options.strictSun)}`)
    }
    if (lines.length > 0) {
      await tv.writeSettings('vault', `${lines.join('\n')}\n`)
    }
    return tv
  }

  /** `<project>/.env` */
  get envFile(): string {
    return path.join(this.project, '.env')
  }

  /**
   * Runtime inputs for a non-interactive CLI invocation.
   * @public
   */
  get runtime(): TestRuntime {
    return { env: this.env, cwd: this.project, homeDir: this.home, interactive: false, sun: this.sun }
  }

  /**
   * Write `<home>/.si/<module>/settings.toml`.
   * @public
   */
  async writeSettings(module: string, toml: string): Promise<void> {
    const dir = path.join(this.home, '.si', module)
    await fs.mkdir(dir, { recursive: true })
    await fs.writeFile(path.join(dir, 'settings.toml'), toml)
  }

  /**
   * A fresh context; settings are re-read every call.
   * @public
   */
  context(): Promise<VaultContext> {
    return createContext({
      env: this.env,
      cwd: this.project,
      homeDir: this.home,
      log: this.#logger,
      sun: this.sun,
    })
  }

  /**
   * A vault over a fresh context.
   * @public
   */
  async open(): Promise<Vault> {
    return new Vault(await this.context())
  }

  /**
   * The project's `.env`, or `undefined` when it does not exist.
   * @public
   */
  async readEnvFile(): Promise<string | undefined> {
    try {
      return await fs.readFile(this.envFile, 'utf8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return undefined
      }
      throw err
    }
  }

  /**
   * Remove the temporary home.
   * @public
   */
  async cleanup(): Promise<void> {
    await fs.rm(this.home, { recursive: true, force: true })
  }
}
