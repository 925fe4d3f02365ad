import { randomInt } from "node:crypto"
import { type FileHandle, chmod, mkdir, open, readFile, rm, stat } from "node:fs/promises"
import { join } from "node:path"
import { password } from "@erpstack/env"
import type { RunLogger } from "@erpstack/logger"
import { z } from "zod"
import { InstallerError, PersistenceError } from "./errors.js"
import type { Prompter } from "./prompts.js"
import type { InstallMode } from "./types.js"

export const SECRET_PURPOSES = {
  DB_ROOT: "database-root-password",
  ADMIN: "admin-password",
} as const

export type SecretPurpose = (typeof SECRET_PURPOSES)[keyof typeof SECRET_PURPOSES]

export type SecretMethod = "generated" | "operator" | "environment" | "persisted"

export type Charset = "alphanumeric" | "hex" | "symbols"

const ALPHABETS: Record<Charset, string> = {
  alphanumeric: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789",
  hex: "0123456789abcdef",
  symbols: "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789!#%+-=@^_~",
}

export const SECRET_FILE_MODE = 0o600
export const CREDENTIALS_DIR_MODE = 0o700

export interface Secret {
  purpose: string
  value: string
  method: SecretMethod
  /** File the secret is persisted in */
  location: string
}

const storedSecretSchema = z.object({
  purpose: z.string().min(1),
  value: z.string().min(1),
  method: z.enum(["generated", "operator", "environment"]),
  createdAt: z.string(),
})

export interface SecretRequest {
  purpose: SecretPurpose
  /** Human label used in prompts and log lines, e.g. "MariaDB root password" */
  label: string
  length: number
  charset?: Charset
  /** Environment-provided value, honoured in automated runs */
  override?: string
}

export interface SummaryEntry {
  label: string
  value: string
}

/**
 * Open `path` owner-only, hand the handle to `writer`, and re-apply the mode
 * whatever the writer does.
 */
export async function withRestrictedFile(path: string, writer: (handle: FileHandle) => Promise<void>): Promise<void> {
  const handle = await open(path, "w", SECRET_FILE_MODE)
  try {
    await handle.chmod(SECRET_FILE_MODE)
    await writer(handle)
  } finally {
    try {
      await handle.chmod(SECRET_FILE_MODE)
    } finally {
      await handle.close()
    }
  }
}

async function modeOf(path: string): Promise<number> {
  return (await stat(path)).mode & 0o777
}

export interface SecretStoreOptions {
  dir: string
  summaryFile: string
  mode: InstallMode
  prompter: Prompter
  logger: RunLogger
}

/**
 * Generates, persists and reloads the run's credentials. One file per purpose
 * under an owner-only directory; a persisted secret is always reused.
 */
export class SecretStore {
  readonly dir: string
  readonly summaryFile: string
  private readonly mode: InstallMode
  private readonly prompter: Prompter
  private readonly logger: RunLogger
  private readonly cache = new Map<string, Secret>()

  constructor(options: SecretStoreOptions) {
    this.dir = options.dir
    this.summaryFile = options.summaryFile
    this.mode = options.mode
    this.prompter = options.prompter
    this.logger = options.logger
  }

  pathFor(purpose: string): string {
    return join(this.dir, `${purpose}.json`)
  }

  generate(purpose: string, length: number, charset: Charset = "alphanumeric"): Secret {
    const alphabet = ALPHABETS[charset]
    let value = ""
    try {
      for (let i = 0; i < length; i++) {
        value += alphabet.charAt(randomInt(alphabet.length))
      }
    } catch (err) {
      throw new InstallerError("RANDOM_SOURCE_UNAVAILABLE", `Cannot generate ${purpose}`, { cause: err })
    }
    return { purpose, value, method: "generated", location: this.pathFor(purpose) }
  }

  /** Create the credentials directory owner-only, or fail */
  async ensureDirectory(): Promise<void> {
    try {
      await mkdir(this.dir, { recursive: true, mode: CREDENTIALS_DIR_MODE })
      await chmod(this.dir, CREDENTIALS_DIR_MODE)
    } catch (err) {
      throw PersistenceError.directory(this.dir, err)
    }
    const mode = await modeOf(this.dir)
    if (mode !== CREDENTIALS_DIR_MODE) {
      throw PersistenceError.permissions(this.dir, mode)
    }
  }

  async persist(secret: Secret): Promise<Secret> {
    await this.ensureDirectory()
    const location = this.pathFor(secret.purpose)
    const method = secret.method === "persisted" ? "generated" : secret.method
    const record = { purpose: secret.purpose, value: secret.value, method, createdAt: new Date().toISOString() }

    try {
      await withRestrictedFile(location, async handle => {
        await handle.writeFile(`${JSON.stringify(record, null, 2)}\n`)
      })
    } catch (err) {
      throw PersistenceError.write(location, err)
    }

    const mode = await modeOf(location)
    if (mode !== SECRET_FILE_MODE) {
      throw PersistenceError.permissions(location, mode)
    }
    return { ...secret, location }
  }

  async load(purpose: string): Promise<Secret | undefined> {
    const location = this.pathFor(purpose)

    let raw: string
    try {
      raw = await readFile(location, "utf8")
    } catch {
      return undefined
    }

    const mode = await modeOf(location)
    if (mode !== SECRET_FILE_MODE) {
      this.logger.warn(`${location} had mode ${mode.toString(8)}, restricting to owner-only`)
      await chmod(location, SECRET_FILE_MODE)
    }

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (err) {
      this.logger.warn(`Ignoring unreadable credential file ${location}`, err)
      return undefined
    }
    const parsed = storedSecretSchema.safeParse(data)
    if (!parsed.success || parsed.data.purpose !== purpose) {
      this.logger.warn(`Ignoring malformed credential file ${location}`)
      return undefined
    }

    this.logger.redactor.add(parsed.data.value)
    return { purpose, value: parsed.data.value, method: "persisted", location }
  }

  /** Re-asks until the answer meets the same minimum length as the environment variables */
  async ask(purpose: string, label: string): Promise<Secret> {
    for (;;) {
      const answer = await this.prompter.secret(`Enter ${label}`)
      const checked = password.safeParse(answer)
      if (checked.success) {
        this.logger.redactor.add(checked.data)
        return { purpose, value: checked.data, method: "operator", location: this.pathFor(purpose) }
      }
      this.logger.warn(`${label}: ${checked.error.issues.map(issue => issue.message).join(", ")}`)
    }
  }

  /**
   * Resolve a secret for this run: cached value, then the persisted copy,
   * then the environment (automated runs), then the operator or the generator.
   * New values are persisted before they are returned.
   */
  async resolve(request: SecretRequest): Promise<Secret> {
    const { purpose, label, length, charset, override } = request

    const cached = this.cache.get(purpose)
    if (cached) return cached

    const persisted = await this.load(purpose)
    if (persisted) {
      this.logger.warn(`Reusing existing ${label} from ${persisted.location}`)
      this.cache.set(purpose, persisted)
      return persisted
    }

    let secret: Secret
    if (this.mode === "automated" && override) {
      this.logger.info(`Using ${label} from the environment`)
      secret = { purpose, value: override, method: "environment", location: this.pathFor(purpose) }
    } else if (this.prompter.interactive && !(await this.prompter.confirm(`Generate random ${label}?`, true))) {
      secret = await this.ask(purpose, label)
    } else {
      secret = this.generate(purpose, length, charset)
      this.logger.info(`Generated ${label}`)
    }

    this.logger.redactor.add(secret.value)
    const stored = await this.persist(secret)
    this.cache.set(purpose, stored)
    return stored
  }

  /** A secret an earlier step must have resolved */
  async require(purpose: SecretPurpose): Promise<Secret> {
    const secret = this.cache.get(purpose) ?? (await this.load(purpose))
    if (!secret) {
      throw new InstallerError("SECRET_MISSING", `No ${purpose} found in ${this.dir}`)
    }
    this.cache.set(purpose, secret)
    return secret
  }

  /** Plaintext owner-only summary for the operator */
  async writeSummary(title: string, entries: SummaryEntry[]): Promise<string> {
    const width = Math.max(...entries.map(entry => entry.label.length))
    const body = [
      title,
      "=".repeat(title.length),
      "",
      ...entries.map(entry => `${`${entry.label}:`.padEnd(width + 2)}${entry.value}`),
      "",
    ].join("\n")

    try {
      await withRestrictedFile(this.summaryFile, async handle => {
        await handle.writeFile(body)
      })
    } catch (err) {
      throw PersistenceError.write(this.summaryFile, err)
    }
    const mode = await modeOf(this.summaryFile)
    if (mode !== SECRET_FILE_MODE) {
      throw PersistenceError.permissions(this.summaryFile, mode)
    }
    return this.summaryFile
  }

  /** Delete every credential file, the site record and the summary */
  async purge(): Promise<void> {
    this.cache.clear()
    await rm(this.dir, { recursive: true, force: true })
    await rm(this.summaryFile, { force: true })
  }
}
