import { spawn } from "node:child_process"
import { access, chmod, copyFile, readFile, rm, statfs, writeFile } from "node:fs/promises"
import { totalmem } from "node:os"
import { parse as parseDotenv } from "dotenv"

/**
 * Error thrown when a command exits non-zero
 */
export class CommandError extends Error {
  constructor(
    public command: string,
    public exitCode: number,
    public stderr: string,
    public stdout: string,
  ) {
    super(`Command ${command} failed with exit code ${exitCode}${stderr ? `: ${lastLine(stderr)}` : ""}`)
    this.name = "CommandError"
  }

  static fromResult(command: string, result: CommandResult): CommandError {
    return new CommandError(command, result.exitCode, result.stderr, result.stdout)
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n")
  return lines[lines.length - 1] ?? ""
}

export interface CommandResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface ExecOptions {
  cwd?: string
  /** Added to the inherited environment. Secrets go here or in `input`, never in argv. */
  env?: Record<string, string>
  /** Written to stdin, then stdin is closed */
  input?: string
}

/**
 * Everything the installer does to the machine goes through this interface.
 * Steps never spawn processes or touch system paths directly.
 */
export interface Host {
  isPrivileged(): boolean
  /** Run a command. Never throws on a non-zero exit; inspect `exitCode`. */
  exec(command: string, args: string[], options?: ExecOptions): Promise<CommandResult>
  /** Run a bash script as `account` in its login shell, with the account's HOME */
  runAs(account: string, script: string, options?: ExecOptions): Promise<CommandResult>
  packageInstalled(name: string): Promise<boolean>
  userExists(account: string): Promise<boolean>
  serviceActive(name: string): Promise<boolean>
  commandExists(name: string): Promise<boolean>
  pathExists(path: string): Promise<boolean>
  /** File contents, undefined when the file does not exist */
  readFile(path: string): Promise<string | undefined>
  writeFile(path: string, content: string, mode: number): Promise<void>
  copyFile(from: string, to: string): Promise<void>
  removePath(path: string): Promise<void>
  /** Parsed /etc/os-release, empty when unreadable */
  osRelease(): Promise<Record<string, string>>
  totalMemoryBytes(): number
  freeDiskBytes(path: string): Promise<number>
}

export interface SystemHostOptions {
  /** Receives every stdout/stderr line of spawned commands */
  onOutput?: (command: string, line: string) => void
  osReleasePath?: string
}

interface AccountIdentity {
  uid: number
  gid: number
  home: string
}

/**
 * Host backed by the real machine
 */
export class SystemHost implements Host {
  private readonly onOutput?: (command: string, line: string) => void
  private readonly osReleasePath: string

  constructor(options: SystemHostOptions = {}) {
    this.onOutput = options.onOutput
    this.osReleasePath = options.osReleasePath ?? "/etc/os-release"
  }

  isPrivileged(): boolean {
    return typeof process.getuid === "function" && process.getuid() === 0
  }

  exec(command: string, args: string[], options: ExecOptions = {}): Promise<CommandResult> {
    return this.spawnCommand(command, args, options)
  }

  async runAs(account: string, script: string, options: ExecOptions = {}): Promise<CommandResult> {
    const identity = await this.lookupAccount(account)
    return this.spawnCommand("bash", ["-lc", script], {
      ...options,
      cwd: options.cwd ?? identity.home,
      uid: identity.uid,
      gid: identity.gid,
      baseEnv: {
        HOME: identity.home,
        USER: account,
        LOGNAME: account,
        PATH: `${identity.home}/.local/bin:${process.env.PATH ?? "/usr/local/bin:/usr/bin:/bin"}`,
      },
    })
  }

  async packageInstalled(name: string): Promise<boolean> {
    const result = await this.exec("dpkg-query", ["-W", "-f=${Status}", name])
    return result.exitCode === 0 && result.stdout.includes("install ok installed")
  }

  async userExists(account: string): Promise<boolean> {
    const result = await this.exec("id", ["-u", account])
    return result.exitCode === 0
  }

  async serviceActive(name: string): Promise<boolean> {
    const result = await this.exec("systemctl", ["is-active", "--quiet", name])
    return result.exitCode === 0
  }

  async commandExists(name: string): Promise<boolean> {
    const result = await this.exec("which", [name])
    return result.exitCode === 0
  }

  async pathExists(path: string): Promise<boolean> {
    try {
      await access(path)
      return true
    } catch {
      return false
    }
  }

  async readFile(path: string): Promise<string | undefined> {
    if (!(await this.pathExists(path))) return undefined
    return readFile(path, "utf8")
  }

  async writeFile(path: string, content: string, mode: number): Promise<void> {
    await writeFile(path, content, { mode })
    // writeFile only applies the mode on create
    await chmod(path, mode)
  }

  async copyFile(from: string, to: string): Promise<void> {
    await copyFile(from, to)
  }

  async removePath(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true })
  }

  async osRelease(): Promise<Record<string, string>> {
    const raw = await this.readFile(this.osReleasePath)
    return raw ? parseDotenv(raw) : {}
  }

  totalMemoryBytes(): number {
    return totalmem()
  }

  async freeDiskBytes(path: string): Promise<number> {
    const stats = await statfs(path)
    return stats.bavail * stats.bsize
  }

  private async lookupAccount(account: string): Promise<AccountIdentity> {
    const result = await this.exec("getent", ["passwd", account])
    // name:x:uid:gid:gecos:home:shell
    const fields = result.stdout.trim().split(":")
    const uid = Number(fields[2])
    const gid = Number(fields[3])
    const home = fields[5]
    if (result.exitCode !== 0 || !home || !Number.isInteger(uid) || !Number.isInteger(gid)) {
      throw new CommandError(`getent passwd ${account}`, result.exitCode || 2, "account not found", result.stdout)
    }
    return { uid, gid, home }
  }

  private spawnCommand(
    command: string,
    args: string[],
    options: ExecOptions & { uid?: number; gid?: number; baseEnv?: Record<string, string> },
  ): Promise<CommandResult> {
    const label = [command, ...args].join(" ")

    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        stdio: ["pipe", "pipe", "pipe"],
        cwd: options.cwd,
        env: { ...process.env, ...options.baseEnv, ...options.env },
        uid: options.uid,
        gid: options.gid,
      })

      let stdout = ""
      let stderr = ""

      const forward = (text: string) => {
        if (!this.onOutput) return
        for (const line of text.split("\n")) {
          if (line.trim()) this.onOutput(command, line)
        }
      }

      proc.stdout.on("data", (data: Buffer) => {
        const text = data.toString()
        stdout += text
        forward(text)
      })

      proc.stderr.on("data", (data: Buffer) => {
        const text = data.toString()
        stderr += text
        forward(text)
      })

      proc.on("close", code => {
        resolve({ exitCode: code ?? 1, stdout, stderr })
      })

      proc.on("error", err => {
        reject(new Error(`Failed to spawn ${label}: ${err.message}`))
      })

      // A child that exits without reading stdin closes the pipe; the exit code reports that
      proc.stdin.on("error", err => {
        if ("code" in err && err.code === "EPIPE") return
        reject(new Error(`Failed to write stdin of ${label}: ${err.message}`))
      })

      if (options.input !== undefined) {
        proc.stdin.write(options.input)
      }
      proc.stdin.end()
    })
  }
}
