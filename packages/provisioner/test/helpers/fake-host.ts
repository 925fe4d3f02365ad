import type { CommandResult, ExecOptions, Host } from "../../src/host.js"

const GB = 1024 ** 3

export interface RecordedCall {
  command: string
  args: string[]
  options: ExecOptions
  /** Set for runAs calls */
  account?: string
}

type Matcher = string | ((line: string, call: RecordedCall) => boolean)

/**
 * In-memory host. Every command succeeds with empty output unless a
 * responder matches; nothing is spawned and no real path is touched.
 */
export class FakeHost implements Host {
  privileged = true
  readonly packages = new Set<string>()
  readonly users = new Set<string>()
  readonly services = new Set<string>()
  readonly commands = new Set<string>()
  readonly files = new Map<string, string>()
  readonly modes = new Map<string, number>()
  readonly dirs = new Set<string>()
  readonly removed: string[] = []
  readonly calls: RecordedCall[] = []
  release: Record<string, string> = {
    ID: "debian",
    VERSION_ID: "13",
    PRETTY_NAME: "Debian GNU/Linux 13 (trixie)",
  }
  memoryBytes = 8 * GB
  diskBytes = 100 * GB
  private readonly responders: { match: Matcher; result: CommandResult }[] = []

  /** Answer commands whose line starts with `match` (or satisfies it) */
  respond(match: Matcher, result: Partial<CommandResult>): this {
    this.responders.push({ match, result: { exitCode: 0, stdout: "", stderr: "", ...result } })
    return this
  }

  /** Executed command lines, `runAs <account>: <script>` for scripts */
  lines(): string[] {
    return this.calls.map(call => lineOf(call))
  }

  isPrivileged(): boolean {
    return this.privileged
  }

  async exec(command: string, args: string[], options: ExecOptions = {}): Promise<CommandResult> {
    return this.answer({ command, args, options })
  }

  async runAs(account: string, script: string, options: ExecOptions = {}): Promise<CommandResult> {
    return this.answer({ command: "runAs", args: [script], options, account })
  }

  async packageInstalled(name: string): Promise<boolean> {
    return this.packages.has(name)
  }

  async userExists(account: string): Promise<boolean> {
    return this.users.has(account)
  }

  async serviceActive(name: string): Promise<boolean> {
    return this.services.has(name)
  }

  async commandExists(name: string): Promise<boolean> {
    return this.commands.has(name)
  }

  async pathExists(path: string): Promise<boolean> {
    return this.files.has(path) || this.dirs.has(path)
  }

  async readFile(path: string): Promise<string | undefined> {
    return this.files.get(path)
  }

  async writeFile(path: string, content: string, mode: number): Promise<void> {
    this.files.set(path, content)
    this.modes.set(path, mode)
  }

  async copyFile(from: string, to: string): Promise<void> {
    const content = this.files.get(from)
    if (content === undefined) throw new Error(`ENOENT: ${from}`)
    this.files.set(to, content)
  }

  async removePath(path: string): Promise<void> {
    this.removed.push(path)
    this.dirs.delete(path)
    for (const file of [...this.files.keys()]) {
      if (file === path || file.startsWith(`${path}/`)) this.files.delete(file)
    }
  }

  async osRelease(): Promise<Record<string, string>> {
    return this.release
  }

  totalMemoryBytes(): number {
    return this.memoryBytes
  }

  async freeDiskBytes(): Promise<number> {
    return this.diskBytes
  }

  private answer(call: RecordedCall): CommandResult {
    this.calls.push(call)
    const line = lineOf(call)
    for (const { match, result } of [...this.responders].reverse()) {
      const hit = typeof match === "string" ? line.startsWith(match) : match(line, call)
      if (hit) return result
    }
    return { exitCode: 0, stdout: "", stderr: "" }
  }
}

function lineOf(call: RecordedCall): string {
  if (call.account !== undefined) {
    return `runAs ${call.account}: ${call.args.join(" ")}`
  }
  return [call.command, ...call.args].join(" ")
}
