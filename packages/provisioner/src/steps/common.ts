import { join } from "node:path"
import { PATHS } from "@erpstack/shared"
import { requireIdentity } from "../context.js"
import { CommandError, type CommandResult, type ExecOptions } from "../host.js"
import type { RunContext } from "../types.js"

/** apt and dpkg must never stop for a question */
export const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" }

function withAptEnv(command: string, options: ExecOptions): ExecOptions {
  if (command !== "apt-get" && command !== "apt") return options
  return { ...options, env: { ...APT_ENV, ...options.env } }
}

/**
 * Run a command and throw CommandError on a non-zero exit
 */
export async function run(
  ctx: RunContext,
  command: string,
  args: string[],
  options: ExecOptions = {},
): Promise<CommandResult> {
  const result = await ctx.host.exec(command, args, withAptEnv(command, options))
  if (result.exitCode !== 0) {
    throw CommandError.fromResult([command, ...args].join(" "), result)
  }
  return result
}

/**
 * Run a command whose failure only deserves a warning
 */
export async function tryRun(
  ctx: RunContext,
  command: string,
  args: string[],
  warning: string,
  options: ExecOptions = {},
): Promise<boolean> {
  const result = await ctx.host.exec(command, args, withAptEnv(command, options))
  if (result.exitCode !== 0) {
    ctx.logger.warn(warning, CommandError.fromResult([command, ...args].join(" "), result))
    return false
  }
  return true
}

export async function missingPackages(ctx: RunContext, packages: readonly string[]): Promise<string[]> {
  const missing: string[] = []
  for (const name of packages) {
    if (!(await ctx.host.packageInstalled(name))) missing.push(name)
  }
  return missing
}

/** Install whatever is not installed yet */
export async function installPackages(ctx: RunContext, packages: readonly string[]): Promise<void> {
  const missing = await missingPackages(ctx, packages)
  if (missing.length === 0) {
    ctx.logger.debug(`Already installed: ${packages.join(", ")}`)
    return
  }
  ctx.logger.info(`Installing ${missing.join(", ")}`)
  await run(ctx, "apt-get", ["install", "-y", ...missing])
}

/**
 * Run a script as the service account with ~/.local/bin on PATH.
 * Throws CommandError on failure.
 */
export async function runAsAccount(ctx: RunContext, script: string, options: ExecOptions = {}): Promise<CommandResult> {
  const { account } = requireIdentity(ctx)
  const result = await ctx.host.runAs(account, `set -e\n${script}`, options)
  if (result.exitCode !== 0) {
    const firstLine = script.trim().split("\n")[0] ?? script
    throw CommandError.fromResult(`(as ${account}) ${firstLine}`, result)
  }
  return result
}

/** Shell script prologue for commands that run inside the bench */
export function inBench(benchDir: string): string {
  return `export PATH="$HOME/.local/bin:$PATH"\ncd ${shellQuote(benchDir)}\n`
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

export function sudoersPath(account: string): string {
  return join(PATHS.SUDOERS_DIR, account)
}
