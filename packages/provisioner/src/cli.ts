import { type InstallerEnv, parseInstallerEnv } from "@erpstack/env/server"
import { type LogSink, type RunLogger, consoleSink, createRedactor, createRunLogger, fileSink } from "@erpstack/logger"
import { type InstallerConfig, loadInstallerConfig, resolveConfigPath } from "@erpstack/shared"
import { Command, CommanderError } from "commander"
import { createRunContext } from "./context.js"
import { ConfigError, OperatorAbortError, PreconditionError } from "./errors.js"
import { type Host, SystemHost } from "./host.js"
import { Installer } from "./orchestrator.js"
import { AutoPrompter, type Choice, ClackPrompter, type Prompter } from "./prompts.js"
import type { InstallMode } from "./types.js"

export interface CliOptions {
  quick?: boolean
  silent?: boolean
  automated?: boolean
  check?: boolean
  config?: string
}

export interface CliDeps {
  host?: Host
  env?: Record<string, string | undefined>
  cwd?: string
  /** Prompter for interactive runs, never called otherwise */
  createPrompter?: () => Prompter
  /** Console-side sinks; the run log file is always added */
  sinks?: LogSink[]
}

type MenuChoice = "full" | "step" | "remove" | "exit"

const MENU: readonly Choice<MenuChoice>[] = [
  { value: "full", label: "Full Installation" },
  { value: "step", label: "Step-by-step Installation" },
  { value: "remove", label: "Remove Existing Installation" },
  { value: "exit", label: "Exit" },
]

export function createProgram(): Command {
  return new Command()
    .name("erpstack")
    .description("Provision ERPNext with Frappe Bench, MariaDB, Redis and Nginx on a Debian host")
    .option("--quick", "non-interactive install with quick defaults")
    .option("--silent", "fully automated install, values from the environment")
    .option("--automated", "same as --silent")
    .option("--check", "run pre-flight checks only")
    .option("--config <path>", "config file (default ./erpstack.conf or $ERPSTACK_CONFIG)")
    .exitOverride()
}

export function modeFromOptions(options: CliOptions): InstallMode {
  if (options.silent || options.automated) return "automated"
  if (options.quick) return "quick"
  return "interactive"
}

function openLogger(config: InstallerConfig, consoleSinks: LogSink[], bootstrap: RunLogger): RunLogger {
  const sinks = [...consoleSinks]
  try {
    sinks.push(fileSink(config.logFile))
  } catch (error) {
    bootstrap.warn(`Cannot write ${config.logFile}, logging to the console only`, error)
  }
  return createRunLogger({ sinks, level: config.logLevel, redactor: createRedactor() })
}

/**
 * Entry point. Returns the process exit code.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const program = createProgram()
  try {
    program.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : 1
    }
    throw error
  }

  const options = program.opts<CliOptions>()
  const mode = modeFromOptions(options)
  const env = deps.env ?? process.env
  const consoleSinks = deps.sinks ?? [consoleSink()]
  let logger = createRunLogger({ sinks: consoleSinks })

  const host = deps.host ?? new SystemHost({ onOutput: (command, line) => logger.debug(`[${command}] ${line}`) })
  if (!host.isPrivileged()) {
    logger.error(PreconditionError.notPrivileged().message)
    return 1
  }

  let config: InstallerConfig
  const configPath = resolveConfigPath(options.config, env, deps.cwd)
  try {
    const loaded = loadInstallerConfig(configPath)
    config = loaded.config
    logger.debug(loaded.source ? `Loaded config from ${loaded.source}` : "No config file, using defaults")
  } catch (error) {
    logger.error(new ConfigError(configPath, error).message)
    return 1
  }

  let installerEnv: InstallerEnv
  try {
    installerEnv = parseInstallerEnv(env)
  } catch (error) {
    logger.error(PreconditionError.invalidEnvironment(error instanceof Error ? error.message : String(error)).message)
    return 1
  }

  logger = openLogger(config, consoleSinks, logger)
  const prompter = mode === "interactive" ? (deps.createPrompter?.() ?? new ClackPrompter()) : new AutoPrompter()
  const ctx = createRunContext({ mode, config, env: installerEnv, host, prompter, logger })
  const installer = new Installer(ctx)

  if (options.check) {
    return installer.check()
  }
  if (mode !== "interactive") {
    return (await installer.install()).exitCode
  }

  try {
    for (;;) {
      const choice = await prompter.choose("ERPNext installer", MENU, "full")
      switch (choice) {
        case "full":
          return (await installer.install()).exitCode
        case "step":
          return (await installer.install({ stepByStep: true })).exitCode
        case "remove": {
          const report = await installer.uninstall()
          if (report.failed.length > 0) return 1
          break
        }
        case "exit":
          return 0
      }
    }
  } catch (error) {
    if (error instanceof OperatorAbortError) {
      logger.warn(error.message)
      return 1
    }
    throw error
  }
}
