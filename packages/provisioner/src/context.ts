import type { InstallerEnv } from "@erpstack/env/server"
import type { RunLogger } from "@erpstack/logger"
import type { InstallerConfig } from "@erpstack/shared"
import { InstallerError } from "./errors.js"
import type { Host } from "./host.js"
import type { Prompter } from "./prompts.js"
import { SecretStore } from "./secrets.js"
import { Ledger, type InstallMode, type RunContext, type SiteIdentity } from "./types.js"

export interface CreateRunContextOptions {
  mode: InstallMode
  config: InstallerConfig
  env: InstallerEnv
  host: Host
  prompter: Prompter
  logger: RunLogger
  startedAt?: Date
}

export function createRunContext(options: CreateRunContextOptions): RunContext {
  const { mode, config, env, host, prompter, logger } = options
  return {
    mode,
    startedAt: options.startedAt ?? new Date(),
    config,
    env,
    host,
    prompter,
    logger,
    secrets: new SecretStore({
      dir: config.credentialsDir,
      summaryFile: config.summaryFile,
      mode,
      prompter,
      logger,
    }),
    ledger: new Ledger(),
    notes: [],
  }
}

/** The resolved account and domain. Steps after identity resolution rely on it. */
export function requireIdentity(ctx: RunContext): SiteIdentity {
  if (!ctx.identity) {
    throw new InstallerError("IDENTITY_UNRESOLVED", "Site identity has not been resolved for this run")
  }
  return ctx.identity
}
