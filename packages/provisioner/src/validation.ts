import { DEFAULTS, TARGET_HOST, getBenchDir } from "@erpstack/shared"
import { ResourceError, ValidationError } from "./errors.js"
import type { Host } from "./host.js"
import type { HostProfile, RunContext, SiteIdentity } from "./types.js"

const GB = 1024 ** 3

const DOMAIN_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/i
const DOMAIN_TLD = /^[a-z]{2,63}$/i
const ACCOUNT_NAME = /^[a-z_][a-z0-9_-]{0,31}$/

// =============================================================================
// Field validators
// =============================================================================

export function validateDomain(value: string): string {
  const domain = value.trim().toLowerCase()
  if (domain.length === 0 || domain.length > 253) {
    throw new ValidationError("domain", `Invalid domain length: "${value}"`)
  }

  const labels = domain.split(".")
  const tld = labels[labels.length - 1] ?? ""
  if (labels.length < 2 || !labels.every(label => DOMAIN_LABEL.test(label)) || !DOMAIN_TLD.test(tld)) {
    throw new ValidationError("domain", `Invalid domain format: "${value}"`)
  }
  return domain
}

export function isValidDomain(value: string): boolean {
  try {
    validateDomain(value)
    return true
  } catch {
    return false
  }
}

export function validateAccountName(value: string): string {
  const account = value.trim()
  if (!ACCOUNT_NAME.test(account)) {
    throw new ValidationError("account", `Invalid account name: "${value}"`)
  }
  return account
}

export interface FieldSpec {
  /** Prompt shown to the operator */
  question: string
  /** Value proposed by the config or the environment */
  candidate: string | undefined
  /** Known-good built-in value */
  fallback: string
  validate: (value: string) => string
}

/**
 * Interactive runs re-prompt until the answer validates. Non-interactive runs
 * validate the candidate and fall back to the built-in default on failure.
 */
export async function resolveField(ctx: RunContext, field: FieldSpec): Promise<string> {
  const { question, candidate, fallback, validate } = field
  const valid = (value: string | undefined): string | undefined => {
    if (value === undefined) return undefined
    try {
      return validate(value)
    } catch (err) {
      if (err instanceof ValidationError) {
        ctx.logger.warn(err.message)
        return undefined
      }
      throw err
    }
  }

  if (!ctx.prompter.interactive) {
    const accepted = valid(candidate)
    if (accepted !== undefined) return accepted
    ctx.logger.warn(`Using default: ${fallback}`)
    return fallback
  }

  const proposal = candidate !== undefined && isAcceptable(validate, candidate) ? candidate : fallback
  for (;;) {
    const answer = valid(await ctx.prompter.input(question, proposal))
    if (answer !== undefined) return answer
  }
}

function isAcceptable(validate: (value: string) => string, value: string): boolean {
  try {
    validate(value)
    return true
  } catch {
    return false
  }
}

/**
 * Account and domain for this run.
 * automated: environment, then config. quick: config quick domain. interactive: prompts.
 */
export async function resolveIdentity(ctx: RunContext): Promise<SiteIdentity> {
  const { config, env, mode } = ctx

  const account = await resolveField(ctx, {
    question: "Enter the service account name",
    candidate: mode === "automated" ? (env.FRAPPE_USER ?? config.defaultAccount) : config.defaultAccount,
    fallback: DEFAULTS.SERVICE_ACCOUNT,
    validate: validateAccountName,
  })

  const domainCandidate =
    mode === "automated"
      ? (env.ERPNEXT_DOMAIN ?? config.defaultDomain)
      : mode === "quick"
        ? config.quickDomain
        : config.defaultDomain

  const domain = await resolveField(ctx, {
    question: "Enter domain name for the site",
    candidate: domainCandidate,
    fallback: mode === "quick" ? DEFAULTS.QUICK_DOMAIN : DEFAULTS.DOMAIN,
    validate: validateDomain,
  })

  const identity = { account, domain, benchDir: getBenchDir(account) }
  ctx.identity = identity
  ctx.logger.info(`Site ${domain} will be installed for account ${account}`)
  return identity
}

// =============================================================================
// Pre-flight
// =============================================================================

export async function gatherHostProfile(host: Host): Promise<HostProfile> {
  const release = await host.osRelease()
  return {
    osId: release.ID ?? "unknown",
    osVersion: release.VERSION_ID ?? "unknown",
    prettyName: release.PRETTY_NAME ?? "unknown",
    totalMemoryGb: host.totalMemoryBytes() / GB,
    freeDiskGb: (await host.freeDiskBytes("/")) / GB,
  }
}

/**
 * Host checks before any step runs. Wrong OS warns, low memory asks (or
 * warns), low disk always fails.
 */
export async function runPreflight(ctx: RunContext, profile: HostProfile): Promise<void> {
  const { config, logger, prompter } = ctx

  if (profile.osId !== TARGET_HOST.OS_ID || profile.osVersion !== TARGET_HOST.OS_VERSION) {
    logger.warn(`This installer targets Debian ${TARGET_HOST.OS_VERSION}. Detected: ${profile.prettyName}`)
  } else {
    logger.success(`Detected ${profile.prettyName}`)
  }

  if (profile.totalMemoryGb < config.minRamGb) {
    const error = ResourceError.insufficientMemory(profile.totalMemoryGb, config.minRamGb)
    logger.warn(error.message)
    if (prompter.interactive && !(await prompter.confirm("Continue anyway?", false))) {
      throw error
    }
  }

  if (profile.freeDiskGb < config.minDiskGb) {
    throw ResourceError.insufficientDisk(profile.freeDiskGb, config.minDiskGb)
  }

  logger.success(
    `System requirements met: ${profile.totalMemoryGb.toFixed(1)}GB RAM, ${profile.freeDiskGb.toFixed(1)}GB free disk`,
  )
}
