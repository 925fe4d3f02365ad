import type { InstallerEnv } from "@erpstack/env/server"
import type { RunLogger } from "@erpstack/logger"
import type { InstallerConfig } from "@erpstack/shared"
import type { FailureSeverity } from "./errors.js"
import type { Host } from "./host.js"
import type { Prompter } from "./prompts.js"
import type { SecretStore } from "./secrets.js"

/**
 * How the run talks to the operator.
 * - automated: no prompts, environment overrides, no rollback
 * - quick: no prompts, quick defaults, rollback auto-confirmed
 * - interactive: menu and prompts
 */
export type InstallMode = "automated" | "quick" | "interactive"

export const STEP_KINDS = [
  "repositories",
  "system-packages",
  "service-account",
  "database",
  "runtime",
  "python-cache",
  "bench",
  "site",
  "addons",
  "production",
  "firewall",
  "verify",
] as const

export type StepKind = (typeof STEP_KINDS)[number]

export type Criticality = FailureSeverity

export type PrecheckResult = "already-done" | "not-done"

export type StepState = "pending" | "skipped" | "running" | "done" | "failed"

export interface StepGate {
  question: string
  defaultYes: boolean
}

/**
 * A unit of provisioning work. Undo lives in UNDO_ACTIONS, keyed by kind.
 */
export interface StepDefinition {
  name: string
  kind: StepKind
  title: string
  criticality: Criticality
  /** Confirmation asked before apply; non-interactive prompters auto-pass it */
  gate?: StepGate
  /** Configuration or host switch. A step that is not enabled is skipped as not applicable. */
  enabled?: (ctx: RunContext) => boolean | Promise<boolean>
  precheck: (ctx: RunContext) => Promise<PrecheckResult>
  apply: (ctx: RunContext) => Promise<void>
}

export interface RegisteredStep extends StepDefinition {
  /** 1-based position in the registry */
  ordinal: number
}

export type UndoAction = (ctx: RunContext) => Promise<void>

export interface LedgerEntry {
  name: string
  kind: StepKind
  completedAt: Date
}

/**
 * Append-only record of the steps completed in this run
 */
export class Ledger {
  private readonly entries: LedgerEntry[] = []

  append(name: string, kind: StepKind, completedAt = new Date()): void {
    this.entries.push({ name, kind, completedAt })
  }

  list(): readonly LedgerEntry[] {
    return [...this.entries]
  }

  get size(): number {
    return this.entries.length
  }
}

export interface SiteIdentity {
  domain: string
  account: string
  benchDir: string
}

export interface InstalledSite extends SiteIdentity {
  installedAt: string
}

export interface HostProfile {
  osId: string
  osVersion: string
  prettyName: string
  totalMemoryGb: number
  freeDiskGb: number
}

/** Recoverable failures and warnings surfaced in the final summary */
export interface RunNote {
  step?: string
  message: string
}

export interface RunContext {
  readonly mode: InstallMode
  readonly startedAt: Date
  readonly config: InstallerConfig
  readonly env: InstallerEnv
  readonly host: Host
  readonly prompter: Prompter
  readonly secrets: SecretStore
  readonly logger: RunLogger
  readonly ledger: Ledger
  identity?: SiteIdentity
  readonly notes: RunNote[]
}

export interface StepResult {
  name: string
  state: StepState
  durationMs: number
  error?: string
}
