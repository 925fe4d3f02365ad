/**
 * ERPNext provisioner
 *
 * Ordered, idempotent steps that turn a fresh Debian host into a running
 * ERPNext site, with owner-only credential storage and reverse-order rollback.
 *
 * @packageDocumentation
 */

export { Installer, type InstallResult } from "./orchestrator.js"
export { main, createProgram, modeFromOptions, type CliDeps, type CliOptions } from "./cli.js"
export { createRunContext, requireIdentity, type CreateRunContextOptions } from "./context.js"

export { StepRegistry } from "./registry.js"
export { VALID_STEP_TRANSITIONS, runSteps, transitionStep, type RunOptions, type RunReport } from "./engine.js"
export { rollback, uninstall, type RollbackReport, type UninstallReport } from "./rollback.js"
export { DEFAULT_STEPS, UNDO_ACTIONS, createDefaultRegistry } from "./steps/index.js"

export {
  SECRET_PURPOSES,
  SecretStore,
  withRestrictedFile,
  type Charset,
  type Secret,
  type SecretMethod,
  type SecretPurpose,
  type SecretRequest,
} from "./secrets.js"
export { readSiteRecord, removeSiteRecord, writeSiteRecord } from "./site-record.js"

export {
  gatherHostProfile,
  isValidDomain,
  resolveField,
  resolveIdentity,
  runPreflight,
  validateAccountName,
  validateDomain,
} from "./validation.js"

export { AutoPrompter, ClackPrompter, type Choice, type Prompter } from "./prompts.js"
export { CommandError, SystemHost, type CommandResult, type ExecOptions, type Host } from "./host.js"

export {
  ConfigError,
  InstallerError,
  OperatorAbortError,
  PersistenceError,
  PreconditionError,
  ResourceError,
  StepFailure,
  ValidationError,
} from "./errors.js"
export type { FailureSeverity, InstallerErrorCode } from "./errors.js"

export {
  Ledger,
  STEP_KINDS,
  type Criticality,
  type HostProfile,
  type InstallMode,
  type InstalledSite,
  type LedgerEntry,
  type PrecheckResult,
  type RegisteredStep,
  type RunContext,
  type RunNote,
  type SiteIdentity,
  type StepDefinition,
  type StepGate,
  type StepKind,
  type StepResult,
  type StepState,
  type UndoAction,
} from "./types.js"
