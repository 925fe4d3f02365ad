import { InstallerError, OperatorAbortError, PersistenceError, StepFailure } from "./errors.js"
import type { StepRegistry } from "./registry.js"
import type { LedgerEntry, RegisteredStep, RunContext, StepResult, StepState } from "./types.js"

/** Allowed step state transitions. Skipped, done and failed are terminal. */
export const VALID_STEP_TRANSITIONS: Record<StepState, readonly StepState[]> = {
  pending: ["skipped", "running"],
  running: ["done", "failed"],
  skipped: [],
  done: [],
  failed: [],
}

export function transitionStep(step: string, current: StepState, target: StepState): StepState {
  if (!VALID_STEP_TRANSITIONS[current].includes(target)) {
    throw new InstallerError("INVALID_TRANSITION", `Invalid state transition for ${step}: ${current} -> ${target}`)
  }
  return target
}

export interface RunOptions {
  /** Ask "Step N: <title>?" before every step */
  stepByStep?: boolean
}

export interface RunReport {
  results: StepResult[]
  ledger: readonly LedgerEntry[]
  /** Set when a fatal failure stopped the run */
  fatal?: StepFailure
}

/**
 * Runs the registry's steps in order. Each step is skipped when not applicable,
 * already done or declined, otherwise applied. A fatal failure stops the run;
 * a recoverable one is noted and the run goes on.
 */
export async function runSteps(registry: StepRegistry, ctx: RunContext, options: RunOptions = {}): Promise<RunReport> {
  const results: StepResult[] = []
  const total = registry.size

  for (const step of registry.list()) {
    const result = await runStep(step, total, ctx, options)
    results.push(result.outcome)
    if (result.fatal) {
      return { results, ledger: ctx.ledger.list(), fatal: result.fatal }
    }
  }

  return { results, ledger: ctx.ledger.list() }
}

async function shouldSkip(step: RegisteredStep, total: number, ctx: RunContext, options: RunOptions): Promise<string | undefined> {
  if (step.enabled && !(await step.enabled(ctx))) {
    return "not applicable"
  }
  if ((await step.precheck(ctx)) === "already-done") {
    return "already done"
  }
  if (options.stepByStep && !(await ctx.prompter.confirm(`Step ${step.ordinal}/${total}: ${step.title}?`, true))) {
    return "declined"
  }
  if (step.gate && !(await ctx.prompter.confirm(step.gate.question, step.gate.defaultYes))) {
    return "declined"
  }
  return undefined
}

async function runStep(
  step: RegisteredStep,
  total: number,
  ctx: RunContext,
  options: RunOptions,
): Promise<{ outcome: StepResult; fatal?: StepFailure }> {
  const logger = ctx.logger.child({ step: step.name })
  const started = Date.now()
  let state: StepState = "pending"

  try {
    const skipReason = await shouldSkip(step, total, ctx, options)
    if (skipReason) {
      state = transitionStep(step.name, state, "skipped")
      logger.info(`[${step.ordinal}/${total}] ${step.title}: skipped (${skipReason})`)
      return { outcome: { name: step.name, state, durationMs: Date.now() - started } }
    }

    state = transitionStep(step.name, state, "running")
    logger.info(`[${step.ordinal}/${total}] ${step.title}...`)
    await step.apply(ctx)

    state = transitionStep(step.name, state, "done")
    ctx.ledger.append(step.name, step.kind)
    logger.success(`${step.title} completed`)
    return { outcome: { name: step.name, state, durationMs: Date.now() - started } }
  } catch (err) {
    if (err instanceof OperatorAbortError) throw err

    if (state === "running") {
      state = transitionStep(step.name, state, "failed")
    }
    const severity = err instanceof PersistenceError ? "fatal" : step.criticality
    const failure = new StepFailure(step.name, severity, err)
    const outcome: StepResult = {
      name: step.name,
      state: "failed",
      durationMs: Date.now() - started,
      error: failure.message,
    }

    if (severity === "fatal") {
      logger.error(`${step.title} failed`, err)
      return { outcome, fatal: failure }
    }

    logger.warn(`${step.title} failed, continuing`, err)
    ctx.notes.push({ step: step.name, message: failure.message })
    return { outcome }
  }
}
