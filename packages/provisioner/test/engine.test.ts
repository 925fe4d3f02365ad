import { afterEach, describe, expect, it, vi } from "vitest"
import { transitionStep, runSteps } from "../src/engine.js"
import { OperatorAbortError, PersistenceError } from "../src/errors.js"
import { StepRegistry } from "../src/registry.js"
import type { PrecheckResult, StepDefinition, StepKind } from "../src/types.js"
import { type TestContextOptions, createTestContext, removeTempDir } from "./helpers/context.js"
import { ScriptedPrompter } from "./helpers/prompter.js"

function fakeStep(
  name: string,
  overrides: Partial<StepDefinition> & { kind?: StepKind; done?: PrecheckResult } = {},
): StepDefinition {
  const { done = "not-done", ...rest } = overrides
  return {
    name,
    kind: "verify",
    title: name,
    criticality: "fatal",
    precheck: vi.fn(async () => done),
    apply: vi.fn(async () => {}),
    ...rest,
  }
}

function registryOf(...steps: StepDefinition[]): StepRegistry {
  const registry = new StepRegistry()
  for (const step of steps) registry.register(step)
  return registry
}

describe("runSteps", () => {
  const dirs: string[] = []
  const context = (options: TestContextOptions = {}) => {
    const test = createTestContext(options)
    dirs.push(test.dir)
    return test
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) removeTempDir(dir)
  })

  it("applies steps in order and records them in the ledger", async () => {
    const { ctx } = context()
    const order: string[] = []
    const first = fakeStep("first", { kind: "repositories", apply: async () => void order.push("first") })
    const second = fakeStep("second", { kind: "database", apply: async () => void order.push("second") })

    const report = await runSteps(registryOf(first, second), ctx)

    expect(order).toEqual(["first", "second"])
    expect(report.ledger.map(entry => [entry.name, entry.kind])).toEqual([
      ["first", "repositories"],
      ["second", "database"],
    ])
    expect(report.results.map(result => result.state)).toEqual(["done", "done"])
    expect(report.fatal).toBeUndefined()
  })

  it("never applies a step whose precheck reports already done", async () => {
    const { ctx } = context()
    const step = fakeStep("installed", { done: "already-done" })

    const report = await runSteps(registryOf(step), ctx)

    expect(step.apply).not.toHaveBeenCalled()
    expect(report.results[0]?.state).toBe("skipped")
    expect(report.ledger).toEqual([])
  })

  it("skips a disabled step without running its precheck", async () => {
    const { ctx } = context()
    const step = fakeStep("firewall", { enabled: () => false })

    const report = await runSteps(registryOf(step), ctx)

    expect(step.precheck).not.toHaveBeenCalled()
    expect(step.apply).not.toHaveBeenCalled()
    expect(report.results[0]?.state).toBe("skipped")
  })

  it("awaits an async enabled switch and logs the step as not applicable", async () => {
    const { ctx, memory } = context()
    const step = fakeStep("repositories", { enabled: async () => false })

    const report = await runSteps(registryOf(step), ctx)

    expect(step.apply).not.toHaveBeenCalled()
    expect(report.results[0]?.state).toBe("skipped")
    expect(memory.entries.map(entry => entry.message)).toEqual(["[1/1] repositories: skipped (not applicable)"])
  })

  it("stops at a fatal failure", async () => {
    const { ctx } = context()
    const broken = fakeStep("broken", {
      apply: async () => {
        throw new Error("exit 100")
      },
    })
    const after = fakeStep("after")

    const report = await runSteps(registryOf(fakeStep("before"), broken, after), ctx)

    expect(after.precheck).not.toHaveBeenCalled()
    expect(report.fatal?.step).toBe("broken")
    expect(report.fatal?.message).toBe("Step broken failed: exit 100")
    expect(report.ledger.map(entry => entry.name)).toEqual(["before"])
    expect(report.results.map(result => result.state)).toEqual(["done", "failed"])
  })

  it("notes a recoverable failure and continues", async () => {
    const { ctx } = context()
    const flaky = fakeStep("flaky", {
      criticality: "recoverable",
      apply: async () => {
        throw new Error("ufw missing")
      },
    })
    const after = fakeStep("after")

    const report = await runSteps(registryOf(flaky, after), ctx)

    expect(after.apply).toHaveBeenCalledOnce()
    expect(report.fatal).toBeUndefined()
    expect(report.results[0]).toMatchObject({ name: "flaky", state: "failed", error: "Step flaky failed: ufw missing" })
    expect(ctx.notes).toEqual([{ step: "flaky", message: "Step flaky failed: ufw missing" }])
  })

  it("treats a credential persistence failure as fatal in a recoverable step", async () => {
    const { ctx } = context()
    const step = fakeStep("addons", {
      criticality: "recoverable",
      apply: async () => {
        throw PersistenceError.permissions("/root/.erpnext-install/x.json", 0o644)
      },
    })

    const report = await runSteps(registryOf(step, fakeStep("after")), ctx)

    expect(report.fatal?.severity).toBe("fatal")
    expect(report.results).toHaveLength(1)
  })

  it("propagates an operator abort", async () => {
    const { ctx } = context()
    const step = fakeStep("asks", {
      apply: async () => {
        throw new OperatorAbortError()
      },
    })

    await expect(runSteps(registryOf(step), ctx)).rejects.toBeInstanceOf(OperatorAbortError)
  })

  it("asks before each step in step-by-step runs", async () => {
    const prompter = new ScriptedPrompter([false, true])
    const { ctx } = context({ mode: "interactive", prompter })
    const first = fakeStep("first", { title: "Install packages" })
    const second = fakeStep("second", { title: "Create site" })

    const report = await runSteps(registryOf(first, second), ctx, { stepByStep: true })

    expect(prompter.asked).toEqual(["Step 1/2: Install packages?", "Step 2/2: Create site?"])
    expect(first.apply).not.toHaveBeenCalled()
    expect(second.apply).toHaveBeenCalledOnce()
    expect(report.results.map(result => result.state)).toEqual(["skipped", "done"])
  })

  it("skips a step whose gate is declined", async () => {
    const prompter = new ScriptedPrompter([false])
    const { ctx } = context({ mode: "interactive", prompter })
    const step = fakeStep("addons", { gate: { question: "Install extra apps?", defaultYes: false } })

    await runSteps(registryOf(step), ctx)

    expect(prompter.asked).toEqual(["Install extra apps?"])
    expect(step.apply).not.toHaveBeenCalled()
  })

  it("passes every gate in non-interactive runs", async () => {
    const { ctx } = context({ mode: "automated" })
    const step = fakeStep("addons", { gate: { question: "Install extra apps?", defaultYes: false } })

    await runSteps(registryOf(step), ctx, { stepByStep: true })

    expect(step.apply).toHaveBeenCalledOnce()
  })
})

describe("transitionStep", () => {
  it("allows the documented transitions", () => {
    expect(transitionStep("s", "pending", "running")).toBe("running")
    expect(transitionStep("s", "running", "done")).toBe("done")
  })

  it("rejects leaving a terminal state", () => {
    expect(() => transitionStep("s", "done", "running")).toThrow("Invalid state transition for s: done -> running")
    expect(() => transitionStep("s", "pending", "done")).toThrow()
  })
})
