import { describe, expect, it } from "vitest"
import { StepRegistry } from "../src/registry.js"
import { DEFAULT_STEPS, UNDO_ACTIONS, createDefaultRegistry } from "../src/steps/index.js"
import { STEP_KINDS } from "../src/types.js"

describe("StepRegistry", () => {
  it("registers the built-in steps in provisioning order", () => {
    const registry = createDefaultRegistry()

    expect(registry.list().map(step => step.name)).toEqual([
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
    ])
    expect(registry.list().map(step => step.ordinal)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12])
    expect(registry.size).toBe(DEFAULT_STEPS.length)
  })

  it("rejects a duplicate name", () => {
    const registry = new StepRegistry()
    const step = DEFAULT_STEPS[0]
    if (!step) throw new Error("no steps")
    registry.register(step)

    expect(() => registry.register(step)).toThrow("Step repositories is already registered")
  })

  it("looks steps up by name", () => {
    expect(createDefaultRegistry().get("database")?.ordinal).toBe(4)
    expect(createDefaultRegistry().get("missing")).toBeUndefined()
  })

  it("lists an undo entry for every step kind", () => {
    expect(Object.keys(UNDO_ACTIONS).sort()).toEqual([...STEP_KINDS].sort())
  })

  it("gives each built-in step its own kind", () => {
    expect(DEFAULT_STEPS.map(step => step.kind)).toEqual([...STEP_KINDS])
  })
})
