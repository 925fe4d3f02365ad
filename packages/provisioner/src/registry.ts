import { InstallerError } from "./errors.js"
import type { RegisteredStep, StepDefinition } from "./types.js"

/**
 * Ordered catalog of provisioning steps. Execution order is registration order.
 */
export class StepRegistry {
  private readonly steps: RegisteredStep[] = []

  register(step: StepDefinition): RegisteredStep {
    if (this.get(step.name)) {
      throw new InstallerError("DUPLICATE_STEP", `Step ${step.name} is already registered`)
    }
    const registered = { ...step, ordinal: this.steps.length + 1 }
    this.steps.push(registered)
    return registered
  }

  list(): readonly RegisteredStep[] {
    return [...this.steps]
  }

  get(name: string): RegisteredStep | undefined {
    return this.steps.find(step => step.name === name)
  }

  get size(): number {
    return this.steps.length
  }
}
