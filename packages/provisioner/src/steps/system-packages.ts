import type { StepDefinition } from "../types.js"
import { installPackages, missingPackages, run, tryRun } from "./common.js"

export const BASE_PACKAGES = ["sudo", "curl", "git", "build-essential", "wget"] as const

export const systemPackagesStep: StepDefinition = {
  name: "system-packages",
  kind: "system-packages",
  title: "Update system and install base packages",
  criticality: "fatal",
  gate: { question: "Update system packages?", defaultYes: true },

  async precheck(ctx) {
    return (await missingPackages(ctx, BASE_PACKAGES)).length === 0 ? "already-done" : "not-done"
  },

  async apply(ctx) {
    await run(ctx, "apt-get", ["update"])
    await tryRun(ctx, "apt-get", ["upgrade", "-y"], "Some packages failed to upgrade")
    await installPackages(ctx, BASE_PACKAGES)
  },
}
