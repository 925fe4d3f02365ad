import type { StepDefinition, UndoAction } from "../types.js"
import { installPackages, run, tryRun } from "./common.js"

export const firewallStep: StepDefinition = {
  name: "firewall",
  kind: "firewall",
  title: "Configure the UFW firewall",
  criticality: "recoverable",
  gate: { question: "Setup UFW firewall?", defaultYes: true },
  enabled: ctx => ctx.config.firewallEnabled,

  async precheck(ctx) {
    if (!(await ctx.host.commandExists("ufw"))) return "not-done"
    const status = await ctx.host.exec("ufw", ["status"])
    return status.exitCode === 0 && status.stdout.includes("Status: active") ? "already-done" : "not-done"
  },

  async apply(ctx) {
    await installPackages(ctx, ["ufw"])
    await tryRun(ctx, "ufw", ["allow", "Nginx Full"], "Failed to allow Nginx in UFW")
    await tryRun(ctx, "ufw", ["allow", "ssh"], "Failed to allow SSH in UFW")
    await run(ctx, "ufw", ["--force", "enable"])
  },
}

export const undoFirewall: UndoAction = async ctx => {
  await run(ctx, "ufw", ["--force", "disable"])
}
