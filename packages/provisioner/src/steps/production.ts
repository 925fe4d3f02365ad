import { requireIdentity } from "../context.js"
import type { StepDefinition, UndoAction } from "../types.js"
import { run, tryRun } from "./common.js"

export const SUPERVISOR_CONFIG = "/etc/supervisor/conf.d/frappe-bench.conf"
export const NGINX_CONFIG = "/etc/nginx/conf.d/frappe-bench.conf"

export const productionStep: StepDefinition = {
  name: "production",
  kind: "production",
  title: "Configure production mode (Nginx + Supervisor)",
  criticality: "recoverable",
  gate: { question: "Setup production mode (Nginx + Supervisor)?", defaultYes: true },
  enabled: ctx => ctx.config.productionMode,

  async precheck(ctx) {
    const done = (await ctx.host.pathExists(SUPERVISOR_CONFIG)) && (await ctx.host.pathExists(NGINX_CONFIG))
    return done ? "already-done" : "not-done"
  },

  async apply(ctx) {
    const { account, benchDir } = requireIdentity(ctx)
    const bench = `/home/${account}/.local/bin/bench`

    await run(ctx, bench, ["setup", "production", account, "--yes"], { cwd: benchDir })
    await tryRun(ctx, "systemctl", ["restart", "nginx"], "Failed to restart Nginx")
    await tryRun(ctx, "supervisorctl", ["reload"], "Failed to reload Supervisor")
  },
}

export const undoProduction: UndoAction = async ctx => {
  await tryRun(ctx, "supervisorctl", ["stop", "all"], "Could not stop supervisor programs")
  await ctx.host.removePath(SUPERVISOR_CONFIG)
  await ctx.host.removePath(NGINX_CONFIG)
  await tryRun(ctx, "systemctl", ["reload", "nginx"], "Could not reload Nginx")
}
