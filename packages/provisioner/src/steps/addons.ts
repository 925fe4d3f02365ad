import { join } from "node:path"
import { ADDON_APPS, type AddonApp } from "@erpstack/shared"
import { requireIdentity } from "../context.js"
import type { RunContext, StepDefinition } from "../types.js"
import { inBench, runAsAccount, shellQuote } from "./common.js"

/** Apps chosen for this run: config toggles, or per-app answers when interactive */
async function selectAddons(ctx: RunContext): Promise<AddonApp[]> {
  const configured = new Set(ctx.config.addons)
  if (!ctx.prompter.interactive) {
    return ADDON_APPS.filter(app => configured.has(app.name))
  }

  const selected: AddonApp[] = []
  for (const app of ADDON_APPS) {
    if (await ctx.prompter.confirm(`Install ${app.name}?`, configured.has(app.name))) {
      selected.push(app)
    }
  }
  return selected
}

async function appPresent(ctx: RunContext, app: AddonApp): Promise<boolean> {
  const { benchDir } = requireIdentity(ctx)
  return ctx.host.pathExists(join(benchDir, "apps", app.name))
}

async function installAddon(ctx: RunContext, app: AddonApp): Promise<void> {
  const { benchDir } = requireIdentity(ctx)
  await runAsAccount(
    ctx,
    [
      inBench(benchDir),
      `if [ ! -d apps/${app.name} ]; then`,
      `  bench get-app ${shellQuote(`https://github.com/${app.repo}`)} --branch ${shellQuote(app.branch)}`,
      "fi",
      `bench --site "$SITE_DOMAIN" install-app ${app.name}`,
    ].join("\n"),
    { env: { SITE_DOMAIN: requireIdentity(ctx).domain } },
  )
}

export const addonsStep: StepDefinition = {
  name: "addons",
  kind: "addons",
  title: "Install additional Frappe apps",
  criticality: "recoverable",
  gate: { question: "Do you want to install additional Frappe apps?", defaultYes: false },

  async precheck(ctx) {
    if (ctx.prompter.interactive) return "not-done"
    const wanted = ADDON_APPS.filter(app => ctx.config.addons.includes(app.name))
    if (wanted.length === 0) return "not-done"
    for (const app of wanted) {
      if (!(await appPresent(ctx, app))) return "not-done"
    }
    return "already-done"
  },

  async apply(ctx) {
    const selected = await selectAddons(ctx)
    if (selected.length === 0) {
      ctx.logger.info("No additional apps selected")
      return
    }

    const failed: string[] = []
    for (const app of selected) {
      try {
        ctx.logger.info(`Installing ${app.name}...`)
        await installAddon(ctx, app)
        ctx.logger.success(`${app.name} installed`)
      } catch (err) {
        failed.push(app.name)
        ctx.logger.warn(`Failed to install ${app.name}`, err)
        ctx.notes.push({ step: "addons", message: `${app.name} was not installed` })
      }
    }

    if (failed.length > 0) {
      ctx.logger.warn(`${failed.length} of ${selected.length} app(s) failed: ${failed.join(", ")}`)
    }
  },
}
